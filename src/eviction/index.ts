// Core eviction policy contract
export { EvictionPolicy } from './EvictionPolicy';
export { createEvictionPolicy } from './EvictionPolicyFactory';
export type { AnyEvictionPolicy, EvictionPolicyContext } from './EvictionPolicyFactory';
export {
  EVICTION_POLICY_KINDS,
  isEvictionPolicyKind
} from './EvictionPolicyConfig';
export type {
  ClockConfig,
  EvictionPolicyConfigs,
  EvictionPolicyKind,
  NRUConfig,
  OptimalConfig,
  RandomConfig
} from './EvictionPolicyConfig';
export { validateEvictionPolicyConfig } from './EvictionPolicyValidation';

// Individual eviction policy implementations
export { OptimalEvictionPolicy, computeNextUse, NEVER } from './policies/OptimalEvictionPolicy';
export { ClockEvictionPolicy } from './policies/ClockEvictionPolicy';
export { NotRecentlyUsedEvictionPolicy, nruClass } from './policies/NotRecentlyUsedEvictionPolicy';
export { RandomEvictionPolicy } from './policies/RandomEvictionPolicy';
