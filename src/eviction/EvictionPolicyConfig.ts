import type { RandomSource } from '../random';

/**
 * Short names accepted on the command line
 */
export type EvictionPolicyKind = 'opt' | 'clock' | 'nru' | 'rand';

export const EVICTION_POLICY_KINDS: readonly EvictionPolicyKind[] = ['opt', 'clock', 'nru', 'rand'];

export const isEvictionPolicyKind = (value: string): value is EvictionPolicyKind =>
  EVICTION_POLICY_KINDS.some((kind) => kind === value);

/**
 * Base configuration interface for eviction policies
 */
export interface EvictionPolicyConfig {
  /** Policy type identifier */
  readonly type: EvictionPolicyKind;
}

/**
 * Belady's optimal policy. Needs the whole trace up front.
 */
export interface OptimalConfig extends EvictionPolicyConfig {
  readonly type: 'opt';
}

/**
 * Clock (second chance) policy
 */
export interface ClockConfig extends EvictionPolicyConfig {
  readonly type: 'clock';
}

/**
 * Not-recently-used policy
 */
export interface NRUConfig extends EvictionPolicyConfig {
  readonly type: 'nru';
  /** Number of accesses between clearing every referenced bit. Required. */
  refreshRate?: number;
}

/**
 * Random policy. `random` wins over `seed`; with neither a seed is drawn and logged.
 */
export interface RandomConfig extends EvictionPolicyConfig {
  readonly type: 'rand';
  seed?: number;
  random?: RandomSource;
}

/**
 * Union type for all eviction policy configurations
 */
export type EvictionPolicyConfigs =
  | OptimalConfig
  | ClockConfig
  | NRUConfig
  | RandomConfig;
