import type { Operation } from '../Operation';
import { createSeededRandom, randomSeed } from '../random';
import LibLogger from '../logger';
import type { EvictionPolicyConfigs } from './EvictionPolicyConfig';
import { validateEvictionPolicyConfig } from './EvictionPolicyValidation';
import { OptimalEvictionPolicy } from './policies/OptimalEvictionPolicy';
import { ClockEvictionPolicy } from './policies/ClockEvictionPolicy';
import { NotRecentlyUsedEvictionPolicy } from './policies/NotRecentlyUsedEvictionPolicy';
import { RandomEvictionPolicy } from './policies/RandomEvictionPolicy';

const logger = LibLogger.get('EvictionPolicyFactory');

/**
 * The closed set of policies a page table can run
 */
export type AnyEvictionPolicy =
  | OptimalEvictionPolicy
  | ClockEvictionPolicy
  | NotRecentlyUsedEvictionPolicy
  | RandomEvictionPolicy;

export interface EvictionPolicyContext {
  /** Number of frames in the table */
  capacity: number;
  /** Full trace; only the optimal policy reads it */
  operations: readonly Operation[];
}

/**
 * Creates a fresh policy instance for one simulation run
 */
export function createEvictionPolicy(
  config: EvictionPolicyConfigs,
  context: EvictionPolicyContext
): AnyEvictionPolicy {
  validateEvictionPolicyConfig(config);

  switch (config.type) {
    case 'opt':
      return new OptimalEvictionPolicy(context.operations);
    case 'clock':
      return new ClockEvictionPolicy(context.capacity);
    case 'nru': {
      // validated above
      const refreshRate = config.refreshRate ?? 0;
      return new NotRecentlyUsedEvictionPolicy(refreshRate);
    }
    case 'rand': {
      if (config.random) {
        return new RandomEvictionPolicy(context.capacity, config.random);
      }
      const seed = config.seed ?? randomSeed();
      if (typeof config.seed === 'undefined') {
        logger.info('Random policy seeded', { seed });
      }
      return new RandomEvictionPolicy(context.capacity, createSeededRandom(seed));
    }
    default: {
      const unsupported: never = config;
      throw new Error(`Unsupported eviction policy: ${JSON.stringify(unsupported)}`);
    }
  }
}
