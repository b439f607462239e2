/**
 * Validation functions for eviction policy configurations
 */
import { configurationError } from '../errors';
import {
  EVICTION_POLICY_KINDS,
  type EvictionPolicyConfigs,
  isEvictionPolicyKind,
  type NRUConfig,
  type RandomConfig
} from './EvictionPolicyConfig';

/**
 * Validates that a value is a positive integer
 */
export function validatePositiveInteger(value: unknown, fieldName: string): void {
  if (typeof value !== 'number' || isNaN(value) || !isFinite(value)) {
    throw configurationError(
      `${fieldName} must be a finite number, got ${typeof value} (${String(value)}). ` +
      `Suggestion: Provide a valid numeric value for ${fieldName}.`
    );
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw configurationError(
      `${fieldName} must be a positive integer, got ${value}. ` +
      `Suggestion: Use a positive whole number (1, 2, 3, ...) for ${fieldName}.`
    );
  }
}

/**
 * Validates NRU configuration; the refresh period has no default
 */
export function validateNRUConfig(config: NRUConfig): void {
  if (typeof config.refreshRate === 'undefined') {
    throw configurationError(
      'The nru policy requires a refresh period. ' +
      'Suggestion: Pass --refresh <accesses> (or set refreshRate) when selecting nru.'
    );
  }
  validatePositiveInteger(config.refreshRate, 'refreshRate');
}

/** Largest seed the 32-bit generator can tell apart */
export const MAX_SEED = 0xffffffff;

/**
 * Validates random policy configuration
 */
export function validateRandomConfig(config: RandomConfig): void {
  if (typeof config.seed !== 'undefined') {
    if (typeof config.seed !== 'number' || !Number.isInteger(config.seed) || config.seed < 0) {
      throw configurationError(
        `seed must be a non-negative integer, got ${String(config.seed)}. ` +
        'Suggestion: Use a whole number such as 42 for seed.'
      );
    }
    if (config.seed > MAX_SEED) {
      throw configurationError(
        `seed must be at most ${MAX_SEED}, got ${config.seed}. ` +
        'Suggestion: Use a 32-bit seed (0 to 4294967295).'
      );
    }
  }
}

/**
 * Validates any eviction policy configuration
 */
export function validateEvictionPolicyConfig(config: EvictionPolicyConfigs): void {
  if (!config || typeof config !== 'object') {
    throw configurationError('Policy configuration must be a non-null object');
  }

  if (!isEvictionPolicyKind(config.type)) {
    throw configurationError(
      `Invalid eviction policy type: ${String(config.type)}. Must be one of: ${EVICTION_POLICY_KINDS.join(', ')}`
    );
  }

  switch (config.type) {
    case 'nru':
      validateNRUConfig(config);
      break;
    case 'rand':
      validateRandomConfig(config);
      break;
    case 'opt':
    case 'clock':
      // no settings
      break;
  }
}
