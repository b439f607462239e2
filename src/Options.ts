import { configurationError } from './errors';
import type { EvictionPolicyConfigs } from './eviction/EvictionPolicyConfig';
import {
  validateEvictionPolicyConfig,
  validatePositiveInteger
} from './eviction/EvictionPolicyValidation';

/**
 * Configuration of one simulation run
 */
export interface SimulationOptions {
  /** Number of page frames in the table */
  frameCount: number;
  /** Eviction policy and its settings */
  policy: EvictionPolicyConfigs;
}

const VALID_PROPERTIES = new Set(['frameCount', 'policy']);

const PROPERTY_SUGGESTIONS: Record<string, string> = {
  frames: 'frameCount',
  framecount: 'frameCount',
  frame_count: 'frameCount',
  numFrames: 'frameCount',
  capacity: 'frameCount',
  algorithm: 'policy',
  evictionPolicy: 'policy',
  eviction_policy: 'policy',
  replacement: 'policy'
};

/**
 * Validates simulation options, throwing a configuration error on the first problem
 */
export const validateOptions = (options: SimulationOptions): void => {
  const unknownProperties = Object.keys(options).filter((key) => !VALID_PROPERTIES.has(key));
  if (unknownProperties.length > 0) {
    const hints = unknownProperties
      .filter((key) => key in PROPERTY_SUGGESTIONS)
      .map((key) => `"${key}" -> "${PROPERTY_SUGGESTIONS[key]}"`);
    throw configurationError(
      `Unknown configuration properties: ${unknownProperties.join(', ')}. ` +
      `Valid properties are: ${Array.from(VALID_PROPERTIES).join(', ')}.` +
      (hints.length > 0 ? ` Suggestion: did you mean ${hints.join(', ')}?` : '')
    );
  }

  validatePositiveInteger(options.frameCount, 'frameCount');

  if (!options.policy) {
    throw configurationError(
      'policy is required. Suggestion: Set policy to { type: "opt" | "clock" | "nru" | "rand" }.'
    );
  }
  validateEvictionPolicyConfig(options.policy);
};

/**
 * Validated copy of the given options
 */
export const createOptions = (options: SimulationOptions): SimulationOptions => {
  validateOptions(options);
  return {
    frameCount: options.frameCount,
    policy: { ...options.policy }
  };
};
