import type { Operation } from './Operation';
import { type AccessResult, PageTable } from './PageTable';
import type { PageTableStats } from './PageTableStats';
import { createOptions, type SimulationOptions } from './Options';
import type { EvictionPolicyConfigs, EvictionPolicyKind } from './eviction/EvictionPolicyConfig';
import { createEvictionPolicy } from './eviction/EvictionPolicyFactory';
import LibLogger from './logger';

const logger = LibLogger.get('Simulation');

/**
 * Called after every access, in trace order
 */
export type AccessListener = (operation: Operation, result: AccessResult, index: number) => void;

export interface SimulationResult {
  policy: EvictionPolicyKind;
  policyName: string;
  frameCount: number;
  stats: PageTableStats;
}

/**
 * Replays `operations` against a fresh page table and policy
 */
export function runSimulation(
  operations: readonly Operation[],
  options: SimulationOptions,
  listener?: AccessListener
): SimulationResult {
  const { frameCount, policy: policyConfig } = createOptions(options);
  const policy = createEvictionPolicy(policyConfig, { capacity: frameCount, operations });
  const table = new PageTable(frameCount, policy);

  logger.debug('Simulation started', {
    policy: policy.getPolicyName(),
    frameCount,
    operations: operations.length
  });

  operations.forEach((operation, index) => {
    const result = table.access(operation.page, operation.mode);
    listener?.(operation, result, index);
  });

  const stats = table.getStats();
  logger.debug('Simulation finished', { policy: policy.getPolicyName(), frameCount, ...stats });

  return {
    policy: policy.kind,
    policyName: policy.getPolicyName(),
    frameCount,
    stats
  };
}

/**
 * Runs every policy on the same trace, each with its own table and state.
 * Results follow the order of `policies`.
 */
export function comparePolicies(
  operations: readonly Operation[],
  frameCount: number,
  policies: readonly EvictionPolicyConfigs[]
): SimulationResult[] {
  return policies.map((policy) => runSimulation(operations, { frameCount, policy }));
}
