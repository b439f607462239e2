/**
 * Example comparing every eviction policy on one trace
 *
 * Run with: npx tsx examples/compare-policies-example.ts [frames]
 */

import { fileURLToPath } from 'node:url';
import {
  comparePolicies,
  type EvictionPolicyConfigs,
  formatComparison,
  readTraceFile,
  type SimulationResult
} from '../src';

export const EXAMPLE_TRACE = fileURLToPath(new URL('./traces/loop.trace', import.meta.url));

export const EXAMPLE_POLICIES: EvictionPolicyConfigs[] = [
  { type: 'opt' },
  { type: 'clock' },
  { type: 'nru', refreshRate: 4 },
  { type: 'rand', seed: 2024 }
];

/**
 * Runs the bundled trace under every policy for each frame count
 */
export async function comparePoliciesOnExampleTrace(frameCounts: number[]): Promise<SimulationResult[][]> {
  const operations = await readTraceFile(EXAMPLE_TRACE);
  return frameCounts.map((frameCount) => comparePolicies(operations, frameCount, EXAMPLE_POLICIES));
}

// Run the demonstration if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const frames = process.argv[2] ? [Number(process.argv[2])] : [2, 3, 4];
  comparePoliciesOnExampleTrace(frames).then((runs) => {
    console.log('=== Page Replacement Policy Comparison ===\n');
    runs.forEach((results) => console.log(`${formatComparison(results)}\n`));
  }, (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
