import safeStringify from 'fast-safe-stringify';
import type { Operation } from '../Operation';
import type { AccessOutcome, AccessResult } from '../PageTable';
import { formatRate } from '../PageTableStats';
import type { SimulationResult } from '../Simulation';
import { formatAddress } from '../trace/TraceParser';

export const OUTCOME_LABELS: Record<AccessOutcome, string> = {
  'hit': 'Hit',
  'fault-no-eviction': 'Page Fault - No Eviction',
  'fault-evict-clean': 'Page Fault - Evict Clean',
  'fault-evict-dirty': 'Page Fault - Evict Dirty'
};

/**
 * One line of the per-access diagnostic stream, led by the address as the
 * trace wrote it (rebuilt from page and offset for operations made in code)
 */
export function formatDiagnostic(operation: Operation, result: AccessResult): string {
  return `${operation.address ?? formatAddress(operation)}: ${OUTCOME_LABELS[result.outcome]}`;
}

export function formatSummary(result: SimulationResult): string {
  const { stats } = result;
  return [
    `Algorithm: ${result.policyName}`,
    `Number of frames: ${result.frameCount}`,
    `Total memory accesses: ${stats.accesses}`,
    `Total page faults: ${stats.pageFaults}`,
    `Total writes to disk: ${stats.writeBacks}`,
    `Page fault rate: ${formatRate(stats.pageFaults, stats.accesses)}%`
  ].join('\n');
}

const COLUMNS: ReadonlyArray<{ title: string; width: number; value: (result: SimulationResult) => string }> = [
  { title: 'Policy', width: 10, value: (r) => r.policyName },
  { title: 'Accesses', width: 10, value: (r) => String(r.stats.accesses) },
  { title: 'Faults', width: 10, value: (r) => String(r.stats.pageFaults) },
  { title: 'Write-backs', width: 13, value: (r) => String(r.stats.writeBacks) },
  { title: 'Fault rate', width: 0, value: (r) => `${formatRate(r.stats.pageFaults, r.stats.accesses)}%` }
];

/**
 * Side-by-side table of several runs on the same trace
 */
export function formatComparison(results: readonly SimulationResult[]): string {
  const frameCount = results.length > 0 ? results[0].frameCount : 0;
  const row = (cells: string[]): string =>
    cells.map((cell, i) => cell.padEnd(COLUMNS[i].width)).join('').trimEnd();

  return [
    `Number of frames: ${frameCount}`,
    row(COLUMNS.map((column) => column.title)),
    ...results.map((result) => row(COLUMNS.map((column) => column.value(result))))
  ].join('\n');
}

/**
 * Machine-readable form of one or more results
 */
export function formatJson(results: SimulationResult | readonly SimulationResult[]): string {
  return safeStringify(results, undefined, 2);
}
