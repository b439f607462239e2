// Simulation
export { runSimulation, comparePolicies } from './Simulation';
export type { AccessListener, SimulationResult } from './Simulation';
export { PageTable } from './PageTable';
export type { AccessOutcome, AccessResult } from './PageTable';
export { PageTableStatsManager, formatRate } from './PageTableStats';
export type { PageTableStats } from './PageTableStats';

// Configuration and options
export { createOptions, validateOptions } from './Options';
export type { SimulationOptions } from './Options';

// Core types
export { createFrame, isAccessMode } from './Operation';
export type { AccessMode, Frame, Operation } from './Operation';
export { SimulationError, isSimulationError } from './errors';
export type { SimulationErrorKind } from './errors';
export { createSeededRandom } from './random';
export type { RandomSource } from './random';

// Eviction policies
export * from './eviction';

// Trace input and reports
export * from './trace';
export {
  OUTCOME_LABELS,
  formatComparison,
  formatDiagnostic,
  formatJson,
  formatSummary
} from './report/Report';
