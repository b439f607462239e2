export type SimulationErrorKind = 'configuration' | 'malformed-input' | 'resource';

/**
 * Raised for every user-facing failure. Any of these aborts the run before
 * statistics are reported.
 */
export class SimulationError extends Error {
  public readonly kind: SimulationErrorKind;

  constructor(kind: SimulationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SimulationError';
    this.kind = kind;
  }
}

export const configurationError = (message: string): SimulationError =>
  new SimulationError('configuration', message);

export const isSimulationError = (error: unknown): error is SimulationError =>
  error instanceof SimulationError;
