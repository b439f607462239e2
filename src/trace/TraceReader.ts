import { readFile } from 'node:fs/promises';
import type { Operation } from '../Operation';
import { SimulationError } from '../errors';
import LibLogger from '../logger';
import { parseTrace } from './TraceParser';

const logger = LibLogger.get('TraceReader');

/**
 * Reads and parses a trace file
 */
export async function readTraceFile(path: string): Promise<Operation[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SimulationError(
      'resource',
      `Cannot read trace file "${path}": ${reason}. Suggestion: Check that the file exists and is readable.`,
      { cause: error }
    );
  }

  const operations = parseTrace(text);
  logger.debug('Trace loaded', { path, operations: operations.length });
  return operations;
}
