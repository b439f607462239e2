import { isAccessMode, type Operation } from '../Operation';
import { SimulationError } from '../errors';

/** 4 KiB pages */
export const PAGE_SHIFT = 12n;
export const OFFSET_MASK = (1n << PAGE_SHIFT) - 1n;

const MAX_ADDRESS = (1n << 64n) - 1n;
const HEX_ADDRESS = /^(?:0[xX])?([0-9a-fA-F]+)$/;

export function decomposeAddress(address: bigint): { page: number; offset: number } {
  return {
    page: Number(address >> PAGE_SHIFT),
    offset: Number(address & OFFSET_MASK)
  };
}

/**
 * Rebuilds the hex address an operation was parsed from
 */
export function formatAddress(operation: Pick<Operation, 'page' | 'offset'>): string {
  const address = (BigInt(operation.page) << PAGE_SHIFT) | BigInt(operation.offset);
  return `0x${address.toString(16)}`;
}

const malformed = (lineNumber: number, line: string, reason: string): SimulationError =>
  new SimulationError(
    'malformed-input',
    `Malformed trace line ${lineNumber}: "${line.trim()}" (${reason}). ` +
    'Suggestion: Each line must be "<hex-address> <R|W>".'
  );

/**
 * Parses one `<hex-address> <R|W>` line. Blank lines yield null.
 * @param lineNumber - 1-based, for error messages
 */
export function parseTraceLine(line: string, lineNumber: number): Operation | null {
  const fields = line.trim().split(/\s+/).filter((field) => field.length > 0);
  if (fields.length === 0) {
    return null;
  }
  if (fields.length !== 2) {
    throw malformed(lineNumber, line, `expected 2 fields, got ${fields.length}`);
  }

  const [rawAddress, rawMode] = fields;
  const match = HEX_ADDRESS.exec(rawAddress);
  if (!match) {
    throw malformed(lineNumber, line, `"${rawAddress}" is not a hex address`);
  }
  const address = BigInt(`0x${match[1]}`);
  if (address > MAX_ADDRESS) {
    throw malformed(lineNumber, line, 'address wider than 64 bits');
  }
  if (!isAccessMode(rawMode)) {
    throw malformed(lineNumber, line, `access mode must be R or W, got "${rawMode}"`);
  }

  return { ...decomposeAddress(address), mode: rawMode, address: rawAddress };
}

/**
 * Parses a whole trace. The first bad line aborts parsing.
 */
export function parseTrace(text: string): Operation[] {
  const operations: Operation[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    const operation = parseTraceLine(line, index + 1);
    if (operation) {
      operations.push(operation);
    }
  });
  return operations;
}
