/**
 * Access mode of a single memory operation
 */
export type AccessMode = 'R' | 'W';

/**
 * One entry of a memory trace.
 * The offset is carried for reporting only; the page table works on whole pages.
 */
export interface Operation {
  readonly page: number;
  readonly offset: number;
  readonly mode: AccessMode;
  /** Address text as written in the trace, echoed in diagnostics */
  readonly address?: string;
}

/**
 * A table slot holding one resident page
 */
export interface Frame {
  readonly pageId: number;
  /** Modified since the page was loaded; written back on eviction */
  dirty: boolean;
  /** Set on access, cleared by Clock and NRU */
  referenced: boolean;
}

export const isAccessMode = (value: string): value is AccessMode =>
  value === 'R' || value === 'W';

/**
 * A freshly loaded page: clean and referenced
 */
export function createFrame(pageId: number): Frame {
  return { pageId, dirty: false, referenced: true };
}
