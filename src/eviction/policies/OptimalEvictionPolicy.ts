import type { Frame, Operation } from '../../Operation';
import { EvictionPolicy } from '../EvictionPolicy';
import LibLogger from '../../logger';

const logger = LibLogger.get('OptimalEvictionPolicy');

/** Next-use distance of a page that is never touched again */
export const NEVER = Number.POSITIVE_INFINITY;

/**
 * For every operation, the index of the next operation on the same page.
 */
export function computeNextUse(operations: readonly Operation[]): number[] {
  const nextUse = new Array<number>(operations.length);
  const lastSeen = new Map<number, number>();

  for (let i = operations.length - 1; i >= 0; i--) {
    const page = operations[i].page;
    nextUse[i] = lastSeen.get(page) ?? NEVER;
    lastSeen.set(page, i);
  }

  return nextUse;
}

/**
 * Belady's optimal eviction policy.
 * Evicts the page whose next use lies farthest in the future. Among pages that
 * are never used again a clean one is preferred, since dropping it costs no
 * write-back.
 */
export class OptimalEvictionPolicy extends EvictionPolicy {
  readonly kind = 'opt' as const;

  private readonly nextUse: number[];
  private readonly frameNextUse: number[] = [];
  private cursor = 0;

  constructor(operations: readonly Operation[]) {
    super();
    this.nextUse = computeNextUse(operations);
  }

  findEvictee(frames: Frame[]): number {
    let victim = 0;
    let farthest = -1;

    for (let i = 0; i < frames.length; i++) {
      const distance = this.frameNextUse[i] ?? NEVER;
      if (distance > farthest) {
        farthest = distance;
        victim = i;
      }
    }

    if (farthest === NEVER) {
      for (let i = 0; i < frames.length; i++) {
        if ((this.frameNextUse[i] ?? NEVER) === NEVER && !frames[i].dirty) {
          return i;
        }
      }
    }

    return victim;
  }

  /**
   * Accesses past the end of the precomputed trace have no known future and
   * count as never used again.
   */
  onOperation(frames: Frame[], frameIndex: number): void {
    if (this.cursor < this.nextUse.length) {
      this.frameNextUse[frameIndex] = this.nextUse[this.cursor];
    } else {
      if (this.cursor === this.nextUse.length) {
        logger.warning('More accesses than the trace the policy was built from', {
          operations: this.nextUse.length,
          frames: frames.length
        });
      }
      this.frameNextUse[frameIndex] = NEVER;
    }
    this.cursor++;
  }

  /** Number of accesses observed so far */
  getCursor(): number {
    return this.cursor;
  }

  getPolicyName(): string {
    return 'Optimal';
  }
}
