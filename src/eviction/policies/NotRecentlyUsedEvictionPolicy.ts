import type { Frame } from '../../Operation';
import { EvictionPolicy } from '../EvictionPolicy';
import LibLogger from '../../logger';

const logger = LibLogger.get('NotRecentlyUsedEvictionPolicy');

/**
 * NRU class of a frame, 0 (unreferenced, clean) to 3 (referenced, dirty)
 */
export const nruClass = (frame: Frame): number =>
  (frame.referenced ? 2 : 0) + (frame.dirty ? 1 : 0);

/**
 * Not-recently-used eviction policy.
 * Evicts from the lowest non-empty class; referenced bits are cleared on every
 * frame once per `refreshRate` accesses.
 */
export class NotRecentlyUsedEvictionPolicy extends EvictionPolicy {
  readonly kind = 'nru' as const;

  private counter = 0;

  constructor(private readonly refreshRate: number) {
    super();
  }

  findEvictee(frames: Frame[]): number {
    let victim = 0;
    let lowest = Number.POSITIVE_INFINITY;

    for (let i = 0; i < frames.length; i++) {
      const rank = nruClass(frames[i]);
      if (rank < lowest) {
        lowest = rank;
        victim = i;
        if (rank === 0) {
          break;
        }
      }
    }

    return victim;
  }

  onOperation(frames: Frame[], frameIndex: number): void {
    this.counter++;
    if (this.counter >= this.refreshRate) {
      logger.trace('Clearing referenced bits', { refreshRate: this.refreshRate, frames: frames.length });
      for (const frame of frames) {
        frame.referenced = false;
      }
      this.counter = 0;
    }
    frames[frameIndex].referenced = true;
  }

  getPolicyName(): string {
    return 'NRU';
  }
}
