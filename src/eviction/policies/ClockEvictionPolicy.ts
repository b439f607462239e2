import type { Frame } from '../../Operation';
import { EvictionPolicy } from '../EvictionPolicy';
import LibLogger from '../../logger';

const logger = LibLogger.get('ClockEvictionPolicy');

/**
 * Clock (second chance) eviction policy.
 * A hand sweeps the slots in order; a referenced frame loses its bit and is
 * skipped, the first unreferenced frame is evicted.
 */
export class ClockEvictionPolicy extends EvictionPolicy {
  readonly kind = 'clock' as const;

  private pointer = 0;

  constructor(private readonly capacity: number) {
    super();
  }

  findEvictee(frames: Frame[]): number {
    // every bit can be cleared once, so two laps always find a victim
    for (let visited = 0; visited < 2 * frames.length; visited++) {
      const index = this.pointer;
      this.pointer = (this.pointer + 1) % this.capacity;

      if (!frames[index].referenced) {
        logger.trace('Clock hand selected victim', { index, visited, pointer: this.pointer });
        return index;
      }
      frames[index].referenced = false;
    }

    throw new Error(`Clock sweep found no victim among ${frames.length} frames`);
  }

  onOperation(frames: Frame[], frameIndex: number): void {
    frames[frameIndex].referenced = true;
  }

  /** Slot the hand will inspect first on the next eviction */
  getPointer(): number {
    return this.pointer;
  }

  getPolicyName(): string {
    return 'Clock';
  }
}
