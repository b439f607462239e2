import { type AccessMode, createFrame, type Frame } from './Operation';
import type { AnyEvictionPolicy } from './eviction/EvictionPolicyFactory';
import { validatePositiveInteger } from './eviction/EvictionPolicyValidation';
import { type PageTableStats, PageTableStatsManager } from './PageTableStats';
import LibLogger from './logger';

const logger = LibLogger.get('PageTable');

export type AccessOutcome =
  | 'hit'
  | 'fault-no-eviction'
  | 'fault-evict-clean'
  | 'fault-evict-dirty';

export interface AccessResult {
  /** Slot that serviced the access */
  frameIndex: number;
  outcome: AccessOutcome;
  /** Page that previously occupied the slot, on eviction only */
  evictedPage?: number;
}

/**
 * Fixed-capacity page table driven by an eviction policy.
 *
 * Slots are filled in order until the table is full and are reassigned in
 * place afterwards, so the frame list never shrinks. The mapping entry of an
 * evicted page is dropped when its slot is reassigned.
 */
export class PageTable {
  private readonly frames: Frame[] = [];
  private readonly mapping = new Map<number, number>();
  private readonly statsManager = new PageTableStatsManager();

  constructor(
    private readonly capacity: number,
    private readonly policy: AnyEvictionPolicy
  ) {
    validatePositiveInteger(capacity, 'frameCount');
    logger.debug('Page table created', { capacity, policy: policy.getPolicyName() });
  }

  /**
   * Slot holding `pageId`, if resident. The stored page id is checked, not
   * just the mapping entry.
   */
  lookup(pageId: number): number | undefined {
    const index = this.mapping.get(pageId);
    if (typeof index === 'number' && this.frames[index]?.pageId === pageId) {
      return index;
    }
    return undefined;
  }

  access(pageId: number, mode: AccessMode): AccessResult {
    this.statsManager.incrementAccesses();

    let result: AccessResult;
    const resident = this.lookup(pageId);
    if (typeof resident === 'number') {
      logger.trace('Hit', { pageId, frameIndex: resident });
      result = { frameIndex: resident, outcome: 'hit' };
    } else {
      this.statsManager.incrementPageFaults();
      result = this.load(pageId);
    }

    if (mode === 'W') {
      this.frames[result.frameIndex].dirty = true;
    }

    this.policy.onOperation(this.frames, result.frameIndex);
    return result;
  }

  private load(pageId: number): AccessResult {
    if (this.frames.length < this.capacity) {
      const frameIndex = this.frames.push(createFrame(pageId)) - 1;
      this.mapping.set(pageId, frameIndex);
      logger.trace('Page fault without eviction', { pageId, frameIndex });
      return { frameIndex, outcome: 'fault-no-eviction' };
    }

    const frameIndex = this.policy.findEvictee(this.frames);
    if (!Number.isInteger(frameIndex) || frameIndex < 0 || frameIndex >= this.frames.length) {
      throw new Error(
        `${this.policy.getPolicyName()} policy chose frame ${frameIndex}, outside 0..${this.frames.length - 1}`
      );
    }

    const victim = this.frames[frameIndex];
    if (victim.dirty) {
      this.statsManager.incrementWriteBacks();
    }

    this.mapping.delete(victim.pageId);
    this.frames[frameIndex] = createFrame(pageId);
    this.mapping.set(pageId, frameIndex);

    logger.trace('Page fault with eviction', {
      pageId,
      frameIndex,
      evictedPage: victim.pageId,
      dirty: victim.dirty
    });

    return {
      frameIndex,
      outcome: victim.dirty ? 'fault-evict-dirty' : 'fault-evict-clean',
      evictedPage: victim.pageId
    };
  }

  /**
   * Copy of the resident frames in slot order
   */
  getFrames(): Frame[] {
    return this.frames.map((frame) => ({ ...frame }));
  }

  getCapacity(): number {
    return this.capacity;
  }

  isFull(): boolean {
    return this.frames.length >= this.capacity;
  }

  getPolicy(): AnyEvictionPolicy {
    return this.policy;
  }

  getStats(): PageTableStats {
    return this.statsManager.getStats();
  }
}
