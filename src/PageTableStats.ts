import LibLogger from './logger';

const logger = LibLogger.get('PageTableStats');

/**
 * Page table counters. All three only ever grow.
 */
export interface PageTableStats {
  /** Total number of memory accesses */
  accesses: number;
  /** Accesses to a page that was not resident */
  pageFaults: number;
  /** Evictions of a dirty frame */
  writeBacks: number;
}

/**
 * Tracks page table counters and logs them periodically
 */
export class PageTableStatsManager {
  private stats: PageTableStats = {
    accesses: 0,
    pageFaults: 0,
    writeBacks: 0
  };

  private lastLoggedAccesses = 0;
  private readonly LOG_THRESHOLD = 1000; // Log every 1000 accesses

  incrementAccesses(): void {
    this.stats.accesses++;
    this.maybeLogStats();
  }

  incrementPageFaults(): void {
    this.stats.pageFaults++;
  }

  incrementWriteBacks(): void {
    this.stats.writeBacks++;
  }

  private maybeLogStats(): void {
    const accessesSinceLastLog = this.stats.accesses - this.lastLoggedAccesses;

    if (accessesSinceLastLog >= this.LOG_THRESHOLD) {
      logger.debug('Page table statistics update', {
        accesses: this.stats.accesses,
        pageFaults: this.stats.pageFaults,
        writeBacks: this.stats.writeBacks,
        faultRate: `${formatRate(this.stats.pageFaults, this.stats.accesses)}%`
      });

      this.lastLoggedAccesses = this.stats.accesses;
    }
  }

  /**
   * Get a copy of the current statistics
   */
  getStats(): PageTableStats {
    return { ...this.stats };
  }
}

/**
 * Percentage with two decimals, "0.00" when nothing was counted
 */
export function formatRate(part: number, total: number): string {
  return total > 0 ? ((part / total) * 100).toFixed(2) : '0.00';
}
