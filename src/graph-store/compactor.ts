/**
 * Journal compactor
 *
 * The journal only ever grows: every commit appends the full snapshot of the
 * records it touched. Compaction rewrites it to one line per live record.
 */
import { promises as fs } from 'fs';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';

// Default compaction thresholds
const DEFAULT_COMPACT_THRESHOLD = 500;
const DEFAULT_COMPACT_MB_LIMIT = 20;

// Parse env vars with fallbacks to defaults
export const COMPACT_THRESHOLD = parseInt(process.env.COMPACT_THRESHOLD || `${DEFAULT_COMPACT_THRESHOLD}`, 10);
export const COMPACT_MB_LIMIT = parseInt(process.env.COMPACT_MB_LIMIT || `${DEFAULT_COMPACT_MB_LIMIT}`, 10);

export interface CompactionThresholds {
  /** Commits appended since the last rewrite */
  commits: number;
  megabytes: number;
}

export interface Compactor {
  /**
   * Rewrite the journal through `rewrite` when a threshold is crossed
   * @returns whether compaction ran
   */
  maybeCompact(
    journalPath: string,
    rewrite: () => Promise<void>,
    commitsSinceCompaction: number,
    force?: boolean
  ): Promise<boolean>;

  getFileBytes(journalPath: string): Promise<number>;

  getLastCompactionTimestamp(): string | null;
}

export class DefaultCompactor implements Compactor {
  private lastCompactionTime: Date | null = null;

  constructor(
    private readonly thresholds: CompactionThresholds = {
      commits: COMPACT_THRESHOLD,
      megabytes: COMPACT_MB_LIMIT,
    }
  ) {}

  async maybeCompact(
    journalPath: string,
    rewrite: () => Promise<void>,
    commitsSinceCompaction: number,
    force = false
  ): Promise<boolean> {
    const sizeBytes = await this.getFileBytes(journalPath);
    const needsCompact =
      force ||
      commitsSinceCompaction >= this.thresholds.commits ||
      sizeBytes >= this.thresholds.megabytes * 1024 * 1024;

    if (!needsCompact) {
      return false;
    }

    const timer = metrics.graphCompactionTimeSeconds.startTimer();
    logger.info(
      {
        journalPath,
        commitsSinceCompaction,
        sizeBytes,
        thresholds: this.thresholds,
        force,
      },
      'Starting journal compaction'
    );

    await rewrite();

    timer();
    metrics.graphCompactionsTotal.inc();
    const newSize = await this.getFileBytes(journalPath);
    metrics.journalFileBytes.set(newSize);
    this.lastCompactionTime = new Date();

    logger.info({ journalPath, oldSizeBytes: sizeBytes, newSizeBytes: newSize }, 'Journal compaction completed');
    return true;
  }

  async getFileBytes(journalPath: string): Promise<number> {
    try {
      const stats = await fs.stat(journalPath);
      return stats.size;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        // File doesn't exist yet
        return 0;
      }
      throw err;
    }
  }

  getLastCompactionTimestamp(): string | null {
    return this.lastCompactionTime ? this.lastCompactionTime.toISOString() : null;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
