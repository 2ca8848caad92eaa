/**
 * Ingestion pipeline - normalizes raw notices and feeds the transient graph
 * through one serial queue per partition.
 *
 * Within a partition candidates are processed strictly in arrival order;
 * partitions run concurrently. Malformed notices become `rejected` outcomes
 * and never reach a queue. A failure inside a queue rejects only the promise
 * of the notice that caused it.
 */
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import { MalformedNoticeError } from '../utils/errors';
import { withRetry } from '../utils/retry';
import { partitionFor } from '../config/resolution';
import type { ResolutionConfig } from '../config/resolution';
import Config from '../config';
import type { NoticeNormalizer } from '../normalizer';
import type { TransientGraph } from './transient-graph';
import type { EventCandidate } from '../types/candidate';
import type { RawNotice } from '../types/notice';
import type { ProcessOutcome, RejectionRecord } from '../types/outcome';

export interface IngestionPipelineDeps {
  graph: TransientGraph;
  normalizer: NoticeNormalizer;
  config: ResolutionConfig;
  retry?: { attempts: number; baseDelayMs: number };
  /** Rejections kept for inspection; older ones are dropped first */
  maxRejections?: number;
}

export class IngestionPipeline {
  // partition -> tail of its queue
  private queues: Map<string, Promise<void>> = new Map();
  private rejections: RejectionRecord[] = [];
  private readonly retry: { attempts: number; baseDelayMs: number };
  private readonly maxRejections: number;

  constructor(private readonly deps: IngestionPipelineDeps) {
    this.retry = deps.retry ?? {
      attempts: Config.storage.retryAttempts,
      baseDelayMs: Config.storage.retryDelayMs,
    };
    this.maxRejections = deps.maxRejections ?? Config.ingestion.maxRejections;
  }

  /**
   * Normalize a notice and queue it on its partition
   * @returns the outcome once the candidate has been applied
   */
  async submit(raw: RawNotice): Promise<ProcessOutcome> {
    const endTimer = metrics.processingTime.startTimer();

    let candidate: EventCandidate;
    try {
      candidate = this.deps.normalizer.normalize(raw);
    } catch (err) {
      if (err instanceof MalformedNoticeError) {
        endTimer();
        return this.reject(err);
      }
      throw err;
    }

    const partition = partitionFor(this.deps.config, candidate.instrument);
    try {
      const outcome = await this.enqueue(partition, () => this.processWithRetry(candidate));
      metrics.noticesProcessed.inc({ status: outcome.status });
      return outcome;
    } catch (err) {
      metrics.noticesProcessed.inc({ status: 'failed' });
      logger.error({ error: err, candidateId: candidate.candidateId, partition }, 'Failed to process candidate');
      throw err;
    } finally {
      endTimer();
    }
  }

  /**
   * Resolves once everything queued so far has settled
   */
  async drain(): Promise<void> {
    await Promise.all([...this.queues.values()]);
  }

  get rejectionLog(): readonly RejectionRecord[] {
    return this.rejections;
  }

  get activePartitions(): string[] {
    return [...this.queues.keys()];
  }

  private enqueue<T>(partition: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(partition) ?? Promise.resolve();
    const run = previous.then(task);

    // The queue advances whether or not this task failed; the failure
    // itself reaches the submitter through `run`
    const settle = (): void => {
      if (this.queues.get(partition) === tail) {
        this.queues.delete(partition);
      }
    };
    const tail: Promise<void> = run.then(settle, settle);
    this.queues.set(partition, tail);

    return run;
  }

  private processWithRetry(candidate: EventCandidate): Promise<ProcessOutcome> {
    return withRetry(() => this.deps.graph.process(candidate), {
      ...this.retry,
      context: { candidateId: candidate.candidateId },
    });
  }

  private reject(err: MalformedNoticeError): ProcessOutcome {
    const record: RejectionRecord = {
      noticeRef: err.noticeRef,
      source: err.source,
      reason: err.message,
      issues: err.issues,
      rejectedAt: new Date().toISOString(),
    };

    this.rejections.push(record);
    if (this.rejections.length > this.maxRejections) {
      this.rejections.splice(0, this.rejections.length - this.maxRejections);
    }

    metrics.noticesProcessed.inc({ status: 'rejected' });
    logger.warn(
      { noticeRef: record.noticeRef, source: record.source, error: err.name, issues: record.issues },
      'Rejected notice'
    );

    return { status: 'rejected', noticeRef: record.noticeRef, source: record.source, reason: record.reason, issues: record.issues };
  }
}
