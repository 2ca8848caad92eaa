/**
 * Error taxonomy shared by the ingestion, storage and query layers
 */
import type { ValidationError } from './schema-validator';
import type { QueryResult } from '../types/query';

/**
 * Raised by the normalizer when a raw notice cannot become an EventCandidate.
 * The notice is rejected; ingestion of other notices continues.
 */
export class MalformedNoticeError extends Error {
  public readonly source: string;
  public readonly noticeRef: string;
  public readonly issues: ValidationError[];

  constructor(message: string, details: { source: string; noticeRef: string; issues?: ValidationError[] }) {
    super(message);
    this.name = 'MalformedNoticeError';
    this.source = details.source;
    this.noticeRef = details.noticeRef;
    this.issues = details.issues ?? [];
  }
}

/**
 * A well-formed notice that is not about a real astrophysical event, such
 * as a system test or a simulated trigger. Rejected like a malformed one.
 */
export class NonEventNoticeError extends MalformedNoticeError {
  constructor(details: { source: string; noticeRef: string; intent: string }) {
    super(`Non-event ${details.source} notice: /body reads as ${details.intent}`, {
      source: details.source,
      noticeRef: details.noticeRef,
      issues: [{ path: '/body', message: `reads as ${details.intent}` }],
    });
    this.name = 'NonEventNoticeError';
  }
}

/**
 * The storage layer could not persist or read a change. Retryable.
 */
export class StorageUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageUnavailableError';
  }
}

/**
 * A write was built against a node revision that is no longer current.
 */
export class RevisionConflictError extends Error {
  constructor(
    public readonly nodeId: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Node ${nodeId} is at revision ${actual}, write expected ${expected}`);
    this.name = 'RevisionConflictError';
  }
}

/**
 * A change set would break a structural rule of the graph: a candidate
 * stored twice, or a redirect that is circular or chained.
 */
export class GraphIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphIntegrityError';
  }
}

export class UnknownNodeError extends Error {
  constructor(public readonly nodeId: string) {
    super(`Unknown transient node: ${nodeId}`);
    this.name = 'UnknownNodeError';
  }
}

export class UnknownCaseError extends Error {
  constructor(public readonly caseId: string) {
    super(`Unknown ambiguous case: ${caseId}`);
    this.name = 'UnknownCaseError';
  }
}

/**
 * Raised when a case is asked to resolve in a way its state does not allow.
 */
export class CaseStateError extends Error {
  constructor(public readonly caseId: string, message: string) {
    super(message);
    this.name = 'CaseStateError';
  }
}

/**
 * A query hit its depth or result limit before finishing. The partial
 * result travels with the error and is flagged as truncated.
 */
export class QueryLimitExceededError extends Error {
  constructor(
    public readonly limit: 'depth' | 'results',
    public readonly partial: QueryResult
  ) {
    super(`Query stopped at its ${limit} limit; ${partial.nodes.length} nodes returned`);
    this.name = 'QueryLimitExceededError';
  }
}

export function isStorageUnavailable(error: unknown): error is StorageUnavailableError {
  return error instanceof StorageUnavailableError;
}
