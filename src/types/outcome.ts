/**
 * What became of one notice. Every outcome names the notice it is about.
 */
import type { ValidationError } from '../utils/schema-validator';

export type ProcessOutcome =
  | { status: 'created'; candidateId: string; nodeId: string }
  | { status: 'merged'; candidateId: string; nodeId: string; score: number }
  | { status: 'ambiguous'; candidateId: string; caseId: string; competingNodeIds: string[] }
  | { status: 'duplicate'; candidateId: string; nodeId?: string; caseId?: string }
  | { status: 'rejected'; noticeRef: string; source: string; reason: string; issues: ValidationError[] };

export type OutcomeStatus = ProcessOutcome['status'];

export interface RejectionRecord {
  noticeRef: string;
  source: string;
  reason: string;
  issues: ValidationError[];
  rejectedAt: string;
}
