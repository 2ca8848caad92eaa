/**
 * Messages the service publishes on the broker
 */
import type { ProcessOutcome } from './outcome';

/**
 * Published on `topics.out.noticeProcessed` once per received notice
 */
export interface NoticeProcessed {
  event_id: string;
  /** `ref` of the notice envelope, when it carried one */
  correlation_id?: string;
  outcome: ProcessOutcome;
  version: string;
  timestamp: string;
}

export type GraphEventType =
  | 'node-created'
  | 'candidate-attached'
  | 'case-opened'
  | 'case-resolved'
  | 'nodes-merged'
  | 'node-corroborated';

/**
 * Published on `topics.out.graphUpdated` for every change to the graph
 */
export interface GraphUpdated {
  event_id: string;
  type: GraphEventType;
  nodeId?: string;
  candidateId?: string;
  caseId?: string;
  supersededId?: string;
  timestamp: string;
}
