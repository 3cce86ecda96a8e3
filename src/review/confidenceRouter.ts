// src/review/confidenceRouter.ts
// Review: partition merged records into auto-accepted and flagged-for-review.

import type { PipelineConfig } from '../config';
import type { MergedRecord, ReviewStatus } from '../merge/types';
import { recordRoutingDecision } from '../observability/metrics';
import { assertTransition } from './stateMachine';

export interface RoutingResult {
  records: MergedRecord[];
  accepted: MergedRecord[];
  flagged: MergedRecord[];
}

export class ConfidenceRouter {
  constructor(private readonly config: Pick<PipelineConfig, 'highConfidenceThreshold'>) {}

  /**
   * Status a record should have. Pending records are decided by the
   * threshold; records that already left pending keep their status.
   */
  route(record: MergedRecord): ReviewStatus {
    if (record.reviewStatus !== 'pending') return record.reviewStatus;
    return record.confidence >= this.config.highConfidenceThreshold ? 'accepted' : 'flagged_for_review';
  }

  /** Record with its routed status applied */
  apply(record: MergedRecord): MergedRecord {
    const status = this.route(record);
    if (status === record.reviewStatus) return record;
    assertTransition(record.reviewStatus, status);
    recordRoutingDecision(status);
    return { ...record, reviewStatus: status };
  }

  routeAll(records: readonly MergedRecord[]): RoutingResult {
    const routed = records.map((r) => this.apply(r));
    return {
      records: routed,
      accepted: routed.filter((r) => r.reviewStatus === 'accepted'),
      flagged: routed.filter((r) => r.reviewStatus === 'flagged_for_review'),
    };
  }
}
