/**
 * Response shapes for the coding-session API.
 */

import type { CodingRecord } from "../pipeline/normalizer/index.js";
import type { QcFinding } from "../pipeline/qc/index.js";
import type { CommitResult, PendingReview, ReviewSession } from "./service.js";

export type PendingReviewDto = {
  record: CodingRecord;
  findings: QcFinding[];
};

export type SessionSummaryResponse = {
  session_id: string;
  created_at: string;
  pending: number;
  dataset_size: number;
};

export type ReviewStateResponse = SessionSummaryResponse & {
  current: PendingReviewDto | null;
};

export type EnqueueResponse = ReviewStateResponse & {
  queued: number;
};

export type CommitResponse = {
  ok: true;
  message: string;
  replayed: boolean;
  accepted: CodingRecord;
  accepted_at: string;
  findings: QcFinding[];
  next: PendingReviewDto | null;
};

export type DraftsBody = {
  rows: unknown[];
  original_text: string;
};

export type DocumentBody = {
  article_text: string;
  codebook: string;
};

export type CommitBody = {
  record: Record<string, unknown>;
  idempotencyKey?: string;
};

function toPendingDto(p: PendingReview | null): PendingReviewDto | null {
  return p ? { record: p.record, findings: p.findings } : null;
}

export function toSessionSummary(session: ReviewSession): SessionSummaryResponse {
  return {
    session_id: session.id,
    created_at: session.createdAt,
    pending: session.pendingCount,
    dataset_size: session.dataset.size,
  };
}

export function toReviewState(session: ReviewSession): ReviewStateResponse {
  return { ...toSessionSummary(session), current: toPendingDto(session.current()) };
}

export function toCommitResponse(result: CommitResult): CommitResponse {
  return {
    ok: true,
    message: result.replayed ? "Already committed (idempotent)" : "Record accepted",
    replayed: result.replayed,
    accepted: { ...result.entry.record },
    accepted_at: result.entry.acceptedAt,
    findings: result.findings,
    next: toPendingDto(result.next),
  };
}
