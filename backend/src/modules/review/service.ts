/**
 * Coding sessions: the review queue between the QC engine and the coded dataset.
 * State is explicit per session; the pipeline functions stay pure.
 */

import { randomUUID } from "node:crypto";
import { AppError } from "../../libs/errors.js";
import { CodedDataset, type DatasetEntry } from "../dataset/index.js";
import { normalizeRecord, normalizeRows, type CodingRecord } from "../pipeline/normalizer/index.js";
import { runQc, type QcFinding } from "../pipeline/qc/index.js";

export type PendingReview = {
  record: CodingRecord;
  findings: QcFinding[];
};

export type CommitResult = {
  entry: DatasetEntry;
  findings: QcFinding[];
  next: PendingReview | null;
  replayed: boolean;
};

function isPlainMapping(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

export class ReviewSession {
  readonly id: string;
  readonly createdAt: string;
  readonly dataset = new CodedDataset();
  private queue: PendingReview[] = [];
  private under: PendingReview | null = null;
  private commits = new Map<string, CommitResult>();

  constructor(id: string = randomUUID(), createdAt: Date = new Date()) {
    this.id = id;
    this.createdAt = createdAt.toISOString();
  }

  /**
   * Normalize + QC one producer batch and queue it for review.
   * Returns the number of rows queued (0 for an empty batch).
   */
  enqueueDrafts(rawRows: readonly unknown[], originalText: string): number {
    const prepared = normalizeRows(rawRows, originalText).map((r) => runQc(r));
    this.queue.push(...prepared);
    if (!this.under) this.advance();
    return prepared.length;
  }

  current(): PendingReview | null {
    return this.under;
  }

  /** Rows waiting behind the one under review. */
  get pendingCount(): number {
    return this.queue.length;
  }

  /**
   * Accept the record under review, with the reviewer's edits applied over it.
   * Edits are untrusted too: the merged record is normalized and QC'd again before it is stored.
   * The source text always comes from the record under review.
   */
  commit(edited: unknown, acceptedBy: string, idempotencyKey?: string): CommitResult {
    if (idempotencyKey) {
      const prior = this.commits.get(idempotencyKey);
      if (prior) return { ...prior, replayed: true };
    }
    const under = this.under;
    if (!under) {
      throw new AppError({ statusCode: 409, code: "NOTHING_TO_REVIEW", message: "No record is pending review" });
    }

    const merged = normalizeRecord({
      ...under.record,
      ...(isPlainMapping(edited) ? edited : {}),
      original_text: under.record.original_text,
    });
    const { record, findings } = runQc(merged);
    const entry = this.dataset.append(record, acceptedBy);
    const next = this.advance();

    const result: CommitResult = { entry, findings, next, replayed: false };
    if (idempotencyKey) this.commits.set(idempotencyKey, result);
    return result;
  }

  /** Drop the record under review without storing it. Returns the next one, if any. */
  discard(): PendingReview | null {
    if (!this.under) {
      throw new AppError({ statusCode: 409, code: "NOTHING_TO_REVIEW", message: "No record is pending review" });
    }
    return this.advance();
  }

  /** Clear the dataset, the queue and the record under review. */
  reset(): void {
    this.dataset.clear();
    this.queue = [];
    this.under = null;
    this.commits.clear();
  }

  private advance(): PendingReview | null {
    this.under = this.queue.shift() ?? null;
    return this.under;
  }
}

export class SessionStore {
  private sessions = new Map<string, ReviewSession>();

  create(): ReviewSession {
    const session = new ReviewSession();
    this.sessions.set(session.id, session);
    return session;
  }

  getOrThrow(id: string): ReviewSession {
    const session = this.sessions.get(id);
    if (!session) throw new AppError({ statusCode: 404, code: "NOT_FOUND", message: "Coding session not found" });
    return session;
  }

  get size(): number {
    return this.sessions.size;
  }
}
