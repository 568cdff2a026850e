/**
 * Coding-session API: queue drafts, review one record at a time, export the coded dataset.
 * Reviewer/admin only for commit, discard and clear.
 */

import type { FastifyInstance } from "fastify";
import { authenticate, requireAuth, requireRole } from "../../libs/auth.js";
import { AppError } from "../../libs/errors.js";
import { requireIdempotencyKey } from "../../libs/idempotency.js";
import { isPlaceholderCodebook, type DraftProducer } from "../pipeline/draft/index.js";
import type { SessionStore } from "./service.js";
import {
  toCommitResponse,
  toReviewState,
  toSessionSummary,
  type CommitBody,
  type DocumentBody,
  type DraftsBody,
} from "./dto.js";

export type ReviewModuleDeps = {
  sessions: SessionStore;
  draftProducer: DraftProducer;
};

const idParams = {
  type: "object",
  required: ["id"],
  properties: { id: { type: "string" } },
} as const;

export async function registerReviewRoutes(app: FastifyInstance, deps: ReviewModuleDeps) {
  const { sessions, draftProducer } = deps;
  const reviewerOrAdmin = requireRole(["reviewer", "admin"]);

  app.post("/sessions", { preHandler: [authenticate] }, async (req, reply) => {
    const session = sessions.create();
    req.log.info({ sessionId: session.id, uid: requireAuth(req).uid }, "Coding session created");
    return reply.code(201).send(toSessionSummary(session));
  });

  app.post<{ Params: { id: string }; Body: DocumentBody }>(
    "/sessions/:id/documents",
    {
      preHandler: [authenticate],
      schema: {
        params: idParams,
        body: {
          type: "object",
          required: ["article_text", "codebook"],
          properties: {
            article_text: { type: "string", minLength: 1 },
            codebook: { type: "string", minLength: 1 },
          },
        },
      },
    },
    async (req) => {
      const session = sessions.getOrThrow(req.params.id);
      const { article_text, codebook } = req.body;
      if (isPlaceholderCodebook(codebook)) {
        throw new AppError({ statusCode: 400, code: "VALIDATION_ERROR", message: "Paste the codebook before drafting" });
      }
      const rows = await draftProducer.produce({ articleText: article_text, codebook });
      const queued = session.enqueueDrafts(rows, article_text);
      req.log.info({ sessionId: session.id, queued }, "Draft rows queued for review");
      return { queued, ...toReviewState(session) };
    },
  );

  app.post<{ Params: { id: string }; Body: DraftsBody }>(
    "/sessions/:id/drafts",
    {
      preHandler: [authenticate],
      schema: {
        params: idParams,
        body: {
          type: "object",
          required: ["rows", "original_text"],
          properties: {
            rows: { type: "array" },
            original_text: { type: "string" },
          },
        },
      },
    },
    async (req) => {
      const session = sessions.getOrThrow(req.params.id);
      const queued = session.enqueueDrafts(req.body.rows, req.body.original_text);
      req.log.info({ sessionId: session.id, queued }, "External draft rows queued for review");
      return { queued, ...toReviewState(session) };
    },
  );

  app.get<{ Params: { id: string } }>(
    "/sessions/:id/review",
    { preHandler: [authenticate], schema: { params: idParams } },
    async (req) => toReviewState(sessions.getOrThrow(req.params.id)),
  );

  app.post<{ Params: { id: string }; Body: CommitBody }>(
    "/sessions/:id/review/commit",
    {
      preHandler: [authenticate, reviewerOrAdmin, requireIdempotencyKey],
      schema: {
        params: idParams,
        body: {
          type: "object",
          required: ["record"],
          properties: {
            record: { type: "object" },
            idempotencyKey: { type: "string" },
          },
        },
      },
    },
    async (req) => {
      const session = sessions.getOrThrow(req.params.id);
      const { uid } = requireAuth(req);
      const result = session.commit(req.body.record, uid, req.idempotencyKey);
      req.log.info(
        {
          sessionId: session.id,
          replayed: result.replayed,
          findings: result.findings.map((f) => f.rule),
          dataset_size: session.dataset.size,
        },
        "Coding record committed",
      );
      return toCommitResponse(result);
    },
  );

  app.post<{ Params: { id: string } }>(
    "/sessions/:id/review/discard",
    { preHandler: [authenticate, reviewerOrAdmin], schema: { params: idParams } },
    async (req) => {
      const session = sessions.getOrThrow(req.params.id);
      session.discard();
      req.log.info({ sessionId: session.id, uid: requireAuth(req).uid }, "Coding record discarded");
      return toReviewState(session);
    },
  );

  app.get<{ Params: { id: string }; Querystring: { format?: "json" | "csv" } }>(
    "/sessions/:id/dataset",
    {
      preHandler: [authenticate],
      schema: {
        params: idParams,
        querystring: {
          type: "object",
          properties: { format: { type: "string", enum: ["json", "csv"] } },
        },
      },
    },
    async (req, reply) => {
      const session = sessions.getOrThrow(req.params.id);
      if (req.query.format === "csv") {
        return reply
          .type("text/csv; charset=utf-8")
          .header("content-disposition", 'attachment; filename="coded_data.csv"')
          .send(session.dataset.toCsv());
      }
      return session.dataset.toJsonRecords();
    },
  );

  app.delete<{ Params: { id: string } }>(
    "/sessions/:id/dataset",
    { preHandler: [authenticate, reviewerOrAdmin], schema: { params: idParams } },
    async (req) => {
      const session = sessions.getOrThrow(req.params.id);
      session.reset();
      req.log.info({ sessionId: session.id, uid: requireAuth(req).uid }, "Coding session cleared");
      return toReviewState(session);
    },
  );
}
