import type { FastifyInstance } from "fastify";
import { registerReviewRoutes, type ReviewModuleDeps } from "./routes.js";

export { ReviewSession, SessionStore } from "./service.js";
export type { CommitResult, PendingReview } from "./service.js";
export type { ReviewModuleDeps } from "./routes.js";

export async function registerReviewModule(app: FastifyInstance, deps: ReviewModuleDeps) {
  await registerReviewRoutes(app, deps);
}
