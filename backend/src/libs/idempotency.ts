import type { FastifyRequest } from "fastify";
import { AppError } from "./errors.js";

/**
 * Commits must carry an idempotency key so a retried request never appends a record twice.
 * Keys are remembered per coding session (see ReviewSession), for the session's lifetime.
 */

function headerValue(v: string | string[] | undefined): string | undefined {
  return Array.isArray(v) ? v[0] : v;
}

export function getIdempotencyKey(req: FastifyRequest): string | undefined {
  const headerKey = headerValue(req.headers["idempotency-key"]) ?? headerValue(req.headers["x-idempotency-key"]);
  const body = req.body;
  const bodyKey =
    typeof body === "object" && body !== null && "idempotencyKey" in body && typeof body.idempotencyKey === "string"
      ? body.idempotencyKey
      : undefined;
  return headerKey ?? bodyKey;
}

export async function requireIdempotencyKey(req: FastifyRequest) {
  const key = getIdempotencyKey(req);
  if (!key) {
    throw new AppError({
      statusCode: 400,
      code: "IDEMPOTENCY_REQUIRED",
      message: "Idempotency key required (Idempotency-Key header or body.idempotencyKey)",
    });
  }
  req.idempotencyKey = key;
}

declare module "fastify" {
  interface FastifyRequest {
    idempotencyKey?: string;
  }
}
