import type { FastifyInstance } from "fastify";
import { authenticate } from "../../libs/auth.js";
import { normalizeRecord } from "../pipeline/normalizer/index.js";
import { runQc } from "../pipeline/qc/index.js";
import { listFieldDefinitions } from "../pipeline/registry/index.js";

export async function registerCodebookRoutes(app: FastifyInstance) {
  app.get("/codebook/fields", { preHandler: [authenticate] }, async () => ({
    fields: listFieldDefinitions().map((d) => ({
      key: d.key,
      label: d.label,
      kind: d.kind,
      allowed: d.kind === "enum" ? d.allowed : null,
      fallback: d.fallback,
    })),
  }));

  // Stateless dry run: what normalize + QC would make of a record.
  app.post<{ Body: { record: Record<string, unknown> } }>(
    "/codebook/preview",
    {
      preHandler: [authenticate],
      schema: {
        body: {
          type: "object",
          required: ["record"],
          properties: { record: { type: "object" } },
        },
      },
    },
    async (req) => runQc(normalizeRecord(req.body.record)),
  );
}
