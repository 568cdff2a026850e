import { z } from "zod";
import type { VertexConfig } from "../../../libs/config.js";
import { AppError } from "../../../libs/errors.js";
import { buildDraftResponseSchema } from "../registry/index.js";
import { getSystemPrompt, getUserPrompt } from "./prompt.js";
import { generateJson, googleAccessToken, type AccessTokenSource } from "./vertexGemini.js";

export type DraftRequest = {
  articleText: string;
  codebook: string;
};

/**
 * External collaborator yielding zero or more raw candidate rows per source document.
 * Rows are untrusted: schema-like at best.
 */
export interface DraftProducer {
  produce(request: DraftRequest): Promise<unknown[]>;
}

const draftEnvelopeSchema = z.object({ rows: z.array(z.unknown()) });

/** Parses the producer's JSON text into its raw rows; the envelope must be `{ rows: [...] }`. */
export function parseDraftResponse(text: string): unknown[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new AppError({
      statusCode: 502,
      code: "DRAFT_MALFORMED",
      message: "Draft producer returned non-JSON output",
      details: { preview: text.slice(0, 200) },
    });
  }
  const parsed = draftEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    throw new AppError({
      statusCode: 502,
      code: "DRAFT_MALFORMED",
      message: "Draft producer output must be an object with a 'rows' list",
      details: { issues: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`) },
    });
  }
  return parsed.data.rows;
}

export class GeminiDraftProducer implements DraftProducer {
  constructor(
    private readonly config: VertexConfig,
    private readonly getAccessToken: AccessTokenSource = googleAccessToken,
  ) {}

  async produce(request: DraftRequest): Promise<unknown[]> {
    let text: string;
    try {
      text = await generateJson(
        this.config,
        getSystemPrompt(),
        getUserPrompt(request.articleText, request.codebook),
        { responseSchema: buildDraftResponseSchema() },
        this.getAccessToken,
      );
    } catch (err) {
      throw new AppError({
        statusCode: 502,
        code: "DRAFT_PRODUCER_FAILED",
        message: `Draft producer failed: ${err instanceof Error ? err.message : String(err)}`,
      });
    }
    return parseDraftResponse(text);
  }
}
