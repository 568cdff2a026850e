import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../src/app.js";
import type { TokenVerifier } from "../src/libs/auth.js";
import { loadConfig } from "../src/libs/config.js";
import { AppError } from "../src/libs/errors.js";
import type { DraftProducer, DraftRequest } from "../src/modules/pipeline/draft/index.js";

const ARTICLE = "Tourism village study. Homestays are co-managed with the district office (p. 4).";

const verifier: TokenVerifier = async (token) => {
  if (token === "reviewer-token") return { uid: "rev-1", claims: { role: "reviewer" } };
  if (token === "coder-token") return { uid: "coder-1", claims: { role: "coder" } };
  if (token === "service-token") return { uid: "svc-1", claims: { role: "system" } };
  throw new Error("bad token");
};

class FakeProducer implements DraftProducer {
  requests: DraftRequest[] = [];
  rows: unknown[] = [
    { axis_A: "A2 Co-managed", axis_A_anchor: "p. 4", equity_level: "2", equity_evidence: "" },
    { scope_decision: "Exclude", axis_B: "B2 Nature-led" },
  ];
  failWith: Error | null = null;

  async produce(request: DraftRequest): Promise<unknown[]> {
    this.requests.push(request);
    if (this.failWith) throw this.failWith;
    return this.rows;
  }
}

const reviewer = { authorization: "Bearer reviewer-token" };
const coder = { authorization: "Bearer coder-token" };

let app: FastifyInstance;
let producer: FakeProducer;

beforeEach(async () => {
  producer = new FakeProducer();
  app = await buildApp({
    config: loadConfig({ NODE_ENV: "test", LOG_LEVEL: "silent" }),
    draftProducer: producer,
    tokenVerifier: verifier,
  });
});

afterEach(async () => {
  await app.close();
});

async function createSession(): Promise<string> {
  const res = await app.inject({ method: "POST", url: "/sessions", headers: coder });
  expect(res.statusCode).toBe(201);
  return res.json().session_id;
}

describe("auth", () => {
  it("serves health without a token", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });
    expect(res.statusCode).toBe(200);
    expect(res.json().ok).toBe(true);
  });

  it("rejects missing and invalid tokens", async () => {
    const missing = await app.inject({ method: "POST", url: "/sessions" });
    expect(missing.statusCode).toBe(401);
    expect(missing.json().error.code).toBe("UNAUTHORIZED");

    const invalid = await app.inject({ method: "POST", url: "/sessions", headers: { authorization: "Bearer nope" } });
    expect(invalid.statusCode).toBe(401);
    expect(invalid.json().error.message).toBe("Invalid or expired token");
  });

  it("treats an unrecognized role claim as a coder", async () => {
    const id = await createSession();
    const res = await app.inject({
      method: "POST",
      url: `/sessions/${id}/review/discard`,
      headers: { authorization: "Bearer service-token" },
    });
    expect(res.statusCode).toBe(403);
    expect(res.json().error.code).toBe("FORBIDDEN");
  });
});

describe("codebook routes", () => {
  it("lists the registry", async () => {
    const res = await app.inject({ method: "GET", url: "/codebook/fields", headers: coder });
    const { fields } = res.json();
    expect(fields).toHaveLength(30);
    expect(fields[2]).toEqual({
      key: "scope_decision",
      label: "Scope decision",
      kind: "enum",
      allowed: ["Include", "Exclude"],
      fallback: "Include",
    });
  });

  it("previews normalize + QC without storing anything", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/codebook/preview",
      headers: coder,
      payload: { record: { typology_proposed: "Yes", typology_details: "yes", scope_decision: "Include" } },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.record.typology_proposed).toBe("Partial");
    expect(body.findings).toHaveLength(1);
    expect(body.findings[0].rule).toBe("TYPOLOGY_CONFIDENCE");
  });
});

describe("coding session flow", () => {
  it("drafts, reviews, commits and exports", async () => {
    const id = await createSession();

    const drafted = await app.inject({
      method: "POST",
      url: `/sessions/${id}/documents`,
      headers: coder,
      payload: { article_text: ARTICLE, codebook: "Codebook v1.1" },
    });
    expect(drafted.statusCode).toBe(200);
    expect(producer.requests).toEqual([{ articleText: ARTICLE, codebook: "Codebook v1.1" }]);
    const state = drafted.json();
    expect(state.queued).toBe(2);
    expect(state.pending).toBe(1);
    expect(state.current.record.equity_level).toBe("NA");
    expect(state.current.record.original_text).toBe(ARTICLE);
    expect(state.current.findings.map((f: { rule: string }) => f.rule)).toEqual(["EVIDENCE_GATING"]);

    const noKey = await app.inject({
      method: "POST",
      url: `/sessions/${id}/review/commit`,
      headers: reviewer,
      payload: { record: {} },
    });
    expect(noKey.statusCode).toBe(400);
    expect(noKey.json().error.code).toBe("IDEMPOTENCY_REQUIRED");

    const asCoder = await app.inject({
      method: "POST",
      url: `/sessions/${id}/review/commit`,
      headers: { ...coder, "idempotency-key": "c-1" },
      payload: { record: {} },
    });
    expect(asCoder.statusCode).toBe(403);

    const committed = await app.inject({
      method: "POST",
      url: `/sessions/${id}/review/commit`,
      headers: { ...reviewer, "idempotency-key": "c-1" },
      payload: { record: { key_findings: "Co-management shifts benefits to the district." } },
    });
    expect(committed.statusCode).toBe(200);
    const commit = committed.json();
    expect(commit.replayed).toBe(false);
    expect(commit.accepted.axis_A).toBe("A2 Co-managed");
    expect(commit.accepted.key_findings).toBe("Co-management shifts benefits to the district.");
    expect(commit.next.record.scope_decision).toBe("Exclude");
    expect(commit.next.record.axis_B).toBe("NA");

    const replay = await app.inject({
      method: "POST",
      url: `/sessions/${id}/review/commit`,
      headers: reviewer,
      payload: { record: {}, idempotencyKey: "c-1" },
    });
    expect(replay.json().replayed).toBe(true);

    const discarded = await app.inject({ method: "POST", url: `/sessions/${id}/review/discard`, headers: reviewer });
    expect(discarded.json().current).toBeNull();
    expect(discarded.json().dataset_size).toBe(1);

    const json = await app.inject({ method: "GET", url: `/sessions/${id}/dataset`, headers: coder });
    const rows = json.json();
    expect(rows).toHaveLength(1);
    expect(rows[0].original_text).toBe(ARTICLE);

    const csv = await app.inject({ method: "GET", url: `/sessions/${id}/dataset?format=csv`, headers: coder });
    expect(csv.headers["content-type"]).toBe("text/csv; charset=utf-8");
    expect(csv.body.split("\n")[0].startsWith('"inclusion_signals","exclusion_signals","scope_decision"')).toBe(true);

    const cleared = await app.inject({ method: "DELETE", url: `/sessions/${id}/dataset`, headers: reviewer });
    expect(cleared.json().dataset_size).toBe(0);
  });

  it("queues rows from an external producer", async () => {
    const id = await createSession();
    const res = await app.inject({
      method: "POST",
      url: `/sessions/${id}/drafts`,
      headers: coder,
      payload: { rows: [{ inferred: "Yes" }, "garbage"], original_text: "Short text" },
    });
    const body = res.json();
    expect(body.queued).toBe(2);
    expect(body.current.record.inferred).toBe("Yes");
    expect(body.current.record.original_text).toBe("Short text");
  });

  it("reports nothing to review", async () => {
    const id = await createSession();
    const res = await app.inject({
      method: "POST",
      url: `/sessions/${id}/review/commit`,
      headers: { ...reviewer, "idempotency-key": "c-9" },
      payload: { record: {} },
    });
    expect(res.statusCode).toBe(409);
    expect(res.json().error.code).toBe("NOTHING_TO_REVIEW");
  });

  it("returns 404 for unknown sessions", async () => {
    const res = await app.inject({ method: "GET", url: "/sessions/missing/review", headers: coder });
    expect(res.statusCode).toBe(404);
    expect(res.json().error.code).toBe("NOT_FOUND");
  });

  it("validates request bodies", async () => {
    const id = await createSession();
    const res = await app.inject({
      method: "POST",
      url: `/sessions/${id}/documents`,
      headers: coder,
      payload: { article_text: ARTICLE },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe("VALIDATION_ERROR");
  });

  it("refuses to draft against the placeholder codebook", async () => {
    const id = await createSession();
    const res = await app.inject({
      method: "POST",
      url: `/sessions/${id}/documents`,
      headers: coder,
      payload: { article_text: ARTICLE, codebook: "Paste codebook here..." },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Paste the codebook before drafting",
    });
    expect(producer.requests).toEqual([]);
  });

  it("surfaces producer failures", async () => {
    producer.failWith = new AppError({ statusCode: 502, code: "DRAFT_MALFORMED", message: "bad output" });
    const id = await createSession();
    const res = await app.inject({
      method: "POST",
      url: `/sessions/${id}/documents`,
      headers: coder,
      payload: { article_text: ARTICLE, codebook: "Codebook v1.1" },
    });
    expect(res.statusCode).toBe(502);
    expect(res.json().error.code).toBe("DRAFT_MALFORMED");
  });
});
