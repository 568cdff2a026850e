import Fastify from "fastify";
import { registerAuth, setTokenVerifier, type TokenVerifier } from "./libs/auth.js";
import { loadConfig, type AppConfig } from "./libs/config.js";
import { setErrorHandler } from "./libs/errors.js";
import { registerCodebookModule } from "./modules/codebook/index.js";
import { GeminiDraftProducer, type DraftProducer } from "./modules/pipeline/draft/index.js";
import { registerReviewModule, SessionStore } from "./modules/review/index.js";

export type BuildAppOptions = {
  config?: AppConfig;
  draftProducer?: DraftProducer;
  sessions?: SessionStore;
  tokenVerifier?: TokenVerifier;
};

export async function buildApp(opts: BuildAppOptions = {}) {
  const config = opts.config ?? loadConfig();

  const app = Fastify({
    logger: { level: config.logLevel },
    trustProxy: true,
  });

  setErrorHandler(app);
  if (opts.tokenVerifier) setTokenVerifier(opts.tokenVerifier);
  await registerAuth(app);

  // Health
  app.get("/healthz", async (req) => ({ ok: true, requestId: req.id }));

  await registerCodebookModule(app);
  await registerReviewModule(app, {
    sessions: opts.sessions ?? new SessionStore(),
    draftProducer: opts.draftProducer ?? new GeminiDraftProducer(config.vertex),
  });

  return app;
}
