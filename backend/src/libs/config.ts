/**
 * Runtime configuration. Secrets are never hard-coded; everything comes from process.env
 * (server.ts loads .env.local/.env into process.env before this runs).
 */

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type VertexConfig = {
  /** GCP project hosting Vertex AI; drafting is unavailable without it. */
  projectId?: string;
  location: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
};

export type AppConfig = {
  nodeEnv: "development" | "production" | "test";
  port: number;
  host: string;
  logLevel: LogLevel;
  firebaseProjectId?: string;
  vertex: VertexConfig;
};

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export const DEFAULT_VERTEX_LOCATION = "us-central1";
export const DEFAULT_MODEL = "gemini-1.5-pro";

function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = Number(value);
  return Number.isFinite(num) ? num : defaultValue;
}

function parseNodeEnv(value: string | undefined): AppConfig["nodeEnv"] {
  if (value === "production" || value === "test") return value;
  return "development";
}

function parseLogLevel(value: string | undefined, nodeEnv: AppConfig["nodeEnv"]): LogLevel {
  const match = LOG_LEVELS.find((l) => l === value);
  if (match) return match;
  return nodeEnv === "production" ? "info" : "debug";
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value.trim() : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = parseNodeEnv(env.NODE_ENV);
  return {
    nodeEnv,
    port: parseNumericEnv(env.PORT, 8080),
    // Containers must listen on 0.0.0.0 to be reachable
    host: nonEmpty(env.HOST) ?? "0.0.0.0",
    logLevel: parseLogLevel(env.LOG_LEVEL, nodeEnv),
    firebaseProjectId: nonEmpty(env.FIREBASE_PROJECT_ID) ?? nonEmpty(env.GCP_PROJECT) ?? nonEmpty(env.GOOGLE_CLOUD_PROJECT),
    vertex: {
      projectId: nonEmpty(env.GCP_PROJECT) ?? nonEmpty(env.GOOGLE_CLOUD_PROJECT),
      location: nonEmpty(env.VERTEX_AI_LOCATION) ?? DEFAULT_VERTEX_LOCATION,
      model: nonEmpty(env.GEMINI_MODEL) ?? DEFAULT_MODEL,
      temperature: parseNumericEnv(env.GEMINI_TEMPERATURE, 0.2),
      maxOutputTokens: parseNumericEnv(env.GEMINI_MAX_OUTPUT_TOKENS, 8192),
    },
  };
}
