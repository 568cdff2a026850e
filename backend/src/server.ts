import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { buildApp } from "./app.js";
import { loadConfig } from "./libs/config.js";

// Secrets come only from process.env; .env.local/.env are a local-development convenience.
// DOTENV_CONFIG_PATH overrides the lookup.
const dotenvCandidates = [
  process.env.DOTENV_CONFIG_PATH,
  path.resolve(process.cwd(), ".env.local"),
  path.resolve(process.cwd(), ".env"),
  path.resolve(process.cwd(), "..", ".env.local"),
  path.resolve(process.cwd(), "..", ".env"),
].filter((p): p is string => typeof p === "string" && p !== "");

const dotenvPath = dotenvCandidates.find((p) => fs.existsSync(p));
dotenv.config(dotenvPath ? { path: dotenvPath } : undefined);

async function main() {
  const config = loadConfig();
  const app = await buildApp({ config });
  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
