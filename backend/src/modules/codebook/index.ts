import type { FastifyInstance } from "fastify";
import { registerCodebookRoutes } from "./routes.js";

export async function registerCodebookModule(app: FastifyInstance) {
  await registerCodebookRoutes(app);
}
