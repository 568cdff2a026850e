export { buildRecord, normalizeRecord, normalizeRows } from "./normalize.js";
export type { CodingRecord } from "./normalize.js";
