/**
 * Draft producer: turns an article + codebook into raw candidate rows.
 * Output is never trusted; the review module normalizes and QCs every row.
 */

export { GeminiDraftProducer, parseDraftResponse } from "./producer.js";
export type { DraftProducer, DraftRequest } from "./producer.js";
export { getSystemPrompt, getUserPrompt, isPlaceholderCodebook } from "./prompt.js";
export { generateContentUrl, generateJson, googleAccessToken } from "./vertexGemini.js";
export type { AccessTokenSource, GenerateJsonOptions } from "./vertexGemini.js";
