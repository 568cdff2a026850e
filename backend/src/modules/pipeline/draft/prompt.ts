/**
 * Drafting prompts. The codebook text is supplied by the researcher per request.
 */

/** The codebook input still holds its placeholder ("Paste codebook here..."). */
export function isPlaceholderCodebook(codebook: string): boolean {
  return codebook.trim().toLowerCase().startsWith("paste codebook");
}

export function getSystemPrompt(): string {
  return (
    "You are an exacting academic coding assistant. " +
    "Code the article strictly against the supplied codebook and answer only with JSON matching the response schema. " +
    "Use only evidence found in the article text."
  );
}

export function getUserPrompt(articleText: string, codebook: string): string {
  return [
    "Rules:",
    "- Evidence and definition fields copy the article verbatim and include page/section anchors when present (e.g. \"...\" p. 12; Fig. 2).",
    "- Multi-value tokens (purpose_tokens, equity_tags, engagement_tags) are pipe-separated, e.g. DEV|LIV|SUS.",
    "- If evidence stays insufficient after two careful passes, choose NA and say why in notes.",
    "- If a value is inferred from strong contextual cues, set inferred to Yes and justify it in the matching *_evidence field.",
    "- Answer with an object whose key \"rows\" is a list of row objects, even for a single row.",
    "- One row per document. When the document holds distinct cases with their own definitions, typologies or outcomes, emit one row per case and set split_case to Yes on each.",
    "",
    "CODEBOOK:",
    "---",
    codebook,
    "---",
    "",
    "ARTICLE:",
    "---",
    articleText,
    "---",
  ].join("\n");
}
