/**
 * Table-driven record normalizer. Total: any input yields a complete, valid record.
 * Untrusted producer output (missing keys, invented enum labels, wrong types) is defaulted, never rejected.
 */

import { FIELD_DEFINITIONS, type FieldKey } from "../registry/fields.js";

/** Complete codebook record: every registered field, enumerated fields within their allowed set. */
export type CodingRecord = Record<FieldKey, string>;

function isPlainMapping(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isPrimitive(x: unknown): x is string | number | boolean | bigint {
  return typeof x === "string" || typeof x === "number" || typeof x === "boolean" || typeof x === "bigint";
}

/** Multi-value fields arrive as arrays from some producers; the codebook stores them pipe-separated. */
function readValue(x: unknown): string {
  if (typeof x === "string") return x;
  if (isPrimitive(x)) return String(x);
  if (Array.isArray(x) && x.every(isPrimitive)) return x.map(String).join("|");
  return "";
}

/** Builds a record field by field; the literal keeps the compiler checking completeness. */
export function buildRecord(valueFor: (key: FieldKey) => string): CodingRecord {
  return {
    inclusion_signals: valueFor("inclusion_signals"),
    exclusion_signals: valueFor("exclusion_signals"),
    scope_decision: valueFor("scope_decision"),
    scope_justification: valueFor("scope_justification"),
    unit_of_analysis: valueFor("unit_of_analysis"),
    explicit_definition: valueFor("explicit_definition"),
    verbatim_definition: valueFor("verbatim_definition"),
    typology_proposed: valueFor("typology_proposed"),
    typology_details: valueFor("typology_details"),
    axis_A: valueFor("axis_A"),
    axis_B: valueFor("axis_B"),
    axis_C: valueFor("axis_C"),
    axis_A_anchor: valueFor("axis_A_anchor"),
    axis_B_anchor: valueFor("axis_B_anchor"),
    axis_C_anchor: valueFor("axis_C_anchor"),
    purpose_tokens: valueFor("purpose_tokens"),
    key_findings: valueFor("key_findings"),
    participation_level: valueFor("participation_level"),
    participation_evidence: valueFor("participation_evidence"),
    equity_level: valueFor("equity_level"),
    equity_evidence: valueFor("equity_evidence"),
    env_level: valueFor("env_level"),
    env_evidence: valueFor("env_evidence"),
    equity_tags: valueFor("equity_tags"),
    engagement_tags: valueFor("engagement_tags"),
    evidence_quality: valueFor("evidence_quality"),
    inferred: valueFor("inferred"),
    notes: valueFor("notes"),
    split_case: valueFor("split_case"),
    original_text: valueFor("original_text"),
  };
}

export function normalizeRecord(raw: unknown): CodingRecord {
  const source: Record<string, unknown> = isPlainMapping(raw) ? raw : {};
  return buildRecord((key) => {
    const def = FIELD_DEFINITIONS[key];
    const value = Object.prototype.hasOwnProperty.call(source, key) ? readValue(source[key]) : "";
    return def.kind === "enum" && !def.allowed.includes(value) ? def.fallback : value;
  });
}

/**
 * Normalize one producer batch for a single source document.
 * Every row gets the full source text (split-case rows stay independently auditable).
 */
export function normalizeRows(rawRows: readonly unknown[], originalText: string): CodingRecord[] {
  return rawRows.map((r) => normalizeRecord({ ...(isPlainMapping(r) ? r : {}), original_text: originalText }));
}
