/**
 * Consistency (QC) engine. Runs every rule in order, appends findings to notes, re-normalizes.
 * Expects a normalized record; callers normalize first.
 */

import { normalizeRecord, type CodingRecord } from "../normalizer/normalize.js";
import { QC_RULES } from "./rules.js";
import type { QcFinding, QcResult } from "./types.js";

export {
  MIN_TYPOLOGY_DETAILS_LENGTH,
  NOT_EXPLICIT_MARKERS,
  QC_RULES,
  ruleAnchorCompleteness,
  ruleEvidenceGating,
  ruleScopeCascade,
  ruleTypologyConfidence,
} from "./rules.js";
export type { QcFinding, QcResult, QcRule, QcRuleId } from "./types.js";

export const NOTE_SEPARATOR = "; ";

/** Appends messages after existing notes; a message already present is not repeated. */
export function appendNotes(notes: string, messages: readonly string[]): string {
  const existing = notes.trim() === "" ? [] : [notes];
  const added: string[] = [];
  for (const m of messages) {
    if (notes.includes(m) || added.includes(m)) continue;
    added.push(m);
  }
  if (added.length === 0) return notes;
  return [...existing, ...added].join(NOTE_SEPARATOR);
}

export function runQc(record: CodingRecord): QcResult {
  let current = record;
  const findings: QcFinding[] = [];
  for (const rule of QC_RULES) {
    const step = rule(current);
    current = step.record;
    findings.push(...step.findings);
  }
  const notes = appendNotes(
    current.notes,
    findings.map((f) => f.message),
  );
  return { record: normalizeRecord({ ...current, notes }), findings };
}

export function applyQc(record: CodingRecord): CodingRecord {
  return runQc(record).record;
}
