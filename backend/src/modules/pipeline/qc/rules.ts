/**
 * Cross-field consistency rules. Pure functions; each returns a new record and its findings.
 * Order matters and is fixed in QC_RULES: the scope cascade must see evidence-gated levels,
 * the anchor check must see cascaded axes.
 */

import { AXIS_PAIRS, NOT_APPLICABLE, OUTCOME_PAIRS } from "../registry/fields.js";
import type { CodingRecord } from "../normalizer/normalize.js";
import type { QcFinding, QcResult, QcRule } from "./types.js";

/** Typology details shorter than this (trimmed) do not support a full "Yes". */
export const MIN_TYPOLOGY_DETAILS_LENGTH = 40;

/** "Not explicit" markers, English and Indonesian. */
export const NOT_EXPLICIT_MARKERS: readonly string[] = ["not explicit", "tidak eksplisit"];

const EMPTY_EVIDENCE_MARKERS: readonly string[] = ["", NOT_APPLICABLE.toLowerCase(), "n/a", "not applicable"];

function isSubstantive(value: string): boolean {
  return value !== NOT_APPLICABLE;
}

function lacksEvidence(evidence: string): boolean {
  return EMPTY_EVIDENCE_MARKERS.includes(evidence.trim().toLowerCase());
}

/**
 * Rule 1: an outcome level asserted without quoted support is forced to NA.
 * Applied independently to participation, equity and environmental outcomes.
 */
export function ruleEvidenceGating(record: CodingRecord): QcResult {
  const out = { ...record };
  const findings: QcFinding[] = [];
  for (const { outcome, level, evidence } of OUTCOME_PAIRS) {
    if (isSubstantive(out[level]) && lacksEvidence(out[evidence])) {
      findings.push({
        rule: "EVIDENCE_GATING",
        field: level,
        message: `QC: ${outcome} level ${out[level]} downgraded to ${NOT_APPLICABLE} (no supporting evidence)`,
      });
      out[level] = NOT_APPLICABLE;
    }
  }
  return { record: out, findings };
}

/** Rule 2: a claimed typology without enough elaboration counts as Partial. */
export function ruleTypologyConfidence(record: CodingRecord): QcResult {
  if (record.typology_proposed !== "Yes") return { record, findings: [] };
  const details = record.typology_details.trim();
  const lower = details.toLowerCase();
  const tooShort = details.length < MIN_TYPOLOGY_DETAILS_LENGTH;
  const notExplicit = NOT_EXPLICIT_MARKERS.some((m) => lower.includes(m));
  if (!tooShort && !notExplicit) return { record, findings: [] };
  return {
    record: { ...record, typology_proposed: "Partial" },
    findings: [
      {
        rule: "TYPOLOGY_CONFIDENCE",
        field: "typology_proposed",
        message: notExplicit
          ? "QC: typology_proposed downgraded to Partial (typology details marked not explicit)"
          : `QC: typology_proposed downgraded to Partial (typology details under ${MIN_TYPOLOGY_DETAILS_LENGTH} characters)`,
      },
    ],
  };
}

/**
 * Rule 3: excluded records carry no substantive classification.
 * evidence_quality becomes Low only when it is empty; an existing tier is left as is.
 */
export function ruleScopeCascade(record: CodingRecord): QcResult {
  if (record.scope_decision !== "Exclude") return { record, findings: [] };
  const out = { ...record };
  for (const { axis } of AXIS_PAIRS) out[axis] = NOT_APPLICABLE;
  for (const { level } of OUTCOME_PAIRS) out[level] = NOT_APPLICABLE;
  if (out.evidence_quality.trim() === "") out.evidence_quality = "Low";
  return {
    record: out,
    findings: [
      {
        rule: "SCOPE_CASCADE",
        field: "scope_decision",
        message: `QC: scope Exclude; axes and outcome levels set to ${NOT_APPLICABLE}`,
      },
    ],
  };
}

/** Rule 4: flag (never rewrite) a classified axis that has no anchor/citation. */
export function ruleAnchorCompleteness(record: CodingRecord): QcResult {
  const findings: QcFinding[] = [];
  for (const { axis, anchor } of AXIS_PAIRS) {
    if (isSubstantive(record[axis]) && record[anchor].trim() === "") {
      findings.push({
        rule: "ANCHOR_MISSING",
        field: anchor,
        message: `QC: ${axis} is classified but ${anchor} is empty`,
      });
    }
  }
  return { record, findings };
}

export const QC_RULES: readonly QcRule[] = [
  ruleEvidenceGating,
  ruleTypologyConfidence,
  ruleScopeCascade,
  ruleAnchorCompleteness,
];
