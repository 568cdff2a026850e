/**
 * Codebook field definitions in canonical order.
 * The order is the output column order for every tabular rendering; do not reorder without migrating exports.
 */

/** Stored label for "not applicable" on axes and outcome levels. */
export const NOT_APPLICABLE = "NA";

export const SCOPE_DECISIONS = ["Include", "Exclude"] as const;
export const UNITS_OF_ANALYSIS = [
  "Village/community",
  "Destination/region",
  "Household/individual",
  "Enterprise/organisation",
  "Policy/programme",
  "Mixed/other",
] as const;
export const DEFINITION_FLAGS = ["Yes", "Partial", "No"] as const;
export const AXIS_A_VALUES = ["A1 State-led", "A2 Co-managed", "A3 Community-led", NOT_APPLICABLE] as const;
export const AXIS_B_VALUES = [
  "B1 Heritage-led",
  "B2 Nature-led",
  "B3 Mixed-portfolio",
  "B4 Commodified/amenities-led",
  NOT_APPLICABLE,
] as const;
export const AXIS_C_VALUES = [
  "C1 Claimed/aspirational",
  "C2 Process-based/criteria",
  "C3 Measured/verified",
  NOT_APPLICABLE,
] as const;
/** 1 = low, 2 = medium, 3 = high. */
export const OUTCOME_LEVELS = ["1", "2", "3", NOT_APPLICABLE] as const;
export const EVIDENCE_QUALITY = ["Low", "Moderate", "High"] as const;
export const YES_NO = ["Yes", "No"] as const;

export const FIELD_KEYS = [
  "inclusion_signals",
  "exclusion_signals",
  "scope_decision",
  "scope_justification",
  "unit_of_analysis",
  "explicit_definition",
  "verbatim_definition",
  "typology_proposed",
  "typology_details",
  "axis_A",
  "axis_B",
  "axis_C",
  "axis_A_anchor",
  "axis_B_anchor",
  "axis_C_anchor",
  "purpose_tokens",
  "key_findings",
  "participation_level",
  "participation_evidence",
  "equity_level",
  "equity_evidence",
  "env_level",
  "env_evidence",
  "equity_tags",
  "engagement_tags",
  "evidence_quality",
  "inferred",
  "notes",
  "split_case",
  "original_text",
] as const;

export type FieldKey = (typeof FIELD_KEYS)[number];

export type FreeTextFieldDefinition = {
  key: FieldKey;
  kind: "free_text";
  label: string;
  fallback: "";
};

export type EnumFieldDefinition = {
  key: FieldKey;
  kind: "enum";
  label: string;
  allowed: readonly string[];
  fallback: string;
};

export type FieldDefinition = FreeTextFieldDefinition | EnumFieldDefinition;

function text(key: FieldKey, label: string): FreeTextFieldDefinition {
  return { key, kind: "free_text", label, fallback: "" };
}

function oneOf(key: FieldKey, label: string, allowed: readonly string[], fallback: string): EnumFieldDefinition {
  return { key, kind: "enum", label, allowed, fallback };
}

export const FIELD_DEFINITIONS: Record<FieldKey, FieldDefinition> = {
  inclusion_signals: text("inclusion_signals", "Inclusion signals"),
  exclusion_signals: text("exclusion_signals", "Exclusion signals"),
  scope_decision: oneOf("scope_decision", "Scope decision", SCOPE_DECISIONS, "Include"),
  scope_justification: text("scope_justification", "Scope justification"),
  unit_of_analysis: oneOf("unit_of_analysis", "Unit of analysis", UNITS_OF_ANALYSIS, "Village/community"),
  explicit_definition: oneOf("explicit_definition", "Explicit definition", DEFINITION_FLAGS, "No"),
  verbatim_definition: text("verbatim_definition", "Verbatim definition (quote + page/section)"),
  typology_proposed: oneOf("typology_proposed", "Typology proposed", DEFINITION_FLAGS, "No"),
  typology_details: text("typology_details", "Typology details (classes + decision rules)"),
  axis_A: oneOf("axis_A", "Axis A: governance & ownership", AXIS_A_VALUES, NOT_APPLICABLE),
  axis_B: oneOf("axis_B", "Axis B: market orientation & product mix", AXIS_B_VALUES, NOT_APPLICABLE),
  axis_C: oneOf("axis_C", "Axis C: sustainability performance", AXIS_C_VALUES, NOT_APPLICABLE),
  axis_A_anchor: text("axis_A_anchor", "Axis A anchor (page/figure/table ref.)"),
  axis_B_anchor: text("axis_B_anchor", "Axis B anchor (page/figure/table ref.)"),
  axis_C_anchor: text("axis_C_anchor", "Axis C anchor (page/figure/table ref.)"),
  purpose_tokens: text("purpose_tokens", "Purpose tokens (pipe-separated, e.g. DEV|LIV|SUS)"),
  key_findings: text("key_findings", "Key arguments/findings"),
  participation_level: oneOf("participation_level", "Participation level", OUTCOME_LEVELS, NOT_APPLICABLE),
  participation_evidence: text("participation_evidence", "Participation evidence (verbatim + anchor)"),
  equity_level: oneOf("equity_level", "Equity level", OUTCOME_LEVELS, NOT_APPLICABLE),
  equity_evidence: text("equity_evidence", "Equity evidence (verbatim + anchor)"),
  env_level: oneOf("env_level", "Environmental level", OUTCOME_LEVELS, NOT_APPLICABLE),
  env_evidence: text("env_evidence", "Environmental evidence (verbatim + anchor)"),
  equity_tags: text("equity_tags", "Equity tags (e.g. EQ-GEN|EQ-BEN)"),
  engagement_tags: text("engagement_tags", "Engagement tags (e.g. ENG-MED|ENG-MET)"),
  evidence_quality: oneOf("evidence_quality", "Evidence quality", EVIDENCE_QUALITY, "Moderate"),
  inferred: oneOf("inferred", "Inferred?", YES_NO, "No"),
  notes: text("notes", "Notes (explain NA or inference)"),
  split_case: oneOf("split_case", "Split-case row?", YES_NO, "No"),
  original_text: text("original_text", "Original text"),
};

/** Outcome axes: level field paired with its mandatory evidence quote. */
export const OUTCOME_PAIRS = [
  { outcome: "participation", level: "participation_level", evidence: "participation_evidence" },
  { outcome: "equity", level: "equity_level", evidence: "equity_evidence" },
  { outcome: "environmental", level: "env_level", evidence: "env_evidence" },
] as const satisfies ReadonlyArray<{ outcome: string; level: FieldKey; evidence: FieldKey }>;

/** Classification axes: axis field paired with its anchor/citation. */
export const AXIS_PAIRS = [
  { axis: "axis_A", anchor: "axis_A_anchor" },
  { axis: "axis_B", anchor: "axis_B_anchor" },
  { axis: "axis_C", anchor: "axis_C_anchor" },
] as const satisfies ReadonlyArray<{ axis: FieldKey; anchor: FieldKey }>;
