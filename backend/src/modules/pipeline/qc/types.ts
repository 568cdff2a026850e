import type { FieldKey } from "../registry/fields.js";
import type { CodingRecord } from "../normalizer/normalize.js";

export type QcRuleId = "EVIDENCE_GATING" | "TYPOLOGY_CONFIDENCE" | "SCOPE_CASCADE" | "ANCHOR_MISSING";

export type QcFinding = {
  rule: QcRuleId;
  /** Field the rule rewrote or flagged. */
  field: FieldKey;
  /** Human-readable annotation; appended to the record's notes. */
  message: string;
};

/** Output of one rule (and of the whole engine): the possibly rewritten record plus what fired. */
export type QcResult = {
  record: CodingRecord;
  findings: QcFinding[];
};

export type QcRule = (record: CodingRecord) => QcResult;
