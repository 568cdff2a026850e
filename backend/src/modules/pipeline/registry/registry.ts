import { UnknownFieldError } from "../../../libs/errors.js";
import { FIELD_DEFINITIONS, FIELD_KEYS, type FieldDefinition, type FieldKey } from "./fields.js";

const FIELD_KEY_SET: ReadonlySet<string> = new Set(FIELD_KEYS);

export function isFieldKey(name: string): name is FieldKey {
  return FIELD_KEY_SET.has(name);
}

export function getFieldDefinition(field: string): FieldDefinition {
  if (!isFieldKey(field)) throw new UnknownFieldError(field);
  return FIELD_DEFINITIONS[field];
}

/** Definitions in canonical order. */
export function listFieldDefinitions(): FieldDefinition[] {
  return FIELD_KEYS.map((k) => FIELD_DEFINITIONS[k]);
}

export function fallbackFor(field: string): string {
  return getFieldDefinition(field).fallback;
}

/** Allowed set for enumerated fields; null for free text. */
export function allowedValues(field: string): readonly string[] | null {
  const def = getFieldDefinition(field);
  return def.kind === "enum" ? def.allowed : null;
}

export function isEnumerated(field: string): boolean {
  return getFieldDefinition(field).kind === "enum";
}

/** Fields the draft producer must always emit; the rest may be omitted. */
const DRAFT_REQUIRED_FIELDS: readonly FieldKey[] = [
  "scope_decision",
  "explicit_definition",
  "typology_proposed",
  "axis_A",
  "axis_B",
  "axis_C",
  "participation_level",
  "equity_level",
  "env_level",
  "equity_evidence",
  "env_evidence",
  "evidence_quality",
  "inferred",
  "split_case",
];

export type ResponseSchemaNode =
  | { type: "STRING"; enum?: string[] }
  | { type: "ARRAY"; items: ResponseSchemaNode }
  | { type: "OBJECT"; properties: Record<string, ResponseSchemaNode>; required: string[] };

/**
 * Response schema for the generative draft producer, derived from the registry.
 * original_text is stamped by the pipeline and never requested from the model.
 */
export function buildDraftResponseSchema(): ResponseSchemaNode {
  const properties: Record<string, ResponseSchemaNode> = {};
  for (const def of listFieldDefinitions()) {
    if (def.key === "original_text") continue;
    properties[def.key] = def.kind === "enum" ? { type: "STRING", enum: [...def.allowed] } : { type: "STRING" };
  }
  return {
    type: "OBJECT",
    properties: {
      rows: {
        type: "ARRAY",
        items: { type: "OBJECT", properties, required: [...DRAFT_REQUIRED_FIELDS] },
      },
    },
    required: ["rows"],
  };
}
