/**
 * Field schema registry: the fixed codebook record shape, value domains and fallbacks.
 * Pure and stateless.
 */

export {
  allowedValues,
  buildDraftResponseSchema,
  fallbackFor,
  getFieldDefinition,
  isEnumerated,
  isFieldKey,
  listFieldDefinitions,
} from "./registry.js";
export type { ResponseSchemaNode } from "./registry.js";
export {
  AXIS_PAIRS,
  FIELD_DEFINITIONS,
  FIELD_KEYS,
  NOT_APPLICABLE,
  OUTCOME_PAIRS,
} from "./fields.js";
export type { EnumFieldDefinition, FieldDefinition, FieldKey, FreeTextFieldDefinition } from "./fields.js";
