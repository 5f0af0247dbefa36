// src/index.ts — Library API
// Build a session from a schema, edit it, serialize it.

export type {
  FieldKind,
  FieldNormalizer,
  FieldOption,
  FieldSpec,
  FieldRow,
  DependentVisibility,
  VisibilityRule,
  Condition,
  EmissionPolicy,
  EmissionRule,
  FormSchema,
  Warning,
  ResolvedConfig,
} from "./types.js";

export {
  GENERATOR_VERSION,
  ShapeError,
  DestinationError,
  UnknownTagError,
  SchemaError,
  InvalidValueError,
} from "./types.js";

export { OptionSet } from "./option-set.js";
export { Field, FieldRegistry } from "./field-registry.js";
export { recomputeVisibility, validateRules, groupRule, hideWhenOff, showOnlyWhen } from "./visibility.js";
export { nextSelectable, prevSelectable, firstSelectable, lastSelectable, isSelectable, settle } from "./cursor.js";
export { normalizeIdentity, isValidIdentity, destinationFileName } from "./identity.js";
export { emit, testCondition, referencedTags } from "./emission.js";
export { serializeDevice, checkMandatoryFields } from "./serializer.js";
export type { SerializedDocument } from "./serializer.js";
export { renderXml, escapeXml, leaf, container, findNode } from "./xml.js";
export type { XmlNode, XmlLeaf, XmlContainer } from "./xml.js";
export { writeDocument } from "./writer.js";
export { applyPresets, parseAssignments, loadValuesFile } from "./presets.js";
export { redactDocument, DEFAULT_REDACT_PATTERNS } from "./redact.js";
export { FormSession } from "./session.js";
export type { CommitResult } from "./session.js";
export { createPhoneSchema, IDENTITY_TAG, LINE_GROUP_COUNT, KeyFunction, lineGroups, lineTag } from "./schema/phone-schema.js";
export type { LineGroup } from "./schema/phone-schema.js";
export { formatFieldList } from "./field-listing.js";
