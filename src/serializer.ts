// src/serializer.ts — Document Serializer
// Reads the final registry snapshot and produces the device document.

import type { FieldRegistry } from "./field-registry.js";
import { emit } from "./emission.js";
import { destinationFileName, isValidIdentity } from "./identity.js";
import { container, renderXml } from "./xml.js";
import type { XmlContainer } from "./xml.js";
import { ShapeError } from "./types.js";
import type { FormSchema, Warning } from "./types.js";

export interface SerializedDocument {
  identity: string;
  fileName: string;
  root: XmlContainer;
  /** Rendered XML text, ready to write. */
  content: string;
}

/**
 * Build the document for the current registry state.
 * @throws ShapeError when the identity field is not exactly 12 hex characters.
 */
export function serializeDevice(registry: FieldRegistry, schema: FormSchema): SerializedDocument {
  const identity = registry.require(schema.identityTag).value;
  if (!isValidIdentity(identity)) throw new ShapeError(identity);

  const root = container(schema.document.root, emit(schema.document.rules, registry));
  return {
    identity,
    fileName: destinationFileName(identity),
    root,
    content: renderXml(root),
  };
}

/**
 * Mandatory fields other than the identity are advisory: an empty one
 * produces a warning but never blocks serialization.
 */
export function checkMandatoryFields(registry: FieldRegistry, schema: FormSchema): Warning[] {
  const warnings: Warning[] = [];
  for (const field of registry) {
    if (field.kind !== "mandatory" || field.tag === schema.identityTag) continue;
    if (field.value === "") {
      warnings.push({
        level: "warn",
        module: "serializer",
        tag: field.tag,
        message: `${field.label} (${field.tag}) is required but empty`,
      });
    }
  }
  return warnings;
}
