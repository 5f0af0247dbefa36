// src/types.ts — ALL shared types for the provisioning form engine

export const GENERATOR_VERSION = "0.3.0";

// ─── Fields ──────────────────────────────────────────────────────────────────

export type FieldKind = "mandatory" | "optional" | "header";

/** Post-commit value transform applied by the registry. */
export type FieldNormalizer = "identity";

export interface FieldOption {
  /** Human-readable label shown in the form. */
  label: string;
  /** Value written to the document. */
  value: string;
}

/**
 * Declarative description of one form row, as written in a schema.
 * `options` turns the field into a dropdown.
 */
export interface FieldSpec {
  label: string;
  tag?: string;
  kind: FieldKind;
  help?: string;
  element?: string;
  group?: string;
  normalize?: FieldNormalizer;
  options?: readonly FieldOption[];
  defaultIndex?: number;
}

/** Read-only projection of a field that rendering code consumes. */
export interface FieldRow {
  index: number;
  tag: string;
  label: string;
  value: string;
  kind: FieldKind;
  hidden: boolean;
  help: string;
  isDropdown: boolean;
}

// ─── Visibility ──────────────────────────────────────────────────────────────

export interface DependentVisibility {
  tag: string;
  /** Receives the controller's selected option index. */
  visibleWhen: (selectedIndex: number) => boolean;
}

export interface VisibilityRule {
  controller: string;
  dependents: DependentVisibility[];
}

// ─── Emission table ──────────────────────────────────────────────────────────

/** `filled` tests a free-text value; the others test a dropdown selection. */
export type Condition =
  | { selectedIs: number }
  | { selectedIsNot: number }
  | { filled: true };

export type EmissionPolicy = "always" | "non-empty";

export type EmissionRule =
  | { kind: "constant"; element: string; value: string }
  | {
      kind: "value";
      tag: string;
      element?: string;
      policy: EmissionPolicy;
      fallback?: string;
    }
  | { kind: "choice"; tag: string; element?: string; policy?: EmissionPolicy }
  | {
      kind: "element";
      element: string;
      attributes?: Record<string, string>;
      children: EmissionRule[];
    }
  | { kind: "when"; tag: string; condition: Condition; then: EmissionRule[] };

// ─── Schema ──────────────────────────────────────────────────────────────────

/** A complete form template: rows, visibility rules and document layout. */
export interface FormSchema {
  name: string;
  fields: FieldSpec[];
  visibility: VisibilityRule[];
  /** Field whose normalized value names the output file. */
  identityTag: string;
  document: {
    root: string;
    rules: EmissionRule[];
  };
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  tag?: string;
}

// ─── Config ──────────────────────────────────────────────────────────────────

export interface ResolvedConfig {
  outputDir: string;
  /** Preset values keyed by field tag. */
  values: Record<string, string>;
  /** Glob patterns of element names masked in printed output. */
  redact: string[];
  verbose: boolean;
  quiet: boolean;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class ShapeError extends Error {
  constructor(public readonly identity: string) {
    super(
      `MAC address must be exactly 12 hexadecimal characters (got ${identity.length}: "${identity}")`,
    );
    this.name = "ShapeError";
  }
}

export class DestinationError extends Error {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(`Cannot write ${filePath}${cause ? `: ${cause.message}` : ""}`);
    this.name = "DestinationError";
    if (cause) this.cause = cause;
  }
}

export class UnknownTagError extends Error {
  constructor(public readonly tag: string) {
    super(`No field is registered under tag "${tag}"`);
    this.name = "UnknownTagError";
  }
}

export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

export class InvalidValueError extends Error {
  constructor(
    public readonly tag: string,
    message: string,
  ) {
    super(message);
    this.name = "InvalidValueError";
  }
}
