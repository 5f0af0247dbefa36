// src/session.ts — One operator's editing session over a form schema
// The session is the context object: registry, rules and cursor live here, not in globals.

import { FieldRegistry } from "./field-registry.js";
import type { Field } from "./field-registry.js";
import { recomputeVisibility, validateRules } from "./visibility.js";
import { firstSelectable, nextSelectable, prevSelectable, settle } from "./cursor.js";
import { referencedTags } from "./emission.js";
import { checkMandatoryFields, serializeDevice } from "./serializer.js";
import type { SerializedDocument } from "./serializer.js";
import { writeDocument } from "./writer.js";
import { applyPresets } from "./presets.js";
import { DestinationError, SchemaError, ShapeError } from "./types.js";
import type { FieldRow, FormSchema, Warning } from "./types.js";

export type CommitResult =
  | { ok: true; path: string; document: SerializedDocument; warnings: Warning[] }
  | { ok: false; message: string; error: ShapeError | DestinationError };

export class FormSession {
  readonly registry: FieldRegistry;
  private cursorIndex: number;

  constructor(readonly schema: FormSchema) {
    this.registry = FieldRegistry.fromSchema(schema);
    validateRules(this.registry, schema.visibility);
    for (const tag of referencedTags(schema.document.rules)) this.registry.require(tag);
    recomputeVisibility(this.registry, schema.visibility);
    const first = firstSelectable(this.registry);
    if (first === undefined) throw new SchemaError(`Schema "${schema.name}" has no editable fields`);
    this.cursorIndex = first;
  }

  get cursor(): number {
    return this.cursorIndex;
  }

  get current(): Field {
    return this.fieldAt(this.cursorIndex);
  }

  moveNext(): number {
    this.cursorIndex = nextSelectable(this.registry, this.cursorIndex) ?? this.cursorIndex;
    return this.cursorIndex;
  }

  movePrev(): number {
    this.cursorIndex = prevSelectable(this.registry, this.cursorIndex) ?? this.cursorIndex;
    return this.cursorIndex;
  }

  /** Jump to a field by tag; hidden or header targets leave the cursor alone. */
  moveTo(tag: string): boolean {
    const index = this.registry.indexOf(tag);
    const field = this.registry.at(index);
    if (!field || field.isHeader || field.hidden) return false;
    this.cursorIndex = index;
    return true;
  }

  /** Commit a value to the field under the cursor, or to `tag`. */
  setValue(value: string, tag?: string): Field {
    const field = this.registry.setValue(tag ?? this.cursorIndex, value);
    this.refresh();
    return field;
  }

  select(index: number, tag?: string): Field {
    const field = this.registry.setSelected(tag ?? this.cursorIndex, index);
    this.refresh();
    return field;
  }

  /** Step the dropdown under the cursor; no-op on free-text fields. */
  cycle(delta: number): void {
    const options = this.current.options;
    if (!options) return;
    options.cycle(delta);
    this.refresh();
  }

  /** Apply presets (see applyPresets) and resolve visibility once afterwards. */
  prefill(values: Record<string, string>, warnings: Warning[]): number {
    const applied = applyPresets(this.registry, values, warnings);
    this.refresh();
    return applied;
  }

  rows(): FieldRow[] {
    return this.registry.rows();
  }

  visibleRows(): FieldRow[] {
    return this.registry.visibleRows();
  }

  /** Serialize without writing. Throws ShapeError like serializeDevice. */
  preview(): SerializedDocument {
    return serializeDevice(this.registry, this.schema);
  }

  /**
   * Serialize and write. Validation runs before the destination is opened,
   * so a ShapeError never leaves a file behind. The session stays editable.
   */
  commit(outputDir: string): CommitResult {
    try {
      const document = serializeDevice(this.registry, this.schema);
      const path = writeDocument(outputDir, document.fileName, document.content);
      return { ok: true, path, document, warnings: checkMandatoryFields(this.registry, this.schema) };
    } catch (err: unknown) {
      if (err instanceof ShapeError || err instanceof DestinationError) {
        return { ok: false, message: err.message, error: err };
      }
      throw err;
    }
  }

  private refresh(): void {
    recomputeVisibility(this.registry, this.schema.visibility);
    this.cursorIndex = settle(this.registry, this.cursorIndex) ?? this.cursorIndex;
  }

  private fieldAt(index: number): Field {
    const field = this.registry.at(index);
    if (!field) throw new RangeError(`Cursor ${index} is outside the registry`);
    return field;
  }
}
