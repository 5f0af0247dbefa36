// src/field-registry.ts — Ordered field store, the single source of truth for form state

import { OptionSet } from "./option-set.js";
import { normalizeIdentity } from "./identity.js";
import {
  InvalidValueError,
  SchemaError,
  UnknownTagError,
} from "./types.js";
import type {
  FieldKind,
  FieldNormalizer,
  FieldOption,
  FieldRow,
  FieldSpec,
  FormSchema,
} from "./types.js";

/**
 * One form row. Dropdown fields mirror their selected label into `value`
 * so renderers never need to special-case the kind.
 */
export class Field {
  readonly label: string;
  readonly tag: string;
  readonly kind: FieldKind;
  readonly help: string;
  readonly element: string;
  readonly group: string | undefined;
  readonly normalize: FieldNormalizer | undefined;
  readonly options: OptionSet | undefined;
  hidden = false;
  private text = "";

  constructor(spec: FieldSpec) {
    this.label = spec.label;
    this.tag = spec.tag ?? "";
    this.kind = spec.kind;
    this.help = spec.help ?? "";
    this.element = spec.element ?? this.tag;
    this.group = spec.group;
    this.normalize = spec.normalize;
    this.options =
      spec.options && spec.options.length > 0
        ? new OptionSet(spec.options, spec.defaultIndex ?? 0)
        : undefined;
  }

  get value(): string {
    return this.options ? this.options.selectedLabel : this.text;
  }

  get isHeader(): boolean {
    return this.kind === "header";
  }

  get isDropdown(): boolean {
    return this.options !== undefined;
  }

  /** Serialized value of the selection, or the raw text for free-text fields. */
  get serializedValue(): string {
    return this.options ? this.options.selectedValue : this.text;
  }

  /** Index of the selected option; -1 for free-text fields. */
  get selectedIndex(): number {
    return this.options ? this.options.selectedIndex : -1;
  }

  /** @internal Registry-only mutator; use FieldRegistry.setValue. */
  assignText(text: string): void {
    this.text = this.normalize === "identity" ? normalizeIdentity(text) : text;
  }
}

export class FieldRegistry {
  private readonly fields: Field[] = [];
  private readonly byTag = new Map<string, number>();

  /** Append a field and return its index. Order is fixed once added. */
  add(spec: FieldSpec): number {
    if (spec.kind === "header" && spec.options) {
      throw new SchemaError(`Header "${spec.label}" cannot carry options`);
    }
    const field = new Field(spec);
    if (!field.isHeader) {
      if (field.tag === "") {
        throw new SchemaError(`Field "${field.label}" has no tag`);
      }
      if (this.byTag.has(field.tag)) {
        throw new SchemaError(`Duplicate field tag "${field.tag}"`);
      }
    }
    const index = this.fields.length;
    this.fields.push(field);
    if (!field.isHeader) this.byTag.set(field.tag, index);
    return index;
  }

  /** Dropdown fields are always optional; `value` starts at the default option's label. */
  addDropdown(
    label: string,
    tag: string,
    options: readonly FieldOption[],
    defaultIndex = 0,
    extra: Omit<FieldSpec, "label" | "tag" | "kind" | "options" | "defaultIndex"> = {},
  ): number {
    return this.add({ ...extra, label, tag, kind: "optional", options, defaultIndex });
  }

  get size(): number {
    return this.fields.length;
  }

  at(index: number): Field | undefined {
    return this.fields[index];
  }

  lookup(tag: string): Field | undefined {
    const index = this.byTag.get(tag);
    return index === undefined ? undefined : this.fields[index];
  }

  /** Lookup for tags the schema guarantees; a miss is a programming error. */
  require(tag: string): Field {
    const field = this.lookup(tag);
    if (!field) throw new UnknownTagError(tag);
    return field;
  }

  indexOf(tag: string): number {
    return this.byTag.get(tag) ?? -1;
  }

  /** Empty string for unknown tags and free-text fields. */
  selectedSerializedValue(tag: string): string {
    const field = this.lookup(tag);
    return field?.options ? field.options.selectedValue : "";
  }

  /**
   * Commit a new value. Free-text fields store the text (normalized where the
   * field asks for it); dropdowns select the option whose label or value matches.
   */
  setValue(target: string | number, value: string): Field {
    const field = this.resolve(target);
    if (field.isHeader) {
      throw new InvalidValueError(field.tag, `"${field.label}" is a header and holds no value`);
    }
    if (field.options) {
      const index = field.options.indexOf(value);
      if (index < 0) {
        const choices = field.options.entries().map((o) => o.label).join(", ");
        throw new InvalidValueError(
          field.tag,
          `"${value}" is not an option of ${field.tag} (choices: ${choices})`,
        );
      }
      field.options.select(index);
    } else {
      field.assignText(value);
    }
    return field;
  }

  setSelected(target: string | number, index: number): Field {
    const field = this.resolve(target);
    if (!field.options) {
      throw new InvalidValueError(field.tag, `${field.tag || field.label} is not a dropdown`);
    }
    if (!field.options.select(index)) {
      throw new InvalidValueError(
        field.tag,
        `Option index ${index} is outside 0..${field.options.size - 1} for ${field.tag}`,
      );
    }
    return field;
  }

  /** Members of a logical group in registry order. */
  groupMembers(group: string): Field[] {
    return this.fields.filter((f) => f.group === group);
  }

  /** Distinct group identifiers in order of first appearance. */
  groups(): string[] {
    const seen: string[] = [];
    for (const f of this.fields) {
      if (f.group !== undefined && !seen.includes(f.group)) seen.push(f.group);
    }
    return seen;
  }

  rows(): FieldRow[] {
    return this.fields.map((f, index) => ({
      index,
      tag: f.tag,
      label: f.label,
      value: f.value,
      kind: f.kind,
      hidden: f.hidden,
      help: f.help,
      isDropdown: f.isDropdown,
    }));
  }

  visibleRows(): FieldRow[] {
    return this.rows().filter((r) => !r.hidden);
  }

  [Symbol.iterator](): IterableIterator<Field> {
    return this.fields[Symbol.iterator]();
  }

  static fromSchema(schema: FormSchema): FieldRegistry {
    return FieldRegistry.fromFields(schema.fields);
  }

  static fromFields(fields: readonly FieldSpec[]): FieldRegistry {
    const registry = new FieldRegistry();
    for (const spec of fields) registry.add(spec);
    return registry;
  }

  private resolve(target: string | number): Field {
    if (typeof target === "number") {
      const field = this.fields[target];
      if (!field) throw new RangeError(`Field index ${target} is outside 0..${this.fields.length - 1}`);
      return field;
    }
    return this.require(target);
  }
}
