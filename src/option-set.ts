// src/option-set.ts — Dropdown choices with a selected index
// Labels and serialized values are kept as parallel pairs; the selection is always in range.

import type { FieldOption } from "./types.js";

export class OptionSet {
  private readonly options: readonly FieldOption[];
  private selected: number;

  constructor(options: readonly FieldOption[], defaultIndex = 0) {
    if (options.length === 0) {
      throw new RangeError("An option set needs at least one option");
    }
    if (!isIndexIn(defaultIndex, options.length)) {
      throw new RangeError(
        `Default index ${defaultIndex} is outside 0..${options.length - 1}`,
      );
    }
    this.options = options.map((o) => ({ label: o.label, value: o.value }));
    this.selected = defaultIndex;
  }

  get size(): number {
    return this.options.length;
  }

  get selectedIndex(): number {
    return this.selected;
  }

  get selectedLabel(): string {
    return this.options[this.selected].label;
  }

  get selectedValue(): string {
    return this.options[this.selected].value;
  }

  /** Returns false (and keeps the current selection) for an out-of-range index. */
  select(index: number): boolean {
    if (!isIndexIn(index, this.options.length)) return false;
    this.selected = index;
    return true;
  }

  /** Step the selection by `delta`, wrapping at both ends. */
  cycle(delta: number): void {
    const n = this.options.length;
    this.selected = (((this.selected + delta) % n) + n) % n;
  }

  /** Find an option by display label first, then by serialized value. */
  indexOf(labelOrValue: string): number {
    const byLabel = this.options.findIndex((o) => o.label === labelOrValue);
    if (byLabel >= 0) return byLabel;
    return this.options.findIndex((o) => o.value === labelOrValue);
  }

  entries(): readonly FieldOption[] {
    return this.options;
  }
}

function isIndexIn(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}
