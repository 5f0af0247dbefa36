// src/cursor.ts — Cursor Navigator
// Pure stepping over the live registry: headers and hidden fields are never landed on.

import type { FieldRegistry } from "./field-registry.js";

export function isSelectable(registry: FieldRegistry, index: number): boolean {
  const field = registry.at(index);
  return field !== undefined && !field.isHeader && !field.hidden;
}

export function firstSelectable(registry: FieldRegistry): number | undefined {
  return scan(registry, -1, 1);
}

export function lastSelectable(registry: FieldRegistry): number | undefined {
  return scan(registry, registry.size, -1);
}

/**
 * Next selectable index after `from`. At the last selectable field the
 * position holds. Returns undefined only when nothing is selectable.
 */
export function nextSelectable(registry: FieldRegistry, from: number): number | undefined {
  return scan(registry, from, 1) ?? settle(registry, from);
}

export function prevSelectable(registry: FieldRegistry, from: number): number | undefined {
  return scan(registry, from, -1) ?? settle(registry, from);
}

/**
 * `from` itself when selectable, otherwise the nearest selectable field
 * (forward first). Used after an edit hides the field under the cursor.
 */
export function settle(registry: FieldRegistry, from: number): number | undefined {
  if (isSelectable(registry, from)) return from;
  return scan(registry, from, 1) ?? scan(registry, from, -1);
}

function scan(registry: FieldRegistry, from: number, step: 1 | -1): number | undefined {
  const start = Math.min(Math.max(from, -1), registry.size);
  for (let i = start + step; i >= 0 && i < registry.size; i += step) {
    if (isSelectable(registry, i)) return i;
  }
  return undefined;
}
