// src/field-listing.ts — Plain-text reference of every tag a preset can set

import type { FieldRegistry } from "./field-registry.js";

const MAX_LISTED_OPTIONS = 6;

/**
 * One line per field: tag, label and the current value. Dropdowns list their
 * options as `label=value`, cut after a few entries for long lists.
 */
export function formatFieldList(registry: FieldRegistry): string {
  const lines: string[] = [];
  for (const field of registry) {
    if (field.isHeader) {
      lines.push("", field.label);
      continue;
    }
    const required = field.kind === "mandatory" ? " (required)" : "";
    const current = field.value === "" ? "" : ` [${field.value}]`;
    lines.push(`  ${field.tag.padEnd(28)} ${field.label}${required}${current}`);
    if (field.options) {
      const entries = field.options.entries();
      const shown = entries.slice(0, MAX_LISTED_OPTIONS).map((o) => `${o.label}=${o.value}`);
      const more = entries.length > MAX_LISTED_OPTIONS ? `, … ${entries.length - MAX_LISTED_OPTIONS} more` : "";
      lines.push(`  ${"".padEnd(28)}   options: ${shown.join(", ")}${more}`);
    }
  }
  if (lines[0] === "") lines.shift();
  return lines.join("\n") + "\n";
}
