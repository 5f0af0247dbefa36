// src/presets.ts — Prefill a registry from tag/value pairs
// Sources: the config file's "values", a --values JSON file, and repeated --set flags.

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { FieldRegistry } from "./field-registry.js";
import { InvalidValueError } from "./types.js";
import type { Warning } from "./types.js";

/**
 * Apply presets in key order. Unknown tags and invalid options become
 * warnings; user input never raises UnknownTagError.
 * Returns the number of values applied.
 */
export function applyPresets(
  registry: FieldRegistry,
  values: Record<string, string>,
  warnings: Warning[],
): number {
  let applied = 0;
  for (const [tag, value] of Object.entries(values)) {
    const field = registry.lookup(tag);
    if (!field) {
      warnings.push({ level: "warn", module: "presets", tag, message: `Unknown field tag "${tag}" ignored` });
      continue;
    }
    try {
      registry.setValue(tag, value);
      applied++;
    } catch (err: unknown) {
      if (!(err instanceof InvalidValueError)) throw err;
      warnings.push({ level: "warn", module: "presets", tag, message: err.message });
    }
  }
  return applied;
}

/** Parse `tag=value` pairs. Only the first "=" splits, so values may contain "=". */
export function parseAssignments(pairs: string[], warnings: Warning[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      warnings.push({ level: "warn", module: "presets", message: `Expected tag=value, got "${pair}"` });
      continue;
    }
    result[pair.slice(0, eq).trim()] = pair.slice(eq + 1);
  }
  return result;
}

/**
 * Read a JSON object of presets. Numbers and booleans are stringified;
 * other value types are skipped with a warning.
 */
export function loadValuesFile(filePath: string, warnings: Warning[]): Record<string, string> {
  const absPath = resolve(filePath);
  if (!existsSync(absPath)) {
    warnings.push({ level: "warn", module: "presets", message: `Values file not found: ${filePath}` });
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(absPath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({ level: "warn", module: "presets", message: `Failed to parse values file ${filePath}: ${msg}` });
    return {};
  }
  return toValueRecord(parsed, filePath, warnings);
}

export function toValueRecord(raw: unknown, source: string, warnings: Warning[]): Record<string, string> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    warnings.push({ level: "warn", module: "presets", message: `${source}: expected an object of tag/value pairs` });
    return {};
  }
  const result: Record<string, string> = {};
  for (const [tag, value] of Object.entries(raw)) {
    if (typeof value === "string") result[tag] = value;
    else if (typeof value === "number" || typeof value === "boolean") result[tag] = String(value);
    else warnings.push({ level: "warn", module: "presets", tag, message: `${source}: value for "${tag}" must be a string` });
  }
  return result;
}
