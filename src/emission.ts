// src/emission.ts — Generic interpreter for the declarative emission table
// Each rule names its source tag, an optional predicate and the nodes it emits.

import type { Field, FieldRegistry } from "./field-registry.js";
import { container, leaf } from "./xml.js";
import type { XmlNode } from "./xml.js";
import { SchemaError } from "./types.js";
import type { Condition, EmissionRule } from "./types.js";

export function emit(rules: readonly EmissionRule[], registry: FieldRegistry): XmlNode[] {
  return rules.flatMap((rule) => emitRule(rule, registry));
}

export function emitRule(rule: EmissionRule, registry: FieldRegistry): XmlNode[] {
  switch (rule.kind) {
    case "constant":
      return [leaf(rule.element, rule.value)];

    case "value": {
      const field = registry.require(rule.tag);
      const text = field.serializedValue || (rule.fallback ?? "");
      if (rule.policy === "non-empty" && text === "") return [];
      return [leaf(rule.element ?? field.element, text)];
    }

    case "choice": {
      const field = registry.require(rule.tag);
      if (!field.isDropdown) {
        throw new SchemaError(`Choice emission for ${rule.tag} needs a dropdown field`);
      }
      const value = field.serializedValue;
      if (rule.policy === "non-empty" && value === "") return [];
      return [leaf(rule.element ?? field.element, value)];
    }

    case "element":
      return [container(rule.element, emit(rule.children, registry), rule.attributes)];

    case "when":
      return testCondition(registry.require(rule.tag), rule.condition)
        ? emit(rule.then, registry)
        : [];
  }
}

/**
 * Selection conditions read the controller's option index, never the
 * dependent's text, so a stale hidden value cannot leak into the output.
 */
export function testCondition(field: Field, condition: Condition): boolean {
  if ("filled" in condition) return field.value !== "";
  if (!field.isDropdown) {
    throw new SchemaError(`Selection condition on ${field.tag} needs a dropdown field`);
  }
  if ("selectedIs" in condition) return field.selectedIndex === condition.selectedIs;
  return field.selectedIndex !== condition.selectedIsNot;
}

/** Every tag referenced anywhere in the table, in first-seen order. */
export function referencedTags(rules: readonly EmissionRule[]): string[] {
  const tags: string[] = [];
  const visit = (rule: EmissionRule): void => {
    switch (rule.kind) {
      case "constant":
        return;
      case "value":
      case "choice":
        if (!tags.includes(rule.tag)) tags.push(rule.tag);
        return;
      case "element":
        rule.children.forEach(visit);
        return;
      case "when":
        if (!tags.includes(rule.tag)) tags.push(rule.tag);
        rule.then.forEach(visit);
        return;
    }
  };
  rules.forEach(visit);
  return tags;
}
