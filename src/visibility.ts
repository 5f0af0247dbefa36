// src/visibility.ts — Visibility Resolver
// Recomputes every field's hidden flag from the current selections in one pass.

import type { FieldRegistry } from "./field-registry.js";
import { SchemaError } from "./types.js";
import type { DependentVisibility, VisibilityRule } from "./types.js";

/**
 * A controller with several dependents, each with its own predicate on the
 * controller's selected index.
 */
export function groupRule(
  controller: string,
  dependents: Record<string, DependentVisibility["visibleWhen"]>,
): VisibilityRule {
  return {
    controller,
    dependents: Object.entries(dependents).map(([tag, visibleWhen]) => ({ tag, visibleWhen })),
  };
}

/** Hide `dependent` while `controller` sits at its "off" option. */
export function hideWhenOff(controller: string, dependent: string, offIndex = 0): VisibilityRule {
  return {
    controller,
    dependents: [{ tag: dependent, visibleWhen: (i) => i !== offIndex }],
  };
}

/** Show `dependent` only while `controller` selects exactly `targetIndex`. */
export function showOnlyWhen(controller: string, dependent: string, targetIndex: number): VisibilityRule {
  return {
    controller,
    dependents: [{ tag: dependent, visibleWhen: (i) => i === targetIndex }],
  };
}

/**
 * Reset every field to visible, then apply the rules in declaration order.
 * Later rules override earlier ones for the same dependent. Only controller
 * selections are read, so calling this twice gives the same flags.
 */
export function recomputeVisibility(registry: FieldRegistry, rules: readonly VisibilityRule[]): void {
  for (const field of registry) field.hidden = false;

  for (const rule of rules) {
    const controller = registry.require(rule.controller);
    const selected = controller.selectedIndex;
    for (const dep of rule.dependents) {
      if (dep.tag === rule.controller) continue;
      registry.require(dep.tag).hidden = !dep.visibleWhen(selected);
    }
  }
}

/**
 * Check a rule table against a registry: every tag must exist, controllers
 * must be dropdowns and must not depend on themselves.
 */
export function validateRules(registry: FieldRegistry, rules: readonly VisibilityRule[]): void {
  for (const rule of rules) {
    const controller = registry.require(rule.controller);
    if (!controller.isDropdown) {
      throw new SchemaError(`Visibility controller ${rule.controller} must be a dropdown`);
    }
    for (const dep of rule.dependents) {
      if (dep.tag === rule.controller) {
        throw new SchemaError(`Visibility rule on ${rule.controller} lists itself as a dependent`);
      }
      registry.require(dep.tag);
    }
  }
}
