import { describe, it, expect } from "vitest";
import { FieldRegistry } from "../src/field-registry.js";
import {
  firstSelectable,
  lastSelectable,
  nextSelectable,
  prevSelectable,
  isSelectable,
  settle,
} from "../src/cursor.js";
import { recomputeVisibility } from "../src/visibility.js";
import { createPhoneSchema, lineTag, KeyFunction } from "../src/schema/phone-schema.js";

/**
 * Layout: 0 header, 1 a, 2 b (hidden), 3 header, 4 c, 5 d (hidden)
 */
function makeRegistry(): FieldRegistry {
  const registry = new FieldRegistry();
  registry.add({ label: "== ONE ==", kind: "header" });
  registry.add({ label: "A", tag: "a", kind: "optional" });
  registry.add({ label: "B", tag: "b", kind: "optional" });
  registry.add({ label: "== TWO ==", kind: "header" });
  registry.add({ label: "C", tag: "c", kind: "optional" });
  registry.add({ label: "D", tag: "d", kind: "optional" });
  registry.require("b").hidden = true;
  registry.require("d").hidden = true;
  return registry;
}

describe("cursor navigation", () => {
  it("finds the first and last selectable fields", () => {
    const registry = makeRegistry();
    expect(firstSelectable(registry)).toBe(1);
    expect(lastSelectable(registry)).toBe(4);
  });

  it("skips headers and hidden fields moving forward", () => {
    expect(nextSelectable(makeRegistry(), 1)).toBe(4);
  });

  it("skips headers and hidden fields moving backward", () => {
    expect(prevSelectable(makeRegistry(), 4)).toBe(1);
  });

  it("holds position at both boundaries", () => {
    const registry = makeRegistry();
    expect(nextSelectable(registry, 4)).toBe(4);
    expect(prevSelectable(registry, 1)).toBe(1);
  });

  it("clamps out-of-range starting points", () => {
    const registry = makeRegistry();
    expect(nextSelectable(registry, -10)).toBe(1);
    expect(prevSelectable(registry, 99)).toBe(4);
  });

  it("returns undefined when nothing is selectable", () => {
    const registry = new FieldRegistry();
    registry.add({ label: "== ONLY ==", kind: "header" });
    expect(firstSelectable(registry)).toBeUndefined();
    expect(nextSelectable(registry, 0)).toBeUndefined();
    expect(prevSelectable(registry, 0)).toBeUndefined();
  });

  it("settles a cursor that became hidden onto the nearest field, forward first", () => {
    const registry = makeRegistry();
    registry.require("c").hidden = true;
    expect(settle(registry, 4)).toBe(1);
    registry.require("c").hidden = false;
    expect(settle(registry, 2)).toBe(4);
    expect(settle(registry, 1)).toBe(1);
  });

  it("never lands on a header or hidden field across the phone schema", () => {
    const schema = createPhoneSchema();
    const registry = FieldRegistry.fromSchema(schema);
    registry.setSelected(lineTag(1, "lineType"), KeyFunction.Disabled);
    registry.setSelected(lineTag(2, "lineType"), KeyFunction.SpeedDial);
    recomputeVisibility(registry, schema.visibility);

    const first = firstSelectable(registry);
    const last = lastSelectable(registry);
    expect(first).toBeDefined();
    expect(last).toBeDefined();

    for (let from = -1; from <= registry.size; from++) {
      for (const step of [nextSelectable, prevSelectable]) {
        const to = step(registry, from);
        expect(to).toBeDefined();
        if (to === undefined || first === undefined || last === undefined) continue;
        expect(isSelectable(registry, to)).toBe(true);
        expect(to).toBeGreaterThanOrEqual(first);
        expect(to).toBeLessThanOrEqual(last);
      }
    }
  });
});
