import { describe, it, expect } from "vitest";
import { OptionSet } from "../src/option-set.js";

const TRANSPORTS = [
  { label: "UDP", value: "1" },
  { label: "TCP", value: "2" },
  { label: "TLS", value: "3" },
];

describe("OptionSet", () => {
  it("starts at the default index and mirrors label and value", () => {
    const set = new OptionSet(TRANSPORTS, 2);
    expect(set.selectedIndex).toBe(2);
    expect(set.selectedLabel).toBe("TLS");
    expect(set.selectedValue).toBe("3");
    expect(set.size).toBe(3);
  });

  it("rejects an empty option list and an out-of-range default", () => {
    expect(() => new OptionSet([])).toThrow(RangeError);
    expect(() => new OptionSet(TRANSPORTS, 3)).toThrow(RangeError);
    expect(() => new OptionSet(TRANSPORTS, -1)).toThrow(RangeError);
  });

  it("keeps the selection when select() gets a bad index", () => {
    const set = new OptionSet(TRANSPORTS, 1);
    expect(set.select(5)).toBe(false);
    expect(set.select(1.5)).toBe(false);
    expect(set.selectedIndex).toBe(1);
    expect(set.select(0)).toBe(true);
    expect(set.selectedLabel).toBe("UDP");
  });

  it("cycles in both directions with wrap-around", () => {
    const set = new OptionSet(TRANSPORTS, 0);
    set.cycle(-1);
    expect(set.selectedLabel).toBe("TLS");
    set.cycle(1);
    expect(set.selectedLabel).toBe("UDP");
    set.cycle(4);
    expect(set.selectedLabel).toBe("TCP");
  });

  it("finds options by label before value", () => {
    const set = new OptionSet([
      { label: "1", value: "one" },
      { label: "uno", value: "1" },
    ]);
    expect(set.indexOf("1")).toBe(0);
    expect(set.indexOf("one")).toBe(0);
    expect(set.indexOf("uno")).toBe(1);
    expect(set.indexOf("missing")).toBe(-1);
  });

  it("copies the options so later edits to the source do not leak in", () => {
    const source = [{ label: "A", value: "a" }];
    const set = new OptionSet(source);
    source[0].label = "changed";
    expect(set.selectedLabel).toBe("A");
  });
});
