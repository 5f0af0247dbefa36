import { describe, it, expect } from "vitest";
import { FieldRegistry } from "../src/field-registry.js";
import { InvalidValueError, SchemaError, UnknownTagError } from "../src/types.js";

const ON_OFF = [
  { label: "Disabled", value: "0" },
  { label: "Enabled", value: "1" },
];

function makeRegistry(): FieldRegistry {
  const registry = new FieldRegistry();
  registry.add({ label: "=== NETWORK ===", kind: "header" });
  registry.add({ label: "MAC Address", tag: "device", kind: "mandatory", normalize: "identity" });
  registry.add({ label: "Phone Label", tag: "deviceLabel", kind: "optional", help: "Status bar text" });
  registry.addDropdown("SNMP Enable", "snmpEnabled", ON_OFF, 1);
  return registry;
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe("FieldRegistry.add", () => {
  it("returns stable indices in insertion order", () => {
    const registry = new FieldRegistry();
    expect(registry.add({ label: "A", tag: "a", kind: "optional" })).toBe(0);
    expect(registry.add({ label: "== H ==", kind: "header" })).toBe(1);
    expect(registry.add({ label: "B", tag: "b", kind: "optional" })).toBe(2);
    expect(registry.size).toBe(3);
    expect(registry.at(2)?.tag).toBe("b");
  });

  it("rejects duplicate tags", () => {
    const registry = makeRegistry();
    expect(() => registry.add({ label: "Again", tag: "device", kind: "optional" })).toThrow(SchemaError);
  });

  it("allows many headers without tags but requires tags elsewhere", () => {
    const registry = new FieldRegistry();
    registry.add({ label: "== A ==", kind: "header" });
    registry.add({ label: "== B ==", kind: "header" });
    expect(() => registry.add({ label: "Untagged", kind: "optional" })).toThrow(SchemaError);
  });

  it("defaults the element name to the tag", () => {
    const registry = new FieldRegistry();
    registry.add({ label: "NTP", tag: "ntpServer", kind: "optional", element: "ntpServerAddr" });
    registry.add({ label: "Syslog", tag: "syslogAddr", kind: "optional" });
    expect(registry.require("ntpServer").element).toBe("ntpServerAddr");
    expect(registry.require("syslogAddr").element).toBe("syslogAddr");
  });
});

describe("FieldRegistry.addDropdown", () => {
  it("sets the value to the default option's label", () => {
    const registry = makeRegistry();
    const snmp = registry.require("snmpEnabled");
    expect(snmp.value).toBe("Enabled");
    expect(snmp.selectedIndex).toBe(1);
    expect(snmp.kind).toBe("optional");
    expect(snmp.isDropdown).toBe(true);
  });
});

describe("lookup and require", () => {
  it("returns undefined from lookup for an unknown tag", () => {
    expect(makeRegistry().lookup("nope")).toBeUndefined();
  });

  it("throws UnknownTagError from require", () => {
    expect(() => makeRegistry().require("nope")).toThrow(UnknownTagError);
  });

  it("does not index headers", () => {
    expect(makeRegistry().lookup("")).toBeUndefined();
  });
});

describe("selectedSerializedValue", () => {
  it("returns the serialized value of the selection", () => {
    expect(makeRegistry().selectedSerializedValue("snmpEnabled")).toBe("1");
  });

  it("returns an empty string for free-text fields and unknown tags", () => {
    const registry = makeRegistry();
    registry.setValue("deviceLabel", "Reception");
    expect(registry.selectedSerializedValue("deviceLabel")).toBe("");
    expect(registry.selectedSerializedValue("missing")).toBe("");
  });
});

describe("setValue", () => {
  it("stores free text by tag or index", () => {
    const registry = makeRegistry();
    registry.setValue("deviceLabel", "Reception");
    expect(registry.require("deviceLabel").value).toBe("Reception");
    registry.setValue(2, "Lobby");
    expect(registry.require("deviceLabel").value).toBe("Lobby");
  });

  it("normalizes identity fields on commit", () => {
    const registry = makeRegistry();
    registry.setValue("device", "aa:bb:cc:11:22:33");
    expect(registry.require("device").value).toBe("AABBCC112233");
  });

  it("selects a dropdown option by label or serialized value and keeps value in sync", () => {
    const registry = makeRegistry();
    registry.setValue("snmpEnabled", "Disabled");
    expect(registry.require("snmpEnabled").value).toBe("Disabled");
    registry.setValue("snmpEnabled", "1");
    expect(registry.require("snmpEnabled").value).toBe("Enabled");
    expect(registry.require("snmpEnabled").selectedIndex).toBe(1);
  });

  it("rejects unknown dropdown options and header targets", () => {
    const registry = makeRegistry();
    expect(() => registry.setValue("snmpEnabled", "Maybe")).toThrow(InvalidValueError);
    expect(() => registry.setValue(0, "x")).toThrow(InvalidValueError);
    expect(() => registry.setValue(99, "x")).toThrow(RangeError);
  });
});

describe("setSelected", () => {
  it("updates index and label together", () => {
    const registry = makeRegistry();
    registry.setSelected("snmpEnabled", 0);
    const snmp = registry.require("snmpEnabled");
    expect(snmp.selectedIndex).toBe(0);
    expect(snmp.value).toBe("Disabled");
    expect(snmp.serializedValue).toBe("0");
  });

  it("refuses out-of-range indices without changing the selection", () => {
    const registry = makeRegistry();
    expect(() => registry.setSelected("snmpEnabled", 2)).toThrow(InvalidValueError);
    expect(registry.require("snmpEnabled").selectedIndex).toBe(1);
  });

  it("refuses free-text fields", () => {
    expect(() => makeRegistry().setSelected("deviceLabel", 0)).toThrow(InvalidValueError);
  });
});

describe("groups and rows", () => {
  it("lists group members and group ids in registry order", () => {
    const registry = new FieldRegistry();
    registry.addDropdown("Key Function", "line1.lineType", ON_OFF, 0, { group: "line1", element: "lineType" });
    registry.add({ label: "Extension", tag: "line1.name", kind: "optional", group: "line1", element: "name" });
    registry.add({ label: "Extension", tag: "line2.name", kind: "optional", group: "line2", element: "name" });
    expect(registry.groups()).toEqual(["line1", "line2"]);
    expect(registry.groupMembers("line1").map((f) => f.tag)).toEqual(["line1.lineType", "line1.name"]);
  });

  it("projects label, value, hidden and kind for every field", () => {
    const registry = makeRegistry();
    registry.require("deviceLabel").hidden = true;
    const rows = registry.rows();
    expect(rows).toHaveLength(4);
    expect(rows[2]).toEqual({
      index: 2,
      tag: "deviceLabel",
      label: "Phone Label",
      value: "",
      kind: "optional",
      hidden: true,
      help: "Status bar text",
      isDropdown: false,
    });
    expect(registry.visibleRows().map((r) => r.index)).toEqual([0, 1, 3]);
  });
});
