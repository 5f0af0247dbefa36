import { describe, it, expect } from "vitest";
import { FieldRegistry } from "../src/field-registry.js";
import { recomputeVisibility } from "../src/visibility.js";
import { checkMandatoryFields, serializeDevice } from "../src/serializer.js";
import { createPhoneSchema, lineGroups, lineTag, KeyFunction } from "../src/schema/phone-schema.js";
import { SchemaError, ShapeError } from "../src/types.js";
import type { FieldSpec, FormSchema } from "../src/types.js";

const schema: FormSchema = createPhoneSchema();

function phone(values: Record<string, string> = {}): FieldRegistry {
  const registry = FieldRegistry.fromSchema(schema);
  registry.setValue("device", "AABBCC112233");
  for (const [tag, value] of Object.entries(values)) registry.setValue(tag, value);
  recomputeVisibility(registry, schema.visibility);
  return registry;
}

function lines(registry: FieldRegistry): string[] {
  return serializeDevice(registry, schema).content.split("\n");
}

/** Lines strictly between `<open>` and its matching close at the same indent. */
function section(all: string[], open: string): string[] {
  const start = all.findIndex((l) => l.trim() === open);
  if (start < 0) return [];
  const indent = all[start].length - all[start].trimStart().length;
  const name = open.slice(1).split(/[ >]/)[0];
  const end = all.findIndex((l, i) => i > start && l === `${" ".repeat(indent)}</${name}>`);
  return all.slice(start + 1, end);
}

// ─── Full document ───────────────────────────────────────────────────────────

const DEFAULT_DOCUMENT = `<?xml version="1.0" encoding="UTF-8"?>
<device>
  <deviceProtocol>SIP</deviceProtocol>
  <callManagerGroup>
    <members>
    </members>
  </callManagerGroup>
  <dateTimeSetting>
    <timeZone>Pacific Standard/Daylight Time</timeZone>
    <dateTemplate>M/D/Y</dateTemplate>
    <timeFormat>12</timeFormat>
  </dateTimeSetting>
  <sipStack>
    <transportLayerProtocol>1</transportLayerProtocol>
  </sipStack>
  <userLocale>
    <name>United_States</name>
    <langCode>United_States</langCode>
  </userLocale>
  <networkLocale>United_States</networkLocale>
  <ethernetConfig>
  </ethernetConfig>
  <sipLines>
    <line button="1">
      <featureID>9</featureID>
      <name></name>
      <displayName></displayName>
      <authName></authName>
      <authPassword></authPassword>
    </line>
  </sipLines>
  <vendorConfig>
    <settingsAccess>1</settingsAccess>
    <webAccess>1</webAccess>
    <sshAccess>0</sshAccess>
    <pcPort>1</pcPort>
    <pcVoiceVlanAccess>0</pcVoiceVlanAccess>
    <spanToPCPort>0</spanToPCPort>
    <gratuitousARP>1</gratuitousARP>
    <bluetooth>1</bluetooth>
    <bluetoothProfile>Handsfree,Headset</bluetoothProfile>
    <preferredCodec>PCMU</preferredCodec>
    <advertiseG722Codec>1</advertiseG722Codec>
    <videoCapability>true</videoCapability>
    <autoTransmitVideo>false</autoTransmitVideo>
    <videoBitRate>1500</videoBitRate>
    <rtcp>1</rtcp>
    <dndControl>1</dndControl>
    <dndCallAlert>5</dndCallAlert>
  </vendorConfig>
</device>
`;

describe("serializeDevice", () => {
  it("renders the default document exactly", () => {
    const doc = serializeDevice(phone(), schema);
    expect(doc.identity).toBe("AABBCC112233");
    expect(doc.fileName).toBe("SEPAABBCC112233.cnf.xml");
    expect(doc.content).toBe(DEFAULT_DOCUMENT);
  });

  it("is deterministic for the same registry state", () => {
    const registry = phone({ processNodeName1: "10.0.0.5", deviceLabel: "Reception" });
    expect(serializeDevice(registry, schema).content).toBe(serializeDevice(registry, schema).content);
  });

  it("throws ShapeError before building anything when the identity is short", () => {
    const registry = FieldRegistry.fromSchema(schema);
    registry.setValue("device", "AABBCC");
    expect(() => serializeDevice(registry, schema)).toThrow(ShapeError);
    expect(() => serializeDevice(registry, schema)).toThrow(
      'MAC address must be exactly 12 hexadecimal characters (got 6: "AABBCC")',
    );
  });

  it("throws ShapeError when the identity is empty", () => {
    expect(() => serializeDevice(FieldRegistry.fromSchema(schema), schema)).toThrow(ShapeError);
  });
});

// ─── Servers ─────────────────────────────────────────────────────────────────

describe("call manager members", () => {
  it("emits a member for the primary server with the default SIP port", () => {
    expect(section(lines(phone({ processNodeName1: "10.0.0.5" })), "<members>")).toEqual([
      '      <member priority="0">',
      "        <callManager>",
      "          <ports>",
      "            <ethernetPhonePort>5060</ethernetPhonePort>",
      "          </ports>",
      "          <processNodeName>10.0.0.5</processNodeName>",
      "        </callManager>",
      "      </member>",
    ]);
  });

  it("uses the configured SIP port for every member", () => {
    const all = lines(phone({ processNodeName1: "10.0.0.5", processNodeName2: "10.0.0.6", voipControlPort: "5080" }));
    expect(all.filter((l) => l.includes("ethernetPhonePort"))).toEqual([
      "            <ethernetPhonePort>5080</ethernetPhonePort>",
      "            <ethernetPhonePort>5080</ethernetPhonePort>",
    ]);
  });

  it("keeps the declared priority when an earlier server is blank", () => {
    const all = lines(phone({ processNodeName3: "10.0.0.7" }));
    expect(all.filter((l) => l.includes("<member "))).toEqual(['      <member priority="2">']);
  });
});

// ─── Lines ───────────────────────────────────────────────────────────────────

describe("line entries", () => {
  it("emits a full Line entry with auto answer and forwarding", () => {
    const registry = phone({
      [lineTag(1, "name")]: "1001",
      [lineTag(1, "displayName")]: "Front Desk",
      [lineTag(1, "authName")]: "1001",
      [lineTag(1, "authPassword")]: "test-secret",
      [lineTag(1, "autoAnswerEnabled")]: "Enabled",
      [lineTag(1, "callForwardURI")]: "2002",
      [lineTag(1, "voiceMailPilot")]: "*97",
    });
    expect(section(lines(registry), '<line button="1">')).toEqual([
      "      <featureID>9</featureID>",
      "      <name>1001</name>",
      "      <displayName>Front Desk</displayName>",
      "      <authName>1001</authName>",
      "      <authPassword>test-secret</authPassword>",
      "      <autoAnswerEnabled>2</autoAnswerEnabled>",
      "      <autoAnswerTimer>1</autoAnswerTimer>",
      "      <callForwardURI>2002</callForwardURI>",
      "      <voiceMailPilot>*97</voiceMailPilot>",
    ]);
  });

  it("emits a speed dial with feature 21 and no credentials", () => {
    const registry = phone({
      [lineTag(2, "lineType")]: "SpeedDial",
      [lineTag(2, "name")]: "5551234",
      [lineTag(2, "displayName")]: "Lobby",
      [lineTag(2, "authPassword")]: "leftover",
    });
    expect(section(lines(registry), '<line button="2">')).toEqual([
      "      <featureID>21</featureID>",
      "      <name>5551234</name>",
      "      <displayName>Lobby</displayName>",
    ]);
  });

  it("omits disabled buttons entirely", () => {
    const registry = phone();
    registry.setSelected(lineTag(1, "lineType"), KeyFunction.Disabled);
    expect(section(lines(registry), "<sipLines>")).toEqual([]);
  });

  it("numbers buttons by group position", () => {
    const registry = phone({ [lineTag(4, "lineType")]: "BLF" });
    const buttons = lines(registry).filter((l) => l.includes("<line "));
    expect(buttons).toEqual(['    <line button="1">', '    <line button="4">']);
  });
});

describe("lineGroups", () => {
  it("numbers the phone's groups in declaration order", () => {
    const groups = lineGroups(schema.fields);
    expect(groups.map((g) => g.button)).toEqual([1, 2, 3, 4]);
    expect(groups[2].member("authName")).toBe(lineTag(3, "authName"));
  });

  it("finds members by element name, not by tag", () => {
    const fields: FieldSpec[] = [
      { label: "Front", tag: "front.kind", element: "lineType", kind: "optional", group: "front" },
      { label: "Back", tag: "back.kind", element: "lineType", kind: "optional", group: "back" },
      { label: "Back label", tag: "back.label", element: "name", kind: "optional", group: "back" },
    ];
    const groups = lineGroups(fields);
    expect(groups.map((g) => g.button)).toEqual([1, 2]);
    expect(groups[1].member("lineType")).toBe("back.kind");
    expect(groups[1].member("name")).toBe("back.label");
  });

  it("throws SchemaError for a group without the requested member", () => {
    const fields: FieldSpec[] = [
      { label: "Only", tag: "solo.kind", element: "lineType", kind: "optional", group: "solo" },
    ];
    expect(() => lineGroups(fields)[0].member("name")).toThrow(SchemaError);
    expect(() => lineGroups(fields)[0].member("name")).toThrow('Group solo has no "name" field');
  });
});

// ─── Gated sections ──────────────────────────────────────────────────────────

describe("gated settings", () => {
  it("writes the NTP server under ntpServerAddr", () => {
    const all = lines(phone({ ntpServer: "pool.ntp.example" }));
    expect(section(all, "<dateTimeSetting>")[0]).toBe("    <ntpServerAddr>pool.ntp.example</ntpServerAddr>");
  });

  it("emits NAT settings only while NAT is enabled", () => {
    const registry = phone({ natAddress: "203.0.113.9" });
    expect(section(lines(registry), "<sipStack>")).toEqual(["    <transportLayerProtocol>1</transportLayerProtocol>"]);
    registry.setValue("natEnabled", "Yes");
    expect(section(lines(registry), "<sipStack>")).toEqual([
      "    <transportLayerProtocol>1</transportLayerProtocol>",
      "    <natEnabled>true</natEnabled>",
      "    <natAddress>203.0.113.9</natAddress>",
    ]);
  });

  it("follows the PC VLAN mode on, off and on again", () => {
    const registry = phone({ adminVlanId: "100", pcPortVlanId: "200" });
    const ethernet = (): string[] => section(lines(registry), "<ethernetConfig>");

    expect(ethernet()).toEqual(["    <adminVlanId>100</adminVlanId>"]);
    registry.setSelected("pcVoiceVlanAccess", 2);
    expect(ethernet()).toEqual(["    <adminVlanId>100</adminVlanId>", "    <pcPortVlanId>200</pcPortVlanId>"]);
    registry.setSelected("pcVoiceVlanAccess", 1);
    expect(ethernet()).toEqual(["    <adminVlanId>100</adminVlanId>"]);
    registry.setSelected("pcVoiceVlanAccess", 2);
    expect(ethernet()).toEqual(["    <adminVlanId>100</adminVlanId>", "    <pcPortVlanId>200</pcPortVlanId>"]);
  });

  it("emits the media port range only when the start port is set", () => {
    const registry = phone({ stopMediaPort: "32766" });
    expect(lines(registry).some((l) => l.includes("MediaPort"))).toBe(false);
    registry.setValue("startMediaPort", "16384");
    expect(lines(registry).filter((l) => l.includes("MediaPort"))).toEqual([
      "    <startMediaPort>16384</startMediaPort>",
      "    <stopMediaPort>32766</stopMediaPort>",
    ]);
  });

  it("places the SNMP community after the enable flag", () => {
    const registry = phone({ snmpEnabled: "Enabled", snmpCommunity: "public" });
    const all = lines(registry);
    const at = all.indexOf("    <snmpEnable>1</snmpEnable>");
    expect(at).toBeGreaterThan(0);
    expect(all[at + 1]).toBe("    <snmpCommunity>public</snmpCommunity>");
  });

  it("writes MTU last, after vendorConfig", () => {
    const all = lines(phone({ mtu: "1400" }));
    expect(all.slice(-4)).toEqual(["  </vendorConfig>", "  <mtu>1400</mtu>", "</device>", ""]);
  });

  it("escapes markup in free-text values", () => {
    const all = lines(phone({ deviceLabel: "R&D <2nd>" }));
    expect(all[3]).toBe("  <deviceLabel>R&amp;D &lt;2nd&gt;</deviceLabel>");
  });
});

// ─── Mandatory fields ────────────────────────────────────────────────────────

describe("checkMandatoryFields", () => {
  it("warns about an empty primary server but not the identity", () => {
    const registry = FieldRegistry.fromSchema(schema);
    expect(checkMandatoryFields(registry, schema)).toEqual([
      {
        level: "warn",
        module: "serializer",
        tag: "processNodeName1",
        message: "Primary PBX IP (processNodeName1) is required but empty",
      },
    ]);
  });

  it("returns nothing once required fields are filled", () => {
    expect(checkMandatoryFields(phone({ processNodeName1: "10.0.0.5" }), schema)).toEqual([]);
  });
});
