// src/schema/phone-schema.ts — Form template for a SIP desk phone (SEP<MAC>.cnf.xml)
// Rows, visibility rules and the document layout are all declared here as data.

import { readFileSync } from "node:fs";
import { FieldRegistry } from "../field-registry.js";
import { groupRule, hideWhenOff, showOnlyWhen } from "../visibility.js";
import { SchemaError } from "../types.js";
import type {
  Condition,
  EmissionPolicy,
  EmissionRule,
  FieldOption,
  FieldSpec,
  FormSchema,
  VisibilityRule,
} from "../types.js";

export const IDENTITY_TAG = "device";
export const LINE_GROUP_COUNT = 4;
export const DEFAULT_SIP_PORT = "5060";
export const DEFAULT_TIME_ZONE_INDEX = 4; // Pacific

/** Option indices of a line group's key-function dropdown. */
export const KeyFunction = {
  Disabled: 0,
  Line: 1,
  SpeedDial: 2,
  Blf: 3,
} as const;

const FEATURE_ID_LINE = "9";
const FEATURE_ID_OTHER = "21";
const SERVER_TAGS = ["processNodeName1", "processNodeName2", "processNodeName3"];

// ─── Option lists ────────────────────────────────────────────────────────────

function pairs(labels: string[], values: string[]): FieldOption[] {
  return labels.map((label, i) => ({ label, value: values[i] ?? label }));
}

const DISABLED_ENABLED = pairs(["Disabled", "Enabled"], ["0", "1"]);
const NO_YES = pairs(["No", "Yes"], ["false", "true"]);
const TRANSPORTS = pairs(["UDP", "TCP", "TLS"], ["1", "2", "3"]);
const CODECS = pairs(
  ["G.711u (Standard US)", "G.711a (Standard EU)", "G.722 (HD Audio)", "G.729 (Compressed)"],
  ["PCMU", "PCMA", "G722", "G729"],
);
const DATE_FORMATS = pairs(["M/D/Y", "D/M/Y", "Y/M/D"], ["M/D/Y", "D/M/Y", "Y/M/D"]);
const TIME_FORMATS = pairs(["12 Hour", "24 Hour"], ["12", "24"]);
const BIT_RATES = pairs(["384k", "768k", "1.5M", "2.5M", "4M"], ["384", "768", "1500", "2500", "4000"]);
const KEY_FUNCTIONS = pairs(["Disabled", "Line", "SpeedDial", "BLF"], ["0", "1", "2", "3"]);
const LOCALE_VALUES = ["United_States", "United_Kingdom", "France", "Germany", "Spain"];
const USER_LOCALES = pairs(
  ["US (English)", "UK (English)", "France (French)", "Germany (German)", "Spain (Spanish)"],
  LOCALE_VALUES,
);
const NETWORK_LOCALES = pairs(
  ["United States", "United Kingdom", "France", "Germany", "Spain"],
  LOCALE_VALUES,
);
const BT_PROFILES = pairs(
  ["Handsfree Only", "Headset Only", "Both"],
  ["Handsfree", "Headset", "Handsfree,Headset"],
);
const DND_ALERTS = pairs(["None", "Flash Screen", "Beep", "Flash & Beep"], ["0", "5", "1", "2"]);
const PC_VLAN_MODES = pairs(
  ["Native / Untagged", "Tag with Voice VLAN", "Tag with Specific VLAN"],
  ["0", "1", "2"],
);
const PC_VLAN_SPECIFIC = 2;

let timeZoneCache: FieldOption[] | undefined;

/** Time zone choices from data/time-zones.json. */
export function loadTimeZones(): FieldOption[] {
  if (!timeZoneCache) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../../data/time-zones.json", import.meta.url), "utf-8"),
    );
    timeZoneCache = parseOptionList(raw, "time-zones.json");
  }
  return timeZoneCache;
}

export function parseOptionList(raw: unknown, source: string): FieldOption[] {
  if (!Array.isArray(raw)) throw new TypeError(`${source}: expected an array of options`);
  return raw.map((entry: unknown, i) => {
    if (
      typeof entry !== "object" || entry === null ||
      !("label" in entry) || !("value" in entry) ||
      typeof entry.label !== "string" || typeof entry.value !== "string"
    ) {
      throw new TypeError(`${source}: entry ${i} needs string "label" and "value"`);
    }
    return { label: entry.label, value: entry.value };
  });
}

// ─── Field builders ──────────────────────────────────────────────────────────

function header(label: string, help: string): FieldSpec {
  return { label, kind: "header", help };
}

function required(label: string, tag: string, help: string, extra: Partial<FieldSpec> = {}): FieldSpec {
  return { label, tag, kind: "mandatory", help, ...extra };
}

function optional(label: string, tag: string, help: string, extra: Partial<FieldSpec> = {}): FieldSpec {
  return { label, tag, kind: "optional", help, ...extra };
}

function dropdown(
  label: string,
  tag: string,
  help: string,
  options: FieldOption[],
  defaultIndex = 0,
  extra: Partial<FieldSpec> = {},
): FieldSpec {
  return { label, tag, kind: "optional", help, options, defaultIndex, ...extra };
}

export function lineTag(group: number, member: string): string {
  return `line${group}.${member}`;
}

function lineGroupFields(n: number): FieldSpec[] {
  const group = `line${n}`;
  const member = (element: string): Partial<FieldSpec> => ({ group, element });
  return [
    header(`=== BUTTON ${n} ===`, "Line Configuration"),
    dropdown(
      "Key Function",
      lineTag(n, "lineType"),
      "Choose 'Line' for a standard extension, 'SpeedDial' for one-touch calling, " +
        "or 'BLF' to watch whether a colleague is on the phone.",
      KEY_FUNCTIONS,
      n === 1 ? KeyFunction.Line : KeyFunction.Disabled,
      member("lineType"),
    ),
    optional("Extension", lineTag(n, "name"), "The phone number for this line (e.g. 1001).", member("name")),
    optional("Label", lineTag(n, "displayName"), "Label shown next to the button (e.g. 'Line 1').", member("displayName")),
    optional("Auth ID", lineTag(n, "authName"), "SIP username. Often the same as the extension; check with the provider.", member("authName")),
    optional("SIP Password", lineTag(n, "authPassword"), "SIP password for this extension.", member("authPassword")),
    dropdown(
      "Auto Answer",
      lineTag(n, "autoAnswerEnabled"),
      "When enabled the phone answers calls automatically on speaker.",
      DISABLED_ENABLED,
      0,
      member("autoAnswerEnabled"),
    ),
    optional("Forward All", lineTag(n, "callForwardURI"), "Number to forward every call to.", member("callForwardURI")),
    optional("Pickup Group", lineTag(n, "callPickupGroupURI"), "Code dialed to pick up a call ringing in your group.", member("callPickupGroupURI")),
    optional("Voicemail #", lineTag(n, "voiceMailPilot"), "Number dialed when the 'Messages' button is pressed.", member("voiceMailPilot")),
  ];
}

function phoneFields(): FieldSpec[] {
  const fields: FieldSpec[] = [
    header("=== IDENTITY & NETWORK ===", "Core system settings"),
    required("MAC Address", IDENTITY_TAG, "REQUIRED: the 12-character ID printed on the back of the phone.", {
      normalize: "identity",
    }),
    optional("Phone Label", "deviceLabel", "Text shown in the top status bar (e.g. 'Reception')."),
    required("Primary PBX IP", "processNodeName1", "REQUIRED: address of the SIP server / PBX (e.g. 192.168.1.10)."),
    optional("Secondary PBX", "processNodeName2", "Backup server address. Leave blank if none."),
    optional("Tertiary PBX", "processNodeName3", "Second backup server address. Leave blank if none."),
    dropdown(
      "Transport",
      "transportLayerProtocol",
      "Signaling transport. UDP is the usual choice; use TCP or TLS only when the provider requires it.",
      TRANSPORTS,
    ),
    optional(
      "Firmware Load",
      "loadInformation",
      "Firmware image to load (e.g. sip8941_45.9-4-2-13). Leave blank to use the TFTP server default.",
    ),
    optional("SIP Port", "voipControlPort", `Port for SIP signaling. Defaults to ${DEFAULT_SIP_PORT}.`),

    header("=== ETHERNET & VLAN ===", "Network layer 2 settings"),
    optional("Voice VLAN ID", "adminVlanId", "VLAN ID for voice traffic. Leave blank if the port is untagged."),
    dropdown(
      "PC Port VLAN Mode",
      "pcVoiceVlanAccess",
      "Which VLAN the computer plugged into the phone uses.",
      PC_VLAN_MODES,
    ),
    optional("PC VLAN ID", "pcPortVlanId", "VLAN ID for the computer (data VLAN)."),
    dropdown(
      "Span to PC",
      "spanToPCPort",
      "Copy all phone traffic to the PC port for packet capture. Can reduce network performance.",
      DISABLED_ENABLED,
    ),
    dropdown(
      "Gratuitous ARP",
      "gratuitousARP",
      "Send ARP updates on boot so routers learn where the phone is.",
      DISABLED_ENABLED,
      1,
    ),
    optional("MTU Size", "mtu", "Max transmission unit. 1500 is standard Ethernet; 1300-1400 suits VPNs."),

    header("=== SECURITY & ACCESS ===", "Device access control"),
    dropdown("Settings Lock", "settingsAccess", "Lock the on-screen Settings menu.", DISABLED_ENABLED, 1),
    dropdown("Web Access", "webAccess", "Enable the phone's web page.", DISABLED_ENABLED, 1),
    dropdown("SSH Access", "sshAccess", "Enable SSH for remote administration.", DISABLED_ENABLED),
    optional("SSH Username", "sshUserId", "Username for SSH login."),
    optional("SSH Password", "sshPassword", "Password for SSH login."),
    optional("Admin Password", "adminPassword", "Password that unlocks the Settings menu and web interface."),
    dropdown("PC Port", "pcPort", "Enable or disable the PC Ethernet port.", DISABLED_ENABLED, 1),

    header("=== HARDWARE ===", "Physical peripherals"),
    dropdown("Bluetooth", "bluetooth", "Enable the Bluetooth radio.", DISABLED_ENABLED, 1),
    dropdown("BT Profiles", "bluetoothProfile", "Allowed Bluetooth profiles.", BT_PROFILES, 2),

    header("=== AUDIO & VIDEO ===", "Codecs and call quality"),
    dropdown("Preferred Codec", "preferredCodec", "G.711 is standard; G.729 is compressed.", CODECS),
    dropdown("Advertise G.722", "advertiseG722Codec", "Advertise G.722 for HD calls.", DISABLED_ENABLED, 1),
    optional("Audio DSCP", "dscpForAudio", "QoS tag for voice packets. 184 (EF) is the usual value."),
    optional("RTP Min Port", "startMediaPort", "Start of the UDP media port range (default 16384)."),
    optional("RTP Max Port", "stopMediaPort", "End of the UDP media port range (default 32766)."),
    dropdown("Video Enable", "videoCapability", "Enable the camera for video calls.", NO_YES, 1),
    dropdown(
      "Start Video on Answer",
      "autoTransmitVideo",
      "'No' keeps a call audio-only until the Video button is pressed.",
      NO_YES,
    ),
    dropdown("Video Quality", "videoBitRate", "Maximum video bandwidth. 1.5M or more for 720p.", BIT_RATES, 2),
    optional("Video DSCP", "dscpForVideo", "QoS tag for video packets. 136 (AF41) is standard."),
    dropdown("RTCP Stats", "rtcp", "Send call quality reports to the SIP server.", DISABLED_ENABLED, 1),

    header("=== FEATURES ===", "Do Not Disturb & user features"),
    dropdown("Do Not Disturb", "dndControl", "Show the DND button on the main screen.", DISABLED_ENABLED, 1),
    dropdown("DND Alert", "dndCallAlert", "How incoming calls are signaled while DND is active.", DND_ALERTS, 1),
    optional("DND Timer", "dndReminderTimer", "Play a reminder tone every N minutes while DND is active."),
    dropdown(
      "NAT Enabled",
      "natEnabled",
      "Select 'Yes' when the phone sits behind a home router or firewall.",
      NO_YES,
    ),
    optional(
      "NAT Address",
      "natAddress",
      "Public IP address of the internet connection. Usually fixes one-way audio.",
    ),

    header("=== MONITORING ===", "SNMP & Syslog"),
    dropdown("SNMP Enable", "snmpEnabled", "Enable remote monitoring.", DISABLED_ENABLED),
    optional("Community String", "snmpCommunity", "SNMP community (e.g. public)."),
    optional("Syslog Server", "syslogAddr", "Address that receives debug logs (e.g. 192.168.1.50)."),

    header("=== REGION & TIME ===", "Localization"),
    dropdown("Language", "userLocale", "Screen language (loaded from the server).", USER_LOCALES),
    dropdown(
      "Dial Tones",
      "networkLocale",
      "Dial tone, busy and ringback frequencies. Must match your region.",
      NETWORK_LOCALES,
    ),
    optional("Dial Plan", "dialTemplate", "Dialing rules file (e.g. dialplan.xml)."),
    dropdown("Time Zone", "timeZone", "Local time zone.", loadTimeZones(), DEFAULT_TIME_ZONE_INDEX),
    optional("NTP Server", "ntpServer", "Time server (e.g. pool.ntp.org).", { element: "ntpServerAddr" }),
    dropdown("Date Format", "dateTemplate", "Date display format.", DATE_FORMATS),
    dropdown("Time Format", "timeFormat", "Clock format.", TIME_FORMATS),

    header("=== EXTERNAL URLS ===", "Integration links"),
    optional("Directory URL", "directoryURL", "URL of the corporate phone book."),
    optional("Services URL", "servicesURL", "URL of the Services menu."),
    optional("Auth URL", "authenticationURL", "URL that validates service requests."),
    optional("Info URL", "informationURL", "URL behind the '?' help button."),
    optional("Softkey Template", "softKeyFile", "Softkey layout file on the TFTP server (e.g. softkeys.xml)."),
    optional("Idle/Saver URL", "idleURL", "XML page shown as the screensaver."),
    optional("Saver Timeout", "idleTimeout", "Seconds before the screensaver starts. 0 disables it."),
    optional("Wallpaper URL", "backgroundImage", "Background image URL: 640x480 PNG, 24-bit color."),
  ];

  for (let n = 1; n <= LINE_GROUP_COUNT; n++) fields.push(...lineGroupFields(n));
  return fields;
}

// ─── Line groups ─────────────────────────────────────────────────────────────

/** One button block, found through the fields' `group` attribute. */
export interface LineGroup {
  /** 1-based position among the declared groups. */
  button: number;
  /** Tag of the group member emitted as `element`. */
  member(element: string): string;
}

export function lineGroups(fields: readonly FieldSpec[]): LineGroup[] {
  const layout = FieldRegistry.fromFields(fields);
  return layout.groups().map((group, i) => {
    const members = layout.groupMembers(group);
    return {
      button: i + 1,
      member(element: string): string {
        const field = members.find((f) => f.element === element);
        if (!field) throw new SchemaError(`Group ${group} has no "${element}" field`);
        return field.tag;
      },
    };
  });
}

// ─── Visibility rules ────────────────────────────────────────────────────────

function phoneVisibility(groups: readonly LineGroup[]): VisibilityRule[] {
  const rules: VisibilityRule[] = [];
  const notDisabled = (i: number): boolean => i !== KeyFunction.Disabled;
  const lineOnly = (i: number): boolean => i === KeyFunction.Line;

  for (const g of groups) {
    rules.push(
      groupRule(g.member("lineType"), {
        [g.member("name")]: notDisabled,
        [g.member("displayName")]: notDisabled,
        [g.member("authName")]: lineOnly,
        [g.member("authPassword")]: lineOnly,
        [g.member("autoAnswerEnabled")]: lineOnly,
        [g.member("callForwardURI")]: lineOnly,
        [g.member("callPickupGroupURI")]: lineOnly,
        [g.member("voiceMailPilot")]: lineOnly,
      }),
    );
  }

  rules.push(hideWhenOff("snmpEnabled", "snmpCommunity"));
  rules.push(hideWhenOff("natEnabled", "natAddress"));
  rules.push(showOnlyWhen("pcVoiceVlanAccess", "pcPortVlanId", PC_VLAN_SPECIFIC));
  return rules;
}

// ─── Document layout ─────────────────────────────────────────────────────────

const FILLED: Condition = { filled: true };

function constant(element: string, value: string): EmissionRule {
  return { kind: "constant", element, value };
}

function text(tag: string, policy: EmissionPolicy = "non-empty", element?: string): EmissionRule {
  return { kind: "value", tag, policy, element };
}

function choice(tag: string, element?: string): EmissionRule {
  return { kind: "choice", tag, element };
}

function el(element: string, children: EmissionRule[], attributes?: Record<string, string>): EmissionRule {
  return { kind: "element", element, children, attributes };
}

function when(tag: string, condition: Condition, then: EmissionRule[]): EmissionRule {
  return { kind: "when", tag, condition, then };
}

/** Priority follows declaration position, not how many servers are filled. */
function serverMember(tag: string, priority: number): EmissionRule {
  return when(tag, FILLED, [
    el(
      "member",
      [
        el("callManager", [
          el("ports", [
            {
              kind: "value",
              tag: "voipControlPort",
              element: "ethernetPhonePort",
              policy: "always",
              fallback: DEFAULT_SIP_PORT,
            },
          ]),
          text(tag, "always", "processNodeName"),
        ]),
      ],
      { priority: String(priority) },
    ),
  ]);
}

function lineEntry(g: LineGroup): EmissionRule {
  const controller = g.member("lineType");
  return when(controller, { selectedIsNot: KeyFunction.Disabled }, [
    el(
      "line",
      [
        when(controller, { selectedIs: KeyFunction.Line }, [constant("featureID", FEATURE_ID_LINE)]),
        when(controller, { selectedIsNot: KeyFunction.Line }, [constant("featureID", FEATURE_ID_OTHER)]),
        text(g.member("name"), "always"),
        text(g.member("displayName"), "always"),
        when(controller, { selectedIs: KeyFunction.Line }, [
          text(g.member("authName"), "always"),
          text(g.member("authPassword"), "always"),
          when(g.member("autoAnswerEnabled"), { selectedIs: 1 }, [
            constant("autoAnswerEnabled", "2"),
            constant("autoAnswerTimer", "1"),
          ]),
          text(g.member("callForwardURI")),
          text(g.member("callPickupGroupURI")),
          text(g.member("voiceMailPilot")),
        ]),
      ],
      { button: String(g.button) },
    ),
  ]);
}

function phoneDocument(groups: readonly LineGroup[]): EmissionRule[] {
  return [
    constant("deviceProtocol", "SIP"),
    text("deviceLabel"),
    text("loadInformation"),
    el("callManagerGroup", [el("members", SERVER_TAGS.map((tag, i) => serverMember(tag, i)))]),
    el("dateTimeSetting", [
      text("ntpServer"),
      choice("timeZone"),
      { kind: "choice", tag: "dateTemplate", policy: "non-empty" },
      { kind: "choice", tag: "timeFormat", policy: "non-empty" },
    ]),
    el("sipStack", [
      choice("transportLayerProtocol"),
      when("natEnabled", { selectedIs: 1 }, [constant("natEnabled", "true"), text("natAddress", "always")]),
    ]),
    el("userLocale", [choice("userLocale", "name"), choice("userLocale", "langCode")]),
    choice("networkLocale"),
    el("ethernetConfig", [
      text("adminVlanId"),
      when("pcVoiceVlanAccess", { selectedIs: PC_VLAN_SPECIFIC }, [text("pcPortVlanId")]),
    ]),
    el("sipLines", groups.map(lineEntry)),
    el("vendorConfig", [
      choice("settingsAccess"),
      choice("webAccess"),
      choice("sshAccess"),
      text("sshUserId"),
      text("sshPassword"),
      text("adminPassword"),
      choice("pcPort"),
      choice("pcVoiceVlanAccess"),
      choice("spanToPCPort"),
      choice("gratuitousARP"),
      choice("bluetooth"),
      choice("bluetoothProfile"),
      choice("preferredCodec"),
      choice("advertiseG722Codec"),
      text("dscpForAudio"),
      when("startMediaPort", FILLED, [text("startMediaPort", "always"), text("stopMediaPort", "always")]),
      choice("videoCapability"),
      choice("autoTransmitVideo"),
      choice("videoBitRate"),
      text("dscpForVideo"),
      choice("rtcp"),
      choice("dndControl"),
      choice("dndCallAlert"),
      text("dndReminderTimer"),
      when("snmpEnabled", { selectedIs: 1 }, [constant("snmpEnable", "1"), text("snmpCommunity", "always")]),
      text("syslogAddr"),
      text("directoryURL"),
      text("servicesURL"),
      text("authenticationURL"),
      text("informationURL"),
      text("dialTemplate"),
      text("softKeyFile"),
      text("idleURL"),
      text("idleTimeout"),
      text("backgroundImage"),
    ]),
    text("mtu"),
  ];
}

export function createPhoneSchema(): FormSchema {
  const fields = phoneFields();
  const groups = lineGroups(fields);
  return {
    name: "SIP desk phone",
    fields,
    visibility: phoneVisibility(groups),
    identityTag: IDENTITY_TAG,
    document: { root: "device", rules: phoneDocument(groups) },
  };
}
