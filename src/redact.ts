// src/redact.ts — Mask secret element values before a document is printed

import picomatch from "picomatch";
import { mapLeaves } from "./xml.js";
import type { XmlNode } from "./xml.js";

export const DEFAULT_REDACT_PATTERNS = ["*Password", "snmpCommunity"];
export const REDACTED = "********";

/** Empty values stay empty so the output still shows which secrets are unset. */
export function redactDocument(root: XmlNode, patterns: string[]): XmlNode {
  if (patterns.length === 0) return root;
  const isSecret = picomatch(patterns);
  return mapLeaves(root, (node) => (node.text !== "" && isSecret(node.name) ? REDACTED : node.text));
}
