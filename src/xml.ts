// src/xml.ts — Minimal element tree and its deterministic text form
// Leaves render on one line; containers open and close on their own lines, even when empty.

export interface XmlLeaf {
  type: "leaf";
  name: string;
  attributes: [string, string][];
  text: string;
}

export interface XmlContainer {
  type: "container";
  name: string;
  attributes: [string, string][];
  children: XmlNode[];
}

export type XmlNode = XmlLeaf | XmlContainer;

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const INDENT = "  ";

export function leaf(name: string, text: string, attributes: Record<string, string> = {}): XmlLeaf {
  return { type: "leaf", name, attributes: Object.entries(attributes), text };
}

export function container(
  name: string,
  children: XmlNode[] = [],
  attributes: Record<string, string> = {},
): XmlContainer {
  return { type: "container", name, attributes: Object.entries(attributes), children };
}

/** Characters XML 1.0 cannot carry at all, escaped or not. */
const FORBIDDEN_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

export function escapeXml(text: string): string {
  return text
    .replace(FORBIDDEN_CHARS, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Render a document: declaration line, the tree, trailing newline. */
export function renderXml(root: XmlNode): string {
  const lines: string[] = [XML_DECLARATION];
  renderNode(root, 0, lines);
  return lines.join("\n") + "\n";
}

function renderNode(node: XmlNode, depth: number, out: string[]): void {
  const pad = INDENT.repeat(depth);
  const open = `<${node.name}${renderAttributes(node.attributes)}>`;
  if (node.type === "leaf") {
    out.push(`${pad}${open}${escapeXml(node.text)}</${node.name}>`);
    return;
  }
  out.push(`${pad}${open}`);
  for (const child of node.children) renderNode(child, depth + 1, out);
  out.push(`${pad}</${node.name}>`);
}

function renderAttributes(attributes: [string, string][]): string {
  return attributes.map(([k, v]) => ` ${k}="${escapeXml(v)}"`).join("");
}

/** Depth-first walk; returns the first node with the given name. */
export function findNode(root: XmlNode, name: string): XmlNode | undefined {
  if (root.name === name) return root;
  if (root.type === "leaf") return undefined;
  for (const child of root.children) {
    const hit = findNode(child, name);
    if (hit) return hit;
  }
  return undefined;
}

/** Copy of the tree with every leaf's text replaced by `fn(leaf)`. */
export function mapLeaves(root: XmlNode, fn: (leaf: XmlLeaf) => string): XmlNode {
  if (root.type === "leaf") return { ...root, text: fn(root) };
  return { ...root, children: root.children.map((c) => mapLeaves(c, fn)) };
}
