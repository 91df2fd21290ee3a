/**
 * packages/core/src/vdom/html.ts — Serializes a virtual DOM tree to HTML.
 *
 * Multiple `class` attributes merge into one, inline styles merge into one
 * `style` attribute, and properties (which have no markup form) are dropped.
 * Text inside `style` elements is raw text: only `</` is rewritten, as `<\/`,
 * so the content cannot close its element.
 */

import type { VAttr, VNode } from "./types.js";

const VOID_TAGS: ReadonlySet<string> = new Set(["area", "br", "col", "embed", "hr", "img", "input", "meta", "source", "wbr"]);

const RAW_TEXT_TAGS: ReadonlySet<string> = new Set(["style", "script"]);

export function escapeText(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function escapeRawText(text: string): string {
  return text.replace(/<\//g, "<\\/");
}

export function escapeAttr(value: string): string {
  return escapeText(value).replace(/"/g, "&quot;");
}

export type OrganizedAttrs = Readonly<{
  className: string | null;
  style: string | null;
  attributes: readonly (readonly [name: string, value: string])[];
}>;

/** Merges class and style fragments; later plain attributes keep their order. */
export function organizeAttrs(attrs: readonly VAttr[]): OrganizedAttrs {
  const classNames: string[] = [];
  const styles: string[] = [];
  const attributes: (readonly [string, string])[] = [];
  for (const a of attrs) {
    switch (a.kind) {
      case "class":
        if (a.value.trim().length > 0) classNames.push(a.value.trim());
        break;
      case "style":
        styles.push(`${a.key}:${a.value}`);
        break;
      case "attr":
        attributes.push([a.name, a.value]);
        break;
      case "prop":
        break;
    }
  }
  return {
    className: classNames.length === 0 ? null : classNames.join(" "),
    style: styles.length === 0 ? null : `${styles.join(";")};`,
    attributes,
  };
}

function openTag(tag: string, attrs: readonly VAttr[]): string {
  const organized = organizeAttrs(attrs);
  let out = `<${tag}`;
  if (organized.className !== null) out += ` class="${escapeAttr(organized.className)}"`;
  if (organized.style !== null) out += ` style="${escapeAttr(organized.style)}"`;
  for (const [name, value] of organized.attributes) out += ` ${name}="${escapeAttr(value)}"`;
  return `${out}>`;
}

function render(node: VNode, rawText: boolean): string {
  switch (node.kind) {
    case "text":
      return rawText ? escapeRawText(node.text) : escapeText(node.text);
    case "node":
    case "keyed": {
      const open = openTag(node.tag, node.attrs);
      if (VOID_TAGS.has(node.tag)) return open;
      const raw = RAW_TEXT_TAGS.has(node.tag);
      const inner =
        node.kind === "node"
          ? node.children.map((c) => render(c, raw)).join("")
          : node.children.map(([, c]) => render(c, raw)).join("");
      return `${open}${inner}</${node.tag}>`;
    }
  }
}

export function renderToHtml(node: VNode): string {
  return render(node, false);
}
