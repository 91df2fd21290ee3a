/**
 * packages/core/src/element/root.ts — Document roots.
 *
 * Why: A root is the only place styles stop hoisting. It resolves the layout
 * options, applies the root defaults (transparent background, black text,
 * 20px Open Sans stack) and embeds the stylesheets as its first children.
 */

import {
  DEFAULT_LAYOUT_OPTIONS,
  type LayoutOption,
  type LayoutOptions,
  resolveOptions,
} from "../options.js";
import { Cls } from "../style/classes.js";
import { type Color, formatColorClass, rgba } from "../style/color.js";
import { Flags } from "../style/flag.js";
import { type Font, fontFamilyClassName } from "../style/font.js";
import type { Style } from "../style/types.js";
import { type VNode, classAttr, vtext } from "../vdom/types.js";
import { element } from "./element.js";
import { finalizeNode, textElement } from "./finalize.js";
import { type Attribute, type EmbedStyle, type Element, GENERIC } from "./types.js";

function colorStyle(prefix: string, property: string, color: Color): Style {
  return { kind: "colored", cls: `${prefix}-${formatColorClass(color)}`, prop: property, color };
}

const ROOT_FONTS: readonly Font[] = [
  { kind: "typeface", name: "Open Sans" },
  { kind: "typeface", name: "Helvetica" },
  { kind: "typeface", name: "Verdana" },
  { kind: "sansSerif" },
];

export function rootStyle(): readonly Attribute[] {
  return [
    { kind: "styleClass", flag: Flags.bgColor, style: colorStyle("bg", "background-color", rgba(1, 1, 1, 0)) },
    { kind: "styleClass", flag: Flags.fontColor, style: colorStyle("fc", "color", rgba(0, 0, 0, 1)) },
    { kind: "styleClass", flag: Flags.fontSize, style: { kind: "fontSize", size: 20 } },
    {
      kind: "styleClass",
      flag: Flags.fontFamily,
      style: { kind: "fontFamily", name: fontFamilyClassName(ROOT_FONTS), fonts: ROOT_FONTS },
    },
  ];
}

/** Renders a finished element, embedding stylesheets according to `embed`. */
export function toHtml(embed: (styles: readonly Style[]) => EmbedStyle, el: Element): VNode {
  switch (el.kind) {
    case "unstyled":
      return finalizeNode(el.html, embed([]), "asEl");
    case "styled":
      return finalizeNode(el.html, embed(el.styles), "asEl");
    case "text":
      return textElement(el.text);
    case "empty":
      return vtext("");
  }
}

function embedFor(options: LayoutOptions, includeStatic: boolean): (styles: readonly Style[]) => EmbedStyle {
  return (styles) =>
    includeStatic && options.mode !== "noStaticStyleSheet"
      ? { kind: "staticRootAndDynamic", options, styles }
      : { kind: "onlyDynamic", options, styles };
}

export function renderRoot(
  options: readonly LayoutOption[],
  attributes: readonly Attribute[],
  child: Element,
): VNode {
  const resolved = resolveOptions(options);
  const root = element("asEl", GENERIC, attributes, { kind: "unkeyed", children: [child] });
  return toHtml(embedFor(resolved, true), root);
}

/** A root with explicit options. Emits the static and dynamic stylesheets. */
export function layoutWith(
  options: readonly LayoutOption[],
  attributes: readonly Attribute[],
  child: Element,
): VNode {
  const rootClass: Attribute = {
    kind: "attr",
    attr: classAttr(`${Cls.root} ${Cls.any} ${Cls.single}`),
  };
  return renderRoot(options, [rootClass, ...rootStyle(), ...attributes], child);
}

export function layout(attributes: readonly Attribute[], child: Element): VNode {
  return layoutWith([], attributes, child);
}

/**
 * Renders a subtree that lives under another root on the same page. Only the
 * dynamic stylesheet is embedded; the static one is already present.
 */
export function embed(
  el: Element,
  options: LayoutOptions = DEFAULT_LAYOUT_OPTIONS,
): VNode {
  return toHtml(embedFor(options, false), el);
}
