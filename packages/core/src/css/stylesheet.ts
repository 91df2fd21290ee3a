/**
 * packages/core/src/css/stylesheet.ts — Deduplication and dynamic stylesheet text.
 *
 * Why: Styles hoisted from a whole subtree arrive with repeats. One rule per
 * canonical name is kept, first occurrence wins, and output order is
 * first-seen order, so reducing twice changes nothing.
 */

import type { LayoutOptions } from "../options.js";
import { Cls } from "../style/classes.js";
import { type Declarations, type AdjustmentRule, type Font, cssString, typefaceAdjustment } from "../style/font.js";
import { styleName } from "../style/name.js";
import type { Style } from "../style/types.js";
import { renderStyleRule } from "./render.js";

export function reduceStyles(styles: readonly Style[]): readonly Style[] {
  const seen = new Set<string>();
  const out: Style[] = [];
  for (const style of styles) {
    const name = styleName(style);
    if (seen.has(name)) continue;
    seen.add(name);
    out.push(style);
  }
  return out;
}

function bracket(selector: string, declarations: Declarations): string {
  return `${selector} {${declarations.map(([k, v]) => `${k}: ${v};`).join("")}}`;
}

function scopedName(target: string, other: string): string {
  return target === other ? target : `${other} .${target}`;
}

function nullAdjustmentRule(target: string, other: string): string {
  const name = scopedName(target, other);
  const cap = Cls.sizeByCapital;
  const t = Cls.text;
  return [
    bracket(`.${name}.${cap}, .${name} .${cap}`, [["line-height", "1"]]),
    bracket(`.${name}.${cap}> .${t}, .${name} .${cap} > .${t}`, [
      ["vertical-align", "0"],
      ["line-height", "1"],
    ]),
  ].join(" ");
}

function fontRule(name: string, modifier: string, rule: AdjustmentRule): readonly string[] {
  const t = Cls.text;
  return [
    bracket(`.${name}.${modifier}, .${name} .${modifier}`, rule.parent),
    bracket(`.${name}.${modifier}> .${t}, .${name} .${modifier} > .${t}`, rule.text),
  ];
}

type Family = Readonly<{ name: string; fonts: readonly Font[] }>;

/**
 * Font `@import` lines followed by one metric-adjustment line per family.
 * Adjustments are scoped against every family present so nested families
 * override their ancestors.
 */
export function renderTopLevel(families: readonly Family[]): readonly string[] {
  const imports: string[] = [];
  for (const family of families) {
    for (const font of family.fonts) {
      if (font.kind === "importFont") imports.push(`@import url(${cssString(font.url, "'")});`);
    }
  }
  const allNames = families.map((f) => f.name);
  const adjustments = families.map((family) => {
    const adj = typefaceAdjustment(family.fonts);
    if (adj === null) {
      return allNames.map((other) => nullAdjustmentRule(family.name, other)).join(" ");
    }
    return allNames
      .map((other) => {
        const name = scopedName(family.name, other);
        return [
          ...fontRule(name, Cls.sizeByCapital, adj.capital),
          ...fontRule(name, Cls.fullSize, adj.full),
        ].join(" ");
      })
      .join(" ");
  });
  return dedupeLines([...imports, ...adjustments]);
}

function dedupeLines(lines: readonly string[]): readonly string[] {
  return [...new Set(lines)];
}

function families(styles: readonly Style[]): readonly Family[] {
  const out: Family[] = [];
  for (const style of styles) {
    if (style.kind === "fontFamily") out.push({ name: style.name, fonts: style.fonts });
  }
  return out;
}

/** CSS text for an already-reduced style list. */
export function toStyleSheetString(options: LayoutOptions, styles: readonly Style[]): string {
  const topLevel = renderTopLevel(families(styles));
  const rules = styles.flatMap((style) => renderStyleRule(options, style, null));
  return [...topLevel, ...rules].join("\n");
}

/** JSON object mapping each style name to its rendered rules. */
export function encodeStyles(options: LayoutOptions, styles: readonly Style[]): string {
  const entries: Record<string, readonly string[]> = {};
  for (const style of styles) {
    entries[styleName(style)] = renderStyleRule(options, style, null);
  }
  return JSON.stringify(entries);
}
