/**
 * packages/core/src/style/font.ts — Font families, feature variants and
 * vertical metric adjustment.
 */

import { requireFinite, throwInvalidProps } from "../errors.js";

export type FontVariant =
  | Readonly<{ kind: "active"; name: string }>
  | Readonly<{ kind: "off"; name: string }>
  | Readonly<{ kind: "indexed"; name: string; index: number }>;

/**
 * Vertical font metrics, each a fraction of the em box measured from the top:
 * capital height, lowercase height, baseline and descender.
 */
export type Adjustment = Readonly<{
  capital: number;
  lowercase: number;
  baseline: number;
  descender: number;
}>;

export type Font =
  | Readonly<{ kind: "serif" }>
  | Readonly<{ kind: "sansSerif" }>
  | Readonly<{ kind: "monospace" }>
  | Readonly<{ kind: "typeface"; name: string }>
  | Readonly<{ kind: "importFont"; name: string; url: string }>
  | Readonly<{
      kind: "fontWith";
      name: string;
      adjustment: Adjustment | null;
      variants: readonly FontVariant[];
    }>;

/** Quotes a value as a CSS string. `<` is escaped so the text can sit inside a style element. */
export function cssString(value: string, quote: '"' | "'"): string {
  let out = "";
  for (const ch of value) {
    if (ch === "\\" || ch === quote) out += `\\${ch}`;
    else if (ch === "<") out += "\\3c ";
    else if (ch === "\n") out += "\\a ";
    else out += ch;
  }
  return `${quote}${out}${quote}`;
}

/** Value used inside `font-family`. Named faces are quoted. */
export function fontName(font: Font): string {
  switch (font.kind) {
    case "serif":
      return "serif";
    case "sansSerif":
      return "sans-serif";
    case "monospace":
      return "monospace";
    case "typeface":
    case "importFont":
    case "fontWith":
      return cssString(font.name, '"');
  }
}

/** Class-safe fragment: lowercase, anything outside `[a-z0-9_-]` replaced by a dash. */
export function fontClassName(font: Font): string {
  switch (font.kind) {
    case "serif":
      return "serif";
    case "sansSerif":
      return "sans-serif";
    case "monospace":
      return "monospace";
    case "typeface":
    case "importFont":
    case "fontWith":
      return font.name.toLowerCase().replace(/[^a-z0-9_-]/g, "-");
  }
}

/** Class name of a whole font stack. */
export function fontFamilyClassName(fonts: readonly Font[]): string {
  return `ff-${fonts.map(fontClassName).join("")}`;
}

export function renderVariant(variant: FontVariant): string {
  switch (variant.kind) {
    case "active":
      return cssString(variant.name, '"');
    case "off":
      return `${cssString(variant.name, '"')} 0`;
    case "indexed":
      return `${cssString(variant.name, '"')} ${String(variant.index)}`;
  }
}

export function isSmallCaps(variant: FontVariant): boolean {
  switch (variant.kind) {
    case "active":
      return variant.name === "smcp";
    case "off":
      return false;
    case "indexed":
      return variant.name === "smcp" && variant.index === 1;
  }
}

/** `font-feature-settings` value for a stack, or null when no face declares variants. */
export function renderFeatureSettings(fonts: readonly Font[]): string | null {
  const parts: string[] = [];
  for (const font of fonts) {
    if (font.kind !== "fontWith" || font.variants.length === 0) continue;
    parts.push(font.variants.map(renderVariant).join(", "));
  }
  return parts.length === 0 ? null : parts.join(", ");
}

export function hasSmallCaps(fonts: readonly Font[]): boolean {
  return fonts.some((f) => f.kind === "fontWith" && f.variants.some(isSmallCaps));
}

export type Declarations = readonly (readonly [property: string, value: string])[];

/** Declarations for the sizing parent and for its text child. */
export type AdjustmentRule = Readonly<{ parent: Declarations; text: Declarations }>;

export type AdjustmentRules = Readonly<{ full: AdjustmentRule; capital: AdjustmentRule }>;

function sizeRule(size: number, diff: number, vertical: number): AdjustmentRule {
  return {
    parent: [["display", "block"]],
    text: [
      ["display", "inline-block"],
      ["line-height", String(diff / size)],
      ["vertical-align", `${String(vertical)}em`],
      ["font-size", `${String(size)}em`],
    ],
  };
}

type Bands = Readonly<{ ascender: number; baseline: number; descender: number }>;

function bands(adj: Adjustment): Bands {
  const lines = [
    requireFinite("adjustment.capital", adj.capital),
    requireFinite("adjustment.baseline", adj.baseline),
    requireFinite("adjustment.descender", adj.descender),
    requireFinite("adjustment.lowercase", adj.lowercase),
  ];
  const ascender = Math.max(...lines);
  const descender = Math.min(...lines);
  const above = lines.filter((l) => l !== descender);
  const baseline = above.length === 0 ? descender : Math.min(...above);
  if (ascender - baseline <= 0) {
    throwInvalidProps(
      `adjustment: capital band is empty (capital=${String(adj.capital)}, lowercase=${String(adj.lowercase)}, baseline=${String(adj.baseline)}, descender=${String(adj.descender)})`,
    );
  }
  return { ascender, baseline, descender };
}

/** Throws FW_INVALID_PROPS for non-finite metrics or an empty capital band. */
export function validateAdjustment(adj: Adjustment): Adjustment {
  bands(adj);
  return adj;
}

/**
 * Converts measured metrics into the rules that size text by its capital
 * height (`cap`) or by its full ascent-to-descent box (`fs`).
 */
export function adjustmentRules(adj: Adjustment): AdjustmentRules {
  const { ascender, baseline, descender } = bands(adj);
  const vertical = 1 - ascender;
  const capitalDiff = ascender - baseline;
  const fullDiff = ascender - descender;
  return {
    capital: sizeRule(1 / capitalDiff, capitalDiff, vertical),
    full: sizeRule(1 / fullDiff, fullDiff, vertical),
  };
}

/** The first face in a stack that declares metrics wins. */
export function typefaceAdjustment(fonts: readonly Font[]): AdjustmentRules | null {
  for (const font of fonts) {
    if (font.kind === "fontWith" && font.adjustment !== null) {
      return adjustmentRules(font.adjustment);
    }
  }
  return null;
}
