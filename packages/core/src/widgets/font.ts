/**
 * packages/core/src/widgets/font.ts — Typography attributes and font stacks.
 */

import type { Attribute, StyleAttribute } from "../element/types.js";
import { requireFinite, throwInvalidProps } from "../errors.js";
import { Cls } from "../style/classes.js";
import { type Color, floatClass, formatColorClass } from "../style/color.js";
import { type Flag, Flags } from "../style/flag.js";
import { type Adjustment, type Font, type FontVariant, fontFamilyClassName, validateAdjustment } from "../style/font.js";
import { type Shadow, formatTextShadow, textShadowClass, validateShadow } from "../style/shadow.js";
import { classAttr } from "../vdom/types.js";

export function color(c: Color): StyleAttribute {
  return {
    kind: "styleClass",
    flag: Flags.fontColor,
    style: { kind: "colored", cls: `fc-${formatColorClass(c)}`, prop: "color", color: c },
  };
}

export function size(px: number): StyleAttribute {
  return {
    kind: "styleClass",
    flag: Flags.fontSize,
    style: { kind: "fontSize", size: Math.round(requireFinite("font.size", px)) },
  };
}

export function family(fonts: readonly Font[]): StyleAttribute {
  return {
    kind: "styleClass",
    flag: Flags.fontFamily,
    style: { kind: "fontFamily", name: fontFamilyClassName(fonts), fonts },
  };
}

export const serif: Font = Object.freeze({ kind: "serif" });
export const sansSerif: Font = Object.freeze({ kind: "sansSerif" });
export const monospace: Font = Object.freeze({ kind: "monospace" });

export function typeface(name: string): Font {
  return { kind: "typeface", name };
}

/** A face loaded from a stylesheet URL through `@import`. */
export function external(source: Readonly<{ name: string; url: string }>): Font {
  return { kind: "importFont", name: source.name, url: source.url };
}

export function fontWith(
  face: Readonly<{ name: string; adjustment?: Adjustment; variants?: readonly FontVariant[] }>,
): Font {
  return {
    kind: "fontWith",
    name: face.name,
    adjustment: face.adjustment === undefined ? null : validateAdjustment(face.adjustment),
    variants: face.variants ?? [],
  };
}

export const smallCaps: FontVariant = Object.freeze({ kind: "active", name: "smcp" });

export function feature(name: string, on: boolean): FontVariant {
  return on ? { kind: "active", name } : { kind: "off", name };
}

export function indexed(name: string, index: number): FontVariant {
  if (!Number.isInteger(index) || index < 0) {
    throwInvalidProps(`font.indexed: index must be an integer >= 0, got ${String(index)}`);
  }
  return { kind: "indexed", name, index };
}

function flagged(flag: Flag, name: string): Attribute {
  return { kind: "class", flag, name };
}

export const alignLeft: Attribute = flagged(Flags.fontAlignment, Cls.textLeft);
export const alignRight: Attribute = flagged(Flags.fontAlignment, Cls.textRight);
export const center: Attribute = flagged(Flags.fontAlignment, Cls.textCenter);
export const justify: Attribute = flagged(Flags.fontAlignment, Cls.textJustify);

export const hairline: Attribute = flagged(Flags.fontWeight, Cls.textThin);
export const extraLight: Attribute = flagged(Flags.fontWeight, Cls.textExtraLight);
export const light: Attribute = flagged(Flags.fontWeight, Cls.textLight);
export const regular: Attribute = flagged(Flags.fontWeight, Cls.textNormalWeight);
export const medium: Attribute = flagged(Flags.fontWeight, Cls.textMedium);
export const semiBold: Attribute = flagged(Flags.fontWeight, Cls.textSemiBold);
export const bold: Attribute = flagged(Flags.fontWeight, Cls.bold);
export const extraBold: Attribute = flagged(Flags.fontWeight, Cls.textExtraBold);
export const heavy: Attribute = flagged(Flags.fontWeight, Cls.textHeavy);

function plainClass(name: string): Attribute {
  return { kind: "attr", attr: classAttr(name) };
}

export const underline: Attribute = plainClass(Cls.underline);
export const strike: Attribute = plainClass(Cls.strike);
export const italic: Attribute = plainClass(Cls.italic);
export const unitalicized: Attribute = plainClass(Cls.textUnitalicized);

export function letterSpacing(px: number): StyleAttribute {
  const v = requireFinite("font.letterSpacing", px);
  return {
    kind: "styleClass",
    flag: Flags.letterSpacing,
    style: { kind: "single", cls: `ls-${floatClass(v)}`, prop: "letter-spacing", value: `${String(v)}px` },
  };
}

export function wordSpacing(px: number): StyleAttribute {
  const v = requireFinite("font.wordSpacing", px);
  return {
    kind: "styleClass",
    flag: Flags.wordSpacing,
    style: { kind: "single", cls: `ws-${floatClass(v)}`, prop: "word-spacing", value: `${String(v)}px` },
  };
}

export function shadow(s: Shadow): StyleAttribute {
  validateShadow("font.shadow", s);
  return {
    kind: "styleClass",
    flag: Flags.txtShadows,
    style: { kind: "single", cls: textShadowClass(s), prop: "text-shadow", value: formatTextShadow(s) },
  };
}
