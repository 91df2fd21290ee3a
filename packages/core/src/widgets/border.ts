/**
 * packages/core/src/widgets/border.ts — Border attributes.
 */

import type { Attribute, StyleAttribute } from "../element/types.js";
import { requireFinite } from "../errors.js";
import { Cls } from "../style/classes.js";
import { type Color, formatColorClass } from "../style/color.js";
import { Flags } from "../style/flag.js";
import { type Shadow, boxShadowClass, formatBoxShadow, validateShadow } from "../style/shadow.js";
import type { Edges } from "./attributes.js";

export function color(c: Color): StyleAttribute {
  return {
    kind: "styleClass",
    flag: Flags.borderColor,
    style: { kind: "colored", cls: `bc-${formatColorClass(c)}`, prop: "border-color", color: c },
  };
}

function borderWidth(cls: string, top: number, right: number, bottom: number, left: number): StyleAttribute {
  return {
    kind: "styleClass",
    flag: Flags.borderWidth,
    style: { kind: "borderWidth", cls, top, right, bottom, left },
  };
}

export function width(n: number): StyleAttribute {
  const v = Math.round(requireFinite("border.width", n));
  return borderWidth(`b-${String(v)}`, v, v, v, v);
}

export function widthXY(x: number, y: number): StyleAttribute {
  const bx = Math.round(requireFinite("border.widthXY.x", x));
  const by = Math.round(requireFinite("border.widthXY.y", y));
  if (bx === by) return width(bx);
  return borderWidth(`b-${String(bx)}-${String(by)}`, by, bx, by, bx);
}

export function widthEach(edges: Edges): StyleAttribute {
  const top = Math.round(requireFinite("border.widthEach.top", edges.top));
  const right = Math.round(requireFinite("border.widthEach.right", edges.right));
  const bottom = Math.round(requireFinite("border.widthEach.bottom", edges.bottom));
  const left = Math.round(requireFinite("border.widthEach.left", edges.left));
  if (top === right && top === bottom && top === left) return width(top);
  return borderWidth(
    `b-${String(top)}-${String(right)}-${String(bottom)}-${String(left)}`,
    top,
    right,
    bottom,
    left,
  );
}

export const solid: Attribute = Object.freeze({ kind: "class", flag: Flags.borderStyle, name: Cls.borderSolid });
export const dashed: Attribute = Object.freeze({ kind: "class", flag: Flags.borderStyle, name: Cls.borderDashed });
export const dotted: Attribute = Object.freeze({ kind: "class", flag: Flags.borderStyle, name: Cls.borderDotted });

export function rounded(radius: number): StyleAttribute {
  const r = Math.round(requireFinite("border.rounded", radius));
  return {
    kind: "styleClass",
    flag: Flags.borderRound,
    style: { kind: "single", cls: `br-${String(r)}`, prop: "border-radius", value: `${String(r)}px` },
  };
}

function shadowAttribute(s: Shadow, inset: boolean): StyleAttribute {
  validateShadow(inset ? "border.innerShadow" : "border.shadow", s);
  return {
    kind: "styleClass",
    flag: Flags.shadows,
    style: { kind: "shadows", name: boxShadowClass(s, inset), prop: formatBoxShadow(s, inset) },
  };
}

export function shadow(s: Shadow): StyleAttribute {
  return shadowAttribute(s, false);
}

export function innerShadow(s: Shadow): StyleAttribute {
  return shadowAttribute(s, true);
}
