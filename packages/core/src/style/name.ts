/**
 * packages/core/src/style/name.ts — Canonical style names and skippability.
 *
 * Why: The name is a pure function of the payload. Equal payloads give equal
 * names, so the stylesheet keeps one rule per name. Pseudo-class wrappers name
 * each inner style with a state suffix so the class matches its selector.
 */

import { type Flag, Flags, flagsEqual } from "./flag.js";
import { lengthClassName } from "./length.js";
import { transformClass } from "./transform.js";
import type { PseudoClass, Style } from "./types.js";

export function pseudoSuffix(pseudo: PseudoClass): string {
  switch (pseudo) {
    case "hover":
      return "hv";
    case "focus":
      return "fs";
    case "active":
      return "act";
  }
}

export function styleName(style: Style): string {
  switch (style.kind) {
    case "style":
      return style.selector;
    case "fontFamily":
      return style.name;
    case "fontSize":
      return `font-size-${String(style.size)}`;
    case "single":
    case "colored":
    case "spacing":
    case "padding":
    case "borderWidth":
      return style.cls;
    case "gridTemplate": {
      const t = style.template;
      const rows = t.rows.map(lengthClassName).join("-");
      const cols = t.columns.map(lengthClassName).join("-");
      const [x, y] = t.spacing;
      return `grid-rows-${rows}-cols-${cols}-space-x-${lengthClassName(x)}-space-y-${lengthClassName(y)}`;
    }
    case "gridPosition": {
      const p = style.position;
      return `gp grid-pos-${String(p.row)}-${String(p.col)}-${String(p.width)}-${String(p.height)}`;
    }
    case "transform":
      return transformClass(style.transform) ?? "";
    case "pseudo": {
      const suffix = pseudoSuffix(style.pseudo);
      const names: string[] = [];
      for (const inner of style.styles) {
        const name = styleName(inner);
        if (name !== "") names.push(`${name}-${suffix}`);
      }
      return names.join(" ");
    }
    case "transparency":
    case "shadows":
      return style.name;
  }
}

function isUniform(top: number, right: number, bottom: number, left: number): boolean {
  return top === right && top === bottom && top === left;
}

/**
 * True for values pre-baked into the static stylesheet: uniform border widths
 * 0..6, font sizes 8..32 and uniform paddings 0..24 (whole pixels). Such
 * styles contribute only their class name.
 */
export function skippable(flag: Flag, style: Style): boolean {
  if (flagsEqual(flag, Flags.borderWidth)) {
    return (
      style.kind === "borderWidth" &&
      isUniform(style.top, style.right, style.bottom, style.left) &&
      Number.isInteger(style.top) &&
      style.top >= 0 &&
      style.top <= 6 &&
      style.cls === `b-${String(style.top)}`
    );
  }
  switch (style.kind) {
    case "fontSize":
      return Number.isInteger(style.size) && style.size >= 8 && style.size <= 32;
    case "padding":
      return (
        isUniform(style.top, style.right, style.bottom, style.left) &&
        Number.isInteger(style.top) &&
        style.top >= 0 &&
        style.top <= 24 &&
        style.cls === `p-${String(style.top)}`
      );
    default:
      return false;
  }
}
