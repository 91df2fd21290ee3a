/**
 * packages/core/src/style/length.ts — Length values for width/height and grid tracks.
 *
 * Why: A Length is either terminal (px, content, fill) or a bound (min/max)
 * wrapping another Length. Bounds must bottom out; nesting deeper than
 * MAX_LENGTH_DEPTH is rejected rather than walked.
 */

import { warnDev } from "../dev.js";
import { FlexweaveError, type ValidationResult, requireFinite } from "../errors.js";

export type Length =
  | Readonly<{ kind: "px"; px: number }>
  | Readonly<{ kind: "content" }>
  | Readonly<{ kind: "fill"; portion: number }>
  | Readonly<{ kind: "min"; min: number; length: Length }>
  | Readonly<{ kind: "max"; max: number; length: Length }>;

export const MAX_LENGTH_DEPTH = 32;

export function px(n: number): Length {
  return { kind: "px", px: Math.round(requireFinite("px", n)) };
}

export const shrink: Length = Object.freeze({ kind: "content" });

export const fill: Length = Object.freeze({ kind: "fill", portion: 1 });

export function fillPortion(portion: number): Length {
  const p = Math.round(requireFinite("fillPortion", portion));
  if (p < 1) {
    warnDev("length", `fillPortion(${String(portion)}) is below 1, clamped to 1`);
    return fill;
  }
  return { kind: "fill", portion: p };
}

export function minimum(min: number, length: Length): Length {
  return { kind: "min", min: Math.round(requireFinite("minimum", min)), length };
}

export function maximum(max: number, length: Length): Length {
  return { kind: "max", max: Math.round(requireFinite("maximum", max)), length };
}

function depthOf(length: Length): number {
  let depth = 0;
  let cur = length;
  while (cur.kind === "min" || cur.kind === "max") {
    depth++;
    if (depth > MAX_LENGTH_DEPTH) return depth;
    cur = cur.length;
  }
  return depth;
}

export function validateLength(length: Length): ValidationResult<Length> {
  const depth = depthOf(length);
  if (depth > MAX_LENGTH_DEPTH) {
    return {
      ok: false,
      fatal: {
        code: "FW_INVALID_LENGTH",
        detail: `length bounds nested deeper than ${String(MAX_LENGTH_DEPTH)}`,
      },
    };
  }
  return { ok: true, value: length };
}

/** Throws FW_INVALID_LENGTH when `length` cannot be rendered. */
export function assertRenderableLength(length: Length): void {
  const res = validateLength(length);
  if (!res.ok) throw new FlexweaveError(res.fatal.code, res.fatal.detail);
  if (depthOf(length) > MAX_LENGTH_DEPTH / 2) {
    warnDev("length", `length bounds nested ${String(depthOf(length))} deep`);
  }
}

/** Compact encoding used inside grid template class names. */
export function lengthClassName(length: Length): string {
  switch (length.kind) {
    case "px":
      return `${String(length.px)}px`;
    case "content":
      return "auto";
    case "fill":
      return `${String(length.portion)}fr`;
    case "min":
      return `min${String(length.min)}${lengthClassName(length.length)}`;
    case "max":
      return `max${String(length.max)}${lengthClassName(length.length)}`;
  }
}
