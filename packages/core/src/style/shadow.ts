/**
 * packages/core/src/style/shadow.ts — Box and text shadow encodings.
 */

import { requireFinite } from "../errors.js";
import { type Color, floatClass, formatColor, formatColorClass } from "./color.js";

export type Shadow = Readonly<{
  offset: readonly [x: number, y: number];
  blur: number;
  size: number;
  color: Color;
}>;

/** Throws FW_INVALID_PROPS when an offset, the blur or the size is not finite. */
export function validateShadow(where: string, shadow: Shadow): Shadow {
  requireFinite(`${where}.offset[0]`, shadow.offset[0]);
  requireFinite(`${where}.offset[1]`, shadow.offset[1]);
  requireFinite(`${where}.blur`, shadow.blur);
  requireFinite(`${where}.size`, shadow.size);
  return shadow;
}

export function formatBoxShadow(shadow: Shadow, inset: boolean): string {
  const [x, y] = shadow.offset;
  const body = `${String(x)}px ${String(y)}px ${String(shadow.blur)}px ${String(shadow.size)}px ${formatColor(shadow.color)}`;
  return inset ? `inset ${body}` : body;
}

export function boxShadowClass(shadow: Shadow, inset: boolean): string {
  const [x, y] = shadow.offset;
  return [
    inset ? "box-inset" : "box-",
    `${floatClass(x)}px`,
    `${floatClass(y)}px`,
    `${floatClass(shadow.blur)}px`,
    `${floatClass(shadow.size)}px`,
    formatColorClass(shadow.color),
  ].join("");
}

export function formatTextShadow(shadow: Shadow): string {
  const [x, y] = shadow.offset;
  return `${String(x)}px ${String(y)}px ${String(shadow.blur)}px ${formatColor(shadow.color)}`;
}

export function textShadowClass(shadow: Shadow): string {
  const [x, y] = shadow.offset;
  return [
    "txt",
    `${floatClass(x)}px`,
    `${floatClass(y)}px`,
    `${floatClass(shadow.blur)}px`,
    formatColorClass(shadow.color),
  ].join("");
}
