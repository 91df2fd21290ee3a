/**
 * packages/core/src/style/color.ts — Color values and their CSS/class encodings.
 *
 * Channels are stored as floats in 0..1. Class names encode each channel as
 * round(channel * 255) so visually identical colors collide on the same name.
 */

import { warnDev } from "../dev.js";
import { requireFinite } from "../errors.js";

export type Color = Readonly<{ red: number; green: number; blue: number; alpha: number }>;

function clamp01(v: number): number {
  return Math.min(1, Math.max(0, v));
}

function channel255(name: string, v: number): number {
  requireFinite(`rgb255.${name}`, v);
  if (v < 0 || v > 255) {
    warnDev("color", `${name} channel ${String(v)} outside 0..255, clamped`);
  }
  return Math.min(255, Math.max(0, v)) / 255;
}

/** Channels in 0..1. */
export function rgb(red: number, green: number, blue: number): Color {
  return rgba(red, green, blue, 1);
}

export function rgba(red: number, green: number, blue: number, alpha: number): Color {
  return Object.freeze({
    red: clamp01(requireFinite("rgba.red", red)),
    green: clamp01(requireFinite("rgba.green", green)),
    blue: clamp01(requireFinite("rgba.blue", blue)),
    alpha: clamp01(requireFinite("rgba.alpha", alpha)),
  });
}

/** Channels in 0..255, alpha in 0..1. */
export function rgb255(red: number, green: number, blue: number): Color {
  return rgba255(red, green, blue, 1);
}

export function rgba255(red: number, green: number, blue: number, alpha: number): Color {
  return rgba(
    channel255("red", red),
    channel255("green", green),
    channel255("blue", blue),
    alpha,
  );
}

export function fromRgb(c: Readonly<{ red: number; green: number; blue: number; alpha: number }>): Color {
  return rgba(c.red, c.green, c.blue, c.alpha);
}

export function fromRgb255(
  c: Readonly<{ red: number; green: number; blue: number; alpha: number }>,
): Color {
  return rgba255(c.red, c.green, c.blue, c.alpha);
}

export function toRgb(color: Color): Readonly<{ red: number; green: number; blue: number; alpha: number }> {
  return { red: color.red, green: color.green, blue: color.blue, alpha: color.alpha };
}

export function floatClass(x: number): string {
  return String(Math.round(x * 255));
}

export function formatColor(color: Color): string {
  return `rgba(${floatClass(color.red)},${floatClass(color.green)},${floatClass(color.blue)},${String(color.alpha)})`;
}

export function formatColorClass(color: Color): string {
  return `${floatClass(color.red)}-${floatClass(color.green)}-${floatClass(color.blue)}-${floatClass(color.alpha)}`;
}

export const white: Color = rgb(1, 1, 1);
export const black: Color = rgb(0, 0, 0);
