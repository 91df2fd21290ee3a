/**
 * packages/core/src/style/types.ts — Renderable style rules.
 *
 * Each variant derives a canonical name (see name.ts). The name is the class
 * the element carries and the key the stylesheet deduplicates on.
 */

import type { Color } from "./color.js";
import type { Font } from "./font.js";
import type { Length } from "./length.js";
import type { Transformation } from "./transform.js";

export type Property = Readonly<{ key: string; value: string }>;

export type PseudoClass = "focus" | "hover" | "active";

export type GridTemplate = Readonly<{
  spacing: readonly [x: Length, y: Length];
  columns: readonly Length[];
  rows: readonly Length[];
}>;

export type GridPosition = Readonly<{ row: number; col: number; width: number; height: number }>;

export type Style =
  | Readonly<{ kind: "style"; selector: string; props: readonly Property[] }>
  | Readonly<{ kind: "fontFamily"; name: string; fonts: readonly Font[] }>
  | Readonly<{ kind: "fontSize"; size: number }>
  | Readonly<{ kind: "single"; cls: string; prop: string; value: string }>
  | Readonly<{ kind: "colored"; cls: string; prop: string; color: Color }>
  | Readonly<{ kind: "spacing"; cls: string; x: number; y: number }>
  | Readonly<{
      kind: "padding";
      cls: string;
      top: number;
      right: number;
      bottom: number;
      left: number;
    }>
  | Readonly<{
      kind: "borderWidth";
      cls: string;
      top: number;
      right: number;
      bottom: number;
      left: number;
    }>
  | Readonly<{ kind: "gridTemplate"; template: GridTemplate }>
  | Readonly<{ kind: "gridPosition"; position: GridPosition }>
  | Readonly<{ kind: "transform"; transform: Transformation }>
  | Readonly<{ kind: "pseudo"; pseudo: PseudoClass; styles: readonly Style[] }>
  | Readonly<{ kind: "transparency"; name: string; transparency: number }>
  | Readonly<{ kind: "shadows"; name: string; prop: string }>;

export function prop(key: string, value: string): Property {
  return { key, value };
}

export function single(cls: string, property: string, value: string): Style {
  return { kind: "single", cls, prop: property, value };
}

export function colored(cls: string, property: string, color: Color): Style {
  return { kind: "colored", cls, prop: property, color };
}

export function paddingStyle(cls: string, top: number, right: number, bottom: number, left: number): Style {
  return { kind: "padding", cls, top, right, bottom, left };
}

export function borderWidthStyle(
  cls: string,
  top: number,
  right: number,
  bottom: number,
  left: number,
): Style {
  return { kind: "borderWidth", cls, top, right, bottom, left };
}
