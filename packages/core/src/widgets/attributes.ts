/**
 * packages/core/src/widgets/attributes.ts — Attribute builders.
 *
 * Why: Each builder returns one Attribute tagged with the slot flag it
 * claims. Lists of these are resolved by the gatherer with last-wins per slot.
 */

import type {
  Attribute,
  Decoration,
  Element,
  Location,
  StyleAttribute,
  TransformAttribute,
} from "../element/types.js";
import { requireFinite } from "../errors.js";
import { Cls } from "../style/classes.js";
import { floatClass } from "../style/color.js";
import { type Flag, Flags } from "../style/flag.js";
import type { Length } from "../style/length.js";
import {
  type Transformation,
  UNTRANSFORMED,
  composeTransformation,
  transformClass,
} from "../style/transform.js";
import type { PseudoClass, Style } from "../style/types.js";
import { type VAttr, classAttr } from "../vdom/types.js";

export function width(length: Length): Attribute {
  return { kind: "width", length };
}

export function height(length: Length): Attribute {
  return { kind: "height", length };
}

export const noAttribute: Attribute = Object.freeze({ kind: "noAttribute" });

export function htmlAttribute(attr: VAttr): Attribute {
  return { kind: "attr", attr };
}

export function htmlClass(name: string): Attribute {
  return htmlAttribute(classAttr(name));
}

function styleClass(flag: Flag, style: Style): StyleAttribute {
  return { kind: "styleClass", flag, style };
}

function flagClass(flag: Flag, name: string): Attribute {
  return { kind: "class", flag, name };
}

// Padding and spacing

function int(where: string, n: number): number {
  return Math.round(requireFinite(where, n));
}

export function padding(n: number): StyleAttribute {
  const v = int("padding", n);
  return styleClass(Flags.padding, {
    kind: "padding",
    cls: `p-${String(v)}`,
    top: v,
    right: v,
    bottom: v,
    left: v,
  });
}

export function paddingXY(x: number, y: number): StyleAttribute {
  const px = int("paddingXY.x", x);
  const py = int("paddingXY.y", y);
  if (px === py) return padding(px);
  return styleClass(Flags.padding, {
    kind: "padding",
    cls: `p-${String(px)}-${String(py)}`,
    top: py,
    right: px,
    bottom: py,
    left: px,
  });
}

export type Edges = Readonly<{ top: number; right: number; bottom: number; left: number }>;

export function paddingEach(edges: Edges): StyleAttribute {
  const top = int("paddingEach.top", edges.top);
  const right = int("paddingEach.right", edges.right);
  const bottom = int("paddingEach.bottom", edges.bottom);
  const left = int("paddingEach.left", edges.left);
  if (top === right && top === bottom && top === left) return padding(top);
  return styleClass(Flags.padding, {
    kind: "padding",
    cls: `pad-${String(top)}-${String(right)}-${String(bottom)}-${String(left)}`,
    top,
    right,
    bottom,
    left,
  });
}

/** Fractional padding; names encode each side as round(v * 255) under their own `padf-` prefix. */
export function paddingFloat(top: number, right: number, bottom: number, left: number): StyleAttribute {
  return styleClass(Flags.padding, {
    kind: "padding",
    cls: `padf-${floatClass(top)}-${floatClass(right)}-${floatClass(bottom)}-${floatClass(left)}`,
    top,
    right,
    bottom,
    left,
  });
}

export function spacingXY(x: number, y: number): StyleAttribute {
  const sx = int("spacingXY.x", x);
  const sy = int("spacingXY.y", y);
  return styleClass(Flags.spacing, { kind: "spacing", cls: `spacing-${String(sx)}-${String(sy)}`, x: sx, y: sy });
}

export function spacing(n: number): StyleAttribute {
  return spacingXY(n, n);
}

export const spaceEvenly: Attribute = flagClass(Flags.spacing, Cls.spaceEvenly);

// Alignment

export const centerX: Attribute = Object.freeze({ kind: "alignX", align: "centerX" });
export const alignLeft: Attribute = Object.freeze({ kind: "alignX", align: "left" });
export const alignRight: Attribute = Object.freeze({ kind: "alignX", align: "right" });
export const centerY: Attribute = Object.freeze({ kind: "alignY", align: "centerY" });
export const alignTop: Attribute = Object.freeze({ kind: "alignY", align: "top" });
export const alignBottom: Attribute = Object.freeze({ kind: "alignY", align: "bottom" });

// Visibility and cursor

/** Opacity in 0..1; values outside are clamped. */
export function alpha(opacity: number): StyleAttribute {
  const transparency = 1 - Math.max(0, Math.min(1, requireFinite("alpha", opacity)));
  return styleClass(Flags.transparency, {
    kind: "transparency",
    name: `transparency-${floatClass(transparency)}`,
    transparency,
  });
}

export function transparent(on: boolean): StyleAttribute {
  return styleClass(
    Flags.transparency,
    on
      ? { kind: "transparency", name: "transparent", transparency: 1 }
      : { kind: "transparency", name: "visible", transparency: 0 },
  );
}

export const pointer: Attribute = flagClass(Flags.cursor, Cls.cursorPointer);

// Transforms

function transformComponent(flag: Flag, component: TransformAttribute["component"]): TransformAttribute {
  return { kind: "transformComponent", flag, component };
}

export function moveUp(y: number): TransformAttribute {
  return transformComponent(Flags.moveY, { kind: "moveY", y: -requireFinite("moveUp", y) });
}

export function moveDown(y: number): TransformAttribute {
  return transformComponent(Flags.moveY, { kind: "moveY", y: requireFinite("moveDown", y) });
}

export function moveRight(x: number): TransformAttribute {
  return transformComponent(Flags.moveX, { kind: "moveX", x: requireFinite("moveRight", x) });
}

export function moveLeft(x: number): TransformAttribute {
  return transformComponent(Flags.moveX, { kind: "moveX", x: -requireFinite("moveLeft", x) });
}

/** Rotation about the z axis, in radians. */
export function rotate(angle: number): TransformAttribute {
  return transformComponent(Flags.rotate, { kind: "rotate", axis: [0, 0, 1], angle: requireFinite("rotate", angle) });
}

export function scale(n: number): TransformAttribute {
  const s = requireFinite("scale", n);
  return transformComponent(Flags.scale, { kind: "scale", xyz: [s, s, 1] });
}

// Overflow

export const clip: Attribute = flagClass(Flags.overflow, Cls.clip);
export const clipX: Attribute = flagClass(Flags.overflow, Cls.clipX);
export const clipY: Attribute = flagClass(Flags.overflow, Cls.clipY);
export const scrollbars: Attribute = flagClass(Flags.overflow, Cls.scrollbars);
export const scrollbarX: Attribute = flagClass(Flags.overflow, Cls.scrollbarsX);
export const scrollbarY: Attribute = flagClass(Flags.overflow, Cls.scrollbarsY);

// Nearby elements

function nearby(location: Location, element: Element): Attribute {
  return { kind: "nearby", location, element };
}

export function above(element: Element): Attribute {
  return nearby("above", element);
}

export function below(element: Element): Attribute {
  return nearby("below", element);
}

export function onRight(element: Element): Attribute {
  return nearby("onRight", element);
}

export function onLeft(element: Element): Attribute {
  return nearby("onLeft", element);
}

export function inFront(element: Element): Attribute {
  return nearby("inFront", element);
}

export function behindContent(element: Element): Attribute {
  return nearby("behind", element);
}

// State decorations

/** Styles of a decoration list, with any transform folded into one style. */
export function unwrapDecorations(decorations: readonly Decoration[]): readonly Style[] {
  const styles: Style[] = [];
  let transform: Transformation = UNTRANSFORMED;
  for (const d of decorations) {
    if (d.kind === "styleClass") styles.push(d.style);
    else transform = composeTransformation(transform, d.component);
  }
  if (transformClass(transform) !== null) styles.push({ kind: "transform", transform });
  return styles;
}

function pseudo(flag: Flag, pc: PseudoClass, decorations: readonly Decoration[]): StyleAttribute {
  return styleClass(flag, { kind: "pseudo", pseudo: pc, styles: unwrapDecorations(decorations) });
}

export function mouseOver(decorations: readonly Decoration[]): StyleAttribute {
  return pseudo(Flags.hover, "hover", decorations);
}

export function mouseDown(decorations: readonly Decoration[]): StyleAttribute {
  return pseudo(Flags.active, "active", decorations);
}

export function focused(decorations: readonly Decoration[]): StyleAttribute {
  return pseudo(Flags.focus, "focus", decorations);
}

/** Outlines an element and its children for layout debugging. */
export function explain(): Attribute {
  return htmlClass("explain");
}

