/**
 * packages/core/src/style/transform.ts — Transform composition.
 *
 * Why: Move, rotate and scale arrive as separate attributes. They fold into
 * one of three states so an element carries a single `transform` value.
 * Each component kind owns a disjoint sub-field (translation, scale,
 * rotation), so the fold result does not depend on component order.
 */

import { floatClass } from "./color.js";

export type XYZ = readonly [x: number, y: number, z: number];

export type Transformation =
  | Readonly<{ kind: "untransformed" }>
  | Readonly<{ kind: "moved"; move: XYZ }>
  | Readonly<{ kind: "full"; move: XYZ; scale: XYZ; origin: XYZ; angle: number }>;

export type TransformComponent =
  | Readonly<{ kind: "moveX"; x: number }>
  | Readonly<{ kind: "moveY"; y: number }>
  | Readonly<{ kind: "moveZ"; z: number }>
  | Readonly<{ kind: "moveXYZ"; xyz: XYZ }>
  | Readonly<{ kind: "rotate"; axis: XYZ; angle: number }>
  | Readonly<{ kind: "scale"; xyz: XYZ }>;

export const UNTRANSFORMED: Transformation = Object.freeze({ kind: "untransformed" });

const ORIGIN: XYZ = [0, 0, 0];
const UNIT_SCALE: XYZ = [1, 1, 1];
const Z_AXIS: XYZ = [0, 0, 1];

function applyMove(move: XYZ, c: TransformComponent): XYZ | null {
  switch (c.kind) {
    case "moveX":
      return [c.x, move[1], move[2]];
    case "moveY":
      return [move[0], c.y, move[2]];
    case "moveZ":
      return [move[0], move[1], c.z];
    case "moveXYZ":
      return c.xyz;
    case "rotate":
    case "scale":
      return null;
  }
}

export function composeTransformation(t: Transformation, c: TransformComponent): Transformation {
  switch (t.kind) {
    case "untransformed":
    case "moved": {
      const move = t.kind === "moved" ? t.move : ORIGIN;
      const moved = applyMove(move, c);
      if (moved !== null) return { kind: "moved", move: moved };
      if (c.kind === "rotate") {
        return { kind: "full", move, scale: UNIT_SCALE, origin: c.axis, angle: c.angle };
      }
      if (c.kind === "scale") {
        return { kind: "full", move, scale: c.xyz, origin: Z_AXIS, angle: 0 };
      }
      return t;
    }
    case "full": {
      const moved = applyMove(t.move, c);
      if (moved !== null) return { ...t, move: moved };
      if (c.kind === "rotate") return { ...t, origin: c.axis, angle: c.angle };
      if (c.kind === "scale") return { ...t, scale: c.xyz };
      return t;
    }
  }
}

/** Class name for a transformation; null for the identity. */
export function transformClass(t: Transformation): string | null {
  switch (t.kind) {
    case "untransformed":
      return null;
    case "moved":
      return `mv-${t.move.map(floatClass).join("-")}`;
    case "full":
      return `tfrm-${[...t.move, ...t.scale, ...t.origin, t.angle].map(floatClass).join("-")}`;
  }
}

function num(v: number): string {
  return String(Math.round(v * 10000) / 10000);
}

/** CSS `transform` value; null for the identity. */
export function transformValue(t: Transformation): string | null {
  switch (t.kind) {
    case "untransformed":
      return null;
    case "moved":
      return `translate3d(${t.move.map((v) => `${num(v)}px`).join(", ")})`;
    case "full": {
      const translate = `translate3d(${t.move.map((v) => `${num(v)}px`).join(", ")})`;
      const scale = `scale3d(${t.scale.map(num).join(",")})`;
      const rotate = `rotate3d(${t.origin.map(num).join(",")},${num(t.angle)}rad)`;
      return `${translate} ${scale} ${rotate}`;
    }
  }
}
