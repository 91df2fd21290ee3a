/**
 * packages/core/src/element/filter.ts — Attribute list utilities for builders.
 */

import type { Style } from "../style/types.js";
import type { Attribute } from "./types.js";

type Slot = "width" | "height" | "described" | "alignX" | "alignY" | "transform";

function slotOf(attribute: Attribute): Slot | null {
  switch (attribute.kind) {
    case "width":
      return "width";
    case "height":
      return "height";
    case "describe":
      return "described";
    case "alignX":
      return "alignX";
    case "alignY":
      return "alignY";
    case "transformComponent":
      return "transform";
    case "noAttribute":
    case "attr":
    case "class":
    case "styleClass":
    case "nearby":
      return null;
  }
}

/**
 * Drops no-ops and keeps only the last width, height, description, x/y
 * alignment and transform attribute; everything else passes through in order.
 */
export function filterAttributes(attributes: readonly Attribute[]): readonly Attribute[] {
  const seen = new Set<Slot>();
  const kept: Attribute[] = [];
  for (let i = attributes.length - 1; i >= 0; i--) {
    const attribute = attributes[i];
    if (attribute === undefined || attribute.kind === "noAttribute") continue;
    const slot = slotOf(attribute);
    if (slot !== null) {
      if (seen.has(slot)) continue;
      seen.add(slot);
    }
    kept.push(attribute);
  }
  return kept.reverse();
}

export function getAttributes(
  attributes: readonly Attribute[],
  predicate: (attribute: Attribute) => boolean,
): readonly Attribute[] {
  return filterAttributes(attributes).filter(predicate);
}

export type PaddingStyle = Extract<Style, { kind: "padding" }>;
export type SpacingStyle = Extract<Style, { kind: "spacing" }>;

/** The padding and spacing that take effect, i.e. the last of each. */
export function extractSpacingAndPadding(attributes: readonly Attribute[]): Readonly<{
  padding: PaddingStyle | null;
  spacing: SpacingStyle | null;
}> {
  let padding: PaddingStyle | null = null;
  let spacing: SpacingStyle | null = null;
  for (const attribute of attributes) {
    if (attribute.kind !== "styleClass") continue;
    const style = attribute.style;
    if (style.kind === "padding") padding = style;
    if (style.kind === "spacing") spacing = style;
  }
  return { padding, spacing };
}
