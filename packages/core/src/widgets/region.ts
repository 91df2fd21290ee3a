/**
 * packages/core/src/widgets/region.ts — Landmarks, headings and live regions.
 */

import type { Attribute, Description } from "../element/types.js";

function describe(description: Description): Attribute {
  return { kind: "describe", description };
}

export const mainContent: Attribute = describe({ kind: "main" });
export const navigation: Attribute = describe({ kind: "navigation" });
export const footer: Attribute = describe({ kind: "contentInfo" });
export const aside: Attribute = describe({ kind: "complementary" });

/** Levels outside 1..6 are clamped. */
export function heading(level: number): Attribute {
  return describe({ kind: "heading", level });
}

export function description(label: string): Attribute {
  return describe({ kind: "label", label });
}

export const announce: Attribute = describe({ kind: "livePolite" });
export const announceUrgently: Attribute = describe({ kind: "liveAssertive" });
