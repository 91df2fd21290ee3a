/**
 * packages/core/src/element/types.ts — Attributes, elements and the gathering result.
 *
 * Why: Builders produce flat attribute lists and Element trees as plain data.
 * Styled elements keep their unfinalized node args so a parent can hoist
 * their styles and finalize them in its own layout context.
 */

import type { LayoutOptions } from "../options.js";
import type { Field, Flag } from "../style/flag.js";
import type { Length } from "../style/length.js";
import type { TransformComponent } from "../style/transform.js";
import type { Style } from "../style/types.js";
import type { VAttr, VNode } from "../vdom/types.js";

export type HAlign = "left" | "centerX" | "right";

export type VAlign = "top" | "centerY" | "bottom";

export type Location = "above" | "below" | "onRight" | "onLeft" | "inFront" | "behind";

export type Description =
  | Readonly<{ kind: "main" }>
  | Readonly<{ kind: "navigation" }>
  | Readonly<{ kind: "contentInfo" }>
  | Readonly<{ kind: "complementary" }>
  | Readonly<{ kind: "heading"; level: number }>
  | Readonly<{ kind: "label"; label: string }>
  | Readonly<{ kind: "livePolite" }>
  | Readonly<{ kind: "liveAssertive" }>
  | Readonly<{ kind: "button" }>
  | Readonly<{ kind: "paragraph" }>;

export type StyleAttribute = Readonly<{ kind: "styleClass"; flag: Flag; style: Style }>;

export type TransformAttribute = Readonly<{
  kind: "transformComponent";
  flag: Flag;
  component: TransformComponent;
}>;

/** Attributes usable inside hover/focus/active decorations. */
export type Decoration = StyleAttribute | TransformAttribute;

export type Attribute =
  | Readonly<{ kind: "noAttribute" }>
  | Readonly<{ kind: "attr"; attr: VAttr }>
  | Readonly<{ kind: "describe"; description: Description }>
  | Readonly<{ kind: "class"; flag: Flag; name: string }>
  | StyleAttribute
  | Readonly<{ kind: "alignY"; align: VAlign }>
  | Readonly<{ kind: "alignX"; align: HAlign }>
  | Readonly<{ kind: "width"; length: Length }>
  | Readonly<{ kind: "height"; length: Length }>
  | Readonly<{ kind: "nearby"; location: Location; element: Element }>
  | TransformAttribute;

export type LayoutContext = "asRow" | "asColumn" | "asEl" | "asGrid" | "asParagraph" | "asTextColumn";

export type NodeName =
  | Readonly<{ kind: "generic" }>
  | Readonly<{ kind: "named"; name: string }>
  | Readonly<{ kind: "embedded"; outer: string; inner: string }>;

export type Children<T> =
  | Readonly<{ kind: "unkeyed"; children: readonly T[] }>
  | Readonly<{ kind: "keyed"; children: readonly (readonly [key: string, child: T])[] }>;

export type NearbyChildren =
  | Readonly<{ kind: "none" }>
  | Readonly<{ kind: "behind"; behind: readonly VNode[] }>
  | Readonly<{ kind: "inFront"; inFront: readonly VNode[] }>
  | Readonly<{ kind: "both"; behind: readonly VNode[]; inFront: readonly VNode[] }>;

/** Everything finalization needs except the embed mode and parent context. */
export type NodeArgs = Readonly<{
  has: Field;
  node: NodeName;
  attributes: readonly VAttr[];
  children: Children<VNode>;
}>;

export type Element =
  | Readonly<{ kind: "empty" }>
  | Readonly<{ kind: "text"; text: string }>
  | Readonly<{ kind: "unstyled"; html: NodeArgs }>
  | Readonly<{ kind: "styled"; styles: readonly Style[]; html: NodeArgs }>;

export type EmbedStyle =
  | Readonly<{ kind: "noStyleSheet" }>
  | Readonly<{ kind: "staticRootAndDynamic"; options: LayoutOptions; styles: readonly Style[] }>
  | Readonly<{ kind: "onlyDynamic"; options: LayoutOptions; styles: readonly Style[] }>;

export type Gathered = Readonly<{
  node: NodeName;
  attributes: readonly VAttr[];
  styles: readonly Style[];
  children: NearbyChildren;
  has: Field;
}>;

export const GENERIC: NodeName = Object.freeze({ kind: "generic" });

export function named(name: string): NodeName {
  return { kind: "named", name };
}

export const NO_STYLE_SHEET: EmbedStyle = Object.freeze({ kind: "noStyleSheet" });

export const EMPTY: Element = Object.freeze({ kind: "empty" });
