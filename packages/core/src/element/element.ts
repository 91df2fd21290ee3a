/**
 * packages/core/src/element/element.ts — Element construction.
 *
 * Why: Gathers an element's attributes, finalizes its children in the
 * element's layout context and hoists their styles. Children's styles come
 * before the element's own, in child order, so the most deeply nested
 * occurrence of a rule is the one the stylesheet keeps.
 */

import { Cls } from "../style/classes.js";
import type { Style } from "../style/types.js";
import type { KeyedVNode, VNode } from "../vdom/types.js";
import { finalizeNode, textElement, textElementFill } from "./finalize.js";
import { gather, initialState } from "./gather.js";
import { addChildren } from "./nearby.js";
import {
  type Attribute,
  type Children,
  type Element,
  type Gathered,
  type LayoutContext,
  type NodeArgs,
  type NodeName,
  NO_STYLE_SHEET,
} from "./types.js";

export function contextClasses(context: LayoutContext): string {
  switch (context) {
    case "asRow":
      return `${Cls.any} ${Cls.row}`;
    case "asColumn":
      return `${Cls.any} ${Cls.column}`;
    case "asEl":
      return `${Cls.any} ${Cls.single}`;
    case "asGrid":
      return `${Cls.any} ${Cls.grid}`;
    case "asParagraph":
      return `${Cls.any} ${Cls.paragraph}`;
    case "asTextColumn":
      return `${Cls.any} ${Cls.page}`;
  }
}

type Rendered = Readonly<{ node: VNode | null; styles: readonly Style[] }>;

function renderChild(context: LayoutContext, child: Element): Rendered {
  switch (child.kind) {
    case "unstyled":
      return { node: finalizeNode(child.html, NO_STYLE_SHEET, context), styles: [] };
    case "styled":
      return { node: finalizeNode(child.html, NO_STYLE_SHEET, context), styles: child.styles };
    case "text":
      return {
        node: context === "asEl" ? textElementFill(child.text) : textElement(child.text),
        styles: [],
      };
    case "empty":
      return { node: null, styles: [] };
  }
}

export function createElement(
  context: LayoutContext,
  children: Children<Element>,
  rendered: Gathered,
): Element {
  const hoisted: Style[] = [];
  let finalized: Children<VNode>;
  if (children.kind === "unkeyed") {
    const nodes: VNode[] = [];
    for (const child of children.children) {
      const r = renderChild(context, child);
      if (r.node !== null) nodes.push(r.node);
      hoisted.push(...r.styles);
    }
    finalized = { kind: "unkeyed", children: nodes };
  } else {
    const nodes: KeyedVNode[] = [];
    for (const [key, child] of children.children) {
      const r = renderChild(context, child);
      if (r.node !== null) nodes.push([key, r.node]);
      hoisted.push(...r.styles);
    }
    finalized = { kind: "keyed", children: nodes };
  }
  const html: NodeArgs = {
    has: rendered.has,
    node: rendered.node,
    attributes: rendered.attributes,
    children: addChildren(finalized, rendered.children),
  };
  const styles = [...hoisted, ...rendered.styles];
  return styles.length === 0 ? { kind: "unstyled", html } : { kind: "styled", styles, html };
}

/**
 * Builds an element. The last attribute in `attributes` wins for each slot.
 */
export function element(
  context: LayoutContext,
  node: NodeName,
  attributes: readonly Attribute[],
  children: Children<Element>,
): Element {
  const reversed = [...attributes].reverse();
  return createElement(context, children, gather(initialState(contextClasses(context), node), reversed));
}
