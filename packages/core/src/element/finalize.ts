/**
 * packages/core/src/element/finalize.ts — Node finalization and stylesheet embedding.
 *
 * Why: A node's markup depends on its parent's layout context. Fill-sized
 * children of rows and columns are emitted as-is; right/bottom/center aligned
 * ones get a container element so flexbox can push them into place.
 */

import { encodeStyles, reduceStyles, toStyleSheetString } from "../css/stylesheet.js";
import { staticStyleSheet } from "../css/baseSheet.js";
import { type LayoutOptions, focusStyles } from "../options.js";
import { Cls } from "../style/classes.js";
import { Flags, hasFlag } from "../style/flag.js";
import type { Style } from "../style/types.js";
import {
  type KeyedVNode,
  type VAttr,
  type VNode,
  classAttr,
  h,
  keyed,
  propAttr,
  vtext,
} from "../vdom/types.js";
import type { EmbedStyle, LayoutContext, NodeArgs, NodeName } from "./types.js";

export const STATIC_RULES_TAG = "flexweave-static-rules";
export const DYNAMIC_RULES_TAG = "flexweave-rules";

function textNode(sizing: string, text: string): VNode {
  return h("div", [classAttr(`${Cls.any} ${Cls.text} ${sizing}`)], [vtext(text)]);
}

/** Text sized to its content. */
export function textElement(text: string): VNode {
  return textNode(`${Cls.widthContent} ${Cls.heightContent}`, text);
}

/** Text filling its single-child container. */
export function textElementFill(text: string): VNode {
  return textNode(`${Cls.widthFill} ${Cls.heightFill}`, text);
}

/** Callers choose the `onlyDynamic` embedding when the static sheet is suppressed. */
export function staticRoot(options: LayoutOptions): VNode {
  if (options.mode === "virtualCss") {
    return h(STATIC_RULES_TAG, [propAttr("rules", staticStyleSheet())], []);
  }
  return h("div", [], [h("style", [], [vtext(staticStyleSheet())])]);
}

/** Focus rules first, then hoisted styles; one rule per name. */
export function dynamicStyles(options: LayoutOptions, styles: readonly Style[]): readonly Style[] {
  return reduceStyles([...focusStyles(options.focus), ...styles]);
}

export function toStyleSheet(options: LayoutOptions, styles: readonly Style[]): VNode {
  const reduced = dynamicStyles(options, styles);
  switch (options.mode) {
    case "layout":
    case "noStaticStyleSheet":
      return h("div", [], [h("style", [], [vtext(toStyleSheetString(options, reduced))])]);
    case "virtualCss":
      return h(DYNAMIC_RULES_TAG, [propAttr("rules", encodeStyles(options, reduced))], []);
  }
}

export function embedWith(embed: EmbedStyle, children: readonly VNode[]): readonly VNode[] {
  switch (embed.kind) {
    case "noStyleSheet":
      return children;
    case "onlyDynamic":
      return [toStyleSheet(embed.options, embed.styles), ...children];
    case "staticRootAndDynamic":
      return [staticRoot(embed.options), toStyleSheet(embed.options, embed.styles), ...children];
  }
}

export function embedKeyed(embed: EmbedStyle, children: readonly KeyedVNode[]): readonly KeyedVNode[] {
  switch (embed.kind) {
    case "noStyleSheet":
      return children;
    case "onlyDynamic":
      return [["dynamic-stylesheet", toStyleSheet(embed.options, embed.styles)], ...children];
    case "staticRootAndDynamic":
      return [
        ["static-stylesheet", staticRoot(embed.options)],
        ["dynamic-stylesheet", toStyleSheet(embed.options, embed.styles)],
        ...children,
      ];
  }
}

function containerClass(...extra: readonly string[]): VAttr {
  return classAttr([Cls.any, Cls.single, Cls.container, ...extra].join(" "));
}

function renderNamed(
  node: NodeName,
  attributes: readonly VAttr[],
  createNode: (tag: string, attrs: readonly VAttr[]) => VNode,
): VNode {
  switch (node.kind) {
    case "generic":
      return createNode("div", attributes);
    case "named":
      return createNode(node.name, attributes);
    case "embedded":
      return h(node.outer, attributes, [createNode(node.inner, [classAttr(`${Cls.any} ${Cls.single}`)])]);
  }
}

export function finalizeNode(args: NodeArgs, embed: EmbedStyle, parent: LayoutContext): VNode {
  const { has, node, attributes, children } = args;
  const createNode = (tag: string, attrs: readonly VAttr[]): VNode =>
    children.kind === "keyed"
      ? keyed(tag, attrs, embedKeyed(embed, children.children))
      : h(tag, attrs, embedWith(embed, children.children));

  const html = renderNamed(node, attributes, createNode);

  switch (parent) {
    case "asRow":
      if (hasFlag(has, Flags.widthFill) && !hasFlag(has, Flags.widthBetween)) return html;
      if (hasFlag(has, Flags.alignRight)) {
        return h("u", [containerClass(Cls.contentCenterY, Cls.alignContainerRight)], [html]);
      }
      if (hasFlag(has, Flags.centerX)) {
        return h("s", [containerClass(Cls.contentCenterY, Cls.alignContainerCenterX)], [html]);
      }
      return html;
    case "asColumn":
      if (hasFlag(has, Flags.heightFill) && !hasFlag(has, Flags.heightBetween)) return html;
      if (hasFlag(has, Flags.centerY)) {
        return h("s", [containerClass(Cls.contentCenterX, Cls.alignContainerCenterY)], [html]);
      }
      if (hasFlag(has, Flags.alignBottom)) {
        return h("u", [containerClass(Cls.contentCenterX, Cls.alignContainerBottom)], [html]);
      }
      return html;
    case "asEl":
    case "asGrid":
    case "asParagraph":
    case "asTextColumn":
      return html;
  }
}
