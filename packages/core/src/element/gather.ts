/**
 * packages/core/src/element/gather.ts — Attribute gathering.
 *
 * Why: The caller reverses the author's attribute list once; walking the
 * reversed list with first-claim-wins per slot means the last attribute the
 * author wrote for a slot takes effect. Transform components are never gated:
 * they fold into one transformation emitted when the list is exhausted.
 */

import { warnDev } from "../dev.js";
import { Cls } from "../style/classes.js";
import { EMPTY_FIELD, type Field, Flags, addFlag, hasFlag, mergeFields } from "../style/flag.js";
import { assertRenderableLength } from "../style/length.js";
import { skippable, styleName } from "../style/name.js";
import {
  type Transformation,
  UNTRANSFORMED,
  composeTransformation,
  transformClass,
} from "../style/transform.js";
import type { Style } from "../style/types.js";
import { type VAttr, attr, classAttr } from "../vdom/types.js";
import { addNearbyElement } from "./nearby.js";
import { renderHeight, renderWidth } from "./sizing.js";
import type {
  Attribute,
  Description,
  Gathered,
  HAlign,
  NearbyChildren,
  NodeName,
  VAlign,
} from "./types.js";

export type GatherState = {
  classes: string;
  node: NodeName;
  has: Field;
  transform: Transformation;
  styles: Style[];
  attributes: VAttr[];
  children: NearbyChildren;
};

export function initialState(classes: string, node: NodeName): GatherState {
  return {
    classes,
    node,
    has: EMPTY_FIELD,
    transform: UNTRANSFORMED,
    styles: [],
    attributes: [],
    children: { kind: "none" },
  };
}

/** Generic takes the name; a named node nests the new name inside itself. */
export function addNodeName(name: string, node: NodeName): NodeName {
  switch (node.kind) {
    case "generic":
      return { kind: "named", name };
    case "named":
      return { kind: "embedded", outer: node.name, inner: name };
    case "embedded":
      return node;
  }
}

export function alignXName(align: HAlign): string {
  switch (align) {
    case "left":
      return `${Cls.alignedHorizontally} ${Cls.alignLeft}`;
    case "right":
      return `${Cls.alignedHorizontally} ${Cls.alignRight}`;
    case "centerX":
      return `${Cls.alignedHorizontally} ${Cls.alignCenterX}`;
  }
}

export function alignYName(align: VAlign): string {
  switch (align) {
    case "top":
      return `${Cls.alignedVertically} ${Cls.alignTop}`;
    case "bottom":
      return `${Cls.alignedVertically} ${Cls.alignBottom}`;
    case "centerY":
      return `${Cls.alignedVertically} ${Cls.alignCenterY}`;
  }
}

function headingLevel(level: number): number {
  if (level >= 1 && level <= 6 && Number.isInteger(level)) return level;
  warnDev("gather", `heading level ${String(level)} clamped to h1..h6`);
  if (level <= 1 || Number.isNaN(level)) return 1;
  return Math.min(6, Math.floor(level));
}

function describe(state: GatherState, description: Description): void {
  switch (description.kind) {
    case "main":
      state.node = addNodeName("main", state.node);
      return;
    case "navigation":
      state.node = addNodeName("nav", state.node);
      return;
    case "contentInfo":
      state.node = addNodeName("footer", state.node);
      return;
    case "complementary":
      state.node = addNodeName("aside", state.node);
      return;
    case "heading":
      state.node = addNodeName(`h${String(headingLevel(description.level))}`, state.node);
      return;
    case "label":
      state.attributes.unshift(attr("aria-label", description.label));
      return;
    case "livePolite":
      state.attributes.unshift(attr("aria-live", "polite"));
      return;
    case "liveAssertive":
      state.attributes.unshift(attr("aria-live", "assertive"));
      return;
    case "button":
      state.attributes.unshift(attr("role", "button"));
      return;
    case "paragraph":
      return;
  }
}

function prependClasses(state: GatherState, classes: string): void {
  state.classes = `${classes} ${state.classes}`;
}

function step(state: GatherState, attribute: Attribute): void {
  switch (attribute.kind) {
    case "noAttribute":
      return;
    case "class":
      if (hasFlag(state.has, attribute.flag)) return;
      state.has = addFlag(state.has, attribute.flag);
      prependClasses(state, attribute.name);
      return;
    case "attr":
      state.attributes.unshift(attribute.attr);
      return;
    case "styleClass": {
      if (hasFlag(state.has, attribute.flag)) return;
      state.has = addFlag(state.has, attribute.flag);
      prependClasses(state, styleName(attribute.style));
      if (!skippable(attribute.flag, attribute.style)) state.styles.unshift(attribute.style);
      return;
    }
    case "transformComponent":
      state.has = addFlag(state.has, attribute.flag);
      state.transform = composeTransformation(state.transform, attribute.component);
      return;
    case "width":
    case "height": {
      const slot = attribute.kind === "width" ? Flags.width : Flags.height;
      if (hasFlag(state.has, slot)) return;
      assertRenderableLength(attribute.length);
      const rendered =
        attribute.kind === "width" ? renderWidth(attribute.length) : renderHeight(attribute.length);
      state.has = mergeFields(rendered.field, addFlag(state.has, slot));
      prependClasses(state, rendered.classes);
      state.styles.unshift(...rendered.styles);
      return;
    }
    case "describe":
      describe(state, attribute.description);
      return;
    case "nearby":
      if (attribute.element.kind === "styled") state.styles.push(...attribute.element.styles);
      state.children = addNearbyElement(attribute.location, attribute.element, state.children);
      return;
    case "alignX": {
      if (hasFlag(state.has, Flags.xAlign)) return;
      let has = addFlag(state.has, Flags.xAlign);
      if (attribute.align === "centerX") has = addFlag(has, Flags.centerX);
      if (attribute.align === "right") has = addFlag(has, Flags.alignRight);
      state.has = has;
      prependClasses(state, alignXName(attribute.align));
      return;
    }
    case "alignY": {
      if (hasFlag(state.has, Flags.yAlign)) return;
      let has = addFlag(state.has, Flags.yAlign);
      if (attribute.align === "centerY") has = addFlag(has, Flags.centerY);
      if (attribute.align === "bottom") has = addFlag(has, Flags.alignBottom);
      state.has = has;
      prependClasses(state, alignYName(attribute.align));
      return;
    }
  }
}

/**
 * Resolves an already-reversed attribute list against `state`. The state is
 * consumed; callers start from `initialState`.
 */
export function gather(state: GatherState, reversed: readonly Attribute[]): Gathered {
  for (const attribute of reversed) step(state, attribute);
  const cls = transformClass(state.transform);
  if (cls !== null) {
    state.classes = `${state.classes} ${cls}`;
    state.styles.unshift({ kind: "transform", transform: state.transform });
  }
  return {
    node: state.node,
    attributes: [classAttr(state.classes), ...state.attributes],
    styles: state.styles,
    children: state.children,
    has: state.has,
  };
}
