/**
 * packages/core/src/element/nearby.ts — Out-of-flow children.
 *
 * Nearby elements render inside a positioned wrapper and are bucketed by
 * side. Within a side the newest addition is placed first.
 */

import { Cls } from "../style/classes.js";
import { type VNode, classAttr, h, vtext } from "../vdom/types.js";
import { finalizeNode, textElement } from "./finalize.js";
import {
  type Children,
  type Element,
  type Location,
  type NearbyChildren,
  NO_STYLE_SHEET,
} from "./types.js";

function locationClass(location: Location): string {
  switch (location) {
    case "above":
      return Cls.above;
    case "below":
      return Cls.below;
    case "onRight":
      return Cls.onRight;
    case "onLeft":
      return Cls.onLeft;
    case "inFront":
      return Cls.inFront;
    case "behind":
      return Cls.behind;
  }
}

export function nearbyElement(location: Location, element: Element): VNode {
  const wrapper = [classAttr(`${Cls.nearby} ${Cls.single} ${locationClass(location)}`)];
  switch (element.kind) {
    case "empty":
      return h("div", wrapper, [vtext("")]);
    case "text":
      return h("div", wrapper, [textElement(element.text)]);
    case "unstyled":
    case "styled":
      return h("div", wrapper, [finalizeNode(element.html, NO_STYLE_SHEET, "asEl")]);
  }
}

export function addNearbyElement(
  location: Location,
  element: Element,
  existing: NearbyChildren,
): NearbyChildren {
  const node = nearbyElement(location, element);
  const isBehind = location === "behind";
  switch (existing.kind) {
    case "none":
      return isBehind ? { kind: "behind", behind: [node] } : { kind: "inFront", inFront: [node] };
    case "behind":
      return isBehind
        ? { kind: "behind", behind: [node, ...existing.behind] }
        : { kind: "both", behind: existing.behind, inFront: [node] };
    case "inFront":
      return isBehind
        ? { kind: "both", behind: [node], inFront: existing.inFront }
        : { kind: "inFront", inFront: [node, ...existing.inFront] };
    case "both":
      return isBehind
        ? { kind: "both", behind: [node, ...existing.behind], inFront: existing.inFront }
        : { kind: "both", behind: existing.behind, inFront: [node, ...existing.inFront] };
  }
}

function behindOf(nearby: NearbyChildren): readonly VNode[] {
  return nearby.kind === "behind" || nearby.kind === "both" ? nearby.behind : [];
}

function inFrontOf(nearby: NearbyChildren): readonly VNode[] {
  return nearby.kind === "inFront" || nearby.kind === "both" ? nearby.inFront : [];
}

export const NEARBY_KEY = "nearby-element";

/** Behind-content first, then the element's own children, then in-front. */
export function addChildren(existing: Children<VNode>, nearby: NearbyChildren): Children<VNode> {
  if (nearby.kind === "none") return existing;
  switch (existing.kind) {
    case "unkeyed":
      return {
        kind: "unkeyed",
        children: [...behindOf(nearby), ...existing.children, ...inFrontOf(nearby)],
      };
    case "keyed": {
      const keyedOf = (nodes: readonly VNode[]) => nodes.map((n) => [NEARBY_KEY, n] as const);
      return {
        kind: "keyed",
        children: [...keyedOf(behindOf(nearby)), ...existing.children, ...keyedOf(inFrontOf(nearby))],
      };
    }
  }
}
