/**
 * packages/core/src/vdom/types.ts — Virtual DOM output model.
 *
 * Why: Finalization produces plain data: element nodes with typed
 * attributes, keyed element nodes whose children carry identity keys for a
 * downstream differ, and text nodes.
 */

export type VAttr =
  | Readonly<{ kind: "class"; value: string }>
  | Readonly<{ kind: "style"; key: string; value: string }>
  | Readonly<{ kind: "attr"; name: string; value: string }>
  | Readonly<{ kind: "prop"; name: string; value: string }>;

export type VNode =
  | Readonly<{ kind: "node"; tag: string; attrs: readonly VAttr[]; children: readonly VNode[] }>
  | Readonly<{
      kind: "keyed";
      tag: string;
      attrs: readonly VAttr[];
      children: readonly KeyedVNode[];
    }>
  | Readonly<{ kind: "text"; text: string }>;

export type KeyedVNode = readonly [key: string, node: VNode];

export function h(tag: string, attrs: readonly VAttr[], children: readonly VNode[]): VNode {
  return { kind: "node", tag, attrs, children };
}

export function keyed(tag: string, attrs: readonly VAttr[], children: readonly KeyedVNode[]): VNode {
  return { kind: "keyed", tag, attrs, children };
}

export function vtext(text: string): VNode {
  return { kind: "text", text };
}

export function classAttr(value: string): VAttr {
  return { kind: "class", value };
}

export function attr(name: string, value: string): VAttr {
  return { kind: "attr", name, value };
}

export function styleAttr(key: string, value: string): VAttr {
  return { kind: "style", key, value };
}

export function propAttr(name: string, value: string): VAttr {
  return { kind: "prop", name, value };
}
