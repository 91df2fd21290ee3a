/**
 * packages/testkit/src/vdom.ts — Structural helpers for virtual DOM trees.
 *
 * Typed structurally so the testkit does not depend on the packages it tests.
 */

export type InspectableAttr = Readonly<{ kind: string; name?: string; value: string }>;

export type InspectableNode =
  | Readonly<{
      kind: "node";
      tag: string;
      attrs: readonly InspectableAttr[];
      children: readonly InspectableNode[];
    }>
  | Readonly<{
      kind: "keyed";
      tag: string;
      attrs: readonly InspectableAttr[];
      children: readonly (readonly [string, InspectableNode])[];
    }>
  | Readonly<{ kind: "text"; text: string }>;

function childNodes(node: InspectableNode): readonly InspectableNode[] {
  switch (node.kind) {
    case "node":
      return node.children;
    case "keyed":
      return node.children.map(([, child]) => child);
    case "text":
      return [];
  }
}

/** All class names carried by a node, across every `class` attribute, in order. */
export function classList(node: InspectableNode): readonly string[] {
  if (node.kind === "text") return [];
  const out: string[] = [];
  for (const attr of node.attrs) {
    if (attr.kind !== "class") continue;
    for (const name of attr.value.split(" ")) {
      if (name.length > 0) out.push(name);
    }
  }
  return out;
}

/** Depth-first, pre-order search. */
export function findNodes(
  root: InspectableNode,
  predicate: (node: InspectableNode) => boolean,
): readonly InspectableNode[] {
  const out: InspectableNode[] = [];
  const visit = (node: InspectableNode): void => {
    if (predicate(node)) out.push(node);
    for (const child of childNodes(node)) visit(child);
  };
  visit(root);
  return out;
}

/** Concatenated text of every text node below `node`. */
export function textContent(node: InspectableNode): string {
  if (node.kind === "text") return node.text;
  return childNodes(node).map(textContent).join("");
}
