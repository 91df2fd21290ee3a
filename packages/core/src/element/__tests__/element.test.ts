import { assert, classList, describe, test, textContent } from "@flexweave/testkit";
import * as Font from "../../widgets/font.js";
import { above, behindContent, inFront } from "../../widgets/attributes.js";
import { el, text } from "../../widgets/ui.js";
import { element } from "../element.js";
import { finalizeNode } from "../finalize.js";
import { NEARBY_KEY } from "../nearby.js";
import { EMPTY, type Element, GENERIC, NO_STYLE_SHEET, type NodeArgs } from "../types.js";

function argsOf(e: Element): NodeArgs {
  if (e.kind !== "unstyled" && e.kind !== "styled") throw new Error("expected a node element");
  return e.html;
}

describe("element: children", () => {
  test("children's styles hoist ahead of the element's own", () => {
    const col = element("asColumn", GENERIC, [Font.size(40)], {
      kind: "unkeyed",
      children: [el([Font.size(50)], text("x"))],
    });
    if (col.kind !== "styled") throw new Error("expected styled");
    assert.deepEqual(col.styles, [
      { kind: "fontSize", size: 50 },
      { kind: "fontSize", size: 40 },
    ]);
  });

  test("empty children render nothing", () => {
    const r = element("asRow", GENERIC, [], { kind: "unkeyed", children: [EMPTY, text("a")] });
    const children = argsOf(r).children;
    if (children.kind !== "unkeyed") throw new Error("expected unkeyed");
    assert.equal(children.children.length, 1);
  });

  test("elements without styles are unstyled", () => {
    assert.equal(element("asEl", GENERIC, [], { kind: "unkeyed", children: [] }).kind, "unstyled");
  });
});

describe("element: nearby", () => {
  test("behind first, then content, then in-front in author order", () => {
    const e = element(
      "asEl",
      GENERIC,
      [above(text("a")), above(text("b")), behindContent(text("c"))],
      { kind: "unkeyed", children: [text("main")] },
    );
    const node = finalizeNode(argsOf(e), NO_STYLE_SHEET, "asEl");
    assert.equal(textContent(node), "cmainab");
    if (node.kind !== "node") throw new Error("expected node");
    const behind = node.children[0];
    if (behind === undefined) throw new Error("expected a behind child");
    assert.deepEqual(classList(behind), ["nb", "e", "bh"]);
  });

  test("styles of a nearby element hoist to its host", () => {
    const e = element("asEl", GENERIC, [inFront(el([Font.size(40)], text("x")))], {
      kind: "unkeyed",
      children: [],
    });
    if (e.kind !== "styled") throw new Error("expected styled");
    assert.deepEqual(e.styles, [{ kind: "fontSize", size: 40 }]);
  });

  test("keyed hosts give nearby children the shared key", () => {
    const e = element("asRow", GENERIC, [inFront(text("n"))], {
      kind: "keyed",
      children: [["k", text("x")]],
    });
    const children = argsOf(e).children;
    if (children.kind !== "keyed") throw new Error("expected keyed");
    assert.deepEqual(
      children.children.map(([key]) => key),
      ["k", NEARBY_KEY],
    );
  });
});
