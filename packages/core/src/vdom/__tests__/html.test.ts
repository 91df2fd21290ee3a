import { assert, describe, test } from "@flexweave/testkit";
import { organizeAttrs, renderToHtml } from "../html.js";
import { attr, classAttr, h, keyed, propAttr, styleAttr, vtext } from "../types.js";

describe("organizeAttrs", () => {
  test("merges classes and styles and drops properties", () => {
    const organized = organizeAttrs([
      classAttr("s e"),
      styleAttr("margin", "1px"),
      attr("id", "x"),
      classAttr(" wf "),
      propAttr("rules", "{}"),
      styleAttr("width", "2px"),
    ]);
    assert.deepEqual(organized, {
      className: "s e wf",
      style: "margin:1px;width:2px;",
      attributes: [["id", "x"]],
    });
  });

  test("reports absent class and style as null", () => {
    assert.deepEqual(organizeAttrs([classAttr("  ")]), { className: null, style: null, attributes: [] });
  });
});

describe("renderToHtml", () => {
  test("serializes attributes and escapes text", () => {
    const node = h("div", [classAttr("s e"), styleAttr("margin", "1px"), attr("id", "x")], [vtext("a<b & c")]);
    assert.equal(renderToHtml(node), '<div class="s e" style="margin:1px;" id="x">a&lt;b &amp; c</div>');
  });

  test("style contents are raw text", () => {
    assert.equal(renderToHtml(h("style", [], [vtext(".a > .b { }")])), "<style>.a > .b { }</style>");
  });

  test("style contents cannot close their element", () => {
    const node = h("style", [], [vtext(".a { } </style><b>x</b>")]);
    assert.equal(renderToHtml(node), "<style>.a { } <\\/style><b>x<\\/b></style>");
  });

  test("void elements have no closing tag and quotes are escaped", () => {
    const img = h("img", [attr("src", "a.png"), attr("alt", 'say "hi"')], []);
    assert.equal(renderToHtml(img), '<img src="a.png" alt="say &quot;hi&quot;">');
  });

  test("keyed children render in order without their keys", () => {
    const list = keyed("ul", [], [
      ["k1", h("li", [], [vtext("x")])],
      ["k2", h("li", [], [vtext("y")])],
    ]);
    assert.equal(renderToHtml(list), "<ul><li>x</li><li>y</li></ul>");
  });
});
