import { assert, classList, describe, findNodes, test } from "@flexweave/testkit";
import { finalizeNode } from "../../element/finalize.js";
import { type Element, NO_STYLE_SHEET, type NodeArgs } from "../../element/types.js";
import { FlexweaveError } from "../../errors.js";
import { Flags, hasFlag } from "../../style/flag.js";
import { rgb } from "../../style/color.js";
import { fill, px, shrink } from "../../style/length.js";
import { styleName } from "../../style/name.js";
import { single } from "../../style/types.js";
import { renderToHtml } from "../../vdom/html.js";
import { padding, paddingEach, paddingFloat, spacing, width } from "../attributes.js";
import * as Border from "../border.js";
import * as Font from "../font.js";
import { grid, image, link, newTabLink, paragraph, text, textColumn, wrappedRow } from "../ui.js";

function argsOf(e: Element): NodeArgs {
  if (e.kind !== "unstyled" && e.kind !== "styled") throw new Error("expected a node element");
  return e.html;
}

function classesOf(e: Element): string {
  const first = argsOf(e).attributes[0];
  if (first === undefined || first.kind !== "class") throw new Error("expected class attribute first");
  return first.value;
}

function html(e: Element): string {
  return renderToHtml(finalizeNode(argsOf(e), NO_STYLE_SHEET, "asEl"));
}

describe("paragraph and textColumn", () => {
  test("paragraph is a filling p with line spacing", () => {
    const p = paragraph([], [text("x")]);
    assert.equal(classesOf(p), "wf spacing-5-5 s p");
    assert.deepEqual(argsOf(p).node, { kind: "named", name: "p" });
  });

  test("textColumn is bounded between 500 and 750 pixels", () => {
    const col = textColumn([], []);
    assert.equal(classesOf(col), "max-width-750 min-width-500 wf s pg");
    if (col.kind !== "styled") throw new Error("expected styled");
    assert.deepEqual(col.styles, [
      single("max-width-750", "max-width", "750px"),
      single("min-width-500", "min-width", "500px"),
    ]);
    assert.equal(hasFlag(col.html.has, Flags.widthBetween), true);
  });

  test("textColumn widths can be overridden", () => {
    assert.equal(classesOf(textColumn([width(fill)], [])), "wf s pg");
  });
});

describe("image and links", () => {
  test("image sizes both the container and the img", () => {
    const img = image([width(px(100))], { src: "a.png", description: "A" });
    assert.equal(
      html(img),
      '<div class="we width-px-100 s e ic"><img class="we width-px-100 s e" src="a.png" alt="A"></div>',
    );
  });

  test("link is a shrinking anchor with safe rel", () => {
    assert.equal(
      html(link([], "https://example.com", text("go"))),
      '<a class="wc hc s e ccx ccy lnk" href="https://example.com" rel="noopener noreferrer"><div class="s t wf hf">go</div></a>',
    );
  });

  test("newTabLink targets a blank tab", () => {
    assert.equal(
      html(newTabLink([], "https://example.com", text("go"))),
      '<a class="wc hc s e ccx ccy lnk" href="https://example.com" rel="noopener noreferrer" target="_blank"><div class="s t wf hf">go</div></a>',
    );
  });
});

describe("wrappedRow", () => {
  test("wide padding absorbs half the spacing", () => {
    const r = wrappedRow([spacing(10), padding(20)], []);
    assert.equal(classesOf(r), "wc hc spacing-10-10 padf-3825-3825-3825-3825 s r");
    if (r.kind !== "styled") throw new Error("expected styled");
    assert.deepEqual(
      r.styles.map(styleName),
      ["spacing-10-10", "padf-3825-3825-3825-3825"],
    );
  });

  test("narrow padding nests the row and pulls it outward", () => {
    const r = wrappedRow([spacing(10)], [text("a")]);
    const node = finalizeNode(argsOf(r), NO_STYLE_SHEET, "asEl");
    const [inner] = findNodes(node, (n) => classList(n).includes("wrp"));
    if (inner === undefined || inner.kind === "text") throw new Error("expected the wrapped row");
    assert.deepEqual(
      inner.attrs.filter((a) => a.kind === "style"),
      [
        { kind: "style", key: "margin", value: "-5px -5px" },
        { kind: "style", key: "width", value: "calc(100% + 10px)" },
        { kind: "style", key: "height", value: "calc(100% + 10px)" },
      ],
    );
  });

  test("without spacing it is a plain wrapping row", () => {
    assert.equal(classesOf(wrappedRow([], [])), "wc hc s r");
  });

  test("fractional and whole-pixel paddings never share a name", () => {
    assert.equal(styleName(paddingFloat(1, 2, 3, 4).style), "padf-255-510-765-1020");
    assert.equal(styleName(paddingEach({ top: 255, right: 510, bottom: 765, left: 1020 }).style), "pad-255-510-765-1020");
  });
});

describe("grid", () => {
  test("cells are positioned and the template is named by its tracks", () => {
    const g = grid([], {
      columns: [px(100), fill],
      rows: [shrink],
      cells: [{ row: 1, col: 2, width: 1, height: 1, element: text("x") }],
    });
    if (g.kind !== "styled") throw new Error("expected styled");
    assert.deepEqual(g.styles.map(styleName), [
      "gp grid-pos-1-2-1-1",
      "grid-rows-auto-cols-100px-1fr-space-x-0px-space-y-0px",
    ]);
  });

  test("positions must be 1-based integers", () => {
    assert.throws(
      () => grid([], { columns: [fill], rows: [fill], cells: [{ row: 0, col: 1, width: 1, height: 1, element: text("x") }] }),
      (err: unknown) => err instanceof FlexweaveError && err.code === "FW_INVALID_PROPS",
    );
  });
});

describe("border and font attributes", () => {
  test("small uniform border widths are class-only", () => {
    const e = paragraph([Border.width(3)], []);
    assert.ok(classesOf(e).split(" ").includes("b-3"));
    if (e.kind !== "styled") throw new Error("expected styled");
    assert.deepEqual(e.styles.map(styleName), ["spacing-5-5"]);
  });

  test("rounded corners render a radius", () => {
    assert.deepEqual(Border.rounded(4).style, single("br-4", "border-radius", "4px"));
  });

  test("uneven border widths encode every side", () => {
    assert.equal(styleName(Border.widthEach({ top: 1, right: 2, bottom: 3, left: 4 }).style), "b-1-2-3-4");
    assert.equal(styleName(Border.widthXY(2, 2).style), "b-2");
  });

  test("font families are named after their faces", () => {
    assert.equal(
      styleName(Font.family([Font.typeface("Fira Code"), Font.monospace]).style),
      "ff-fira-codemonospace",
    );
  });

  test("letter spacing encodes the value in the class", () => {
    assert.deepEqual(Font.letterSpacing(2).style, single("ls-510", "letter-spacing", "2px"));
  });

  test("non-finite shadow numbers are rejected", () => {
    const base = { offset: [1, 1] as const, blur: 2, size: 0, color: rgb(0, 0, 0) };
    const invalid = (err: unknown) => err instanceof FlexweaveError && err.code === "FW_INVALID_PROPS";
    assert.throws(() => Font.shadow({ ...base, offset: [Number.NaN, 1] }), invalid);
    assert.throws(() => Border.shadow({ ...base, blur: Number.POSITIVE_INFINITY }), invalid);
    assert.throws(() => Border.innerShadow({ ...base, size: Number.NaN }), invalid);
  });

  test("feature indexes must be whole and non-negative", () => {
    const invalid = (err: unknown) => err instanceof FlexweaveError && err.code === "FW_INVALID_PROPS";
    assert.throws(() => Font.indexed("ss01", Number.NaN), invalid);
    assert.throws(() => Font.indexed("ss01", 1.5), invalid);
    assert.deepEqual(Font.indexed("ss01", 2), { kind: "indexed", name: "ss01", index: 2 });
  });

  test("typefaces with unusable metrics are rejected", () => {
    const invalid = (err: unknown) => err instanceof FlexweaveError && err.code === "FW_INVALID_PROPS";
    const flat = { capital: 0.5, lowercase: 0.5, baseline: 0.5, descender: 0.5 };
    assert.throws(() => Font.fontWith({ name: "Flat", adjustment: flat }), invalid);
    assert.throws(
      () => Font.fontWith({ name: "Broken", adjustment: { ...flat, capital: Number.NaN } }),
      invalid,
    );
  });
});
