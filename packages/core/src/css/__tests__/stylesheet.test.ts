import { assert, describe, test } from "@flexweave/testkit";
import { DEFAULT_LAYOUT_OPTIONS } from "../../options.js";
import { type Style, single } from "../../style/types.js";
import { encodeStyles, reduceStyles, renderTopLevel, toStyleSheetString } from "../stylesheet.js";

const first = single("op", "opacity", "0.5");
const shadowed = single("op", "opacity", "0.9");
const other: Style = { kind: "fontSize", size: 40 };

describe("reduceStyles", () => {
  test("keeps the first style per name in first-seen order", () => {
    assert.deepEqual(reduceStyles([first, other, shadowed]), [first, other]);
  });

  test("is idempotent", () => {
    const once = reduceStyles([first, other, shadowed, other]);
    assert.deepEqual(reduceStyles(once), once);
  });
});

describe("toStyleSheetString", () => {
  test("renders one line per rule", () => {
    assert.equal(
      toStyleSheetString(DEFAULT_LAYOUT_OPTIONS, [first, other]),
      ".op { opacity: 0.5; }\n.font-size-40 { font-size: 40px; }",
    );
  });

  test("encodeStyles maps names to rules", () => {
    assert.equal(
      encodeStyles(DEFAULT_LAYOUT_OPTIONS, [first]),
      JSON.stringify({ op: [".op { opacity: 0.5; }"] }),
    );
  });
});

describe("renderTopLevel", () => {
  test("imports come first, then one adjustment line per family", () => {
    const lines = renderTopLevel([
      { name: "ff-x", fonts: [{ kind: "importFont", name: "X", url: "https://fonts.example/x.css" }] },
    ]);
    assert.deepEqual(lines, [
      "@import url('https://fonts.example/x.css');",
      ".ff-x.cap, .ff-x .cap {line-height: 1;} .ff-x.cap> .t, .ff-x .cap > .t {vertical-align: 0;line-height: 1;}",
    ]);
  });

  test("import urls are quoted as css strings", () => {
    const [importLine] = renderTopLevel([
      { name: "ff-y", fonts: [{ kind: "importFont", name: "Y", url: "https://fonts.example/y'</style>.css" }] },
    ]);
    assert.equal(importLine, "@import url('https://fonts.example/y\\'\\3c /style>.css');");
  });

  test("repeated families produce one line", () => {
    const family = { name: "ff-serif", fonts: [{ kind: "serif" as const }] };
    assert.equal(renderTopLevel([family, family]).length, 1);
  });
});
