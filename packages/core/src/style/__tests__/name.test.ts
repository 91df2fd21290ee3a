import { assert, describe, test } from "@flexweave/testkit";
import { rgb } from "../color.js";
import { Flags } from "../flag.js";
import { fill, px, shrink } from "../length.js";
import { UNTRANSFORMED } from "../transform.js";
import { type Style, borderWidthStyle, colored, paddingStyle } from "../types.js";
import { skippable, styleName } from "../name.js";

describe("styleName", () => {
  test("class-carrying styles use their class", () => {
    assert.equal(styleName(paddingStyle("p-24", 24, 24, 24, 24)), "p-24");
    assert.equal(styleName({ kind: "fontSize", size: 14 }), "font-size-14");
  });

  test("pseudo wrappers suffix each named inner style", () => {
    const style: Style = {
      kind: "pseudo",
      pseudo: "hover",
      styles: [
        colored("bg-255-0-0-255", "background-color", rgb(1, 0, 0)),
        { kind: "transform", transform: UNTRANSFORMED },
      ],
    };
    assert.equal(styleName(style), "bg-255-0-0-255-hv");
  });

  test("grid template names encode rows, columns and spacing", () => {
    const style: Style = {
      kind: "gridTemplate",
      template: { spacing: [px(0), px(0)], columns: [px(100), fill], rows: [shrink] },
    };
    assert.equal(styleName(style), "grid-rows-auto-cols-100px-1fr-space-x-0px-space-y-0px");
  });

  test("grid positions carry the shared gp class", () => {
    const style: Style = { kind: "gridPosition", position: { row: 1, col: 2, width: 3, height: 1 } };
    assert.equal(styleName(style), "gp grid-pos-1-2-3-1");
  });
});

describe("skippable", () => {
  test("uniform paddings up to 24 are pre-baked", () => {
    assert.equal(skippable(Flags.padding, paddingStyle("p-24", 24, 24, 24, 24)), true);
    assert.equal(skippable(Flags.padding, paddingStyle("p-25", 25, 25, 25, 25)), false);
    assert.equal(skippable(Flags.padding, paddingStyle("pad-1-2-3-4", 1, 2, 3, 4)), false);
  });

  test("uniform border widths up to 6 are pre-baked", () => {
    assert.equal(skippable(Flags.borderWidth, borderWidthStyle("b-6", 6, 6, 6, 6)), true);
    assert.equal(skippable(Flags.borderWidth, borderWidthStyle("b-7", 7, 7, 7, 7)), false);
  });

  test("font sizes 8 through 32 are pre-baked", () => {
    assert.equal(skippable(Flags.fontSize, { kind: "fontSize", size: 8 }), true);
    assert.equal(skippable(Flags.fontSize, { kind: "fontSize", size: 32 }), true);
    assert.equal(skippable(Flags.fontSize, { kind: "fontSize", size: 7 }), false);
    assert.equal(skippable(Flags.fontSize, { kind: "fontSize", size: 33 }), false);
  });

  test("other styles are never skipped", () => {
    const style = colored("fc-0-0-0-255", "color", rgb(0, 0, 0));
    assert.equal(skippable(Flags.fontColor, style), false);
  });
});
