import { assert, describe, test } from "@flexweave/testkit";
import {
  DEFAULT_FOCUS_STYLE,
  DEFAULT_LAYOUT_OPTIONS,
  focusStyle,
  focusStyles,
  forceHover,
  noHover,
  resolveOptions,
  virtualCss,
} from "../options.js";
import { rgb } from "../style/color.js";

describe("resolveOptions", () => {
  test("no options gives the defaults", () => {
    assert.deepEqual(resolveOptions([]), DEFAULT_LAYOUT_OPTIONS);
  });

  test("the first option of each kind wins", () => {
    const resolved = resolveOptions([noHover, forceHover, virtualCss]);
    assert.equal(resolved.hover, "no");
    assert.equal(resolved.mode, "virtualCss");
    assert.equal(resolved.focus, DEFAULT_FOCUS_STYLE);
  });
});

describe("focusStyles", () => {
  test("the default focus ring is a 3px light blue shadow", () => {
    const [within, focusable] = focusStyles(DEFAULT_FOCUS_STYLE);
    if (within === undefined || within.kind !== "style") throw new Error("expected a style rule");
    assert.equal(within.selector, ".focus-within:focus-within");
    assert.deepEqual(within.props, [
      { key: "box-shadow", value: "0px 0px 0px 3px rgba(155,203,255,1)" },
      { key: "outline", value: "none" },
    ]);
    if (focusable === undefined || focusable.kind !== "style") throw new Error("expected a style rule");
    assert.equal(
      focusable.selector,
      ".s:focus .focusable, .s.focusable:focus, .ui-slide-bar:focus + .s.focusable-thumb",
    );
  });

  test("custom focus colors are rendered in order", () => {
    const option = focusStyle({ borderColor: rgb(1, 0, 0), backgroundColor: rgb(0, 0, 1), shadow: null });
    if (option.kind !== "focusStyle") throw new Error("expected focusStyle");
    const [within] = focusStyles(option.style);
    if (within === undefined || within.kind !== "style") throw new Error("expected a style rule");
    assert.deepEqual(within.props, [
      { key: "border-color", value: "rgba(255,0,0,1)" },
      { key: "background-color", value: "rgba(0,0,255,1)" },
      { key: "outline", value: "none" },
    ]);
  });
});
