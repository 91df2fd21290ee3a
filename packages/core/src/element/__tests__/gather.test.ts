import { assert, describe, test } from "@flexweave/testkit";
import { rgb } from "../../style/color.js";
import { Flags, hasFlag } from "../../style/flag.js";
import { fill, fillPortion, minimum, px } from "../../style/length.js";
import { paddingStyle, single } from "../../style/types.js";
import { attr } from "../../vdom/types.js";
import {
  alignBottom,
  alignLeft,
  alignTop,
  alpha,
  centerX,
  height,
  htmlAttribute,
  mouseOver,
  moveRight,
  padding,
  rotate,
  width,
} from "../../widgets/attributes.js";
import * as Background from "../../widgets/background.js";
import * as Font from "../../widgets/font.js";
import * as Region from "../../widgets/region.js";
import { gather, initialState } from "../gather.js";
import { type Attribute, GENERIC, type Gathered } from "../types.js";

function gathered(attributes: readonly Attribute[]): Gathered {
  return gather(initialState("s e", GENERIC), [...attributes].reverse());
}

function classesOf(g: Gathered): string {
  const first = g.attributes[0];
  if (first === undefined || first.kind !== "class") throw new Error("expected class attribute first");
  return first.value;
}

describe("gather: sizing", () => {
  test("the last width wins", () => {
    const g = gathered([width(px(10)), width(px(20))]);
    assert.equal(classesOf(g), "we width-px-20 s e");
    assert.deepEqual(g.styles, [single("width-px-20", "width", "20px")]);
  });

  test("fill portions grow by portion * 100000", () => {
    const g = gathered([width(fillPortion(3))]);
    assert.equal(classesOf(g), "wfp width-fill-3 s e");
    assert.deepEqual(g.styles, [single("s.r > .width-fill-3", "flex-grow", "300000")]);
    assert.equal(hasFlag(g.has, Flags.widthFill), true);
  });

  test("a portion of one is plain fill", () => {
    const g = gathered([width(fillPortion(1))]);
    assert.equal(classesOf(g), "wf s e");
    assert.deepEqual(g.styles, []);
  });

  test("bounded heights mark the between flag", () => {
    const g = gathered([height(minimum(100, fill))]);
    assert.equal(classesOf(g), "min-height-100 hf s e");
    assert.deepEqual(g.styles, [single("min-height-100", "min-height", "100px !important")]);
    assert.equal(hasFlag(g.has, Flags.heightBetween), true);
    assert.equal(hasFlag(g.has, Flags.heightFill), true);
  });
});

describe("gather: style classes", () => {
  test("alpha encodes transparency in the class", () => {
    const g = gathered([alpha(0.5)]);
    assert.equal(classesOf(g), "transparency-128 s e");
    assert.deepEqual(g.styles, [{ kind: "transparency", name: "transparency-128", transparency: 0.5 }]);
  });

  test("alpha zero is fully transparent", () => {
    const g = gathered([alpha(0)]);
    assert.equal(classesOf(g), "transparency-255 s e");
    assert.deepEqual(g.styles, [{ kind: "transparency", name: "transparency-255", transparency: 1 }]);
  });

  test("alpha one is fully opaque", () => {
    const g = gathered([alpha(1)]);
    assert.equal(classesOf(g), "transparency-0 s e");
    assert.deepEqual(g.styles, [{ kind: "transparency", name: "transparency-0", transparency: 0 }]);
  });

  test("alpha outside 0..1 clamps to the nearest bound", () => {
    assert.equal(classesOf(gathered([alpha(-1)])), "transparency-255 s e");
    assert.equal(classesOf(gathered([alpha(2)])), "transparency-0 s e");
    assert.deepEqual(gathered([alpha(2)]).styles, [{ kind: "transparency", name: "transparency-0", transparency: 0 }]);
  });

  test("pre-baked paddings contribute only a class", () => {
    const g = gathered([padding(10)]);
    assert.equal(classesOf(g), "p-10 s e");
    assert.deepEqual(g.styles, []);
  });

  test("paddings outside the pre-baked range emit a style", () => {
    const g = gathered([padding(25)]);
    assert.equal(classesOf(g), "p-25 s e");
    assert.deepEqual(g.styles, [paddingStyle("p-25", 25, 25, 25, 25)]);
  });

  test("a later padding shadows an earlier one", () => {
    const g = gathered([padding(25), padding(10)]);
    assert.equal(classesOf(g), "p-10 s e");
    assert.deepEqual(g.styles, []);
  });

  test("flag-gated classes keep the last", () => {
    assert.equal(classesOf(gathered([Font.bold, Font.light])), "w3 s e");
  });

  test("hover decorations are named with the hover suffix", () => {
    const g = gathered([mouseOver([Background.color(rgb(1, 0, 0))])]);
    assert.equal(classesOf(g), "bg-255-0-0-255-hv s e");
    assert.equal(g.styles.length, 1);
    assert.equal(g.styles[0]?.kind, "pseudo");
  });
});

describe("gather: alignment", () => {
  test("the last horizontal alignment wins", () => {
    const g = gathered([alignLeft, centerX]);
    assert.equal(classesOf(g), "ah cx s e");
    assert.equal(hasFlag(g.has, Flags.centerX), true);
  });

  test("bottom alignment sets its flag", () => {
    const g = gathered([alignTop, alignBottom]);
    assert.equal(classesOf(g), "av ab s e");
    assert.equal(hasFlag(g.has, Flags.alignBottom), true);
  });
});

describe("gather: transforms", () => {
  test("components fold into one class appended last", () => {
    const g = gathered([moveRight(10), rotate(Math.PI / 2)]);
    assert.equal(classesOf(g), "s e tfrm-2550-0-0-255-255-255-0-0-255-401");
    assert.equal(g.styles[0]?.kind, "transform");
  });
});

describe("gather: descriptions and raw attributes", () => {
  test("headings rename the node", () => {
    assert.deepEqual(gathered([Region.heading(2)]).node, { kind: "named", name: "h2" });
  });

  test("labels and live regions become aria attributes", () => {
    const g = gathered([Region.description("Menu"), Region.announceUrgently]);
    assert.deepEqual(g.attributes.slice(1), [attr("aria-label", "Menu"), attr("aria-live", "assertive")]);
  });

  test("raw attributes keep author order", () => {
    const g = gathered([htmlAttribute(attr("id", "a")), htmlAttribute(attr("title", "b"))]);
    assert.deepEqual(g.attributes.slice(1), [attr("id", "a"), attr("title", "b")]);
  });
});
