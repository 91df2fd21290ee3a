/**
 * packages/core/src/css/baseSheet.ts — Static layout rules.
 *
 * Why: Flex/grid behavior for every layout context, nearby placement,
 * alignment and the typographic utility classes. Rendered once per root and
 * never varies with the tree.
 */

import { DEFAULT_LAYOUT_OPTIONS } from "../options.js";
import { Cls } from "../style/classes.js";
import type { Style } from "../style/types.js";
import { renderStyleRule } from "./render.js";
import {
  type Rule,
  type SheetClass,
  adjacent,
  allChildren,
  batch,
  child,
  cls,
  descriptor,
  prop,
  renderSheet,
  supports,
} from "./rules.js";

function dot(c: string): string {
  return `.${c}`;
}

const important = (key: string, value: string): Rule => prop(key, `${value} !important`);

/** Positioning shared by every nearby slot. */
function nearbySlot(rules: readonly Rule[]): readonly Rule[] {
  return [
    prop("position", "absolute"),
    prop("margin", "0 !important"),
    prop("pointer-events", "none"),
    allChildren("*", [prop("pointer-events", "auto")]),
    ...rules,
  ];
}

const nearby: SheetClass = cls(dot(Cls.nearby), [
  prop("position", "relative"),
  prop("border", "none"),
  prop("display", "flex"),
  prop("flex-direction", "row"),
  prop("flex-basis", "auto"),
  descriptor(
    dot(Cls.above),
    nearbySlot([
      prop("bottom", "100%"),
      prop("left", "0"),
      prop("width", "100%"),
      prop("z-index", "20"),
      child(dot(Cls.heightFill), [prop("height", "auto")]),
      child(dot(Cls.widthFill), [prop("width", "100%")]),
    ]),
  ),
  descriptor(
    dot(Cls.below),
    nearbySlot([
      prop("bottom", "0"),
      prop("left", "0"),
      prop("height", "0"),
      prop("width", "100%"),
      prop("z-index", "20"),
      child(dot(Cls.heightFill), [prop("height", "auto")]),
      child(dot(Cls.widthFill), [prop("width", "100%")]),
    ]),
  ),
  descriptor(
    dot(Cls.onRight),
    nearbySlot([prop("left", "100%"), prop("top", "0"), prop("height", "100%"), prop("z-index", "20")]),
  ),
  descriptor(
    dot(Cls.onLeft),
    nearbySlot([prop("right", "100%"), prop("top", "0"), prop("height", "100%"), prop("z-index", "20")]),
  ),
  descriptor(
    dot(Cls.inFront),
    nearbySlot([
      prop("width", "100%"),
      prop("height", "100%"),
      prop("left", "0"),
      prop("top", "0"),
      prop("z-index", "20"),
    ]),
  ),
  descriptor(
    dot(Cls.behind),
    nearbySlot([
      prop("width", "100%"),
      prop("height", "100%"),
      prop("left", "0"),
      prop("top", "0"),
      prop("z-index", "0"),
    ]),
  ),
]);

const interaction: readonly Rule[] = [
  descriptor(dot(Cls.noTextSelection), [
    prop("-moz-user-select", "none"),
    prop("-webkit-user-select", "none"),
    prop("-ms-user-select", "none"),
    prop("user-select", "none"),
  ]),
  descriptor(dot(Cls.cursorPointer), [prop("cursor", "pointer")]),
  descriptor(dot(Cls.cursorText), [prop("cursor", "text")]),
  descriptor(dot(Cls.passPointerEvents), [important("pointer-events", "none")]),
  descriptor(dot(Cls.capturePointerEvents), [important("pointer-events", "auto")]),
  descriptor(dot(Cls.transparent), [prop("opacity", "0")]),
  descriptor(dot(Cls.opaque), [prop("opacity", "1")]),
  descriptor(`${dot(Cls.hover)}${dot(Cls.transparent)}:hover`, [prop("opacity", "0")]),
  descriptor(`${dot(Cls.hover)}${dot(Cls.opaque)}:hover`, [prop("opacity", "1")]),
  descriptor(`${dot(Cls.focus)}${dot(Cls.transparent)}:focus`, [prop("opacity", "0")]),
  descriptor(`${dot(Cls.focus)}${dot(Cls.opaque)}:focus`, [prop("opacity", "1")]),
  descriptor(`${dot(Cls.active)}${dot(Cls.transparent)}:active`, [prop("opacity", "0")]),
  descriptor(`${dot(Cls.active)}${dot(Cls.opaque)}:active`, [prop("opacity", "1")]),
  descriptor(dot(Cls.transition), [
    prop("transition", "transform 160ms, opacity 160ms, filter 160ms, background-color 160ms, color 160ms, font-size 160ms"),
  ]),
];

const overflow: readonly Rule[] = [
  descriptor(dot(Cls.scrollbars), [prop("overflow", "auto"), prop("flex-shrink", "1")]),
  descriptor(dot(Cls.scrollbarsX), [
    prop("overflow-x", "auto"),
    descriptor(dot(Cls.row), [prop("flex-shrink", "1")]),
  ]),
  descriptor(dot(Cls.scrollbarsY), [
    prop("overflow-y", "auto"),
    descriptor(dot(Cls.column), [prop("flex-shrink", "1")]),
    descriptor(dot(Cls.single), [prop("flex-shrink", "1")]),
  ]),
  descriptor(dot(Cls.clip), [prop("overflow", "hidden")]),
  descriptor(dot(Cls.clipX), [prop("overflow-x", "hidden")]),
  descriptor(dot(Cls.clipY), [prop("overflow-y", "hidden")]),
  descriptor(dot(Cls.widthContent), [prop("width", "auto")]),
];

const borders: readonly Rule[] = [
  descriptor(dot(Cls.borderNone), [prop("border-width", "0")]),
  descriptor(dot(Cls.borderDashed), [prop("border-style", "dashed")]),
  descriptor(dot(Cls.borderDotted), [prop("border-style", "dotted")]),
  descriptor(dot(Cls.borderSolid), [prop("border-style", "solid")]),
];

/** Child alignment inside a single-child container. */
const singleAlignment: readonly Rule[] = [
  child(dot(Cls.alignTop), [important("margin-bottom", "auto"), important("margin-top", "0")]),
  child(dot(Cls.alignBottom), [important("margin-top", "auto"), important("margin-bottom", "0")]),
  child(dot(Cls.alignRight), [important("margin-left", "auto"), important("margin-right", "0")]),
  child(dot(Cls.alignLeft), [important("margin-right", "auto"), important("margin-left", "0")]),
  child(dot(Cls.alignCenterX), [prop("margin-left", "auto"), prop("margin-right", "auto")]),
  child(dot(Cls.alignCenterY), [prop("margin-top", "auto"), prop("margin-bottom", "auto")]),
];

const single: readonly Rule[] = [
  descriptor(dot(Cls.single), [
    prop("display", "flex"),
    prop("flex-direction", "column"),
    prop("white-space", "pre"),
    descriptor(dot(Cls.hasBehind), [
      prop("z-index", "0"),
      child(dot(Cls.behind), [prop("z-index", "-1")]),
    ]),
    child(dot(Cls.heightContent), [prop("height", "auto")]),
    child(dot(Cls.heightFill), [prop("flex-grow", "100000")]),
    child(dot(Cls.widthFill), [prop("width", "100%")]),
    child(dot(Cls.widthFillPortion), [prop("width", "100%")]),
    child(dot(Cls.widthContent), [prop("align-self", "flex-start")]),
    batch(singleAlignment),
  ]),
];

const row: readonly Rule[] = [
  descriptor(dot(Cls.row), [
    prop("display", "flex"),
    prop("flex-direction", "row"),
    child(dot(Cls.any), [
      prop("flex-basis", "0%"),
      descriptor(dot(Cls.widthExact), [prop("flex-basis", "auto")]),
    ]),
    child(dot(Cls.heightFill), [important("align-self", "stretch")]),
    child(dot(Cls.heightFillPortion), [important("align-self", "stretch")]),
    child(dot(Cls.widthFill), [prop("flex-grow", "100000")]),
    child(dot(Cls.container), [
      prop("flex-grow", "0"),
      prop("flex-basis", "auto"),
      prop("align-self", "stretch"),
    ]),
    child(`u:first-of-type${dot(Cls.alignContainerRight)}`, [prop("flex-grow", "1")]),
    child(`s:first-of-type${dot(Cls.alignContainerCenterX)}`, [
      prop("flex-grow", "1"),
      child(dot(Cls.alignCenterX), [important("margin-left", "auto")]),
    ]),
    child(`s:last-of-type${dot(Cls.alignContainerCenterX)}`, [
      prop("flex-grow", "1"),
      child(dot(Cls.alignCenterX), [important("margin-right", "auto")]),
    ]),
    child(`s:only-of-type${dot(Cls.alignContainerCenterX)}`, [
      prop("flex-grow", "1"),
      child(dot(Cls.alignCenterY), [important("margin-top", "auto"), important("margin-bottom", "auto")]),
    ]),
    child(dot(Cls.alignTop), [prop("align-self", "flex-start")]),
    child(dot(Cls.alignBottom), [prop("align-self", "flex-end")]),
    child(dot(Cls.alignCenterY), [prop("align-self", "center")]),
    descriptor(dot(Cls.contentTop), [prop("align-items", "flex-start")]),
    descriptor(dot(Cls.contentBottom), [prop("align-items", "flex-end")]),
    descriptor(dot(Cls.contentRight), [prop("justify-content", "flex-end")]),
    descriptor(dot(Cls.contentLeft), [prop("justify-content", "flex-start")]),
    descriptor(dot(Cls.contentCenterX), [prop("justify-content", "center")]),
    descriptor(dot(Cls.contentCenterY), [prop("align-items", "center")]),
    descriptor(dot(Cls.spaceEvenly), [prop("justify-content", "space-between")]),
  ]),
];

const column: readonly Rule[] = [
  descriptor(dot(Cls.column), [
    prop("display", "flex"),
    prop("flex-direction", "column"),
    child(dot(Cls.any), [
      prop("flex-basis", "0px"),
      prop("min-height", "min-content"),
      descriptor(dot(Cls.heightExact), [prop("flex-basis", "auto")]),
    ]),
    child(dot(Cls.heightFill), [prop("flex-grow", "100000")]),
    child(dot(Cls.widthFill), [prop("width", "100%")]),
    child(dot(Cls.widthFillPortion), [prop("width", "100%")]),
    child(dot(Cls.widthContent), [prop("align-self", "flex-start")]),
    child(`u:first-of-type${dot(Cls.alignContainerBottom)}`, [prop("flex-grow", "1")]),
    child(`s:first-of-type${dot(Cls.alignContainerCenterY)}`, [
      prop("flex-grow", "1"),
      child(dot(Cls.alignCenterY), [important("margin-top", "auto"), important("margin-bottom", "0")]),
    ]),
    child(`s:last-of-type${dot(Cls.alignContainerCenterY)}`, [
      prop("flex-grow", "1"),
      child(dot(Cls.alignCenterY), [important("margin-bottom", "auto"), important("margin-top", "0")]),
    ]),
    child(dot(Cls.container), [
      prop("flex-grow", "0"),
      prop("flex-basis", "auto"),
      prop("width", "100%"),
      important("align-self", "stretch"),
    ]),
    child(dot(Cls.alignTop), [prop("margin-bottom", "auto")]),
    child(dot(Cls.alignBottom), [prop("margin-top", "auto")]),
    child(dot(Cls.alignRight), [prop("align-self", "flex-end")]),
    child(dot(Cls.alignLeft), [prop("align-self", "flex-start")]),
    child(dot(Cls.alignCenterX), [prop("align-self", "center")]),
    child(dot(Cls.alignCenterY), [prop("margin-top", "auto"), prop("margin-bottom", "auto")]),
    descriptor(dot(Cls.contentTop), [prop("justify-content", "flex-start")]),
    descriptor(dot(Cls.contentBottom), [prop("justify-content", "flex-end")]),
    descriptor(dot(Cls.contentRight), [prop("align-items", "flex-end")]),
    descriptor(dot(Cls.contentLeft), [prop("align-items", "flex-start")]),
    descriptor(dot(Cls.contentCenterX), [prop("align-items", "center")]),
    descriptor(dot(Cls.contentCenterY), [prop("justify-content", "center")]),
    descriptor(dot(Cls.spaceEvenly), [prop("justify-content", "space-between")]),
  ]),
];

const grid: readonly Rule[] = [
  descriptor(dot(Cls.grid), [
    prop("display", "-ms-grid"),
    child(".gp", [child(dot(Cls.any), [prop("width", "100%")])]),
    supports(["display", "grid"], [["display", "grid"]]),
  ]),
];

const page: readonly Rule[] = [
  descriptor(dot(Cls.page), [
    prop("display", "block"),
    child(`${dot(Cls.any)}:first-child`, [important("margin", "0")]),
    child(`${dot(Cls.alignLeft)}:first-child + ${dot(Cls.any)}`, [important("margin", "0")]),
    child(`${dot(Cls.alignRight)}:first-child + ${dot(Cls.any)}`, [important("margin", "0")]),
    child(dot(Cls.alignRight), [prop("float", "right"), adjacent("*", [prop("clear", "right")])]),
    child(dot(Cls.alignLeft), [prop("float", "left"), adjacent("*", [prop("clear", "left")])]),
  ]),
];

const paragraph: readonly Rule[] = [
  descriptor(dot(Cls.paragraph), [
    prop("display", "block"),
    prop("white-space", "normal"),
    prop("overflow-wrap", "break-word"),
    child(dot(Cls.text), [prop("display", "inline"), prop("white-space", "normal")]),
    child(dot(Cls.paragraph), [
      prop("display", "inline"),
      allChildren("::after", [prop("content", "none")]),
      allChildren("::before", [prop("content", "none")]),
    ]),
    child(dot(Cls.single), [
      prop("display", "inline"),
      prop("white-space", "normal"),
      child(dot(Cls.text), [prop("display", "inline"), prop("white-space", "normal")]),
    ]),
    child(dot(Cls.row), [prop("display", "inline")]),
    child(dot(Cls.column), [prop("display", "inline-flex")]),
    child(dot(Cls.grid), [prop("display", "inline-grid")]),
    child(dot(Cls.alignLeft), [prop("float", "left")]),
    child(dot(Cls.alignRight), [prop("float", "right")]),
  ]),
];

const typography: readonly Rule[] = [
  descriptor(dot(Cls.text), [prop("white-space", "pre"), prop("display", "inline-block")]),
  descriptor(dot(Cls.textThin), [prop("font-weight", "100")]),
  descriptor(dot(Cls.textExtraLight), [prop("font-weight", "200")]),
  descriptor(dot(Cls.textLight), [prop("font-weight", "300")]),
  descriptor(dot(Cls.textNormalWeight), [prop("font-weight", "400")]),
  descriptor(dot(Cls.textMedium), [prop("font-weight", "500")]),
  descriptor(dot(Cls.textSemiBold), [prop("font-weight", "600")]),
  descriptor(dot(Cls.bold), [prop("font-weight", "700")]),
  descriptor(dot(Cls.textExtraBold), [prop("font-weight", "800")]),
  descriptor(dot(Cls.textHeavy), [prop("font-weight", "900")]),
  descriptor(dot(Cls.italic), [prop("font-style", "italic")]),
  descriptor(dot(Cls.strike), [prop("text-decoration", "line-through")]),
  descriptor(dot(Cls.underline), [prop("text-decoration", "underline")]),
  descriptor(`${dot(Cls.underline)}${dot(Cls.strike)}`, [prop("text-decoration", "line-through underline")]),
  descriptor(dot(Cls.textUnitalicized), [prop("font-style", "normal")]),
  descriptor(dot(Cls.textJustify), [prop("text-align", "justify")]),
  descriptor(dot(Cls.textJustifyAll), [prop("text-align", "justify-all")]),
  descriptor(dot(Cls.textCenter), [prop("text-align", "center")]),
  descriptor(dot(Cls.textRight), [prop("text-align", "right")]),
  descriptor(dot(Cls.textLeft), [prop("text-align", "left")]),
];

export const BASE_SHEET: readonly SheetClass[] = Object.freeze([
  cls("html,body", [prop("height", "100%"), prop("padding", "0"), prop("margin", "0")]),
  cls(`${dot(Cls.any)}${dot(Cls.single)}${dot(Cls.imageContainer)}`, [
    prop("display", "block"),
    child("img", [prop("max-height", "100%"), prop("max-width", "100%"), prop("object-fit", "cover")]),
  ]),
  cls(`${dot(Cls.any)}:focus`, [prop("outline", "none")]),
  cls(".explain", [
    important("border", "6px solid rgb(174, 121, 15)"),
    child(dot(Cls.any), [important("border", "4px dashed rgb(0, 151, 167)")]),
  ]),
  cls(dot(Cls.root), [
    prop("width", "100%"),
    prop("height", "auto"),
    prop("min-height", "100%"),
    prop("z-index", "0"),
    descriptor(`${dot(Cls.any)}${dot(Cls.heightFill)}`, [prop("height", "100%")]),
  ]),
  nearby,
  cls(dot(Cls.any), [
    prop("position", "relative"),
    prop("border", "none"),
    prop("flex-shrink", "0"),
    prop("display", "flex"),
    prop("flex-direction", "row"),
    prop("flex-basis", "auto"),
    prop("resize", "none"),
    prop("font-feature-settings", "inherit"),
    prop("box-sizing", "border-box"),
    prop("margin", "0"),
    prop("padding", "0"),
    prop("border-width", "0"),
    prop("border-style", "solid"),
    prop("font-size", "inherit"),
    prop("color", "inherit"),
    prop("font-family", "inherit"),
    prop("line-height", "1"),
    prop("font-weight", "inherit"),
    prop("text-decoration", "none"),
    prop("font-style", "inherit"),
    descriptor(dot(Cls.wrapped), [prop("flex-wrap", "wrap")]),
    batch(interaction),
    batch(overflow),
    batch(borders),
    batch(single),
    batch(row),
    batch(column),
    batch(grid),
    batch(page),
    batch(paragraph),
    batch(typography),
  ]),
]);

/** Border widths, font sizes and paddings whose classes need no dynamic rule. */
export function prebakedStyles(): readonly Style[] {
  const out: Style[] = [];
  for (let n = 0; n <= 6; n++) {
    out.push({ kind: "borderWidth", cls: `b-${String(n)}`, top: n, right: n, bottom: n, left: n });
  }
  for (let n = 8; n <= 32; n++) out.push({ kind: "fontSize", size: n });
  for (let n = 0; n <= 24; n++) {
    out.push({ kind: "padding", cls: `p-${String(n)}`, top: n, right: n, bottom: n, left: n });
  }
  return out;
}

let cachedStaticSheet: string | null = null;

/**
 * Base rules followed by the pre-baked variants, rendered through the same
 * renderer as dynamic styles so skipped rules are byte-identical.
 */
export function staticStyleSheet(): string {
  if (cachedStaticSheet === null) {
    const prebaked = prebakedStyles().flatMap((style) =>
      renderStyleRule(DEFAULT_LAYOUT_OPTIONS, style, null),
    );
    cachedStaticSheet = [renderSheet(BASE_SHEET), ...prebaked].join("\n");
  }
  return cachedStaticSheet;
}
