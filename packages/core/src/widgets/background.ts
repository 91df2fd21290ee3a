/**
 * packages/core/src/widgets/background.ts — Background attributes.
 */

import type { Attribute, StyleAttribute } from "../element/types.js";
import { type Color, formatColorClass } from "../style/color.js";
import { Flags } from "../style/flag.js";
import { styleAttr } from "../vdom/types.js";

export function color(c: Color): StyleAttribute {
  return {
    kind: "styleClass",
    flag: Flags.bgColor,
    style: { kind: "colored", cls: `bg-${formatColorClass(c)}`, prop: "background-color", color: c },
  };
}

/** Covers the element, cropping the image as needed. */
export function image(src: string): Attribute {
  return { kind: "attr", attr: styleAttr("background", `url("${src}") center / cover no-repeat`) };
}

/** Fits the whole image inside the element. */
export function uncropped(src: string): Attribute {
  return { kind: "attr", attr: styleAttr("background", `url("${src}") center / contain no-repeat`) };
}

export function tiled(src: string): Attribute {
  return { kind: "attr", attr: styleAttr("background", `url("${src}")`) };
}
