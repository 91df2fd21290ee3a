/**
 * packages/core/src/element/sizing.ts — Width and height rendering.
 *
 * A Length becomes classes, dynamic styles and slot flags. Bounds render the
 * wrapped length and add a `between` flag, which finalization reads to skip
 * the fill shortcut inside rows and columns.
 */

import { FlexweaveError } from "../errors.js";
import { Cls } from "../style/classes.js";
import { EMPTY_FIELD, type Field, type Flag, Flags, addFlag } from "../style/flag.js";
import { type Length, MAX_LENGTH_DEPTH } from "../style/length.js";
import { type Style, single } from "../style/types.js";

export type RenderedLength = Readonly<{ field: Field; classes: string; styles: readonly Style[] }>;

type Axis = Readonly<{
  name: "width" | "height";
  exact: string;
  content: string;
  fill: string;
  fillPortion: string;
  contentFlag: Flag;
  fillFlag: Flag;
  betweenFlag: Flag;
  /** Container whose children grow by portion along this axis. */
  portionScope: string;
  minSuffix: string;
}>;

const WIDTH: Axis = Object.freeze({
  name: "width",
  exact: Cls.widthExact,
  content: Cls.widthContent,
  fill: Cls.widthFill,
  fillPortion: Cls.widthFillPortion,
  contentFlag: Flags.widthContent,
  fillFlag: Flags.widthFill,
  betweenFlag: Flags.widthBetween,
  portionScope: `${Cls.any}.${Cls.row}`,
  minSuffix: "",
});

const HEIGHT: Axis = Object.freeze({
  name: "height",
  exact: Cls.heightExact,
  content: Cls.heightContent,
  fill: Cls.heightFill,
  fillPortion: Cls.heightFillPortion,
  contentFlag: Flags.heightContent,
  fillFlag: Flags.heightFill,
  betweenFlag: Flags.heightBetween,
  portionScope: `${Cls.any}.${Cls.column}`,
  minSuffix: " !important",
});

function renderLength(axis: Axis, length: Length, depth: number): RenderedLength {
  if (depth > MAX_LENGTH_DEPTH) {
    throw new FlexweaveError(
      "FW_INVALID_LENGTH",
      `${axis.name}: length bounds nested deeper than ${String(MAX_LENGTH_DEPTH)}`,
    );
  }
  const n = axis.name;
  switch (length.kind) {
    case "px": {
      const cls = `${n}-px-${String(length.px)}`;
      return {
        field: EMPTY_FIELD,
        classes: `${axis.exact} ${cls}`,
        styles: [single(cls, n, `${String(length.px)}px`)],
      };
    }
    case "content":
      return { field: addFlag(EMPTY_FIELD, axis.contentFlag), classes: axis.content, styles: [] };
    case "fill": {
      const field = addFlag(EMPTY_FIELD, axis.fillFlag);
      if (length.portion === 1) return { field, classes: axis.fill, styles: [] };
      const cls = `${n}-fill-${String(length.portion)}`;
      return {
        field,
        classes: `${axis.fillPortion} ${cls}`,
        styles: [single(`${axis.portionScope} > .${cls}`, "flex-grow", String(length.portion * 100000))],
      };
    }
    case "min":
    case "max": {
      const bound = length.kind === "min" ? length.min : length.max;
      const cls = `${length.kind}-${n}-${String(bound)}`;
      const value = `${String(bound)}px${length.kind === "min" ? axis.minSuffix : ""}`;
      const inner = renderLength(axis, length.length, depth + 1);
      return {
        field: addFlag(inner.field, axis.betweenFlag),
        classes: `${cls} ${inner.classes}`,
        styles: [single(cls, `${length.kind}-${n}`, value), ...inner.styles],
      };
    }
  }
}

export function renderWidth(length: Length): RenderedLength {
  return renderLength(WIDTH, length, 0);
}

export function renderHeight(length: Length): RenderedLength {
  return renderLength(HEIGHT, length, 0);
}
