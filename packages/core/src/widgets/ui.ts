/**
 * packages/core/src/widgets/ui.ts — Element factory functions.
 *
 * Why: Each factory prepends its layout defaults to the caller's attributes,
 * so anything the caller passes for the same slot overrides the default.
 */

import { element } from "../element/element.js";
import { extractSpacingAndPadding } from "../element/filter.js";
import { type Attribute, EMPTY, type Element, GENERIC, named } from "../element/types.js";
import { throwInvalidProps } from "../errors.js";
import { Cls } from "../style/classes.js";
import { Flags } from "../style/flag.js";
import { type Length, fill, maximum, minimum, px, shrink } from "../style/length.js";
import type { GridPosition } from "../style/types.js";
import { attr, styleAttr } from "../vdom/types.js";
import { height, htmlAttribute, htmlClass, paddingFloat, spacing, width } from "./attributes.js";

const SHRINK: readonly Attribute[] = [width(shrink), height(shrink)];

export const none: Element = EMPTY;

export function text(content: string): Element {
  return { kind: "text", text: content };
}

export function el(attributes: readonly Attribute[], child: Element): Element {
  return element("asEl", GENERIC, [...SHRINK, ...attributes], { kind: "unkeyed", children: [child] });
}

export function row(attributes: readonly Attribute[], children: readonly Element[]): Element {
  return element(
    "asRow",
    GENERIC,
    [htmlClass(`${Cls.contentLeft} ${Cls.contentCenterY}`), ...SHRINK, ...attributes],
    { kind: "unkeyed", children },
  );
}

export function keyedRow(
  attributes: readonly Attribute[],
  children: readonly (readonly [key: string, child: Element])[],
): Element {
  return element(
    "asRow",
    GENERIC,
    [htmlClass(`${Cls.contentLeft} ${Cls.contentCenterY}`), ...SHRINK, ...attributes],
    { kind: "keyed", children },
  );
}

export function column(attributes: readonly Attribute[], children: readonly Element[]): Element {
  return element(
    "asColumn",
    GENERIC,
    [htmlClass(`${Cls.contentTop} ${Cls.contentLeft}`), ...SHRINK, ...attributes],
    { kind: "unkeyed", children },
  );
}

export function keyedColumn(
  attributes: readonly Attribute[],
  children: readonly (readonly [key: string, child: Element])[],
): Element {
  return element(
    "asColumn",
    GENERIC,
    [htmlClass(`${Cls.contentTop} ${Cls.contentLeft}`), ...SHRINK, ...attributes],
    { kind: "keyed", children },
  );
}

const WRAPPED_CLASSES = `${Cls.contentLeft} ${Cls.contentCenterY} ${Cls.wrapped}`;

/**
 * A row that wraps onto new lines. Spacing is compensated out of the padding
 * when the padding is wide enough; otherwise the row is nested in a wrapper
 * and pulled outward with negative margins.
 */
export function wrappedRow(attributes: readonly Attribute[], children: readonly Element[]): Element {
  const { padding, spacing: spaced } = extractSpacingAndPadding(attributes);
  const defaults: readonly Attribute[] = [htmlClass(WRAPPED_CLASSES), ...SHRINK];
  if (spaced === null) {
    return element("asRow", GENERIC, [...defaults, ...attributes], { kind: "unkeyed", children });
  }

  const halfX = spaced.x / 2;
  const halfY = spaced.y / 2;
  if (padding !== null && padding.right >= halfX && padding.bottom >= halfY) {
    const compensated = paddingFloat(
      padding.top - halfY,
      padding.right - halfX,
      padding.bottom - halfY,
      padding.left - halfX,
    );
    return element("asRow", GENERIC, [...defaults, ...attributes, compensated], {
      kind: "unkeyed",
      children,
    });
  }

  const inner = element(
    "asRow",
    GENERIC,
    [
      htmlClass(WRAPPED_CLASSES),
      htmlAttribute(styleAttr("margin", `${String(-halfY)}px ${String(-halfX)}px`)),
      htmlAttribute(styleAttr("width", `calc(100% + ${String(spaced.x)}px)`)),
      htmlAttribute(styleAttr("height", `calc(100% + ${String(spaced.y)}px)`)),
      { kind: "styleClass", flag: Flags.spacing, style: spaced },
    ],
    { kind: "unkeyed", children },
  );
  return element("asEl", GENERIC, attributes, { kind: "unkeyed", children: [inner] });
}

/** Lays children out as inline text; `spacing` sets the line spacing. */
export function paragraph(attributes: readonly Attribute[], children: readonly Element[]): Element {
  return element(
    "asParagraph",
    named("p"),
    [{ kind: "describe", description: { kind: "paragraph" } }, width(fill), spacing(5), ...attributes],
    { kind: "unkeyed", children },
  );
}

/** A column of paragraphs that float aligned children. Width defaults to 500..750px. */
export function textColumn(attributes: readonly Attribute[], children: readonly Element[]): Element {
  return element("asTextColumn", GENERIC, [width(maximum(750, minimum(500, fill))), ...attributes], {
    kind: "unkeyed",
    children,
  });
}

/** An empty description hides the image from assistive technology. */
export function image(
  attributes: readonly Attribute[],
  source: Readonly<{ src: string; description: string }>,
): Element {
  const sizing = attributes.filter((a) => a.kind === "width" || a.kind === "height");
  const img = element(
    "asEl",
    named("img"),
    [htmlAttribute(attr("src", source.src)), htmlAttribute(attr("alt", source.description)), ...sizing],
    { kind: "unkeyed", children: [] },
  );
  return element("asEl", GENERIC, [htmlClass(Cls.imageContainer), ...attributes], {
    kind: "unkeyed",
    children: [img],
  });
}

function anchor(
  attributes: readonly Attribute[],
  url: string,
  extra: readonly Attribute[],
  label: Element,
): Element {
  return element(
    "asEl",
    named("a"),
    [
      htmlAttribute(attr("href", url)),
      htmlAttribute(attr("rel", "noopener noreferrer")),
      ...extra,
      ...SHRINK,
      htmlClass(`${Cls.contentCenterX} ${Cls.contentCenterY} ${Cls.link}`),
      ...attributes,
    ],
    { kind: "unkeyed", children: [label] },
  );
}

export function link(attributes: readonly Attribute[], url: string, label: Element): Element {
  return anchor(attributes, url, [], label);
}

export function newTabLink(attributes: readonly Attribute[], url: string, label: Element): Element {
  return anchor(attributes, url, [htmlAttribute(attr("target", "_blank"))], label);
}

export function download(attributes: readonly Attribute[], url: string, label: Element): Element {
  return anchor(attributes, url, [htmlAttribute(attr("download", ""))], label);
}

export function downloadAs(
  attributes: readonly Attribute[],
  url: string,
  filename: string,
  label: Element,
): Element {
  return anchor(attributes, url, [htmlAttribute(attr("download", filename))], label);
}

export type GridCell = GridPosition & Readonly<{ element: Element }>;

export type GridProps = Readonly<{
  columns: readonly Length[];
  rows: readonly Length[];
  spacingX?: number;
  spacingY?: number;
  cells: readonly GridCell[];
}>;

function assertCell(cell: GridCell): void {
  const fields = [cell.row, cell.col, cell.width, cell.height];
  if (fields.some((n) => !Number.isInteger(n) || n < 1)) {
    throwInvalidProps(
      `grid cell: row, col, width and height must be integers >= 1, got ${fields.join(", ")}`,
    );
  }
}

/** Explicit two-dimensional placement; positions are 1-based. */
export function grid(attributes: readonly Attribute[], props: GridProps): Element {
  const template: Attribute = {
    kind: "styleClass",
    flag: Flags.gridTemplate,
    style: {
      kind: "gridTemplate",
      template: {
        spacing: [px(props.spacingX ?? 0), px(props.spacingY ?? 0)],
        columns: props.columns,
        rows: props.rows,
      },
    },
  };
  const cells = props.cells.map((cell) => {
    assertCell(cell);
    const position: Attribute = {
      kind: "styleClass",
      flag: Flags.gridPosition,
      style: {
        kind: "gridPosition",
        position: { row: cell.row, col: cell.col, width: cell.width, height: cell.height },
      },
    };
    return element("asEl", GENERIC, [position], { kind: "unkeyed", children: [cell.element] });
  });
  return element("asGrid", GENERIC, [width(fill), template, ...attributes], {
    kind: "unkeyed",
    children: cells,
  });
}
