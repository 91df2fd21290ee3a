/**
 * packages/core/src/css/render.ts — Style value to CSS rule text.
 *
 * Why: Every Style variant renders to one or more single-line rules of the
 * form `selector { prop: value; }`. Pseudo-class wrappers re-render their
 * inner styles under the wrapper's state, honoring the root hover setting.
 */

import type { LayoutOptions } from "../options.js";
import { Cls } from "../style/classes.js";
import { formatColor } from "../style/color.js";
import { fontName, hasSmallCaps, renderFeatureSettings } from "../style/font.js";
import type { Length } from "../style/length.js";
import { styleName } from "../style/name.js";
import { transformValue } from "../style/transform.js";
import type { GridPosition, GridTemplate, Property, PseudoClass, Style } from "../style/types.js";

export function renderProps(props: readonly Property[], force: boolean): string {
  const suffix = force ? " !important" : "";
  return props.map((p) => `${p.key}: ${p.value}${suffix};`).join(" ");
}

export function block(selector: string, props: readonly Property[], force = false): string {
  if (props.length === 0) return `${selector} { }`;
  return `${selector} { ${renderProps(props, force)} }`;
}

function hoverRules(
  options: LayoutOptions,
  selector: string,
  props: readonly Property[],
): readonly string[] {
  switch (options.hover) {
    case "no":
      return [];
    case "force":
      return [block(`${selector}-hv`, props, true)];
    case "allow":
      return [block(`${selector}-hv:hover`, props)];
  }
}

function renderStyle(
  options: LayoutOptions,
  pseudo: PseudoClass | null,
  selector: string,
  props: readonly Property[],
): readonly string[] {
  if (pseudo === null) return [block(selector, props)];
  switch (pseudo) {
    case "hover":
      return hoverRules(options, selector, props);
    case "focus":
      return [
        block(`${selector}-fs:focus`, props),
        block(`${selector}-fs:focus-within`, props),
        block(`.ui-slide-bar:focus + .${Cls.any} .focusable-thumb${selector}-fs`, props),
      ];
    case "active":
      return [block(`${selector}-act:active`, props)];
  }
}

function px(n: number): string {
  return `${String(n)}px`;
}

function renderSpacing(
  options: LayoutOptions,
  pseudo: PseudoClass | null,
  cls: string,
  x: number,
  y: number,
): readonly string[] {
  const c = `.${cls}`;
  const halfX = px(x / 2);
  const halfY = px(y / 2);
  const lineHeight = `calc(1em + ${px(y)})`;
  const spacer = (edge: string): readonly Property[] => [
    { key: "content", value: "''" },
    { key: "display", value: "block" },
    { key: "height", value: "0" },
    { key: "width", value: "0" },
    { key: edge, value: px(-Math.trunc(y / 2)) },
  ];
  const rules: readonly (readonly [string, readonly Property[]])[] = [
    [`${c}.${Cls.row} > .${Cls.any} + .${Cls.any}`, [{ key: "margin-left", value: px(x) }]],
    [`${c}.${Cls.wrapped}.${Cls.row} > .${Cls.any}`, [{ key: "margin", value: `${halfY} ${halfX}` }]],
    [`${c}.${Cls.column} > .${Cls.any} + .${Cls.any}`, [{ key: "margin-top", value: px(y) }]],
    [`${c}.${Cls.page} > .${Cls.any} + .${Cls.any}`, [{ key: "margin-top", value: px(y) }]],
    [`${c}.${Cls.page} > .${Cls.alignLeft}`, [{ key: "margin-right", value: px(x) }]],
    [`${c}.${Cls.page} > .${Cls.alignRight}`, [{ key: "margin-left", value: px(x) }]],
    [`${c}.${Cls.paragraph}`, [{ key: "line-height", value: lineHeight }]],
    [
      `textarea.${Cls.any}${c}`,
      [
        { key: "line-height", value: lineHeight },
        { key: "height", value: `calc(100% + ${px(y)})` },
      ],
    ],
    [`${c}.${Cls.paragraph} > .${Cls.alignLeft}`, [{ key: "margin-right", value: px(x) }]],
    [`${c}.${Cls.paragraph} > .${Cls.alignRight}`, [{ key: "margin-left", value: px(x) }]],
    [`${c}.${Cls.paragraph}::after`, spacer("margin-top")],
    [`${c}.${Cls.paragraph}::before`, spacer("margin-bottom")],
  ];
  return rules.flatMap(([selector, props]) => renderStyle(options, pseudo, selector, props));
}

/** Track size for grid properties; bounds become minmax(). */
export function toGridLength(length: Length): string {
  return gridLengthWithin(length, null, null);
}

function gridLengthWithin(length: Length, min: number | null, max: number | null): string {
  switch (length.kind) {
    case "px":
      return px(length.px);
    case "content":
      if (min !== null && max !== null) return `minmax(${px(min)}, ${px(max)})`;
      if (min !== null) return `minmax(${px(min)}, max-content)`;
      if (max !== null) return `minmax(max-content, ${px(max)})`;
      return "max-content";
    case "fill": {
      const fr = `${String(length.portion)}fr`;
      if (min !== null && max !== null) return `minmax(${px(min)}, ${px(max)})`;
      if (min !== null) return `minmax(${px(min)}, ${fr})`;
      if (max !== null) return `minmax(max-content, ${px(max)})`;
      return fr;
    }
    case "min":
      return gridLengthWithin(length.length, length.min, max);
    case "max":
      return gridLengthWithin(length.length, min, length.max);
  }
}

function renderGridTemplate(name: string, template: GridTemplate): readonly string[] {
  const selector = `.${name}`;
  const [sx, sy] = template.spacing;
  const xSpacing = toGridLength(sx);
  const ySpacing = toGridLength(sy);
  const columns = template.columns.map(toGridLength);
  const rows = template.rows.map(toGridLength);
  const legacy = block(selector, [
    { key: "-ms-grid-columns", value: columns.join(` ${xSpacing} `) },
    { key: "-ms-grid-rows", value: rows.join(` ${ySpacing} `) },
  ]);
  const modern = block(selector, [
    { key: "grid-template-columns", value: columns.join(" ") },
    { key: "grid-template-rows", value: rows.join(" ") },
    { key: "grid-column-gap", value: xSpacing },
    { key: "grid-row-gap", value: ySpacing },
  ]);
  return [legacy, `@supports (display:grid) { ${modern} }`];
}

function renderGridPosition(position: GridPosition): readonly string[] {
  const { row, col, width, height } = position;
  const selector = `.grid-pos-${String(row)}-${String(col)}-${String(width)}-${String(height)}`;
  const legacy = block(selector, [
    { key: "-ms-grid-row", value: String(row) },
    { key: "-ms-grid-row-span", value: String(height) },
    { key: "-ms-grid-column", value: String(col) },
    { key: "-ms-grid-column-span", value: String(width) },
  ]);
  const modern = block(selector, [
    { key: "grid-row", value: `${String(row)} / ${String(row + height)}` },
    { key: "grid-column", value: `${String(col)} / ${String(col + width)}` },
  ]);
  return [legacy, `@supports (display:grid) { ${modern} }`];
}

function fourSides(top: number, right: number, bottom: number, left: number): string {
  return `${px(top)} ${px(right)} ${px(bottom)} ${px(left)}`;
}

/**
 * Renders one style to its CSS rules. `pseudo` is the enclosing pseudo-class
 * state, or null at the top level.
 */
export function renderStyleRule(
  options: LayoutOptions,
  style: Style,
  pseudo: PseudoClass | null,
): readonly string[] {
  switch (style.kind) {
    case "style":
      return renderStyle(options, pseudo, style.selector, style.props);
    case "fontFamily":
      return renderStyle(options, pseudo, `.${style.name}`, [
        { key: "font-family", value: style.fonts.map(fontName).join(", ") },
        { key: "font-feature-settings", value: renderFeatureSettings(style.fonts) ?? "normal" },
        { key: "font-variant", value: hasSmallCaps(style.fonts) ? "small-caps" : "normal" },
      ]);
    case "fontSize":
      return renderStyle(options, pseudo, `.font-size-${String(style.size)}`, [
        { key: "font-size", value: px(style.size) },
      ]);
    case "single":
      return renderStyle(options, pseudo, `.${style.cls}`, [{ key: style.prop, value: style.value }]);
    case "colored":
      return renderStyle(options, pseudo, `.${style.cls}`, [
        { key: style.prop, value: formatColor(style.color) },
      ]);
    case "spacing":
      return renderSpacing(options, pseudo, style.cls, style.x, style.y);
    case "padding":
      return renderStyle(options, pseudo, `.${style.cls}`, [
        { key: "padding", value: fourSides(style.top, style.right, style.bottom, style.left) },
      ]);
    case "borderWidth":
      return renderStyle(options, pseudo, `.${style.cls}`, [
        { key: "border-width", value: fourSides(style.top, style.right, style.bottom, style.left) },
      ]);
    case "gridTemplate":
      return renderGridTemplate(styleName(style), style.template);
    case "gridPosition":
      return renderGridPosition(style.position);
    case "transform": {
      const value = transformValue(style.transform);
      if (value === null) return [];
      return renderStyle(options, pseudo, `.${styleName(style)}`, [{ key: "transform", value }]);
    }
    case "pseudo":
      return style.styles.flatMap((inner) => renderStyleRule(options, inner, style.pseudo));
    case "transparency": {
      const opacity = Math.max(0, Math.min(1, 1 - style.transparency));
      return renderStyle(options, pseudo, `.${style.name}`, [{ key: "opacity", value: String(opacity) }]);
    }
    case "shadows":
      return renderStyle(options, pseudo, `.${style.name}`, [{ key: "box-shadow", value: style.prop }]);
  }
}
