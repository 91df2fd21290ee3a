/**
 * @flexweave/core
 *
 * Declarative layout engine: element trees in, markup and deduplicated CSS out.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors and diagnostics
// =============================================================================

export {
  FlexweaveError,
  type FlexweaveErrorCode,
  type ValidationFatal,
  type ValidationResult,
} from "./errors.js";

// =============================================================================
// Style model
// =============================================================================

export {
  type Field,
  type Flag,
  EMPTY_FIELD,
  Flags,
  addFlag,
  flag,
  flagsEqual,
  hasFlag,
  mergeFields,
} from "./style/flag.js";

export { Cls } from "./style/classes.js";

export {
  type Color,
  black,
  floatClass,
  formatColor,
  formatColorClass,
  fromRgb,
  fromRgb255,
  rgb,
  rgb255,
  rgba,
  rgba255,
  toRgb,
  white,
} from "./style/color.js";

export {
  type Length,
  MAX_LENGTH_DEPTH,
  assertRenderableLength,
  fill,
  fillPortion,
  lengthClassName,
  maximum,
  minimum,
  px,
  shrink,
  validateLength,
} from "./style/length.js";

export {
  type TransformComponent,
  type Transformation,
  type XYZ,
  UNTRANSFORMED,
  composeTransformation,
  transformClass,
  transformValue,
} from "./style/transform.js";

export {
  type Adjustment,
  type AdjustmentRules,
  type Font as FontFace,
  type FontVariant,
  adjustmentRules,
  fontFamilyClassName,
  typefaceAdjustment,
} from "./style/font.js";

export { type Shadow } from "./style/shadow.js";

export {
  type GridPosition,
  type GridTemplate,
  type Property,
  type PseudoClass,
  type Style,
} from "./style/types.js";

export { skippable, styleName } from "./style/name.js";

// =============================================================================
// Options
// =============================================================================

export {
  type FocusStyle,
  type HoverSetting,
  type LayoutOption,
  type LayoutOptions,
  type RenderMode,
  DEFAULT_FOCUS_STYLE,
  DEFAULT_LAYOUT_OPTIONS,
  focusStyle,
  forceHover,
  noHover,
  noStaticStyleSheet,
  resolveOptions,
  virtualCss,
} from "./options.js";

// =============================================================================
// Stylesheets
// =============================================================================

export { renderStyleRule } from "./css/render.js";
export { encodeStyles, reduceStyles, toStyleSheetString } from "./css/stylesheet.js";
export { staticStyleSheet } from "./css/baseSheet.js";

// =============================================================================
// Virtual DOM
// =============================================================================

export {
  type KeyedVNode,
  type VAttr,
  type VNode,
  attr,
  classAttr,
  h,
  keyed,
  propAttr,
  styleAttr,
  vtext,
} from "./vdom/types.js";

export { renderToHtml } from "./vdom/html.js";

// =============================================================================
// Elements
// =============================================================================

export {
  type Attribute,
  type Decoration,
  type Description,
  type Element,
  type HAlign,
  type LayoutContext,
  type Location,
  type StyleAttribute,
  type TransformAttribute,
  type VAlign,
} from "./element/types.js";

export { element } from "./element/element.js";
export { DYNAMIC_RULES_TAG, STATIC_RULES_TAG, finalizeNode } from "./element/finalize.js";
export { extractSpacingAndPadding, filterAttributes, getAttributes } from "./element/filter.js";
export { embed, layout, layoutWith } from "./element/root.js";

// =============================================================================
// Builders
// =============================================================================

export {
  type GridCell,
  type GridProps,
  column,
  download,
  downloadAs,
  el,
  grid,
  image,
  keyedColumn,
  keyedRow,
  link,
  newTabLink,
  none,
  paragraph,
  row,
  text,
  textColumn,
  wrappedRow,
} from "./widgets/ui.js";

export {
  type Edges,
  above,
  alignBottom,
  alignLeft,
  alignRight,
  alignTop,
  alpha,
  behindContent,
  below,
  centerX,
  centerY,
  clip,
  clipX,
  clipY,
  explain,
  focused,
  height,
  htmlAttribute,
  htmlClass,
  inFront,
  mouseDown,
  mouseOver,
  moveDown,
  moveLeft,
  moveRight,
  moveUp,
  noAttribute,
  onLeft,
  onRight,
  padding,
  paddingEach,
  paddingXY,
  pointer,
  rotate,
  scale,
  scrollbarX,
  scrollbarY,
  scrollbars,
  spaceEvenly,
  spacing,
  spacingXY,
  transparent,
  width,
} from "./widgets/attributes.js";

export * as Background from "./widgets/background.js";
export * as Border from "./widgets/border.js";
export * as Font from "./widgets/font.js";
export * as Region from "./widgets/region.js";
