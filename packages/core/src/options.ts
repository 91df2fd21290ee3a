/**
 * packages/core/src/options.ts — Root-level layout options.
 *
 * Why: A root accepts a small closed set of options. For each kind the first
 * option supplied wins; kinds not supplied keep their defaults.
 */

import { type Color, formatColor, rgb } from "./style/color.js";
import { type Shadow, formatBoxShadow } from "./style/shadow.js";
import type { Property, Style } from "./style/types.js";

export type HoverSetting = "allow" | "no" | "force";

export type RenderMode = "layout" | "noStaticStyleSheet" | "virtualCss";

export type FocusStyle = Readonly<{
  borderColor: Color | null;
  backgroundColor: Color | null;
  shadow: Shadow | null;
}>;

export type LayoutOption =
  | Readonly<{ kind: "hover"; setting: HoverSetting }>
  | Readonly<{ kind: "focusStyle"; style: FocusStyle }>
  | Readonly<{ kind: "renderMode"; mode: RenderMode }>;

export type LayoutOptions = Readonly<{
  hover: HoverSetting;
  focus: FocusStyle;
  mode: RenderMode;
}>;

export const DEFAULT_FOCUS_STYLE: FocusStyle = Object.freeze({
  borderColor: null,
  backgroundColor: null,
  shadow: {
    color: rgb(155 / 255, 203 / 255, 1),
    offset: [0, 0],
    blur: 0,
    size: 3,
  },
});

export const DEFAULT_LAYOUT_OPTIONS: LayoutOptions = Object.freeze({
  hover: "allow",
  focus: DEFAULT_FOCUS_STYLE,
  mode: "layout",
});

export function resolveOptions(options: readonly LayoutOption[]): LayoutOptions {
  let hover: HoverSetting | null = null;
  let focus: FocusStyle | null = null;
  let mode: RenderMode | null = null;
  for (const opt of options) {
    switch (opt.kind) {
      case "hover":
        hover ??= opt.setting;
        break;
      case "focusStyle":
        focus ??= opt.style;
        break;
      case "renderMode":
        mode ??= opt.mode;
        break;
    }
  }
  return Object.freeze({
    hover: hover ?? DEFAULT_LAYOUT_OPTIONS.hover,
    focus: focus ?? DEFAULT_LAYOUT_OPTIONS.focus,
    mode: mode ?? DEFAULT_LAYOUT_OPTIONS.mode,
  });
}

export const noHover: LayoutOption = Object.freeze({ kind: "hover", setting: "no" });
export const forceHover: LayoutOption = Object.freeze({ kind: "hover", setting: "force" });
export const noStaticStyleSheet: LayoutOption = Object.freeze({
  kind: "renderMode",
  mode: "noStaticStyleSheet",
});
export const virtualCss: LayoutOption = Object.freeze({ kind: "renderMode", mode: "virtualCss" });

export function focusStyle(style: FocusStyle): LayoutOption {
  return { kind: "focusStyle", style };
}

function focusProps(focus: FocusStyle): readonly Property[] {
  const props: Property[] = [];
  if (focus.borderColor !== null) {
    props.push({ key: "border-color", value: formatColor(focus.borderColor) });
  }
  if (focus.backgroundColor !== null) {
    props.push({ key: "background-color", value: formatColor(focus.backgroundColor) });
  }
  if (focus.shadow !== null) {
    props.push({ key: "box-shadow", value: formatBoxShadow(focus.shadow, false) });
  }
  props.push({ key: "outline", value: "none" });
  return props;
}

/** Rules seeding every dynamic stylesheet. */
export function focusStyles(focus: FocusStyle): readonly Style[] {
  const props = focusProps(focus);
  return [
    { kind: "style", selector: ".focus-within:focus-within", props },
    {
      kind: "style",
      selector: ".s:focus .focusable, .s.focusable:focus, .ui-slide-bar:focus + .s.focusable-thumb",
      props,
    },
  ];
}
