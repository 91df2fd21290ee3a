/**
 * packages/core/src/style/classes.ts — Short class names shared by the static
 * sheet, the gatherer and node finalization.
 */

export const Cls = Object.freeze({
  root: "ui",
  any: "s",
  single: "e",
  row: "r",
  column: "c",
  page: "pg",
  paragraph: "p",
  text: "t",
  grid: "g",
  imageContainer: "ic",
  wrapped: "wrp",

  widthFill: "wf",
  widthContent: "wc",
  widthExact: "we",
  widthFillPortion: "wfp",
  heightFill: "hf",
  heightContent: "hc",
  heightExact: "he",
  heightFillPortion: "hfp",

  nearby: "nb",
  above: "a",
  below: "b",
  onRight: "or",
  onLeft: "ol",
  inFront: "fr",
  behind: "bh",
  hasBehind: "hbh",

  alignTop: "at",
  alignBottom: "ab",
  alignRight: "ar",
  alignLeft: "al",
  alignCenterX: "cx",
  alignCenterY: "cy",
  alignedHorizontally: "ah",
  alignedVertically: "av",

  spaceEvenly: "sev",
  container: "ctr",
  alignContainerRight: "acr",
  alignContainerBottom: "acb",
  alignContainerCenterX: "accx",
  alignContainerCenterY: "accy",

  contentTop: "ct",
  contentBottom: "cb",
  contentRight: "cr",
  contentLeft: "cl",
  contentCenterX: "ccx",
  contentCenterY: "ccy",

  noTextSelection: "notxt",
  cursorPointer: "cptr",
  cursorText: "ctxt",
  passPointerEvents: "ppe",
  capturePointerEvents: "cpe",
  transparent: "clr",
  opaque: "oq",
  overflowHidden: "oh",

  hover: "hv",
  focus: "fcs",
  focusedWithin: "focus-within",
  active: "atv",

  scrollbars: "sb",
  scrollbarsX: "sbx",
  scrollbarsY: "sby",
  clip: "cp",
  clipX: "cpx",
  clipY: "cpy",

  borderNone: "bn",
  borderDashed: "bd",
  borderDotted: "bdt",
  borderSolid: "bs",

  sizeByCapital: "cap",
  fullSize: "fs",
  textThin: "w1",
  textExtraLight: "w2",
  textLight: "w3",
  textNormalWeight: "w4",
  textMedium: "w5",
  textSemiBold: "w6",
  bold: "w7",
  textExtraBold: "w8",
  textHeavy: "w9",
  italic: "i",
  strike: "sk",
  underline: "u",
  textUnitalicized: "tun",
  textJustify: "tj",
  textJustifyAll: "tja",
  textCenter: "tc",
  textRight: "tr",
  textLeft: "tl",
  transition: "ts",

  link: "lnk",
} as const);
