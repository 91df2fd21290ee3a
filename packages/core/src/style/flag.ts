/**
 * packages/core/src/style/flag.ts — Semantic slot flags and the Field bitset.
 *
 * Why: While gathering one element's attributes, each semantic slot (width,
 * padding, alignment, hover, ...) may be claimed once. A Field records the
 * claimed slots in two 32-bit words; index >= 32 lives in the second word.
 */

export type Flag = Readonly<{ index: number; word: 0 | 1; mask: number }>;

export type Field = Readonly<{ lo: number; hi: number }>;

export function flag(index: number): Flag {
  const bit = index % 32;
  return Object.freeze({ index, word: index < 32 ? 0 : 1, mask: (1 << bit) >>> 0 });
}

export const EMPTY_FIELD: Field = Object.freeze({ lo: 0, hi: 0 });

export function addFlag(field: Field, f: Flag): Field {
  if (f.word === 0) return { lo: (field.lo | f.mask) >>> 0, hi: field.hi };
  return { lo: field.lo, hi: (field.hi | f.mask) >>> 0 };
}

export function hasFlag(field: Field, f: Flag): boolean {
  const word = f.word === 0 ? field.lo : field.hi;
  return (word & f.mask) !== 0;
}

export function mergeFields(a: Field, b: Field): Field {
  return { lo: (a.lo | b.lo) >>> 0, hi: (a.hi | b.hi) >>> 0 };
}

export function flagsEqual(a: Flag, b: Flag): boolean {
  return a.index === b.index;
}

export const Flags = Object.freeze({
  transparency: flag(1),
  padding: flag(2),
  spacing: flag(3),
  fontSize: flag(4),
  fontFamily: flag(5),
  width: flag(6),
  height: flag(7),
  bgColor: flag(8),
  bgImage: flag(9),
  bgGradient: flag(10),
  borderStyle: flag(11),
  fontAlignment: flag(12),
  fontWeight: flag(13),
  fontColor: flag(14),
  wordSpacing: flag(15),
  letterSpacing: flag(16),
  borderRound: flag(17),
  txtShadows: flag(18),
  shadows: flag(19),
  overflow: flag(20),
  cursor: flag(21),
  scale: flag(23),
  rotate: flag(24),
  moveX: flag(25),
  moveY: flag(26),
  borderWidth: flag(27),
  borderColor: flag(28),
  yAlign: flag(29),
  xAlign: flag(30),
  focus: flag(31),
  active: flag(32),
  hover: flag(33),
  gridTemplate: flag(34),
  gridPosition: flag(35),
  heightContent: flag(36),
  heightFill: flag(37),
  widthContent: flag(38),
  widthFill: flag(39),
  alignRight: flag(40),
  alignBottom: flag(41),
  centerX: flag(42),
  centerY: flag(43),
  widthBetween: flag(44),
  heightBetween: flag(45),
  behind: flag(46),
  heightTextAreaContent: flag(47),
  fontVariant: flag(48),
});
