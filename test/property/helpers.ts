import * as fc from "fast-check";
import type { ColumnBounds } from "../../lib/arrangement/index.js";

/** Narrow, wide (CJK, emoji outside the BMP) and combining glyphs, plus spaces. */
export const GLYPHS = ["a", "b", "x", "Z", "7", "-", "\u00e9", "e\u0301", "中", "文", "한", "😀", " ", " "];

export const arbText = fc
  .array(fc.constantFrom(...GLYPHS), { minLength: 0, maxLength: 60 })
  .map((glyphs) => glyphs.join(""));

export const arbMultilineText = fc
  .array(arbText, { minLength: 1, maxLength: 4 })
  .map((lines) => lines.join("\n"));

/** Content widths of at least 2 so a single wide glyph always fits. */
export const arbContentWidth = fc.integer({ min: 2, max: 30 });

export const arbBounds: fc.Arbitrary<ColumnBounds> = fc
  .record({
    index: fc.constant(0),
    min: fc.integer({ min: 3, max: 12 }),
    extra: fc.integer({ min: 0, max: 30 }),
  })
  .map(({ index, min, extra }) => ({
    index,
    hidden: false,
    floor: 3,
    minWidth: min,
    maxWidth: min + extra,
    maxContentWidth: min + extra,
  }));

export const arbBoundsList = fc
  .array(arbBounds, { minLength: 1, maxLength: 6 })
  .map((list) => list.map((bound, index) => ({ ...bound, index })));

/** Bounds whose minimums differ widely, so shrinking has to fight the floors. */
export const arbUnevenBoundsList = fc
  .array(
    fc.integer({ min: 3, max: 80 }).map((min) => ({
      index: 0,
      hidden: false,
      floor: 3,
      minWidth: min,
      maxWidth: min,
      maxContentWidth: min,
    })),
    { minLength: 1, maxLength: 6 }
  )
  .map((list): ColumnBounds[] => list.map((bound, index) => ({ ...bound, index })));
