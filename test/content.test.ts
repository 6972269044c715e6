import { describe, it, expect } from "vitest";
import type { ColumnLayout, LayoutSource } from "../lib/arrangement/index.js";
import { Cell } from "../lib/cell.js";
import { alignLine, formatRow } from "../lib/format/content.js";
import { Row } from "../lib/row.js";

function layout(index: number, contentWidth: number, overrides: Partial<ColumnLayout> = {}): ColumnLayout {
	return { index, hidden: false, width: contentWidth + 2, contentWidth, padding: [1, 1], ...overrides };
}

function source(overrides: Partial<LayoutSource> = {}): LayoutSource {
	return {
		columns: [],
		rows: [],
		hasHeader: false,
		arrangement: "disabled",
		tableWidth: undefined,
		style: new Map(),
		truncationMarker: "...",
		delimiter: " ",
		styling: false,
		styleTextOnly: false,
		smartPaddingWidth: 0,
		...overrides,
	};
}

describe("content formatter", () => {
	describe("alignLine", () => {
		it("pads on the right by default", () => {
			expect(alignLine("ab", 5)).toBe("ab   ");
		});

		it("pads on the left for right alignment", () => {
			expect(alignLine("ab", 5, "right")).toBe("   ab");
		});

		it("puts the odd space on the right when centering", () => {
			expect(alignLine("ab", 5, "center")).toBe(" ab  ");
		});

		it("pads by display width", () => {
			expect(alignLine("中", 4)).toBe("中  ");
		});

		it("leaves lines that already fill the width alone", () => {
			expect(alignLine("abcdef", 4)).toBe("abcdef");
		});
	});

	describe("formatRow", () => {
		it("wraps cells and fills shorter cells with blank lines", () => {
			const row = new Row(["one two", "x"]);
			expect(formatRow(row, [layout(0, 3), layout(1, 3)], source())).toEqual([
				[" one ", " x   "],
				[" two ", "     "],
			]);
		});

		it("renders a missing cell as blank", () => {
			const row = new Row(["a"]);
			expect(formatRow(row, [layout(0, 1), layout(1, 2)], source())).toEqual([[" a ", "    "]]);
		});

		it("skips hidden columns", () => {
			const row = new Row(["a", "secret", "b"]);
			const layouts = [layout(0, 1), layout(1, 0, { hidden: true, width: 0 }), layout(2, 1)];
			expect(formatRow(row, layouts, source())).toEqual([[" a ", " b "]]);
		});

		it("prefers cell alignment over column alignment", () => {
			const row = new Row([new Cell("a").setAlignment("left"), "b"]);
			const layouts = [layout(0, 3, { alignment: "right" }), layout(1, 3, { alignment: "right" })];
			expect(formatRow(row, layouts, source())).toEqual([[" a   ", "   b "]]);
		});

		it("applies the column padding", () => {
			const row = new Row(["a"]);
			expect(formatRow(row, [layout(0, 2, { padding: [0, 2] })], source())).toEqual([["a   "]]);
		});

		it("wraps on the column delimiter", () => {
			const row = new Row(["a-b-c"]);
			expect(formatRow(row, [layout(0, 3, { delimiter: "-" })], source())).toEqual([[" a-b "], [" c   "]]);
		});

		it("truncates every cell of a height-limited row", () => {
			const row = new Row(["1\n2\n3", "a b c d e f"]).setMaxHeight(2);
			expect(formatRow(row, [layout(0, 4), layout(1, 4)], source())).toEqual([
				[" 1    ", " a b  "],
				[" 2... ", " c... "],
			]);
		});

		it("styles the whole padded cell", () => {
			const row = new Row([new Cell("a").setFg("red")]);
			expect(formatRow(row, [layout(0, 3)], source({ styling: true }))).toEqual([
				["\u001b[31m a   \u001b[39m"],
			]);
		});

		it("styles only the text when asked to", () => {
			const row = new Row([new Cell("a").setFg("red")]);
			expect(formatRow(row, [layout(0, 3, { alignment: "right" })], source({ styling: true, styleTextOnly: true }))).toEqual([
				["   \u001b[31ma\u001b[39m "],
			]);
		});

		it("ignores cell styles when styling is off", () => {
			const row = new Row([new Cell("a").setFg("red")]);
			expect(formatRow(row, [layout(0, 3)], source())).toEqual([[" a   "]]);
		});
	});
});
