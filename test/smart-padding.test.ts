import { describe, it, expect } from "vitest";
import type { ColumnLayout, LayoutSource } from "../lib/arrangement/index.js";
import type { FormattedRow } from "../lib/format/content.js";
import { appliesSmartPadding, smartPadContent } from "../lib/format/smart-padding.js";
import type { TableComponent } from "../lib/types.js";

function layout(index: number, width: number, overrides: Partial<ColumnLayout> = {}): ColumnLayout {
	return { index, hidden: false, width, contentWidth: width, padding: [0, 0], ...overrides };
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
		smartPaddingWidth: 2,
		...overrides,
	};
}

function separator(glyph: string): Map<TableComponent, string> {
	return new Map<TableComponent, string>([["verticalLines", glyph]]);
}

const ROWS: FormattedRow[] = [[["ab", "cd"]], [["x ", "y "]]];

describe("smart padding", () => {
	describe("appliesSmartPadding", () => {
		it("applies to blank separators outside full-width mode", () => {
			expect(appliesSmartPadding(source())).toBe(true);
			expect(appliesSmartPadding(source({ arrangement: "dynamic", style: separator(" ") }))).toBe(true);
		});

		it("is off for a zero width, full-width mode or a drawn separator", () => {
			expect(appliesSmartPadding(source({ smartPaddingWidth: 0 }))).toBe(false);
			expect(appliesSmartPadding(source({ arrangement: "dynamicFullWidth" }))).toBe(false);
			expect(appliesSmartPadding(source({ style: separator("|") }))).toBe(false);
		});
	});

	describe("smartPadContent", () => {
		it("pads the left column up to the requested gap", () => {
			const result = smartPadContent(ROWS, [layout(0, 2), layout(1, 2)], source());
			expect(result.rows).toEqual([[["ab  ", "cd"]], [["x   ", "y "]]]);
			expect(result.layouts.map((entry) => entry.width)).toEqual([4, 2]);
		});

		it("leaves its inputs untouched", () => {
			const layouts = [layout(0, 2), layout(1, 2)];
			smartPadContent(ROWS, layouts, source());
			expect(ROWS[0]).toEqual([["ab", "cd"]]);
			expect(layouts[0]?.width).toBe(2);
		});

		it("skips the header row when measuring", () => {
			const rows: FormattedRow[] = [[["ab", "cd"]], [["x   ", "y"]]];
			const result = smartPadContent(rows, [layout(0, 4), layout(1, 2)], source({ hasHeader: true }));
			expect(result.rows).toEqual(rows);
		});

		it("is limited by the space left in the table width", () => {
			const result = smartPadContent(ROWS, [layout(0, 2), layout(1, 2)], source({ tableWidth: 5 }));
			expect(result.layouts.map((entry) => entry.width)).toEqual([3, 2]);
			expect(result.rows).toEqual([[["ab ", "cd"]], [["x  ", "y "]]]);
		});

		it("pads the right column first after a center-aligned one when it is right-aligned", () => {
			const layouts = [layout(0, 2, { alignment: "center" }), layout(1, 2, { alignment: "right" })];
			const result = smartPadContent([[["ab", "cd"]]], layouts, source({ smartPaddingWidth: 1 }));
			expect(result.rows).toEqual([[["ab", " cd"]]]);
		});

		it("does nothing between a right-aligned and a left-aligned column", () => {
			const layouts = [layout(0, 2, { alignment: "right" }), layout(1, 2)];
			const result = smartPadContent([[["ab", "cd"]]], layouts, source());
			expect(result.rows).toEqual([[["ab", "cd"]]]);
		});
	});
});
