/**
 * Turns rows into padded, aligned cell lines using the resolved column layout.
 */
import type { ColumnLayout, LayoutSource } from "../arrangement/index.js";
import { Cell } from "../cell.js";
import type { Row } from "../row.js";
import { styleLine } from "../styling.js";
import type { CellAlignment } from "../types.js";
import { displayWidth } from "../width.js";
import { truncateLines, wrapCell } from "./wrap.js";

/** Rendered row: one entry per output line, each holding one padded string per visible column. */
export type FormattedRow = string[][];

const EMPTY_CELL = new Cell("");

/**
 * Pads a line to `width`. Centering puts the odd space on the right.
 */
export function alignLine(line: string, width: number, alignment: CellAlignment = "left"): string {
	const remaining = Math.max(0, width - displayWidth(line));
	switch (alignment) {
		case "left":
			return line + " ".repeat(remaining);
		case "right":
			return " ".repeat(remaining) + line;
		case "center": {
			const left = Math.floor(remaining / 2);
			return " ".repeat(left) + line + " ".repeat(remaining - left);
		}
	}
}

export function formatRow(row: Row, layouts: readonly ColumnLayout[], source: LayoutSource): FormattedRow {
	const visible = layouts.filter((layout) => !layout.hidden);

	let cellLines = visible.map((layout) => {
		const cell = row.cells[layout.index] ?? EMPTY_CELL;
		const delimiter = cell.delimiter ?? layout.delimiter ?? source.delimiter;
		return wrapCell(cell.lines, layout.contentWidth, delimiter);
	});

	const maxHeight = row.maxHeight;
	if (maxHeight !== undefined && cellLines.some((lines) => lines.length > maxHeight)) {
		cellLines = cellLines.map((lines, position) =>
			truncateLines(lines, maxHeight, visible[position]?.contentWidth ?? 1, source.truncationMarker),
		);
	}

	const height = Math.max(1, ...cellLines.map((lines) => lines.length));
	const formatted: FormattedRow = [];
	for (let lineIndex = 0; lineIndex < height; lineIndex++) {
		formatted.push(
			visible.map((layout, position) => {
				const cell = row.cells[layout.index] ?? EMPTY_CELL;
				let text = cellLines[position]?.[lineIndex] ?? "";
				if (source.styling && source.styleTextOnly) text = styleLine(text, cell.style);
				const aligned = alignLine(text, layout.contentWidth, cell.alignment ?? layout.alignment);
				const [left, right] = layout.padding;
				const padded = " ".repeat(left) + aligned + " ".repeat(right);
				return source.styling && !source.styleTextOnly ? styleLine(padded, cell.style) : padded;
			}),
		);
	}
	return formatted;
}

/**
 * Formats the header (if any) and every body row, in order.
 */
export function formatContent(source: LayoutSource, layouts: readonly ColumnLayout[]): FormattedRow[] {
	return source.rows.map((row) => formatRow(row, layouts, source));
}
