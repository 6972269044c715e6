import type { Column } from "../column.js";
import { MAX_WIDTH } from "../constants.js";
import type { Width } from "../types.js";
import { clamp, toCount } from "../utils.js";

export interface ColumnBounds {
	index: number;
	hidden: boolean;
	/** Smallest width a visible column may take: its padding plus one content character. */
	floor: number;
	minWidth: number;
	maxWidth: number;
	maxContentWidth: number;
}

/**
 * Turns a width into display columns. Percentages need the table's target width and
 * resolve to `undefined` without one.
 */
export function resolveWidth(width: Width, tableWidth: number | undefined): number | undefined {
	switch (width.kind) {
		case "fixed":
			return toCount(width.chars, MAX_WIDTH);
		case "percentage": {
			if (tableWidth === undefined) return undefined;
			const percent = clamp(width.percent, 0, 100);
			return Math.round((percent / 100) * tableWidth);
		}
	}
}

/**
 * Lower and upper width bound of a column, from its constraint and scanned content width.
 */
export function resolveBounds(
	column: Column,
	maxContentWidth: number,
	tableWidth: number | undefined,
): ColumnBounds {
	const floor = column.paddingWidth + 1;
	const bounds = (minWidth: number, maxWidth: number): ColumnBounds => {
		const min = Math.max(floor, minWidth);
		return {
			index: column.index,
			hidden: false,
			floor,
			minWidth: min,
			maxWidth: Math.max(min, maxWidth),
			maxContentWidth,
		};
	};
	const constraint = column.constraint;

	if (constraint === undefined) return bounds(floor, maxContentWidth);

	switch (constraint.kind) {
		case "hidden":
			return { index: column.index, hidden: true, floor: 0, minWidth: 0, maxWidth: 0, maxContentWidth };
		case "contentWidth":
			return bounds(maxContentWidth, maxContentWidth);
		case "absolute": {
			const width = resolveWidth(constraint.width, tableWidth);
			if (width === undefined) return bounds(floor, maxContentWidth);
			return bounds(width, width);
		}
		case "lowerBoundary": {
			const lower = resolveWidth(constraint.width, tableWidth) ?? floor;
			return bounds(lower, Math.max(lower, maxContentWidth));
		}
		case "upperBoundary": {
			const upper = resolveWidth(constraint.width, tableWidth) ?? maxContentWidth;
			return bounds(floor, upper);
		}
		case "boundaries": {
			const lower = resolveWidth(constraint.lower, tableWidth) ?? floor;
			const upper = resolveWidth(constraint.upper, tableWidth) ?? maxContentWidth;
			return bounds(lower, upper);
		}
	}
}

/**
 * Width a column's constraint caps it at, or `undefined` when nothing does.
 * Content-width columns are capped at their content.
 */
export function upperLimit(
	column: Column,
	maxContentWidth: number,
	tableWidth: number | undefined,
): number | undefined {
	const constraint = column.constraint;
	if (constraint === undefined) return undefined;
	switch (constraint.kind) {
		case "hidden":
			return 0;
		case "contentWidth":
			return maxContentWidth;
		case "absolute":
		case "upperBoundary":
			return resolveWidth(constraint.width, tableWidth);
		case "boundaries":
			return resolveWidth(constraint.upper, tableWidth);
		case "lowerBoundary":
			return undefined;
	}
}
