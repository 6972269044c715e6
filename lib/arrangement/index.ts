import type { Column } from "../column.js";
import type { Row } from "../row.js";
import { countBorderColumns } from "../table-formatter.js";
import type { ArrangementMode, CellAlignment, Padding, ReadonlyStyleMap } from "../types.js";
import { allocateWidths } from "./allocator.js";
import { resolveBounds, upperLimit } from "./constraints.js";
import { scanContent } from "./scanner.js";

export { allocateWidths, naturalWidth, type Allocation, type AllocationRequest } from "./allocator.js";
export { resolveBounds, resolveWidth, upperLimit, type ColumnBounds } from "./constraints.js";
export { scanContent, type ColumnScan, type ContentScan } from "./scanner.js";

/**
 * Snapshot of everything a render reads. Built fresh by the table for every render.
 */
export interface LayoutSource {
	columns: readonly Column[];
	/** Header row first when the table has one. */
	rows: readonly Row[];
	hasHeader: boolean;
	arrangement: ArrangementMode;
	/**
	 * Explicit width, else the terminal width, else `undefined`. Only looked up when the
	 * arrangement or smart padding needs it.
	 */
	tableWidth: number | undefined;
	style: ReadonlyStyleMap;
	truncationMarker: string;
	delimiter: string;
	styling: boolean;
	/** Style only the cell text instead of the whole padded cell. */
	styleTextOnly: boolean;
	/** Blank columns kept between the texts of neighbouring cells; 0 turns smart padding off. */
	smartPaddingWidth: number;
}

/**
 * Final layout of one column for a single render.
 */
export interface ColumnLayout {
	index: number;
	hidden: boolean;
	/** Total width including padding. */
	width: number;
	/** Width left for text once padding is removed. */
	contentWidth: number;
	padding: Padding;
	alignment?: CellAlignment;
	delimiter?: string;
	/** Width the column's constraint caps it at. Limits smart padding. */
	maxWidth?: number;
}

export interface ContentArrangement {
	layouts: ColumnLayout[];
	/** Set when columns had to be shrunk below their minimum widths to fit the table width. */
	compromised: boolean;
}

/**
 * Runs scanner, resolver and allocator for the current table state.
 */
export function arrangeContent(source: LayoutSource): ContentArrangement {
	const scan = scanContent(source.columns, source.rows, source.truncationMarker);
	const budgeted = source.arrangement !== "disabled" && source.tableWidth !== undefined;
	const tableWidth = budgeted ? source.tableWidth : undefined;

	const bounds = source.columns.map((column, position) =>
		resolveBounds(column, scan.columns[position]?.maxContentWidth ?? column.paddingWidth, tableWidth),
	);
	const visibleCount = bounds.filter((bound) => !bound.hidden).length;
	const { widths, compromised } = allocateWidths({
		bounds,
		mode: source.arrangement,
		tableWidth,
		overhead: countBorderColumns(source.style, visibleCount),
	});

	const layouts = source.columns.map((column, position): ColumnLayout => {
		const hidden = bounds[position]?.hidden ?? false;
		const width = widths[position] ?? 0;
		const maxContentWidth = scan.columns[position]?.maxContentWidth ?? column.paddingWidth;
		return {
			index: column.index,
			hidden,
			width,
			contentWidth: hidden ? 0 : Math.max(1, width - column.paddingWidth),
			padding: column.padding,
			alignment: column.alignment,
			delimiter: column.delimiter,
			maxWidth: upperLimit(column, maxContentWidth, source.tableWidth),
		};
	});
	return { layouts, compromised };
}
