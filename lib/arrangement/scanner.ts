import type { Column } from "../column.js";
import type { Row } from "../row.js";
import { displayWidth } from "../width.js";

export interface ColumnScan {
	index: number;
	/** Widest explicit line over all cells of the column, plus the column's padding. */
	maxContentWidth: number;
}

export interface ContentScan {
	columns: ColumnScan[];
	/** Explicit (pre-wrap) line count per row and column; header row first when present. */
	lineCounts: number[][];
}

function widestLine(lines: readonly string[], maxHeight: number | undefined, marker: string): number {
	const truncated = maxHeight !== undefined && lines.length > maxHeight;
	const kept = truncated ? lines.slice(0, maxHeight) : lines;
	let widest = 0;
	kept.forEach((line, index) => {
		const markerWidth = truncated && index === kept.length - 1 ? displayWidth(marker) : 0;
		widest = Math.max(widest, displayWidth(line) + markerWidth);
	});
	return widest;
}

/**
 * Measures every cell of every column. Re-run on each render; results are never cached.
 */
export function scanContent(
	columns: readonly Column[],
	rows: readonly Row[],
	truncationMarker: string,
): ContentScan {
	const widest = columns.map(() => 0);
	const lineCounts: number[][] = [];

	for (const row of rows) {
		const counts: number[] = [];
		for (let index = 0; index < columns.length; index++) {
			const cell = row.cells[index];
			if (!cell) {
				counts.push(1);
				continue;
			}
			counts.push(cell.lines.length);
			const width = widestLine(cell.lines, row.maxHeight, truncationMarker);
			widest[index] = Math.max(widest[index] ?? 0, width);
		}
		lineCounts.push(counts);
	}

	return {
		columns: columns.map((column, index) => ({
			index: column.index,
			maxContentWidth: (widest[index] ?? 0) + column.paddingWidth,
		})),
		lineCounts,
	};
}
