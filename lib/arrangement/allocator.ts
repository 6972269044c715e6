/**
 * Space allocation: turns per-column bounds and a width budget into final column widths.
 *
 * Rounding policy: shares are floored, then the remainder is handed out one column at a
 * time in ascending column index, skipping columns that have no room left. The same input
 * always yields the same widths.
 */
import { createLogger } from "../logger.js";
import type { ArrangementMode } from "../types.js";
import { sum } from "../utils.js";
import type { ColumnBounds } from "./constraints.js";

const log = createLogger("allocator");

export interface AllocationRequest {
	bounds: readonly ColumnBounds[];
	mode: ArrangementMode;
	/** Target width of the whole table, borders included. `undefined` disables shrinking. */
	tableWidth: number | undefined;
	/** Border and separator characters for the visible columns. */
	overhead: number;
}

export interface Allocation {
	/** Final width per column, padding included. Hidden columns get 0. */
	widths: number[];
	/** Set when the budget could not satisfy every minimum and columns were shrunk below it. */
	compromised: boolean;
}

/**
 * Width of a column when no budget applies: its content width, kept inside its bounds.
 */
export function naturalWidth(bound: ColumnBounds): number {
	if (bound.hidden) return 0;
	return Math.min(bound.maxWidth, Math.max(bound.minWidth, bound.maxContentWidth));
}

/**
 * Adds one unit to the earliest entries allowed to grow until `remainder` is used up.
 */
function distributeRemainder(
	widths: number[],
	eligible: readonly number[],
	remainder: number,
	canGrow: (position: number) => boolean = () => true,
): number {
	let left = remainder;
	while (left > 0) {
		let progressed = false;
		for (const position of eligible) {
			if (left === 0) break;
			if (!canGrow(position)) continue;
			widths[position] = (widths[position] ?? 0) + 1;
			left -= 1;
			progressed = true;
		}
		if (!progressed) break;
	}
	return left;
}

function shrinkBelowMinimum(
	bounds: readonly ColumnBounds[],
	visible: readonly number[],
	available: number,
	widths: number[],
): void {
	const totalMin = sum(visible.map((position) => bounds[position]?.minWidth ?? 0));
	for (const position of visible) {
		const bound = bounds[position];
		if (!bound) continue;
		const share = Math.floor((Math.max(0, available) * bound.minWidth) / totalMin);
		widths[position] = Math.max(bound.floor, share);
	}
	const remainder = available - sum(visible.map((position) => widths[position] ?? 0));
	if (remainder > 0) {
		distributeRemainder(widths, visible, remainder, (position) => {
			const bound = bounds[position];
			return bound !== undefined && (widths[position] ?? 0) < bound.minWidth;
		});
	} else if (remainder < 0) {
		reclaimExcess(bounds, visible, -remainder, widths);
	}
}

/**
 * Takes back units that raising shares to their floors pushed past the budget.
 * Each unit comes from the widest column still above its floor, lowest index first on ties.
 */
function reclaimExcess(
	bounds: readonly ColumnBounds[],
	visible: readonly number[],
	excess: number,
	widths: number[],
): void {
	let left = excess;
	while (left > 0) {
		let widest: number | undefined;
		for (const position of visible) {
			const width = widths[position] ?? 0;
			if (width <= (bounds[position]?.floor ?? 0)) continue;
			if (widest === undefined || width > (widths[widest] ?? 0)) widest = position;
		}
		if (widest === undefined) return;
		widths[widest] = (widths[widest] ?? 0) - 1;
		left -= 1;
	}
}

function growTowardMaximum(
	bounds: readonly ColumnBounds[],
	visible: readonly number[],
	slack: number,
	widths: number[],
): number {
	const headroom = (position: number): number => {
		const bound = bounds[position];
		return bound ? bound.maxWidth - bound.minWidth : 0;
	};
	const growable = visible.filter((position) => headroom(position) > 0);
	const totalHeadroom = sum(growable.map(headroom));

	if (slack >= totalHeadroom) {
		for (const position of growable) {
			widths[position] = bounds[position]?.maxWidth ?? 0;
		}
		return slack - totalHeadroom;
	}

	for (const position of growable) {
		widths[position] = (widths[position] ?? 0) + Math.floor((slack * headroom(position)) / totalHeadroom);
	}
	const remainder = slack - sum(growable.map((position) => (widths[position] ?? 0) - (bounds[position]?.minWidth ?? 0)));
	distributeRemainder(widths, growable, remainder, (position) => {
		const bound = bounds[position];
		return bound !== undefined && (widths[position] ?? 0) < bound.maxWidth;
	});
	return 0;
}

/**
 * Computes final widths for all columns.
 *
 * `disabled` mode (or an unknown table width) renders every column at its natural width.
 * Otherwise each visible column starts at its minimum, slack is split proportionally to
 * each column's headroom, and in `dynamicFullWidth` mode whatever is left after every
 * column reached its maximum is split evenly.
 */
export function allocateWidths(request: AllocationRequest): Allocation {
	const { bounds, mode, tableWidth, overhead } = request;

	if (mode === "disabled" || tableWidth === undefined) {
		return { widths: bounds.map(naturalWidth), compromised: false };
	}

	const widths = bounds.map(() => 0);
	const visible = bounds.flatMap((bound, position) => (bound.hidden ? [] : [position]));
	if (visible.length === 0) return { widths, compromised: false };

	const available = tableWidth - overhead;
	const totalMin = sum(visible.map((position) => bounds[position]?.minWidth ?? 0));

	if (totalMin > available) {
		shrinkBelowMinimum(bounds, visible, available, widths);
		log.warn("Column minimums exceed the available width, shrinking columns", {
			tableWidth,
			available,
			requested: totalMin,
			widths,
		});
		return { widths, compromised: true };
	}

	for (const position of visible) {
		widths[position] = bounds[position]?.minWidth ?? 0;
	}
	const leftover = growTowardMaximum(bounds, visible, available - totalMin, widths);

	if (leftover > 0 && mode === "dynamicFullWidth") {
		const share = Math.floor(leftover / visible.length);
		for (const position of visible) {
			widths[position] = (widths[position] ?? 0) + share;
		}
		distributeRemainder(widths, visible, leftover - share * visible.length);
	}

	return { widths, compromised: false };
}
