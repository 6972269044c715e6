/**
 * Smart padding: widens the gap between neighbouring columns whose texts would
 * otherwise touch when the column separator is blank.
 *
 * Only the body rows are measured; the header gets the same padding as its column.
 */
import type { ColumnLayout, LayoutSource } from "../arrangement/index.js";
import { createLogger } from "../logger.js";
import { countBorderColumns } from "../table-formatter.js";
import type { CellAlignment } from "../types.js";
import { sum } from "../utils.js";
import { stripStyles } from "../width.js";
import type { FormattedRow } from "./content.js";

const log = createLogger("smart-padding");

type Side = "left" | "right";

export interface PaddedContent {
	rows: FormattedRow[];
	layouts: ColumnLayout[];
}

function leadingSpaces(text: string): number {
	const plain = stripStyles(text);
	return plain.length - plain.trimStart().length;
}

function trailingSpaces(text: string): number {
	const plain = stripStyles(text);
	return plain.length - plain.trimEnd().length;
}

/** Extra space on the right breaks right alignment, and on the left breaks left alignment. */
function canPad(alignment: CellAlignment | undefined, side: Side): boolean {
	return (alignment ?? "left") !== side;
}

export function appliesSmartPadding(source: LayoutSource): boolean {
	if (source.smartPaddingWidth <= 0) return false;
	if (source.arrangement === "dynamicFullWidth") return false;
	return (source.style.get("verticalLines") ?? " ") === " ";
}

/**
 * Returns copies of `rows` and `layouts` with the extra padding applied.
 * Growth is limited by the space left in the table width and by each column's
 * constrained maximum width.
 */
export function smartPadContent(
	rows: readonly FormattedRow[],
	layouts: readonly ColumnLayout[],
	source: LayoutSource,
): PaddedContent {
	const paddedLayouts = layouts.map((layout) => ({ ...layout }));
	const paddedRows = rows.map((row) => row.map((parts) => [...parts]));
	const result: PaddedContent = { rows: paddedRows, layouts: paddedLayouts };

	if (!appliesSmartPadding(source)) return result;
	const visible = paddedLayouts.filter((layout) => !layout.hidden);
	if (visible.length < 2 || paddedRows.length === 0) return result;

	let remaining =
		source.tableWidth === undefined
			? Number.POSITIVE_INFINITY
			: Math.max(
					0,
					source.tableWidth -
						countBorderColumns(source.style, visible.length) -
						sum(visible.map((layout) => layout.width)),
				);
	const headroom = visible.map((layout) =>
		layout.maxWidth === undefined ? Number.POSITIVE_INFINITY : Math.max(0, layout.maxWidth - layout.width),
	);
	const bodyRows = source.hasHeader ? paddedRows.slice(1) : paddedRows;

	const padColumn = (position: number, side: Side, wanted: number): number => {
		const layout = visible[position];
		if (!layout || !canPad(layout.alignment, side)) return 0;
		const amount = Math.min(wanted, headroom[position] ?? 0);
		if (amount <= 0) return 0;
		const spaces = " ".repeat(amount);
		for (const row of paddedRows) {
			for (const parts of row) {
				const part = parts[position] ?? "";
				parts[position] = side === "left" ? spaces + part : part + spaces;
			}
		}
		layout.width += amount;
		layout.contentWidth += amount;
		headroom[position] = (headroom[position] ?? 0) - amount;
		return amount;
	};

	for (let position = 0; position < visible.length - 1; position++) {
		if (remaining <= 0) break;
		const leftAlignment = visible[position]?.alignment ?? "left";
		const rightAlignment = visible[position + 1]?.alignment ?? "left";
		const leftRoom = canPad(leftAlignment, "right") ? (headroom[position] ?? 0) : 0;
		const rightRoom = canPad(rightAlignment, "left") ? (headroom[position + 1] ?? 0) : 0;
		const limit = Math.min(remaining, leftRoom + rightRoom);
		if (limit <= 0) continue;

		let needed = 0;
		for (const row of bodyRows) {
			for (const parts of row) {
				const gap = trailingSpaces(parts[position] ?? "") + leadingSpaces(parts[position + 1] ?? "");
				needed = Math.max(needed, source.smartPaddingWidth - gap);
			}
		}
		needed = Math.min(needed, limit);
		if (needed <= 0) continue;

		// center-aligned text shifts when padded, so a right-aligned neighbour goes first
		const order: [number, Side][] =
			leftAlignment !== "left" && rightAlignment === "right"
				? [
						[position + 1, "left"],
						[position, "right"],
					]
				: [
						[position, "right"],
						[position + 1, "left"],
					];
		for (const [target, side] of order) {
			const done = padColumn(target, side, needed);
			needed -= done;
			remaining -= done;
		}
	}

	log.debug("Applied smart padding", {
		widths: paddedLayouts.map((layout) => layout.width),
	});
	return result;
}
