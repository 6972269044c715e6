/**
 * Shared type definitions for tables, columns and their layout constraints.
 */

export type CellAlignment = "left" | "center" | "right";

/**
 * How columns react to the table's target width.
 *
 * - `disabled`: every column renders at its full content width, the target is ignored.
 * - `dynamic`: columns shrink and wrap to fit the target; the table may end up narrower.
 * - `dynamicFullWidth`: like `dynamic`, but leftover space is handed out so the table
 *   always spans the whole target width.
 */
export type ArrangementMode = "disabled" | "dynamic" | "dynamicFullWidth";

export type Width =
	| { kind: "fixed"; chars: number }
	| { kind: "percentage"; percent: number };

export const Width = {
	fixed: (chars: number): Width => ({ kind: "fixed", chars }),
	percentage: (percent: number): Width => ({ kind: "percentage", percent }),
} as const;

/**
 * Declarative width bound for one column. All widths include the column's padding.
 */
export type Constraint =
	| { kind: "hidden" }
	| { kind: "contentWidth" }
	| { kind: "absolute"; width: Width }
	| { kind: "lowerBoundary"; width: Width }
	| { kind: "upperBoundary"; width: Width }
	| { kind: "boundaries"; lower: Width; upper: Width };

export const Constraint = {
	hidden: (): Constraint => ({ kind: "hidden" }),
	contentWidth: (): Constraint => ({ kind: "contentWidth" }),
	absolute: (width: Width): Constraint => ({ kind: "absolute", width }),
	lowerBoundary: (width: Width): Constraint => ({ kind: "lowerBoundary", width }),
	upperBoundary: (width: Width): Constraint => ({ kind: "upperBoundary", width }),
	boundaries: (lower: Width, upper: Width): Constraint => ({ kind: "boundaries", lower, upper }),
} as const;

/** Left and right padding of a column, in display columns. */
export type Padding = readonly [left: number, right: number];

/**
 * Every glyph slot a border preset can fill, in preset-string order.
 */
export const TABLE_COMPONENTS = [
	"leftBorder",
	"rightBorder",
	"topBorder",
	"bottomBorder",
	"leftHeaderIntersection",
	"headerLines",
	"middleHeaderIntersections",
	"rightHeaderIntersection",
	"verticalLines",
	"horizontalLines",
	"middleIntersections",
	"leftBorderIntersections",
	"rightBorderIntersections",
	"topBorderIntersections",
	"bottomBorderIntersections",
	"topLeftCorner",
	"topRightCorner",
	"bottomLeftCorner",
	"bottomRightCorner",
] as const;

export type TableComponent = (typeof TABLE_COMPONENTS)[number];

export type StyleMap = Map<TableComponent, string>;
export type ReadonlyStyleMap = ReadonlyMap<TableComponent, string>;
