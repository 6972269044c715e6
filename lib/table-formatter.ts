/**
 * Border drawing and line assembly.
 * Consumes formatted cell lines and column widths; every produced line has the same width.
 */
import type { ColumnLayout } from "./arrangement/index.js";
import type { FormattedRow } from "./format/content.js";
import type { ReadonlyStyleMap, TableComponent } from "./types.js";

function exists(style: ReadonlyStyleMap, ...components: TableComponent[]): boolean {
	return components.some((component) => style.has(component));
}

/** Glyph for a component; absent components render as a space. */
function glyph(style: ReadonlyStyleMap, component: TableComponent): string {
	return style.get(component) ?? " ";
}

export function shouldDrawLeftBorder(style: ReadonlyStyleMap): boolean {
	return exists(
		style,
		"topLeftCorner",
		"leftBorder",
		"leftBorderIntersections",
		"leftHeaderIntersection",
		"bottomLeftCorner",
	);
}

export function shouldDrawRightBorder(style: ReadonlyStyleMap): boolean {
	return exists(
		style,
		"topRightCorner",
		"rightBorder",
		"rightBorderIntersections",
		"rightHeaderIntersection",
		"bottomRightCorner",
	);
}

export function shouldDrawVerticalLines(style: ReadonlyStyleMap): boolean {
	return exists(style, "verticalLines");
}

function shouldDrawTopBorder(style: ReadonlyStyleMap): boolean {
	return exists(style, "topLeftCorner", "topBorder", "topBorderIntersections", "topRightCorner");
}

function shouldDrawBottomBorder(style: ReadonlyStyleMap): boolean {
	return exists(style, "bottomLeftCorner", "bottomBorder", "bottomBorderIntersections", "bottomRightCorner");
}

function shouldDrawHeaderLine(style: ReadonlyStyleMap): boolean {
	return exists(
		style,
		"leftHeaderIntersection",
		"headerLines",
		"middleHeaderIntersections",
		"rightHeaderIntersection",
	);
}

function shouldDrawRowLines(style: ReadonlyStyleMap): boolean {
	return exists(
		style,
		"leftBorderIntersections",
		"horizontalLines",
		"middleIntersections",
		"rightBorderIntersections",
	);
}

/**
 * Characters taken by borders and column separators for `visibleColumns` columns.
 */
export function countBorderColumns(style: ReadonlyStyleMap, visibleColumns: number): number {
	let count = 0;
	if (shouldDrawLeftBorder(style)) count += 1;
	if (shouldDrawRightBorder(style)) count += 1;
	if (shouldDrawVerticalLines(style)) count += Math.max(0, visibleColumns - 1);
	return count;
}

interface RuleGlyphs {
	left: TableComponent;
	line: TableComponent;
	intersection: TableComponent;
	right: TableComponent;
}

const TOP_RULE: RuleGlyphs = {
	left: "topLeftCorner",
	line: "topBorder",
	intersection: "topBorderIntersections",
	right: "topRightCorner",
};

const HEADER_RULE: RuleGlyphs = {
	left: "leftHeaderIntersection",
	line: "headerLines",
	intersection: "middleHeaderIntersections",
	right: "rightHeaderIntersection",
};

const ROW_RULE: RuleGlyphs = {
	left: "leftBorderIntersections",
	line: "horizontalLines",
	intersection: "middleIntersections",
	right: "rightBorderIntersections",
};

const BOTTOM_RULE: RuleGlyphs = {
	left: "bottomLeftCorner",
	line: "bottomBorder",
	intersection: "bottomBorderIntersections",
	right: "bottomRightCorner",
};

function drawRule(style: ReadonlyStyleMap, widths: readonly number[], rule: RuleGlyphs): string {
	const separator = shouldDrawVerticalLines(style) ? glyph(style, rule.intersection) : "";
	const line = glyph(style, rule.line);
	let result = shouldDrawLeftBorder(style) ? glyph(style, rule.left) : "";
	result += widths.map((width) => line.repeat(width)).join(separator);
	if (shouldDrawRightBorder(style)) result += glyph(style, rule.right);
	return result;
}

function embedLine(style: ReadonlyStyleMap, parts: readonly string[]): string {
	const separator = shouldDrawVerticalLines(style) ? glyph(style, "verticalLines") : "";
	let result = shouldDrawLeftBorder(style) ? glyph(style, "leftBorder") : "";
	result += parts.join(separator);
	if (shouldDrawRightBorder(style)) result += glyph(style, "rightBorder");
	return result;
}

/**
 * Assembles the final output lines: top border, header, header rule, body rows with
 * row rules between them, bottom border.
 */
export function buildTableLines(
	rows: readonly FormattedRow[],
	layouts: readonly ColumnLayout[],
	style: ReadonlyStyleMap,
	hasHeader: boolean,
): string[] {
	const widths = layouts.filter((layout) => !layout.hidden).map((layout) => layout.width);
	if (widths.length === 0) return [];

	const lines: string[] = [];
	if (shouldDrawTopBorder(style)) lines.push(drawRule(style, widths, TOP_RULE));

	rows.forEach((row, rowIndex) => {
		for (const parts of row) {
			lines.push(embedLine(style, parts));
		}

		const isLast = rowIndex === rows.length - 1;
		if (hasHeader && rowIndex === 0) {
			if (shouldDrawHeaderLine(style)) lines.push(drawRule(style, widths, HEADER_RULE));
			return;
		}
		if (!isLast && shouldDrawRowLines(style)) lines.push(drawRule(style, widths, ROW_RULE));
	});

	if (shouldDrawBottomBorder(style)) lines.push(drawRule(style, widths, BOTTOM_RULE));
	return lines;
}
