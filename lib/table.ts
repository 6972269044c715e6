import { arrangeContent, scanContent, type ColumnLayout, type LayoutSource } from "./arrangement/index.js";
import { Column } from "./column.js";
import { readEnvironment, resolveTableConfig, type StylingMode, type TableConfig } from "./config.js";
import { MAX_WIDTH } from "./constants.js";
import { ColumnNotFoundError, InvalidPresetError } from "./errors.js";
import { formatContent, type FormattedRow } from "./format/content.js";
import { smartPadContent } from "./format/smart-padding.js";
import { createLogger } from "./logger.js";
import { applyModifier, applyPreset } from "./presets.js";
import { Row } from "./row.js";
import { buildTableLines } from "./table-formatter.js";
import { getTerminalSize, isInteractiveTerminal } from "./terminal.js";
import {
	TABLE_COMPONENTS,
	type ArrangementMode,
	type CellAlignment,
	type Constraint,
	type Padding,
	type ReadonlyStyleMap,
	type StyleMap,
	type TableComponent,
} from "./types.js";
import { toCount } from "./utils.js";
import { displayWidth } from "./width.js";

const log = createLogger("table");

export type TableOptions = Partial<TableConfig>;

type RowInput = Row | Iterable<unknown>;

/** Decides whether a row is added. Receives the index the row would take and the row itself. */
export type RowPredicate = (index: number, row: Row) => boolean;

interface RenderedLayout {
	source: LayoutSource;
	content: FormattedRow[];
	layouts: ColumnLayout[];
	compromised: boolean;
}

/**
 * A table of rows and columns rendered to fixed-width text.
 *
 * Layout is recomputed on every render from the current state; nothing is cached
 * between calls, so the table can be mutated freely in between.
 */
export class Table implements Iterable<string> {
	readonly columns: Column[] = [];
	readonly rows: Row[] = [];
	private header?: Row;
	private arrangement: ArrangementMode;
	private width?: number;
	private tty?: boolean;
	private styling: StylingMode;
	private truncationMarker: string;
	private delimiter: string;
	private discoverColumns: boolean;
	private styleTextOnly: boolean;
	private smartPaddingWidth: number;
	private readonly padding: Padding;
	private readonly style: StyleMap = new Map();

	constructor(options: TableOptions = {}) {
		const config = resolveTableConfig(options);
		this.arrangement = config.arrangement;
		this.width = config.width === undefined ? undefined : toCount(config.width, MAX_WIDTH);
		this.styling = config.styling;
		this.truncationMarker = config.truncationMarker;
		this.delimiter = config.delimiter;
		this.discoverColumns = config.discoverColumns;
		this.styleTextOnly = config.styleTextOnly;
		this.smartPaddingWidth = toCount(config.smartPaddingWidth, MAX_WIDTH);
		this.padding = config.padding;
		applyPreset(this.style, config.preset);
	}

	// ---- content ----

	/**
	 * Sets the header row. Declares one column per header cell.
	 */
	setHeader(values: RowInput): this {
		const row = Row.from(values);
		this.ensureColumns(row.cellCount);
		this.header = row;
		return this;
	}

	getHeader(): Row | undefined {
		return this.header;
	}

	clearHeader(): this {
		this.header = undefined;
		return this;
	}

	/**
	 * Appends a row. Extra cells only create columns when column discovery is enabled.
	 */
	addRow(values: RowInput): this {
		const row = Row.from(values);
		if (this.discoverColumns) this.ensureColumns(row.cellCount);
		this.rows.push(row);
		return this;
	}

	addRows(rows: Iterable<RowInput>): this {
		for (const row of rows) this.addRow(row);
		return this;
	}

	/**
	 * Appends the row only when `predicate` accepts it.
	 */
	addRowIf(predicate: RowPredicate, values: RowInput): this {
		const row = Row.from(values);
		if (predicate(this.rows.length, row)) this.addRow(row);
		return this;
	}

	addRowsIf(predicate: RowPredicate, rows: Iterable<RowInput>): this {
		for (const row of rows) this.addRowIf(predicate, row);
		return this;
	}

	removeRow(index: number): Row | undefined {
		if (index < 0 || index >= this.rows.length) return undefined;
		return this.rows.splice(index, 1)[0];
	}

	getRow(index: number): Row | undefined {
		return this.rows[index];
	}

	// ---- columns ----

	get columnCount(): number {
		return this.columns.length;
	}

	setColumnCount(count: number): this {
		this.ensureColumns(toCount(count));
		return this;
	}

	enableColumnDiscovery(enabled = true): this {
		this.discoverColumns = enabled;
		return this;
	}

	getColumn(index: number): Column | undefined {
		return this.columns[index];
	}

	/**
	 * Like {@link getColumn}, but throws {@link ColumnNotFoundError} for unknown indices.
	 */
	column(index: number): Column {
		const column = this.columns[index];
		if (!column) throw new ColumnNotFoundError(index, this.columns.length);
		return column;
	}

	setConstraint(index: number, constraint: Constraint | undefined): this {
		this.column(index).setConstraint(constraint);
		return this;
	}

	/**
	 * Assigns constraints to the first `constraints.length` columns, in order.
	 */
	setConstraints(constraints: readonly (Constraint | undefined)[]): this {
		if (constraints.length > this.columns.length) {
			throw new ColumnNotFoundError(constraints.length - 1, this.columns.length);
		}
		constraints.forEach((constraint, index) => this.setConstraint(index, constraint));
		return this;
	}

	setColumnAlignment(index: number, alignment: CellAlignment | undefined): this {
		this.column(index).setAlignment(alignment);
		return this;
	}

	setColumnPadding(index: number, padding: Padding): this {
		this.column(index).setPadding(padding);
		return this;
	}

	setColumnDelimiter(index: number, delimiter: string | undefined): this {
		this.column(index).setDelimiter(delimiter);
		return this;
	}

	// ---- layout settings ----

	setArrangement(mode: ArrangementMode): this {
		this.arrangement = mode;
		return this;
	}

	getArrangement(): ArrangementMode {
		return this.arrangement;
	}

	/** Fixes the target width instead of asking the terminal. */
	setWidth(width: number): this {
		this.width = toCount(width, MAX_WIDTH);
		return this;
	}

	clearWidth(): this {
		this.width = undefined;
		return this;
	}

	/**
	 * Target width for the next render: the explicit width, else the terminal width when
	 * output is a terminal, else `undefined`.
	 */
	getWidth(): number | undefined {
		if (this.width !== undefined) return this.width;
		if (!this.isTty()) return undefined;
		const size = getTerminalSize();
		if (!size) {
			log.debug("No terminal size available, rendering without a target width");
			return undefined;
		}
		return size.columns;
	}

	forceTty(): this {
		this.tty = true;
		return this;
	}

	forceNoTty(): this {
		this.tty = false;
		return this;
	}

	isTty(): boolean {
		return this.tty ?? isInteractiveTerminal();
	}

	setStyling(mode: StylingMode): this {
		this.styling = mode;
		return this;
	}

	enableStyling(): this {
		return this.setStyling("always");
	}

	disableStyling(): this {
		return this.setStyling("never");
	}

	shouldStyle(): boolean {
		switch (this.styling) {
			case "always":
				return true;
			case "never":
				return false;
			case "auto":
				return this.isTty() && !readEnvironment().noColor;
		}
	}

	setTruncationMarker(marker: string): this {
		this.truncationMarker = marker;
		return this;
	}

	setDelimiter(delimiter: string): this {
		this.delimiter = delimiter;
		return this;
	}

	/**
	 * Styles only the text of each cell. By default the whole padded cell is styled,
	 * so background colors fill the column.
	 */
	setStyleTextOnly(enabled = true): this {
		this.styleTextOnly = enabled;
		return this;
	}

	/**
	 * Keeps at least `width` blank columns between the texts of neighbouring cells when the
	 * column separator is blank. Applies in the `disabled` and `dynamic` arrangements.
	 */
	setSmartPaddingWidth(width: number): this {
		this.smartPaddingWidth = toCount(width, MAX_WIDTH);
		return this;
	}

	getSmartPaddingWidth(): number {
		return this.smartPaddingWidth;
	}

	// ---- borders ----

	loadPreset(preset: string): this {
		applyPreset(this.style, preset);
		return this;
	}

	applyModifier(modifier: string): this {
		applyModifier(this.style, modifier);
		return this;
	}

	setStyle(component: TableComponent, character: string): this {
		if (displayWidth(character) !== 1) {
			throw new InvalidPresetError(`Glyph "${character}" does not occupy exactly one column`, {
				preset: character,
			});
		}
		this.style.set(component, character);
		return this;
	}

	removeStyle(component: TableComponent): this {
		this.style.delete(component);
		return this;
	}

	getStyle(component: TableComponent): string | undefined {
		return this.style.get(component);
	}

	/**
	 * Current border glyphs as a preset string, spaces for undrawn components.
	 */
	getPreset(): string {
		return presetString(this.style);
	}

	// ---- rendering ----

	/**
	 * Final width of every column (padding included, 0 for hidden ones) for the current state.
	 */
	columnWidths(): number[] {
		return this.layout().layouts.map((layout) => layout.width);
	}

	/**
	 * Widest content of every column, padding excluded.
	 */
	columnMaxContentWidths(): number[] {
		const rows = this.header ? [this.header, ...this.rows] : this.rows;
		const scan = scanContent(this.columns, rows, this.truncationMarker);
		return this.columns.map((column, position) =>
			Math.max(0, (scan.columns[position]?.maxContentWidth ?? 0) - column.paddingWidth),
		);
	}

	/**
	 * Whether the current state forces columns below their minimum widths to fit the
	 * target width.
	 */
	layoutCompromised(): boolean {
		return this.layout().compromised;
	}

	lines(): string[] {
		return this.render();
	}

	/**
	 * Renders with trailing whitespace removed from every line.
	 */
	trimFmt(): string {
		return this.render()
			.map((line) => line.trimEnd())
			.join("\n");
	}

	/**
	 * Renders with every line indented by `margin` spaces. The margin is taken out of the
	 * target width, so the indented table still fits it.
	 */
	fmtWithMargin(margin: number): string {
		const indent = " ".repeat(toCount(margin, MAX_WIDTH));
		return this.render(indent.length)
			.map((line) => indent + line)
			.join("\n");
	}

	/**
	 * Yields the rendered lines. Every iteration renders the table afresh.
	 */
	*lineIterator(): Generator<string, void, undefined> {
		yield* this.lines();
	}

	[Symbol.iterator](): Iterator<string> {
		return this.lineIterator();
	}

	toString(): string {
		return this.lines().join("\n");
	}

	private render(margin = 0): string[] {
		const stop = log.time("render");
		const { source, content, layouts } = this.layout(margin);
		const lines = buildTableLines(content, layouts, source.style, source.hasHeader);
		stop();
		return lines;
	}

	private layout(margin = 0): RenderedLayout {
		const source = this.snapshot(margin);
		const { layouts, compromised } = arrangeContent(source);
		const padded = smartPadContent(formatContent(source, layouts), layouts, source);
		return { source, content: padded.rows, layouts: padded.layouts, compromised };
	}

	private snapshot(margin: number): LayoutSource {
		const style: ReadonlyStyleMap = new Map(this.style);
		const needsWidth = this.arrangement !== "disabled" || this.smartPaddingWidth > 0;
		const width = needsWidth ? this.getWidth() : undefined;
		return {
			columns: this.columns,
			rows: this.header ? [this.header, ...this.rows] : [...this.rows],
			hasHeader: this.header !== undefined,
			arrangement: this.arrangement,
			tableWidth: width === undefined ? undefined : Math.max(0, width - margin),
			style,
			truncationMarker: this.truncationMarker,
			delimiter: this.delimiter,
			styling: this.shouldStyle(),
			styleTextOnly: this.styleTextOnly,
			smartPaddingWidth: this.smartPaddingWidth,
		};
	}

	private ensureColumns(count: number): void {
		for (let index = this.columns.length; index < count; index++) {
			this.columns.push(new Column(index, this.padding));
		}
	}
}

function presetString(style: ReadonlyStyleMap): string {
	const glyphs: string[] = [];
	for (const component of TABLE_COMPONENTS) {
		glyphs.push(style.get(component) ?? " ");
	}
	return glyphs.join("");
}
