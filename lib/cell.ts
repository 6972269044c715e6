import type { Attribute, CellStyle, Color } from "./styling.js";
import type { CellAlignment } from "./types.js";
import { toStringValue } from "./utils.js";

/**
 * A single table cell. Content is split into explicit lines on construction.
 */
export class Cell {
	readonly lines: readonly string[];
	alignment?: CellAlignment;
	delimiter?: string;
	fg?: Color;
	bg?: Color;
	attributes: Attribute[] = [];

	constructor(content: unknown = "") {
		this.lines = toStringValue(content).split(/\r?\n/);
	}

	static from(value: unknown): Cell {
		return value instanceof Cell ? value : new Cell(value);
	}

	get content(): string {
		return this.lines.join("\n");
	}

	setAlignment(alignment: CellAlignment): this {
		this.alignment = alignment;
		return this;
	}

	/** Character(s) the line wrapper may break this cell's lines on. */
	setDelimiter(delimiter: string): this {
		this.delimiter = delimiter;
		return this;
	}

	setFg(color: Color): this {
		this.fg = color;
		return this;
	}

	setBg(color: Color): this {
		this.bg = color;
		return this;
	}

	addAttribute(...attributes: Attribute[]): this {
		this.attributes.push(...attributes);
		return this;
	}

	get style(): CellStyle {
		return { fg: this.fg, bg: this.bg, attributes: this.attributes };
	}
}
