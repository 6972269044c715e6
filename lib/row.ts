import { Cell } from "./cell.js";
import { toCount } from "./utils.js";

export class Row {
	readonly cells: Cell[];
	/** Rendered lines beyond this count are cut and marked as truncated. */
	maxHeight?: number;

	constructor(values: Iterable<unknown> = []) {
		this.cells = Array.from(values, (value) => Cell.from(value));
	}

	static from(value: Row | Iterable<unknown>): Row {
		return value instanceof Row ? value : new Row(value);
	}

	get cellCount(): number {
		return this.cells.length;
	}

	addCell(value: unknown): this {
		this.cells.push(Cell.from(value));
		return this;
	}

	setMaxHeight(lines: number): this {
		this.maxHeight = Math.max(1, toCount(lines));
		return this;
	}

	clearMaxHeight(): this {
		this.maxHeight = undefined;
		return this;
	}
}
