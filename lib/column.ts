import { DEFAULT_PADDING, MAX_WIDTH } from "./constants.js";
import type { CellAlignment, Constraint, Padding } from "./types.js";
import { toCount } from "./utils.js";

/**
 * Per-column settings. Columns never reference cells; the table looks cells up by index.
 */
export class Column {
	readonly index: number;
	padding: Padding;
	constraint?: Constraint;
	alignment?: CellAlignment;
	delimiter?: string;

	constructor(index: number, padding: Padding = DEFAULT_PADDING) {
		this.index = index;
		this.padding = normalizePadding(padding);
	}

	setPadding(padding: Padding): this {
		this.padding = normalizePadding(padding);
		return this;
	}

	setConstraint(constraint: Constraint | undefined): this {
		this.constraint = constraint;
		return this;
	}

	setAlignment(alignment: CellAlignment | undefined): this {
		this.alignment = alignment;
		return this;
	}

	setDelimiter(delimiter: string | undefined): this {
		this.delimiter = delimiter;
		return this;
	}

	get paddingWidth(): number {
		return this.padding[0] + this.padding[1];
	}

	get isHidden(): boolean {
		return this.constraint?.kind === "hidden";
	}
}

function normalizePadding([left, right]: Padding): Padding {
	return [toCount(left, MAX_WIDTH), toCount(right, MAX_WIDTH)];
}
