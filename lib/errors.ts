/**
 * Typed error hierarchy for the table renderer.
 * Layout never fails; these cover structural misuse of the builder API.
 */

/**
 * Error codes for categorizing errors.
 */
export const ErrorCode = {
	TABLE_ERROR: "WRAPGRID_TABLE_ERROR",
	COLUMN_NOT_FOUND: "WRAPGRID_COLUMN_NOT_FOUND",
	INVALID_PRESET: "WRAPGRID_INVALID_PRESET",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Options for creating a TableError.
 */
export interface TableErrorOptions {
	code?: ErrorCodeType;
	cause?: unknown;
	context?: Record<string, unknown>;
}

/**
 * Base error class for all renderer errors.
 * Supports error chaining via `cause` and arbitrary context data.
 */
export class TableError extends Error {
	override readonly name: string = "TableError";
	readonly code: ErrorCodeType;
	readonly context?: Record<string, unknown>;

	constructor(message: string, options?: TableErrorOptions) {
		super(message, { cause: options?.cause });
		this.code = options?.code ?? ErrorCode.TABLE_ERROR;
		this.context = options?.context;

		// istanbul ignore next -- Error.captureStackTrace always exists in Node.js
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

/**
 * Raised when a column is addressed by an index the table does not have.
 */
export class ColumnNotFoundError extends TableError {
	override readonly name = "ColumnNotFoundError";
	readonly index: number;
	readonly columnCount: number;

	constructor(index: number, columnCount: number, options?: TableErrorOptions) {
		super(`Column ${index} does not exist (table has ${columnCount} columns)`, {
			...options,
			code: options?.code ?? ErrorCode.COLUMN_NOT_FOUND,
			context: { ...options?.context, index, columnCount },
		});
		this.index = index;
		this.columnCount = columnCount;
	}
}

/**
 * Options for creating an InvalidPresetError.
 */
export interface InvalidPresetErrorOptions extends TableErrorOptions {
	preset: string;
}

/**
 * Raised for preset or modifier strings that cannot map onto the border components.
 */
export class InvalidPresetError extends TableError {
	override readonly name = "InvalidPresetError";
	readonly preset: string;

	constructor(message: string, options: InvalidPresetErrorOptions) {
		super(message, { ...options, code: options.code ?? ErrorCode.INVALID_PRESET });
		this.preset = options.preset;
	}
}
