/**
 * Small shared helpers for the layout engine.
 */

/**
 * Clamps a number into `[min, max]`. Non-finite input collapses to `min`.
 */
export function clamp(value: number, min: number, max: number): number {
	if (!Number.isFinite(value)) return min;
	return Math.min(max, Math.max(min, value));
}

/**
 * Normalizes a user-provided width or count to a non-negative integer.
 */
export function toCount(value: number, max = Number.MAX_SAFE_INTEGER): number {
	return Math.trunc(clamp(value, 0, max));
}

/**
 * Sums a list of numbers.
 */
export function sum(values: readonly number[]): number {
	let total = 0;
	for (const value of values) total += value;
	return total;
}

/**
 * Safely converts any displayable value to the text shown in a cell.
 * @param value - The value to convert
 * @returns String representation of the value
 */
export function toStringValue(value: unknown): string {
	if (typeof value === "string") {
		return value;
	}
	if (value === null || value === undefined) {
		return "";
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (typeof value === "object") {
		if (hasOwnToString(value)) {
			return String(value);
		}
		try {
			return JSON.stringify(value) ?? String(value);
		} catch {
			return String(value);
		}
	}
	return String(value);
}

function hasOwnToString(value: object): boolean {
	return value.toString !== Object.prototype.toString && value.toString !== Array.prototype.toString;
}
