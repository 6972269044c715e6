/**
 * Reflows cell text to a column's content width.
 */
import ansiRegex from "ansi-regex";
import { displayWidth, splitGraphemes } from "../width.js";

/**
 * A line with at most this many free columns is closed rather than filled with the
 * start of a word that does not fit.
 */
export const MIN_FREE_CHARS = 2;

const STYLE_RESET = "\u001b[0m";

/**
 * Cuts a word into the longest prefix that fits `width` and the rest.
 * Cuts only between grapheme clusters. When even the first cluster is too wide it is
 * taken anyway, so callers always make progress.
 */
export function splitLongWord(word: string, width: number): [head: string, tail: string] {
	const tokens = splitGraphemes(word);
	let head = "";
	let used = 0;
	let index = 0;
	for (; index < tokens.length; index++) {
		const token = tokens[index];
		if (!token) break;
		if (used + token.width > width) break;
		head += token.text;
		used += token.width;
	}

	if (used === 0 && index < tokens.length) {
		// nothing visible fit: force the next visible cluster onto this line
		for (; index < tokens.length; index++) {
			const token = tokens[index];
			if (!token) break;
			head += token.text;
			if (token.width > 0) {
				index++;
				break;
			}
		}
	}

	const tail = tokens
		.slice(index)
		.map((token) => token.text)
		.join("");
	return [head, tail];
}

/**
 * Wraps one explicit line. Lines that already fit are returned untouched.
 *
 * Words are packed greedily. A line whose free space is down to {@link MIN_FREE_CHARS}
 * is closed early. A word wider than the column fills the free space of the current line
 * and continues on the next ones.
 */
export function wrapLine(line: string, width: number, delimiter = " "): string[] {
	const limit = Math.max(1, width);
	if (displayWidth(line) <= limit) return [line];

	const delimiterWidth = displayWidth(delimiter);
	const lines: string[] = [];
	const closeIfFull = (text: string): string => {
		if (displayWidth(text) > Math.max(0, limit - MIN_FREE_CHARS)) {
			lines.push(text);
			return "";
		}
		return text;
	};

	const pending = line.split(delimiter).reverse();
	let current = "";
	for (let word = pending.pop(); word !== undefined; word = pending.pop()) {
		const currentWidth = displayWidth(current);
		const wordWidth = displayWidth(word);
		const separator = current === "" ? 0 : delimiterWidth;

		if (currentWidth + separator + wordWidth <= limit) {
			current = closeIfFull(current === "" ? word : current + delimiter + word);
			continue;
		}

		const free = Math.max(0, limit - currentWidth - separator);
		if (current !== "" && free <= MIN_FREE_CHARS) {
			pending.push(word);
			lines.push(current);
			current = "";
			continue;
		}

		if (wordWidth > limit) {
			const [head, tail] = splitLongWord(word, free);
			lines.push(current === "" ? head : current + delimiter + head);
			if (tail !== "") pending.push(tail);
			current = "";
			continue;
		}

		lines.push(current);
		current = closeIfFull(word);
	}

	if (current !== "" || lines.length === 0) lines.push(current);
	return lines;
}

const CLOSING_CODES: Record<number, (code: number) => boolean> = {
	22: (code) => code === 1 || code === 2,
	23: (code) => code === 3,
	24: (code) => code === 4,
	27: (code) => code === 7,
	28: (code) => code === 8,
	29: (code) => code === 9,
	39: (code) => (code >= 30 && code <= 38) || (code >= 90 && code <= 97),
	49: (code) => (code >= 40 && code <= 48) || (code >= 100 && code <= 107),
};

function sgrParameters(sequence: string): number[] | undefined {
	const match = /^\u001b\[([\d;]*)m$/.exec(sequence);
	if (!match) return undefined;
	const body = match[1] ?? "";
	return body === "" ? [0] : body.split(";").map((part) => Number.parseInt(part || "0", 10));
}

function applySequence(open: string[], sequence: string): string[] {
	const parameters = sgrParameters(sequence);
	if (!parameters) return open;
	if (parameters[0] === 0) return parameters.length === 1 ? [] : [sequence];

	const closers = parameters.map((parameter) => CLOSING_CODES[parameter]);
	if (closers.every((closer) => closer !== undefined)) {
		return open.filter((opener) => {
			const first = sgrParameters(opener)?.[0] ?? 0;
			return !closers.some((closes) => closes?.(first));
		});
	}
	return [...open, sequence];
}

/**
 * Keeps ANSI styles from bleeding across wrapped lines.
 * A line that leaves styles open is closed with a reset, and the next line reopens them.
 */
export function repairStyles(lines: readonly string[]): string[] {
	let open: string[] = [];
	return lines.map((line) => {
		const prefix = open.join("");
		for (const match of line.matchAll(ansiRegex())) {
			open = applySequence(open, match[0]);
		}
		return prefix + line + (open.length > 0 ? STYLE_RESET : "");
	});
}

/**
 * Wraps every explicit line of a cell. Blank lines stay as a single blank line.
 */
export function wrapCell(lines: readonly string[], width: number, delimiter = " "): string[] {
	const wrapped = lines.flatMap((line) => wrapLine(line, width, delimiter));
	return wrapped.some((line) => line.includes("\u001b")) ? repairStyles(wrapped) : wrapped;
}

/**
 * Cuts a cell to `maxHeight` lines. When lines are dropped, the last kept line is
 * shortened until it fits `width` together with `marker`, then the marker is appended.
 */
export function truncateLines(
	lines: readonly string[],
	maxHeight: number,
	width: number,
	marker: string,
): string[] {
	if (lines.length <= maxHeight) return [...lines];

	const kept = lines.slice(0, maxHeight);
	const markerWidth = displayWidth(marker);
	const budget = width - markerWidth;

	if (budget < 0) {
		kept[kept.length - 1] = splitLongWord(marker, width)[0];
		return kept;
	}

	const tokens = splitGraphemes(kept[kept.length - 1] ?? "");
	let shortened = "";
	let used = 0;
	let styled = false;
	for (const token of tokens) {
		if (token.width === 0 && token.text.startsWith("\u001b")) {
			shortened += token.text;
			styled = true;
			continue;
		}
		if (used + token.width > budget) break;
		shortened += token.text;
		used += token.width;
	}
	kept[kept.length - 1] = shortened + (styled ? STYLE_RESET : "") + marker;
	return kept;
}
