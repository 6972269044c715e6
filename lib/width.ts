import ansiRegex from "ansi-regex";
import stringWidth from "string-width";
import stripAnsi from "strip-ansi";

/**
 * Display width of a string in terminal columns.
 * Embedded ANSI sequences count as zero; wide CJK and emoji count as two.
 */
export function displayWidth(text: string): number {
	return stringWidth(text);
}

export function stripStyles(text: string): string {
	return stripAnsi(text);
}

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

export interface TextToken {
	text: string;
	width: number;
}

/**
 * Splits text into grapheme clusters with their widths.
 * ANSI sequences become separate zero-width tokens so callers can cut between clusters
 * without breaking an escape sequence or a multi-column glyph.
 */
export function splitGraphemes(text: string): TextToken[] {
	const tokens: TextToken[] = [];
	let lastIndex = 0;
	for (const match of text.matchAll(ansiRegex())) {
		const index = match.index ?? 0;
		pushGraphemes(tokens, text.slice(lastIndex, index));
		tokens.push({ text: match[0], width: 0 });
		lastIndex = index + match[0].length;
	}
	pushGraphemes(tokens, text.slice(lastIndex));
	return tokens;
}

function pushGraphemes(tokens: TextToken[], text: string): void {
	if (!text) return;
	for (const { segment } of segmenter.segment(text)) {
		tokens.push({ text: segment, width: displayWidth(segment) });
	}
}
