/**
 * Border presets and modifiers.
 *
 * Each string assigns one glyph per entry of {@link TABLE_COMPONENTS}, in order.
 * A space leaves the component undrawn.
 */
import { InvalidPresetError } from "./errors.js";
import { TABLE_COMPONENTS, type StyleMap } from "./types.js";
import { displayWidth, splitGraphemes } from "./width.js";

/**
 * ```text
 * +-------+-------+
 * | Hello | there |
 * +===============+
 * | a     | b     |
 * |-------+-------|
 * | c     | d     |
 * +-------+-------+
 * ```
 */
export const ASCII_FULL = "||--+==+|-+||++++++";

/** Like {@link ASCII_FULL} without lines between body rows. */
export const ASCII_FULL_CONDENSED = "||--+==+|    ++++++";

/**
 * ```text
 *  Hello | there
 * ===============
 *  a     | b
 * -------+-------
 *  c     | d
 * ```
 */
export const ASCII_NO_BORDERS = "     == |-+        ";

/** Outer frame and header line only. */
export const ASCII_BORDERS_ONLY = "||--+==+   ||++++++";

/** Outer frame and header line, without the blank lines between body rows. */
export const ASCII_BORDERS_ONLY_CONDENSED = "||--+==+     ++++++";

/** Horizontal lines only: top, header, between rows, bottom. */
export const ASCII_HORIZONTAL_ONLY = "  -- ==  -         ";

/**
 * ```text
 * | Hello | there |
 * |-------|-------|
 * | a     | b     |
 * ```
 */
export const ASCII_MARKDOWN = "||  |-|||          ";

/**
 * ```text
 * ┌───────┬───────┐
 * │ Hello ┆ there │
 * ╞═══════╪═══════╡
 * │ a     ┆ b     │
 * ├╌╌╌╌╌╌╌┼╌╌╌╌╌╌╌┤
 * │ c     ┆ d     │
 * └───────┴───────┘
 * ```
 */
export const UTF8_FULL = "││──╞═╪╡┆╌┼├┤┬┴┌┐└┘";

export const UTF8_FULL_CONDENSED = "││──╞═╪╡┆    ┬┴┌┐└┘";

export const UTF8_NO_BORDERS = "     ═╪ ┆╌┼        ";

export const UTF8_BORDERS_ONLY = "││──╞══╡     ──┌┐└┘";

export const UTF8_HORIZONTAL_ONLY = "  ── ═   ─         ";

/** Draws nothing but padded cell content. */
export const NOTHING = " ".repeat(TABLE_COMPONENTS.length);

/** Replaces the four outer corners with rounded ones. */
export const UTF8_ROUND_CORNERS = "               ╭╮╰╯";

/** Solid vertical and horizontal inner lines instead of dashed ones. */
export const UTF8_SOLID_INNER_BORDERS = "        │─         ";

function glyphs(preset: string): string[] {
	const tokens = splitGraphemes(preset).map((token) => token.text);
	if (tokens.length > TABLE_COMPONENTS.length) {
		throw new InvalidPresetError(
			`Preset has ${tokens.length} glyphs, at most ${TABLE_COMPONENTS.length} are supported`,
			{ preset },
		);
	}
	for (const glyph of tokens) {
		if (glyph !== " " && displayWidth(glyph) !== 1) {
			throw new InvalidPresetError(`Glyph "${glyph}" does not occupy exactly one column`, {
				preset,
			});
		}
	}
	return tokens;
}

/**
 * Replaces the style map's contents with a preset. Spaces remove the component.
 */
export function applyPreset(style: StyleMap, preset: string): void {
	const tokens = glyphs(preset);
	tokens.forEach((glyph, index) => {
		const component = TABLE_COMPONENTS[index];
		if (component === undefined) return;
		if (glyph === " ") style.delete(component);
		else style.set(component, glyph);
	});
}

/**
 * Overlays a modifier onto the style map. Spaces leave the component as it is.
 */
export function applyModifier(style: StyleMap, modifier: string): void {
	const tokens = glyphs(modifier);
	tokens.forEach((glyph, index) => {
		const component = TABLE_COMPONENTS[index];
		if (component === undefined || glyph === " ") return;
		style.set(component, glyph);
	});
}
