import { describe, it, expect } from "vitest";
import { InvalidPresetError } from "../lib/errors.js";
import * as presets from "../lib/presets.js";
import { applyModifier, applyPreset } from "../lib/presets.js";
import { TABLE_COMPONENTS, type StyleMap } from "../lib/types.js";
import { displayWidth, splitGraphemes } from "../lib/width.js";

const PRESET_NAMES = [
	"ASCII_FULL",
	"ASCII_FULL_CONDENSED",
	"ASCII_NO_BORDERS",
	"ASCII_BORDERS_ONLY",
	"ASCII_BORDERS_ONLY_CONDENSED",
	"ASCII_HORIZONTAL_ONLY",
	"ASCII_MARKDOWN",
	"UTF8_FULL",
	"UTF8_FULL_CONDENSED",
	"UTF8_NO_BORDERS",
	"UTF8_BORDERS_ONLY",
	"UTF8_HORIZONTAL_ONLY",
	"NOTHING",
	"UTF8_ROUND_CORNERS",
	"UTF8_SOLID_INNER_BORDERS",
] as const;

describe("presets", () => {
	it.each(PRESET_NAMES)("%s has one single-width glyph per component", (name) => {
		const tokens = splitGraphemes(presets[name]);
		expect(tokens).toHaveLength(TABLE_COMPONENTS.length);
		for (const token of tokens) {
			expect(displayWidth(token.text)).toBe(1);
		}
	});

	describe("applyPreset", () => {
		it("maps glyphs onto components in order", () => {
			const style: StyleMap = new Map();
			applyPreset(style, presets.ASCII_FULL);
			expect(style.get("leftBorder")).toBe("|");
			expect(style.get("headerLines")).toBe("=");
			expect(style.get("verticalLines")).toBe("|");
			expect(style.get("middleIntersections")).toBe("+");
			expect(style.get("bottomRightCorner")).toBe("+");
		});

		it("removes components set to a space", () => {
			const style: StyleMap = new Map();
			applyPreset(style, presets.ASCII_FULL);
			applyPreset(style, presets.ASCII_FULL_CONDENSED);
			expect(style.has("horizontalLines")).toBe(false);
			expect(style.has("leftBorderIntersections")).toBe(false);
			expect(style.get("verticalLines")).toBe("|");
		});

		it("accepts shorter strings and leaves later components untouched", () => {
			const style: StyleMap = new Map([["bottomRightCorner", "#"]]);
			applyPreset(style, "ab");
			expect(style.get("leftBorder")).toBe("a");
			expect(style.get("rightBorder")).toBe("b");
			expect(style.get("bottomRightCorner")).toBe("#");
		});

		it("rejects presets with too many glyphs", () => {
			const style: StyleMap = new Map();
			expect(() => applyPreset(style, "+".repeat(20))).toThrow(InvalidPresetError);
		});

		it("rejects wide glyphs", () => {
			const style: StyleMap = new Map();
			expect(() => applyPreset(style, "中")).toThrow('Glyph "中" does not occupy exactly one column');
		});
	});

	describe("applyModifier", () => {
		it("overlays only the non-space glyphs", () => {
			const style: StyleMap = new Map();
			applyPreset(style, presets.UTF8_FULL);
			applyModifier(style, presets.UTF8_ROUND_CORNERS);
			expect(style.get("topLeftCorner")).toBe("╭");
			expect(style.get("bottomRightCorner")).toBe("╯");
			expect(style.get("leftBorder")).toBe("│");
		});

		it("replaces dashed inner lines with solid ones", () => {
			const style: StyleMap = new Map();
			applyPreset(style, presets.UTF8_FULL);
			applyModifier(style, presets.UTF8_SOLID_INNER_BORDERS);
			expect(style.get("verticalLines")).toBe("│");
			expect(style.get("horizontalLines")).toBe("─");
		});
	});
});
