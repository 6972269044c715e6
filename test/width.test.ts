import { describe, it, expect } from "vitest";
import { displayWidth, splitGraphemes, stripStyles } from "../lib/width.js";

describe("width metrics", () => {
	describe("displayWidth", () => {
		it("counts plain ASCII one column per character", () => {
			expect(displayWidth("Header1")).toBe(7);
			expect(displayWidth("")).toBe(0);
		});

		it("counts wide CJK characters and emoji as two columns", () => {
			expect(displayWidth("中文")).toBe(4);
			expect(displayWidth("\u{1F600}")).toBe(2);
		});

		it("counts combining marks as zero columns", () => {
			expect(displayWidth("é")).toBe(1);
		});

		it("ignores embedded style codes", () => {
			expect(displayWidth("\u001b[31mred\u001b[39m")).toBe(3);
		});
	});

	describe("stripStyles", () => {
		it("removes ANSI sequences and keeps the text", () => {
			expect(stripStyles("\u001b[1mbold\u001b[22m text")).toBe("bold text");
		});
	});

	describe("splitGraphemes", () => {
		it("keeps combining sequences together", () => {
			expect(splitGraphemes("aé")).toEqual([
				{ text: "a", width: 1 },
				{ text: "é", width: 1 },
			]);
		});

		it("emits style codes as zero-width tokens", () => {
			expect(splitGraphemes("a\u001b[1m中")).toEqual([
				{ text: "a", width: 1 },
				{ text: "\u001b[1m", width: 0 },
				{ text: "中", width: 2 },
			]);
		});

		it("returns nothing for an empty string", () => {
			expect(splitGraphemes("")).toEqual([]);
		});
	});
});
