/**
 * ANSI styling of cell lines.
 * Widths are always measured without escape codes, so styling never affects layout.
 */
import { Chalk, type BackgroundColorName, type ChalkInstance } from "chalk";

export type NamedColor =
	| "black"
	| "red"
	| "green"
	| "yellow"
	| "blue"
	| "magenta"
	| "cyan"
	| "white"
	| "gray"
	| "redBright"
	| "greenBright"
	| "yellowBright"
	| "blueBright"
	| "magentaBright"
	| "cyanBright"
	| "whiteBright";

export type Color =
	| NamedColor
	| { ansi256: number }
	| { rgb: readonly [number, number, number] }
	| { hex: string };

export type Attribute =
	| "bold"
	| "dim"
	| "italic"
	| "underline"
	| "inverse"
	| "hidden"
	| "strikethrough";

export interface CellStyle {
	fg?: Color;
	bg?: Color;
	attributes: readonly Attribute[];
}

const BACKGROUND_NAMES: Record<NamedColor, BackgroundColorName> = {
	black: "bgBlack",
	red: "bgRed",
	green: "bgGreen",
	yellow: "bgYellow",
	blue: "bgBlue",
	magenta: "bgMagenta",
	cyan: "bgCyan",
	white: "bgWhite",
	gray: "bgGray",
	redBright: "bgRedBright",
	greenBright: "bgGreenBright",
	yellowBright: "bgYellowBright",
	blueBright: "bgBlueBright",
	magentaBright: "bgMagentaBright",
	cyanBright: "bgCyanBright",
	whiteBright: "bgWhiteBright",
};

/** Chalk instance that always emits truecolor codes; level detection is the table's job. */
const painter = new Chalk({ level: 3 });

function withForeground(chalk: ChalkInstance, color: Color): ChalkInstance {
	if (typeof color === "string") return chalk[color];
	if ("ansi256" in color) return chalk.ansi256(color.ansi256);
	if ("rgb" in color) return chalk.rgb(...color.rgb);
	return chalk.hex(color.hex);
}

function withBackground(chalk: ChalkInstance, color: Color): ChalkInstance {
	if (typeof color === "string") return chalk[BACKGROUND_NAMES[color]];
	if ("ansi256" in color) return chalk.bgAnsi256(color.ansi256);
	if ("rgb" in color) return chalk.bgRgb(...color.rgb);
	return chalk.bgHex(color.hex);
}

export function hasStyle(style: CellStyle): boolean {
	return style.fg !== undefined || style.bg !== undefined || style.attributes.length > 0;
}

/**
 * Wraps a line in the codes for the cell's colors and attributes.
 */
export function styleLine(line: string, style: CellStyle): string {
	if (!hasStyle(style)) return line;
	let chalk: ChalkInstance = painter;
	if (style.fg !== undefined) chalk = withForeground(chalk, style.fg);
	if (style.bg !== undefined) chalk = withBackground(chalk, style.bg);
	for (const attribute of style.attributes) chalk = chalk[attribute];
	return chalk(line);
}
