/**
 * Table defaults and environment overrides.
 */
import { DEFAULT_PADDING, DEFAULT_TRUNCATION_MARKER } from "./constants.js";
import { ASCII_FULL } from "./presets.js";
import type { ArrangementMode, Padding } from "./types.js";

export type StylingMode = "auto" | "always" | "never";

export interface TableConfig {
	/** Padding applied to newly created columns. */
	padding: Padding;
	/** Appended to the last kept line when a row's max height cuts a cell. */
	truncationMarker: string;
	/** Word delimiter used by the line wrapper unless a cell or column overrides it. */
	delimiter: string;
	arrangement: ArrangementMode;
	/** Border preset loaded at construction. */
	preset: string;
	/** Explicit target width; falls back to the terminal width when unset. */
	width?: number;
	styling: StylingMode;
	/** Let `addRow` grow the column set when a row has more cells than columns. */
	discoverColumns: boolean;
	/** Style only the cell text, leaving alignment and column padding unstyled. */
	styleTextOnly: boolean;
	/** Minimum blank columns between neighbouring texts when the separator is blank. 0 disables it. */
	smartPaddingWidth: number;
}

export const DEFAULT_TABLE_CONFIG: TableConfig = {
	padding: DEFAULT_PADDING,
	truncationMarker: DEFAULT_TRUNCATION_MARKER,
	delimiter: " ",
	arrangement: "disabled",
	preset: ASCII_FULL,
	styling: "auto",
	discoverColumns: false,
	styleTextOnly: false,
	smartPaddingWidth: 0,
};

export function resolveTableConfig(options: Partial<TableConfig> = {}): TableConfig {
	const defined = Object.fromEntries(
		Object.entries(options).filter(([, value]) => value !== undefined),
	);
	return { ...DEFAULT_TABLE_CONFIG, ...defined };
}

/**
 * Reads a `1`/`0` (or `true`/`false`) switch. Anything else is treated as unset.
 */
export function parseBooleanFlag(value: string | undefined): boolean | undefined {
	if (value === undefined) return undefined;
	const normalized = value.toLowerCase().trim();
	if (normalized === "1" || normalized === "true") return true;
	if (normalized === "0" || normalized === "false") return false;
	return undefined;
}

/**
 * Reads a positive integer such as `COLUMNS`. Invalid values yield `undefined`.
 */
export function parsePositiveInt(value: string | undefined): number | undefined {
	if (!value) return undefined;
	const parsed = Number.parseInt(value.trim(), 10);
	if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
	return parsed;
}

export interface EnvironmentOverrides {
	forceTty?: boolean;
	noColor: boolean;
	columns?: number;
}

export function readEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentOverrides {
	return {
		forceTty: parseBooleanFlag(env.WRAPGRID_FORCE_TTY),
		noColor: env.NO_COLOR !== undefined && env.NO_COLOR !== "",
		columns: parsePositiveInt(env.COLUMNS),
	};
}
