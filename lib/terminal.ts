/**
 * Terminal size and interactivity lookup.
 * Each call is a single, fallible read of the current stdout; nothing is cached or retried.
 */
import { readEnvironment } from "./config.js";
import { createLogger } from "./logger.js";

const log = createLogger("terminal");

export interface TerminalSize {
	columns: number;
	rows: number;
}

export interface TerminalStream {
	isTTY?: boolean;
	columns?: number;
	rows?: number;
	getWindowSize?: () => [number, number];
}

function isPositive(value: number | undefined): value is number {
	return typeof value === "number" && Number.isFinite(value) && value > 0;
}

/**
 * Returns the size of the attached terminal, or `null` when it cannot be determined.
 * `COLUMNS` is consulted when the stream reports no width.
 */
export function getTerminalSize(
	stream: TerminalStream = process.stdout,
	env: NodeJS.ProcessEnv = process.env,
): TerminalSize | null {
	try {
		if (isPositive(stream.columns)) {
			return { columns: stream.columns, rows: isPositive(stream.rows) ? stream.rows : 0 };
		}
		if (stream.getWindowSize) {
			const [columns, rows] = stream.getWindowSize();
			if (isPositive(columns)) return { columns, rows: isPositive(rows) ? rows : 0 };
		}
	} catch (error) {
		log.debug("Terminal size lookup failed", { error: String(error) });
	}

	const { columns } = readEnvironment(env);
	return columns === undefined ? null : { columns, rows: 0 };
}

/**
 * Whether output goes to an interactive terminal. `WRAPGRID_FORCE_TTY` overrides detection.
 */
export function isInteractiveTerminal(
	stream: TerminalStream = process.stdout,
	env: NodeJS.ProcessEnv = process.env,
): boolean {
	const { forceTty } = readEnvironment(env);
	if (forceTty !== undefined) return forceTty;
	return stream.isTTY === true;
}
