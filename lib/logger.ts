import { LIBRARY_NAME } from "./constants.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogRecord {
	service: string;
	level: LogLevel;
	message: string;
	extra?: Record<string, unknown>;
}

/**
 * Sink for log records, installed with {@link initLogger}.
 * Hosts embedding the renderer forward these into their own logging.
 */
export interface LogClient {
	log?: (record: LogRecord) => unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

function isLogLevel(value: string): value is LogLevel {
	return value in LOG_LEVEL_PRIORITY;
}

export function parseLogLevel(value: string | undefined): LogLevel {
	if (!value) return "info";
	const normalized = value.toLowerCase().trim();
	if (isLogLevel(normalized)) return normalized;
	return "info";
}

export const DEBUG_ENABLED = process.env.WRAPGRID_DEBUG === "1";
export const LOG_LEVEL = parseLogLevel(process.env.WRAPGRID_LOG_LEVEL);
const CONSOLE_LOG_ENABLED = process.env.WRAPGRID_CONSOLE_LOG === "1";

let client: LogClient | null = null;

export function initLogger(newClient: LogClient | null): void {
	client = newClient;
}

function logToClient(
	level: LogLevel,
	message: string,
	data: unknown,
	service: string,
): void {
	const sink = client?.log;
	if (!sink) return;

	const sanitizedMessage = message.replace(/[\r\n]+/g, " ");
	const extra =
		data === undefined
			? undefined
			: { data: typeof data === "object" && data !== null ? data : { value: data } };

	try {
		const result = sink({ service, level, message: sanitizedMessage, extra });
		if (result instanceof Promise) {
			result.catch(() => {
				// sink rejections are not the renderer's concern
			});
		}
	} catch {
		// Ignore sink failures
	}
}

function logToConsole(level: LogLevel, message: string, data?: unknown): void {
	if (!CONSOLE_LOG_ENABLED) return;
	const args: unknown[] = data === undefined ? [message] : [message, data];
	if (level === "warn") console.warn(...args);
	else if (level === "error") console.error(...args);
	else console.log(...args);
}

function shouldLog(level: LogLevel): boolean {
	if (level === "error") return true;
	if (!DEBUG_ENABLED) return false;
	return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[LOG_LEVEL];
}

export function formatDuration(ms: number): string {
	if (ms < 1) return `${ms.toFixed(2)}ms`;
	if (ms < 1000) return `${Math.round(ms)}ms`;
	return `${(ms / 1000).toFixed(2)}s`;
}

export interface ScopedLogger {
	debug(message: string, data?: unknown): void;
	info(message: string, data?: unknown): void;
	warn(message: string, data?: unknown): void;
	error(message: string, data?: unknown): void;
	time(label: string): () => number;
}

export function createLogger(scope: string): ScopedLogger {
	const prefix = `[${LIBRARY_NAME}:${scope}]`;
	const service = `${LIBRARY_NAME}.${scope}`;

	const emit = (level: LogLevel, message: string, data?: unknown): void => {
		if (!shouldLog(level)) return;
		const text = `${prefix} ${message}`;
		logToClient(level, text, data, service);
		logToConsole(level, text, data);
	};

	return {
		debug(message: string, data?: unknown) {
			emit("debug", message, data);
		},
		info(message: string, data?: unknown) {
			emit("info", message, data);
		},
		warn(message: string, data?: unknown) {
			emit("warn", message, data);
		},
		error(message: string, data?: unknown) {
			emit("error", message, data);
		},
		time(label: string): () => number {
			const startTime = performance.now();
			return () => {
				const duration = performance.now() - startTime;
				emit("debug", `${label}: ${formatDuration(duration)}`);
				return duration;
			};
		},
	};
}
