/**
 * Structured logger passed through context objects.
 *
 * Writes to stderr: stdout is reserved for the MCP protocol when running over stdio.
 */

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR"

export interface Logger {
	debug(message: string, meta?: Record<string, unknown>): void
	info(message: string, meta?: Record<string, unknown>): void
	warn(message: string, meta?: Record<string, unknown>): void
	error(message: string, meta?: Record<string, unknown>): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	DEBUG: 10,
	INFO: 20,
	WARN: 30,
	ERROR: 40,
}

export function parseLogLevel(value: string | undefined): LogLevel {
	switch ((value ?? "").toUpperCase()) {
		case "DEBUG":
			return "DEBUG"
		case "WARN":
		case "WARNING":
			return "WARN"
		case "ERROR":
			return "ERROR"
		default:
			return "INFO"
	}
}

export function formatLogLine(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
	const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ""
	return `[${level}] ${message}${suffix}`
}

export function createLogger(
	level: LogLevel = "INFO",
	write: (line: string) => void = (line) => process.stderr.write(line + "\n"),
): Logger {
	const threshold = LEVEL_ORDER[level]
	const emit = (lineLevel: LogLevel) => (message: string, meta?: Record<string, unknown>) => {
		if (LEVEL_ORDER[lineLevel] < threshold) return
		write(formatLogLine(lineLevel, message, meta))
	}
	return {
		debug: emit("DEBUG"),
		info: emit("INFO"),
		warn: emit("WARN"),
		error: emit("ERROR"),
	}
}

export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
