import pino, { type Level, type Logger } from "pino";

export type LogLevel = Level | "silent";

// Vitest sets VITEST; keep test output clean.
const isTest = process.env.VITEST === "true";

const rootLogger: Logger = pino({
	name: "research-tree",
	level: isTest ? "silent" : "info",
});

/**
 * Set the root level. Children pick up the level at creation, so call this
 * before constructing components.
 */
export function setLogLevel(level: LogLevel): void {
	if (isTest) return;
	rootLogger.level = level;
}

export function createLogger(module: string): Logger {
	return rootLogger.child({ module });
}

export type { Logger };
