import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";
import type { LogLevel } from "./logger";

export const DEFAULT_TREE_FILE = join(
	homedir(),
	".research-tree",
	"project-tree.json",
);

const logLevelSchema = z.enum([
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
]);

export interface AppConfig {
	/** Absolute path of the tree file to open */
	filePath: string;
	logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

/**
 * Tree file: first positional argument, else RESEARCH_TREE_FILE, else the
 * default under the home directory.
 */
export function resolveConfig(argv: readonly string[], env: Env): AppConfig {
	const fileArg = argv.find((arg) => !arg.startsWith("-"));
	const filePath = fileArg || env.RESEARCH_TREE_FILE || DEFAULT_TREE_FILE;

	const level = logLevelSchema.safeParse(env.LOG_LEVEL ?? "info");
	if (!level.success) {
		throw new Error(
			`Invalid LOG_LEVEL "${env.LOG_LEVEL}": expected one of ${logLevelSchema.options.join(", ")}`,
		);
	}

	return { filePath: resolve(filePath), logLevel: level.data };
}
