import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { FormatError, errorMessage } from "../errors";
import type { StoreConfig } from "./store-types";

function errorCode(err: unknown): string | undefined {
	if (typeof err === "object" && err !== null && "code" in err) {
		const { code } = err;
		return typeof code === "string" ? code : undefined;
	}
	return undefined;
}

/** Reads and atomically replaces one UTF-8 text file. */
export class FileStore {
	private readonly config: StoreConfig;

	constructor(config: StoreConfig) {
		this.config = config;
	}

	get filePath(): string {
		return this.config.filePath;
	}

	/** File contents, or null when the file does not exist yet. */
	async read(): Promise<string | null> {
		try {
			return await readFile(this.config.filePath, "utf-8");
		} catch (err: unknown) {
			if (errorCode(err) === "ENOENT") {
				return null;
			}
			throw new FormatError(
				"$",
				`Cannot read ${this.config.filePath} (${errorMessage(err)})`,
				err,
			);
		}
	}

	/** Write to `<file>.tmp`, then rename over the target. */
	async write(text: string): Promise<void> {
		await mkdir(dirname(this.config.filePath), { recursive: true });
		const tmpPath = `${this.config.filePath}.tmp`;
		await writeFile(tmpPath, text, "utf-8");
		await rename(tmpPath, this.config.filePath);
	}
}
