import { describe, expect, it } from "vitest";
import { join, resolve } from "node:path";
import { DEFAULT_TREE_FILE, resolveConfig } from "../../engine/config";

describe("resolveConfig", () => {
	it("TC-8.1a: prefers the first positional argument", () => {
		const config = resolveConfig(["--verbose", "trees/thesis.json"], {
			RESEARCH_TREE_FILE: "/tmp/ignored.json",
		});

		expect(config.filePath).toBe(resolve("trees/thesis.json"));
	});

	it("TC-8.1b: falls back to RESEARCH_TREE_FILE, then the default path", () => {
		expect(
			resolveConfig([], { RESEARCH_TREE_FILE: "/data/tree.json" }).filePath,
		).toBe("/data/tree.json");
		expect(resolveConfig([], {}).filePath).toBe(DEFAULT_TREE_FILE);
		expect(DEFAULT_TREE_FILE.endsWith(join(".research-tree", "project-tree.json"))).toBe(true);
	});

	it("TC-8.1c: validates LOG_LEVEL", () => {
		expect(resolveConfig([], {}).logLevel).toBe("info");
		expect(resolveConfig([], { LOG_LEVEL: "debug" }).logLevel).toBe("debug");
		expect(() => resolveConfig([], { LOG_LEVEL: "loud" })).toThrow(
			/Invalid LOG_LEVEL "loud"/,
		);
	});
});
