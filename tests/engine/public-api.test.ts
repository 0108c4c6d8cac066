import { describe, expect, it } from "vitest";
import * as engine from "../../engine";

describe("engine entry point", () => {
	it("exposes the tree engine surface", () => {
		const tree = new engine.TreeStore();
		const id = tree.addRoot();

		expect(
			engine.applyTreeCommand(tree, { type: "node:get", nodeId: id }),
		).toMatchObject({ ok: true, type: "node:snapshot" });
		expect(engine.NODE_FIELD_NAMES).toEqual([
			"title",
			"status",
			"description",
			"notes",
		]);
		expect(new engine.NotFoundError("x")).toBeInstanceOf(engine.TreeError);
		expect(engine.isTreeError(new engine.PositionRangeError(1, 0))).toBe(false);
		expect(new engine.PositionRangeError(1, 0)).toBeInstanceOf(RangeError);
		expect(typeof engine.TreeDocument.open).toBe("function");
	});
});
