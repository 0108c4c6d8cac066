import type { TreeCommand, TreeCommandResult } from "../../shared/types";
import { PositionRangeError, isTreeError } from "../errors";
import type { TreeStore } from "./tree-store";

function execute(tree: TreeStore, command: TreeCommand): TreeCommandResult {
	switch (command.type) {
		case "node:add-root":
			return {
				ok: true,
				type: "node:created",
				nodeId: tree.addRoot(command.afterId),
			};
		case "node:add-sibling":
			return {
				ok: true,
				type: "node:created",
				nodeId: tree.addSibling(command.ofId),
			};
		case "node:add-child":
			return {
				ok: true,
				type: "node:created",
				nodeId: tree.addChild(command.ofId),
			};
		case "node:delete":
			tree.delete(command.nodeId);
			return { ok: true, type: "done" };
		case "node:move":
			tree.move(command.nodeId, command.newParentId, command.position);
			return { ok: true, type: "done" };
		case "node:update":
			tree.update(command.nodeId, command.fields);
			return { ok: true, type: "done" };
		case "node:get":
			return {
				ok: true,
				type: "node:snapshot",
				node: tree.get(command.nodeId),
			};
		case "node:children":
			return {
				ok: true,
				type: "node:list",
				nodes: tree.getChildren(command.parentId),
			};
	}
}

/**
 * Runs one UI command against the store.
 * Engine errors come back as failure results; anything else is a bug and is rethrown.
 */
export function applyTreeCommand(
	tree: TreeStore,
	command: TreeCommand,
): TreeCommandResult {
	try {
		return execute(tree, command);
	} catch (error: unknown) {
		if (isTreeError(error) || error instanceof PositionRangeError) {
			return { ok: false, code: error.code, message: error.message };
		}
		throw error;
	}
}
