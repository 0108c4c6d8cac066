import type {
	NodeFieldUpdate,
	NodeId,
	NodeSnapshot,
	TreeChangeType,
} from "../engine/tree/tree-types";
import type { TreeErrorCode } from "../engine/errors";

/**
 * UI -> engine commands.
 * Drag-and-drop maps to `node:move` for both reparenting and reordering.
 */
export type TreeCommand =
	| { type: "node:add-root"; afterId?: NodeId }
	| { type: "node:add-sibling"; ofId: NodeId }
	| { type: "node:add-child"; ofId: NodeId }
	| { type: "node:delete"; nodeId: NodeId }
	| {
			type: "node:move";
			nodeId: NodeId;
			newParentId: NodeId | null;
			position: number;
	  }
	| { type: "node:update"; nodeId: NodeId; fields: NodeFieldUpdate }
	| { type: "node:get"; nodeId: NodeId }
	| { type: "node:children"; parentId: NodeId | null };

/** Synchronous outcome of a TreeCommand. */
export type TreeCommandResult =
	| { ok: true; type: "node:created"; nodeId: NodeId }
	| { ok: true; type: "node:snapshot"; node: NodeSnapshot }
	| { ok: true; type: "node:list"; nodes: NodeSnapshot[] }
	| { ok: true; type: "done" }
	| { ok: false; code: TreeErrorCode; message: string };

/** Engine -> UI notifications. */
export type EngineEvent =
	| { type: TreeChangeType; nodeIds: NodeId[] }
	| { type: "forest:replaced" }
	| { type: "autosave:saved"; sequence: number; filePath: string }
	| {
			type: "autosave:failed";
			sequence: number;
			filePath: string;
			message: string;
	  };
