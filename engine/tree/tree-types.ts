export type NodeId = string;

/** Free-text fields of a task. The engine never validates their content. */
export interface NodeFields {
	title: string;
	/** e.g. "Planning", "In-Progress", "Completed" -- opaque to the engine */
	status: string;
	description: string;
	notes: string;
}

export type NodeFieldName = keyof NodeFields;

export const NODE_FIELD_NAMES: readonly NodeFieldName[] = [
	"title",
	"status",
	"description",
	"notes",
];

/** Partial field update; `undefined` leaves a field unchanged. */
export type NodeFieldUpdate = Partial<NodeFields>;

/**
 * One project or task inside the arena.
 * Owned by the Forest; children are referenced by id, the parent weakly by id.
 */
export interface TreeNode extends NodeFields {
	readonly id: NodeId;
	parentId: NodeId | null;
	children: NodeId[];
}

/** A node as readers see it: nothing, the child list included, is writable. */
export type ReadonlyTreeNode = Readonly<NodeFields> & {
	readonly id: NodeId;
	readonly parentId: NodeId | null;
	readonly children: readonly NodeId[];
};

/** Frozen copy of a node handed to readers. */
export type NodeSnapshot = ReadonlyTreeNode;

/** Ordered root ids plus the id -> node arena for every node. */
export interface Forest {
	roots: NodeId[];
	nodes: Map<NodeId, TreeNode>;
}

export interface ReadonlyForest {
	readonly roots: readonly NodeId[];
	readonly nodes: ReadonlyMap<NodeId, ReadonlyTreeNode>;
}

export type IdGenerator = () => NodeId;

export type TreeChangeType =
	| "node:added"
	| "node:deleted"
	| "node:moved"
	| "node:updated";

export interface TreeChange {
	type: TreeChangeType;
	/** Affected ids; for deletes, the node and every removed descendant */
	nodeIds: NodeId[];
	/** Post-mutation state; only valid for the duration of the listener call */
	forest: ReadonlyForest;
}

export type TreeChangeListener = (change: TreeChange) => void;

export type ForestReplacedListener = (forest: ReadonlyForest) => void;
