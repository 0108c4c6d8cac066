import type {
	Forest,
	NodeFieldUpdate,
	NodeFields,
	NodeId,
	NodeSnapshot,
	TreeNode,
} from "./tree-types";

export const EMPTY_FIELDS: Readonly<NodeFields> = Object.freeze({
	title: "",
	status: "",
	description: "",
	notes: "",
});

export function createTreeNode(
	id: NodeId,
	parentId: NodeId | null,
	fields?: NodeFieldUpdate,
): TreeNode {
	return {
		id,
		parentId,
		children: [],
		title: fields?.title ?? EMPTY_FIELDS.title,
		status: fields?.status ?? EMPTY_FIELDS.status,
		description: fields?.description ?? EMPTY_FIELDS.description,
		notes: fields?.notes ?? EMPTY_FIELDS.notes,
	};
}

export function createEmptyForest(): Forest {
	return { roots: [], nodes: new Map() };
}

export function snapshotNode(node: Readonly<TreeNode>): NodeSnapshot {
	return Object.freeze({
		id: node.id,
		parentId: node.parentId,
		title: node.title,
		status: node.status,
		description: node.description,
		notes: node.notes,
		children: Object.freeze([...node.children]),
	});
}
