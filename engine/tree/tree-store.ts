import { randomUUID } from "node:crypto";
import {
	CycleError,
	NotFoundError,
	PositionRangeError,
	errorMessage,
} from "../errors";
import { type Logger, createLogger } from "../logger";
import { createEmptyForest, createTreeNode, snapshotNode } from "./tree-node";
import type {
	Forest,
	ForestReplacedListener,
	IdGenerator,
	NodeFieldUpdate,
	NodeId,
	NodeSnapshot,
	ReadonlyForest,
	TreeChange,
	TreeChangeListener,
	TreeChangeType,
	TreeNode,
} from "./tree-types";
import { NODE_FIELD_NAMES } from "./tree-types";

export interface TreeStoreOptions {
	/** Defaults to UUID v4 */
	generateId?: IdGenerator;
	/** Field values for freshly added nodes (all empty when omitted) */
	newNodeDefaults?: NodeFieldUpdate;
	logger?: Logger;
}

/**
 * Owns one Forest and every structural mutation on it.
 *
 * Nodes live in an id -> node arena; children are id lists, parents are
 * weak id back-references. Each successful mutation emits exactly one
 * change event; failed operations throw before touching the Forest.
 * Every listener runs even if an earlier one throws; listener failures are
 * logged and never reach the caller of the mutation.
 */
export class TreeStore {
	private state: Forest;
	private readonly generateId: IdGenerator;
	private readonly newNodeDefaults: NodeFieldUpdate;
	private readonly changeListeners = new Set<TreeChangeListener>();
	private readonly replaceListeners = new Set<ForestReplacedListener>();
	private readonly log: Logger;

	constructor(
		forest: Forest = createEmptyForest(),
		options: TreeStoreOptions = {},
	) {
		this.state = forest;
		this.generateId = options.generateId ?? randomUUID;
		this.newNodeDefaults = { ...options.newNodeDefaults };
		this.log = options.logger ?? createLogger("tree");
	}

	/** Read-only view of the live Forest. */
	get forest(): ReadonlyForest {
		return this.state;
	}

	get size(): number {
		return this.state.nodes.size;
	}

	has(id: NodeId): boolean {
		return this.state.nodes.has(id);
	}

	/** New root at the end, or directly after root `afterId`. */
	addRoot(afterId?: NodeId): NodeId {
		let index = this.state.roots.length;
		if (afterId !== undefined) {
			const afterIndex = this.state.roots.indexOf(afterId);
			if (afterIndex === -1) {
				throw new NotFoundError(afterId, `Root not found: ${afterId}`);
			}
			index = afterIndex + 1;
		}

		const node = this.createNode(null);
		this.state.roots.splice(index, 0, node.id);
		this.emitChange("node:added", [node.id]);
		return node.id;
	}

	/** New node directly after `ofId` among its siblings. */
	addSibling(ofId: NodeId): NodeId {
		const anchor = this.requireNode(ofId);
		const siblings = this.siblingsOf(anchor);
		const index = siblings.indexOf(ofId);

		const node = this.createNode(anchor.parentId);
		siblings.splice(index + 1, 0, node.id);
		this.emitChange("node:added", [node.id]);
		return node.id;
	}

	/** New last child of `ofId`. */
	addChild(ofId: NodeId): NodeId {
		const parent = this.requireNode(ofId);

		const node = this.createNode(parent.id);
		parent.children.push(node.id);
		this.emitChange("node:added", [node.id]);
		return node.id;
	}

	/** Removes `id` and its whole subtree. */
	delete(id: NodeId): void {
		const node = this.requireNode(id);
		const removed = this.collectSubtree(id);

		const siblings = this.siblingsOf(node);
		siblings.splice(siblings.indexOf(id), 1);
		for (const removedId of removed) {
			this.state.nodes.delete(removedId);
		}
		this.emitChange("node:deleted", removed);
	}

	/**
	 * Relocates `id` with its subtree under `newParentId` (null = root list).
	 *
	 * `position` indexes the destination list as it looks once `id` has been
	 * taken out of its current place, so reordering within the same parent
	 * lands exactly at `position`.
	 */
	move(id: NodeId, newParentId: NodeId | null, position: number): void {
		const node = this.requireNode(id);
		let destination = this.state.roots;
		if (newParentId !== null) {
			const newParent = this.requireNode(newParentId);
			if (newParentId === id || this.isDescendantOf(newParentId, id)) {
				throw new CycleError(id, newParentId);
			}
			destination = newParent.children;
		}

		const source = this.siblingsOf(node);
		const available =
			source === destination ? destination.length - 1 : destination.length;
		if (!Number.isInteger(position) || position < 0 || position > available) {
			throw new PositionRangeError(position, available);
		}

		source.splice(source.indexOf(id), 1);
		destination.splice(position, 0, id);
		node.parentId = newParentId;
		this.emitChange("node:moved", [id]);
	}

	update(id: NodeId, fields: NodeFieldUpdate): void {
		const node = this.requireNode(id);
		for (const name of NODE_FIELD_NAMES) {
			const value = fields[name];
			if (value !== undefined) {
				node[name] = value;
			}
		}
		this.emitChange("node:updated", [id]);
	}

	get(id: NodeId): NodeSnapshot {
		return snapshotNode(this.requireNode(id));
	}

	/** Ordered children of `id`, or the roots when `id` is null. */
	getChildren(id: NodeId | null): NodeSnapshot[] {
		const ids = id === null ? this.state.roots : this.requireNode(id).children;
		return ids.map((childId) => snapshotNode(this.requireNode(childId)));
	}

	getParent(id: NodeId): NodeSnapshot | null {
		const node = this.requireNode(id);
		return node.parentId === null
			? null
			: snapshotNode(this.requireNode(node.parentId));
	}

	/** Ancestors of `id`, nearest first. */
	getAncestors(id: NodeId): NodeSnapshot[] {
		const ancestors: NodeSnapshot[] = [];
		let parentId = this.requireNode(id).parentId;
		while (parentId !== null) {
			const parent = this.requireNode(parentId);
			ancestors.push(snapshotNode(parent));
			parentId = parent.parentId;
		}
		return ancestors;
	}

	/** Swaps in a freshly loaded Forest. Not a mutation: no change event. */
	replaceForest(forest: Forest): void {
		this.state = forest;
		this.notify(this.replaceListeners, this.state, "tree:replace");
	}

	onChange(listener: TreeChangeListener): () => void {
		this.changeListeners.add(listener);
		return () => {
			this.changeListeners.delete(listener);
		};
	}

	onReplace(listener: ForestReplacedListener): () => void {
		this.replaceListeners.add(listener);
		return () => {
			this.replaceListeners.delete(listener);
		};
	}

	private createNode(parentId: NodeId | null): TreeNode {
		const id = this.generateId();
		if (this.state.nodes.has(id)) {
			throw new Error(`Id generator returned a duplicate id: ${id}`);
		}
		const node = createTreeNode(id, parentId, this.newNodeDefaults);
		this.state.nodes.set(id, node);
		return node;
	}

	private requireNode(id: NodeId): TreeNode {
		const node = this.state.nodes.get(id);
		if (!node) {
			throw new NotFoundError(id);
		}
		return node;
	}

	/** The list that holds `node`: its parent's children or the roots. */
	private siblingsOf(node: TreeNode): NodeId[] {
		return node.parentId === null
			? this.state.roots
			: this.requireNode(node.parentId).children;
	}

	private isDescendantOf(candidateId: NodeId, ancestorId: NodeId): boolean {
		let parentId = this.requireNode(candidateId).parentId;
		while (parentId !== null) {
			if (parentId === ancestorId) {
				return true;
			}
			parentId = this.requireNode(parentId).parentId;
		}
		return false;
	}

	/** `id` followed by its descendants in pre-order. */
	private collectSubtree(id: NodeId): NodeId[] {
		const collected: NodeId[] = [];
		const stack: NodeId[] = [id];
		while (stack.length > 0) {
			const nextId = stack.pop();
			if (nextId === undefined) break;
			collected.push(nextId);
			const children = this.requireNode(nextId).children;
			for (let i = children.length - 1; i >= 0; i--) {
				const childId = children[i];
				if (childId !== undefined) stack.push(childId);
			}
		}
		return collected;
	}

	private emitChange(type: TreeChangeType, nodeIds: NodeId[]): void {
		const change: TreeChange = { type, nodeIds, forest: this.state };
		this.notify(this.changeListeners, change, "tree:change");
	}

	private notify<T>(
		listeners: ReadonlySet<(value: T) => void>,
		value: T,
		event: string,
	): void {
		for (const listener of [...listeners]) {
			try {
				listener(value);
			} catch (err: unknown) {
				this.log.error({ event, err: errorMessage(err) }, "tree listener threw");
			}
		}
	}
}
