import { randomUUID } from "node:crypto";
import type { ZodError } from "zod";
import { FormatError, NotFoundError, errorMessage } from "../errors";
import { createEmptyForest, createTreeNode } from "../tree/tree-node";
import type {
	Forest,
	IdGenerator,
	NodeId,
	ReadonlyForest,
	TreeNode,
} from "../tree/tree-types";
import { NODE_FIELD_NAMES } from "../tree/tree-types";
import {
	TREE_DOCUMENT_VERSION,
	nodeDocumentSchema,
	treeDocumentSchema,
} from "./tree-document-schema";

const INDENT = "  ";
// Indentation stops growing past this nesting level so that very deep
// chains stay linear in file size. The text is still plain JSON.
const MAX_INDENT_LEVEL = 40;

type PathSegment = string | number;

/** Text to emit, or a node still to be written at `level`. */
type WriteTask = string | { id: NodeId; level: number };

/** A raw node waiting to be validated and built. */
interface PendingNode {
	value: unknown;
	/** Position inside the enclosing `data` or `children` list */
	index: number;
	parent: BuiltParent | null;
}

interface BuiltParent {
	node: TreeNode;
	source: PendingNode;
}

export interface TreeSerializerOptions {
	/** Ids for deserialized nodes; defaults to UUID v4 */
	generateId?: IdGenerator;
}

/**
 * Converts a Forest to and from the persisted JSON document.
 *
 * Nesting carries parenthood and array order carries sibling order.
 * Ids are session-local: they are not written, and every load assigns
 * fresh ones. Both directions walk the tree with an explicit stack, so
 * any depth the Tree Store can build round-trips.
 */
export class TreeSerializer {
	private readonly generateId: IdGenerator;

	constructor(options: TreeSerializerOptions = {}) {
		this.generateId = options.generateId ?? randomUUID;
	}

	/** Same text as `JSON.stringify(document, null, 2)` plus a newline. */
	serialize(forest: ReadonlyForest): string {
		const chunks: string[] = [
			`{\n${indent(1)}"version": ${TREE_DOCUMENT_VERSION},\n${indent(1)}"data": `,
		];
		const tasks: WriteTask[] = ["\n}\n"];
		pushList(tasks, forest.roots, 1);

		while (tasks.length > 0) {
			const task = tasks.pop();
			if (task === undefined) break;
			if (typeof task === "string") {
				chunks.push(task);
				continue;
			}

			const node = forest.nodes.get(task.id);
			if (!node) {
				throw new NotFoundError(task.id);
			}
			const inner = indent(task.level + 1);
			chunks.push(`${indent(task.level)}{\n`);
			for (const name of NODE_FIELD_NAMES) {
				chunks.push(`${inner}"${name}": ${JSON.stringify(node[name])},\n`);
			}
			chunks.push(`${inner}"children": `);
			tasks.push(`\n${indent(task.level)}}`);
			pushList(tasks, node.children, task.level + 1);
		}
		return chunks.join("");
	}

	/**
	 * Parses a whole document. Nothing is returned unless all of it is valid.
	 * Empty or whitespace-only text is an empty Forest.
	 */
	deserialize(text: string): Forest {
		const forest = createEmptyForest();
		if (text.trim() === "") {
			return forest;
		}

		let raw: unknown;
		try {
			raw = JSON.parse(text);
		} catch (err: unknown) {
			throw new FormatError("$", `Invalid JSON (${errorMessage(err)})`, err);
		}

		const envelope = treeDocumentSchema.safeParse(raw);
		if (!envelope.success) {
			throw toFormatError(envelope.error, []);
		}

		const stack = pendingList(envelope.data.data, null);
		while (stack.length > 0) {
			const pending = stack.pop();
			if (pending === undefined) break;

			const parsed = nodeDocumentSchema.safeParse(pending.value);
			if (!parsed.success) {
				throw toFormatError(parsed.error, pathOf(pending));
			}
			const document = parsed.data;
			const parent = pending.parent?.node ?? null;
			const node = createTreeNode(this.generateId(), parent?.id ?? null, {
				title: document.title,
				status: document.status,
				description: document.description,
				notes: document.notes,
			});
			forest.nodes.set(node.id, node);
			(parent ? parent.children : forest.roots).push(node.id);

			for (const child of pendingList(document.children ?? [], {
				node,
				source: pending,
			})) {
				stack.push(child);
			}
		}
		return forest;
	}
}

function indent(level: number): string {
	return INDENT.repeat(Math.min(level, MAX_INDENT_LEVEL));
}

/** Schedules `[ ...ids ]` whose key sits at `level`. Tasks pop in reverse. */
function pushList(
	tasks: WriteTask[],
	ids: readonly NodeId[],
	level: number,
): void {
	if (ids.length === 0) {
		tasks.push("[]");
		return;
	}
	tasks.push(`\n${indent(level)}]`);
	for (let i = ids.length - 1; i >= 0; i--) {
		const id = ids[i];
		if (id === undefined) continue;
		tasks.push({ id, level: level + 1 }, i === 0 ? "[\n" : ",\n");
	}
}

/** Stack entries for `values`, reversed so the first one pops first. */
function pendingList(
	values: readonly unknown[],
	parent: BuiltParent | null,
): PendingNode[] {
	return values
		.map((value, index) => ({ value, index, parent }))
		.reverse();
}

/** ["data", 0, "children", 2] for the third child of the first root. */
function pathOf(pending: PendingNode): PathSegment[] {
	const reversed: PathSegment[] = [];
	let current: PendingNode | undefined = pending;
	while (current) {
		reversed.push(current.index, current.parent ? "children" : "data");
		current = current.parent?.source;
	}
	return reversed.reverse();
}

function toFormatError(error: ZodError, basePath: PathSegment[]): FormatError {
	const issue = error.issues[0];
	if (!issue) {
		return new FormatError(formatPath(basePath), "Invalid tree document", error);
	}
	return new FormatError(
		formatPath([...basePath, ...issue.path]),
		issue.message,
		error,
	);
}

/** ["data", 0, "title"] -> "$.data[0].title" */
export function formatPath(path: ReadonlyArray<PathSegment>): string {
	return path.reduce<string>(
		(location, segment) =>
			typeof segment === "number"
				? `${location}[${segment}]`
				: `${location}.${segment}`,
		"$",
	);
}
