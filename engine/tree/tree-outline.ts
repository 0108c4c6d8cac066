import type { TreeStore } from "./tree-store";
import type { NodeId } from "./tree-types";

export const STATUS_ICONS: ReadonlyMap<string, string> = new Map([
	["Completed", "✅"],
	["In-Progress", "⏳"],
	["Unlocked", "🔓"],
	["Locked", "🔒"],
	["Blocked", "❌"],
	["Planning", "🗓️"],
]);

export const DEFAULT_STATUS_ICON = "🔹";

export function statusIcon(status: string): string {
	return STATUS_ICONS.get(status) ?? DEFAULT_STATUS_ICON;
}

/** One line per node, two spaces of indent per level, in display order. */
export function renderOutline(tree: TreeStore): string {
	const lines: string[] = [];
	const stack: { id: NodeId; depth: number }[] = [];
	const pushChildren = (parentId: NodeId | null, depth: number): void => {
		const children = tree.getChildren(parentId);
		for (let i = children.length - 1; i >= 0; i--) {
			const child = children[i];
			if (child) stack.push({ id: child.id, depth });
		}
	};

	pushChildren(null, 0);
	while (stack.length > 0) {
		const entry = stack.pop();
		if (entry === undefined) break;
		const node = tree.get(entry.id);
		const title = node.title === "" ? "Unnamed" : node.title;
		lines.push(`${"  ".repeat(entry.depth)}${statusIcon(node.status)} ${title}`);
		pushChildren(node.id, entry.depth + 1);
	}
	return lines.join("\n");
}
