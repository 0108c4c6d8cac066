import type { EngineEvent } from "../../shared/types";
import type { TreeDocument } from "./tree-document";

/**
 * Forwards tree changes, reloads and autosave outcomes of `document` as
 * EngineEvents. Returns a function that removes every subscription.
 */
export function subscribeEngineEvents(
	document: TreeDocument,
	listener: (event: EngineEvent) => void,
): () => void {
	const unsubscribers = [
		document.tree.onChange((change) => {
			listener({ type: change.type, nodeIds: [...change.nodeIds] });
		}),
		document.tree.onReplace(() => {
			listener({ type: "forest:replaced" });
		}),
		document.autosave.onOutcome((outcome) => {
			if (outcome.ok) {
				listener({
					type: "autosave:saved",
					sequence: outcome.sequence,
					filePath: outcome.filePath,
				});
			} else {
				listener({
					type: "autosave:failed",
					sequence: outcome.sequence,
					filePath: outcome.filePath,
					message: outcome.error.message,
				});
			}
		}),
	];
	return () => {
		for (const unsubscribe of unsubscribers) {
			unsubscribe();
		}
	};
}
