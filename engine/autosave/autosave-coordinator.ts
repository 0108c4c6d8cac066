import { EventEmitter } from "node:events";
import { PersistenceError, errorMessage } from "../errors";
import { type Logger, createLogger } from "../logger";
import type { TreeSerializer } from "../serializer/tree-serializer";
import type { FileStore } from "../store/file-store";
import type { TreeStore } from "../tree/tree-store";
import type { ReadonlyForest } from "../tree/tree-types";

const OUTCOME_EVENT = "autosave:outcome";

export type AutosaveOutcome =
	| { ok: true; sequence: number; filePath: string }
	| { ok: false; sequence: number; filePath: string; error: PersistenceError };

export type AutosaveOutcomeListener = (outcome: AutosaveOutcome) => void;

export interface AutosaveCoordinatorDeps {
	logger?: Logger;
}

/**
 * Writes the Forest to disk after every Tree Store mutation.
 *
 * The Forest is serialized synchronously when the change is reported, so
 * each write carries the exact post-mutation state. Writes run one at a
 * time in issuance order. A failed write is reported, never rolled back;
 * the next mutation writes the then-current state again.
 */
export class AutosaveCoordinator {
	private queue: Promise<void> = Promise.resolve();
	private issued = 0;
	private inFlight = 0;
	private readonly emitter = new EventEmitter();
	private readonly log: Logger;

	constructor(
		private readonly store: FileStore,
		private readonly serializer: TreeSerializer,
		deps: AutosaveCoordinatorDeps = {},
	) {
		this.log = deps.logger ?? createLogger("autosave");
	}

	/** Number of writes issued but not yet settled. */
	get pending(): number {
		return this.inFlight;
	}

	/** Subscribe to `tree` mutations. Returns the unsubscribe function. */
	attach(tree: TreeStore): () => void {
		return tree.onChange((change) => {
			this.save(change.forest);
		});
	}

	/** Serialize now; write once every earlier write has settled. */
	save(forest: ReadonlyForest): void {
		const text = this.serializer.serialize(forest);
		const sequence = ++this.issued;
		this.inFlight++;
		this.queue = this.queue.then(() => this.write(sequence, text));
	}

	/** Resolves when every write issued so far has settled. */
	flush(): Promise<void> {
		return this.queue;
	}

	onOutcome(listener: AutosaveOutcomeListener): () => void {
		this.emitter.on(OUTCOME_EVENT, listener);
		return () => {
			this.emitter.off(OUTCOME_EVENT, listener);
		};
	}

	private async write(sequence: number, text: string): Promise<void> {
		const filePath = this.store.filePath;
		let outcome: AutosaveOutcome;
		try {
			await this.store.write(text);
			outcome = { ok: true, sequence, filePath };
			this.log.debug({ sequence, filePath }, "tree saved");
		} catch (err: unknown) {
			const error = new PersistenceError(filePath, err);
			outcome = { ok: false, sequence, filePath, error };
			this.log.warn({ sequence, filePath, err: error.message }, "tree save failed");
		} finally {
			this.inFlight--;
		}
		this.report(outcome);
	}

	private report(outcome: AutosaveOutcome): void {
		try {
			this.emitter.emit(OUTCOME_EVENT, outcome);
		} catch (err: unknown) {
			// A throwing listener must not break the write chain.
			this.log.error(
				{ sequence: outcome.sequence, err: errorMessage(err) },
				"autosave outcome listener threw",
			);
		}
	}
}
