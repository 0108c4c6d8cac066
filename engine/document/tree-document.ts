import { AutosaveCoordinator } from "../autosave/autosave-coordinator";
import { FormatError } from "../errors";
import { type Logger, createLogger } from "../logger";
import { TreeSerializer } from "../serializer/tree-serializer";
import { FileStore } from "../store/file-store";
import { createEmptyForest } from "../tree/tree-node";
import { TreeStore } from "../tree/tree-store";
import type { Forest, IdGenerator, NodeFieldUpdate } from "../tree/tree-types";

export interface TreeDocumentOptions {
	filePath: string;
	generateId?: IdGenerator;
	newNodeDefaults?: NodeFieldUpdate;
	logger?: Logger;
}

/**
 * One open tree file: its Tree Store plus the autosave wiring.
 *
 * Owned explicitly by the caller, so several documents (or test fixtures)
 * can be open at once.
 */
export class TreeDocument {
	/** Set when the file existed but could not be parsed at open time */
	readonly loadError: FormatError | null;
	private readonly detachAutosave: () => void;

	private constructor(
		readonly tree: TreeStore,
		readonly autosave: AutosaveCoordinator,
		private readonly fileStore: FileStore,
		private readonly serializer: TreeSerializer,
		private readonly log: Logger,
		loadError: FormatError | null,
	) {
		this.loadError = loadError;
		this.detachAutosave = autosave.attach(tree);
	}

	/**
	 * Load the file, or start empty when it does not exist.
	 * A malformed file also starts empty; the error is kept in `loadError`
	 * so the UI can show it. Anything else propagates.
	 */
	static async open(options: TreeDocumentOptions): Promise<TreeDocument> {
		const log = options.logger ?? createLogger("document");
		const fileStore = new FileStore({ filePath: options.filePath });
		const serializer = new TreeSerializer({ generateId: options.generateId });

		let forest: Forest = createEmptyForest();
		let loadError: FormatError | null = null;
		try {
			forest = await TreeDocument.readForest(fileStore, serializer);
		} catch (err: unknown) {
			if (!(err instanceof FormatError)) {
				throw err;
			}
			loadError = err;
			log.warn(
				{ filePath: options.filePath, location: err.location },
				"tree file is malformed; starting with an empty tree",
			);
		}

		const tree = new TreeStore(forest, {
			generateId: options.generateId,
			newNodeDefaults: options.newNodeDefaults,
			logger: options.logger,
		});
		const autosave = new AutosaveCoordinator(fileStore, serializer, {
			logger: options.logger,
		});
		log.info(
			{ filePath: options.filePath, nodes: tree.size },
			"tree document opened",
		);
		return new TreeDocument(tree, autosave, fileStore, serializer, log, loadError);
	}

	get filePath(): string {
		return this.fileStore.filePath;
	}

	/**
	 * Replace the Forest with the file's current contents.
	 * All-or-nothing: on FormatError the current Forest stays as it is.
	 */
	async reload(): Promise<void> {
		await this.autosave.flush();
		const forest = await TreeDocument.readForest(this.fileStore, this.serializer);
		this.tree.replaceForest(forest);
		this.log.info(
			{ filePath: this.filePath, nodes: this.tree.size },
			"tree document reloaded",
		);
	}

	/** Stop autosaving and wait for queued writes to settle. */
	async close(): Promise<void> {
		this.detachAutosave();
		await this.autosave.flush();
	}

	private static async readForest(
		fileStore: FileStore,
		serializer: TreeSerializer,
	): Promise<Forest> {
		const text = await fileStore.read();
		return text === null ? createEmptyForest() : serializer.deserialize(text);
	}
}
