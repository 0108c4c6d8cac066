export { AutosaveCoordinator } from "./autosave/autosave-coordinator";
export type {
	AutosaveCoordinatorDeps,
	AutosaveOutcome,
	AutosaveOutcomeListener,
} from "./autosave/autosave-coordinator";
export { DEFAULT_TREE_FILE, resolveConfig } from "./config";
export type { AppConfig, Env } from "./config";
export { TreeDocument } from "./document/tree-document";
export type { TreeDocumentOptions } from "./document/tree-document";
export {
	CycleError,
	FormatError,
	NotFoundError,
	PersistenceError,
	PositionRangeError,
	TreeError,
	isTreeError,
} from "./errors";
export type { TreeErrorCode } from "./errors";
export { createLogger, setLogLevel } from "./logger";
export type { LogLevel } from "./logger";
export { TreeSerializer } from "./serializer/tree-serializer";
export type { TreeSerializerOptions } from "./serializer/tree-serializer";
export { FileStore } from "./store/file-store";
export { createEmptyForest, createTreeNode } from "./tree/tree-node";
export { renderOutline, statusIcon } from "./tree/tree-outline";
export { TreeStore } from "./tree/tree-store";
export type { TreeStoreOptions } from "./tree/tree-store";
export type * from "./tree/tree-types";
export { NODE_FIELD_NAMES } from "./tree/tree-types";
export { applyTreeCommand } from "./tree/tree-commands";
export { subscribeEngineEvents } from "./document/engine-events";
export type { EngineEvent, TreeCommand, TreeCommandResult } from "../shared/types";
