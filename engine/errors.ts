export type TreeErrorCode =
	| "NOT_FOUND"
	| "CYCLE"
	| "OUT_OF_RANGE"
	| "FORMAT"
	| "PERSISTENCE";

/**
 * Engine error with a machine-readable code.
 * Thrown synchronously by tree operations; the UI layer decides how to present it.
 */
export class TreeError extends Error {
	readonly code: TreeErrorCode;
	readonly cause?: unknown;

	constructor(code: TreeErrorCode, message: string, cause?: unknown) {
		super(message);
		this.name = "TreeError";
		this.code = code;
		this.cause = cause;
	}
}

export class NotFoundError extends TreeError {
	readonly nodeId: string;

	constructor(nodeId: string, message = `Node not found: ${nodeId}`) {
		super("NOT_FOUND", message);
		this.name = "NotFoundError";
		this.nodeId = nodeId;
	}
}

export class CycleError extends TreeError {
	readonly nodeId: string;
	readonly targetParentId: string;

	constructor(nodeId: string, targetParentId: string) {
		super(
			"CYCLE",
			nodeId === targetParentId
				? `Cannot move ${nodeId} under itself`
				: `Cannot move ${nodeId} under its descendant ${targetParentId}`,
		);
		this.name = "CycleError";
		this.nodeId = nodeId;
		this.targetParentId = targetParentId;
	}
}

/** Out-of-bounds insertion position. Extends the built-in RangeError. */
export class PositionRangeError extends RangeError {
	readonly code = "OUT_OF_RANGE" as const;
	readonly position: number;
	readonly length: number;

	constructor(position: number, length: number) {
		super(`Position ${position} is outside 0..${length}`);
		this.name = "PositionRangeError";
		this.position = position;
		this.length = length;
	}
}

export class FormatError extends TreeError {
	/** JSON path of the offending value, `$` for the whole document */
	readonly location: string;

	constructor(location: string, message: string, cause?: unknown) {
		super("FORMAT", `${message} at ${location}`, cause);
		this.name = "FormatError";
		this.location = location;
	}
}

export class PersistenceError extends TreeError {
	readonly filePath: string;

	constructor(filePath: string, cause: unknown) {
		super(
			"PERSISTENCE",
			`Failed to write ${filePath}: ${errorMessage(cause)}`,
			cause,
		);
		this.name = "PersistenceError";
		this.filePath = filePath;
	}
}

export function isTreeError(value: unknown): value is TreeError {
	return value instanceof TreeError;
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
