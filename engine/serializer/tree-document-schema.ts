import { z } from "zod";

export const TREE_DOCUMENT_VERSION = 1;

/**
 * One node as it appears in the persisted file.
 *
 * `children` is only checked to be a list here; each entry is parsed as a
 * node of its own, so nesting depth never reaches the call stack.
 * Unknown keys (a stored `id`, for example) are stripped.
 */
export const nodeDocumentSchema = z.object({
	title: z.string().optional(),
	status: z.string().optional(),
	description: z.string().optional(),
	notes: z.string().optional(),
	children: z.array(z.unknown()).optional(),
});

export const treeDocumentSchema = z.object({
	version: z.literal(TREE_DOCUMENT_VERSION),
	data: z.array(z.unknown()),
});
