import { describe, expect, it } from "vitest";
import { CycleError, PositionRangeError } from "../../engine/errors";
import { TreeSerializer } from "../../engine/serializer/tree-serializer";
import { TreeStore } from "../../engine/tree/tree-store";
import type { NodeId } from "../../engine/tree/tree-types";
import { createSequentialIds } from "../fixtures/trees";
import {
	assertForestInvariants,
	forestShape,
} from "../helpers/forest-assertions";

/** mulberry32: small seeded PRNG so failures reproduce. */
function createRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

function pick<T>(random: () => number, items: readonly T[]): T | undefined {
	return items[Math.floor(random() * items.length)];
}

function runRandomOperations(seed: number, steps: number): TreeStore {
	const random = createRandom(seed);
	const tree = new TreeStore(undefined, {
		generateId: createSequentialIds(`s${seed}`),
	});

	for (let step = 0; step < steps; step++) {
		const ids: NodeId[] = [...tree.forest.nodes.keys()];
		const target = pick(random, ids);
		const roll = random();

		if (target === undefined || roll < 0.15) {
			tree.addRoot(random() < 0.5 ? undefined : pick(random, tree.forest.roots));
		} else if (roll < 0.35) {
			tree.addChild(target);
		} else if (roll < 0.5) {
			tree.addSibling(target);
		} else if (roll < 0.6) {
			tree.delete(target);
		} else if (roll < 0.85) {
			const parent = random() < 0.2 ? null : (pick(random, ids) ?? null);
			const length =
				parent === null
					? tree.forest.roots.length
					: (tree.forest.nodes.get(parent)?.children.length ?? 0);
			const position = Math.floor(random() * (length + 1));
			try {
				tree.move(target, parent, position);
			} catch (error) {
				// Random picks legitimately hit cycles and stale positions.
				if (!(error instanceof CycleError || error instanceof PositionRangeError)) {
					throw error;
				}
			}
		} else {
			tree.update(target, {
				title: `title ${step}`,
				status: random() < 0.5 ? "Planning" : "Completed",
				notes: random() < 0.3 ? `line one\nline "two" ${step}` : undefined,
			});
		}

		assertForestInvariants(tree.forest);
	}

	return tree;
}

describe("Tree invariants under random operation sequences", () => {
	it.each([1, 7, 42, 2024, 90210])(
		"seed %i keeps the forest a valid tree after every step",
		(seed) => {
			const tree = runRandomOperations(seed, 250);

			expect(tree.size).toBe(tree.forest.nodes.size);
		},
	);

	it.each([3, 11, 512])("seed %i round-trips through the serializer", (seed) => {
		const tree = runRandomOperations(seed, 150);
		const serializer = new TreeSerializer({
			generateId: createSequentialIds("loaded"),
		});

		const reloaded = new TreeStore(
			serializer.deserialize(serializer.serialize(tree.forest)),
		);

		assertForestInvariants(reloaded.forest);
		expect(reloaded.size).toBe(tree.size);
		expect(forestShape(reloaded)).toEqual(forestShape(tree));
	});
});
