import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	existsSync,
	mkdtempSync,
	readFileSync,
	rmSync,
	writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TreeDocument } from "../../engine/document/tree-document";
import { FormatError } from "../../engine/errors";
import { TreeSerializer } from "../../engine/serializer/tree-serializer";
import { TreeStore } from "../../engine/tree/tree-store";
import { PORTFOLIO_DOCUMENT, createSequentialIds } from "../fixtures/trees";
import { titleOutline } from "../helpers/forest-assertions";

const DANGLING_DOCUMENT =
	'{"version":1,"data":[{"title":"A","children":["item_1a2b3c4d"]}]}';

describe("TreeDocument", () => {
	let tempDir: string;
	let filePath: string;

	beforeEach(() => {
		tempDir = mkdtempSync(join(tmpdir(), "research-tree-test-"));
		filePath = join(tempDir, "project-tree.json");
	});

	afterEach(() => {
		rmSync(tempDir, { recursive: true, force: true });
	});

	it("TC-5.1a: starts empty when the file does not exist and saves on first edit", async () => {
		const document = await TreeDocument.open({ filePath });

		expect(document.loadError).toBeNull();
		expect(document.tree.size).toBe(0);
		expect(existsSync(filePath)).toBe(false);

		const id = document.tree.addRoot();
		document.tree.update(id, { title: "First project" });
		await document.close();

		const saved = JSON.parse(readFileSync(filePath, "utf-8"));
		expect(saved.version).toBe(1);
		expect(saved.data[0].title).toBe("First project");
	});

	it("TC-5.1b: loads an existing file", async () => {
		writeFileSync(filePath, JSON.stringify(PORTFOLIO_DOCUMENT), "utf-8");

		const document = await TreeDocument.open({
			filePath,
			generateId: createSequentialIds("d"),
		});

		expect(document.loadError).toBeNull();
		expect(document.tree.size).toBe(5);
		expect(titleOutline(document.tree)).toBe(
			"Thesis(Literature review,Experiments(Pilot A)),Side project",
		);
		await document.close();
	});

	it("TC-5.1c: surfaces a malformed file and starts empty without overwriting it", async () => {
		writeFileSync(filePath, DANGLING_DOCUMENT, "utf-8");

		const document = await TreeDocument.open({ filePath });

		expect(document.loadError).toBeInstanceOf(FormatError);
		expect(document.loadError?.location).toBe("$.data[0].children[0]");
		expect(document.tree.size).toBe(0);
		await document.close();
		expect(readFileSync(filePath, "utf-8")).toBe(DANGLING_DOCUMENT);
	});

	it("TC-5.1d: opens an empty file as an empty tree", async () => {
		writeFileSync(filePath, "", "utf-8");

		const document = await TreeDocument.open({ filePath });

		expect(document.loadError).toBeNull();
		expect(document.tree.size).toBe(0);
		await document.close();
	});

	it("TC-5.1e: opens a file nested thousands of levels deep", async () => {
		const source = new TreeStore();
		let id = source.addRoot();
		for (let level = 1; level < 3000; level++) {
			id = source.addChild(id);
		}
		writeFileSync(filePath, new TreeSerializer().serialize(source.forest), "utf-8");

		const document = await TreeDocument.open({ filePath });

		expect(document.loadError).toBeNull();
		expect(document.tree.size).toBe(3000);
		await document.close();
	});

	it("TC-5.2a: reload replaces the forest with the file contents", async () => {
		const document = await TreeDocument.open({ filePath });
		document.tree.update(document.tree.addRoot(), { title: "Before" });
		await document.autosave.flush();
		let replaced = 0;
		document.tree.onReplace(() => {
			replaced += 1;
		});

		writeFileSync(filePath, JSON.stringify(PORTFOLIO_DOCUMENT), "utf-8");
		await document.reload();

		expect(replaced).toBe(1);
		expect(titleOutline(document.tree)).toBe(
			"Thesis(Literature review,Experiments(Pilot A)),Side project",
		);
		await document.close();
	});

	it("TC-5.2b: reload is all-or-nothing on a malformed file", async () => {
		const document = await TreeDocument.open({ filePath });
		const a = document.tree.addRoot();
		document.tree.update(a, { title: "Kept" });
		document.tree.update(document.tree.addChild(a), { title: "Child" });
		await document.autosave.flush();

		writeFileSync(filePath, DANGLING_DOCUMENT, "utf-8");

		await expect(document.reload()).rejects.toBeInstanceOf(FormatError);
		expect(titleOutline(document.tree)).toBe("Kept(Child)");
		expect(document.tree.has(a)).toBe(true);
		await document.close();
	});

	it("TC-5.2c: reloads a deleted file as an empty forest", async () => {
		const document = await TreeDocument.open({ filePath });
		document.tree.addRoot();
		await document.autosave.flush();

		rmSync(filePath);
		await document.reload();

		expect(document.tree.size).toBe(0);
		await document.close();
	});

	it("TC-5.2d: stops autosaving after close", async () => {
		const document = await TreeDocument.open({ filePath });
		document.tree.addRoot();
		await document.close();
		const afterClose = readFileSync(filePath, "utf-8");

		document.tree.addRoot();
		await document.autosave.flush();

		expect(readFileSync(filePath, "utf-8")).toBe(afterClose);
	});
});
