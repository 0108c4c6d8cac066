import { resolveConfig } from "./config";
import { TreeDocument } from "./document/tree-document";
import { createLogger, setLogLevel } from "./logger";
import { renderOutline } from "./tree/tree-outline";

async function main() {
	const config = resolveConfig(process.argv.slice(2), process.env);
	setLogLevel(config.logLevel);
	const log = createLogger("main");

	const document = await TreeDocument.open({ filePath: config.filePath });
	if (document.loadError) {
		log.error(
			{ filePath: config.filePath, location: document.loadError.location },
			document.loadError.message,
		);
		console.error(`Could not load ${config.filePath}: ${document.loadError.message}`);
	}

	const outline = renderOutline(document.tree);
	console.log(outline === "" ? "(empty tree)" : outline);
	await document.close();
}

main().catch((err) => {
	console.error("Failed to open tree:", err);
	process.exit(1);
});
