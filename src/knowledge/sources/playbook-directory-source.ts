import { readFile, readdir } from "node:fs/promises";
import { basename, extname, join, relative, sep } from "node:path";
import { ResourceUnavailableError } from "../../errors";
import type { RawDocument } from "../../types";
import { logger } from "../../utils/logger";
import type { KnowledgeSource } from "./knowledge-source";

const PLAYBOOK_EXTENSIONS = new Set([".md", ".markdown", ".txt"]);

async function listFiles(root: string): Promise<string[]> {
	const files: string[] = [];
	const pending = [root];
	while (pending.length > 0) {
		const dir = pending.pop();
		if (dir === undefined) {
			break;
		}
		for (const entry of await readdir(dir, { withFileTypes: true })) {
			const path = join(dir, entry.name);
			if (entry.isDirectory()) {
				pending.push(path);
			} else if (entry.isFile() && PLAYBOOK_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
				files.push(path);
			}
		}
	}
	return files.sort();
}

export function playbookTitle(path: string, text: string): string {
	const heading = /^#\s+(.+)$/m.exec(text);
	if (heading?.[1]) {
		return heading[1].trim();
	}
	return basename(path, extname(path)).replace(/[-_]+/g, " ").trim();
}

/** Markdown or plain-text playbooks kept on disk, used when Confluence is not available. */
export class PlaybookDirectorySource implements KnowledgeSource {
	readonly name = "playbook-directory";

	constructor(private readonly directory: string) {}

	async load(): Promise<RawDocument[]> {
		let files: string[];
		try {
			files = await listFiles(this.directory);
		} catch (error) {
			throw new ResourceUnavailableError("playbook directory", String(error), { cause: error });
		}

		const documents: RawDocument[] = [];
		for (const file of files) {
			const text = await readFile(file, "utf8");
			if (text.trim().length === 0) {
				continue;
			}
			const relativePath = relative(this.directory, file).split(sep).join("/");
			documents.push({
				id: `playbook:${relativePath}`,
				title: playbookTitle(file, text),
				text,
				source: "playbook-directory",
				metadata: { path: relativePath },
			});
		}

		logger.info("Loaded playbooks from directory", {
			directory: this.directory,
			playbooks: documents.length,
		});
		return documents;
	}
}
