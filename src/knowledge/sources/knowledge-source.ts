import type { RawDocument } from "../../types";
import { logger } from "../../utils/logger";

/** Where a knowledge store's documents come from. Throws when unreachable. */
export interface KnowledgeSource {
	readonly name: string;
	load(): Promise<RawDocument[]>;
}

/** Uses the first source that yields documents, skipping ones that are not configured. */
export class FallbackKnowledgeSource implements KnowledgeSource {
	readonly name: string;

	constructor(private readonly sources: Array<KnowledgeSource | null>) {
		this.name = sources
			.filter((source): source is KnowledgeSource => source !== null)
			.map((source) => source.name)
			.join("|");
	}

	async load(): Promise<RawDocument[]> {
		for (const source of this.sources) {
			if (!source) {
				continue;
			}
			const documents = await source.load();
			if (documents.length > 0) {
				return documents;
			}
			logger.warn("Knowledge source returned no documents", { source: source.name });
		}
		return [];
	}
}
