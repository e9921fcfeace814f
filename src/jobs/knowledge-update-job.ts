import { IngestionInProgressError, ResourceUnavailableError } from "../errors";
import type { IngestResult, KnowledgeIngestor } from "../knowledge/knowledge-ingestor";
import type { KnowledgeStore, KnowledgeStoreStatus } from "../knowledge/knowledge-store";
import type { KnowledgeSource } from "../knowledge/sources/knowledge-source";
import type { KnowledgeStoreName } from "../types";
import { logger } from "../utils/logger";

const DAY_SECONDS = 86_400;

export interface KnowledgeUpdateTarget {
	store: KnowledgeStore;
	source: KnowledgeSource;
	updateIntervalDays: number;
}

export interface KnowledgeUpdateOptions {
	/** Ignore the update interval. */
	force?: boolean;
	/** Drop the store and ingest everything again. */
	rebuild?: boolean;
}

export type KnowledgeUpdateOutcome =
	| { store: KnowledgeStoreName; skipped: true; reason: string; nextUpdateAt: number }
	| { store: KnowledgeStoreName; skipped: false; result: IngestResult };

export class KnowledgeUpdateJob {
	constructor(
		private readonly ingestor: KnowledgeIngestor,
		private readonly targets: Record<KnowledgeStoreName, KnowledgeUpdateTarget>,
		private readonly clock: () => number = () => Math.floor(Date.now() / 1000),
	) {}

	isRunning(name: KnowledgeStoreName): boolean {
		return this.ingestor.isRunning(name);
	}

	async status(name: KnowledgeStoreName): Promise<KnowledgeStoreStatus> {
		const { store } = this.targets[name];
		await store.open();
		return store.getStatus();
	}

	async run(
		name: KnowledgeStoreName,
		options: KnowledgeUpdateOptions = {},
	): Promise<KnowledgeUpdateOutcome> {
		const target = this.targets[name];
		if (this.ingestor.isRunning(name)) {
			throw new IngestionInProgressError(name);
		}

		if (!options.force && !options.rebuild) {
			const status = await this.status(name);
			const checkedAt = status.lastChecked ?? status.lastUpdated;
			if (checkedAt !== null) {
				const nextUpdateAt = checkedAt + target.updateIntervalDays * DAY_SECONDS;
				if (this.clock() < nextUpdateAt) {
					logger.info("Knowledge store is current; skipping update", {
						store: name,
						lastUpdated: status.lastUpdated,
						lastChecked: status.lastChecked,
						nextUpdateAt,
					});
					return { store: name, skipped: true, reason: "not due", nextUpdateAt };
				}
			}
		}

		// The source is read in full before the store is touched.
		const documents = await target.source.load();
		logger.info("Knowledge source loaded", {
			store: name,
			source: target.source.name,
			documents: documents.length,
		});

		const result = await this.ingestor.ingest(documents, target.store, {
			rebuild: options.rebuild,
		});
		// A clean pass counts as a check even when nothing changed.
		if (result.documents.failed === 0) {
			await target.store.markChecked(this.clock()).catch((error: unknown) => {
				throw new ResourceUnavailableError(`knowledge store ${name}`, String(error), {
					cause: error,
				});
			});
		}
		return { store: name, skipped: false, result };
	}
}
