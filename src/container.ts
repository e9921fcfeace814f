import type { AppServices } from "./app";
import { settings } from "./config/settings";
import { SplunkHecSink } from "./integrations/splunk-hec-sink";
import { SplunkIncidentSource } from "./integrations/splunk-incident-source";
import { SplunkSearchClient } from "./integrations/splunk-search-client";
import { KnowledgeUpdateJob } from "./jobs/knowledge-update-job";
import { QaRunJob } from "./jobs/qa-run-job";
import { KnowledgeIngestor } from "./knowledge/knowledge-ingestor";
import { QdrantKnowledgeStore, createQdrantClient } from "./knowledge/qdrant-knowledge-store";
import { AttackStixSource } from "./knowledge/sources/attack-stix-source";
import { ConfluenceSource } from "./knowledge/sources/confluence-source";
import { FallbackKnowledgeSource } from "./knowledge/sources/knowledge-source";
import { PlaybookDirectorySource } from "./knowledge/sources/playbook-directory-source";
import { ContextRetriever } from "./services/context-retriever";
import { EmbeddingService } from "./services/embedding-service";
import { OllamaClient } from "./services/llm-client";
import { loadPromptTemplate } from "./services/prompt-builder";
import { QaPipeline } from "./services/qa-pipeline";
import { ReportGenerator } from "./services/report-generator";
import { PostgresKnowledgeStoreMetadata, PostgresRunLedger } from "./services/run-ledger";

export const QA_PIPELINE_NAME = "soc_qa_report";

function createConfluenceSource(): ConfluenceSource | null {
	const { confluenceUrl, spaceKey, username, token } = settings.procedures;
	if (!confluenceUrl || !username || !token) {
		return null;
	}
	return new ConfluenceSource({ url: confluenceUrl, spaceKey, username, token });
}

/** Wires the production collaborators from `settings`. */
export function createServices(): AppServices {
	const qdrant = createQdrantClient(settings.qdrant);
	const metadata = new PostgresKnowledgeStoreMetadata();
	const stores = {
		procedures: new QdrantKnowledgeStore({
			name: "procedures",
			collection: settings.qdrant.collections.procedures,
			client: qdrant,
			metadata,
		}),
		techniques: new QdrantKnowledgeStore({
			name: "techniques",
			collection: settings.qdrant.collections.techniques,
			client: qdrant,
			metadata,
		}),
	};

	const embedder = new EmbeddingService(settings.embedding);
	const retriever = new ContextRetriever(stores, embedder, settings.retrieval);
	const generator = new ReportGenerator(
		new OllamaClient(settings.llm.url, settings.llm.model),
		{
			template: loadPromptTemplate(settings.pipeline.promptTemplatePath),
			temperature: settings.llm.temperature,
			timeoutSeconds: settings.llm.timeoutSeconds,
		},
	);

	const splunkSearch = new SplunkSearchClient({
		apiUrl: settings.splunk.apiUrl,
		namespace: settings.splunk.namespace,
		token: settings.splunk.searchToken,
		timeoutMs: settings.splunk.timeoutMs,
	});
	const sink = new SplunkHecSink({
		hecUrl: settings.splunk.hecUrl,
		token: settings.splunk.hecToken,
		index: settings.splunk.index,
		timeoutMs: settings.splunk.timeoutMs,
	});

	const qaPipeline = new QaPipeline(
		{
			source: new SplunkIncidentSource(splunkSearch, {
				maxOpenSeconds: settings.splunk.maxOpenSeconds,
			}),
			stores: [stores.procedures, stores.techniques],
			retriever,
			generator,
			sink,
		},
		{
			pipeline: QA_PIPELINE_NAME,
			lookbackSeconds: settings.pipeline.lookbackSeconds,
			retrievalConcurrency: settings.pipeline.retrievalConcurrency,
		},
	);
	const runLedger = new PostgresRunLedger();

	const knowledgeUpdateJob = new KnowledgeUpdateJob(
		new KnowledgeIngestor(embedder, settings.chunking),
		{
			procedures: {
				store: stores.procedures,
				source: new FallbackKnowledgeSource([
					createConfluenceSource(),
					new PlaybookDirectorySource(settings.procedures.playbookDir),
				]),
				updateIntervalDays: settings.procedures.updateIntervalDays,
			},
			techniques: {
				store: stores.techniques,
				source: new AttackStixSource(settings.techniques.stixUrl),
				updateIntervalDays: settings.techniques.updateIntervalDays,
			},
		},
	);

	return {
		qaPipeline,
		qaRunJob: new QaRunJob(qaPipeline, runLedger),
		runLedger,
		knowledgeUpdateJob,
	};
}
