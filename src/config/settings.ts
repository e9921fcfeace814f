import { z } from "zod";

const EnvSchema = z.object({
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

	SERVER_HOST: z.string().default("0.0.0.0"),
	SERVER_PORT: z.coerce.number().int().positive().default(3000),

	QA_LOOKBACK_SECONDS: z.coerce.number().int().positive().default(3600),
	QA_RETRIEVAL_CONCURRENCY: z.coerce.number().int().positive().default(4),
	PROMPT_TEMPLATE_PATH: z.string().optional(),

	LLM_URL: z.string().url().default("http://localhost:11434"),
	LLM_MODEL: z.string().min(1).default("llama3:8b"),
	LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
	LLM_TIMEOUT: z.coerce.number().int().positive().default(120),

	EMBEDDING_URL: z.string().url().default("http://localhost:8080"),
	EMBEDDING_MODEL: z.string().min(1).default("all-MiniLM-L6-v2"),
	EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

	RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(4),
	RETRIEVAL_MIN_SCORE: z.coerce.number().min(-1).max(1).default(0.25),

	QDRANT_HOST: z.string().default("localhost"),
	QDRANT_PORT: z.coerce.number().int().positive().default(6333),
	QDRANT_API_KEY: z.string().optional(),

	POSTGRES_HOST: z.string().default("localhost"),
	POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
	POSTGRES_DB: z.string().default("soc_qa"),
	POSTGRES_USER: z.string().default("soc_qa"),
	POSTGRES_PASSWORD: z.string().default("soc_qa"),

	SPLUNK_API_URL: z.string().url().default("https://localhost:8089"),
	SPLUNK_API_NAMESPACE: z.string().default(""),
	SPLUNK_SEARCH_TOKEN: z.string().default(""),
	SPLUNK_HEC_URL: z.string().url().default("https://localhost:8088"),
	SPLUNK_HEC_TOKEN: z.string().default(""),
	SPLUNK_QA_INDEX: z.string().default("qa_bot"),
	SPLUNK_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
	// How long a notable may stay open and still be picked up when it closes.
	SPLUNK_NOTABLE_LOOKBACK_DAYS: z.coerce.number().min(0).default(30),

	CONFLUENCE_URL: z.string().url().optional(),
	CONFLUENCE_SPACE_KEY: z.string().default("SOC"),
	CONFLUENCE_USERNAME: z.string().optional(),
	CONFLUENCE_TOKEN: z.string().optional(),
	PLAYBOOK_DIR: z.string().default("data/playbooks"),
	PROCEDURES_UPDATE_INTERVAL_DAYS: z.coerce.number().min(0).default(1),

	MITRE_STIX_URL: z
		.string()
		.default(
			"https://raw.githubusercontent.com/mitre-attack/attack-stix-data/master/enterprise-attack/enterprise-attack.json",
		),
	MITRE_UPDATE_INTERVAL_DAYS: z.coerce.number().min(0).default(30),
});

export function loadSettings(env: NodeJS.ProcessEnv = process.env) {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new Error(`Invalid configuration: ${issues}`);
	}
	const e = parsed.data;

	return {
		logLevel: e.LOG_LEVEL,
		server: {
			port: e.SERVER_PORT,
			host: e.SERVER_HOST,
		},
		pipeline: {
			lookbackSeconds: e.QA_LOOKBACK_SECONDS,
			retrievalConcurrency: e.QA_RETRIEVAL_CONCURRENCY,
			promptTemplatePath: e.PROMPT_TEMPLATE_PATH,
		},
		llm: {
			url: e.LLM_URL,
			model: e.LLM_MODEL,
			temperature: e.LLM_TEMPERATURE,
			timeoutSeconds: e.LLM_TIMEOUT,
		},
		embedding: {
			url: e.EMBEDDING_URL,
			model: e.EMBEDDING_MODEL,
			timeoutMs: e.EMBEDDING_TIMEOUT_MS,
			batchSize: 64,
			maxConcurrency: 4,
			cacheTtlSec: 900,
			maxRetries: 2,
		},
		retrieval: {
			topK: e.RETRIEVAL_TOP_K,
			minScore: e.RETRIEVAL_MIN_SCORE,
		},
		chunking: {
			size: 1000,
			overlap: 200,
		},
		qdrant: {
			host: e.QDRANT_HOST,
			port: e.QDRANT_PORT,
			apiKey: e.QDRANT_API_KEY,
			collections: {
				procedures: "soc_qa_procedures",
				techniques: "soc_qa_techniques",
			},
		},
		postgres: {
			host: e.POSTGRES_HOST,
			port: e.POSTGRES_PORT,
			database: e.POSTGRES_DB,
			user: e.POSTGRES_USER,
			password: e.POSTGRES_PASSWORD,
		},
		splunk: {
			apiUrl: e.SPLUNK_API_URL,
			namespace: e.SPLUNK_API_NAMESPACE,
			searchToken: e.SPLUNK_SEARCH_TOKEN,
			hecUrl: e.SPLUNK_HEC_URL,
			hecToken: e.SPLUNK_HEC_TOKEN,
			index: e.SPLUNK_QA_INDEX,
			timeoutMs: e.SPLUNK_TIMEOUT_MS,
			maxOpenSeconds: Math.floor(e.SPLUNK_NOTABLE_LOOKBACK_DAYS * 86_400),
		},
		procedures: {
			confluenceUrl: e.CONFLUENCE_URL,
			spaceKey: e.CONFLUENCE_SPACE_KEY,
			username: e.CONFLUENCE_USERNAME,
			token: e.CONFLUENCE_TOKEN,
			playbookDir: e.PLAYBOOK_DIR,
			updateIntervalDays: e.PROCEDURES_UPDATE_INTERVAL_DAYS,
		},
		techniques: {
			stixUrl: e.MITRE_STIX_URL,
			updateIntervalDays: e.MITRE_UPDATE_INTERVAL_DAYS,
		},
	} as const;
}

export type Settings = ReturnType<typeof loadSettings>;

export const settings: Settings = loadSettings();
