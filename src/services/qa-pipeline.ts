import { randomUUID } from "node:crypto";
import { ResourceUnavailableError, RunInProgressError } from "../errors";
import type { IncidentSource, ReportSink } from "../integrations/ports";
import type { KnowledgeStore } from "../knowledge/knowledge-store";
import type {
	Incident,
	IncidentFailure,
	QaRunSummary,
	Result,
	RetrievedContext,
	RunWatermark,
} from "../types";
import { err, ok } from "../types";
import { mapWithConcurrency } from "../utils/concurrency";
import { describeError, logger } from "../utils/logger";
import type { ContextRetriever } from "./context-retriever";
import type { ReportGenerator } from "./report-generator";

export type PipelineState =
	| "Idle"
	| "LoadingResources"
	| "FetchingIncidents"
	| "ProcessingIncident"
	| "Finalizing";

export interface QaPipelineDependencies {
	source: IncidentSource;
	stores: KnowledgeStore[];
	retriever: Pick<ContextRetriever, "retrieve" | "ping">;
	generator: Pick<ReportGenerator, "generate" | "ping">;
	sink: ReportSink;
}

export interface QaPipelineOptions {
	pipeline: string;
	lookbackSeconds: number;
	retrievalConcurrency: number;
	clock?: () => number;
	newRunId?: () => string;
}

export interface QaRunOutcome {
	summary: QaRunSummary;
	watermark: RunWatermark;
	failures: IncidentFailure[];
}

type RetrievalResult = Result<RetrievedContext, string>;

function toResourceError(resource: string, error: unknown): ResourceUnavailableError {
	if (error instanceof ResourceUnavailableError) {
		return error;
	}
	return new ResourceUnavailableError(resource, String(describeError(error).error), {
		cause: error,
	});
}

/**
 * One QA pass over the incidents closed since the previous watermark.
 *
 * Run-level problems (a store, the LLM, the embedding provider or the
 * incident source unreachable) throw and leave the watermark where it was. Anything that goes wrong for a
 * single incident is recorded as a failure and the pass moves on; the
 * watermark then advances to the fetch boundary, so each incident is reviewed
 * at most once.
 */
export class QaPipeline {
	private current: PipelineState = "Idle";
	private readonly clock: () => number;
	private readonly newRunId: () => string;

	constructor(
		private readonly deps: QaPipelineDependencies,
		private readonly options: QaPipelineOptions,
	) {
		this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
		this.newRunId = options.newRunId ?? (() => randomUUID());
	}

	get state(): PipelineState {
		return this.current;
	}

	get pipeline(): string {
		return this.options.pipeline;
	}

	/** Start of the window for a run at `now` given the last stored watermark. */
	windowStart(previous: RunWatermark | null, now: number): number {
		return previous ? previous.watermark : now - this.options.lookbackSeconds;
	}

	private transition(runId: string, next: PipelineState): void {
		logger.info("QA pipeline state change", {
			runId,
			from: this.current,
			to: next,
		});
		this.current = next;
	}

	async run(previous: RunWatermark | null, now: number, runId = this.newRunId()): Promise<QaRunOutcome> {
		if (this.current !== "Idle") {
			throw new RunInProgressError(this.options.pipeline);
		}

		const windowStart = this.windowStart(previous, now);
		const windowEnd = Math.max(windowStart, now);

		try {
			this.transition(runId, "LoadingResources");
			await this.loadResources();

			this.transition(runId, "FetchingIncidents");
			const incidents = await this.deps.source
				.fetchClosedIncidents(windowStart, windowEnd)
				.catch((error: unknown) => {
					throw toResourceError("incident source", error);
				});
			logger.info("Incidents to review", {
				runId,
				windowStart,
				windowEnd,
				count: incidents.length,
			});

			const failures: IncidentFailure[] = [];
			let succeeded = 0;
			if (incidents.length > 0) {
				this.transition(runId, "ProcessingIncident");
				succeeded = await this.processIncidents(runId, incidents, failures);
			}

			this.transition(runId, "Finalizing");
			const summary: QaRunSummary = {
				runId,
				windowStart,
				windowEnd,
				startedAt: now,
				finishedAt: this.clock(),
				processed: incidents.length,
				succeeded,
				failed: failures.length,
			};
			logger.info("QA run finished", { ...summary });
			return {
				summary,
				watermark: { pipeline: this.options.pipeline, watermark: windowEnd },
				failures,
			};
		} catch (error) {
			logger.error("QA run aborted", error, { runId, state: this.current });
			throw error;
		} finally {
			this.transition(runId, "Idle");
		}
	}

	private async loadResources(): Promise<void> {
		for (const store of this.deps.stores) {
			await store.open().catch((error: unknown) => {
				throw toResourceError(`knowledge store ${store.name}`, error);
			});
		}
		await this.deps.retriever.ping().catch((error: unknown) => {
			throw toResourceError("embedding provider", error);
		});
		await this.deps.generator.ping().catch((error: unknown) => {
			throw toResourceError("llm", error);
		});
	}

	private async processIncidents(
		runId: string,
		incidents: Incident[],
		failures: IncidentFailure[],
	): Promise<number> {
		// Retrieval only reads the stores, so it may run ahead of generation.
		const contexts = await mapWithConcurrency(
			incidents,
			this.options.retrievalConcurrency,
			async (incident): Promise<RetrievalResult> => {
				try {
					return ok(await this.deps.retriever.retrieve(incident));
				} catch (error) {
					if (error instanceof ResourceUnavailableError) {
						throw error;
					}
					return err(String(describeError(error).error));
				}
			},
		);

		let succeeded = 0;
		for (const [idx, incident] of incidents.entries()) {
			const context = contexts[idx];
			if (!context || !context.ok) {
				this.recordFailure(failures, {
					runId,
					incidentId: incident.id,
					stage: "retrieval",
					kind: "RetrievalError",
					detail: context && !context.ok ? context.error : "no retrieval result",
				});
				continue;
			}

			const generated = await this.deps.generator.generate(incident, context.value);
			if (!generated.ok) {
				this.recordFailure(failures, {
					runId,
					incidentId: incident.id,
					stage: "generation",
					kind: generated.error.kind,
					detail: generated.error.detail,
					...(generated.error.rawOutput === undefined
						? {}
						: { rawOutput: generated.error.rawOutput }),
				});
				continue;
			}

			const delivered = await this.deps.sink.deliver(generated.value);
			if (!delivered.ok) {
				this.recordFailure(failures, {
					runId,
					incidentId: incident.id,
					stage: "delivery",
					kind: delivered.error.kind,
					detail: delivered.error.detail,
				});
				continue;
			}

			succeeded += 1;
			logger.info("QA report delivered", {
				runId,
				incidentId: incident.id,
				scores: generated.value.scores,
				escalationRequired: generated.value.escalationRequired,
			});
		}
		return succeeded;
	}

	private recordFailure(failures: IncidentFailure[], failure: IncidentFailure): void {
		failures.push(failure);
		logger.warn("Incident QA failed", { ...failure });
	}
}
