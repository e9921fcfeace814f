import type { GenerationError } from "../errors";
import type { Incident, QaReport, Result, RetrievedContext } from "../types";
import { err, ok } from "../types";
import type { LlmClient } from "./llm-client";
import { buildQaPrompt } from "./prompt-builder";
import { decodeModelOutput } from "./report-schema";

export interface ReportGeneratorOptions {
	template: string;
	temperature: number;
	timeoutSeconds: number;
	clock?: () => Date;
}

/**
 * Scores one incident with the LLM. Makes no writes; the caller decides what
 * to do with the report or the error.
 */
export class ReportGenerator {
	private readonly clock: () => Date;

	constructor(
		private readonly llm: LlmClient,
		private readonly options: ReportGeneratorOptions,
	) {
		this.clock = options.clock ?? (() => new Date());
	}

	get model(): string {
		return this.llm.model;
	}

	async ping(): Promise<void> {
		await this.llm.ping();
	}

	buildPrompt(incident: Incident, context: RetrievedContext): string {
		return buildQaPrompt(this.options.template, incident, context, this.clock());
	}

	async generate(
		incident: Incident,
		context: RetrievedContext,
	): Promise<Result<QaReport, GenerationError>> {
		const prompt = this.buildPrompt(incident, context);

		let raw: string;
		try {
			raw = await this.llm.complete(
				prompt,
				this.options.temperature,
				this.options.timeoutSeconds,
			);
		} catch (error) {
			return err({
				kind: "ModelUnavailable",
				detail: error instanceof Error ? error.message : String(error),
			});
		}

		const decoded = decodeModelOutput(raw);
		if (!decoded.ok) {
			return err({ kind: "InvalidOutput", detail: decoded.error, rawOutput: raw });
		}

		const output = decoded.value;
		const report: QaReport = Object.freeze({
			incidentId: incident.id,
			scores: Object.freeze({ ...output.scores }),
			missedSteps: Object.freeze([...output.missed_steps]),
			escalationRequired: output.escalation_required,
			summary: output.summary,
			recommendations: output.recommendations,
			generatedAt: this.clock().toISOString(),
			model: this.llm.model,
		});
		return ok(report);
	}
}
