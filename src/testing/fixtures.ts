import type { DeliveryError } from "../errors";
import type { IncidentSource, ReportSink } from "../integrations/ports";
import type { LlmClient } from "../services/llm-client";
import type { Incident, QaReport, Result } from "../types";
import { err, ok } from "../types";

export function makeIncident(overrides: Partial<Incident> = {}): Incident {
	return {
		id: "INC-1",
		title: "Suspicious login",
		analyst: "analyst.one",
		severity: "medium",
		sourceIndicators: [],
		destinationIndicators: [],
		notable: {},
		techniqueIds: [],
		timeline: [],
		createdAt: 1_700_000_000,
		closedAt: 1_700_003_600,
		...overrides,
	};
}

export function modelOutput(overrides: Record<string, unknown> = {}): string {
	return JSON.stringify({
		scores: { accuracy: 4, procedure: 3, documentation: 5 },
		missed_steps: [],
		escalation_required: false,
		summary: "Handled according to the playbook.",
		recommendations: "",
		...overrides,
	});
}

type Reply = string | Error | ((prompt: string) => string);

/** LLM stand-in answering from a queue; the last reply repeats. */
export class ScriptedLlm implements LlmClient {
	readonly model: string;
	readonly prompts: string[] = [];
	pingError: Error | null = null;
	private readonly replies: Reply[];

	constructor(replies: Reply[], model = "test-model") {
		this.replies = replies;
		this.model = model;
	}

	async ping(): Promise<void> {
		if (this.pingError) {
			throw this.pingError;
		}
	}

	async complete(prompt: string): Promise<string> {
		this.prompts.push(prompt);
		const index = Math.min(this.prompts.length - 1, this.replies.length - 1);
		const reply = this.replies[index];
		if (reply === undefined) {
			throw new Error("no scripted reply");
		}
		if (reply instanceof Error) {
			throw reply;
		}
		return typeof reply === "function" ? reply(prompt) : reply;
	}
}

export class RecordingSink implements ReportSink {
	readonly delivered: QaReport[] = [];
	readonly rejectIds = new Set<string>();

	async deliver(report: QaReport): Promise<Result<void, DeliveryError>> {
		if (this.rejectIds.has(report.incidentId)) {
			return err({ kind: "DeliveryError", detail: "rejected by test sink", status: 503 });
		}
		this.delivered.push(report);
		return ok(undefined);
	}
}

export class StaticIncidentSource implements IncidentSource {
	readonly calls: Array<{ earliest: number; latest: number }> = [];
	failWith: Error | null = null;

	constructor(private readonly incidents: Incident[]) {}

	async fetchClosedIncidents(earliest: number, latest: number): Promise<Incident[]> {
		this.calls.push({ earliest, latest });
		if (this.failWith) {
			throw this.failWith;
		}
		return this.incidents.filter(
			(incident) => incident.closedAt >= earliest && incident.closedAt < latest,
		);
	}
}
