import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { Incident, RetrievedContext, ScoredChunk, TimelineEntry } from "../types";
import { logger } from "../utils/logger";
import { OUTPUT_SCHEMA_INSTRUCTION } from "./report-schema";

const DEFAULT_TEMPLATE_URL = new URL("../prompts/qa-review.txt", import.meta.url);

export const NO_PROCEDURE_CONTEXT = "No procedure context was retrieved for this incident.";
export const NO_TECHNIQUE_CONTEXT = "No technique context was retrieved for this incident.";
export const NO_TIMELINE = "No analyst actions were logged.";

export const QA_DEFINITION =
	"Use strong evidence to justify any score deduction. If there is no solid evidence of failures, " +
	"scores should be high (ideally 5). Do not suggest generic improvements; only recommend playbook " +
	"changes or analyst training when clear, evidence-based improvements are required.";

export function loadPromptTemplate(path?: string): string {
	if (path) {
		try {
			return readFileSync(path, "utf8");
		} catch (error) {
			logger.warn("Prompt template not readable, using bundled template", {
				path,
				error: String(error),
			});
		}
	}
	return readFileSync(fileURLToPath(DEFAULT_TEMPLATE_URL), "utf8");
}

function formatTimestamp(unixSeconds: number | null): string {
	if (unixSeconds === null || !Number.isFinite(unixSeconds)) {
		return "Unknown";
	}
	return new Date(unixSeconds * 1000).toISOString();
}

function listOrNone(values: string[]): string {
	return values.length > 0 ? values.join(", ") : "None";
}

export function renderTimeline(timeline: TimelineEntry[]): string {
	if (timeline.length === 0) {
		return NO_TIMELINE;
	}
	return timeline
		.map((entry, index) => ({ entry, index }))
		.sort((a, b) => a.entry.timestamp - b.entry.timestamp || a.index - b.index)
		.map(
			({ entry }) =>
				`- ${entry.actor} | ${entry.action} | ${formatTimestamp(entry.timestamp)} | ${entry.comment || "(no comment)"}`,
		)
		.join("\n");
}

export function renderChunks(chunks: ScoredChunk[], emptyMarker: string): string {
	if (chunks.length === 0) {
		return emptyMarker;
	}
	return chunks
		.map(({ chunk, score }) => {
			const title = chunk.title || chunk.documentId;
			return `[${title} #${chunk.sequence + 1}] (relevance ${score.toFixed(2)})\n${chunk.text}`;
		})
		.join("\n\n");
}

export function fillTemplate(template: string, values: Record<string, string>): string {
	return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
		Object.hasOwn(values, key) ? (values[key] ?? "") : match,
	);
}

export function buildQaPrompt(
	template: string,
	incident: Incident,
	context: RetrievedContext,
	runTime: Date,
): string {
	return fillTemplate(template, {
		incident_id: incident.id,
		title: incident.title,
		analyst: incident.analyst,
		severity: incident.severity,
		category: incident.category ?? "Unknown",
		source_indicators: listOrNone(incident.sourceIndicators),
		destination_indicators: listOrNone(incident.destinationIndicators),
		technique_ids: listOrNone(incident.techniqueIds),
		notable_event_create_time: formatTimestamp(incident.createdAt),
		utc_qa_run_time: runTime.toISOString(),
		notable_data: JSON.stringify(incident.notable, null, 2),
		audit_timeline: renderTimeline(incident.timeline),
		playbook_text: renderChunks(context.procedures, NO_PROCEDURE_CONTEXT),
		mitre_context: renderChunks(context.techniques, NO_TECHNIQUE_CONTEXT),
		qa_definition: QA_DEFINITION,
		output_schema: OUTPUT_SCHEMA_INSTRUCTION,
	});
}
