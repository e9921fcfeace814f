import { z } from "zod";
import type { QaReport, Result } from "../types";
import { err, ok } from "../types";

const Score = z.number().int().min(1).max(5);

/** Shape the model must return. Unknown keys are dropped. */
export const ModelOutputSchema = z.object({
	scores: z.object({
		accuracy: Score,
		procedure: Score,
		documentation: Score,
	}),
	missed_steps: z.array(z.string().trim().min(1)),
	escalation_required: z.boolean(),
	summary: z.string().trim().min(1),
	recommendations: z.string(),
});

export type ModelOutput = z.infer<typeof ModelOutputSchema>;

/** Delivered form of a report; downstream dashboards key on exactly these fields. */
export const WireQaReportSchema = z
	.object({
		incident_id: z.string().min(1),
		scores: z
			.object({
				accuracy: Score,
				procedure: Score,
				documentation: Score,
			})
			.strict(),
		missed_steps: z.array(z.string().min(1)),
		escalation_required: z.boolean(),
		summary: z.string(),
		recommendations: z.string(),
		generated_at: z.string().datetime(),
		model: z.string().min(1),
	})
	.strict();

export type WireQaReport = z.infer<typeof WireQaReportSchema>;

export const OUTPUT_SCHEMA_INSTRUCTION = `Respond with a single JSON object and nothing else. It must have exactly these fields:
{
  "scores": {
    "accuracy": <integer 1-5, was the final classification correct>,
    "procedure": <integer 1-5, were all playbook steps followed>,
    "documentation": <integer 1-5, are the notes clear and complete>
  },
  "missed_steps": [<string, one per missed or incorrect step; empty list if none>],
  "escalation_required": <true or false, escalation was required but not performed>,
  "summary": "<non-empty string, overall assessment>",
  "recommendations": "<string, evidence-based playbook changes or analyst training; empty string if none>"
}
Scores must be whole numbers between 1 and 5. escalation_required must be a JSON boolean.`;

/** Strips markdown fences and prose around the outermost JSON object. */
export function extractJsonObject(text: string): string | null {
	const unfenced = text.replace(/```(?:json)?/gi, "");
	const start = unfenced.indexOf("{");
	const end = unfenced.lastIndexOf("}");
	if (start < 0 || end <= start) {
		return null;
	}
	return unfenced.slice(start, end + 1);
}

export function decodeModelOutput(raw: string): Result<ModelOutput, string> {
	const candidate = extractJsonObject(raw);
	if (candidate === null) {
		return err("no JSON object found in model output");
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(candidate);
	} catch (error) {
		return err(`model output is not valid JSON: ${String(error)}`);
	}

	const result = ModelOutputSchema.safeParse(parsed);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
			.join("; ");
		return err(`model output failed validation: ${issues}`);
	}
	return ok(result.data);
}

export function toWireReport(report: QaReport): WireQaReport {
	return {
		incident_id: report.incidentId,
		scores: {
			accuracy: report.scores.accuracy,
			procedure: report.scores.procedure,
			documentation: report.scores.documentation,
		},
		missed_steps: [...report.missedSteps],
		escalation_required: report.escalationRequired,
		summary: report.summary,
		recommendations: report.recommendations,
		generated_at: report.generatedAt,
		model: report.model,
	};
}
