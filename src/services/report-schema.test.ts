import { describe, expect, it } from "vitest";
import { modelOutput } from "../testing/fixtures";
import { WireQaReportSchema, decodeModelOutput, extractJsonObject, toWireReport } from "./report-schema";

describe("extractJsonObject", () => {
	it("strips code fences and surrounding prose", () => {
		const raw = 'Here is the review:\n```json\n{"a": {"b": 1}}\n```\nThanks!';
		expect(extractJsonObject(raw)).toBe('{"a": {"b": 1}}');
	});

	it("returns null when there is no object", () => {
		expect(extractJsonObject("no json here")).toBeNull();
	});
});

describe("decodeModelOutput", () => {
	it("accepts a well-formed report", () => {
		const decoded = decodeModelOutput(modelOutput({ missed_steps: ["Reset credentials"] }));
		expect(decoded).toEqual({
			ok: true,
			value: {
				scores: { accuracy: 4, procedure: 3, documentation: 5 },
				missed_steps: ["Reset credentials"],
				escalation_required: false,
				summary: "Handled according to the playbook.",
				recommendations: "",
			},
		});
	});

	it("drops unknown keys", () => {
		const decoded = decodeModelOutput(modelOutput({ confidence: "high" }));
		expect(decoded.ok && Object.keys(decoded.value)).toEqual([
			"scores",
			"missed_steps",
			"escalation_required",
			"summary",
			"recommendations",
		]);
	});

	it.each([
		["a score above 5", { scores: { accuracy: 6, procedure: 3, documentation: 5 } }],
		["a fractional score", { scores: { accuracy: 4.5, procedure: 3, documentation: 5 } }],
		["a score of zero", { scores: { accuracy: 4, procedure: 0, documentation: 5 } }],
		["a blank missed step", { missed_steps: ["Reset credentials", "  "] }],
		["an empty missed step", { missed_steps: [""] }],
		["a string flag", { escalation_required: "false" }],
		["an empty summary", { summary: "  " }],
		["a missing field", { missed_steps: undefined }],
	])("rejects %s", (_, overrides) => {
		const decoded = decodeModelOutput(modelOutput(overrides));
		expect(decoded.ok).toBe(false);
	});

	it("names the offending field when a score is below range", () => {
		const decoded = decodeModelOutput(
			modelOutput({ scores: { accuracy: 4, procedure: 0, documentation: 5 } }),
		);
		expect(decoded).toEqual({
			ok: false,
			error: "model output failed validation: scores.procedure: Number must be greater than or equal to 1",
		});
	});

	it("names the offending entry when a missed step is blank", () => {
		const decoded = decodeModelOutput(modelOutput({ missed_steps: ["Reset credentials", "  "] }));
		expect(decoded).toEqual({
			ok: false,
			error: "model output failed validation: missed_steps.1: String must contain at least 1 character(s)",
		});
	});

	it("rejects invalid JSON", () => {
		const decoded = decodeModelOutput('{"scores": {');
		expect(decoded).toEqual({ ok: false, error: "no JSON object found in model output" });
	});

	it("reports malformed JSON inside braces", () => {
		const decoded = decodeModelOutput("{scores: 1}");
		expect(decoded.ok).toBe(false);
		expect(!decoded.ok && decoded.error).toMatch(/^model output is not valid JSON/);
	});
});

describe("toWireReport", () => {
	it("produces the snake_case wire form", () => {
		const wire = toWireReport({
			incidentId: "INC-7",
			scores: { accuracy: 5, procedure: 4, documentation: 3 },
			missedSteps: ["Notify the asset owner"],
			escalationRequired: true,
			summary: "Escalation was skipped.",
			recommendations: "Add an escalation checkpoint.",
			generatedAt: "2026-01-01T00:00:00.000Z",
			model: "llama3:8b",
		});
		expect(wire).toEqual({
			incident_id: "INC-7",
			scores: { accuracy: 5, procedure: 4, documentation: 3 },
			missed_steps: ["Notify the asset owner"],
			escalation_required: true,
			summary: "Escalation was skipped.",
			recommendations: "Add an escalation checkpoint.",
			generated_at: "2026-01-01T00:00:00.000Z",
			model: "llama3:8b",
		});
		expect(WireQaReportSchema.safeParse(wire).success).toBe(true);
	});
});
