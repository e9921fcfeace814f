import { describe, expect, it } from "vitest";
import { makeIncident } from "../testing/fixtures";
import type { KnowledgeChunk } from "../types";
import {
	NO_PROCEDURE_CONTEXT,
	NO_TECHNIQUE_CONTEXT,
	NO_TIMELINE,
	buildQaPrompt,
	fillTemplate,
	loadPromptTemplate,
	renderChunks,
	renderTimeline,
} from "./prompt-builder";
import { OUTPUT_SCHEMA_INSTRUCTION } from "./report-schema";

function chunk(overrides: Partial<KnowledgeChunk> = {}): KnowledgeChunk {
	return {
		documentId: "playbook:brute-force.md",
		sequence: 0,
		text: "Step 1: lock the account.",
		contentHash: "h",
		vector: [],
		title: "Brute Force Playbook",
		metadata: {},
		ingestedAt: 0,
		...overrides,
	};
}

describe("renderTimeline", () => {
	it("lists entries in chronological order", () => {
		const text = renderTimeline([
			{ actor: "bob", action: "status=Closed", timestamp: 1_700_000_120, comment: "" },
			{ actor: "alice", action: "status=In Progress", timestamp: 1_700_000_000, comment: "Looking" },
		]);
		expect(text).toBe(
			[
				"- alice | status=In Progress | 2023-11-14T22:13:20.000Z | Looking",
				"- bob | status=Closed | 2023-11-14T22:15:20.000Z | (no comment)",
			].join("\n"),
		);
	});

	it("marks an empty timeline", () => {
		expect(renderTimeline([])).toBe(NO_TIMELINE);
	});
});

describe("renderChunks", () => {
	it("renders chunk text verbatim with a heading", () => {
		expect(renderChunks([{ chunk: chunk({ sequence: 1 }), score: 0.8123 }], NO_PROCEDURE_CONTEXT)).toBe(
			"[Brute Force Playbook #2] (relevance 0.81)\nStep 1: lock the account.",
		);
	});

	it("uses the marker when nothing was retrieved", () => {
		expect(renderChunks([], NO_TECHNIQUE_CONTEXT)).toBe(NO_TECHNIQUE_CONTEXT);
	});
});

describe("fillTemplate", () => {
	it("substitutes in a single pass and leaves unknown placeholders", () => {
		expect(fillTemplate("{{a}} and {{b}} and {{c}}", { a: "{{b}}", b: "two" })).toBe(
			"{{b}} and two and {{c}}",
		);
	});
});

describe("buildQaPrompt", () => {
	it("fills every placeholder of the bundled template", () => {
		const prompt = buildQaPrompt(
			loadPromptTemplate(),
			makeIncident({
				id: "INC-42",
				title: "Password spraying",
				techniqueIds: ["T1110.003"],
				notable: { src: "10.0.0.5" },
			}),
			{ procedures: [{ chunk: chunk(), score: 0.9 }], techniques: [] },
			new Date("2026-01-02T03:04:05.000Z"),
		);

		expect(prompt).not.toMatch(/\{\{\w+\}\}/);
		expect(prompt).toContain("INCIDENT_ID: INC-42\n");
		expect(prompt).toContain("CATEGORY: Unknown\n");
		expect(prompt).toContain("SOURCE INDICATORS: None\n");
		expect(prompt).toContain("MITRE ATT&CK TECHNIQUES: T1110.003\n");
		expect(prompt).toContain("QA RUN TIME (UTC): 2026-01-02T03:04:05.000Z\n");
		expect(prompt).toContain('RAW NOTABLE DATA:\n{\n  "src": "10.0.0.5"\n}\n');
		expect(prompt).toContain("Step 1: lock the account.");
		expect(prompt).toContain(`MITRE ATT&CK CONTEXT:\n${NO_TECHNIQUE_CONTEXT}\n`);
		expect(prompt).toContain(OUTPUT_SCHEMA_INSTRUCTION);
	});

	it("falls back to the bundled template when the configured path is missing", () => {
		expect(loadPromptTemplate("/nonexistent/qa-review.txt")).toBe(loadPromptTemplate());
	});
});
