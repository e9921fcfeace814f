import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ResourceUnavailableError } from "../../errors";
import { AttackStixSource, bundleToDocuments, parseBundle } from "./attack-stix-source";

function ref(externalId: string, kind: string) {
	return {
		source_name: "mitre-attack",
		external_id: externalId,
		url: `https://attack.mitre.org/${kind}/${externalId.replace(".", "/")}`,
	};
}

const credentialAccess = [{ kill_chain_name: "mitre-attack", phase_name: "credential-access" }];

const bundle = {
	type: "bundle",
	id: "bundle--test",
	objects: [
		{ type: "identity", id: "identity--1", name: "Test Org" },
		{
			type: "x-mitre-tactic",
			id: "x-mitre-tactic--1",
			name: "Credential Access",
			description: "The adversary is trying to steal account names and passwords.",
			x_mitre_shortname: "credential-access",
			external_references: [ref("TA0006", "tactics")],
		},
		{
			type: "attack-pattern",
			id: "attack-pattern--brute",
			name: "Brute Force",
			description:
				"Adversaries may use brute force techniques to gain access to accounts.(Citation: Example Report)",
			kill_chain_phases: credentialAccess,
			x_mitre_platforms: ["Windows", "Linux"],
			x_mitre_detection: "Monitor authentication logs for repeated failures.",
			external_references: [ref("T1110", "techniques")],
		},
		{
			type: "attack-pattern",
			id: "attack-pattern--guess",
			name: "Password Guessing",
			description: "Adversaries may guess passwords.",
			kill_chain_phases: credentialAccess,
			x_mitre_platforms: ["Windows"],
			x_mitre_is_subtechnique: true,
			external_references: [ref("T1110.001", "techniques")],
		},
		{
			type: "attack-pattern",
			id: "attack-pattern--old",
			name: "Retired Technique",
			revoked: true,
			external_references: [ref("T1000", "techniques")],
		},
		{ type: "attack-pattern", id: "attack-pattern--broken" },
		{
			type: "course-of-action",
			id: "course-of-action--mfa",
			name: "Multi-factor Authentication",
			description: "Use two or more pieces of evidence to authenticate.",
			external_references: [ref("M1032", "mitigations")],
		},
		{
			type: "relationship",
			id: "relationship--1",
			relationship_type: "mitigates",
			source_ref: "course-of-action--mfa",
			target_ref: "attack-pattern--brute",
			description: "Require [MFA](https://example.test/mfa) for remote logins.",
		},
		{
			type: "relationship",
			id: "relationship--2",
			relationship_type: "subtechnique-of",
			source_ref: "attack-pattern--guess",
			target_ref: "attack-pattern--brute",
		},
		{
			type: "intrusion-set",
			id: "intrusion-set--sample",
			name: "Sample Group",
			aliases: ["Sample Group", "Sample Bear"],
			description: "A financially motivated test group.(Citation: Example Report)",
			external_references: [ref("G9001", "groups")],
		},
		{
			type: "malware",
			id: "malware--loader",
			name: "SampleLoader",
			x_mitre_platforms: ["Windows"],
			x_mitre_aliases: ["SampleLoader"],
			description: "A loader used in test intrusions.",
			external_references: [ref("S9001", "software")],
		},
		{
			type: "tool",
			id: "tool--spray",
			name: "SprayKit",
			x_mitre_aliases: ["SprayKit", "Sprayer"],
			external_references: [ref("S9002", "software")],
		},
		{
			type: "relationship",
			id: "relationship--3",
			relationship_type: "uses",
			source_ref: "intrusion-set--sample",
			target_ref: "attack-pattern--brute",
			description: "Sample Group has sprayed passwords.(Citation: Example Report)",
		},
		{
			type: "relationship",
			id: "relationship--4",
			relationship_type: "uses",
			source_ref: "intrusion-set--sample",
			target_ref: "malware--loader",
		},
		{
			type: "relationship",
			id: "relationship--5",
			relationship_type: "uses",
			source_ref: "malware--loader",
			target_ref: "attack-pattern--guess",
		},
		{
			type: "relationship",
			id: "relationship--6",
			relationship_type: "uses",
			source_ref: "tool--spray",
			target_ref: "attack-pattern--old",
		},
	],
};

describe("parseBundle", () => {
	it("keeps active objects of the handled types and counts invalid ones", () => {
		const parsed = parseBundle(bundle);

		expect(parsed.techniques.map((t) => t.name)).toEqual(["Brute Force", "Password Guessing"]);
		expect(parsed.mitigations).toHaveLength(1);
		expect(parsed.tactics).toHaveLength(1);
		expect(parsed.groups.map((g) => g.name)).toEqual(["Sample Group"]);
		expect(parsed.software.map((item) => [item.type, item.name])).toEqual([
			["malware", "SampleLoader"],
			["tool", "SprayKit"],
		]);
		expect(parsed.relationships).toHaveLength(6);
		expect(parsed.invalid).toBe(1);
	});

	it("rejects a payload that is not a bundle", () => {
		expect(() => parseBundle({ objects: [] })).toThrow(ResourceUnavailableError);
	});
});

describe("bundleToDocuments", () => {
	const documents = bundleToDocuments(parseBundle(bundle));

	it("emits techniques, then mitigations, tactics, groups and software", () => {
		expect(documents.map((doc) => doc.id)).toEqual([
			"T1110",
			"T1110.001",
			"M1032",
			"TA0006",
			"G9001",
			"S9001",
			"S9002",
		]);
		expect(documents.every((doc) => doc.source === "mitre-attack")).toBe(true);
	});

	it("renders a technique with its mitigations and without citations", () => {
		expect(documents[0]).toEqual({
			id: "T1110",
			title: "T1110 Brute Force",
			text: [
				"MITRE ATT&CK Technique: Brute Force",
				"Technique ID: T1110",
				"Tactics: credential-access",
				"Platforms: Windows, Linux",
				"",
				"Description:",
				"Adversaries may use brute force techniques to gain access to accounts.",
				"",
				"Detection:",
				"Monitor authentication logs for repeated failures.",
				"",
				"Mitigations:",
				"- M1032 Multi-factor Authentication: Require MFA for remote logins.",
			].join("\n"),
			source: "mitre-attack",
			metadata: {
				type: "technique",
				technique_id: "T1110",
				tactics: "credential-access",
				url: "https://attack.mitre.org/techniques/T1110",
			},
		});
	});

	it("names the parent of a sub-technique and omits empty sections", () => {
		expect(documents[1]?.text).toBe(
			[
				"MITRE ATT&CK Technique: Password Guessing",
				"Technique ID: T1110.001",
				"Tactics: credential-access",
				"Platforms: Windows",
				"Parent technique: T1110 Brute Force",
				"",
				"Description:",
				"Adversaries may guess passwords.",
			].join("\n"),
		);
	});

	it("lists what a mitigation covers", () => {
		expect(documents[2]?.text).toBe(
			[
				"MITRE ATT&CK Mitigation: Multi-factor Authentication",
				"Mitigation ID: M1032",
				"",
				"Description:",
				"Use two or more pieces of evidence to authenticate.",
				"",
				"Mitigates:",
				"- T1110 Brute Force",
			].join("\n"),
		);
	});

	it("renders a tactic with its short name", () => {
		expect(documents[3]).toMatchObject({
			title: "TA0006 Credential Access",
			text: [
				"MITRE ATT&CK Tactic: Credential Access",
				"Tactic ID: TA0006",
				"Short name: credential-access",
				"",
				"Description:",
				"The adversary is trying to steal account names and passwords.",
			].join("\n"),
			metadata: { type: "tactic", tactic_id: "TA0006" },
		});
	});

	it("lists the techniques and software a group uses", () => {
		expect(documents[4]).toEqual({
			id: "G9001",
			title: "G9001 Sample Group",
			text: [
				"MITRE ATT&CK Group: Sample Group",
				"Group ID: G9001",
				"Aliases: Sample Bear",
				"",
				"Description:",
				"A financially motivated test group.",
				"",
				"Techniques used:",
				"- T1110 Brute Force",
				"",
				"Software used:",
				"- S9001 SampleLoader",
			].join("\n"),
			source: "mitre-attack",
			metadata: {
				type: "group",
				group_id: "G9001",
				url: "https://attack.mitre.org/groups/G9001",
			},
		});
	});

	it("renders software with its type and the techniques it uses", () => {
		expect(documents[5]?.text).toBe(
			[
				"MITRE ATT&CK Software: SampleLoader",
				"Software ID: S9001",
				"Type: malware",
				"Platforms: Windows",
				"",
				"Description:",
				"A loader used in test intrusions.",
				"",
				"Techniques used:",
				"- T1110.001 Password Guessing",
			].join("\n"),
		);
		expect(documents[6]).toMatchObject({
			title: "S9002 SprayKit",
			text: [
				"MITRE ATT&CK Software: SprayKit",
				"Software ID: S9002",
				"Type: tool",
				"Platforms: None specified",
				"Aliases: Sprayer",
			].join("\n"),
			metadata: { type: "software", software_id: "S9002", software_type: "tool" },
		});
	});
});

describe("AttackStixSource", () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it("reads a bundle from a local file", async () => {
		const dir = await mkdtemp(join(tmpdir(), "stix-"));
		try {
			const path = join(dir, "enterprise-attack.json");
			await writeFile(path, JSON.stringify(bundle));
			const documents = await new AttackStixSource(path).load();
			expect(documents).toHaveLength(7);
		} finally {
			await rm(dir, { recursive: true, force: true });
		}
	});

	it("downloads a bundle over HTTP", async () => {
		const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(Response.json(bundle));
		vi.stubGlobal("fetch", fetchMock);

		const documents = await new AttackStixSource("https://stix.test/enterprise-attack.json").load();

		expect(documents).toHaveLength(7);
		expect(fetchMock.mock.calls[0]?.[0]).toBe("https://stix.test/enterprise-attack.json");
	});

	it("fails when the download fails", async () => {
		vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(new Response("", { status: 502 })));

		await expect(new AttackStixSource("https://stix.test/bundle.json").load()).rejects.toThrow(
			"attack stix bundle unavailable: Error: status 502",
		);
	});
});
