import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ResourceUnavailableError } from "../../errors";
import type { RawDocument } from "../../types";
import { logger } from "../../utils/logger";
import type { KnowledgeSource } from "./knowledge-source";

const ExternalReferenceSchema = z.object({
	source_name: z.string(),
	external_id: z.string().optional(),
	url: z.string().optional(),
});

const CommonFields = {
	id: z.string(),
	name: z.string(),
	description: z.string().default(""),
	revoked: z.boolean().default(false),
	x_mitre_deprecated: z.boolean().default(false),
	external_references: z.array(ExternalReferenceSchema).default([]),
};

const AttackPatternSchema = z.object({
	type: z.literal("attack-pattern"),
	...CommonFields,
	kill_chain_phases: z
		.array(z.object({ kill_chain_name: z.string(), phase_name: z.string() }))
		.default([]),
	x_mitre_platforms: z.array(z.string()).default([]),
	x_mitre_detection: z.string().default(""),
	x_mitre_is_subtechnique: z.boolean().default(false),
});

const CourseOfActionSchema = z.object({
	type: z.literal("course-of-action"),
	...CommonFields,
});

const TacticSchema = z.object({
	type: z.literal("x-mitre-tactic"),
	...CommonFields,
	x_mitre_shortname: z.string().default(""),
});

const IntrusionSetSchema = z.object({
	type: z.literal("intrusion-set"),
	...CommonFields,
	aliases: z.array(z.string()).default([]),
});

const SoftwareFields = {
	...CommonFields,
	x_mitre_platforms: z.array(z.string()).default([]),
	x_mitre_aliases: z.array(z.string()).default([]),
};

const MalwareSchema = z.object({ type: z.literal("malware"), ...SoftwareFields });
const ToolSchema = z.object({ type: z.literal("tool"), ...SoftwareFields });

const RelationshipSchema = z.object({
	type: z.literal("relationship"),
	id: z.string(),
	relationship_type: z.string(),
	source_ref: z.string(),
	target_ref: z.string(),
	description: z.string().default(""),
	revoked: z.boolean().default(false),
	x_mitre_deprecated: z.boolean().default(false),
});

const StixObjectSchema = z.discriminatedUnion("type", [
	AttackPatternSchema,
	CourseOfActionSchema,
	TacticSchema,
	IntrusionSetSchema,
	MalwareSchema,
	ToolSchema,
	RelationshipSchema,
]);

const BundleSchema = z.object({
	type: z.literal("bundle"),
	objects: z.array(z.unknown()),
});

const HANDLED_TYPES = new Set([
	"attack-pattern",
	"course-of-action",
	"x-mitre-tactic",
	"intrusion-set",
	"malware",
	"tool",
	"relationship",
]);

type AttackPattern = z.infer<typeof AttackPatternSchema>;
type CourseOfAction = z.infer<typeof CourseOfActionSchema>;
type Tactic = z.infer<typeof TacticSchema>;
type IntrusionSet = z.infer<typeof IntrusionSetSchema>;
type Software = z.infer<typeof MalwareSchema> | z.infer<typeof ToolSchema>;
type Relationship = z.infer<typeof RelationshipSchema>;

interface ParsedBundle {
	techniques: AttackPattern[];
	mitigations: CourseOfAction[];
	tactics: Tactic[];
	groups: IntrusionSet[];
	software: Software[];
	relationships: Relationship[];
	invalid: number;
}

function attackId(object: { external_references: z.infer<typeof ExternalReferenceSchema>[] }) {
	return object.external_references.find(
		(ref) => ref.source_name === "mitre-attack" && ref.external_id,
	);
}

function stripCitations(text: string): string {
	return text
		.replace(/\s*\(Citation:[^)]*\)/g, "")
		.replace(/\[([^\]]+)\]\(https?:[^)]+\)/g, "$1")
		.trim();
}

function isActive(object: { revoked: boolean; x_mitre_deprecated: boolean }): boolean {
	return !object.revoked && !object.x_mitre_deprecated;
}

export function parseBundle(raw: unknown): ParsedBundle {
	const bundle = BundleSchema.safeParse(raw);
	if (!bundle.success) {
		throw new ResourceUnavailableError("attack stix bundle", "payload is not a STIX bundle");
	}

	const parsed: ParsedBundle = {
		techniques: [],
		mitigations: [],
		tactics: [],
		groups: [],
		software: [],
		relationships: [],
		invalid: 0,
	};
	for (const item of bundle.data.objects) {
		const type = z.object({ type: z.string() }).safeParse(item);
		if (!type.success || !HANDLED_TYPES.has(type.data.type)) {
			continue;
		}
		const object = StixObjectSchema.safeParse(item);
		if (!object.success) {
			parsed.invalid += 1;
			continue;
		}
		const value = object.data;
		if (!isActive(value)) {
			continue;
		}
		switch (value.type) {
			case "attack-pattern":
				parsed.techniques.push(value);
				break;
			case "course-of-action":
				parsed.mitigations.push(value);
				break;
			case "x-mitre-tactic":
				parsed.tactics.push(value);
				break;
			case "intrusion-set":
				parsed.groups.push(value);
				break;
			case "malware":
			case "tool":
				parsed.software.push(value);
				break;
			case "relationship":
				parsed.relationships.push(value);
				break;
		}
	}
	return parsed;
}

function section(title: string, body: string): string {
	return body.length > 0 ? `${title}:\n${body}` : "";
}

function joinBlocks(blocks: string[]): string {
	return blocks.filter((block) => block.length > 0).join("\n\n");
}

function addLine(lines: Map<string, string[]>, key: string, line: string): void {
	const existing = lines.get(key) ?? [];
	if (!existing.includes(line)) {
		lines.set(key, [...existing, line]);
	}
}

function otherAliases(name: string, aliases: string[]): string[] {
	return aliases.filter((alias) => alias !== name);
}

interface NamedObject {
	id: string;
	name: string;
	external_references: z.infer<typeof ExternalReferenceSchema>[];
}

function externalIds(objects: NamedObject[]): Map<string, { externalId: string; name: string }> {
	const byId = new Map<string, { externalId: string; name: string }>();
	for (const object of objects) {
		const ref = attackId(object);
		if (ref?.external_id) {
			byId.set(object.id, { externalId: ref.external_id, name: object.name });
		}
	}
	return byId;
}

/**
 * Turns a parsed bundle into one document per technique, mitigation, tactic,
 * group and piece of software. Groups and software list the techniques they
 * are known to use.
 */
export function bundleToDocuments(bundle: ParsedBundle): RawDocument[] {
	const techniqueById = externalIds(bundle.techniques);
	const mitigationById = externalIds(bundle.mitigations);
	const softwareById = externalIds(bundle.software);
	const nameByExternalId = new Map(
		[...techniqueById.values()].map((entry) => [entry.externalId, entry.name]),
	);

	const mitigationsFor = new Map<string, string[]>();
	const mitigatedBy = new Map<string, string[]>();
	const techniquesUsedBy = new Map<string, string[]>();
	const softwareUsedBy = new Map<string, string[]>();
	for (const relation of bundle.relationships) {
		const technique = techniqueById.get(relation.target_ref);
		if (relation.relationship_type === "mitigates") {
			const mitigation = mitigationById.get(relation.source_ref);
			if (!mitigation || !technique) {
				continue;
			}
			const detail = stripCitations(relation.description);
			addLine(
				mitigationsFor,
				relation.target_ref,
				`- ${mitigation.externalId} ${mitigation.name}${detail ? `: ${detail}` : ""}`,
			);
			addLine(mitigatedBy, relation.source_ref, `- ${technique.externalId} ${technique.name}`);
		} else if (relation.relationship_type === "uses") {
			const software = softwareById.get(relation.target_ref);
			if (technique) {
				addLine(techniquesUsedBy, relation.source_ref, `- ${technique.externalId} ${technique.name}`);
			} else if (software) {
				addLine(softwareUsedBy, relation.source_ref, `- ${software.externalId} ${software.name}`);
			}
		}
	}

	const documents: RawDocument[] = [];

	for (const technique of bundle.techniques) {
		const ref = attackId(technique);
		if (!ref?.external_id) {
			continue;
		}
		const id = ref.external_id;
		const tactics = technique.kill_chain_phases
			.filter((phase) => phase.kill_chain_name === "mitre-attack")
			.map((phase) => phase.phase_name);
		const parentId = technique.x_mitre_is_subtechnique ? id.split(".")[0] : undefined;
		const parentName = parentId ? nameByExternalId.get(parentId) : undefined;
		const header = [
			`MITRE ATT&CK Technique: ${technique.name}`,
			`Technique ID: ${id}`,
			`Tactics: ${tactics.length > 0 ? tactics.join(", ") : "None specified"}`,
			`Platforms: ${technique.x_mitre_platforms.length > 0 ? technique.x_mitre_platforms.join(", ") : "None specified"}`,
			...(parentId ? [`Parent technique: ${parentId}${parentName ? ` ${parentName}` : ""}`] : []),
		].join("\n");

		documents.push({
			id,
			title: `${id} ${technique.name}`,
			text: joinBlocks([
				header,
				section("Description", stripCitations(technique.description)),
				section("Detection", stripCitations(technique.x_mitre_detection)),
				section("Mitigations", (mitigationsFor.get(technique.id) ?? []).join("\n")),
			]),
			source: "mitre-attack",
			metadata: {
				type: "technique",
				technique_id: id,
				tactics: tactics.join(","),
				...(ref.url ? { url: ref.url } : {}),
			},
		});
	}

	for (const mitigation of bundle.mitigations) {
		const ref = attackId(mitigation);
		if (!ref?.external_id) {
			continue;
		}
		documents.push({
			id: ref.external_id,
			title: `${ref.external_id} ${mitigation.name}`,
			text: joinBlocks([
				`MITRE ATT&CK Mitigation: ${mitigation.name}\nMitigation ID: ${ref.external_id}`,
				section("Description", stripCitations(mitigation.description)),
				section("Mitigates", (mitigatedBy.get(mitigation.id) ?? []).join("\n")),
			]),
			source: "mitre-attack",
			metadata: {
				type: "mitigation",
				mitigation_id: ref.external_id,
				...(ref.url ? { url: ref.url } : {}),
			},
		});
	}

	for (const tactic of bundle.tactics) {
		const ref = attackId(tactic);
		if (!ref?.external_id) {
			continue;
		}
		documents.push({
			id: ref.external_id,
			title: `${ref.external_id} ${tactic.name}`,
			text: joinBlocks([
				`MITRE ATT&CK Tactic: ${tactic.name}\nTactic ID: ${ref.external_id}\nShort name: ${tactic.x_mitre_shortname}`,
				section("Description", stripCitations(tactic.description)),
			]),
			source: "mitre-attack",
			metadata: {
				type: "tactic",
				tactic_id: ref.external_id,
				...(ref.url ? { url: ref.url } : {}),
			},
		});
	}

	for (const group of bundle.groups) {
		const ref = attackId(group);
		if (!ref?.external_id) {
			continue;
		}
		const aliases = otherAliases(group.name, group.aliases);
		documents.push({
			id: ref.external_id,
			title: `${ref.external_id} ${group.name}`,
			text: joinBlocks([
				[
					`MITRE ATT&CK Group: ${group.name}`,
					`Group ID: ${ref.external_id}`,
					...(aliases.length > 0 ? [`Aliases: ${aliases.join(", ")}`] : []),
				].join("\n"),
				section("Description", stripCitations(group.description)),
				section("Techniques used", (techniquesUsedBy.get(group.id) ?? []).join("\n")),
				section("Software used", (softwareUsedBy.get(group.id) ?? []).join("\n")),
			]),
			source: "mitre-attack",
			metadata: {
				type: "group",
				group_id: ref.external_id,
				...(ref.url ? { url: ref.url } : {}),
			},
		});
	}

	for (const software of bundle.software) {
		const ref = attackId(software);
		if (!ref?.external_id) {
			continue;
		}
		const aliases = otherAliases(software.name, software.x_mitre_aliases);
		documents.push({
			id: ref.external_id,
			title: `${ref.external_id} ${software.name}`,
			text: joinBlocks([
				[
					`MITRE ATT&CK Software: ${software.name}`,
					`Software ID: ${ref.external_id}`,
					`Type: ${software.type}`,
					`Platforms: ${software.x_mitre_platforms.length > 0 ? software.x_mitre_platforms.join(", ") : "None specified"}`,
					...(aliases.length > 0 ? [`Aliases: ${aliases.join(", ")}`] : []),
				].join("\n"),
				section("Description", stripCitations(software.description)),
				section("Techniques used", (techniquesUsedBy.get(software.id) ?? []).join("\n")),
			]),
			source: "mitre-attack",
			metadata: {
				type: "software",
				software_id: ref.external_id,
				software_type: software.type,
				...(ref.url ? { url: ref.url } : {}),
			},
		});
	}

	return documents;
}

/** Enterprise ATT&CK as published in STIX 2.1, read from a URL or a local file. */
export class AttackStixSource implements KnowledgeSource {
	readonly name = "attack-stix";

	constructor(
		private readonly location: string,
		private readonly timeoutMs = 60_000,
	) {}

	private async fetchBundle(): Promise<unknown> {
		try {
			if (/^https?:\/\//.test(this.location)) {
				const response = await fetch(this.location, {
					signal: AbortSignal.timeout(this.timeoutMs),
				});
				if (!response.ok) {
					throw new Error(`status ${response.status}`);
				}
				return await response.json();
			}
			return JSON.parse(await readFile(this.location, "utf8"));
		} catch (error) {
			throw new ResourceUnavailableError("attack stix bundle", String(error), { cause: error });
		}
	}

	async load(): Promise<RawDocument[]> {
		const bundle = parseBundle(await this.fetchBundle());
		const documents = bundleToDocuments(bundle);
		logger.info("Loaded ATT&CK bundle", {
			techniques: bundle.techniques.length,
			mitigations: bundle.mitigations.length,
			tactics: bundle.tactics.length,
			groups: bundle.groups.length,
			software: bundle.software.length,
			invalidObjects: bundle.invalid,
			documents: documents.length,
		});
		return documents;
	}
}
