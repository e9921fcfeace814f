import type { Incident, TimelineEntry } from "../types";
import { chunkArray } from "../utils/concurrency";
import { deepFreeze } from "../utils/freeze";
import { logger } from "../utils/logger";
import type { IncidentSource } from "./ports";
import type { SplunkRecord, SplunkSearchClient } from "./splunk-search-client";

const TECHNIQUE_ID = /T\d{4}(?:\.\d{3})?/g;
const AUDIT_BATCH_SIZE = 50;

// Closed notables, one row per event id, carrying the status-change time as closed_time.
// The time range applies to the notable's creation time, not its closure.
const NOTABLE_PIPELINE = [
	"`notable`",
	'| search status_label="Closed" OR status_end="true"',
	"| eval closed_time=coalesce(status_time, review_time, _time)",
	"| eval created_time=coalesce(orig_time, _time)",
	'| rename "annotations.*" as "annotations_*"',
	"| dedup event_id sortby -closed_time",
].join(" ");

export function buildNotableSearch(earliest: number, latest: number, maxOpenSeconds = 0): string {
	const from = Math.floor(earliest - Math.max(0, maxOpenSeconds));
	return `search earliest=${from} latest=${Math.floor(latest)} ${NOTABLE_PIPELINE}`;
}

function quoteSpl(value: string): string {
	return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function buildAuditSearch(ruleIds: string[]): string {
	return [
		"| `incident_review`",
		`| search rule_id IN (${ruleIds.map(quoteSpl).join(", ")})`,
		"| table rule_id, time, reviewer, owner, status_label, urgency, comment",
	].join(" ");
}

/** Accepts epoch seconds as number or numeric string, or an ISO timestamp. */
export function parseSplunkTime(value: unknown): number | null {
	if (typeof value === "number" && Number.isFinite(value)) {
		return Math.floor(value);
	}
	if (typeof value !== "string" || value.trim().length === 0) {
		return null;
	}
	const trimmed = value.trim();
	if (/^\d+(\.\d+)?$/.test(trimmed)) {
		return Math.floor(Number(trimmed));
	}
	const parsed = Date.parse(trimmed);
	return Number.isNaN(parsed) ? null : Math.floor(parsed / 1000);
}

function firstString(record: SplunkRecord, fields: string[]): string | undefined {
	for (const field of fields) {
		const value = record[field];
		const candidate = Array.isArray(value) ? value[0] : value;
		if (typeof candidate === "string" && candidate.trim().length > 0) {
			return candidate.trim();
		}
		if (typeof candidate === "number") {
			return String(candidate);
		}
	}
	return undefined;
}

function collectStrings(record: SplunkRecord, fields: string[]): string[] {
	const values = new Set<string>();
	for (const field of fields) {
		const raw = record[field];
		const items = Array.isArray(raw) ? raw : [raw];
		for (const item of items) {
			if (typeof item === "string" && item.trim().length > 0) {
				values.add(item.trim());
			}
		}
	}
	return [...values];
}

export function extractTechniqueIds(record: SplunkRecord): string[] {
	const ids = new Set<string>();
	for (const [key, value] of Object.entries(record)) {
		if (!key.startsWith("annotations_mitre_attack")) {
			continue;
		}
		const items = Array.isArray(value) ? value : [value];
		for (const item of items) {
			if (typeof item !== "string") {
				continue;
			}
			for (const match of item.matchAll(TECHNIQUE_ID)) {
				ids.add(match[0]);
			}
		}
	}
	return [...ids];
}

/** Maps one notable row to an incident, or null when it has no id or closure time. */
export function normalizeNotable(record: SplunkRecord): Incident | null {
	const id = firstString(record, ["event_id", "ticket_id", "rule_id"]);
	const closedAt = parseSplunkTime(record.closed_time);
	if (!id || closedAt === null) {
		return null;
	}

	return {
		id,
		title:
			firstString(record, ["rule_title", "rule_name", "search_name", "source"]) ??
			"Notable Event",
		analyst: firstString(record, ["owner", "reviewer", "analyst"]) ?? "unassigned",
		severity: firstString(record, ["urgency", "severity"]) ?? "unknown",
		category: firstString(record, ["security_domain"]),
		sourceIndicators: collectStrings(record, ["src", "src_ip", "src_user"]),
		destinationIndicators: collectStrings(record, ["dest", "dest_ip", "user"]),
		notable: { ...record },
		techniqueIds: extractTechniqueIds(record),
		timeline: [],
		createdAt: parseSplunkTime(record.created_time),
		closedAt,
	};
}

export function toTimelineEntry(record: SplunkRecord): TimelineEntry | null {
	const timestamp = parseSplunkTime(record.time);
	if (timestamp === null) {
		return null;
	}
	const status = firstString(record, ["status_label"]);
	const urgency = firstString(record, ["urgency"]);
	const action = [status ? `status=${status}` : "", urgency ? `urgency=${urgency}` : ""]
		.filter((part) => part.length > 0)
		.join(" ");
	return {
		actor: firstString(record, ["reviewer", "owner"]) ?? "unknown",
		action: action || "updated",
		timestamp,
		comment: firstString(record, ["comment"]) ?? "",
	};
}

export interface SplunkIncidentSourceOptions {
	/** Notables created this long before the window are still searched for closures inside it. */
	maxOpenSeconds: number;
}

/**
 * Reads closed notable events from Splunk ES and attaches each incident's
 * review history. A failed search aborts the whole fetch.
 */
export class SplunkIncidentSource implements IncidentSource {
	constructor(
		private readonly client: SplunkSearchClient,
		private readonly options: SplunkIncidentSourceOptions,
	) {}

	async fetchClosedIncidents(earliest: number, latest: number): Promise<Incident[]> {
		const rows = await this.client.exportSearch(
			buildNotableSearch(earliest, latest, this.options.maxOpenSeconds),
		);

		const byId = new Map<string, Incident>();
		let dropped = 0;
		for (const row of rows) {
			const incident = normalizeNotable(row);
			if (!incident || incident.closedAt < earliest || incident.closedAt >= latest) {
				dropped += 1;
				continue;
			}
			const existing = byId.get(incident.id);
			if (!existing || existing.closedAt < incident.closedAt) {
				byId.set(incident.id, incident);
			}
		}

		const incidents = [...byId.values()].sort(
			(a, b) => a.closedAt - b.closedAt || a.id.localeCompare(b.id),
		);
		await this.attachTimelines(incidents);

		logger.info("Fetched closed incidents", {
			earliest,
			latest,
			rows: rows.length,
			incidents: incidents.length,
			dropped,
		});
		return incidents.map((incident) => deepFreeze(incident));
	}

	private async attachTimelines(incidents: Incident[]): Promise<void> {
		if (incidents.length === 0) {
			return;
		}
		const byRuleId = new Map<string, Incident>();
		for (const incident of incidents) {
			const ruleId = firstString(incident.notable, ["rule_id"]) ?? incident.id;
			byRuleId.set(ruleId, incident);
		}

		for (const batch of chunkArray([...byRuleId.keys()], AUDIT_BATCH_SIZE)) {
			const rows = await this.client.exportSearch(buildAuditSearch(batch));
			for (const row of rows) {
				const ruleId = firstString(row, ["rule_id"]);
				const incident = ruleId ? byRuleId.get(ruleId) : undefined;
				const entry = toTimelineEntry(row);
				if (incident && entry) {
					incident.timeline.push(entry);
				}
			}
		}

		for (const incident of incidents) {
			incident.timeline.sort((a, b) => a.timestamp - b.timestamp);
		}
	}
}
