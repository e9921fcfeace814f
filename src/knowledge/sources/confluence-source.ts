import { z } from "zod";
import { ResourceUnavailableError } from "../../errors";
import type { RawDocument } from "../../types";
import { logger } from "../../utils/logger";
import type { KnowledgeSource } from "./knowledge-source";

export interface ConfluenceSourceOptions {
	url: string;
	spaceKey: string;
	username: string;
	token: string;
	pageSize?: number;
	timeoutMs?: number;
}

const ContentPageSchema = z.object({
	results: z.array(
		z.object({
			id: z.string(),
			title: z.string(),
			body: z
				.object({ storage: z.object({ value: z.string() }).optional() })
				.optional(),
			version: z.object({ number: z.number() }).optional(),
			_links: z.object({ webui: z.string().optional() }).optional(),
		}),
	),
	size: z.number().optional(),
	_links: z.object({ next: z.string().optional() }).optional(),
});

const NAMED_ENTITIES: Record<string, string> = {
	amp: "&",
	lt: "<",
	gt: ">",
	quot: '"',
	apos: "'",
	nbsp: " ",
};

/** Converts Confluence storage-format markup to plain text, keeping block breaks. */
export function storageToText(html: string): string {
	return html
		.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, "")
		.replace(/<br\s*\/?>/gi, "\n")
		.replace(/<li[^>]*>/gi, "\n- ")
		.replace(/<\/(p|div|h[1-6]|li|ul|ol|tr|table|pre|blockquote)>/gi, "\n\n")
		.replace(/<\/t[dh]>/gi, " | ")
		.replace(/<[^>]+>/g, "")
		.replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
		.replace(/&([a-z]+);/gi, (entity, name: string) => NAMED_ENTITIES[name.toLowerCase()] ?? entity)
		.replace(/[ \t]+\n/g, "\n")
		.replace(/[ \t]{2,}/g, " ")
		.replace(/\n{3,}/g, "\n\n")
		.trim();
}

/** SOC playbooks published as pages of one Confluence space. */
export class ConfluenceSource implements KnowledgeSource {
	readonly name = "confluence";
	private readonly pageSize: number;
	private readonly timeoutMs: number;

	constructor(private readonly options: ConfluenceSourceOptions) {
		this.pageSize = options.pageSize ?? 50;
		this.timeoutMs = options.timeoutMs ?? 30_000;
	}

	private pageUrl(start: number): string {
		const params = new URLSearchParams({
			spaceKey: this.options.spaceKey,
			type: "page",
			expand: "body.storage,version",
			limit: String(this.pageSize),
			start: String(start),
		});
		return `${this.options.url.replace(/\/+$/, "")}/rest/api/content?${params.toString()}`;
	}

	async load(): Promise<RawDocument[]> {
		const auth = Buffer.from(`${this.options.username}:${this.options.token}`).toString("base64");
		const documents: RawDocument[] = [];

		for (let start = 0; ; start += this.pageSize) {
			let body: unknown;
			try {
				const response = await fetch(this.pageUrl(start), {
					headers: { Authorization: `Basic ${auth}`, Accept: "application/json" },
					signal: AbortSignal.timeout(this.timeoutMs),
				});
				if (!response.ok) {
					throw new Error(`status ${response.status}`);
				}
				body = await response.json();
			} catch (error) {
				throw new ResourceUnavailableError("confluence", String(error), { cause: error });
			}

			const page = ContentPageSchema.safeParse(body);
			if (!page.success) {
				throw new ResourceUnavailableError("confluence", "unexpected content listing response");
			}

			for (const result of page.data.results) {
				const text = storageToText(result.body?.storage?.value ?? "");
				if (text.length === 0) {
					logger.debug("Skipping empty Confluence page", { pageId: result.id });
					continue;
				}
				documents.push({
					id: `confluence:${result.id}`,
					title: result.title,
					text,
					source: "confluence",
					metadata: {
						page_id: result.id,
						space_key: this.options.spaceKey,
						version: String(result.version?.number ?? 0),
						...(result._links?.webui ? { url: result._links.webui } : {}),
					},
				});
			}

			if (page.data.results.length < this.pageSize || !page.data._links?.next) {
				break;
			}
		}

		logger.info("Loaded Confluence pages", {
			spaceKey: this.options.spaceKey,
			pages: documents.length,
		});
		return documents;
	}
}
