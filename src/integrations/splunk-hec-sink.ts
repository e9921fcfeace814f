import { hostname } from "node:os";
import { z } from "zod";
import type { DeliveryError } from "../errors";
import { WireQaReportSchema, toWireReport } from "../services/report-schema";
import type { QaReport, Result } from "../types";
import { err, ok } from "../types";
import type { ReportSink } from "./ports";

export interface SplunkHecSinkOptions {
	hecUrl: string;
	token: string;
	index: string;
	timeoutMs: number;
	source?: string;
	host?: string;
	clock?: () => number;
}

const HecAckSchema = z.object({
	code: z.number(),
	text: z.string().optional(),
});

export function resolveCollectorUrl(hecUrl: string): string {
	const base = hecUrl.replace(/\/+$/, "");
	return base.includes("/services/collector") ? base : `${base}/services/collector/event`;
}

function deliveryError(detail: string, status?: number): DeliveryError {
	return { kind: "DeliveryError", detail, ...(status === undefined ? {} : { status }) };
}

/** Writes QA reports as `_json` events to a Splunk HTTP Event Collector. */
export class SplunkHecSink implements ReportSink {
	private readonly url: string;
	private readonly source: string;
	private readonly host: string;
	private readonly clock: () => number;

	constructor(private readonly options: SplunkHecSinkOptions) {
		this.url = resolveCollectorUrl(options.hecUrl);
		this.source = options.source ?? "soc_qa_review";
		this.host = options.host ?? hostname();
		this.clock = options.clock ?? (() => Date.now());
	}

	async deliver(report: QaReport): Promise<Result<void, DeliveryError>> {
		const event = WireQaReportSchema.safeParse(toWireReport(report));
		if (!event.success) {
			return err(deliveryError(`report does not match wire schema: ${event.error.message}`));
		}

		const payload = {
			time: this.clock() / 1000,
			host: this.host,
			source: this.source,
			sourcetype: "_json",
			index: this.options.index,
			event: event.data,
		};

		let response: Response;
		try {
			response = await fetch(this.url, {
				method: "POST",
				headers: {
					Authorization: `Splunk ${this.options.token}`,
					"Content-Type": "application/json",
				},
				body: JSON.stringify(payload),
				signal: AbortSignal.timeout(this.options.timeoutMs),
			});
		} catch (error) {
			return err(deliveryError(`HEC request failed: ${String(error)}`));
		}

		const body = await response.text().catch(() => "");
		if (response.status !== 200) {
			return err(deliveryError(`HEC returned ${response.status}: ${body.slice(0, 200)}`, response.status));
		}

		let ack: unknown;
		try {
			ack = JSON.parse(body);
		} catch {
			return err(deliveryError("HEC acknowledgement is not JSON", response.status));
		}
		const parsed = HecAckSchema.safeParse(ack);
		if (!parsed.success || parsed.data.code !== 0) {
			return err(deliveryError(`HEC rejected event: ${body.slice(0, 200)}`, response.status));
		}
		return ok(undefined);
	}
}
