/**
 * Error taxonomy for QA runs and knowledge updates.
 *
 * Run-level failures are thrown (`ResourceUnavailableError` and the
 * in-progress guards). Per-incident failures (`GenerationError`,
 * `DeliveryError`) are values carried in a `Result` so the orchestrator can
 * count them and keep going.
 */

export class ResourceUnavailableError extends Error {
	readonly resource: string;

	constructor(resource: string, message: string, options?: { cause?: unknown }) {
		super(`${resource} unavailable: ${message}`, options);
		this.name = "ResourceUnavailableError";
		this.resource = resource;
	}
}

export class RunInProgressError extends Error {
	constructor(pipeline: string) {
		super(`a ${pipeline} run is already in progress`);
		this.name = "RunInProgressError";
	}
}

export class IngestionInProgressError extends Error {
	constructor(store: string) {
		super(`ingestion into ${store} is already in progress`);
		this.name = "IngestionInProgressError";
	}
}

export class MalformedDocumentError extends Error {
	readonly documentId: string;

	constructor(documentId: string, reason: string) {
		super(`malformed document ${documentId || "<no id>"}: ${reason}`);
		this.name = "MalformedDocumentError";
		this.documentId = documentId;
	}
}

export type GenerationErrorKind = "ModelUnavailable" | "InvalidOutput";

export interface GenerationError {
	kind: GenerationErrorKind;
	detail: string;
	rawOutput?: string;
}

export interface DeliveryError {
	kind: "DeliveryError";
	detail: string;
	status?: number;
}

export function isAbortError(error: unknown): boolean {
	return (
		error instanceof Error &&
		(error.name === "AbortError" || error.name === "TimeoutError")
	);
}
