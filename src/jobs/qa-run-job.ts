import { randomUUID } from "node:crypto";
import { ResourceUnavailableError, RunInProgressError } from "../errors";
import type { QaPipeline, QaRunOutcome } from "../services/qa-pipeline";
import type { RunLedger } from "../services/run-ledger";
import { describeError, logger } from "../utils/logger";

export interface QaRunJobOptions {
	clock?: () => number;
	newRunId?: () => string;
}

/**
 * Wraps a pipeline pass with the run ledger: loads the previous watermark,
 * persists the new one and records the run. One run per process at a time.
 */
export class QaRunJob {
	private running = false;
	private readonly clock: () => number;
	private readonly newRunId: () => string;

	constructor(
		private readonly pipeline: QaPipeline,
		private readonly ledger: RunLedger,
		options: QaRunJobOptions = {},
	) {
		this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
		this.newRunId = options.newRunId ?? (() => randomUUID());
	}

	isRunning(): boolean {
		return this.running;
	}

	async run(): Promise<QaRunOutcome> {
		if (this.running) {
			throw new RunInProgressError(this.pipeline.pipeline);
		}
		this.running = true;
		try {
			return await this.execute();
		} finally {
			this.running = false;
		}
	}

	private async execute(): Promise<QaRunOutcome> {
		const previous = await this.ledger
			.getWatermark(this.pipeline.pipeline)
			.catch((error: unknown) => {
				throw new ResourceUnavailableError("run ledger", String(error), { cause: error });
			});
		const now = this.clock();
		const runId = this.newRunId();

		let outcome: QaRunOutcome;
		try {
			outcome = await this.pipeline.run(previous, now, runId);
		} catch (error) {
			await this.ledger
				.recordRun({
					runId,
					status: "failed",
					windowStart: this.pipeline.windowStart(previous, now),
					windowEnd: null,
					startedAt: now,
					finishedAt: this.clock(),
					processed: 0,
					succeeded: 0,
					failed: 0,
					error: String(describeError(error).error),
				})
				.catch((recordError: unknown) => {
					logger.error("Failed to record aborted QA run", recordError, { runId });
				});
			throw error;
		}

		const stored = await this.ledger
			.advanceWatermark(outcome.watermark.pipeline, outcome.watermark.watermark)
			.catch((error: unknown) => {
				logger.error("Failed to persist watermark", error, {
					runId,
					watermark: outcome.watermark.watermark,
				});
				throw new ResourceUnavailableError("run ledger", String(error), { cause: error });
			});

		await this.ledger.recordFailures(outcome.failures);
		await this.ledger.recordRun({
			...outcome.summary,
			status: "completed",
			error: null,
		});

		logger.info("QA run recorded", {
			runId,
			watermark: stored.watermark,
			processed: outcome.summary.processed,
			failed: outcome.summary.failed,
		});
		return { ...outcome, watermark: stored };
	}
}
