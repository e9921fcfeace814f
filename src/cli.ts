#!/usr/bin/env tsx
import { parseCliArgs } from "./cli-args";
import { createServices } from "./container";
import { closeRegistry, initializeRegistry } from "./db/registry";
import { logger } from "./utils/logger";

function printHelp(): void {
	console.log(`
soc-qa CLI

Commands:
  qa-run                                         Review incidents closed since the last run
  kb-update <procedures|techniques> [--force] [--rebuild]
                                                 Refresh a knowledge store
  serve                                          Start the HTTP API

Examples:
  soc-qa qa-run
  soc-qa kb-update techniques --force
`);
}

async function runOnce(task: () => Promise<unknown>): Promise<number> {
	try {
		await initializeRegistry();
		const result = await task();
		console.log(JSON.stringify(result, null, 2));
		return 0;
	} catch (error) {
		logger.error("Command failed", error);
		return 1;
	} finally {
		await closeRegistry().catch((error: unknown) => {
			logger.error("Failed to close database pool", error);
		});
	}
}

const parsed = parseCliArgs(process.argv.slice(2));

if (!parsed.ok) {
	console.error(parsed.error);
	printHelp();
	process.exit(1);
}

const cli = parsed.value;
switch (cli.command) {
	case "help":
		printHelp();
		break;
	case "serve":
		await import("./main");
		break;
	case "qa-run": {
		const { qaRunJob } = createServices();
		process.exitCode = await runOnce(() => qaRunJob.run());
		break;
	}
	case "kb-update": {
		const { knowledgeUpdateJob } = createServices();
		process.exitCode = await runOnce(() =>
			knowledgeUpdateJob.run(cli.store, { force: cli.force, rebuild: cli.rebuild }),
		);
		break;
	}
}
