import type { KnowledgeStoreName } from "./types";

export type CliCommand =
	| { command: "qa-run" }
	| { command: "kb-update"; store: KnowledgeStoreName; force: boolean; rebuild: boolean }
	| { command: "serve" }
	| { command: "help" };

export type ParsedArgs = { ok: true; value: CliCommand } | { ok: false; error: string };

const STORES: readonly KnowledgeStoreName[] = ["procedures", "techniques"];

export function parseCliArgs(args: string[]): ParsedArgs {
	const [command, ...rest] = args;
	if (command === undefined || command === "help" || command === "--help") {
		return { ok: true, value: { command: "help" } };
	}

	if (command === "qa-run" || command === "serve") {
		if (rest.length > 0) {
			return { ok: false, error: `${command} takes no arguments` };
		}
		return { ok: true, value: { command } };
	}

	if (command === "kb-update") {
		const flags = rest.filter((arg) => arg.startsWith("--"));
		const positional = rest.filter((arg) => !arg.startsWith("--"));
		const store = STORES.find((name) => name === positional[0]);
		if (!store || positional.length !== 1) {
			return { ok: false, error: "kb-update expects one store: procedures or techniques" };
		}
		const unknown = flags.filter((flag) => flag !== "--force" && flag !== "--rebuild");
		if (unknown.length > 0) {
			return { ok: false, error: `Unknown option: ${unknown.join(" ")}` };
		}
		return {
			ok: true,
			value: {
				command,
				store,
				force: flags.includes("--force"),
				rebuild: flags.includes("--rebuild"),
			},
		};
	}

	return { ok: false, error: `Unknown command: ${args.join(" ")}` };
}
