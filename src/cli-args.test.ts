import { describe, expect, it } from "vitest";
import { parseCliArgs } from "./cli-args";

describe("parseCliArgs", () => {
	it("defaults to help", () => {
		expect(parseCliArgs([])).toEqual({ ok: true, value: { command: "help" } });
		expect(parseCliArgs(["--help"])).toEqual({ ok: true, value: { command: "help" } });
	});

	it("parses qa-run and serve", () => {
		expect(parseCliArgs(["qa-run"])).toEqual({ ok: true, value: { command: "qa-run" } });
		expect(parseCliArgs(["serve"])).toEqual({ ok: true, value: { command: "serve" } });
		expect(parseCliArgs(["qa-run", "now"])).toEqual({ ok: false, error: "qa-run takes no arguments" });
	});

	it("parses kb-update with flags in any position", () => {
		expect(parseCliArgs(["kb-update", "--rebuild", "techniques"])).toEqual({
			ok: true,
			value: { command: "kb-update", store: "techniques", force: false, rebuild: true },
		});
		expect(parseCliArgs(["kb-update", "procedures", "--force"])).toEqual({
			ok: true,
			value: { command: "kb-update", store: "procedures", force: true, rebuild: false },
		});
	});

	it.each([[["kb-update"]], [["kb-update", "wiki"]], [["kb-update", "procedures", "techniques"]]])(
		"rejects a missing or unknown store: %j",
		(args) => {
			expect(parseCliArgs(args)).toEqual({
				ok: false,
				error: "kb-update expects one store: procedures or techniques",
			});
		},
	);

	it("rejects unknown options and commands", () => {
		expect(parseCliArgs(["kb-update", "procedures", "--all"])).toEqual({
			ok: false,
			error: "Unknown option: --all",
		});
		expect(parseCliArgs(["reindex", "now"])).toEqual({ ok: false, error: "Unknown command: reindex now" });
	});
});
