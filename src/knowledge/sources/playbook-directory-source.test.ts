import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ResourceUnavailableError } from "../../errors";
import { PlaybookDirectorySource, playbookTitle } from "./playbook-directory-source";

describe("playbookTitle", () => {
	it("prefers the first level-one heading", () => {
		expect(playbookTitle("/x/brute-force.md", "intro\n# Brute Force Response\n## Steps")).toBe(
			"Brute Force Response",
		);
	});

	it("falls back to the file name", () => {
		expect(playbookTitle("/x/phishing__triage-v2.txt", "Check headers.")).toBe("phishing triage v2");
	});
});

describe("PlaybookDirectorySource", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "playbooks-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("loads playbook files recursively in path order", async () => {
		await mkdir(join(dir, "nested"));
		await writeFile(join(dir, "brute-force.md"), "# Brute Force Response\n\nLock the account.");
		await writeFile(join(dir, "empty.md"), "  \n");
		await writeFile(join(dir, "nested", "phishing_triage.txt"), "Check headers.");
		await writeFile(join(dir, "diagram.png"), "not a playbook");

		const documents = await new PlaybookDirectorySource(dir).load();

		expect(documents).toEqual([
			{
				id: "playbook:brute-force.md",
				title: "Brute Force Response",
				text: "# Brute Force Response\n\nLock the account.",
				source: "playbook-directory",
				metadata: { path: "brute-force.md" },
			},
			{
				id: "playbook:nested/phishing_triage.txt",
				title: "phishing triage",
				text: "Check headers.",
				source: "playbook-directory",
				metadata: { path: "nested/phishing_triage.txt" },
			},
		]);
	});

	it("fails when the directory is missing", async () => {
		await expect(new PlaybookDirectorySource(join(dir, "missing")).load()).rejects.toBeInstanceOf(
			ResourceUnavailableError,
		);
	});
});
