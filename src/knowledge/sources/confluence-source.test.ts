import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ResourceUnavailableError } from "../../errors";
import { ConfluenceSource, storageToText } from "./confluence-source";

describe("storageToText", () => {
	it("flattens storage markup into paragraphs and list items", () => {
		const html = [
			"<h1>Brute Force</h1>",
			"<p>Lock the account&nbsp;now &amp; notify.</p>",
			"<ul><li>Reset password</li><li>Notify user</li></ul>",
			"<table><tr><td>Tier</td><td>2</td></tr></table>",
			"<script>x()</script>",
			"<p>Owner&#39;s call<br/>then close</p>",
		].join("");

		expect(storageToText(html)).toBe(
			"Brute Force\n\nLock the account now & notify.\n\n- Reset password\n\n- Notify user\n\nTier | 2 |\n\nOwner's call\nthen close",
		);
	});

	it("leaves unknown entities alone", () => {
		expect(storageToText("<p>R&D &hellip;</p>")).toBe("R&D &hellip;");
	});
});

describe("ConfluenceSource", () => {
	const fetchMock = vi.fn<typeof fetch>();

	beforeEach(() => {
		fetchMock.mockReset();
		vi.stubGlobal("fetch", fetchMock);
	});

	afterEach(() => {
		vi.unstubAllGlobals();
	});

	function page(id: string, body: string) {
		return {
			id,
			title: `Playbook ${id}`,
			body: { storage: { value: body } },
			version: { number: 3 },
			_links: { webui: `/spaces/SOC/pages/${id}` },
		};
	}

	function source() {
		return new ConfluenceSource({
			url: "https://wiki.test/",
			spaceKey: "SOC",
			username: "svc-qa",
			token: "test-token",
			pageSize: 2,
		});
	}

	it("pages through the space and skips empty pages", async () => {
		fetchMock
			.mockResolvedValueOnce(
				Response.json({
					results: [page("101", "<p>Isolate the host.</p>"), page("102", "<p> </p>")],
					size: 2,
					_links: { next: "/rest/api/content?start=2" },
				}),
			)
			.mockResolvedValueOnce(
				Response.json({ results: [page("103", "<p>Block the sender.</p>")], size: 1, _links: {} }),
			);

		const documents = await source().load();

		expect(documents).toEqual([
			{
				id: "confluence:101",
				title: "Playbook 101",
				text: "Isolate the host.",
				source: "confluence",
				metadata: { page_id: "101", space_key: "SOC", version: "3", url: "/spaces/SOC/pages/101" },
			},
			{
				id: "confluence:103",
				title: "Playbook 103",
				text: "Block the sender.",
				source: "confluence",
				metadata: { page_id: "103", space_key: "SOC", version: "3", url: "/spaces/SOC/pages/103" },
			},
		]);
		expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
			"https://wiki.test/rest/api/content?spaceKey=SOC&type=page&expand=body.storage%2Cversion&limit=2&start=0",
			"https://wiki.test/rest/api/content?spaceKey=SOC&type=page&expand=body.storage%2Cversion&limit=2&start=2",
		]);
		expect(new Headers(fetchMock.mock.calls[0]?.[1]?.headers).get("Authorization")).toBe(
			"Basic c3ZjLXFhOnRlc3QtdG9rZW4=",
		);
	});

	it("fails on an HTTP error", async () => {
		fetchMock.mockResolvedValueOnce(new Response("", { status: 401 }));
		await expect(source().load()).rejects.toBeInstanceOf(ResourceUnavailableError);
	});

	it("fails on an unexpected listing shape", async () => {
		fetchMock.mockResolvedValueOnce(Response.json({ pages: [] }));
		await expect(source().load()).rejects.toThrow(
			"confluence unavailable: unexpected content listing response",
		);
	});
});
