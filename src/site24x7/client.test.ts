import { describe, expect, it } from "vitest";
import { AuthError, ErrorCode, FetchError } from "../lib/errors";
import type { HttpFetch } from "../lib/http";
import {
	createFakeFetch,
	createRecordingLogger,
	type FakeReply,
	type FakeRequest,
} from "../testing/fakes";
import { INVALID_TOKEN_MESSAGE, Site24x7Client } from "./client";

const API = "https://www.site24x7.test/api";
const TOKEN = { value: "test-token", expiresAt: Number.MAX_SAFE_INTEGER };

function monitor(id: string, overrides: Record<string, unknown> = {}) {
	return {
		monitor_id: id,
		name: `Monitor ${id}`,
		monitor_type: "URL",
		status: 1,
		unit: "ms",
		attribute_value: 100,
		...overrides,
	};
}

function page(data: unknown, moreRecords?: boolean): FakeReply {
	return {
		body: {
			code: 0,
			message: "success",
			data,
			...(moreRecords !== undefined && { info: { more_records: moreRecords } }),
		},
	};
}

function setup(
	handler: (request: FakeRequest) => FakeReply | Promise<FakeReply>,
	options: { maxPages?: number; fetch?: HttpFetch; timeoutMs?: number } = {},
) {
	const fetch = createFakeFetch(handler);
	const logger = createRecordingLogger();
	const client = new Site24x7Client({
		apiBaseUrl: API,
		fetch: options.fetch ?? fetch,
		logger,
		timeoutMs: options.timeoutMs ?? 1000,
		maxPages: options.maxPages,
	});
	return { client, fetch, logger };
}

describe("Site24x7Client.listMonitors", () => {
	it("sends the versioned accept header and the OAuth token", async () => {
		const { client, fetch } = setup(() => page({ monitors: [] }));

		await client.listMonitors(TOKEN);

		expect(fetch.calls[0]?.url).toBe(`${API}/current_status`);
		expect(fetch.calls[0]?.init.headers).toEqual({
			Accept: "application/json; version=2.0",
			Authorization: "Zoho-oauthtoken test-token",
		});
	});

	it("follows more_records across pages", async () => {
		const { client, fetch } = setup(({ url }) =>
			url.endsWith("?page=2")
				? page({ monitors: [monitor("2")] }, false)
				: page({ monitors: [monitor("1")] }, true),
		);

		const monitors = await client.listMonitors(TOKEN);

		expect(monitors.map((m) => m.id)).toEqual(["1", "2"]);
		expect(fetch.calls.map((call) => call.url)).toEqual([
			`${API}/current_status`,
			`${API}/current_status?page=2`,
		]);
	});

	it("stops at the page limit", async () => {
		const { client, fetch, logger } = setup(
			({ url }) => page({ monitors: [monitor(url)] }, true),
			{ maxPages: 2 },
		);

		const monitors = await client.listMonitors(TOKEN);

		expect(monitors).toHaveLength(2);
		expect(fetch.calls).toHaveLength(2);
		expect(logger.entries.map((entry) => entry.msg)).toContain(
			"Page limit reached, remaining pages skipped",
		);
	});

	it("flattens monitors nested in groups and keeps the first copy of each", async () => {
		const { client } = setup(() =>
			page({
				monitors: [monitor("1")],
				monitor_groups: [
					{
						group_id: "g1",
						group_name: "Web",
						monitors: [monitor("1", { name: "Duplicate" }), monitor("2")],
					},
				],
			}),
		);

		const monitors = await client.listMonitors(TOKEN);

		expect(monitors.map((m) => [m.id, m.name])).toEqual([
			["1", "Monitor 1"],
			["2", "Monitor 2"],
		]);
	});

	it("isolates monitors that fail to decode", async () => {
		const { client, logger } = setup(() =>
			page({
				monitors: [
					monitor("1"),
					{ monitor_id: "2", monitor_type: "URL", status: 1 },
					{ broken: true },
				],
			}),
		);

		const monitors = await client.listMonitors(TOKEN);

		expect(monitors.map((m) => [m.id, m.status])).toEqual([
			["1", "up"],
			["2", "unknown"],
		]);
		expect(
			logger.entries.filter((entry) => entry.msg === "Could not decode monitor"),
		).toHaveLength(2);
	});

	it("raises AuthError on HTTP 401", async () => {
		const { client } = setup(() => ({
			status: 401,
			body: { error_code: 401, message: "Unauthorized" },
		}));

		await expect(client.listMonitors(TOKEN)).rejects.toBeInstanceOf(AuthError);
	});

	it("raises AuthError when the envelope reports an expired token", async () => {
		const { client } = setup(() => ({
			status: 400,
			body: { error_code: 1100, message: INVALID_TOKEN_MESSAGE },
		}));

		await expect(client.listMonitors(TOKEN)).rejects.toThrow(
			new AuthError(INVALID_TOKEN_MESSAGE),
		);
	});

	it("raises FetchError for other API errors", async () => {
		const { client } = setup(() => ({
			status: 400,
			body: { error_code: 1102, message: "Invalid request" },
		}));

		const error = await client.listMonitors(TOKEN).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(FetchError);
		expect(error).toMatchObject({
			message: "Site24x7 API error 1102: Invalid request",
			code: ErrorCode.API_UNAVAILABLE,
			retryable: false,
		});
	});

	it("raises a retryable FetchError for server errors", async () => {
		const { client } = setup(() => ({ status: 502, body: "Bad Gateway" }));

		const error = await client.listMonitors(TOKEN).catch((e: unknown) => e);

		expect(error).toMatchObject({
			message: "GET /current_status returned HTTP 502",
			statusCode: 502,
			retryable: true,
		});
	});

	it("raises FetchError when data has the wrong shape", async () => {
		const { client } = setup(() => page("not a list"));

		await expect(client.listMonitors(TOKEN)).rejects.toThrow(
			"Current status data has an unexpected shape",
		);
	});

	it("times out slow requests", async () => {
		const hanging: HttpFetch = (_url, init) =>
			new Promise((_resolve, reject) => {
				const { signal } = init;
				if (signal === undefined) {
					reject(new Error("missing signal"));
					return;
				}
				signal.addEventListener("abort", () => reject(signal.reason));
			});
		const { client } = setup(() => page({}), { fetch: hanging, timeoutMs: 20 });

		const error = await client.listMonitors(TOKEN).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(FetchError);
		expect(error).toMatchObject({
			code: ErrorCode.API_TIMEOUT,
			message: "GET /current_status timed out after 20ms",
		});
	});
});

describe("Site24x7Client.listMonitorGroups", () => {
	it("decodes groups and skips malformed ones", async () => {
		const { client, fetch, logger } = setup(() =>
			page([
				{ group_id: "g1", display_name: "Web", monitors: ["1", "2"] },
				{ group_id: "g2" },
				{ group_id: "g3", display_name: "Empty" },
			]),
		);

		const groups = await client.listMonitorGroups(TOKEN);

		expect(fetch.calls[0]?.url).toBe(`${API}/monitor_groups`);
		expect(groups).toEqual([
			{ id: "g1", name: "Web", monitorIds: ["1", "2"] },
			{ id: "g3", name: "Empty", monitorIds: [] },
		]);
		expect(logger.entries.map((entry) => entry.msg)).toContain(
			"Skipping monitor group",
		);
	});
});
