import { describe, expect, it, vi } from "vitest";
import { AuthError, FetchError } from "../lib/errors";
import type { AccessToken, Monitor, MonitorGroup } from "../lib/types";
import { createRecordingLogger, deferred } from "../testing/fakes";
import { MetricRegistry } from "./MetricRegistry";
import { ScrapeCoordinator } from "./ScrapeCoordinator";

const NOW = 1_700_000_000_000;
const FIRST: AccessToken = { value: "token-1", expiresAt: NOW + 3_600_000 };
const SECOND: AccessToken = { value: "token-2", expiresAt: NOW + 3_600_000 };

const shop: Monitor = {
	id: "m1",
	name: "Shop",
	kind: { type: "URL", attribute: "RESPONSETIME" },
	status: "up",
	latency: { kind: "measured", seconds: 0.12 },
	locations: [],
	tags: [],
};

const web: MonitorGroup = { id: "g1", name: "Web", monitorIds: ["m1"] };

const SHOP_LATENCY =
	'site24x7_monitor_latency_seconds{monitor_id="m1",monitor_name="Shop",monitor_type="URL",monitor_group="Web"} 0.12';

function setup() {
	const tokens = {
		getValidToken: vi
			.fn<() => Promise<AccessToken>>()
			.mockResolvedValueOnce(FIRST)
			.mockResolvedValue(SECOND),
		invalidate: vi.fn<(token: AccessToken) => void>(),
	};
	const client = {
		listMonitors: vi.fn<(token: AccessToken) => Promise<Monitor[]>>(),
		listMonitorGroups: vi.fn<(token: AccessToken) => Promise<MonitorGroup[]>>(),
	};
	const logger = createRecordingLogger();
	const coordinator = new ScrapeCoordinator({
		tokens,
		client,
		registry: new MetricRegistry(logger),
		logger,
		now: () => NOW,
	});
	return { coordinator, tokens, client, logger };
}

function lines(body: string): string[] {
	return body.split("\n");
}

describe("ScrapeCoordinator", () => {
	it("serves monitor and exporter metrics after a successful scrape", async () => {
		const { coordinator, client } = setup();
		client.listMonitorGroups.mockResolvedValue([web]);
		client.listMonitors.mockResolvedValue([shop]);

		const outcome = await coordinator.export();

		expect(outcome.ok).toBe(true);
		expect(outcome.error).toBeUndefined();
		expect(lines(outcome.body)).toEqual(
			expect.arrayContaining([
				"site24x7_exporter_scrape_error 0",
				"site24x7_exporter_scrape_duration_seconds 0",
				"site24x7_monitors 1",
				"site24x7_exporter_last_successful_scrape_timestamp_seconds 1700000000",
				SHOP_LATENCY,
			]),
		);
		expect(outcome.body).not.toContain("site24x7_exporter_scrape_errors_total");
	});

	it("refreshes the token once and repeats only the refused request", async () => {
		const { coordinator, tokens, client } = setup();
		client.listMonitorGroups.mockResolvedValue([web]);
		client.listMonitors
			.mockRejectedValueOnce(new AuthError("OAuth Access Token is invalid or has expired."))
			.mockResolvedValueOnce([shop]);

		const outcome = await coordinator.export();

		expect(outcome.ok).toBe(true);
		expect(tokens.invalidate).toHaveBeenCalledTimes(1);
		expect(tokens.invalidate).toHaveBeenCalledWith(FIRST);
		expect(tokens.getValidToken).toHaveBeenCalledTimes(2);
		expect(client.listMonitorGroups).toHaveBeenCalledTimes(1);
		expect(client.listMonitors.mock.calls).toEqual([[FIRST], [SECOND]]);
		expect(lines(outcome.body)).toContain(SHOP_LATENCY);
	});

	it("fails the scrape when the refreshed token is refused too", async () => {
		const { coordinator, tokens, client } = setup();
		client.listMonitorGroups.mockRejectedValue(new AuthError("refused"));
		client.listMonitors.mockRejectedValue(new AuthError("refused"));

		const outcome = await coordinator.export();

		expect(outcome.ok).toBe(false);
		expect(outcome.error).toEqual({ code: "AUTH_FAILED", message: "refused" });
		expect(tokens.getValidToken).toHaveBeenCalledTimes(2);
		expect(client.listMonitors).toHaveBeenCalledTimes(2);
		expect(client.listMonitorGroups).toHaveBeenCalledTimes(2);
		expect(lines(outcome.body)).toEqual(
			expect.arrayContaining([
				"site24x7_exporter_scrape_error 1",
				'site24x7_exporter_scrape_errors_total{error_code="AUTH_FAILED"} 1',
				"site24x7_monitors 0",
			]),
		);
	});

	it("does not call the API when no token can be acquired", async () => {
		const { coordinator, tokens, client } = setup();
		tokens.getValidToken.mockReset();
		tokens.getValidToken.mockRejectedValue(
			new AuthError("Token exchange rejected: invalid_client"),
		);

		const outcome = await coordinator.export();

		expect(outcome.error?.code).toBe("AUTH_FAILED");
		expect(client.listMonitors).not.toHaveBeenCalled();
		expect(client.listMonitorGroups).not.toHaveBeenCalled();
	});

	it("keeps serving the previous snapshot when a later scrape fails", async () => {
		const { coordinator, client, logger } = setup();
		client.listMonitorGroups.mockResolvedValueOnce([web]);
		client.listMonitors.mockResolvedValue([shop]);
		await coordinator.export();

		client.listMonitorGroups.mockRejectedValueOnce(
			new FetchError("GET /monitor_groups returned HTTP 503", { statusCode: 503 }),
		);
		const outcome = await coordinator.export();

		expect(outcome.ok).toBe(false);
		expect(outcome.error?.code).toBe("API_UNAVAILABLE");
		expect(client.listMonitorGroups).toHaveBeenCalledTimes(2);
		expect(lines(outcome.body)).toEqual(
			expect.arrayContaining([
				SHOP_LATENCY,
				"site24x7_exporter_scrape_error 1",
				'site24x7_exporter_scrape_errors_total{error_code="API_UNAVAILABLE"} 1',
				"site24x7_exporter_last_successful_scrape_timestamp_seconds 1700000000",
			]),
		);
		expect(
			logger.entries.find((entry) => entry.level === "error")?.msg,
		).toBe("Scrape failed, serving previous values");
	});

	it("counts failures across scrapes", async () => {
		const { coordinator, client } = setup();
		client.listMonitorGroups.mockResolvedValue([]);
		client.listMonitors.mockRejectedValue(new FetchError("timed out", { timedOut: true }));

		await coordinator.export();
		const outcome = await coordinator.export();

		expect(lines(outcome.body)).toContain(
			'site24x7_exporter_scrape_errors_total{error_code="API_TIMEOUT"} 2',
		);
	});

	it("shares one run between overlapping scrapes", async () => {
		const { coordinator, client } = setup();
		const monitors = deferred<Monitor[]>();
		client.listMonitorGroups.mockResolvedValue([web]);
		client.listMonitors.mockReturnValue(monitors.promise);

		const first = coordinator.export();
		const second = coordinator.export();
		monitors.resolve([shop]);

		expect(second).toBe(first);
		const [a, b] = await Promise.all([first, second]);
		expect(a).toBe(b);
		expect(client.listMonitors).toHaveBeenCalledTimes(1);

		await coordinator.export();
		expect(client.listMonitors).toHaveBeenCalledTimes(2);
	});

	it("records the last scrape for health checks", async () => {
		const { coordinator, client } = setup();
		expect(coordinator.lastScrape).toBeUndefined();
		client.listMonitorGroups.mockResolvedValue([web]);
		client.listMonitors.mockResolvedValue([shop]);

		await coordinator.export();

		expect(coordinator.lastScrape).toEqual({
			ok: true,
			finishedAt: NOW,
			durationSeconds: 0,
			monitorCount: 1,
		});
	});
});
