import { randomUUID } from "node:crypto";
import {
	AuthError,
	type ErrorCode,
	ExporterError,
	extractErrorInfo,
} from "../lib/errors";
import type { Logger } from "../lib/logger";
import { METRIC_NAMES, type MetricDefinition } from "../lib/metrics";
import { serializeToPrometheus } from "../lib/prometheus";
import type { AccessToken, Monitor, MonitorGroup } from "../lib/types";
import type { TokenManager } from "../site24x7/auth";
import type { Site24x7Client } from "../site24x7/client";
import type { MetricRegistry } from "./MetricRegistry";

/**
 * Token source used by the coordinator.
 */
export type TokenSource = Pick<TokenManager, "getValidToken" | "invalidate">;

/**
 * Monitor data source used by the coordinator.
 */
export type MonitorSource = Pick<
	Site24x7Client,
	"listMonitors" | "listMonitorGroups"
>;

/**
 * Result of one scrape. `body` is always servable; on failure it holds the
 * previous snapshot with the error gauge set.
 */
export type ScrapeOutcome = Readonly<{
	ok: boolean;
	body: string;
	error?: Readonly<{ code: ErrorCode; message: string }>;
}>;

/**
 * Summary of the most recent scrape, reported by the health endpoint.
 */
export type LastScrape = Readonly<{
	ok: boolean;
	/** Epoch milliseconds. */
	finishedAt: number;
	durationSeconds: number;
	monitorCount: number;
	error?: Readonly<{ code: ErrorCode; message: string }>;
}>;

export type ScrapeCoordinatorConfig = Readonly<{
	tokens: TokenSource;
	client: MonitorSource;
	registry: MetricRegistry;
	logger: Logger;
	now?: () => number;
}>;

type Settled<T> = PromiseSettledResult<T>;

async function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
	try {
		return { status: "fulfilled", value: await promise };
	} catch (reason) {
		return { status: "rejected", reason };
	}
}

function rejectedByAuth<T>(result: Settled<T>): boolean {
	return result.status === "rejected" && result.reason instanceof AuthError;
}

function unwrap<T>(result: Settled<T>): T {
	if (result.status === "rejected") throw result.reason;
	return result.value;
}

/**
 * Runs the scrape pipeline: token, fetch, registry update, serialization.
 * Overlapping calls to {@link ScrapeCoordinator.export} share one run.
 */
export class ScrapeCoordinator {
	private readonly config: ScrapeCoordinatorConfig;
	private readonly logger: Logger;
	private readonly now: () => number;
	private readonly errorCounts = new Map<ErrorCode, number>();
	private inFlight: Promise<ScrapeOutcome> | undefined;
	private lastSuccessAt: number | undefined;
	private last: LastScrape | undefined;

	constructor(config: ScrapeCoordinatorConfig) {
		this.config = config;
		this.logger = config.logger.child("scrape");
		this.now = config.now ?? Date.now;
	}

	/**
	 * Summary of the last finished scrape, undefined before the first one.
	 */
	get lastScrape(): LastScrape | undefined {
		return this.last;
	}

	/**
	 * Scrapes Site24x7 and renders the exposition body.
	 *
	 * @returns Outcome with the body to serve.
	 */
	export(): Promise<ScrapeOutcome> {
		if (this.inFlight === undefined) {
			this.inFlight = this.scrape().finally(() => {
				this.inFlight = undefined;
			});
		} else {
			this.logger.debug("Joining scrape already in progress");
		}
		return this.inFlight;
	}

	private async scrape(): Promise<ScrapeOutcome> {
		const logger = this.logger.withContext({ scrape_id: randomUUID() });
		const startedAt = this.now();
		logger.info("Collecting metrics");

		let error: ScrapeOutcome["error"];
		try {
			const { monitors, groups } = await this.fetchAll(logger);
			this.config.registry.update(monitors, groups);
			this.lastSuccessAt = this.now();
			logger.info("Metrics collected", {
				monitors: monitors.length,
				groups: groups.length,
			});
		} catch (caught) {
			const info = extractErrorInfo(caught);
			error = { code: info.code, message: info.message };
			this.errorCounts.set(info.code, (this.errorCounts.get(info.code) ?? 0) + 1);
			logger.error(
				"Scrape failed, serving previous values",
				caught instanceof ExporterError
					? caught.toStructuredData()
					: {
							error_code: info.code,
							error: info.message,
							...(info.stack && { stack: info.stack }),
						},
			);
		}

		const finishedAt = this.now();
		const durationSeconds = (finishedAt - startedAt) / 1000;
		const monitorCount = this.config.registry.size;

		this.last = {
			ok: error === undefined,
			finishedAt,
			durationSeconds,
			monitorCount,
			...(error && { error }),
		};

		const body = serializeToPrometheus([
			...this.buildExporterMetrics(error !== undefined, durationSeconds, monitorCount),
			...this.config.registry.snapshot(),
		]);

		return { ok: error === undefined, body, ...(error && { error }) };
	}

	/**
	 * Fetches groups and monitors concurrently. When either request is refused
	 * for auth, the token is refreshed once and only the refused requests are repeated.
	 *
	 * @param logger Scrape logger.
	 * @returns Both lists.
	 * @throws The first remaining failure.
	 */
	private async fetchAll(
		logger: Logger,
	): Promise<{ monitors: Monitor[]; groups: MonitorGroup[] }> {
		const { tokens, client } = this.config;

		const token = await tokens.getValidToken();
		let [groups, monitors] = await this.fetchBoth(token);

		if (rejectedByAuth(groups) || rejectedByAuth(monitors)) {
			logger.info("Access token refused, refreshing and retrying once");
			tokens.invalidate(token);
			const fresh = await tokens.getValidToken();

			[groups, monitors] = await Promise.all([
				rejectedByAuth(groups) ? settle(client.listMonitorGroups(fresh)) : groups,
				rejectedByAuth(monitors) ? settle(client.listMonitors(fresh)) : monitors,
			]);
		}

		return { monitors: unwrap(monitors), groups: unwrap(groups) };
	}

	private fetchBoth(
		token: AccessToken,
	): Promise<[Settled<MonitorGroup[]>, Settled<Monitor[]>]> {
		const { client } = this.config;
		return Promise.all([
			settle(client.listMonitorGroups(token)),
			settle(client.listMonitors(token)),
		]);
	}

	/**
	 * Builds exporter health metrics.
	 *
	 * @param failed Whether this scrape failed.
	 * @param durationSeconds Scrape duration.
	 * @param monitorCount Monitors currently exported.
	 * @returns Exporter metrics.
	 */
	private buildExporterMetrics(
		failed: boolean,
		durationSeconds: number,
		monitorCount: number,
	): MetricDefinition[] {
		const metrics: MetricDefinition[] = [
			{
				name: METRIC_NAMES.SCRAPE_ERROR,
				help: "1 if the last scrape of the Site24x7 API failed and previous values are served.",
				type: "gauge",
				values: [{ labels: {}, value: failed ? 1 : 0 }],
			},
			{
				name: METRIC_NAMES.SCRAPE_DURATION,
				help: "Duration of the last scrape in seconds.",
				type: "gauge",
				values: [{ labels: {}, value: durationSeconds }],
			},
			{
				name: METRIC_NAMES.MONITORS,
				help: "Number of monitors currently exported.",
				type: "gauge",
				values: [{ labels: {}, value: monitorCount }],
			},
		];

		if (this.lastSuccessAt !== undefined) {
			metrics.push({
				name: METRIC_NAMES.LAST_SUCCESS,
				help: "Time of the last successful scrape in seconds since the epoch.",
				type: "gauge",
				values: [
					{ labels: {}, value: Math.floor(this.lastSuccessAt / 1000) },
				],
			});
		}

		if (this.errorCounts.size > 0) {
			metrics.push({
				name: METRIC_NAMES.SCRAPE_ERRORS_TOTAL,
				help: "Failed scrapes by error code.",
				type: "counter",
				values: [...this.errorCounts].map(([code, count]) => ({
					labels: { error_code: code },
					value: count,
				})),
			});
		}

		return metrics;
	}
}
