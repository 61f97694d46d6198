import type { LastScrape } from "../exporter/ScrapeCoordinator";

type CheckStatus = "healthy" | "unhealthy";

type ScrapeCheck = {
	status: CheckStatus | "pending";
	finished_at?: string;
	duration_seconds?: number;
	monitors?: number;
	error?: string;
	error_code?: string;
};

export type HealthResponse = {
	status: CheckStatus;
	timestamp: string;
	last_scrape: ScrapeCheck;
};

/**
 * Derive health from the last scrape. Before the first scrape the exporter counts as healthy.
 *
 * @param last Last scrape summary.
 * @param now Current time in epoch milliseconds.
 * @returns Health check response.
 */
export function checkHealth(
	last: LastScrape | undefined,
	now: number = Date.now(),
): HealthResponse {
	const timestamp = new Date(now).toISOString();

	if (last === undefined) {
		return { status: "healthy", timestamp, last_scrape: { status: "pending" } };
	}

	const status: CheckStatus = last.ok ? "healthy" : "unhealthy";
	return {
		status,
		timestamp,
		last_scrape: {
			status,
			finished_at: new Date(last.finishedAt).toISOString(),
			duration_seconds: last.durationSeconds,
			monitors: last.monitorCount,
			...(last.error && {
				error: last.error.message,
				error_code: last.error.code,
			}),
		},
	};
}

/**
 * Build HTTP response from health check result.
 *
 * @param health Health check response.
 * @returns HTTP response with JSON body.
 */
export function healthResponse(health: HealthResponse): Response {
	const status = health.status === "healthy" ? 200 : 503;
	return new Response(JSON.stringify(health), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}
