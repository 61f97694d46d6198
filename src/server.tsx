import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { LandingPage } from "./components/LandingPage";
import type { ScrapeCoordinator } from "./exporter/ScrapeCoordinator";
import type { AppConfig } from "./lib/config";
import { extractErrorInfo } from "./lib/errors";
import { type Geolocation, loadGeolocations } from "./lib/geolocation";
import { checkHealth, healthResponse } from "./lib/health";
import type { Logger } from "./lib/logger";
import { PROMETHEUS_CONTENT_TYPE } from "./lib/prometheus";

export type AppDependencies = {
	config: Pick<AppConfig, "endpoint" | "metricsPath" | "geolocationPath">;
	coordinator: Pick<ScrapeCoordinator, "export" | "lastScrape">;
	logger: Logger;
	geolocations?: () => readonly Geolocation[];
};

/**
 * Builds the HTTP application.
 *
 * @param deps Configuration and collaborators.
 * @returns Hono app serving metrics, geolocation, health and the landing page.
 */
export function createApp(deps: AppDependencies): Hono {
	const { config, coordinator } = deps;
	const geolocations = deps.geolocations ?? loadGeolocations;
	const log = deps.logger.child("http");
	const app = new Hono();

	app.get(config.metricsPath, async (c) => {
		const logger = log.withContext({ request_id: randomUUID() });
		logger.debug("Metrics request received");

		try {
			const outcome = await coordinator.export();
			// A failed scrape still serves the previous values with the error gauge set
			return c.body(outcome.body, 200, {
				"Content-Type": PROMETHEUS_CONTENT_TYPE,
			});
		} catch (error) {
			const info = extractErrorInfo(error);
			logger.error("Failed to render metrics", {
				error_code: info.code,
				error: info.message,
				...(info.stack && { stack: info.stack }),
			});
			return c.text(`Error collecting metrics: ${info.message}`, 500);
		}
	});

	app.get(config.geolocationPath, cors(), (c) => c.json([...geolocations()]));

	app.get("/", (c) => c.html(<LandingPage config={config} />));

	app.get("/health", () => healthResponse(checkHealth(coordinator.lastScrape)));

	app.notFound((c) => c.text("Not Found", 404));

	return app;
}
