import { resolve } from "node:path";
import { serve } from "@hono/node-server";
import { config as loadDotenv } from "dotenv";
import { MetricRegistry } from "./exporter/MetricRegistry";
import { ScrapeCoordinator } from "./exporter/ScrapeCoordinator";
import { type AppConfig, parseConfig } from "./lib/config";
import { ConfigError, ExporterError, extractErrorInfo } from "./lib/errors";
import { createHttpFetch, redactProxyUrl } from "./lib/http";
import { createLogger, type Logger } from "./lib/logger";
import { createApp } from "./server";
import { TokenManager } from "./site24x7/auth";
import { Site24x7Client } from "./site24x7/client";

// Variables already set in the environment win over .env
loadDotenv({ path: resolve(process.cwd(), ".env"), override: false });

function loadConfig(): AppConfig {
	try {
		return parseConfig(process.env);
	} catch (error) {
		if (!(error instanceof ConfigError)) throw error;
		createLogger("site24x7_exporter").error(
			"Invalid configuration",
			error.toStructuredData(),
		);
		process.exit(1);
	}
}

function logStartup(config: AppConfig, logger: Logger): void {
	if (config.logSecrets) {
		logger.warn("LOG_SECRETS is enabled: credentials and tokens will be logged");
	}
	logger.info("Using Site24x7 endpoint", {
		endpoint: config.endpoint,
		api: config.apiBaseUrl,
	});
	logger.info("Using Zoho accounts endpoint", { oauth: config.oauthBaseUrl });
	if (config.proxyUrl) {
		logger.info("Using proxy", { proxy: redactProxyUrl(config.proxyUrl) });
	} else {
		logger.info("Not using any proxy");
	}
}

async function main(): Promise<void> {
	const config = loadConfig();
	const logger = createLogger("site24x7_exporter", {
		format: config.logFormat,
		level: config.logLevel,
	});
	logStartup(config, logger);

	const fetch = createHttpFetch(config.proxyUrl);
	const tokens = new TokenManager({
		credentials: config.credentials,
		oauthBaseUrl: config.oauthBaseUrl,
		fetch,
		logger,
		timeoutMs: config.requestTimeoutMs,
		expiryMarginMs: config.tokenExpiryMarginMs,
		logSecrets: config.logSecrets,
	});

	// Fail fast on bad credentials instead of on the first scrape
	await tokens.getValidToken();

	const coordinator = new ScrapeCoordinator({
		tokens,
		client: new Site24x7Client({
			apiBaseUrl: config.apiBaseUrl,
			fetch,
			logger,
			timeoutMs: config.requestTimeoutMs,
		}),
		registry: new MetricRegistry(logger),
		logger,
	});

	const app = createApp({ config, coordinator, logger });

	const server = serve(
		{ fetch: app.fetch, hostname: config.listenHost, port: config.listenPort },
		(info) => {
			logger.info("Listening", {
				address: `${info.address}:${info.port}`,
				metrics_path: config.metricsPath,
				geolocation_path: config.geolocationPath,
			});
		},
	);

	const shutdown = (signal: string) => {
		logger.info("Shutting down", { signal });
		server.close((error) => {
			if (error) {
				logger.error("Error while closing server", { error: error.message });
				process.exit(1);
			}
			process.exit(0);
		});
	};
	process.once("SIGTERM", () => shutdown("SIGTERM"));
	process.once("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error: unknown) => {
	const logger = createLogger("site24x7_exporter");
	const data =
		error instanceof ExporterError
			? error.toStructuredData()
			: { error: extractErrorInfo(error).message };
	logger.error("Exporter failed to start", data);
	process.exit(1);
});
