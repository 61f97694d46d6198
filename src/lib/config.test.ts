import { describe, expect, it } from "vitest";
import { parseConfig, resolveEndpoints } from "./config";
import { ConfigError } from "./errors";

const credentials = {
	ZOHO_CLIENT_ID: "test-client",
	ZOHO_CLIENT_SECRET: "test-secret",
	ZOHO_REFRESH_TOKEN: "test-refresh",
};

function configError(env: Record<string, string | undefined>): ConfigError {
	try {
		parseConfig(env);
	} catch (error) {
		if (error instanceof ConfigError) return error;
		throw error;
	}
	throw new Error("expected a ConfigError");
}

describe("parseConfig", () => {
	it("applies defaults when only credentials are set", () => {
		const config = parseConfig(credentials);

		expect(config).toEqual({
			credentials: {
				clientId: "test-client",
				clientSecret: "test-secret",
				refreshToken: "test-refresh",
			},
			endpoint: "site24x7.com",
			apiBaseUrl: "https://www.site24x7.com/api",
			oauthBaseUrl: "https://accounts.zoho.com",
			listenHost: "0.0.0.0",
			listenPort: 9803,
			metricsPath: "/metrics",
			geolocationPath: "/geolocation",
			requestTimeoutMs: 10_000,
			tokenExpiryMarginMs: 60_000,
			logLevel: "info",
			logFormat: "pretty",
			logSecrets: false,
			proxyUrl: undefined,
		});
	});

	it("reports a missing credential by name without echoing values", () => {
		const error = configError({ ...credentials, ZOHO_CLIENT_SECRET: undefined });

		expect(error.issues).toEqual([
			{ path: "ZOHO_CLIENT_SECRET", message: "is required" },
		]);
		expect(error.message).toBe(
			"Invalid configuration: ZOHO_CLIENT_SECRET: is required",
		);
		expect(error.message).not.toContain("test-client");
	});

	it("treats blank values as unset", () => {
		const error = configError({ ...credentials, ZOHO_REFRESH_TOKEN: "   " });

		expect(error.issues).toEqual([
			{ path: "ZOHO_REFRESH_TOKEN", message: "is required" },
		]);
	});

	it("rejects unknown data centers", () => {
		const error = configError({ ...credentials, SITE24X7_ENDPOINT: "site24x7.de" });

		expect(error.issues?.map((issue) => issue.path)).toEqual([
			"SITE24X7_ENDPOINT",
		]);
	});

	it("parses bracketed IPv6 listen addresses", () => {
		const config = parseConfig({ ...credentials, LISTEN_ADDRESS: "[::1]:9100" });

		expect(config.listenHost).toBe("::1");
		expect(config.listenPort).toBe(9100);
	});

	it("rejects ports above 65535", () => {
		const error = configError({ ...credentials, LISTEN_ADDRESS: "0.0.0.0:70000" });

		expect(error.message).toBe(
			"Invalid configuration: LISTEN_ADDRESS: port out of range",
		);
	});

	it("requires paths to start with a slash", () => {
		const error = configError({ ...credentials, METRICS_PATH: "metrics" });

		expect(error.issues).toEqual([
			{ path: "METRICS_PATH", message: "must start with '/'" },
		]);
	});

	it("honours LOG_SECRETS only at debug level", () => {
		expect(parseConfig({ ...credentials, LOG_SECRETS: "true" }).logSecrets).toBe(
			false,
		);
		expect(
			parseConfig({ ...credentials, LOG_SECRETS: "true", LOG_LEVEL: "debug" })
				.logSecrets,
		).toBe(true);
	});

	it("picks up lower-case proxy variables", () => {
		const config = parseConfig({
			...credentials,
			https_proxy: "http://proxy.test:3128",
		});

		expect(config.proxyUrl).toBe("http://proxy.test:3128");
	});

	it("converts timeouts to milliseconds", () => {
		const config = parseConfig({
			...credentials,
			REQUEST_TIMEOUT_SECONDS: "2.5",
			TOKEN_EXPIRY_MARGIN_SECONDS: "0",
		});

		expect(config.requestTimeoutMs).toBe(2500);
		expect(config.tokenExpiryMarginMs).toBe(0);
	});
});

describe("resolveEndpoints", () => {
	it.each([
		["site24x7.com", "https://www.site24x7.com/api", "https://accounts.zoho.com"],
		["site24x7.eu", "https://www.site24x7.eu/api", "https://accounts.zoho.eu"],
		[
			"site24x7.net.au",
			"https://www.site24x7.net.au/api",
			"https://accounts.zoho.net.au",
		],
	] as const)("maps %s", (endpoint, apiBaseUrl, oauthBaseUrl) => {
		expect(resolveEndpoints(endpoint)).toEqual({ apiBaseUrl, oauthBaseUrl });
	});
});
