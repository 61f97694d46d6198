import z from "zod";
import { ConfigError } from "./errors";
import type { LogFormat, LogLevel } from "./logger";

/**
 * Regional Site24x7 data centers.
 */
export const Site24x7EndpointSchema = z.enum([
	"site24x7.com",
	"site24x7.eu",
	"site24x7.cn",
	"site24x7.in",
	"site24x7.net.au",
]);

export type Site24x7Endpoint = z.infer<typeof Site24x7EndpointSchema>;

/**
 * OAuth client credentials. Secrets: never log these.
 */
export type Credentials = Readonly<{
	clientId: string;
	clientSecret: string;
	refreshToken: string;
}>;

/**
 * Application configuration parsed from environment variables.
 */
export type AppConfig = Readonly<{
	credentials: Credentials;
	endpoint: Site24x7Endpoint;
	apiBaseUrl: string;
	oauthBaseUrl: string;
	listenHost: string;
	listenPort: number;
	metricsPath: string;
	geolocationPath: string;
	requestTimeoutMs: number;
	tokenExpiryMarginMs: number;
	logLevel: LogLevel;
	logFormat: LogFormat;
	logSecrets: boolean;
	proxyUrl: string | undefined;
}>;

const requiredSecret = z
	.string({ required_error: "is required" })
	.trim()
	.min(1, "must not be empty");

const pathSchema = (fallback: string) =>
	z
		.string()
		.trim()
		.regex(/^\/\S*$/, "must start with '/'")
		.default(fallback);

const booleanFlag = z
	.enum(["true", "false", "1", "0", "yes", "no"])
	.default("false")
	.transform((v) => v === "true" || v === "1" || v === "yes");

const EnvSchema = z.object({
	ZOHO_CLIENT_ID: requiredSecret,
	ZOHO_CLIENT_SECRET: requiredSecret,
	ZOHO_REFRESH_TOKEN: requiredSecret,
	SITE24X7_ENDPOINT: Site24x7EndpointSchema.default("site24x7.com"),
	LISTEN_ADDRESS: z
		.string()
		.trim()
		.regex(/^\[?[^\s\]]*\]?:\d{1,5}$/, "must be host:port")
		.default("0.0.0.0:9803"),
	METRICS_PATH: pathSchema("/metrics"),
	GEOLOCATION_PATH: pathSchema("/geolocation"),
	REQUEST_TIMEOUT_SECONDS: z.coerce.number().positive().default(10),
	TOKEN_EXPIRY_MARGIN_SECONDS: z.coerce.number().nonnegative().default(60),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
	LOG_FORMAT: z.enum(["json", "pretty"]).default("pretty"),
	LOG_SECRETS: booleanFlag,
	HTTPS_PROXY: z.string().url().optional(),
	HTTP_PROXY: z.string().url().optional(),
});

/**
 * Derive the API and OAuth base URLs for a region.
 * `site24x7.net.au` pairs with `accounts.zoho.net.au`.
 *
 * @param endpoint Regional endpoint.
 * @returns Base URLs without trailing slash.
 */
export function resolveEndpoints(endpoint: Site24x7Endpoint): {
	apiBaseUrl: string;
	oauthBaseUrl: string;
} {
	const zohoSuffix = endpoint.slice(endpoint.indexOf(".") + 1);
	return {
		apiBaseUrl: `https://www.${endpoint}/api`,
		oauthBaseUrl: `https://accounts.zoho.${zohoSuffix}`,
	};
}

/**
 * Split `host:port`, unwrapping bracketed IPv6 hosts.
 *
 * @param address Listen address.
 * @returns Host and numeric port.
 */
function splitListenAddress(address: string): { host: string; port: number } {
	const separator = address.lastIndexOf(":");
	const host = address.slice(0, separator).replace(/^\[(.*)\]$/, "$1");
	const port = Number(address.slice(separator + 1));
	return { host: host === "" ? "0.0.0.0" : host, port };
}

/**
 * Treat empty strings as unset, and accept lower-case proxy variables.
 *
 * @param env Raw environment.
 * @returns Environment with blanks removed.
 */
function normalizeEnv(
	env: Record<string, string | undefined>,
): Record<string, string> {
	const normalized: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (value !== undefined && value.trim() !== "") {
			normalized[key] = value;
		}
	}
	for (const key of ["HTTPS_PROXY", "HTTP_PROXY"]) {
		const lower = normalized[key.toLowerCase()];
		if (normalized[key] === undefined && lower !== undefined) {
			normalized[key] = lower;
		}
	}
	return normalized;
}

/**
 * Parses application configuration from environment variables.
 *
 * @param env Environment, usually `process.env`.
 * @returns Parsed application configuration.
 * @throws {ConfigError} When required variables are missing or values are invalid.
 */
export function parseConfig(
	env: Record<string, string | undefined>,
): AppConfig {
	const result = EnvSchema.safeParse(normalizeEnv(env));

	if (!result.success) {
		const issues = result.error.issues.map((issue) => ({
			path: issue.path.join("."),
			message: issue.message,
		}));
		// Issue messages name the variable, never its value
		throw new ConfigError(
			`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
			{ issues },
		);
	}

	const parsed = result.data;
	const { host, port } = splitListenAddress(parsed.LISTEN_ADDRESS);
	if (port > 65535) {
		throw new ConfigError("Invalid configuration: LISTEN_ADDRESS: port out of range", {
			issues: [{ path: "LISTEN_ADDRESS", message: "port out of range" }],
		});
	}

	return {
		credentials: {
			clientId: parsed.ZOHO_CLIENT_ID,
			clientSecret: parsed.ZOHO_CLIENT_SECRET,
			refreshToken: parsed.ZOHO_REFRESH_TOKEN,
		},
		endpoint: parsed.SITE24X7_ENDPOINT,
		...resolveEndpoints(parsed.SITE24X7_ENDPOINT),
		listenHost: host,
		listenPort: port,
		metricsPath: parsed.METRICS_PATH,
		geolocationPath: parsed.GEOLOCATION_PATH,
		requestTimeoutMs: parsed.REQUEST_TIMEOUT_SECONDS * 1000,
		tokenExpiryMarginMs: parsed.TOKEN_EXPIRY_MARGIN_SECONDS * 1000,
		logLevel: parsed.LOG_LEVEL,
		logFormat: parsed.LOG_FORMAT,
		// Only meaningful together with debug output
		logSecrets: parsed.LOG_SECRETS && parsed.LOG_LEVEL === "debug",
		proxyUrl: parsed.HTTPS_PROXY ?? parsed.HTTP_PROXY,
	};
}
