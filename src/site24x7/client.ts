import { AuthError, DecodeError, FetchError } from "../lib/errors";
import { type HttpFetch, parseJsonBody, requestText } from "../lib/http";
import type { Logger } from "../lib/logger";
import {
	type AccessToken,
	CurrentStatusDataSchema,
	EnvelopeSchema,
	type Monitor,
	type MonitorGroup,
	MonitorGroupListSchema,
} from "../lib/types";
import { decodeMonitor, decodeMonitorGroup } from "./decode";

/**
 * Message Site24x7 returns for expired or revoked access tokens.
 */
export const INVALID_TOKEN_MESSAGE =
	"OAuth Access Token is invalid or has expired.";

const DEFAULT_MAX_PAGES = 20;

/**
 * Configuration for Site24x7Client.
 */
export type Site24x7ClientConfig = Readonly<{
	/** Regional API base, e.g. `https://www.site24x7.com/api`. */
	apiBaseUrl: string;
	fetch: HttpFetch;
	logger: Logger;
	timeoutMs: number;
	maxPages?: number;
}>;

/**
 * Read-only client for the monitor status endpoints of the Site24x7 API.
 */
export class Site24x7Client {
	private readonly config: Site24x7ClientConfig;
	private readonly logger: Logger;

	constructor(config: Site24x7ClientConfig) {
		this.config = config;
		this.logger = config.logger.child("api");
	}

	/**
	 * Lists monitor groups with their member monitor ids.
	 * Groups that fail to decode are logged and left out.
	 *
	 * @param token Valid access token.
	 * @returns Monitor groups.
	 * @throws {AuthError} When the token is rejected.
	 * @throws {FetchError} On transport errors, non-2xx responses or a malformed envelope.
	 */
	async listMonitorGroups(token: AccessToken): Promise<MonitorGroup[]> {
		const pages = await this.getPaged("/monitor_groups", token);
		const groups: MonitorGroup[] = [];
		let index = 0;

		for (const data of pages) {
			const list = MonitorGroupListSchema.safeParse(data ?? []);
			if (!list.success) {
				throw new FetchError("Monitor group list has an unexpected shape", {
					context: { endpoint: "/monitor_groups" },
				});
			}
			for (const raw of list.data) {
				try {
					groups.push(decodeMonitorGroup(raw, index++));
				} catch (error) {
					if (!(error instanceof DecodeError)) throw error;
					this.logger.warn("Skipping monitor group", error.toStructuredData());
				}
			}
		}

		this.logger.debug("Fetched monitor groups", { count: groups.length });
		return groups;
	}

	/**
	 * Lists the current status of every monitor, including monitors nested in groups.
	 * A monitor that fails to decode is logged; when its id is readable it is returned
	 * with `unknown` status so its last known values are kept.
	 *
	 * @param token Valid access token.
	 * @returns Monitors, unique by id.
	 * @throws {AuthError} When the token is rejected.
	 * @throws {FetchError} On transport errors, non-2xx responses or a malformed envelope.
	 */
	async listMonitors(token: AccessToken): Promise<Monitor[]> {
		const pages = await this.getPaged("/current_status", token);
		const byId = new Map<string, Monitor>();
		let decodeFailures = 0;
		let index = 0;

		for (const data of pages) {
			const parsed = CurrentStatusDataSchema.safeParse(data ?? {});
			if (!parsed.success) {
				throw new FetchError("Current status data has an unexpected shape", {
					context: { endpoint: "/current_status" },
				});
			}

			const raws = [
				...parsed.data.monitors,
				...parsed.data.monitor_groups.flatMap((group) => group.monitors),
			];

			for (const raw of raws) {
				const result = decodeMonitor(raw, index++);
				if (result.ok) {
					if (!byId.has(result.monitor.id)) {
						byId.set(result.monitor.id, result.monitor);
					}
					continue;
				}

				decodeFailures++;
				this.logger.warn("Could not decode monitor", {
					...result.error.toStructuredData(),
					kept_as_unavailable: result.placeholder !== undefined,
				});
				if (result.placeholder && !byId.has(result.placeholder.id)) {
					byId.set(result.placeholder.id, result.placeholder);
				}
			}
		}

		this.logger.debug("Fetched monitors", {
			count: byId.size,
			decode_failures: decodeFailures,
		});
		return [...byId.values()];
	}

	/**
	 * Fetches every page of a list endpoint.
	 * Follows `info.more_records` up to the page limit.
	 *
	 * @param path Endpoint path below the API base.
	 * @param token Valid access token.
	 * @returns The `data` member of each page.
	 */
	private async getPaged(path: string, token: AccessToken): Promise<unknown[]> {
		const maxPages = this.config.maxPages ?? DEFAULT_MAX_PAGES;
		const pages: unknown[] = [];

		for (let page = 1; page <= maxPages; page++) {
			const query = page === 1 ? "" : `?page=${page}`;
			const { data, moreRecords } = await this.get(`${path}${query}`, token);
			pages.push(data);

			if (!moreRecords) return pages;
		}

		this.logger.warn("Page limit reached, remaining pages skipped", {
			endpoint: path,
			max_pages: maxPages,
		});
		return pages;
	}

	/**
	 * Performs one authenticated GET and unwraps the response envelope.
	 *
	 * @param pathAndQuery Path and query below the API base.
	 * @param token Valid access token.
	 * @returns Envelope data and pagination flag.
	 */
	private async get(
		pathAndQuery: string,
		token: AccessToken,
	): Promise<{ data: unknown; moreRecords: boolean }> {
		const url = `${this.config.apiBaseUrl}${pathAndQuery}`;
		const response = await requestText(
			this.config.fetch,
			url,
			{
				method: "GET",
				headers: {
					Accept: "application/json; version=2.0",
					Authorization: `Zoho-oauthtoken ${token.value}`,
				},
			},
			this.config.timeoutMs,
			`GET ${pathAndQuery}`,
		);

		if (response.status === 401) {
			throw new AuthError(`Access token rejected for ${pathAndQuery}`, {
				statusCode: 401,
			});
		}

		const envelope = EnvelopeSchema.safeParse(parseJsonBody(response.body));

		if (envelope.success && "error_code" in envelope.data) {
			const { error_code, message } = envelope.data;
			if (message === INVALID_TOKEN_MESSAGE || error_code === 401) {
				throw new AuthError(message, { statusCode: response.status });
			}
			throw new FetchError(`Site24x7 API error ${error_code}: ${message}`, {
				statusCode: response.status,
				context: { api_error_code: error_code, endpoint: pathAndQuery },
			});
		}

		if (!response.ok) {
			throw new FetchError(`GET ${pathAndQuery} returned HTTP ${response.status}`, {
				statusCode: response.status,
			});
		}

		if (!envelope.success) {
			throw new FetchError(`GET ${pathAndQuery} returned an unreadable body`, {
				statusCode: response.status,
			});
		}

		const { code, message, data, info } = envelope.data;
		if (code !== 0) {
			throw new FetchError(`Site24x7 API error ${code}: ${message ?? "unknown"}`, {
				statusCode: response.status,
				context: { api_error_code: code, endpoint: pathAndQuery },
			});
		}

		return { data, moreRecords: info?.more_records === true };
	}
}
