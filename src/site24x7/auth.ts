import { setTimeout as sleep } from "node:timers/promises";
import type { Credentials } from "../lib/config";
import { AuthError, extractErrorInfo, FetchError } from "../lib/errors";
import { type HttpFetch, parseJsonBody, requestText } from "../lib/http";
import type { Logger } from "../lib/logger";
import { type AccessToken, AccessTokenResponseSchema } from "../lib/types";

/**
 * Configuration for TokenManager.
 */
export type TokenManagerConfig = Readonly<{
	credentials: Credentials;
	/** Zoho accounts host, e.g. `https://accounts.zoho.com`. */
	oauthBaseUrl: string;
	fetch: HttpFetch;
	logger: Logger;
	timeoutMs: number;
	/** A cached token is reused until this long before it expires. */
	expiryMarginMs: number;
	/** Write secrets to debug logs. Set only for troubleshooting. */
	logSecrets?: boolean;
	/** Exchange attempts for transient failures, defaults to 2. */
	maxAttempts?: number;
	retryDelayMs?: number;
	now?: () => number;
}>;

/**
 * Owns the refresh token and hands out short-lived access tokens.
 * Concurrent callers share one in-flight exchange.
 */
export class TokenManager {
	private readonly config: TokenManagerConfig;
	private readonly logger: Logger;
	private readonly now: () => number;
	private current: AccessToken | undefined;
	private pending: Promise<AccessToken> | undefined;
	private exchanges = 0;

	constructor(config: TokenManagerConfig) {
		this.config = config;
		this.logger = config.logger.child("token");
		this.now = config.now ?? Date.now;
	}

	/**
	 * Number of token exchanges attempted over the process lifetime.
	 */
	get exchangeCount(): number {
		return this.exchanges;
	}

	/**
	 * Returns a token that is valid for at least the expiry margin.
	 *
	 * @returns Cached or freshly exchanged access token.
	 * @throws {AuthError} When the exchange is rejected or keeps failing.
	 */
	async getValidToken(): Promise<AccessToken> {
		const cached = this.current;
		if (
			cached !== undefined &&
			cached.expiresAt - this.config.expiryMarginMs > this.now()
		) {
			return cached;
		}

		if (this.pending === undefined) {
			this.pending = this.refresh().finally(() => {
				this.pending = undefined;
			});
		}
		return this.pending;
	}

	/**
	 * Reports that the API rejected a token. Only drops the cache when the
	 * rejected token is still the current one, so a token issued in the meantime survives.
	 *
	 * @param token Token the API refused.
	 */
	invalidate(token: AccessToken): void {
		if (this.current?.value === token.value) {
			this.logger.info("Access token rejected by API, dropping cached token");
			this.current = undefined;
		}
	}

	/**
	 * Exchanges the refresh token, retrying transient failures.
	 *
	 * @returns New access token.
	 */
	private async refresh(): Promise<AccessToken> {
		const maxAttempts = this.config.maxAttempts ?? 2;
		let lastError: unknown;

		for (let attempt = 1; attempt <= maxAttempts; attempt++) {
			try {
				const token = await this.exchange();
				this.current = token;
				return token;
			} catch (error) {
				if (error instanceof AuthError) throw error;
				lastError = error;
				const info = extractErrorInfo(error);
				this.logger.warn("Token exchange attempt failed", {
					attempt,
					max_attempts: maxAttempts,
					error_code: info.code,
					error: info.message,
				});
				if (attempt < maxAttempts) {
					await sleep(this.config.retryDelayMs ?? 500);
				}
			}
		}

		throw new AuthError(
			`Could not acquire access token after ${maxAttempts} attempts`,
			{ cause: lastError },
		);
	}

	/**
	 * Performs a single token exchange.
	 *
	 * @returns New access token.
	 * @throws {AuthError} When the credentials are rejected.
	 * @throws {FetchError} On transport failures and 5xx responses.
	 */
	private async exchange(): Promise<AccessToken> {
		const { credentials, oauthBaseUrl } = this.config;
		const url = `${oauthBaseUrl}/oauth/v2/token`;
		const form = new URLSearchParams({
			client_id: credentials.clientId,
			client_secret: credentials.clientSecret,
			refresh_token: credentials.refreshToken,
			grant_type: "refresh_token",
		});

		this.exchanges++;
		this.logger.info("Requesting access token", { url });
		if (this.config.logSecrets) {
			this.logger.debug("Token exchange form", { form: form.toString() });
		}

		const requestedAt = this.now();
		const response = await requestText(
			this.config.fetch,
			url,
			{
				method: "POST",
				headers: {
					"Content-Type": "application/x-www-form-urlencoded",
					Accept: "application/json",
				},
				body: form.toString(),
			},
			this.config.timeoutMs,
			"Token exchange",
		);

		if (response.status >= 500) {
			throw new FetchError(`Token endpoint returned HTTP ${response.status}`, {
				statusCode: response.status,
			});
		}

		const parsed = AccessTokenResponseSchema.safeParse(
			parseJsonBody(response.body),
		);
		if (!parsed.success) {
			// The body is not echoed: a malformed success reply could still carry a token
			throw new AuthError(
				`Unexpected token endpoint response (HTTP ${response.status})`,
				{ statusCode: response.status },
			);
		}

		const body = parsed.data;
		if ("error" in body) {
			throw new AuthError(`Token exchange rejected: ${body.error}`, {
				statusCode: response.status,
			});
		}

		const token: AccessToken = {
			value: body.access_token,
			expiresAt: requestedAt + body.expires_in * 1000,
		};

		this.logger.info("Acquired access token", {
			expires_at: new Date(token.expiresAt).toISOString(),
		});
		if (this.config.logSecrets) {
			this.logger.debug("Access token value", { access_token: token.value });
		}

		return token;
	}
}
