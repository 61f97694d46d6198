import { ProxyAgent, fetch as undiciFetch } from "undici";
import { FetchError } from "./errors";

/**
 * Minimal response surface the API clients read.
 */
export type HttpResponse = {
	readonly status: number;
	readonly ok: boolean;
	text(): Promise<string>;
};

/**
 * Outbound request options.
 */
export type HttpRequestInit = {
	method: "GET" | "POST";
	headers: Record<string, string>;
	body?: string;
	signal?: AbortSignal;
};

/**
 * Fetch function used for every upstream call. Injected so tests run without a network.
 */
export type HttpFetch = (
	url: string,
	init: HttpRequestInit,
) => Promise<HttpResponse>;

/**
 * Creates the production fetch, routed through an HTTP(S) proxy when one is configured.
 *
 * @param proxyUrl Proxy URL, possibly with embedded credentials.
 * @returns Fetch function backed by undici.
 */
export function createHttpFetch(proxyUrl?: string): HttpFetch {
	const dispatcher = proxyUrl ? new ProxyAgent(proxyUrl) : undefined;

	return (url, init) =>
		undiciFetch(url, {
			method: init.method,
			headers: init.headers,
			body: init.body,
			signal: init.signal,
			dispatcher,
		});
}

/**
 * Strips user info from a proxy URL so it can be logged.
 *
 * @param proxyUrl Proxy URL.
 * @returns URL with username and password replaced.
 */
export function redactProxyUrl(proxyUrl: string): string {
	try {
		const url = new URL(proxyUrl);
		if (url.username !== "" || url.password !== "") {
			url.username = "***";
			url.password = "";
		}
		return url.toString();
	} catch {
		return "<unparseable proxy url>";
	}
}

/**
 * Whether an error was raised by an aborted or timed-out signal.
 *
 * @param error Thrown value.
 * @returns True for AbortError/TimeoutError.
 */
function isAbort(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"name" in error &&
		(error.name === "TimeoutError" || error.name === "AbortError")
	);
}

/**
 * Performs one request with a hard timeout and reads the body as text.
 * Transport failures become FetchError; HTTP status handling is left to the caller.
 *
 * @param fetchFn Fetch implementation.
 * @param url Request URL.
 * @param init Request options without signal.
 * @param timeoutMs Timeout covering the request and the body read.
 * @param operation Operation name for error messages.
 * @returns Status and body text.
 * @throws {FetchError} On timeout or connection failure.
 */
export async function requestText(
	fetchFn: HttpFetch,
	url: string,
	init: Omit<HttpRequestInit, "signal">,
	timeoutMs: number,
	operation: string,
): Promise<{ status: number; ok: boolean; body: string }> {
	const signal = AbortSignal.timeout(timeoutMs);

	try {
		const response = await fetchFn(url, { ...init, signal });
		const body = await response.text();
		return { status: response.status, ok: response.ok, body };
	} catch (error) {
		if (isAbort(error)) {
			throw new FetchError(`${operation} timed out after ${timeoutMs}ms`, {
				timedOut: true,
				cause: error,
				context: { operation, timeout_ms: timeoutMs },
			});
		}
		const message = error instanceof Error ? error.message : String(error);
		throw new FetchError(`${operation} failed: ${message}`, {
			cause: error,
			context: { operation },
		});
	}
}

/**
 * Parses a response body, yielding undefined for anything that is not JSON
 * so schema validation reports it.
 *
 * @param text Response body.
 * @returns Parsed value or undefined.
 */
export function parseJsonBody(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}
