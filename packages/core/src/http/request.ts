/**
 * @title HTTP Request Module
 * @description Single GET requests with a bounded timeout.
 *
 * Every entry is attempted exactly once per run, so there is no retry here.
 *
 * @module http
 */

import { NetworkError, getErrorMessage } from "../errors.js";
import { proxyFetch } from "../proxy/index.js";

/** User agent sent with every request. */
export const USER_AGENT = "simpletv-sync";

/**
 * Options for HTTP requests.
 */
export interface HttpOptions {
	/** Request timeout in milliseconds. */
	timeout: number;
	/** Extra headers. */
	headers?: Record<string, string>;
}

/**
 * Issue a GET request and fail on timeout, connection errors and non-2xx status.
 *
 * The timeout covers reading the body through `readBody`.
 *
 * @param url - URL to fetch
 * @param readBody - Extracts the value from a successful response
 * @param options - HTTP options
 * @returns Value produced by `readBody`
 * @throws NetworkError
 */
async function get<T>(url: string, readBody: (response: Response) => Promise<T>, options: HttpOptions): Promise<T> {
	const { timeout, headers = {} } = options;
	const controller = new AbortController();
	const timeoutId = setTimeout(() => controller.abort(), timeout);

	try {
		const response = await proxyFetch(url, {
			method: "GET",
			headers: { "User-Agent": USER_AGENT, ...headers },
			redirect: "follow",
			signal: controller.signal,
		});

		if (!response.ok) {
			throw new NetworkError(`HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}: ${url}`, {
				statusCode: response.status,
			});
		}

		return await readBody(response);
	} catch (error) {
		if (error instanceof NetworkError) {
			throw error;
		}
		if (error instanceof Error && error.name === "AbortError") {
			throw new NetworkError(`Request timed out after ${timeout}ms: ${url}`, { cause: error });
		}
		throw new NetworkError(`Request failed: ${getErrorMessage(error)}`, { cause: error });
	} finally {
		clearTimeout(timeoutId);
	}
}

/**
 * Fetch and parse a JSON document.
 *
 * The parsed value is returned as `unknown`; callers validate its shape.
 *
 * @throws NetworkError, including for a body that is not JSON
 */
export async function fetchJson(url: string, options: HttpOptions): Promise<unknown> {
	return get(
		url,
		async (response) => {
			const text = await response.text();
			try {
				return JSON.parse(text) as unknown;
			} catch (error) {
				throw new NetworkError(`Malformed JSON response from ${url}`, { cause: error });
			}
		},
		{ ...options, headers: { Accept: "application/json", ...options.headers } },
	);
}

/**
 * Fetch a response body as bytes.
 *
 * @throws NetworkError
 */
export async function fetchBytes(url: string, options: HttpOptions): Promise<Buffer> {
	return get(url, async (response) => Buffer.from(await response.arrayBuffer()), options);
}
