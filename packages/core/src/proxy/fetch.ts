/**
 * @title Proxy-Aware Fetch Module
 * @description Routes requests through the configured proxy using undici.
 *
 * @module proxy
 */

import { fetch as undiciFetch, ProxyAgent, type Dispatcher } from "undici";
import { getProxyForUrl, type ProxyConfig } from "./config.js";

/**
 * Options for proxy-aware fetch.
 */
export interface ProxyFetchOptions extends RequestInit {
	/** Proxy configuration. If not provided, reads from environment. */
	proxyConfig?: ProxyConfig;
}

const proxyAgents = new Map<string, ProxyAgent>();

function getProxyAgent(proxyUrl: string): ProxyAgent {
	let agent = proxyAgents.get(proxyUrl);
	if (!agent) {
		agent = new ProxyAgent(proxyUrl);
		proxyAgents.set(proxyUrl, agent);
	}
	return agent;
}

/**
 * Fetch a URL, going through a ProxyAgent when HTTP(S)_PROXY applies to it.
 *
 * @param url - URL to fetch
 * @param options - Fetch options with optional proxy configuration
 * @returns Response
 */
export async function proxyFetch(url: string, options: ProxyFetchOptions = {}): Promise<Response> {
	const { proxyConfig, ...init } = options;
	const proxyUrl = getProxyForUrl(url, proxyConfig);

	if (!proxyUrl) {
		return fetch(url, init);
	}

	// undici's Dispatcher and Response are structurally the same as the
	// global fetch types but declared separately, hence the casts.
	return undiciFetch(url, {
		...init,
		dispatcher: getProxyAgent(proxyUrl) as unknown as Dispatcher,
	}) as unknown as Response;
}

/**
 * Close and forget all cached proxy agents.
 */
export async function clearProxyAgents(): Promise<void> {
	const agents = [...proxyAgents.values()];
	proxyAgents.clear();
	await Promise.all(agents.map((agent) => agent.close()));
}
