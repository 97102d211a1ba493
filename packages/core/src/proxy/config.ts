/**
 * @title Proxy Configuration Module
 * @description Proxy settings read from the standard environment variables.
 *
 * @module proxy
 *
 * @envvar HTTP_PROXY / http_proxy - Proxy URL for plain HTTP requests.
 * @envvar HTTPS_PROXY / https_proxy - Proxy URL for HTTPS requests (falls back to HTTP_PROXY).
 * @envvar NO_PROXY / no_proxy - Comma or space separated hosts that bypass the proxy.
 *
 * Uppercase variants win over lowercase ones. In NO_PROXY, "*" matches every
 * host and "example.com" or ".example.com" match the domain and its subdomains.
 */

/**
 * Proxy configuration.
 */
export interface ProxyConfig {
	httpProxy?: string;
	httpsProxy?: string;
	/** Lower-cased NO_PROXY patterns. */
	noProxy: string[];
}

function readEnv(name: string, env: NodeJS.ProcessEnv): string | undefined {
	return env[name.toUpperCase()] || env[name.toLowerCase()] || undefined;
}

/**
 * Read proxy configuration from the environment.
 *
 * @param env - Environment to read (defaults to process.env)
 */
export function getProxyConfig(env: NodeJS.ProcessEnv = process.env): ProxyConfig {
	const noProxy = readEnv("NO_PROXY", env) ?? "";

	return {
		httpProxy: readEnv("HTTP_PROXY", env),
		httpsProxy: readEnv("HTTPS_PROXY", env),
		noProxy: noProxy
			.split(/[,\s]+/)
			.map((pattern) => pattern.trim().toLowerCase())
			.filter((pattern) => pattern.length > 0),
	};
}

/**
 * Check if a hostname matches one of the NO_PROXY patterns.
 */
export function shouldBypassProxy(hostname: string, noProxy: readonly string[]): boolean {
	const host = hostname.toLowerCase();

	return noProxy.some((pattern) => {
		if (pattern === "*") {
			return true;
		}
		const domain = pattern.startsWith(".") ? pattern.slice(1) : pattern;
		return host === domain || host.endsWith(`.${domain}`);
	});
}

/**
 * Get the proxy URL to use for a request, if any.
 *
 * @param url - Request URL
 * @param config - Proxy configuration (read from the environment when omitted)
 */
export function getProxyForUrl(url: string, config: ProxyConfig = getProxyConfig()): string | undefined {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch {
		return undefined;
	}

	if (shouldBypassProxy(parsed.hostname, config.noProxy)) {
		return undefined;
	}

	switch (parsed.protocol) {
		case "https:":
			return config.httpsProxy ?? config.httpProxy;
		case "http:":
			return config.httpProxy;
		default:
			return undefined;
	}
}
