// src/http/client.ts — Text-over-HTTP transport used for blog pages and RSS feeds.
//
// Everything in src/blogs talks to the network through the HttpClient interface,
// so tests can swap in an in-process fake and the core stays free of fetch().

import { FETCH_TIMEOUT_MS, getConfig } from "../config/index.js";
import { UpstreamError, describeError } from "../errors.js";

export interface GetTextOptions {
    headers?: Record<string, string>;
    /** Abort after this many ms. Defaults to FETCH_TIMEOUT_MS. */
    timeoutMs?: number;
}

export interface HttpClient {
    /** GET `url` and return the response body. Rejects with UpstreamError on non-2xx or timeout. */
    getText(url: string, options?: GetTextOptions): Promise<string>;
}

export const HTML_ACCEPT = "text/html,application/xhtml+xml,*/*;q=0.8";
export const FEED_ACCEPT = "application/rss+xml, application/atom+xml, application/xml, text/xml, */*;q=0.8";

export class FetchHttpClient implements HttpClient {
    private readonly userAgent: string;

    constructor(userAgent: string = getConfig().userAgent) {
        this.userAgent = userAgent;
    }

    async getText(url: string, options: GetTextOptions = {}): Promise<string> {
        const timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), timeoutMs);
        try {
            const res = await fetch(url, {
                signal: controller.signal,
                headers: { "User-Agent": this.userAgent, ...options.headers },
                redirect: "follow",
            });
            if (!res.ok) throw new UpstreamError(url, `HTTP ${res.status} ${res.statusText} for ${url}`, res.status);
            return await res.text();
        } catch (err) {
            if (err instanceof UpstreamError) throw err;
            if (controller.signal.aborted) {
                throw new UpstreamError(url, `Timed out after ${timeoutMs}ms fetching ${url}`);
            }
            throw new UpstreamError(url, `Request to ${url} failed: ${describeError(err)}`);
        } finally {
            clearTimeout(timer);
        }
    }
}
