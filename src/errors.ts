// src/errors.ts — Error taxonomy shared by the blog pipeline and the tool layer.
//
//   BlogInputError — the caller asked for something invalid (bad URL, unknown category).
//                    Reported as-is, never retried.
//   UpstreamError  — a remote fetch failed (non-2xx, timeout). Single-item tools surface
//                    the message; multi-feed tools skip the failing source.

export class BlogInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'BlogInputError';
    }
}

export class UpstreamError extends Error {
    readonly url: string;
    /** HTTP status, or undefined when the request never completed (timeout, DNS, TLS) */
    readonly status?: number;

    constructor(url: string, message: string, status?: number) {
        super(message);
        this.name = 'UpstreamError';
        this.url = url;
        this.status = status;
    }
}

/** Turn anything thrown into a one-line message fit for a tool result. */
export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message || err.name;
    if (typeof err === 'string') return err;
    try {
        return JSON.stringify(err) ?? String(err);
    } catch {
        return String(err);
    }
}
