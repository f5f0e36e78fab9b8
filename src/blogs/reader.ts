// src/blogs/reader.ts — read_blog_post pipeline.
//
//   validate URL → fetch page → metadata → Markdown body → header + body → paginate
//
// The URL check runs before any network access. Every failure, including a bad URL,
// comes back as an "Error reading blog post: ..." string, never a rejection.

import { parse } from "node-html-parser";
import { BLOGS_ROOT } from "./categories.js";
import { normalizeHtml } from "./content.js";
import { extractMetadata } from "./metadata.js";
import { paginate } from "./paginate.js";
import type { ExtractedMetadata } from "./types.js";
import { FETCH_TIMEOUT_MS } from "../config/index.js";
import { BlogInputError, describeError } from "../errors.js";
import { HTML_ACCEPT, type HttpClient } from "../http/client.js";
import { log } from "../logs/logger.js";

const logger = log("blogs/reader");

export const DEFAULT_TITLE = "AWS Blog Post";
export const READ_ERROR_PREFIX = "Error reading blog post: ";

export function validatePostUrl(url: string): void {
    if (!url.startsWith(BLOGS_ROOT)) {
        throw new BlogInputError("URL must be from aws.amazon.com/blogs domain");
    }
}

export function formatMetadataHeader(meta: ExtractedMetadata): string {
    let header = `# ${meta.title ?? DEFAULT_TITLE}\n\n`;
    if (meta.author) header += `**Author:** ${meta.author}\n`;
    if (meta.publishedAt) header += `**Published:** ${meta.publishedAt.toISOString()}\n`;
    if (meta.category) header += `**Category:** ${meta.category}\n`;
    header += `**URL:** ${meta.sourceUrl}\n\n---\n\n`;
    return header;
}

/** Full Markdown document (header + body) for a fetched page. */
export function renderPost(html: string, url: string): string {
    const metadata = extractMetadata(parse(html, { comment: false }), url);
    return formatMetadataHeader(metadata) + normalizeHtml(html);
}

export async function readBlogPost(
    http: HttpClient,
    url: string,
    maxLength: number,
    startIndex: number,
): Promise<string> {
    try {
        validatePostUrl(url);
        logger.info(`Fetching blog post: ${url}`);
        const html = await http.getText(url, { headers: { Accept: HTML_ACCEPT }, timeoutMs: FETCH_TIMEOUT_MS });
        return paginate(renderPost(html, url), startIndex, maxLength);
    } catch (err) {
        logger.error(`Error reading blog post ${url}:`, err);
        return READ_ERROR_PREFIX + describeError(err);
    }
}
