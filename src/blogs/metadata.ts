// src/blogs/metadata.ts — Title / author / date / category for a blog page.
//
// Each field is an ordered selector chain; the first hit wins. A missing or
// malformed element is the same as "not found" — nothing here throws.

import type { HTMLElement } from "node-html-parser";
import { lookupCategory } from "./categories.js";
import { parseDateString } from "./dates.js";
import type { ExtractedMetadata } from "./types.js";
import { log } from "../logs/logger.js";

const logger = log("blogs/metadata");

export const TITLE_SELECTORS = ["h1", "title"] as const;

export const AUTHOR_SELECTORS = [
    ".author",
    ".post-author",
    ".entry-author",
    '[rel="author"]',
    ".byline",
] as const;

export const DATE_SELECTORS = [
    "time[datetime]",
    ".published",
    ".post-date",
    ".entry-date",
] as const;

const BLOGS_PATH = "/blogs/";

function firstText(root: HTMLElement, selectors: readonly string[]): string | undefined {
    for (const selector of selectors) {
        const el = root.querySelector(selector);
        if (!el) continue;
        const text = el.text.trim();
        return text || undefined;
    }
    return undefined;
}

function firstDate(root: HTMLElement): Date | undefined {
    for (const selector of DATE_SELECTORS) {
        const el = root.querySelector(selector);
        if (!el) continue;
        const raw = el.getAttribute("datetime") || el.text.trim();
        const date = parseDateString(raw);
        if (date) return date;
        logger.debug(`Unparseable date "${raw}" at ${selector}, trying next selector`);
    }
    return undefined;
}

/** Display name of the blog a URL belongs to, from the path segment after /blogs/. */
export function categoryFromUrl(url: string): string | undefined {
    const at = url.indexOf(BLOGS_PATH);
    if (at < 0) return undefined;
    const segment = url.slice(at + BLOGS_PATH.length).split("/")[0];
    return lookupCategory(segment)?.displayName;
}

export function extractMetadata(root: HTMLElement, sourceUrl: string): ExtractedMetadata {
    const metadata: ExtractedMetadata = { sourceUrl };
    try {
        metadata.title = firstText(root, TITLE_SELECTORS);
        metadata.author = firstText(root, AUTHOR_SELECTORS);
        metadata.publishedAt = firstDate(root);
    } catch (err) {
        logger.error("Metadata extraction failed for", sourceUrl, err);
    }
    metadata.category = categoryFromUrl(sourceUrl);
    return metadata;
}
