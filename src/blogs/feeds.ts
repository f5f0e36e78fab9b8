// src/blogs/feeds.ts — One category's RSS feed → Post[]
//
// Feed order is kept as-is (feeds list newest first). A fetch or parse failure is
// logged and reported as an empty list so one bad feed never sinks a multi-feed
// request. Only an unknown category key throws.

import { lookupCategory } from "./categories.js";
import { parseFeed } from "./feed-parser.js";
import type { CategoryInfo, FeedEntry, Post } from "./types.js";
import { FEED_ACCEPT, type HttpClient } from "../http/client.js";
import { FETCH_TIMEOUT_MS } from "../config/index.js";
import { BlogInputError, describeError } from "../errors.js";
import { log } from "../logs/logger.js";

const logger = log("blogs/feeds");

export function unknownCategoryMessage(key: string): string {
    return `Unknown category: ${key}. Use list_blog_categories to see available options.`;
}

export function requireCategory(key: string): CategoryInfo {
    const category = lookupCategory(key);
    if (!category) throw new BlogInputError(unknownCategoryMessage(key));
    return category;
}

export function entryToPost(entry: FeedEntry, category: CategoryInfo): Post {
    const post: Post = {
        title: entry.title ?? "",
        url: entry.link ?? "",
        summary: entry.summary ?? "",
        author: entry.author ?? "",
        publishedAt: entry.published,
        category: category.displayName,
    };
    if (entry.tags.length) post.tags = entry.tags;
    return post;
}

/** Fetch and parse a category feed. Rejects on transport or parse failure. */
export async function fetchFeedEntries(http: HttpClient, category: CategoryInfo): Promise<FeedEntry[]> {
    const xml = await http.getText(category.feedUrl, {
        headers: { Accept: FEED_ACCEPT },
        timeoutMs: FETCH_TIMEOUT_MS,
    });
    return parseFeed(xml);
}

/**
 * First `limit` posts of a category's feed.
 * Throws BlogInputError for an unknown key; every other failure yields [].
 */
export async function fetchCategoryPosts(http: HttpClient, key: string, limit: number): Promise<Post[]> {
    const category = requireCategory(key);

    let entries: FeedEntry[];
    try {
        entries = await fetchFeedEntries(http, category);
    } catch (err) {
        logger.warn(`Error getting posts from RSS feed ${category.feedUrl}: ${describeError(err)}`);
        return [];
    }

    logger.debug(`${category.key}: ${entries.length} entries, keeping ${Math.min(limit, entries.length)}`);
    return entries.slice(0, limit).map((entry) => entryToPost(entry, category));
}
