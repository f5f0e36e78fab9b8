// src/blogs/recent.ts — Newest posts for one category or across the fan-out set.

import { lookupCategory } from "./categories.js";
import { fanOut, fanOutCategories, perCategoryLimit } from "./fan-out.js";
import { fetchCategoryPosts } from "./feeds.js";
import type { Post } from "./types.js";
import type { HttpClient } from "../http/client.js";
import { log } from "../logs/logger.js";

const logger = log("blogs/recent");

/** Newest first; posts without a date go last, ties keep their input order. */
export function sortByPublishedDesc(posts: Post[]): Post[] {
    const time = (p: Post) => p.publishedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
    return [...posts].sort((a, b) => {
        const ta = time(a);
        const tb = time(b);
        if (ta === tb) return 0;
        return tb > ta ? 1 : -1;
    });
}

export async function getRecentPosts(
    http: HttpClient,
    categoryKey: string | undefined,
    limit: number,
): Promise<Post[]> {
    try {
        const category = categoryKey ? lookupCategory(categoryKey) : undefined;
        let posts: Post[];
        if (category) {
            posts = await fetchCategoryPosts(http, category.key, limit);
        } else {
            const categories = fanOutCategories();
            const perLimit = perCategoryLimit(limit, categories.length);
            posts = await fanOut(categories, (c) => fetchCategoryPosts(http, c.key, perLimit), logger);
        }
        return sortByPublishedDesc(posts).slice(0, limit);
    } catch (err) {
        logger.error("Error getting recent posts:", err);
        return [];
    }
}
