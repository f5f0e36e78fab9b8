// src/blogs/search.ts — Keyword search over category feeds.
//
// Scoring is a fixed lexical heuristic: +2 when the query is a case-insensitive
// substring of the title, +1 when it is one of the summary. Zero-score entries are
// dropped. Ties keep feed order (Array#sort is stable).

import { allCategories, lookupCategory } from "./categories.js";
import { fanOut, fanOutCategories, perCategoryLimit } from "./fan-out.js";
import { fetchCategoryPosts } from "./feeds.js";
import type { CategoryInfo, Post, SearchResult } from "./types.js";
import { SEARCH_OVERFETCH_FACTOR } from "../config/index.js";
import type { HttpClient } from "../http/client.js";
import { log } from "../logs/logger.js";

const logger = log("blogs/search");

export const TITLE_WEIGHT = 2;
export const SUMMARY_WEIGHT = 1;

export function scoreEntry(query: string, title: string, summary: string): number {
    const q = query.toLowerCase();
    let score = 0;
    if (title.toLowerCase().includes(q)) score += TITLE_WEIGHT;
    if (summary.toLowerCase().includes(q)) score += SUMMARY_WEIGHT;
    return score;
}

/** Matching posts as results, in input order. */
export function scorePosts(query: string, posts: Post[]): SearchResult[] {
    const results: SearchResult[] = [];
    for (const post of posts) {
        const relevance = scoreEntry(query, post.title, post.summary);
        if (relevance <= 0) continue;
        results.push({
            title: post.title,
            url: post.url,
            summary: post.summary,
            publishedAt: post.publishedAt,
            category: post.category,
            relevance,
        });
    }
    return results;
}

export function rankResults(results: SearchResult[], limit: number): SearchResult[] {
    return [...results].sort((a, b) => b.relevance - a.relevance).slice(0, limit);
}

/** Best `limit` matches among the first `limit * 2` entries of one feed. */
export async function searchCategory(
    http: HttpClient,
    category: CategoryInfo,
    query: string,
    limit: number,
): Promise<SearchResult[]> {
    const posts = await fetchCategoryPosts(http, category.key, limit * SEARCH_OVERFETCH_FACTOR);
    return rankResults(scorePosts(query, posts), limit);
}

/**
 * Search one category, or — when `categoryKey` is absent or unknown — the fan-out
 * categories. Each one's share of `limit` is sized against the whole registry, not
 * just the categories read. Never throws.
 */
export async function searchPosts(
    http: HttpClient,
    query: string,
    categoryKey: string | undefined,
    limit: number,
): Promise<SearchResult[]> {
    try {
        const category = categoryKey ? lookupCategory(categoryKey) : undefined;
        if (category) {
            return await searchCategory(http, category, query, limit);
        }
        if (categoryKey) logger.info(`Unknown category "${categoryKey}", searching all`);

        const categories = fanOutCategories();
        const perLimit = perCategoryLimit(limit, allCategories().length);
        const merged = await fanOut(
            categories,
            (c) => searchCategory(http, c, query, perLimit),
            logger,
        );
        return rankResults(merged, limit);
    } catch (err) {
        logger.error("Error searching blog posts:", err);
        return [];
    }
}
