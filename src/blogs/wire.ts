/**
 * Wire shapes — the JSON records tools hand back to clients.
 *
 * Field names are snake_case and dates are ISO-8601 strings (or null); these
 * are the public contract, independent of the in-process types.
 */

import type { CategoryInfo, Post, SearchResult } from './types.js';

export interface CategoryRecord {
    name: string;
    slug: string;
    url: string;
    rss_url: string;
}

export interface PostRecord {
    title: string;
    url: string;
    summary: string;
    author: string;
    published_date: string | null;
    category: string | null;
    tags: string[] | null;
}

export interface SearchResultRecord {
    title: string;
    url: string;
    summary: string;
    published_date: string | null;
    category: string | null;
    relevance_score: number;
}

export function categoryRecord(c: CategoryInfo): CategoryRecord {
    return { name: c.displayName, slug: c.key, url: c.listingUrl, rss_url: c.feedUrl };
}

export function postRecord(p: Post): PostRecord {
    return {
        title: p.title,
        url: p.url,
        summary: p.summary,
        author: p.author,
        published_date: p.publishedAt?.toISOString() ?? null,
        category: p.category ?? null,
        tags: p.tags ?? null,
    };
}

export function searchResultRecord(r: SearchResult): SearchResultRecord {
    return {
        title: r.title,
        url: r.url,
        summary: r.summary,
        published_date: r.publishedAt?.toISOString() ?? null,
        category: r.category ?? null,
        relevance_score: r.relevance,
    };
}
