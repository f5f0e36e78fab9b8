/**
 * Blog types — categories, feed entries and the records the tools return.
 */

export interface CategoryInfo {
    /** Short key used in tool arguments, e.g. "security" */
    readonly key: string;
    readonly displayName: string;
    /** Human-facing listing page */
    readonly listingUrl: string;
    readonly feedUrl: string;
}

/** One entry as surfaced by the feed parser. Any field may be missing. */
export interface FeedEntry {
    title?: string;
    link?: string;
    summary?: string;
    author?: string;
    /** Feed-native publish time (pubDate / published / dc:date) */
    published?: Date;
    /** <category> values, in document order */
    tags: string[];
}

export interface Post {
    title: string;
    url: string;
    summary: string;
    author: string;
    publishedAt?: Date;
    /** Display name of the category the post was read from */
    category?: string;
    tags?: string[];
}

export interface SearchResult {
    title: string;
    url: string;
    summary: string;
    publishedAt?: Date;
    category?: string;
    /** Always > 0; entries scoring 0 are never returned */
    relevance: number;
}

export interface ExtractedMetadata {
    sourceUrl: string;
    title?: string;
    author?: string;
    publishedAt?: Date;
    category?: string;
}
