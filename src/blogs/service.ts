// src/blogs/service.ts — BlogService: the five blog operations bound to one HttpClient.

import { allCategories } from "./categories.js";
import { fetchCategoryPosts } from "./feeds.js";
import { readBlogPost } from "./reader.js";
import { getRecentPosts } from "./recent.js";
import { searchPosts } from "./search.js";
import type { CategoryInfo, Post, SearchResult } from "./types.js";
import { FetchHttpClient, type HttpClient } from "../http/client.js";

export class BlogService {
    readonly http: HttpClient;

    constructor(http: HttpClient = new FetchHttpClient()) {
        this.http = http;
    }

    /** Markdown chunk of a post, or an "Error reading blog post: ..." string. */
    readPost(url: string, maxLength: number, startIndex: number): Promise<string> {
        return readBlogPost(this.http, url, maxLength, startIndex);
    }

    search(query: string, category: string | undefined, limit: number): Promise<SearchResult[]> {
        return searchPosts(this.http, query, category, limit);
    }

    listCategories(): readonly CategoryInfo[] {
        return allCategories();
    }

    recentPosts(category: string | undefined, limit: number): Promise<Post[]> {
        return getRecentPosts(this.http, category, limit);
    }

    /** Rejects with BlogInputError for an unknown category; feed failures yield []. */
    async rssFeed(category: string, limit: number): Promise<Post[]> {
        return fetchCategoryPosts(this.http, category, limit);
    }
}
