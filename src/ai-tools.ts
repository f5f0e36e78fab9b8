// src/ai-tools.ts — The blog tools as a Vercel AI SDK tool set.
//
// Same operations and input schemas as the MCP tools, for agents that run
// generateText/streamText in-process instead of talking MCP:
//
//   const tools = createBlogTools(new BlogService());
//   await generateText({ model, tools, prompt: "What's new in AWS Lambda?" });

import { tool } from "ai";
import { z } from "zod";
import type { BlogService } from "./blogs/service.js";
import { categoryRecord, postRecord, searchResultRecord } from "./blogs/wire.js";
import { describeError } from "./errors.js";
import {
    TOOL_DESCRIPTIONS,
    readBlogPostShape,
    recentPostsShape,
    rssFeedShape,
    searchBlogPostsShape,
} from "./tools.js";

export function createBlogTools(service: BlogService) {
    return {
        read_blog_post: tool({
            description: TOOL_DESCRIPTIONS.read_blog_post,
            inputSchema: z.object(readBlogPostShape),
            execute: async (input) => ({
                success: true,
                content: await service.readPost(input.url, input.max_length ?? 5000, input.start_index ?? 0),
            }),
        }),

        search_blog_posts: tool({
            description: TOOL_DESCRIPTIONS.search_blog_posts,
            inputSchema: z.object(searchBlogPostsShape),
            execute: async (input) => {
                const results = await service.search(input.query, input.category, input.limit ?? 10);
                return { success: true, results: results.map(searchResultRecord) };
            },
        }),

        list_blog_categories: tool({
            description: TOOL_DESCRIPTIONS.list_blog_categories,
            inputSchema: z.object({}),
            execute: async () => ({
                success: true,
                categories: service.listCategories().map(categoryRecord),
            }),
        }),

        get_recent_posts: tool({
            description: TOOL_DESCRIPTIONS.get_recent_posts,
            inputSchema: z.object(recentPostsShape),
            execute: async (input) => {
                const posts = await service.recentPosts(input.category, input.limit ?? 10);
                return { success: true, posts: posts.map(postRecord) };
            },
        }),

        get_rss_feed: tool({
            description: TOOL_DESCRIPTIONS.get_rss_feed,
            inputSchema: z.object(rssFeedShape),
            execute: async (input) => {
                try {
                    const posts = await service.rssFeed(input.category, input.limit ?? 20);
                    return { success: true, posts: posts.map(postRecord) };
                } catch (err) {
                    return { success: false, error: describeError(err) };
                }
            },
        }),
    };
}
