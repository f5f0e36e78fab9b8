/**
 * MCP tool registration — registers the five blog tools on an McpServer.
 *
 * Handlers never throw: caller errors come back as `isError` text, feed and
 * page failures as empty lists or an "Error reading blog post" string.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { BlogService } from './blogs/service.js';
import { categoryRecord, postRecord, searchResultRecord } from './blogs/wire.js';
import { BlogInputError, describeError } from './errors.js';
import { activity } from './logs/activity-log.js';
import { log } from './logs/logger.js';

const logger = log('tools');

// ── Input shapes (shared with the AI SDK tool set) ───

export const readBlogPostShape = {
    url: z.string().describe('URL of the AWS blog post, e.g. https://aws.amazon.com/blogs/aws/some-post/'),
    max_length: z.number().int().gt(0).lt(1_000_000).default(5000)
        .describe('Maximum number of characters to return (default: 5000).'),
    start_index: z.number().int().min(0).default(0)
        .describe('Character offset to start from. Use the value from a truncation notice to continue.'),
};

export const searchBlogPostsShape = {
    query: z.string().describe('Keywords to look for in post titles and summaries, e.g. "Lambda".'),
    category: z.string().optional()
        .describe('Optional category slug such as "machine-learning" or "security". Omit to search several blogs.'),
    limit: z.number().int().min(1).max(50).default(10).describe('Max results (default: 10).'),
};

export const recentPostsShape = {
    category: z.string().optional().describe('Category slug. Omit for the newest posts across several blogs.'),
    limit: z.number().int().min(1).max(50).default(10).describe('Max posts (default: 10).'),
};

export const rssFeedShape = {
    category: z.string().describe('Category slug, e.g. "compute". See list_blog_categories.'),
    limit: z.number().int().min(1).max(100).default(20).describe('Max entries (default: 20).'),
};

// ── Descriptions ─────────────────────────────────────

export const TOOL_DESCRIPTIONS = {
    read_blog_post:
        'Fetch an AWS blog post (https://aws.amazon.com/blogs/...) and return it as Markdown with a ' +
        'title/author/date/category header. Long posts are paginated: when the text ends with ' +
        '"[Content truncated. Use start_index=N ...]", call again with start_index=N.',
    search_blog_posts:
        'Search recent AWS blog posts by keyword. Title matches rank above summary matches. ' +
        'Optionally restrict to one category.',
    list_blog_categories:
        'List the AWS blog categories this server knows, with their slugs, listing URLs and RSS feeds.',
    get_recent_posts:
        'Newest posts from one category, or merged across several blogs when no category is given.',
    get_rss_feed:
        'Parsed RSS feed entries for one category, in feed order.',
} as const;

// ── Result helpers ───────────────────────────────────

function text(body: string): CallToolResult {
    return { content: [{ type: 'text', text: body }] };
}

function errorText(body: string): CallToolResult {
    return { content: [{ type: 'text', text: body }], isError: true };
}

function json(value: unknown): CallToolResult {
    return text(JSON.stringify(value, null, 2));
}

function resultSize(result: CallToolResult): number {
    return result.content.reduce((n, c) => n + (c.type === 'text' ? c.text.length : 0), 0);
}

/** Run a handler with activity logging; turn anything thrown into an isError result. */
async function run(tool: string, args: unknown, handler: () => Promise<CallToolResult>): Promise<CallToolResult> {
    activity.toolCall(tool, args);
    const started = Date.now();
    let result: CallToolResult;
    try {
        result = await handler();
    } catch (err) {
        if (err instanceof BlogInputError) {
            logger.warn(`${tool}: ${err.message}`);
            result = errorText(err.message);
        } else {
            logger.error(`${tool} failed:`, err);
            result = errorText(`${tool} failed: ${describeError(err)}`);
        }
    }
    activity.toolResult(tool, Date.now() - started, result.isError === true, resultSize(result));
    return result;
}

export function registerTools(server: McpServer, service: BlogService): void {
    server.tool('read_blog_post', TOOL_DESCRIPTIONS.read_blog_post, readBlogPostShape,
        async (args) => run('read_blog_post', args, async () =>
            text(await service.readPost(args.url, args.max_length, args.start_index))));

    server.tool('search_blog_posts', TOOL_DESCRIPTIONS.search_blog_posts, searchBlogPostsShape,
        async (args) => run('search_blog_posts', args, async () => {
            logger.info(`Searching blog posts: query="${args.query}", category="${args.category ?? ''}"`);
            const results = await service.search(args.query, args.category, args.limit);
            return json(results.map(searchResultRecord));
        }));

    server.tool('list_blog_categories', TOOL_DESCRIPTIONS.list_blog_categories, {},
        async () => run('list_blog_categories', {}, async () =>
            json(service.listCategories().map(categoryRecord))));

    server.tool('get_recent_posts', TOOL_DESCRIPTIONS.get_recent_posts, recentPostsShape,
        async (args) => run('get_recent_posts', args, async () => {
            logger.info(`Getting recent posts: category="${args.category ?? ''}", limit=${args.limit}`);
            const posts = await service.recentPosts(args.category, args.limit);
            return json(posts.map(postRecord));
        }));

    server.tool('get_rss_feed', TOOL_DESCRIPTIONS.get_rss_feed, rssFeedShape,
        async (args) => run('get_rss_feed', args, async () => {
            logger.info(`Getting RSS feed for category: ${args.category}`);
            const posts = await service.rssFeed(args.category, args.limit);
            return json(posts.map(postRecord));
        }));
}
