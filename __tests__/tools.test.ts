import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { BlogService } from "../src/blogs/service.js";
import { createBlogTools } from "../src/ai-tools.js";
import { createBlogsServer } from "../src/server.js";
import { TOOL_DESCRIPTIONS } from "../src/tools.js";
import { FakeHttpClient, feedUrlOf, octoberDate, rssFeed } from "./helpers/fake-http.js";

const TOOL_NAMES = [
    "read_blog_post",
    "search_blog_posts",
    "list_blog_categories",
    "get_recent_posts",
    "get_rss_feed",
];

describe("MCP tools", () => {
    let http: FakeHttpClient;
    let server: McpServer;
    let client: Client;

    beforeEach(async () => {
        http = new FakeHttpClient();
        server = createBlogsServer(new BlogService(http));
        client = new Client({ name: "test-client", version: "1.0.0" });
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
    });

    afterEach(async () => {
        await client.close();
        await server.close();
    });

    async function call(name: string, args: Record<string, unknown> = {}) {
        const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
        const first = result.content[0];
        if (first?.type !== "text") throw new Error(`expected text content from ${name}`);
        return { text: first.text, isError: result.isError === true };
    }

    it("lists the five tools", async () => {
        const { tools } = await client.listTools();
        expect(tools.map((t) => t.name).sort()).toEqual([...TOOL_NAMES].sort());
    });

    it("list_blog_categories returns snake_case records", async () => {
        const { text, isError } = await call("list_blog_categories");
        const records: unknown = JSON.parse(text);

        expect(isError).toBe(false);
        expect(Array.isArray(records) && records.length).toBe(11);
        expect(Array.isArray(records) && records[0]).toEqual({
            name: "AWS News Blog",
            slug: "aws",
            url: "https://aws.amazon.com/blogs/aws/",
            rss_url: "https://aws.amazon.com/blogs/aws/feed/",
        });
    });

    it("get_rss_feed returns posts with ISO dates and null for missing fields", async () => {
        http.route(feedUrlOf("security"), rssFeed([
            {
                title: "Least privilege",
                link: "https://aws.amazon.com/blogs/security/least-privilege/",
                description: "IAM policies",
                pubDate: octoberDate(14),
                creator: "Sam Poe",
                categories: ["IAM"],
            },
            { title: "Undated", link: "https://aws.amazon.com/blogs/security/undated/" },
        ]));

        const { text, isError } = await call("get_rss_feed", { category: "security" });

        expect(isError).toBe(false);
        expect(JSON.parse(text)).toEqual([
            {
                title: "Least privilege",
                url: "https://aws.amazon.com/blogs/security/least-privilege/",
                summary: "IAM policies",
                author: "Sam Poe",
                published_date: "2025-10-14T12:00:00.000Z",
                category: "AWS Security Blog",
                tags: ["IAM"],
            },
            {
                title: "Undated",
                url: "https://aws.amazon.com/blogs/security/undated/",
                summary: "",
                author: "",
                published_date: null,
                category: "AWS Security Blog",
                tags: null,
            },
        ]);
    });

    it("get_rss_feed flags an unknown category as an error", async () => {
        const { text, isError } = await call("get_rss_feed", { category: "gaming" });

        expect(isError).toBe(true);
        expect(text).toBe("Unknown category: gaming. Use list_blog_categories to see available options.");
        expect(http.requests).toEqual([]);
    });

    it("search_blog_posts reports relevance_score", async () => {
        http.route(feedUrlOf("storage"), rssFeed([
            { title: "S3 Express", link: "https://aws.amazon.com/blogs/storage/s3-express/", description: "Fast S3" },
        ]));

        const { text } = await call("search_blog_posts", { query: "s3", category: "storage", limit: 3 });

        expect(JSON.parse(text)).toEqual([{
            title: "S3 Express",
            url: "https://aws.amazon.com/blogs/storage/s3-express/",
            summary: "Fast S3",
            published_date: null,
            category: "AWS Storage Blog",
            relevance_score: 3,
        }]);
    });

    it("get_recent_posts returns [] when every feed fails", async () => {
        const { text, isError } = await call("get_recent_posts", {});
        expect(isError).toBe(false);
        expect(JSON.parse(text)).toEqual([]);
    });

    it("read_blog_post returns errors as plain text", async () => {
        const { text, isError } = await call("read_blog_post", { url: "https://example.com/not-aws" });

        expect(isError).toBe(false);
        expect(text).toBe("Error reading blog post: URL must be from aws.amazon.com/blogs domain");
    });

    it("read_blog_post applies the default max_length and start_index", async () => {
        const url = "https://aws.amazon.com/blogs/aws/short/";
        http.route(url, "<html><body><h1>Short</h1><article><p>Tiny post.</p></article></body></html>");

        const { text } = await call("read_blog_post", { url });

        expect(text).toBe(
            `# Short\n\n**Category:** AWS News Blog\n**URL:** ${url}\n\n---\n\nTiny post.`,
        );
    });
});

describe("createBlogTools", () => {
    it("exposes the same five tools with the MCP descriptions", () => {
        const tools = createBlogTools(new BlogService(new FakeHttpClient()));

        expect(Object.keys(tools).sort()).toEqual([...TOOL_NAMES].sort());
        expect(tools.get_rss_feed.description).toBe(TOOL_DESCRIPTIONS.get_rss_feed);
        expect(tools.read_blog_post.description).toBe(TOOL_DESCRIPTIONS.read_blog_post);
    });
});
