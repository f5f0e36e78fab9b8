import { describe, it, expect } from "vitest";
import { rankResults, scoreEntry, searchPosts } from "../../src/blogs/search.js";
import type { SearchResult } from "../../src/blogs/types.js";
import { FakeHttpClient, feedUrlOf, octoberDate, rssFeed, type RssItem } from "../helpers/fake-http.js";

function item(slug: string, title: string, description: string, day = 1): RssItem {
    return {
        title,
        link: `https://aws.amazon.com/blogs/${slug}/`,
        description,
        pubDate: octoberDate(day),
    };
}

describe("scoreEntry", () => {
    it("weights title matches above summary matches", () => {
        expect(scoreEntry("lambda", "Lambda tips", "Nothing relevant")).toBe(2);
        expect(scoreEntry("lambda", "Other", "Using AWS LAMBDA")).toBe(1);
        expect(scoreEntry("Lambda", "lambda tips", "more lambda")).toBe(3);
        expect(scoreEntry("lambda", "S3", "Buckets")).toBe(0);
    });

    it("matches the whole query as one substring", () => {
        expect(scoreEntry("lambda layers", "Lambda and layers", "")).toBe(0);
        expect(scoreEntry("lambda layers", "Sharing Lambda layers", "")).toBe(2);
    });
});

describe("rankResults", () => {
    const result = (title: string, relevance: number): SearchResult => ({
        title,
        url: `https://aws.amazon.com/blogs/aws/${title}/`,
        summary: "",
        relevance,
    });

    it("sorts by relevance, keeps ties in input order, truncates", () => {
        const ranked = rankResults([result("a", 1), result("b", 3), result("c", 1), result("d", 3)], 3);
        expect(ranked.map((r) => r.title)).toEqual(["b", "d", "a"]);
    });
});

describe("searchPosts", () => {
    it("ranks the first limit*2 entries of a single category", async () => {
        const http = new FakeHttpClient().route(feedUrlOf("compute"), rssFeed([
            item("compute/one", "Containers on EC2", "Nothing to see"),
            item("compute/two", "Lambda tips", "Cold starts"),
            item("compute/three", "Batch jobs", "Triggered by Lambda"),
            item("compute/four", "Lambda layers", "Sharing Lambda code"),
            item("compute/five", "Lambda pricing", "Lambda costs"),
        ]));

        const results = await searchPosts(http, "lambda", "compute", 2);

        expect(results).toEqual([
            {
                title: "Lambda layers",
                url: "https://aws.amazon.com/blogs/compute/four/",
                summary: "Sharing Lambda code",
                publishedAt: new Date("2025-10-01T12:00:00.000Z"),
                category: "AWS Compute Blog",
                relevance: 3,
            },
            {
                title: "Lambda tips",
                url: "https://aws.amazon.com/blogs/compute/two/",
                summary: "Cold starts",
                publishedAt: new Date("2025-10-01T12:00:00.000Z"),
                category: "AWS Compute Blog",
                relevance: 2,
            },
        ]);
        expect(http.requestedUrls).toEqual(["https://aws.amazon.com/blogs/compute/feed/"]);
    });

    it("returns [] when nothing matches", async () => {
        const http = new FakeHttpClient().route(feedUrlOf("compute"), rssFeed([item("compute/x", "EC2", "Instances")]));
        expect(await searchPosts(http, "quantum", "compute", 5)).toEqual([]);
    });

    it("fans out over the first five categories when no category is given", async () => {
        const http = new FakeHttpClient()
            .route(feedUrlOf("aws"), rssFeed([item("aws/launch", "Bedrock launch", "New models")]))
            .route(feedUrlOf("architecture"), rssFeed([
                item("architecture/ref", "Bedrock reference architecture", "Bedrock at scale"),
            ]))
            .route(feedUrlOf("compute"), new Error("connection reset"))
            .route(feedUrlOf("database"), rssFeed([
                item("database/vectors", "Vector search", "Pairs well with Bedrock"),
                item("database/other", "Aurora", "Storage"),
            ]));

        const results = await searchPosts(http, "bedrock", undefined, 10);

        expect(results.map((r) => [r.title, r.relevance, r.category])).toEqual([
            ["Bedrock reference architecture", 3, "AWS Architecture Blog"],
            ["Bedrock launch", 2, "AWS News Blog"],
            ["Vector search", 1, "Database"],
        ]);
        expect(http.requestedUrls).toEqual([
            "https://aws.amazon.com/blogs/aws/feed/",
            "https://aws.amazon.com/blogs/architecture/feed/",
            "https://aws.amazon.com/blogs/compute/feed/",
            "https://aws.amazon.com/blogs/containers/feed/",
            "https://aws.amazon.com/blogs/database/feed/",
        ]);
    });

    it("treats an unknown category as no filter", async () => {
        const http = new FakeHttpClient()
            .route(feedUrlOf("containers"), rssFeed([item("containers/eks", "EKS upgrades", "Kubernetes")]));

        const results = await searchPosts(http, "eks", "not-a-blog", 5);

        expect(results.map((r) => r.url)).toEqual(["https://aws.amazon.com/blogs/containers/eks/"]);
        expect(http.requestedUrls).toHaveLength(5);
    });

    it("caps the merged result list at the limit", async () => {
        const many = (slug: string) => rssFeed([1, 2, 3, 4].map((n) => item(`${slug}/${n}`, `S3 post ${n}`, "")));
        const http = new FakeHttpClient();
        for (const key of ["aws", "architecture", "compute", "containers", "database"]) {
            http.route(feedUrlOf(key), many(key));
        }

        const results = await searchPosts(http, "s3", undefined, 4);

        // floor(4 / 11) + 1 = 1 match per category, 5 merged, 4 kept
        expect(results.map((r) => r.url)).toEqual([
            "https://aws.amazon.com/blogs/aws/1/",
            "https://aws.amazon.com/blogs/architecture/1/",
            "https://aws.amazon.com/blogs/compute/1/",
            "https://aws.amazon.com/blogs/containers/1/",
        ]);
    });

    it("sizes each category's share against the whole registry", async () => {
        const many = (slug: string) => rssFeed([1, 2, 3, 4].map((n) => item(`${slug}/${n}`, `S3 post ${n}`, "")));
        const http = new FakeHttpClient();
        for (const key of ["aws", "architecture", "compute", "containers", "database"]) {
            http.route(feedUrlOf(key), many(key));
        }

        const results = await searchPosts(http, "s3", undefined, 10);

        // floor(10 / 11) + 1 = 1 match from each of the five feeds read
        expect(results.map((r) => r.url)).toEqual([
            "https://aws.amazon.com/blogs/aws/1/",
            "https://aws.amazon.com/blogs/architecture/1/",
            "https://aws.amazon.com/blogs/compute/1/",
            "https://aws.amazon.com/blogs/containers/1/",
            "https://aws.amazon.com/blogs/database/1/",
        ]);
    });
});
