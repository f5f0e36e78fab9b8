// src/blogs/content.ts — Blog page HTML → readable Markdown.
//
// Strip chrome (scripts, nav, header/footer), pick the main content region by an
// ordered selector list, convert with turndown, then tidy the whitespace.
// If anything throws, the caller gets the original HTML back instead of an error.

import { NodeType, parse, type HTMLElement, type Node } from "node-html-parser";
import TurndownService from "turndown";
import { gfm } from "turndown-plugin-gfm";
import { log } from "../logs/logger.js";

const logger = log("blogs/content");

export const STRIPPED_TAGS = ["script", "style", "nav", "header", "footer"] as const;

export const CONTENT_SELECTORS = [
    "article",
    ".post-content",
    ".entry-content",
    ".blog-post-content",
    "main",
    "#main-content",
] as const;

/** HTML fragment → Markdown */
export type HtmlConverter = (html: string) => string;

const turndown = new TurndownService({
    headingStyle: "atx",
    codeBlockStyle: "fenced",
    bulletListMarker: "-",
});
turndown.use(gfm);

export const htmlToMarkdown: HtmlConverter = (html) => turndown.turndown(html);

function stripChrome(root: HTMLElement): void {
    for (const tag of STRIPPED_TAGS) {
        root.querySelectorAll(tag).forEach((el) => el.remove());
    }
}

function hasContent(node: Node): boolean {
    return node.nodeType === NodeType.ELEMENT_NODE || node.rawText.trim() !== "";
}

/** First selector match with an element or non-blank text inside; undefined means "use the whole document". */
export function selectMainContent(root: HTMLElement): HTMLElement | undefined {
    for (const selector of CONTENT_SELECTORS) {
        const el = root.querySelector(selector);
        if (el && el.childNodes.some(hasContent)) return el;
    }
    return undefined;
}

/**
 * Whitespace cleanup on converted Markdown:
 * runs of 3+ newlines (whitespace in between allowed) → one blank line,
 * leading spaces/tabs dropped on every line, whole result trimmed.
 */
export function tidyMarkdown(markdown: string): string {
    return markdown
        .replace(/\n\s*\n\s*\n/g, "\n\n")
        .replace(/^[^\S\n]+/gm, "")
        .trim();
}

export function normalizeHtml(html: string, convert: HtmlConverter = htmlToMarkdown): string {
    try {
        const root = parse(html, { comment: false });
        stripChrome(root);
        const main = selectMainContent(root);
        const markdown = convert(main ? main.outerHTML : root.innerHTML);
        return tidyMarkdown(markdown);
    } catch (err) {
        logger.error("Error cleaning HTML content:", err);
        return html;
    }
}
