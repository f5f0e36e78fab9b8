// src/blogs/feed-parser.ts — RSS 2.0 / RSS 1.0 (RDF) / Atom → FeedEntry[]
//
// Entries come back in document order. Fields are copied as found (summary keeps
// its HTML); only the publish date is interpreted. Throws on XML that does not
// validate or is not a feed — the feed fetcher turns that into "no posts".

import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { FeedEntry } from "./types.js";

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    textNodeName: "#text",
    isArray: (name) => ["item", "entry", "category", "link"].includes(name),
    trimValues: true,
    parseTagValue: false,
    htmlEntities: true,
});

type XmlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is XmlRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
    if (value === undefined || value === null) return [];
    return Array.isArray(value) ? value : [value];
}

/** Text of a node whether it is a bare string, a {#text} object, or a list of either. */
function textOf(value: unknown): string | undefined {
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    if (Array.isArray(value)) return value.length ? textOf(value[0]) : undefined;
    if (isRecord(value)) return textOf(value["#text"]);
    return undefined;
}

function firstText(node: XmlRecord, ...keys: string[]): string | undefined {
    for (const key of keys) {
        const text = textOf(node[key]);
        if (text) return text;
    }
    return undefined;
}

function toDate(raw: string | undefined): Date | undefined {
    if (!raw) return undefined;
    const date = new Date(raw);
    return isNaN(date.getTime()) ? undefined : date;
}

function tagsOf(node: XmlRecord): string[] {
    const tags: string[] = [];
    for (const cat of asList(node["category"])) {
        // Atom carries the value in term=, RSS in the element text
        const term = isRecord(cat) ? cat["@_term"] : undefined;
        const value = typeof term === "string" ? term : textOf(cat);
        if (value) tags.push(value);
    }
    return tags;
}

function atomLink(node: XmlRecord): string | undefined {
    const links = asList(node["link"]).filter(isRecord);
    const alternate = links.find((l) => l["@_rel"] === undefined || l["@_rel"] === "alternate");
    const href = (alternate ?? links[0])?.["@_href"];
    return typeof href === "string" ? href : undefined;
}

function atomAuthor(node: XmlRecord): string | undefined {
    const author = asList(node["author"])[0];
    return isRecord(author) ? textOf(author["name"]) : textOf(author);
}

function parseRssItem(item: XmlRecord): FeedEntry {
    return {
        title: firstText(item, "title"),
        link: firstText(item, "link", "guid"),
        summary: firstText(item, "description", "content:encoded"),
        author: firstText(item, "dc:creator", "author"),
        published: toDate(firstText(item, "pubDate", "dc:date")),
        tags: tagsOf(item),
    };
}

function parseAtomEntry(entry: XmlRecord): FeedEntry {
    return {
        title: firstText(entry, "title"),
        link: atomLink(entry),
        summary: firstText(entry, "summary", "content"),
        author: atomAuthor(entry),
        published: toDate(firstText(entry, "published", "issued")),
        tags: tagsOf(entry),
    };
}

export function parseFeed(xml: string): FeedEntry[] {
    const valid = XMLValidator.validate(xml);
    if (valid !== true) {
        throw new Error(`Malformed feed XML (line ${valid.err.line}): ${valid.err.msg}`);
    }

    const doc: unknown = parser.parse(xml);
    if (!isRecord(doc)) throw new Error("Empty feed document");

    const atom = doc["feed"];
    if (isRecord(atom)) {
        return asList(atom["entry"]).filter(isRecord).map(parseAtomEntry);
    }

    const rss = doc["rss"];
    if (isRecord(rss)) {
        const channel = asList(rss["channel"]).find(isRecord);
        return channel ? asList(channel["item"]).filter(isRecord).map(parseRssItem) : [];
    }

    // RSS 1.0 keeps items beside the channel, not inside it
    const rdf = doc["rdf:RDF"];
    if (isRecord(rdf)) {
        return asList(rdf["item"]).filter(isRecord).map(parseRssItem);
    }

    throw new Error("Not an RSS or Atom document");
}
