/**
 * Category registry — the fixed set of AWS blogs this server reads.
 *
 * Built once from the literal table below and frozen; iteration order is
 * declaration order.
 */

import type { CategoryInfo } from './types.js';

export const BLOGS_ROOT = 'https://aws.amazon.com/blogs/';
export const FEED_SUFFIX = 'feed/';

const TABLE: ReadonlyArray<readonly [key: string, displayName: string]> = [
    ['aws', 'AWS News Blog'],
    ['architecture', 'AWS Architecture Blog'],
    ['compute', 'AWS Compute Blog'],
    ['containers', 'Containers'],
    ['database', 'Database'],
    ['developer', 'AWS Developer Tools Blog'],
    ['devops', 'AWS DevOps Blog'],
    ['machine-learning', 'AWS Machine Learning Blog'],
    ['networking-and-content-delivery', 'Networking & Content Delivery'],
    ['security', 'AWS Security Blog'],
    ['storage', 'AWS Storage Blog'],
];

const CATEGORIES: readonly CategoryInfo[] = Object.freeze(
    TABLE.map(([key, displayName]) => Object.freeze({
        key,
        displayName,
        listingUrl: `${BLOGS_ROOT}${key}/`,
        feedUrl: `${BLOGS_ROOT}${key}/${FEED_SUFFIX}`,
    })),
);

const BY_KEY: ReadonlyMap<string, CategoryInfo> = new Map(CATEGORIES.map(c => [c.key, c]));

export function lookupCategory(key: string): CategoryInfo | undefined {
    return BY_KEY.get(key);
}

export function allCategories(): readonly CategoryInfo[] {
    return CATEGORIES;
}

export function categoryForFeedUrl(feedUrl: string): CategoryInfo | undefined {
    return CATEGORIES.find(c => c.feedUrl === feedUrl);
}
