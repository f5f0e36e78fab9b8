// src/blogs/fan-out.ts — Run one task per category concurrently, keep what succeeded.
//
// Results are concatenated in registry order, not completion order, so callers'
// stable sorts break ties by category position. A rejected task is logged and skipped.

import { allCategories } from "./categories.js";
import type { CategoryInfo } from "./types.js";
import { FAN_OUT_CATEGORIES } from "../config/index.js";
import { describeError } from "../errors.js";
import type { Logger } from "../logs/logger.js";

/** Categories a request without a (known) category filter reads from. */
export function fanOutCategories(): readonly CategoryInfo[] {
    return allCategories().slice(0, FAN_OUT_CATEGORIES);
}

/** Per-source share of `limit`; rounds up by one so the merged list is not under-filled. */
export function perCategoryLimit(limit: number, count: number): number {
    return Math.floor(limit / count) + 1;
}

export async function fanOut<T>(
    categories: readonly CategoryInfo[],
    task: (category: CategoryInfo) => Promise<T[]>,
    logger: Logger,
): Promise<T[]> {
    const settled = await Promise.allSettled(categories.map((c) => task(c)));
    const merged: T[] = [];
    settled.forEach((result, i) => {
        if (result.status === "fulfilled") {
            merged.push(...result.value);
        } else {
            logger.warn(`Skipping category ${categories[i].key}: ${describeError(result.reason)}`);
        }
    });
    return merged;
}
