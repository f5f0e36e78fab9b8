// Public library surface.

export type { CategoryInfo, FeedEntry, Post, SearchResult, ExtractedMetadata } from './types.js';
export type { CategoryRecord, PostRecord, SearchResultRecord } from './wire.js';
export { lookupCategory, allCategories, categoryForFeedUrl, BLOGS_ROOT, FEED_SUFFIX } from './categories.js';
export { parseDateString } from './dates.js';
export { extractMetadata, categoryFromUrl } from './metadata.js';
export { normalizeHtml, tidyMarkdown, htmlToMarkdown } from './content.js';
export { paginate, parseContinuationIndex, NO_MORE_CONTENT } from './paginate.js';
export { parseFeed } from './feed-parser.js';
export { fetchCategoryPosts } from './feeds.js';
export { searchPosts, scoreEntry } from './search.js';
export { getRecentPosts } from './recent.js';
export { readBlogPost } from './reader.js';
export { BlogService } from './service.js';
export { categoryRecord, postRecord, searchResultRecord } from './wire.js';
