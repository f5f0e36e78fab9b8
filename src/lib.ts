/**
 * Library entry — everything needed to embed the blog tools in another process.
 *
 *   import { BlogService, createBlogsServer, createBlogTools } from "aws-blogs-mcp-server";
 */

export * from './blogs/index.js';
export { FetchHttpClient } from './http/client.js';
export type { HttpClient, GetTextOptions } from './http/client.js';
export { BlogInputError, UpstreamError, describeError } from './errors.js';
export { createBlogsServer, startStdioServer, startHttpServer } from './server.js';
export { registerTools } from './tools.js';
export { createBlogTools } from './ai-tools.js';
export { loadConfig, getConfig } from './config/index.js';
export type { BlogsServerConfig } from './config/index.js';
