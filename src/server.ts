/**
 * AWS Blogs MCP server — McpServer construction and the two transports.
 *
 *   stdio (default)  — for clients that spawn the server as a subprocess
 *   http             — streamable HTTP on /mcp plus a /health probe
 *
 * Connect from VS Code (http):
 *   "mcp": { "servers": { "aws-blogs": { "type": "http", "url": "http://localhost:3333/mcp" } } }
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { allCategories } from './blogs/categories.js';
import type { BlogService } from './blogs/service.js';
import type { BlogsServerConfig } from './config/index.js';
import { describeError } from './errors.js';
import { log } from './logs/logger.js';
import { registerTools } from './tools.js';

const logger = log('server');

export const SERVER_NAME = 'aws-blogs-mcp-server';
export const SERVER_VERSION = '0.1.0';

export const SERVER_INSTRUCTIONS = `
# AWS Blogs MCP Server

Browse, search and read posts from the AWS blogs.

## Choosing a tool

- search_blog_posts — find posts about a service or topic ("EC2", "Bedrock agents")
- read_blog_post — full Markdown of a post you already have the URL for
- get_recent_posts — what was published lately, in one blog or across several
- list_blog_categories — the blog slugs accepted by the other tools
- get_rss_feed — raw feed entries for one blog

## Tips

- Long posts arrive in chunks. A chunk ending in "[Content truncated. Use start_index=N to continue reading.]"
  has more; call read_blog_post again with start_index=N.
- Search matches whole query strings against titles and summaries; prefer short, specific terms.
- Cite the post URL when you use its content.
`.trim();

export function createBlogsServer(service: BlogService): McpServer {
    const mcp = new McpServer(
        { name: SERVER_NAME, version: SERVER_VERSION },
        { instructions: SERVER_INSTRUCTIONS },
    );
    registerTools(mcp, service);
    return mcp;
}

export async function startStdioServer(service: BlogService): Promise<McpServer> {
    const mcp = createBlogsServer(service);
    await mcp.connect(new StdioServerTransport());
    logger.info('MCP server listening on stdio');
    return mcp;
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
    const chunks: Buffer[] = [];
    for await (const chunk of req) chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    const raw = Buffer.concat(chunks).toString('utf-8');
    return raw ? JSON.parse(raw) : undefined;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
}

/** Stateless MCP over HTTP: a fresh server + transport per request. */
async function handleMcpRequest(service: BlogService, req: IncomingMessage, res: ServerResponse): Promise<void> {
    const mcp = createBlogsServer(service);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on('close', () => {
        Promise.all([transport.close(), mcp.close()])
            .catch(err => logger.warn('Error closing MCP request transport:', describeError(err)));
    });
    await mcp.connect(transport);
    const body = req.method === 'POST' ? await readJsonBody(req) : undefined;
    await transport.handleRequest(req, res, body);
}

export function createHttpListener(service: BlogService, startedAt = Date.now()) {
    return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Accept, Mcp-Session-Id, Mcp-Protocol-Version');
        res.setHeader('Access-Control-Expose-Headers', 'Mcp-Session-Id');

        if (req.method === 'OPTIONS') { res.writeHead(204); res.end(); return; }

        const path = (req.url || '').split('?')[0];

        if (path === '/health' || path === '/') {
            sendJson(res, 200, {
                status: 'ok',
                server: SERVER_NAME,
                version: SERVER_VERSION,
                categories: allCategories().length,
                uptimeSeconds: Math.round((Date.now() - startedAt) / 1000),
            });
            return;
        }

        if (path === '/mcp') {
            try {
                await handleMcpRequest(service, req, res);
            } catch (err) {
                logger.error('MCP error:', err);
                if (!res.headersSent) sendJson(res, 500, { error: 'MCP server error' });
            }
            return;
        }

        sendJson(res, 404, { error: 'Not found. Use /mcp or /health.' });
    };
}

export function startHttpServer(service: BlogService, config: Pick<BlogsServerConfig, 'host' | 'port'>): Promise<Server> {
    const listener = createHttpListener(service);
    const server = createServer((req, res) => {
        listener(req, res).catch(err => logger.error('Unhandled request error:', err));
    });

    return new Promise((resolvePromise, reject) => {
        server.once('error', reject);
        server.listen(config.port, config.host, () => {
            server.off('error', reject);
            logger.info(`MCP:    http://${config.host}:${config.port}/mcp`);
            logger.info(`Health: http://${config.host}:${config.port}/health`);
            resolvePromise(server);
        });
    });
}
