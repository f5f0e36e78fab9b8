#!/usr/bin/env node
/**
 * aws-blogs-mcp-server — process entry point.
 *
 * Usage:
 *   npx tsx src/index.ts                              # dev, stdio
 *   node dist/src/index.js                            # production (after build)
 *   BLOGS_MCP_TRANSPORT=http BLOGS_MCP_PORT=3333 node dist/src/index.js
 */

import type { Server } from 'http';
import { BlogService } from './blogs/service.js';
import { loadConfig } from './config/index.js';
import { FetchHttpClient } from './http/client.js';
import { log } from './logs/logger.js';
import { startHttpServer, startStdioServer } from './server.js';

const logger = log('main');

async function main(): Promise<void> {
    const config = loadConfig();
    const service = new BlogService(new FetchHttpClient(config.userAgent));

    if (config.transport === 'stdio') {
        const mcp = await startStdioServer(service);
        const shutdown = () => {
            mcp.close()
                .catch(err => logger.error('Error during shutdown:', err))
                .finally(() => process.exit(0));
        };
        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
        return;
    }

    const server: Server = await startHttpServer(service, config);
    const shutdown = () => {
        logger.info('Shutting down...');
        server.close(() => process.exit(0));
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch(err => {
    logger.error('Fatal:', err);
    process.exit(1);
});
