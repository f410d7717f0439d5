#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { Logger, createLogger } from './logger.js';
import { createServer } from './server.js';

/**
 * Close the server on termination signals and fatal errors.
 */
function setupShutdownHandlers(server: McpServer, logger: Logger): void {
    let isShuttingDown = false;

    const shutdown = (signal: string) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        logger.info(`Received ${signal}, shutting down gracefully...`);

        server.close().then(
            () => {
                logger.info('Shutdown complete');
                process.exit(0);
            },
            (e: unknown) => {
                logger.error('Error during shutdown:', e instanceof Error ? e.message : e);
                process.exit(1);
            }
        );
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGHUP', () => shutdown('SIGHUP'));

    // On Windows, SIGINT is emulated when Ctrl+C is pressed
    if (process.platform === 'win32') {
        process.on('SIGBREAK', () => shutdown('SIGBREAK'));
    }

    process.on('uncaughtException', (error) => {
        logger.error('Uncaught exception:', error);
        shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
        logger.error('Unhandled rejection:', reason);
        shutdown('unhandledRejection');
    });
}

async function main() {
    const config = loadConfig();
    const logger = createLogger('Server', config.logLevel);

    const { server } = createServer(config);
    setupShutdownHandlers(server, logger);

    logger.info(`Max dice per expression: ${config.maxDice}${config.seed ? `, seed: ${config.seed}` : ''}`);

    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info('Dice MCP server running on stdio');
}

main().catch((error) => {
    console.error('[Server] Server error:', error);
    process.exit(1);
});
