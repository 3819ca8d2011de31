#!/usr/bin/env node
import process from 'node:process';

import { registerDemoTools } from './demoTools.js';
import { loadServerOptionsFromEnv } from './server/config.js';
import { McpServer } from './server/mcp.js';
import { StdioServerTransport } from './server/stdio.js';
import { createMcpExpressApp } from './server/streamableHttp.js';
import { createLogger, stderrLogger } from './shared/logger.js';

async function runServer(port: number | null) {
    const settings = loadServerOptionsFromEnv();
    const logger = createLogger({ level: settings.logLevel ?? 'info', sink: stderrLogger });

    const server = new McpServer(
        { name: 'mcp-session-tasks', version: '0.1.0' },
        { ...settings, tasks: {}, elicitation: true, logger }
    );
    registerDemoTools(server);

    const shutdown = () => {
        server
            .close()
            .then(() => process.exit(0))
            .catch(error => {
                logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
                process.exit(1);
            });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    if (port !== null) {
        const app = createMcpExpressApp(server);
        app.listen(port, () => {
            logger.info(`Server running on http://localhost:${port}/mcp`);
        });
        return;
    }

    await server.connect(new StdioServerTransport());
    logger.info('Server running on stdio');
}

const args = process.argv.slice(2);
const port = args[0] === undefined ? null : Number.parseInt(args[0], 10);

if (port !== null && (!Number.isInteger(port) || port <= 0)) {
    process.stderr.write(`Usage: mcp-session-tasks [port]\n`);
    process.exit(2);
}

runServer(port).catch(error => {
    process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
    process.exit(1);
});
