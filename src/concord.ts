/**
 * Server entry: configuration, engine and HTTP listener.
 *
 * Configuration (in priority order):
 * - CLI flags:   --port, --host, -c/--config, --verbose, --debug
 * - Env vars:    PORT, HOST, LOG_LEVEL, CONCORD_CONFIG, OPENAI_API_KEY, TAVILY_API_KEY, ...
 * - Config file: concord-config.yaml in the working directory
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { applyArgs, parseArgs } from './arguments';
import { loadConfig } from './config';
import * as Engine from './engine';
import * as Logging from './logging';
import { createApp } from './server/app';
import { VERSION } from './constants';

export const main = async (): Promise<void> => {
    const args = parseArgs();
    const loaded = await loadConfig({ configPath: args.config });
    const config = applyArgs(loaded.config, args);

    Logging.setLogLevel(config.logging.level);
    const logger = Logging.getLogger();
    logger.info('concord %s', VERSION);
    logger.verbose('Configuration: %s', loaded.source ?? '(defaults and environment)');

    const engine = Engine.create(config);
    const app = createApp(engine, {
        maxUploadBytes: config.server.maxUploadBytes,
        requestTimeoutMs: config.server.requestTimeoutMs,
    });

    const server = serve({
        fetch: app.fetch,
        port: config.server.port,
        hostname: config.server.host,
    }, (info) => {
        logger.info('Listening on http://%s:%d with backends: %s', config.server.host, info.port, engine.registry.names().join(', '));
    });

    const shutdown = (signal: string) => {
        logger.info('Received %s, shutting down', signal);
        server.close(() => process.exit(0));
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
};
