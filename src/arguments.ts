import { Command } from 'commander';
import { Config } from './config/schema';
import { PROGRAM_NAME, VERSION } from './constants';

export interface Args {
    port?: string;
    host?: string;
    config?: string;
    debug?: boolean;
    verbose?: boolean;
}

export const createProgram = (): Command => new Command()
    .name(PROGRAM_NAME)
    .summary('Multi-backend speech recognition orchestrator')
    .description('Fans audio out to transcription backends and refines the results through a consensus pipeline')
    .option('-p, --port <number>', 'HTTP port to listen on (env: PORT)')
    .option('--host <address>', 'Host address to bind to (env: HOST)')
    .option('-c, --config <path>', 'Path to configuration file (env: CONCORD_CONFIG)')
    .option('--verbose', 'enable verbose logging')
    .option('--debug', 'enable debug logging')
    .version(VERSION);

export const parseArgs = (argv: string[] = process.argv): Args => {
    const program = createProgram();
    program.parse(argv);
    return program.opts<Args>();
};

/**
 * Command-line flags take precedence over file and environment values.
 */
export const applyArgs = (config: Config, args: Args): Config => {
    const port = args.port !== undefined ? Number.parseInt(args.port, 10) : Number.NaN;
    let level = config.logging.level;
    if (args.verbose) level = 'verbose';
    if (args.debug) level = 'debug';

    return {
        ...config,
        server: {
            ...config.server,
            port: Number.isInteger(port) && port >= 0 && port < 65536 ? port : config.server.port,
            host: args.host ?? config.server.host,
        },
        logging: { ...config.logging, level },
    };
};
