/**
 * Configuration Loading
 *
 * Reads concord-config.yaml (optional), layers environment overrides on top
 * and validates the result. Credentials normally arrive through the
 * environment; a missing key only means the matching stages fall back.
 */

import * as fs from 'node:fs/promises';
import { resolve } from 'node:path';
import yaml from 'js-yaml';
import { ConfigSchema, Config } from './schema';
import { DEFAULT_CONFIG_FILE } from '../constants';

export * from './schema';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface LoadOptions {
    configPath?: string;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
    config: Config;
    source: string | null;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const section = (raw: Record<string, unknown>, key: string): Record<string, unknown> => {
    const value = raw[key];
    return isRecord(value) ? { ...value } : {};
};

/**
 * Apply environment overrides to the raw (unvalidated) configuration object
 */
export const applyEnvironment = (
    raw: Record<string, unknown>,
    env: NodeJS.ProcessEnv
): Record<string, unknown> => {
    const server = section(raw, 'server');
    const logging = section(raw, 'logging');
    const generation = section(raw, 'generation');
    const search = section(raw, 'search');

    if (env.PORT) server.port = Number(env.PORT);
    if (env.HOST) server.host = env.HOST;
    if (env.LOG_LEVEL) logging.level = env.LOG_LEVEL;

    const generationKey = env.GENERATION_API_KEY || env.OPENAI_API_KEY;
    if (generationKey) generation.apiKey = generationKey;
    if (env.GENERATION_MODEL) generation.model = env.GENERATION_MODEL;
    if (env.GENERATION_BASE_URL) generation.baseURL = env.GENERATION_BASE_URL;

    if (env.TAVILY_API_KEY) search.apiKey = env.TAVILY_API_KEY;

    return { ...raw, server, logging, generation, search };
};

/**
 * Validate a raw configuration object (already merged with the environment)
 */
export const parseConfig = (raw: unknown, env: NodeJS.ProcessEnv = {}): Config => {
    if (raw !== undefined && raw !== null && !isRecord(raw)) {
        throw new ConfigError('Configuration root must be a mapping');
    }
    const merged = applyEnvironment(raw ?? {}, env);
    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }
    return result.data;
};

const exists = async (path: string): Promise<boolean> => {
    try {
        await fs.access(path);
        return true;
    } catch {
        return false;
    }
};

/**
 * Locate, read and validate the configuration.
 *
 * An explicit path (option or CONCORD_CONFIG) must exist; the default
 * concord-config.yaml in the working directory is optional.
 */
export const loadConfig = async (options: LoadOptions = {}): Promise<LoadedConfig> => {
    const env = options.env ?? process.env;
    const cwd = options.cwd ?? process.cwd();
    const explicit = options.configPath ?? env.CONCORD_CONFIG;
    const configPath = resolve(cwd, explicit ?? DEFAULT_CONFIG_FILE);

    if (!(await exists(configPath))) {
        if (explicit) {
            throw new ConfigError(`Configuration file not found: ${configPath}`);
        }
        return { config: parseConfig({}, env), source: null };
    }

    const content = await fs.readFile(configPath, 'utf-8');
    let raw: unknown;
    try {
        raw = yaml.load(content);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Failed to parse ${configPath}: ${message}`);
    }

    return { config: parseConfig(raw, env), source: configPath };
};
