/**
 * Configuration Schema
 *
 * Zod description of concord-config.yaml. Every key has a default so an
 * absent or empty file yields a runnable configuration.
 */

import { z } from 'zod';
import {
    DEFAULT_BACKENDS,
    DEFAULT_BACKEND_TIMEOUT_MS,
    DEFAULT_CONTEXT,
    DEFAULT_ENDPOINT_PATH,
    DEFAULT_GENERATION_MODEL,
    DEFAULT_GENERATION_TEMPERATURE,
    DEFAULT_GENERATION_TIMEOUT_MS,
    DEFAULT_HEALTH_TIMEOUT_MS,
    DEFAULT_HOST,
    DEFAULT_MAX_PHONEME_DISTANCE,
    DEFAULT_MAX_SEARCH_QUERIES,
    DEFAULT_MAX_SEGMENT_PHONEMES,
    DEFAULT_MAX_UPLOAD_BYTES,
    DEFAULT_MIN_GAP_MS,
    DEFAULT_PHONEME_BACKEND,
    DEFAULT_PORT,
    DEFAULT_REGION,
    DEFAULT_REQUEST_TIMEOUT_MS,
    DEFAULT_SEARCH_MAX_RESULTS,
    DEFAULT_SEARCH_TIMEOUT_MS,
    DEFAULT_SEARCH_TOP_RESULTS,
    DEFAULT_SEARCH_URL,
} from '../constants';

const positiveInt = () => z.number().int().positive();

export const BackendConfigSchema = z.object({
    url: z.string().url().describe('Base URL of the transcription service'),
    endpoint: z.string().startsWith('/').default(DEFAULT_ENDPOINT_PATH),
    timeoutMs: positiveInt().default(DEFAULT_BACKEND_TIMEOUT_MS),
});

export type BackendConfig = z.infer<typeof BackendConfigSchema>;

export const ConfigSchema = z.object({
    server: z.object({
        port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
        host: z.string().min(1).default(DEFAULT_HOST),
        requestTimeoutMs: positiveInt().default(DEFAULT_REQUEST_TIMEOUT_MS),
        maxUploadBytes: positiveInt().default(DEFAULT_MAX_UPLOAD_BYTES),
    }).default({}),
    logging: z.object({
        level: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).default('info'),
    }).default({}),
    health: z.object({
        timeoutMs: positiveInt().default(DEFAULT_HEALTH_TIMEOUT_MS),
    }).default({}),
    backends: z.record(z.string().min(1), BackendConfigSchema)
        .default(DEFAULT_BACKENDS)
        .refine(backends => Object.keys(backends).length > 0, 'At least one backend must be configured'),
    generation: z.object({
        model: z.string().min(1).default(DEFAULT_GENERATION_MODEL),
        baseURL: z.string().url().optional().describe('OpenAI-compatible endpoint; omit for api.openai.com'),
        apiKey: z.string().min(1).optional(),
        timeoutMs: positiveInt().default(DEFAULT_GENERATION_TIMEOUT_MS),
        temperature: z.number().min(0).max(2).default(DEFAULT_GENERATION_TEMPERATURE),
    }).default({}),
    search: z.object({
        url: z.string().url().default(DEFAULT_SEARCH_URL),
        apiKey: z.string().min(1).optional(),
        timeoutMs: positiveInt().default(DEFAULT_SEARCH_TIMEOUT_MS),
        maxResults: positiveInt().default(DEFAULT_SEARCH_MAX_RESULTS),
        topResults: positiveInt().default(DEFAULT_SEARCH_TOP_RESULTS),
    }).default({}),
    pipeline: z.object({
        phonemeBackend: z.string().min(1).default(DEFAULT_PHONEME_BACKEND),
        defaultRegion: z.string().min(1).default(DEFAULT_REGION),
        defaultContext: z.string().default(DEFAULT_CONTEXT),
        maxSearchQueries: z.number().int().min(0).max(10).default(DEFAULT_MAX_SEARCH_QUERIES),
    }).default({}),
    particles: z.object({
        minGapMs: z.number().min(0).default(DEFAULT_MIN_GAP_MS),
        maxSegmentPhonemes: positiveInt().default(DEFAULT_MAX_SEGMENT_PHONEMES),
        maxPhonemeDistance: z.number().int().min(0).default(DEFAULT_MAX_PHONEME_DISTANCE),
    }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ParticlePolicy = Config['particles'];
