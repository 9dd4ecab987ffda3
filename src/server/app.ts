/**
 * HTTP Application
 *
 * Hono routes over the engine. Audio endpoints take multipart uploads with
 * the audio under `file`; /transcribe-with-particles takes JSON.
 */

import { randomUUID } from 'node:crypto';
import { Context, Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import * as Logging from '../logging';
import { PROGRAM_NAME, VERSION } from '../constants';
import { EngineInstance } from '../engine';
import { UnknownBackendError } from '../registry';
import { ParticleOverride } from '../stages';
import { linkSignals } from '../util/http';
import {
    ParticleOverrideListSchema,
    ParticlesRequestSchema,
    consensusBody,
    finalBody,
    metadataOf,
    toValidationContext,
    transcribeBody,
} from './schemas';

export interface AppOptions {
    maxUploadBytes: number;
    requestTimeoutMs: number;
}

interface AudioForm {
    file: File;
    backends: string[] | undefined;
    includeDiagnostics: boolean;
    context: string | undefined;
    region: string | undefined;
    override: ParticleOverride[] | undefined;
}

const field = (body: Record<string, unknown>, name: string): string | undefined => {
    const value = body[name];
    return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
};

const parseOverride = (raw: string | undefined): ParticleOverride[] | undefined => {
    if (raw === undefined) return undefined;
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        throw new HTTPException(400, { message: 'particle_override must be a JSON array' });
    }
    return ParticleOverrideListSchema.parse(json);
};

export const createApp = (engine: EngineInstance, options: AppOptions): Hono => {
    const logger = Logging.getLogger();
    const app = new Hono();

    const deadline = (c: Context): AbortSignal => linkSignals(options.requestTimeoutMs, c.req.raw.signal);

    const checkRegion = (region: string | undefined): string => {
        const resolved = region ?? engine.config.pipeline.defaultRegion;
        if (!engine.particles.has(resolved)) {
            throw new HTTPException(400, {
                message: `Unknown region "${resolved}". Known regions: ${engine.particles.regions().join(', ')}`,
            });
        }
        return resolved;
    };

    const readAudioForm = async (c: Context): Promise<AudioForm> => {
        const body = await c.req.parseBody();
        const file = body['file'];
        if (!(file instanceof File)) {
            throw new HTTPException(400, { message: 'No audio file provided (multipart field "file")' });
        }
        const models = field(body, 'models');
        const diagnostics = field(body, 'include_diagnostics');
        return {
            file,
            backends: models?.split(',').map(name => name.trim()).filter(name => name.length > 0),
            includeDiagnostics: diagnostics === 'true' || diagnostics === '1',
            context: field(body, 'context'),
            region: field(body, 'region'),
            override: parseOverride(field(body, 'particle_override')),
        };
    };

    const uploadLimit = bodyLimit({
        maxSize: options.maxUploadBytes,
        onError: (c) => c.json({ error: `Upload exceeds ${options.maxUploadBytes} bytes` }, 413),
    });

    app.use('*', cors({ origin: '*', allowMethods: ['GET', 'POST', 'OPTIONS'] }));

    app.onError((error, c) => {
        if (error instanceof HTTPException) {
            return c.json({ error: error.message }, error.status);
        }
        if (error instanceof UnknownBackendError) {
            return c.json({ error: error.message, unknownModels: error.backends }, 400);
        }
        if (error instanceof ZodError) {
            return c.json({
                error: 'Invalid request',
                issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
            }, 400);
        }
        logger.error('Unhandled error on %s %s: %s', c.req.method, c.req.path, error.message, { stack: error.stack });
        return c.json({ error: 'Internal server error' }, 500);
    });

    // ========================================================================
    // Service information
    // ========================================================================

    app.get('/', (c) => c.json({ name: PROGRAM_NAME, version: VERSION }));

    app.get('/health', async (c) => c.json(await engine.health(c.req.raw.signal)));

    app.get('/models', (c) => c.json(engine.models()));

    app.get('/particles', (c) => c.json({ regions: engine.particles.describe() }));

    // ========================================================================
    // Transcription
    // ========================================================================

    app.post('/transcribe', uploadLimit, async (c) => {
        const form = await readAudioForm(c);
        const envelope = await engine.transcribe({
            payload: form.file,
            filename: form.file.name || 'audio',
            backends: form.backends,
            includeDiagnostics: form.includeDiagnostics,
            signal: deadline(c),
        });
        return c.json(transcribeBody(envelope), envelope.error ? 503 : 200);
    });

    app.post('/transcribe-consensus', uploadLimit, async (c) => {
        const form = await readAudioForm(c);
        const { envelope, run } = await engine.transcribeConsensus({
            payload: form.file,
            filename: form.file.name || 'audio',
            backends: form.backends,
            context: form.context,
            region: checkRegion(form.region),
            signal: deadline(c),
        });
        if (!run) {
            return c.json({ error: envelope.error, metadata: metadataOf(envelope) }, 503);
        }
        return c.json(consensusBody(envelope, run));
    });

    app.post('/transcribe-pipeline', uploadLimit, async (c) => {
        const form = await readAudioForm(c);
        const { envelope, run } = await engine.transcribePipeline({
            payload: form.file,
            filename: form.file.name || 'audio',
            backends: form.backends,
            context: form.context,
            region: checkRegion(form.region),
            override: form.override,
            signal: deadline(c),
        });
        if (!run) {
            return c.json({ error: envelope.error, metadata: metadataOf(envelope) }, 503);
        }
        return c.json({ ...finalBody(run), metadata: metadataOf(envelope) });
    });

    app.post('/transcribe-with-particles', async (c) => {
        let json: unknown;
        try {
            json = await c.req.json();
        } catch {
            throw new HTTPException(400, { message: 'Request body must be JSON' });
        }
        const body = ParticlesRequestSchema.parse(json);
        const context = toValidationContext(body, {
            requestId: randomUUID(),
            region: engine.config.pipeline.defaultRegion,
            context: engine.config.pipeline.defaultContext,
        });
        checkRegion(context.region);

        const run = await engine.transcribeWithParticles(context, {
            override: body.particleOverride,
            signal: deadline(c),
        });
        return c.json(finalBody(run));
    });

    return app;
};
