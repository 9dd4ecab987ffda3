/**
 * Backend Client
 *
 * One multipart transcription call against one backend. Every outcome,
 * including malformed bodies, comes back as a BackendResult.
 */

import { z } from 'zod';
import * as Logging from '../logging';
import { ServiceDescriptor } from '../registry';
import { FetchFn, defaultFetch, describeError, isTimeoutError, linkSignals, readSnippet } from '../util/http';
import { BackendResult } from './types';

const BackendResponseSchema = z.object({
    transcription: z.string(),
    processing_time: z.number().nullish(),
    model_info: z.record(z.unknown()).nullish(),
    diagnostics: z.record(z.unknown()).nullish(),
});

export interface BackendCall {
    payload: Blob;
    filename: string;
    includeDiagnostics: boolean;
    signal?: AbortSignal;
}

export interface BackendClientInstance {
    transcribe(descriptor: ServiceDescriptor, call: BackendCall): Promise<BackendResult>;
}

export const create = (options: { fetch?: FetchFn } = {}): BackendClientInstance => {
    const logger = Logging.getLogger();
    const doFetch = options.fetch ?? defaultFetch;

    const transcribe = async (descriptor: ServiceDescriptor, call: BackendCall): Promise<BackendResult> => {
        const startTime = Date.now();
        const fail = (errorMessage: string): BackendResult => {
            logger.warn('Backend %s failed: %s', descriptor.name, errorMessage);
            return {
                backend: descriptor.name,
                status: 'error',
                errorMessage,
                elapsedMs: Date.now() - startTime,
            };
        };

        const form = new FormData();
        form.append('file', call.payload, call.filename);
        form.append('include_diagnostics', call.includeDiagnostics ? 'true' : 'false');

        let response: Response;
        try {
            response = await doFetch(`${descriptor.baseURL}${descriptor.endpointPath}`, {
                method: 'POST',
                body: form,
                signal: linkSignals(descriptor.timeoutMs, call.signal),
            });
        } catch (error) {
            if (call.signal?.aborted) {
                return fail('Request cancelled');
            }
            if (isTimeoutError(error)) {
                return fail(`Timed out after ${descriptor.timeoutMs}ms`);
            }
            return fail(`Transport error: ${describeError(error)}`);
        }

        if (!response.ok) {
            return fail(`HTTP ${response.status}: ${await readSnippet(response)}`);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            if (isTimeoutError(error)) {
                return fail(`Timed out after ${descriptor.timeoutMs}ms`);
            }
            return fail(`Malformed response: ${describeError(error)}`);
        }

        const parsed = BackendResponseSchema.safeParse(body);
        if (!parsed.success) {
            const fields = parsed.error.issues.map(issue => issue.path.join('.') || '(root)').join(', ');
            return fail(`Malformed response: invalid ${fields}`);
        }

        const elapsedMs = Date.now() - startTime;
        logger.verbose('Backend %s answered in %dms', descriptor.name, elapsedMs);
        return {
            backend: descriptor.name,
            status: 'success',
            transcript: parsed.data.transcription,
            elapsedMs,
            serviceProcessingTime: parsed.data.processing_time ?? null,
            modelInfo: parsed.data.model_info ?? {},
            diagnostics: parsed.data.diagnostics ?? {},
        };
    };

    return { transcribe };
};
