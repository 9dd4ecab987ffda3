import { describe, expect, it } from 'vitest';
import * as BackendClient from '../../src/dispatch/backend-client';
import { ServiceDescriptor } from '../../src/registry';
import { createBackendFetch, createFakeFetch, json, sleep } from '../helpers/fake-fetch';

const descriptor: ServiceDescriptor = {
    name: 'whisper',
    baseURL: 'http://whisper:8001',
    endpointPath: '/transcribe',
    timeoutMs: 100,
};

const audio = () => new Blob(['fake-audio-bytes'], { type: 'audio/wav' });

describe('Backend client', () => {
    it('posts the audio as multipart with the diagnostics flag', async () => {
        const { fetch, calls } = createBackendFetch({ 'http://whisper:8001': { transcription: 'hello there' } });
        const client = BackendClient.create({ fetch });

        await client.transcribe(descriptor, { payload: audio(), filename: 'clip.wav', includeDiagnostics: true });

        expect(calls).toHaveLength(1);
        expect(calls[0].url).toBe('http://whisper:8001/transcribe');
        expect(calls[0].method).toBe('POST');
        const body = calls[0].body;
        expect(body).toBeInstanceOf(FormData);
        if (body instanceof FormData) {
            expect(body.get('include_diagnostics')).toBe('true');
            const file = body.get('file');
            expect(file).toBeInstanceOf(Blob);
            if (file instanceof File) {
                expect(file.name).toBe('clip.wav');
            }
        }
    });

    it('returns a success result with the service fields', async () => {
        const { fetch } = createBackendFetch({
            'http://whisper:8001': { transcription: 'hello there', diagnostics: { language: 'en' } },
        });
        const client = BackendClient.create({ fetch });

        const result = await client.transcribe(descriptor, { payload: audio(), filename: 'clip.wav', includeDiagnostics: false });

        expect(result.status).toBe('success');
        if (result.status === 'success') {
            expect(result.transcript).toBe('hello there');
            expect(result.serviceProcessingTime).toBe(0.42);
            expect(result.diagnostics).toEqual({ language: 'en' });
            expect(result.modelInfo).toEqual({ name: 'http://whisper:8001' });
        }
    });

    it('turns a non-2xx status into an error result', async () => {
        const { fetch } = createBackendFetch({
            'http://whisper:8001': { response: () => new Response('model not loaded', { status: 500 }) },
        });
        const client = BackendClient.create({ fetch });

        const result = await client.transcribe(descriptor, { payload: audio(), filename: 'clip.wav', includeDiagnostics: false });

        expect(result).toEqual({
            backend: 'whisper',
            status: 'error',
            errorMessage: 'HTTP 500: model not loaded',
            elapsedMs: expect.any(Number),
        });
        expect('transcript' in result).toBe(false);
    });

    it('turns a body without transcription into an error result', async () => {
        const { fetch } = createBackendFetch({
            'http://whisper:8001': { response: () => json({ text: 'wrong field' }) },
        });
        const client = BackendClient.create({ fetch });

        const result = await client.transcribe(descriptor, { payload: audio(), filename: 'clip.wav', includeDiagnostics: false });

        expect(result.status).toBe('error');
        if (result.status === 'error') {
            expect(result.errorMessage).toBe('Malformed response: invalid transcription');
        }
    });

    it('turns a non-JSON body into an error result', async () => {
        const { fetch } = createBackendFetch({
            'http://whisper:8001': { response: () => new Response('<html>gateway</html>') },
        });
        const client = BackendClient.create({ fetch });

        const result = await client.transcribe(descriptor, { payload: audio(), filename: 'clip.wav', includeDiagnostics: false });

        expect(result.status).toBe('error');
        if (result.status === 'error') {
            expect(result.errorMessage).toMatch(/^Malformed response: /);
        }
    });

    it('times out after the descriptor timeout', async () => {
        const { fetch } = createBackendFetch({ 'http://whisper:8001': { transcription: 'late', delayMs: 1000 } });
        const client = BackendClient.create({ fetch });

        const result = await client.transcribe(descriptor, { payload: audio(), filename: 'clip.wav', includeDiagnostics: false });

        expect(result.status).toBe('error');
        if (result.status === 'error') {
            expect(result.errorMessage).toBe('Timed out after 100ms');
            expect(result.elapsedMs).toBeLessThan(900);
        }
    });

    it('reports caller cancellation separately from timeouts', async () => {
        const { fetch } = createFakeFetch(async (_url, init) => {
            await sleep(1000, init.signal);
            return json({ transcription: 'never' });
        });
        const client = BackendClient.create({ fetch });
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 10);

        const result = await client.transcribe(
            { ...descriptor, timeoutMs: 5000 },
            { payload: audio(), filename: 'clip.wav', includeDiagnostics: false, signal: controller.signal }
        );

        expect(result.status).toBe('error');
        if (result.status === 'error') {
            expect(result.errorMessage).toBe('Request cancelled');
        }
    });

    it('reports transport failures', async () => {
        const { fetch } = createFakeFetch(() => {
            throw new TypeError('fetch failed');
        });
        const client = BackendClient.create({ fetch });

        const result = await client.transcribe(descriptor, { payload: audio(), filename: 'clip.wav', includeDiagnostics: false });

        expect(result.status).toBe('error');
        if (result.status === 'error') {
            expect(result.errorMessage).toBe('Transport error: fetch failed');
        }
    });
});
