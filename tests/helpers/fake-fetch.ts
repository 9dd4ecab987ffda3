import { FetchFn } from '../../src/util/http';

export interface RecordedCall {
    url: string;
    method: string;
    body: RequestInit['body'];
}

export const json = (body: unknown, status = 200): Response =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export const sleep = (ms: number, signal?: AbortSignal | null): Promise<void> =>
    new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });

export type Handler = (url: string, init: RequestInit) => Response | Promise<Response>;

export const createFakeFetch = (handler: Handler): { fetch: FetchFn; calls: RecordedCall[] } => {
    const calls: RecordedCall[] = [];
    const fetch: FetchFn = async (url, init = {}) => {
        calls.push({ url, method: init.method ?? 'GET', body: init.body });
        return handler(url, init);
    };
    return { fetch, calls };
};

export interface FakeService {
    /** HTTP status for /health; false simulates a connection error */
    health?: number | false;
    transcription?: string;
    diagnostics?: Record<string, unknown>;
    /** replaces the whole /transcribe response */
    response?: () => Response;
    delayMs?: number;
}

/**
 * In-process stand-in for a set of transcription backends, keyed by base URL.
 */
export const createBackendFetch = (services: Record<string, FakeService>) => createFakeFetch(async (url, init) => {
    const base = Object.keys(services).find(prefix => url.startsWith(prefix));
    const service = base === undefined ? undefined : services[base];
    if (base === undefined || service === undefined) {
        throw new TypeError(`fetch failed: ${url}`);
    }
    const path = url.slice(base.length);

    if (path === '/health') {
        if (service.health === false) {
            throw new TypeError('fetch failed: connection refused');
        }
        return json({ status: 'ok' }, service.health ?? 200);
    }

    await sleep(service.delayMs ?? 0, init.signal);
    if (service.response) {
        return service.response();
    }
    return json({
        transcription: service.transcription ?? '',
        processing_time: 0.42,
        model_info: { name: base },
        diagnostics: service.diagnostics ?? {},
    });
});
