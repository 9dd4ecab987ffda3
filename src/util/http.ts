/**
 * HTTP helpers shared by the backend, health and search clients.
 */

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchFn = (input, init) => fetch(input, init);

/**
 * Combine a per-call timeout with an optional caller cancellation signal.
 */
export const linkSignals = (timeoutMs: number, signal?: AbortSignal): AbortSignal => {
    const timeout = AbortSignal.timeout(timeoutMs);
    return signal ? AbortSignal.any([timeout, signal]) : timeout;
};

export const isTimeoutError = (error: unknown): boolean =>
    typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError';

export const describeError = (error: unknown): string => {
    if (error instanceof Error) {
        return error.message || error.name;
    }
    return String(error);
};

/**
 * Settle `promise` or reject with the signal's reason, whichever comes first.
 * The underlying promise keeps running; its outcome is ignored after abort.
 */
export const raceAbort = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> => {
    if (signal.aborted) {
        return Promise.reject(signal.reason);
    }
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
};

/**
 * Read at most `limit` characters of a response body for error messages.
 */
export const readSnippet = async (response: Response, limit = 200): Promise<string> => {
    try {
        const text = await response.text();
        return text.length > limit ? `${text.slice(0, limit)}...` : text;
    } catch (error) {
        return `<unreadable body: ${describeError(error)}>`;
    }
};
