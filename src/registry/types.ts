export interface ServiceDescriptor {
    readonly name: string;
    readonly baseURL: string;
    readonly endpointPath: string;
    readonly timeoutMs: number;
}

export interface ModelDetails {
    url: string;
    endpoint: string;
    timeoutMs: number;
}

export class UnknownBackendError extends Error {
    readonly backends: string[];

    constructor(backends: string[]) {
        super(`Unknown backend(s): ${backends.join(', ')}`);
        this.name = 'UnknownBackendError';
        this.backends = backends;
    }
}
