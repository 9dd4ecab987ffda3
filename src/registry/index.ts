/**
 * Service Registry
 *
 * Immutable table of transcription backends, built once from configuration
 * and passed to everything that needs to look a backend up.
 */

import { BackendConfig } from '../config/schema';
import { ModelDetails, ServiceDescriptor, UnknownBackendError } from './types';

export * from './types';

export interface RegistryInstance {
    names(): string[];
    get(name: string): ServiceDescriptor | undefined;
    has(name: string): boolean;
    /**
     * Resolve a requested backend list against the registry. An absent or
     * empty request means every registered backend. Duplicates are dropped
     * and request order is kept; unknown names throw UnknownBackendError.
     */
    resolve(requested?: readonly string[]): string[];
    describe(): Record<string, ModelDetails>;
}

const trimTrailingSlash = (url: string): string => url.replace(/\/+$/, '');

export const create = (backends: Record<string, BackendConfig>): RegistryInstance => {
    const table = new Map<string, ServiceDescriptor>();
    for (const [name, backend] of Object.entries(backends)) {
        table.set(name, Object.freeze({
            name,
            baseURL: trimTrailingSlash(backend.url),
            endpointPath: backend.endpoint,
            timeoutMs: backend.timeoutMs,
        }));
    }

    const names = (): string[] => [...table.keys()];

    const resolve = (requested?: readonly string[]): string[] => {
        const cleaned = (requested ?? []).map(name => name.trim()).filter(name => name.length > 0);
        if (cleaned.length === 0) {
            return names();
        }
        const unique = [...new Set(cleaned)];
        const unknown = unique.filter(name => !table.has(name));
        if (unknown.length > 0) {
            throw new UnknownBackendError(unknown);
        }
        return unique;
    };

    const describe = (): Record<string, ModelDetails> => {
        const details: Record<string, ModelDetails> = {};
        for (const descriptor of table.values()) {
            details[descriptor.name] = {
                url: descriptor.baseURL,
                endpoint: descriptor.endpointPath,
                timeoutMs: descriptor.timeoutMs,
            };
        }
        return details;
    };

    return {
        names,
        get: (name) => table.get(name),
        has: (name) => table.has(name),
        resolve,
        describe,
    };
};
