/**
 * Health Gate
 *
 * Liveness probes for registered backends. A probe never throws: any
 * non-2xx status, transport failure or timeout counts as unhealthy.
 */

import * as Logging from '../logging';
import { HEALTH_PATH } from '../constants';
import { RegistryInstance } from '../registry';
import { FetchFn, defaultFetch, describeError, linkSignals } from '../util/http';

export interface HealthGateConfig {
    registry: RegistryInstance;
    timeoutMs: number;
    fetch?: FetchFn;
}

export interface HealthGateInstance {
    probe(name: string, signal?: AbortSignal): Promise<boolean>;
    /** Healthy subset of `backends`, in request order. */
    check(backends: readonly string[], signal?: AbortSignal): Promise<string[]>;
    probeAll(signal?: AbortSignal): Promise<Record<string, boolean>>;
}

export const create = (config: HealthGateConfig): HealthGateInstance => {
    const logger = Logging.getLogger();
    const doFetch = config.fetch ?? defaultFetch;

    const probe = async (name: string, signal?: AbortSignal): Promise<boolean> => {
        const descriptor = config.registry.get(name);
        if (!descriptor) {
            logger.warn('Health probe requested for unregistered backend %s', name);
            return false;
        }
        try {
            const response = await doFetch(`${descriptor.baseURL}${HEALTH_PATH}`, {
                method: 'GET',
                signal: linkSignals(config.timeoutMs, signal),
            });
            if (!response.ok) {
                logger.debug('Backend %s unhealthy: HTTP %d', name, response.status);
            }
            // release the connection; the body is never read
            await response.body?.cancel();
            return response.ok;
        } catch (error) {
            logger.debug('Backend %s unhealthy: %s', name, describeError(error));
            return false;
        }
    };

    const check = async (backends: readonly string[], signal?: AbortSignal): Promise<string[]> => {
        const verdicts = await Promise.all(backends.map(name => probe(name, signal)));
        const healthy = backends.filter((_, index) => verdicts[index]);
        logger.verbose('Health check: %d/%d backends healthy', healthy.length, backends.length);
        return healthy;
    };

    const probeAll = async (signal?: AbortSignal): Promise<Record<string, boolean>> => {
        const names = config.registry.names();
        const verdicts = await Promise.all(names.map(name => probe(name, signal)));
        return Object.fromEntries(names.map((name, index) => [name, verdicts[index]]));
    };

    return { probe, check, probeAll };
};
