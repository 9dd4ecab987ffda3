/**
 * Parallel Dispatcher
 *
 * Fans one audio payload out to every healthy requested backend. Each call
 * is bounded by its own timeout; all calls settle before the envelope is
 * built.
 */

import * as Logging from '../logging';
import { HealthGateInstance } from '../health';
import { RegistryInstance } from '../registry';
import { describeError } from '../util/http';
import * as Aggregate from './aggregate';
import { BackendClientInstance } from './backend-client';
import { BackendResult, DispatchEnvelope, DispatchRequest } from './types';

export interface DispatcherConfig {
    registry: RegistryInstance;
    healthGate: HealthGateInstance;
    client: BackendClientInstance;
}

export interface DispatcherInstance {
    dispatch(request: DispatchRequest): Promise<DispatchEnvelope>;
}

export const create = (config: DispatcherConfig): DispatcherInstance => {
    const logger = Logging.getLogger();

    const dispatch = async (request: DispatchRequest): Promise<DispatchEnvelope> => {
        // Unknown names throw before any network call
        const requestedBackends = config.registry.resolve(request.backends);
        const startedAt = Date.now();

        const healthyBackends = await config.healthGate.check(requestedBackends, request.signal);
        if (healthyBackends.length === 0) {
            logger.warn('No healthy backends among: %s', requestedBackends.join(', '));
            return Aggregate.fold({
                audioFilename: request.filename,
                startedAt,
                requestedBackends,
                healthyBackends,
                results: [],
            });
        }

        logger.info('Dispatching %s to %d backends: %s', request.filename, healthyBackends.length, healthyBackends.join(', '));

        const settled = await Promise.allSettled(healthyBackends.map(name => {
            const descriptor = config.registry.get(name);
            if (!descriptor) {
                return Promise.reject(new Error(`Backend ${name} vanished from the registry`));
            }
            return config.client.transcribe(descriptor, {
                payload: request.payload,
                filename: request.filename,
                includeDiagnostics: request.includeDiagnostics ?? false,
                signal: request.signal,
            });
        }));

        const results = settled.map((outcome, index): BackendResult => outcome.status === 'fulfilled'
            ? outcome.value
            : {
                backend: healthyBackends[index],
                status: 'error',
                errorMessage: describeError(outcome.reason),
                elapsedMs: Date.now() - startedAt,
            });

        const envelope = Aggregate.fold({
            audioFilename: request.filename,
            startedAt,
            requestedBackends,
            healthyBackends,
            results,
        });
        logger.info('Dispatch finished: %d/%d succeeded in %dms', envelope.successCount, healthyBackends.length, envelope.totalElapsedMs);
        return envelope;
    };

    return { dispatch };
};
