/**
 * Engine
 *
 * Wires configuration into the registry, health gate, dispatcher, external
 * clients and pipeline, and exposes the operations the HTTP surface calls.
 */

import * as Logging from './logging';
import { ConfigError } from './config';
import { Config } from './config/schema';
import { BackendClient, Dispatcher, DispatchEnvelope, DispatchRequest } from './dispatch';
import * as Generation from './generation';
import * as Health from './health';
import { Registry as ParticleRegistry } from './particles';
import * as Pipeline from './pipeline';
import * as Registry from './registry';
import * as Search from './search';
import { ParticleOverride } from './stages';
import { FetchFn } from './util/http';

export interface HealthReport {
    status: 'healthy' | 'unhealthy';
    healthyServices: number;
    totalServices: number;
    services: Record<string, boolean>;
}

export interface ModelsReport {
    availableModels: string[];
    modelDetails: Record<string, Registry.ModelDetails>;
}

export interface AnalysisRequest extends DispatchRequest {
    context?: string;
    region?: string;
}

export interface AnalysisResult<C> {
    envelope: DispatchEnvelope;
    /** null when no backend was healthy */
    run: Pipeline.PipelineRun<C> | null;
}

export interface EngineDependencies {
    fetch?: FetchFn;
    generation?: Generation.GenerationClient;
    search?: Search.SearchClient;
    particles?: ParticleRegistry.ParticleRegistryInstance;
}

export interface EngineInstance {
    readonly config: Config;
    readonly registry: Registry.RegistryInstance;
    readonly particles: ParticleRegistry.ParticleRegistryInstance;
    health(signal?: AbortSignal): Promise<HealthReport>;
    models(): ModelsReport;
    transcribe(request: DispatchRequest): Promise<DispatchEnvelope>;
    transcribeConsensus(request: AnalysisRequest): Promise<AnalysisResult<Pipeline.ValidationContext>>;
    transcribeWithParticles(
        context: Pipeline.ValidationContext,
        options?: { override?: readonly ParticleOverride[]; signal?: AbortSignal }
    ): Promise<Pipeline.PipelineRun<Pipeline.FinalContext>>;
    transcribePipeline(
        request: AnalysisRequest & { override?: readonly ParticleOverride[] }
    ): Promise<AnalysisResult<Pipeline.FinalContext>>;
}

export const create = (config: Config, deps: EngineDependencies = {}): EngineInstance => {
    const logger = Logging.getLogger();

    const registry = Registry.create(config.backends);
    const healthGate = Health.create({ registry, timeoutMs: config.health.timeoutMs, fetch: deps.fetch });
    const dispatcher = Dispatcher.create({
        registry,
        healthGate,
        client: BackendClient.create({ fetch: deps.fetch }),
    });

    const generation = deps.generation ?? Generation.create(config.generation);
    const search = deps.search ?? Search.create(config.search, { fetch: deps.fetch });
    const particles = deps.particles ?? ParticleRegistry.create();
    if (!particles.has(config.pipeline.defaultRegion)) {
        throw new ConfigError(
            `Unknown pipeline.defaultRegion "${config.pipeline.defaultRegion}". Known regions: ${particles.regions().join(', ')}`
        );
    }

    if (!generation.isConfigured()) {
        logger.warn('Generation service has no API key; every stage will use its fallback');
    }
    if (!search.isConfigured()) {
        logger.warn('Search service has no API key; web validation will keep the consensus transcript');
    }

    const pipeline = Pipeline.create({
        runner: Pipeline.Runner.create({ client: generation, timeoutMs: config.generation.timeoutMs }),
        search,
        particles,
        policy: config.particles,
        maxSearchQueries: config.pipeline.maxSearchQueries,
    });

    const requestContext = (envelope: DispatchEnvelope, request: AnalysisRequest): Pipeline.RequestContext =>
        Pipeline.fromEnvelope(envelope, {
            userContext: request.context?.trim() || config.pipeline.defaultContext,
            region: request.region ?? config.pipeline.defaultRegion,
            phonemeBackend: config.pipeline.phonemeBackend,
        });

    const health = async (signal?: AbortSignal): Promise<HealthReport> => {
        const services = await healthGate.probeAll(signal);
        const healthyServices = Object.values(services).filter(Boolean).length;
        return {
            status: healthyServices > 0 ? 'healthy' : 'unhealthy',
            healthyServices,
            totalServices: Object.keys(services).length,
            services,
        };
    };

    const models = (): ModelsReport => ({
        availableModels: registry.names(),
        modelDetails: registry.describe(),
    });

    const transcribeConsensus = async (request: AnalysisRequest): Promise<AnalysisResult<Pipeline.ValidationContext>> => {
        const envelope = await dispatcher.dispatch({ ...request, includeDiagnostics: true });
        if (envelope.error) {
            return { envelope, run: null };
        }
        const run = await pipeline.consensus(requestContext(envelope, request), request.signal);
        return { envelope, run };
    };

    const transcribePipeline = async (
        request: AnalysisRequest & { override?: readonly ParticleOverride[] }
    ): Promise<AnalysisResult<Pipeline.FinalContext>> => {
        const envelope = await dispatcher.dispatch({ ...request, includeDiagnostics: true });
        if (envelope.error) {
            return { envelope, run: null };
        }
        const run = await pipeline.run(requestContext(envelope, request), {
            override: request.override,
            signal: request.signal,
        });
        return { envelope, run };
    };

    return {
        config,
        registry,
        particles,
        health,
        models,
        transcribe: (request) => dispatcher.dispatch(request),
        transcribeConsensus,
        transcribeWithParticles: (context, options = {}) => pipeline.particles(context, options),
        transcribePipeline,
    };
};
