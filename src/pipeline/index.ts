/**
 * Analysis Pipeline
 *
 * Runs the stages strictly in order, merging each stage's fields into the
 * context and recording a trace entry per stage. Stages never throw, so a
 * run always completes with the best values available.
 */

import { randomUUID } from 'node:crypto';
import * as Logging from '../logging';
import { Aggregate, DispatchEnvelope } from '../dispatch';
import { ParticleRegistryInstance } from '../particles/registry';
import { TimingPolicy } from '../particles/timing';
import { SearchClient } from '../search/types';
import { Consensus, FinalAssembly, ParticleDetection, SearchAnalysis, WebValidation } from '../stages';
import { ParticleOverride } from '../stages/particle-detection';
import { RunnerInstance } from './runner';
import {
    FinalContext,
    ParticleContext,
    RequestContext,
    StageOutcome,
    StageTrace,
    ValidationContext,
} from './types';

export * from './types';
export * as Runner from './runner';

export interface PipelineConfig {
    runner: RunnerInstance;
    search: SearchClient;
    particles: ParticleRegistryInstance;
    policy: TimingPolicy;
    maxSearchQueries: number;
}

export interface PipelineRun<C> {
    context: C;
    trace: StageTrace[];
}

export interface ParticleRunOptions {
    override?: readonly ParticleOverride[];
    signal?: AbortSignal;
}

export interface PipelineInstance {
    /** Consensus → SearchAnalysis → WebValidation */
    consensus(request: RequestContext, signal?: AbortSignal): Promise<PipelineRun<ValidationContext>>;
    /** ParticleDetection (or a reviewer override) → FinalAssembly */
    particles(context: ValidationContext, options?: ParticleRunOptions): Promise<PipelineRun<FinalContext>>;
    /** All five stages */
    run(request: RequestContext, options?: ParticleRunOptions): Promise<PipelineRun<FinalContext>>;
}

export interface EnvelopeContextOptions {
    userContext: string;
    region: string;
    phonemeBackend: string;
    requestId?: string;
}

/**
 * Build the initial context from a dispatch envelope. The phoneme backend's
 * output is a phoneme string, so it feeds the phoneme track rather than
 * the consensus.
 */
export const fromEnvelope = (envelope: DispatchEnvelope, options: EnvelopeContextOptions): RequestContext => ({
    requestId: options.requestId ?? randomUUID(),
    userContext: options.userContext,
    region: options.region,
    transcripts: Aggregate.transcripts(envelope, [options.phonemeBackend]),
    phonemeTrack: Aggregate.phonemeTrack(envelope, options.phonemeBackend),
});

export const toTrace = (stage: string, outcome: StageOutcome<unknown>): StageTrace => outcome.ok
    ? { stage, ok: true, source: outcome.source, durationMs: outcome.durationMs }
    : {
        stage,
        ok: false,
        source: outcome.source,
        durationMs: outcome.durationMs,
        failure: outcome.failure,
        reason: outcome.reason,
    };

export const create = (config: PipelineConfig): PipelineInstance => {
    const logger = Logging.getLogger();

    const consensusStage = Consensus.create(config.runner);
    const searchStage = SearchAnalysis.create(config.runner, { maxQueries: config.maxSearchQueries });
    const validationStage = WebValidation.create(config.runner, config.search);
    const particleStage = ParticleDetection.create({
        runner: config.runner,
        particles: config.particles,
        policy: config.policy,
    });
    const finalStage = FinalAssembly.create(config.runner);

    const consensus = async (request: RequestContext, signal?: AbortSignal): Promise<PipelineRun<ValidationContext>> => {
        const trace: StageTrace[] = [];
        logger.info('[%s] Consensus over %d transcripts', request.requestId, Object.keys(request.transcripts).length);

        const consensusOutcome = await consensusStage(request, signal);
        trace.push(toTrace('consensus', consensusOutcome));
        const afterConsensus = { ...request, ...consensusOutcome.value };

        const searchOutcome = await searchStage(afterConsensus, signal);
        trace.push(toTrace('search-analysis', searchOutcome));
        const afterSearch = { ...afterConsensus, ...searchOutcome.value };

        const validationOutcome = await validationStage(afterSearch, signal);
        trace.push(toTrace('web-validation', validationOutcome));
        const context: ValidationContext = { ...afterSearch, ...validationOutcome.value };

        logger.info('[%s] Validated transcript: "%s"', request.requestId, context.validatedTranscript);
        return { context, trace };
    };

    const particles = async (
        context: ValidationContext,
        options: ParticleRunOptions = {}
    ): Promise<PipelineRun<FinalContext>> => {
        const trace: StageTrace[] = [];

        const particleOutcome = options.override
            ? ParticleDetection.applyOverride(context, options.override)
            : await particleStage(context, options.signal);
        trace.push(toTrace('particle-detection', particleOutcome));
        const afterParticles: ParticleContext = { ...context, ...particleOutcome.value };
        logger.info('[%s] %d particles placed', context.requestId, afterParticles.detectedParticles.length);

        const finalOutcome = await finalStage(afterParticles, options.signal);
        trace.push(toTrace('final-assembly', finalOutcome));
        const finalContext: FinalContext = { ...afterParticles, ...finalOutcome.value };

        logger.info('[%s] Final transcript: "%s"', context.requestId, finalContext.finalTranscript);
        return { context: finalContext, trace };
    };

    const run = async (request: RequestContext, options: ParticleRunOptions = {}): Promise<PipelineRun<FinalContext>> => {
        const first = await consensus(request, options.signal);
        const second = await particles(first.context, options);
        return { context: second.context, trace: [...first.trace, ...second.trace] };
    };

    return { consensus, particles, run };
};
