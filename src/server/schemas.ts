/**
 * Request and response shapes for the HTTP surface.
 */

import { z } from 'zod';
import { Aggregate, DispatchEnvelope } from '../dispatch';
import { FinalContext, PipelineRun, ValidationContext } from '../pipeline';

// ============================================================================
// Requests
// ============================================================================

export const TimedPhonemeSchema = z.object({
    phoneme: z.string().min(1),
    start: z.number().nonnegative(),
    end: z.number().nonnegative(),
});

export const PhonemeTrackSchema = z.object({
    backend: z.string().default('unknown'),
    phonemes: z.array(z.string()).default([]),
    timedPhonemes: z.array(TimedPhonemeSchema).default([]),
});

export const ParticleOverrideSchema = z.object({
    particle: z.string().trim().min(1),
    insertAfterWordIndex: z.number().int().min(-1),
    afterWord: z.string().optional(),
    confidence: z.number().min(0).max(1).optional(),
    sourcePhonemes: z.array(z.string()).optional(),
});

export const ParticleOverrideListSchema = z.array(ParticleOverrideSchema);

const SearchEvidenceSchema = z.object({
    query: z.string(),
    answer: z.string().default(''),
    topResults: z.array(z.object({
        title: z.string().default(''),
        content: z.string().default(''),
        url: z.string().default(''),
    })).default([]),
});

/**
 * The body returned by /transcribe-consensus, as sent back for the
 * particle pass. Only the consensus block is required.
 */
export const ConsensusPayloadSchema = z.object({
    requestId: z.string().optional(),
    alternatives: z.record(z.string()).default({}),
    region: z.string().optional(),
    context: z.string().optional(),
    consensus: z.object({
        consensusTranscript: z.string(),
        agreementScore: z.number().min(0).max(1),
        primaryBackend: z.string().default(''),
        transcriptionVariants: z.array(z.string()).default([]),
    }),
    search: z.object({
        searchQueries: z.array(z.string()).default([]),
        searchReasoning: z.string().default(''),
        uncertainTerms: z.array(z.string()).default([]),
        properNouns: z.array(z.string()).default([]),
        technicalTerms: z.array(z.string()).default([]),
    }).default({}),
    validation: z.object({
        validatedTranscript: z.string().optional(),
        searchEvidence: z.array(SearchEvidenceSchema).default([]),
        confirmedProperNouns: z.array(z.string()).default([]),
        validatedCorrections: z.array(z.string()).default([]),
    }).default({}),
    phonemeTrack: PhonemeTrackSchema.nullish(),
});

export const ParticlesRequestSchema = z.object({
    consensus: ConsensusPayloadSchema,
    phonemeTrack: PhonemeTrackSchema.nullish(),
    region: z.string().optional(),
    context: z.string().optional(),
    particleOverride: ParticleOverrideListSchema.optional(),
});

export type ParticlesRequest = z.infer<typeof ParticlesRequestSchema>;

export const toValidationContext = (
    body: ParticlesRequest,
    defaults: { requestId: string; region: string; context: string }
): ValidationContext => {
    const payload = body.consensus;
    return {
        requestId: payload.requestId ?? defaults.requestId,
        userContext: body.context ?? payload.context ?? defaults.context,
        region: body.region ?? payload.region ?? defaults.region,
        transcripts: payload.alternatives,
        phonemeTrack: body.phonemeTrack ?? payload.phonemeTrack ?? null,
        ...payload.consensus,
        ...payload.search,
        validatedTranscript: payload.validation.validatedTranscript ?? payload.consensus.consensusTranscript,
        searchEvidence: payload.validation.searchEvidence,
        confirmedProperNouns: payload.validation.confirmedProperNouns,
        validatedCorrections: payload.validation.validatedCorrections,
    };
};

// ============================================================================
// Responses
// ============================================================================

export const metadataOf = (envelope: DispatchEnvelope) => ({
    audioFilename: envelope.audioFilename,
    timestamp: envelope.timestamp,
    requestedBackends: envelope.requestedBackends,
    healthyBackends: envelope.healthyBackends,
    successCount: envelope.successCount,
    totalElapsedMs: envelope.totalElapsedMs,
    failures: Aggregate.failures(envelope),
});

export const transcribeBody = (envelope: DispatchEnvelope) => ({
    ...envelope,
    transcriptions: Aggregate.transcripts(envelope),
});

export const consensusBody = (envelope: DispatchEnvelope, run: PipelineRun<ValidationContext>) => {
    const ctx = run.context;
    return {
        requestId: ctx.requestId,
        primary: ctx.validatedTranscript,
        alternatives: ctx.transcripts,
        region: ctx.region,
        context: ctx.userContext,
        consensus: {
            consensusTranscript: ctx.consensusTranscript,
            agreementScore: ctx.agreementScore,
            primaryBackend: ctx.primaryBackend,
            transcriptionVariants: ctx.transcriptionVariants,
        },
        search: {
            searchQueries: ctx.searchQueries,
            searchReasoning: ctx.searchReasoning,
            uncertainTerms: ctx.uncertainTerms,
            properNouns: ctx.properNouns,
            technicalTerms: ctx.technicalTerms,
        },
        validation: {
            validatedTranscript: ctx.validatedTranscript,
            searchEvidence: ctx.searchEvidence,
            confirmedProperNouns: ctx.confirmedProperNouns,
            validatedCorrections: ctx.validatedCorrections,
        },
        phonemeTrack: ctx.phonemeTrack,
        metadata: metadataOf(envelope),
        stages: run.trace,
    };
};

export const finalBody = (run: PipelineRun<FinalContext>) => {
    const ctx = run.context;
    return {
        requestId: ctx.requestId,
        primary: ctx.finalTranscript,
        region: ctx.region,
        validatedTranscript: ctx.validatedTranscript,
        transcripts: {
            clean: ctx.cleanTranscript,
            strict: ctx.strictTranscript,
            allParticles: ctx.allParticlesTranscript,
            final: ctx.finalTranscript,
        },
        confidenceScore: ctx.confidenceScore,
        accentAnalysis: ctx.accentAnalysis,
        particles: {
            candidates: ctx.particleCandidates,
            detected: ctx.detectedParticles,
            placementReasoning: ctx.placementReasoning,
        },
        stages: run.trace,
    };
};
