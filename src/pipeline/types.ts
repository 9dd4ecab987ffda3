/**
 * Pipeline Types
 *
 * The request context grows one stage at a time. Each stage reads the
 * previous readonly context and contributes its own fields; nothing it
 * received is rewritten.
 */

import { z } from 'zod';
import { PhonemeTrack } from '../dispatch/types';
import { FunctionDeclaration } from '../generation/types';

// ============================================================================
// Stage outcomes
// ============================================================================

export type FailureKind = 'timeout' | 'transport' | 'validation' | 'skipped';

export type StageOutcome<T> =
    | { ok: true; value: T; durationMs: number; source: 'generation' | 'override' }
    | { ok: false; value: T; durationMs: number; source: 'fallback' | 'skipped'; failure: FailureKind; reason: string };

export interface StageRequest {
    prompt: string;
    systemPrompt?: string;
    functionDeclaration: FunctionDeclaration;
}

/**
 * One generation call described as data.
 *
 * `schema` checks the function arguments; `validate` adds checks that need
 * the input; `accept` turns validated arguments into the stage value.
 * `buildRequest`, `accept` and `fallback` make no external calls.
 */
export interface StageSpec<I, O, A> {
    name: string;
    skip?(input: I): string | null;
    buildRequest(input: I): StageRequest;
    schema: z.ZodType<A, z.ZodTypeDef, unknown>;
    validate?(args: A, input: I): string | null;
    accept(args: A, input: I): O;
    fallback(input: I): O;
}

export interface StageTrace {
    stage: string;
    ok: boolean;
    source: StageOutcome<unknown>['source'];
    durationMs: number;
    failure?: FailureKind;
    reason?: string;
}

// ============================================================================
// Context
// ============================================================================

export interface RequestContext {
    readonly requestId: string;
    readonly userContext: string;
    readonly region: string;
    /** successful word-level transcripts, keyed by backend */
    readonly transcripts: Readonly<Record<string, string>>;
    readonly phonemeTrack: PhonemeTrack | null;
}

export interface ConsensusFields {
    readonly consensusTranscript: string;
    readonly agreementScore: number;
    readonly primaryBackend: string;
    readonly transcriptionVariants: readonly string[];
}

export interface SearchFields {
    readonly searchQueries: readonly string[];
    readonly searchReasoning: string;
    readonly uncertainTerms: readonly string[];
    readonly properNouns: readonly string[];
    readonly technicalTerms: readonly string[];
}

export interface SearchEvidence {
    query: string;
    answer: string;
    topResults: Array<{ title: string; content: string; url: string }>;
}

export interface ValidationFields {
    readonly validatedTranscript: string;
    readonly searchEvidence: readonly SearchEvidence[];
    readonly confirmedProperNouns: readonly string[];
    readonly validatedCorrections: readonly string[];
}

export interface ParticleCandidate {
    candidateForm: string;
    sourcePhonemes: string[];
    confidence: number;
    region: string;
    /** seconds, when the model tied the candidate to the timing data */
    timestamp: number | null;
    /** word the candidate follows, -1 before the first */
    wordIndex: number | null;
    /** character offset just past that word */
    charOffset: number | null;
}

export interface DetectedParticle {
    surfaceForm: string;
    sourcePhonemes: string[];
    confidence: number;
    insertAfterWordIndex: number;
    insertAfterCharOffset: number;
}

export interface ParticleFields {
    readonly particleCandidates: readonly ParticleCandidate[];
    readonly detectedParticles: readonly DetectedParticle[];
    readonly placementReasoning: string;
}

export interface FinalFields {
    readonly cleanTranscript: string;
    readonly strictTranscript: string;
    readonly allParticlesTranscript: string;
    readonly finalTranscript: string;
    readonly confidenceScore: number;
    readonly accentAnalysis: string;
}

export type ConsensusContext = RequestContext & ConsensusFields;
export type SearchContext = ConsensusContext & SearchFields;
export type ValidationContext = SearchContext & ValidationFields;
export type ParticleContext = ValidationContext & ParticleFields;
export type FinalContext = ParticleContext & FinalFields;

/**
 * A pipeline stage: reads context `C`, yields the fields it owns.
 */
export type Stage<C, F> = (context: C, signal?: AbortSignal) => Promise<StageOutcome<F>>;
