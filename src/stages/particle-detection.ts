/**
 * Particle Detection Stage
 *
 * Two generation calls over the designated backend's phoneme track:
 * find candidate discourse particles, then place the confirmed ones in the
 * validated transcript. Placements are never invented: either call failing
 * leaves the particle list empty.
 */

import { z } from 'zod';
import * as Logging from '../logging';
import { PhonemeTrack } from '../dispatch/types';
import { FunctionDeclaration } from '../generation/types';
import { Insertion, Timing } from '../particles';
import { ParticleRegistryInstance, normalizeSurface } from '../particles/registry';
import { TimingAnalysis, TimingPolicy } from '../particles/timing';
import { RunnerInstance, skipped } from '../pipeline/runner';
import {
    DetectedParticle,
    ParticleCandidate,
    ParticleFields,
    Stage,
    StageOutcome,
    StageSpec,
    ValidationContext,
} from '../pipeline/types';

export const DETECTION_FUNCTION = 'find_discourse_particles';
export const PLACEMENT_FUNCTION = 'analyze_particle_placement';

const EMPTY: ParticleFields = { particleCandidates: [], detectedParticles: [], placementReasoning: '' };

// ============================================================================
// (a) Candidate detection
// ============================================================================

export interface DetectionInput {
    context: ValidationContext;
    track: PhonemeTrack;
    analysis: TimingAnalysis;
    /** accepted surface form → region it is registered under */
    inventory: Record<string, string>;
}

const DetectionArgsSchema = z.object({
    particlesFound: z.array(z.object({
        particle: z.string(),
        ipa: z.union([z.string(), z.array(z.string())]).optional(),
        confidence: z.number().min(0).max(1).default(0.5),
        timestamp: z.number().nullish(),
        wordIndex: z.number().int().nullish(),
        charOffset: z.number().int().nullish(),
    })),
});

type DetectionArgs = z.infer<typeof DetectionArgsSchema>;

const detectionDeclaration = (particles: string[]): FunctionDeclaration => ({
    name: DETECTION_FUNCTION,
    description: 'Report phoneme sequences that plausibly are discourse particles',
    parameters: {
        type: 'object',
        properties: {
            particlesFound: {
                type: 'array',
                description: 'Candidate particles; empty when none are plausible',
                items: {
                    type: 'object',
                    properties: {
                        particle: { type: 'string', enum: particles },
                        ipa: { type: 'string', description: 'Source phonemes, space separated' },
                        confidence: { type: 'number', description: '0 to 1' },
                        timestamp: { type: 'number', description: 'Start time in seconds' },
                        wordIndex: {
                            type: 'integer',
                            description: '0-based index of the word the particle follows; -1 for before the first word',
                        },
                        charOffset: { type: 'integer', description: 'Character offset in the transcript where the particle falls' },
                    },
                    required: ['particle', 'confidence'],
                },
            },
        },
        required: ['particlesFound'],
    },
});

const toPhonemes = (ipa: string | string[] | undefined): string[] => {
    if (ipa === undefined) return [];
    const list = typeof ipa === 'string' ? ipa.split(/\s+/) : ipa;
    return list.map(p => p.trim()).filter(p => p.length > 0);
};

const detectionPrompt = ({ context, track, analysis, inventory }: DetectionInput): string => {
    const tokens = Insertion.words(context.validatedTranscript);
    const hints = analysis.hints.length > 0
        ? analysis.hints.map(hint => `- [${hint.phonemes.join(' ')}] at ${hint.start.toFixed(2)}-${hint.end.toFixed(2)}s resembles "${hint.particle}" (distance ${hint.distance})`).join('\n')
        : '- none';
    const timing = track.timedPhonemes
        .map(p => `${p.phoneme}@${p.start.toFixed(2)}-${p.end.toFixed(2)}`)
        .join(' ');

    return `Find discourse particles in this phoneme stream.

Region: ${context.region}
Target particles: ${Object.keys(inventory).join(', ')}

Transcript: "${context.validatedTranscript}"
Words (${tokens.length}): ${JSON.stringify(tokens)}

Phonemes: ${track.phonemes.join(' ')}
Timed phonemes: ${timing}

Speech metrics: ${analysis.metrics.durationSec}s, ${analysis.metrics.phonemeCount} phonemes, ${analysis.metrics.phonemesPerSecond} phonemes/s, ${analysis.metrics.segmentCount} segments
Short segments isolated by silence:
${hints}

Instructions:
- Only report particles from the target list
- Particles are short, unstressed and separate from the words around them
- Allow for reduced or varied pronunciations
- Give the index of the word each particle follows, or its character offset in the transcript
- Return an empty list when nothing is plausible

Call ${DETECTION_FUNCTION} with your analysis.`;
};

export const detectionSpec: StageSpec<DetectionInput, ParticleCandidate[], DetectionArgs> = {
    name: 'particle-detection',

    buildRequest: (input) => ({
        prompt: detectionPrompt(input),
        functionDeclaration: detectionDeclaration(Object.keys(input.inventory)),
    }),

    schema: DetectionArgsSchema,

    accept: (args, input) => {
        const transcript = input.context.validatedTranscript;
        const tokens = Insertion.words(transcript);
        const candidates: ParticleCandidate[] = [];
        for (const found of args.particlesFound) {
            const form = normalizeSurface(found.particle);
            const region = Object.hasOwn(input.inventory, form) ? input.inventory[form] : undefined;
            if (region === undefined) continue;
            const wordIndex = found.wordIndex !== null && found.wordIndex !== undefined
                ? Insertion.resolveWordIndex(tokens, found.wordIndex)
                : found.charOffset !== null && found.charOffset !== undefined
                    ? Insertion.wordIndexAtOffset(transcript, found.charOffset)
                    : null;
            candidates.push({
                candidateForm: form,
                sourcePhonemes: toPhonemes(found.ipa),
                confidence: found.confidence,
                region,
                timestamp: found.timestamp ?? null,
                wordIndex,
                charOffset: wordIndex === null ? null : Insertion.charOffsetAfterWord(transcript, wordIndex),
            });
        }
        return candidates;
    },

    fallback: () => [],
};

// ============================================================================
// (b) Placement
// ============================================================================

export interface PlacementInput {
    context: ValidationContext;
    candidates: ParticleCandidate[];
}

export interface PlacementValue {
    detectedParticles: DetectedParticle[];
    placementReasoning: string;
}

const PlacementArgsSchema = z.object({
    detectedParticles: z.array(z.string()),
    particlePositions: z.array(z.object({
        particle: z.string(),
        insertAfterWordIndex: z.number().int(),
        afterWord: z.string().optional(),
    })),
    placementReasoning: z.string().default(''),
});

type PlacementArgs = z.infer<typeof PlacementArgsSchema>;

const PLACEMENT_DECLARATION: FunctionDeclaration = {
    name: PLACEMENT_FUNCTION,
    description: 'Decide which candidate particles belong in the transcript and where',
    parameters: {
        type: 'object',
        properties: {
            detectedParticles: {
                type: 'array',
                items: { type: 'string' },
                description: 'Candidate particles confirmed as spoken',
            },
            particlePositions: {
                type: 'array',
                items: {
                    type: 'object',
                    properties: {
                        particle: { type: 'string' },
                        insertAfterWordIndex: {
                            type: 'integer',
                            description: '0-based index of the word the particle follows; -1 for before the first word',
                        },
                        afterWord: { type: 'string', description: 'The word at insertAfterWordIndex' },
                    },
                    required: ['particle', 'insertAfterWordIndex'],
                },
            },
            placementReasoning: { type: 'string' },
        },
        required: ['detectedParticles', 'particlePositions'],
    },
};

const strongest = (candidates: readonly ParticleCandidate[], form: string): ParticleCandidate | undefined =>
    candidates
        .filter(candidate => candidate.candidateForm === form)
        .reduce<ParticleCandidate | undefined>((best, c) => (!best || c.confidence > best.confidence ? c : best), undefined);

export const placementSpec: StageSpec<PlacementInput, PlacementValue, PlacementArgs> = {
    name: 'particle-placement',

    buildRequest: ({ context, candidates }) => {
        const tokens = Insertion.words(context.validatedTranscript);
        const indexed = tokens.map((word, index) => `${index}:${word}`).join(' ');
        const listed = candidates
            .map(c => {
                const timing = c.timestamp !== null ? ` at ${c.timestamp}s` : '';
                const position = c.wordIndex !== null ? `, after word ${c.wordIndex} (char ${c.charOffset})` : '';
                return `- ${c.candidateForm} [${c.sourcePhonemes.join(' ')}] confidence ${c.confidence}${timing}${position}`;
            })
            .join('\n');
        return {
            prompt: `Place confirmed discourse particles in the transcript.

Transcript: "${context.validatedTranscript}"
Indexed words: ${indexed}

Candidates:
${listed}

Instructions:
- Confirm only candidates that are audible and absent from the transcript
- For each confirmed particle give the index of the word it follows (-1 for before the first word)
- Use timing and sentence structure to choose the position

Call ${PLACEMENT_FUNCTION} with your analysis.`,
            functionDeclaration: PLACEMENT_DECLARATION,
        };
    },

    schema: PlacementArgsSchema,

    accept: (args, { context, candidates }) => {
        const transcript = context.validatedTranscript;
        const tokens = Insertion.words(transcript);
        const confirmed = new Set(args.detectedParticles.map(normalizeSurface));
        const placed: DetectedParticle[] = [];
        const seen = new Set<string>();

        for (const position of args.particlePositions) {
            const form = normalizeSurface(position.particle);
            const candidate = strongest(candidates, form);
            if (!candidate || !confirmed.has(form)) continue;
            const index = Insertion.resolveWordIndex(tokens, position.insertAfterWordIndex, position.afterWord);
            if (index === null) continue;
            const key = `${form}@${index}`;
            if (seen.has(key)) continue;
            seen.add(key);
            placed.push({
                surfaceForm: form,
                sourcePhonemes: candidate.sourcePhonemes,
                confidence: candidate.confidence,
                insertAfterWordIndex: index,
                insertAfterCharOffset: Insertion.charOffsetAfterWord(transcript, index),
            });
        }

        return {
            detectedParticles: placed.sort((a, b) => a.insertAfterWordIndex - b.insertAfterWordIndex),
            placementReasoning: args.placementReasoning.trim(),
        };
    },

    fallback: () => ({ detectedParticles: [], placementReasoning: '' }),
};

// ============================================================================
// Human override
// ============================================================================

export interface ParticleOverride {
    particle: string;
    insertAfterWordIndex: number;
    afterWord?: string;
    confidence?: number;
    sourcePhonemes?: string[];
}

/**
 * Use reviewer-supplied particles instead of running detection.
 */
export const applyOverride = (context: ValidationContext, overrides: readonly ParticleOverride[]): StageOutcome<ParticleFields> => {
    const logger = Logging.getLogger();
    const startTime = Date.now();
    const transcript = context.validatedTranscript;
    const tokens = Insertion.words(transcript);

    const detectedParticles: DetectedParticle[] = [];
    for (const override of overrides) {
        const surfaceForm = override.particle.trim();
        const index = Insertion.resolveWordIndex(tokens, override.insertAfterWordIndex, override.afterWord);
        if (surfaceForm.length === 0 || index === null) {
            logger.warn('Ignoring particle override "%s" at word %d', override.particle, override.insertAfterWordIndex);
            continue;
        }
        detectedParticles.push({
            surfaceForm,
            sourcePhonemes: override.sourcePhonemes ?? [],
            confidence: override.confidence ?? 1,
            insertAfterWordIndex: index,
            insertAfterCharOffset: Insertion.charOffsetAfterWord(transcript, index),
        });
    }

    return {
        ok: true,
        value: {
            particleCandidates: [],
            detectedParticles: detectedParticles.sort((a, b) => a.insertAfterWordIndex - b.insertAfterWordIndex),
            placementReasoning: 'Particles supplied by reviewer',
        },
        durationMs: Date.now() - startTime,
        source: 'override',
    };
};

// ============================================================================
// Stage
// ============================================================================

export interface ParticleDetectionConfig {
    runner: RunnerInstance;
    particles: ParticleRegistryInstance;
    policy: TimingPolicy;
}

export const create = (config: ParticleDetectionConfig): Stage<ValidationContext, ParticleFields> =>
    async (context, signal) => {
        const startTime = Date.now();
        const track = context.phonemeTrack;

        if (!track || track.timedPhonemes.length === 0) {
            return skipped(EMPTY, 'no phoneme timing available', startTime);
        }
        if (context.validatedTranscript.trim().length === 0) {
            return skipped(EMPTY, 'empty transcript', startTime);
        }
        const forms = config.particles.forms(context.region);
        if (forms.length === 0) {
            return skipped(EMPTY, `no particles registered for region ${context.region}`, startTime);
        }

        const inventory: Record<string, string> = {};
        for (const form of forms) {
            inventory[form.particle] ??= form.region;
        }
        const analysis = Timing.analyze(track.timedPhonemes, forms, config.policy);

        const detection = await config.runner.run(detectionSpec, { context, track, analysis, inventory }, signal);
        if (!detection.ok) {
            return { ...detection, value: EMPTY, durationMs: Date.now() - startTime };
        }
        const candidates = detection.value;
        if (candidates.length === 0) {
            return {
                ok: true,
                value: { ...EMPTY, placementReasoning: 'No candidate particles found' },
                durationMs: Date.now() - startTime,
                source: 'generation',
            };
        }

        const placement = await config.runner.run(placementSpec, { context, candidates }, signal);
        const value: ParticleFields = {
            particleCandidates: candidates,
            detectedParticles: placement.value.detectedParticles,
            placementReasoning: placement.value.placementReasoning,
        };
        return { ...placement, value, durationMs: Date.now() - startTime };
    };
