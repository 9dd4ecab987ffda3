import { describe, expect, it } from 'vitest';
import * as Aggregate from '../../src/dispatch/aggregate';
import { BackendResult } from '../../src/dispatch/types';
import { GenerationClient } from '../../src/generation/types';
import * as Registry from '../../src/particles/registry';
import * as Pipeline from '../../src/pipeline';
import { SearchClient } from '../../src/search/types';
import { ParticleDetection } from '../../src/stages';
import { particleTrack } from '../helpers/contexts';
import { scriptedGeneration, unavailableGeneration } from '../helpers/fake-generation';

const success = (backend: string, transcript: string, diagnostics: Record<string, unknown> = {}): BackendResult => ({
    backend,
    status: 'success',
    transcript,
    elapsedMs: 100,
    serviceProcessingTime: 0.1,
    modelInfo: {},
    diagnostics,
});

const track = particleTrack();

const envelope = Aggregate.fold({
    audioFilename: 'clip.wav',
    startedAt: Date.now(),
    requestedBackends: ['whisper', 'wav2vec', 'vosk', 'allosaurus'],
    healthyBackends: ['whisper', 'wav2vec', 'vosk', 'allosaurus'],
    results: [
        success('whisper', "don't be like that man"),
        success('wav2vec', 'dont be like that man'),
        success('vosk', 'do not be like that man'),
        success('allosaurus', track.phonemes.join(' '), { timed_phonemes: track.timedPhonemes }),
    ],
});

const request = Pipeline.fromEnvelope(envelope, {
    userContext: 'Friends chatting in Singapore',
    region: 'southeast_asian',
    phonemeBackend: 'allosaurus',
    requestId: 'req-42',
});

const unusedSearch: SearchClient = {
    isConfigured: () => true,
    search: async (query) => {
        throw new Error(`unexpected search for ${query}`);
    },
};

const pipelineWith = (client: GenerationClient) => Pipeline.create({
    runner: Pipeline.Runner.create({ client, timeoutMs: 1000 }),
    search: unusedSearch,
    particles: Registry.create(),
    policy: { minGapMs: 50, maxSegmentPhonemes: 3, maxPhonemeDistance: 1 },
    maxSearchQueries: 3,
});

const scripts = {
    establish_basic_consensus: {
        consensusTranscript: "don't be like that man",
        agreementScore: 0.8,
        primaryBackend: 'whisper',
    },
    identify_search_worthy_terms: { searchQueries: [], searchReasoning: 'Everyday words only' },
    [ParticleDetection.DETECTION_FUNCTION]: {
        particlesFound: [{ particle: 'la', ipa: 'l a', confidence: 0.9, timestamp: 1.7 }],
    },
    [ParticleDetection.PLACEMENT_FUNCTION]: {
        detectedParticles: ['la'],
        particlePositions: [{ particle: 'la', insertAfterWordIndex: 3, afterWord: 'that' }],
        placementReasoning: 'Isolated [l a] between "that" and "man"',
    },
    generate_final_transcriptions: {
        cleanTranscript: "don't be like that man",
        allParticlesTranscript: "don't be like that la man",
        finalTranscript: "don't be like that la man",
        confidenceScore: 0.82,
        accentAnalysis: 'Singapore English',
    },
};

describe('Request context from a dispatch envelope', () => {
    it('keeps the phoneme backend out of the consensus input', () => {
        expect(request.requestId).toBe('req-42');
        expect(request.transcripts).toEqual({
            whisper: "don't be like that man",
            wav2vec: 'dont be like that man',
            vosk: 'do not be like that man',
        });
        expect(request.phonemeTrack?.backend).toBe('allosaurus');
        expect(request.phonemeTrack?.timedPhonemes).toHaveLength(10);
    });

    it('generates a request id when none is given', () => {
        const generated = Pipeline.fromEnvelope(envelope, { userContext: '', region: 'none', phonemeBackend: 'allosaurus' });

        expect(generated.requestId).toMatch(/^[0-9a-f-]{36}$/);
    });
});

describe('Analysis pipeline', () => {
    it('inserts a detected particle after its word', async () => {
        const client = scriptedGeneration(scripts);

        const { context, trace } = await pipelineWith(client).run(request);

        expect(context.consensusTranscript).toBe("don't be like that man");
        expect(context.validatedTranscript).toBe("don't be like that man");
        expect(context.detectedParticles).toEqual([{
            surfaceForm: 'la',
            sourcePhonemes: ['l', 'a'],
            confidence: 0.9,
            insertAfterWordIndex: 3,
            insertAfterCharOffset: 18,
        }]);
        expect(context.cleanTranscript).toBe("don't be like that man");
        expect(context.allParticlesTranscript).toBe("don't be like that la man");
        expect(context.strictTranscript).toBe("don't be like that man");
        expect(context.confidenceScore).toBe(0.82);
        expect(trace.map(entry => [entry.stage, entry.source])).toEqual([
            ['consensus', 'generation'],
            ['search-analysis', 'generation'],
            ['web-validation', 'skipped'],
            ['particle-detection', 'generation'],
            ['final-assembly', 'generation'],
        ]);
        expect(client.calls.map(call => call.functionDeclaration?.name)).toEqual([
            'establish_basic_consensus',
            'identify_search_worthy_terms',
            'find_discourse_particles',
            'analyze_particle_placement',
            'generate_final_transcriptions',
        ]);
    });

    it('completes on fallbacks when generation is unavailable', async () => {
        const { context, trace } = await pipelineWith(unavailableGeneration()).run(request);

        expect(context.consensusTranscript).toBe('do not be like that man');
        expect(context.primaryBackend).toBe('vosk');
        expect(context.agreementScore).toBe(0);
        expect(context.searchQueries).toEqual([]);
        expect(context.validatedTranscript).toBe('do not be like that man');
        expect(context.detectedParticles).toEqual([]);
        expect(context.finalTranscript).toBe('do not be like that man');
        expect(context.allParticlesTranscript).toBe('do not be like that man');
        expect(trace.every(entry => !entry.ok)).toBe(true);
        expect(trace.map(entry => entry.failure)).toEqual(['transport', 'transport', 'skipped', 'transport', 'transport']);
    });

    it('stops after validation for a consensus-only run', async () => {
        const client = scriptedGeneration(scripts);

        const { context, trace } = await pipelineWith(client).consensus(request);

        expect(context.validatedTranscript).toBe("don't be like that man");
        expect(trace.map(entry => entry.stage)).toEqual(['consensus', 'search-analysis', 'web-validation']);
    });

    it('uses reviewer particles instead of detection', async () => {
        const client = scriptedGeneration({});
        const { context: validated } = await pipelineWith(unavailableGeneration()).consensus(request);

        const { context, trace } = await pipelineWith(client).particles(validated, {
            override: [{ particle: 'lah', insertAfterWordIndex: -1 }],
        });

        expect(trace[0]).toEqual({ stage: 'particle-detection', ok: true, source: 'override', durationMs: trace[0].durationMs });
        expect(context.placementReasoning).toBe('Particles supplied by reviewer');
        expect(context.allParticlesTranscript).toBe('lah do not be like that man');
        expect(client.calls.map(call => call.functionDeclaration?.name)).toEqual(['generate_final_transcriptions']);
    });
});
