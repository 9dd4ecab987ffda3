import { describe, expect, it } from 'vitest';
import * as Runner from '../../src/pipeline/runner';
import * as ParticleDetection from '../../src/stages/particle-detection';
import * as Registry from '../../src/particles/registry';
import { GenerationClient } from '../../src/generation/types';
import { particleTrack, validationContext } from '../helpers/contexts';
import { scriptedGeneration } from '../helpers/fake-generation';

const policy = { minGapMs: 50, maxSegmentPhonemes: 3, maxPhonemeDistance: 1 };

const stageWith = (client: GenerationClient) => ParticleDetection.create({
    runner: Runner.create({ client, timeoutMs: 1000 }),
    particles: Registry.create(),
    policy,
});

const context = validationContext({ phonemeTrack: particleTrack() });

const detection = {
    particlesFound: [
        { particle: 'La', ipa: 'l a', confidence: 0.9, timestamp: 1.7 },
        { particle: 'innit', confidence: 0.4 },
    ],
};

describe('Particle detection stage', () => {
    it('detects and places a particle', async () => {
        const client = scriptedGeneration({
            [ParticleDetection.DETECTION_FUNCTION]: detection,
            [ParticleDetection.PLACEMENT_FUNCTION]: {
                detectedParticles: ['la'],
                particlePositions: [{ particle: 'la', insertAfterWordIndex: 3, afterWord: 'that' }],
                placementReasoning: ' Softener before the address term ',
            },
        });

        const outcome = await stageWith(client)(context);

        expect(outcome.ok).toBe(true);
        expect(outcome.value).toEqual({
            particleCandidates: [{
                candidateForm: 'la',
                sourcePhonemes: ['l', 'a'],
                confidence: 0.9,
                region: 'southeast_asian',
                timestamp: 1.7,
                wordIndex: null,
                charOffset: null,
            }],
            detectedParticles: [{
                surfaceForm: 'la',
                sourcePhonemes: ['l', 'a'],
                confidence: 0.9,
                insertAfterWordIndex: 3,
                insertAfterCharOffset: 18,
            }],
            placementReasoning: 'Softener before the address term',
        });
        expect(client.calls[0].prompt).toContain('[l a] at 1.70-1.80s resembles "la" (distance 0)');
        expect(client.calls[1].prompt).toContain('0:don\'t 1:be 2:like 3:that 4:man');
    });

    it('ties candidates to a word and character offset', async () => {
        const client = scriptedGeneration({
            [ParticleDetection.DETECTION_FUNCTION]: {
                particlesFound: [
                    { particle: 'la', ipa: 'l a', confidence: 0.9, wordIndex: 3, charOffset: 18 },
                    { particle: 'lah', confidence: 0.6, charOffset: 20 },
                    { particle: 'lor', confidence: 0.5, wordIndex: 12 },
                ],
            },
            [ParticleDetection.PLACEMENT_FUNCTION]: { detectedParticles: [], particlePositions: [] },
        });

        const outcome = await stageWith(client)(context);

        expect(outcome.value.particleCandidates.map(c => [c.candidateForm, c.wordIndex, c.charOffset])).toEqual([
            ['la', 3, 18],
            ['lah', 3, 18],
            ['lor', null, null],
        ]);
        expect(client.calls[1].prompt).toContain('- la [l a] confidence 0.9, after word 3 (char 18)');
    });

    it('corrects an index that disagrees with the named word', async () => {
        const client = scriptedGeneration({
            [ParticleDetection.DETECTION_FUNCTION]: detection,
            [ParticleDetection.PLACEMENT_FUNCTION]: {
                detectedParticles: ['la'],
                particlePositions: [{ particle: 'la', insertAfterWordIndex: 2, afterWord: 'that' }],
            },
        });

        const outcome = await stageWith(client)(context);

        expect(outcome.value.detectedParticles[0].insertAfterWordIndex).toBe(3);
    });

    it('drops placements that were not confirmed', async () => {
        const client = scriptedGeneration({
            [ParticleDetection.DETECTION_FUNCTION]: detection,
            [ParticleDetection.PLACEMENT_FUNCTION]: {
                detectedParticles: [],
                particlePositions: [{ particle: 'la', insertAfterWordIndex: 3 }],
            },
        });

        const outcome = await stageWith(client)(context);

        expect(outcome.value.particleCandidates).toHaveLength(1);
        expect(outcome.value.detectedParticles).toEqual([]);
    });

    it('keeps candidates but places nothing when placement fails', async () => {
        const client = scriptedGeneration({ [ParticleDetection.DETECTION_FUNCTION]: detection });

        const outcome = await stageWith(client)(context);

        expect(outcome).toMatchObject({ ok: false, source: 'fallback', failure: 'transport' });
        expect(outcome.value.particleCandidates).toHaveLength(1);
        expect(outcome.value.detectedParticles).toEqual([]);
    });

    it('returns nothing when detection fails', async () => {
        const outcome = await stageWith(scriptedGeneration({}))(context);

        expect(outcome).toMatchObject({ ok: false, failure: 'transport' });
        expect(outcome.value).toEqual({ particleCandidates: [], detectedParticles: [], placementReasoning: '' });
    });

    it('stops after detection when no candidates are found', async () => {
        const client = scriptedGeneration({ [ParticleDetection.DETECTION_FUNCTION]: { particlesFound: [] } });

        const outcome = await stageWith(client)(context);

        expect(outcome).toMatchObject({ ok: true, source: 'generation' });
        expect(outcome.value.placementReasoning).toBe('No candidate particles found');
        expect(client.calls).toHaveLength(1);
    });

    it('skips without phoneme timing', async () => {
        const client = scriptedGeneration({});
        const empty = { backend: 'allosaurus', phonemes: ['l', 'a'], timedPhonemes: [] };

        const withoutTrack = await stageWith(client)(validationContext());
        const withoutTiming = await stageWith(client)(validationContext({ phonemeTrack: empty }));

        expect(withoutTrack).toMatchObject({ source: 'skipped', reason: 'skipped: no phoneme timing available' });
        expect(withoutTiming.value.detectedParticles).toEqual([]);
        expect(client.calls).toEqual([]);
    });

    it('skips a region without particles', async () => {
        const outcome = await stageWith(scriptedGeneration({}))({ ...context, region: 'none' });

        expect(outcome).toMatchObject({ reason: 'skipped: no particles registered for region none' });
    });
});

describe('Reviewer override', () => {
    it('places the supplied particles and ignores unusable ones', () => {
        const outcome = ParticleDetection.applyOverride(validationContext(), [
            { particle: 'lah', insertAfterWordIndex: 4 },
            { particle: ' ', insertAfterWordIndex: 1 },
            { particle: 'meh', insertAfterWordIndex: 9 },
            { particle: 'lor', insertAfterWordIndex: 0, confidence: 0.7, sourcePhonemes: ['l', 'ɔ'] },
        ]);

        expect(outcome).toMatchObject({ ok: true, source: 'override' });
        expect(outcome.value).toEqual({
            particleCandidates: [],
            detectedParticles: [
                { surfaceForm: 'lor', sourcePhonemes: ['l', 'ɔ'], confidence: 0.7, insertAfterWordIndex: 0, insertAfterCharOffset: 5 },
                { surfaceForm: 'lah', sourcePhonemes: [], confidence: 1, insertAfterWordIndex: 4, insertAfterCharOffset: 22 },
            ],
            placementReasoning: 'Particles supplied by reviewer',
        });
    });
});
