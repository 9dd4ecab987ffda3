import { describe, expect, it } from 'vitest';
import * as Runner from '../../src/pipeline/runner';
import * as FinalAssembly from '../../src/stages/final-assembly';
import { GenerationClient } from '../../src/generation/types';
import { particleContext } from '../helpers/contexts';
import { scriptedGeneration, unavailableGeneration } from '../helpers/fake-generation';

const stageWith = (client: GenerationClient) => FinalAssembly.create(Runner.create({ client, timeoutMs: 1000 }));

const context = particleContext({
    agreementScore: 0.75,
    detectedParticles: [{
        surfaceForm: 'la',
        sourcePhonemes: ['l', 'a'],
        confidence: 0.9,
        insertAfterWordIndex: 3,
        insertAfterCharOffset: 18,
    }],
});

describe('Final assembly stage', () => {
    it('returns the generated variants', async () => {
        const client = scriptedGeneration({
            [FinalAssembly.FUNCTION_NAME]: {
                cleanTranscript: "don't be like that man",
                allParticlesTranscript: "don't be like that la man",
                finalTranscript: "don't be like that la, man",
                confidenceScore: 0.85,
                accentAnalysis: ' Colloquial Singapore English ',
            },
        });

        const outcome = await stageWith(client)(context);

        expect(outcome.ok).toBe(true);
        expect(outcome.value).toEqual({
            cleanTranscript: "don't be like that man",
            strictTranscript: "don't be like that man",
            allParticlesTranscript: "don't be like that la man",
            finalTranscript: "don't be like that la, man",
            confidenceScore: 0.85,
            accentAnalysis: 'Colloquial Singapore English',
        });
    });

    it('builds every variant from the validated transcript when generation fails', async () => {
        const outcome = await stageWith(unavailableGeneration())(context);

        expect(outcome.ok).toBe(false);
        expect(outcome.value).toEqual({
            cleanTranscript: "don't be like that man",
            strictTranscript: "don't be like that man",
            allParticlesTranscript: "don't be like that la man",
            finalTranscript: "don't be like that man",
            confidenceScore: 0.75,
            accentAnalysis: '',
        });
    });

    it('rejects empty variants', async () => {
        const client = scriptedGeneration({
            [FinalAssembly.FUNCTION_NAME]: {
                cleanTranscript: "don't be like that man",
                allParticlesTranscript: "don't be like that la man",
                finalTranscript: '  ',
                confidenceScore: 0.85,
            },
        });

        const outcome = await stageWith(client)(context);

        expect(outcome).toMatchObject({ source: 'fallback', reason: 'validation: empty finalTranscript' });
    });

    it('skips an empty transcript', async () => {
        const outcome = await stageWith(scriptedGeneration({}))(particleContext({ validatedTranscript: '' }));

        expect(outcome).toMatchObject({ source: 'skipped', reason: 'skipped: empty transcript' });
    });
});
