/**
 * Final Assembly Stage
 *
 * Produces the transcript variants handed back to the caller: clean (no
 * particles), strict (well-evidenced particles only), all particles, and
 * the recommended final text.
 */

import { z } from 'zod';
import { FunctionDeclaration } from '../generation/types';
import { Insertion } from '../particles';
import { RunnerInstance } from '../pipeline/runner';
import { FinalFields, ParticleContext, Stage, StageSpec } from '../pipeline/types';

export const FUNCTION_NAME = 'generate_final_transcriptions';

const DECLARATION: FunctionDeclaration = {
    name: FUNCTION_NAME,
    description: 'Produce the final transcript variants and an overall confidence',
    parameters: {
        type: 'object',
        properties: {
            cleanTranscript: { type: 'string', description: 'Transcript without any discourse particles' },
            strictTranscript: {
                type: 'string',
                description: 'Transcript with only strongly evidenced particles at their confirmed positions',
            },
            allParticlesTranscript: {
                type: 'string',
                description: 'Transcript with every detected particle inserted at its most plausible position',
            },
            finalTranscript: { type: 'string', description: 'The most natural reading of the utterance' },
            confidenceScore: { type: 'number', description: 'Overall confidence, 0 to 1' },
            accentAnalysis: { type: 'string', description: 'Notes on accent and speech patterns' },
        },
        required: ['cleanTranscript', 'allParticlesTranscript', 'finalTranscript', 'confidenceScore'],
    },
};

const ArgsSchema = z.object({
    cleanTranscript: z.string(),
    strictTranscript: z.string().optional(),
    allParticlesTranscript: z.string(),
    finalTranscript: z.string(),
    confidenceScore: z.number().min(0).max(1),
    accentAnalysis: z.string().default(''),
});

type FinalArgs = z.infer<typeof ArgsSchema>;

const describeParticles = (input: ParticleContext): string => {
    if (input.detectedParticles.length === 0) {
        return '- none';
    }
    return input.detectedParticles
        .map(p => `- "${p.surfaceForm}" after word ${p.insertAfterWordIndex} (confidence ${p.confidence})`)
        .join('\n');
};

export const spec: StageSpec<ParticleContext, FinalFields, FinalArgs> = {
    name: 'final-assembly',

    skip: (input) => input.validatedTranscript.trim().length === 0 ? 'empty transcript' : null,

    buildRequest: (input) => ({
        prompt: `Assemble the final transcript from the analysis below.

Consensus: "${input.consensusTranscript}" (agreement ${input.agreementScore}, best backend ${input.primaryBackend || 'n/a'})
Search queries: ${JSON.stringify(input.searchQueries)}
Validated transcript: "${input.validatedTranscript}"
Region: ${input.region}

Detected particles:
${describeParticles(input)}

Instructions:
- The clean variant contains no discourse particles
- The strict variant inserts only particles with strong evidence at their given positions
- The all-particles variant inserts every detected particle
- The final variant is the most natural reading
- Build every variant on the validated transcript

Call ${FUNCTION_NAME} with your analysis.`,
        functionDeclaration: DECLARATION,
    }),

    schema: ArgsSchema,

    validate: (args) => {
        const empty = (['cleanTranscript', 'allParticlesTranscript', 'finalTranscript'] as const)
            .filter(field => args[field].trim().length === 0);
        return empty.length > 0 ? `empty ${empty.join(', ')}` : null;
    },

    accept: (args) => {
        const cleanTranscript = args.cleanTranscript.trim();
        return {
            cleanTranscript,
            strictTranscript: args.strictTranscript?.trim() || cleanTranscript,
            allParticlesTranscript: args.allParticlesTranscript.trim(),
            finalTranscript: args.finalTranscript.trim(),
            confidenceScore: args.confidenceScore,
            accentAnalysis: args.accentAnalysis.trim(),
        };
    },

    fallback: (input) => ({
        cleanTranscript: input.validatedTranscript,
        strictTranscript: input.validatedTranscript,
        allParticlesTranscript: input.detectedParticles.length > 0
            ? Insertion.insertParticles(input.validatedTranscript, input.detectedParticles)
            : input.validatedTranscript,
        finalTranscript: input.validatedTranscript,
        confidenceScore: input.agreementScore,
        accentAnalysis: '',
    }),
};

export const create = (runner: RunnerInstance): Stage<ParticleContext, FinalFields> =>
    (context, signal) => runner.run(spec, context, signal);
