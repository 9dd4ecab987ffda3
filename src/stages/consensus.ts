/**
 * Consensus Stage
 *
 * Picks the most likely transcript among the backend outputs.
 */

import { z } from 'zod';
import { FunctionDeclaration } from '../generation/types';
import { RunnerInstance } from '../pipeline/runner';
import { ConsensusFields, RequestContext, Stage, StageSpec } from '../pipeline/types';

export const FUNCTION_NAME = 'establish_basic_consensus';

const declaration = (backends: string[]): FunctionDeclaration => ({
    name: FUNCTION_NAME,
    description: 'Record the consensus transcription across speech recognition backends',
    parameters: {
        type: 'object',
        properties: {
            consensusTranscript: {
                type: 'string',
                description: 'The most likely correct transcription of the full utterance',
            },
            agreementScore: {
                type: 'number',
                description: 'How closely the backends agree, from 0 (no agreement) to 1 (identical)',
            },
            primaryBackend: {
                type: 'string',
                enum: backends,
                description: 'The backend whose output was closest to the consensus',
            },
            transcriptionVariants: {
                type: 'array',
                items: { type: 'string' },
                description: 'Other plausible readings of the utterance',
            },
        },
        required: ['consensusTranscript', 'agreementScore', 'primaryBackend'],
    },
});

const ArgsSchema = z.object({
    consensusTranscript: z.string(),
    agreementScore: z.number().min(0).max(1),
    primaryBackend: z.string(),
    transcriptionVariants: z.array(z.string()).default([]),
});

type ConsensusArgs = z.infer<typeof ArgsSchema>;

const buildPrompt = (input: RequestContext): string => `Compare these speech recognition results for one recording and establish a consensus.

Context: ${input.userContext}

Results by backend:
${JSON.stringify(input.transcripts, null, 2)}

Instructions:
- Prefer words and phrases that several backends agree on
- Use the context to resolve disagreements
- Keep the full utterance; do not shorten it
- Name the backend whose output is closest to your consensus
- List any other readings that remain plausible

Call ${FUNCTION_NAME} with your analysis.`;

const variantsOf = (transcripts: Readonly<Record<string, string>>, chosen: string): string[] =>
    [...new Set(Object.values(transcripts).map(t => t.trim()))].filter(t => t.length > 0 && t !== chosen);

export const spec: StageSpec<RequestContext, ConsensusFields, ConsensusArgs> = {
    name: 'consensus',

    skip: (input) => Object.keys(input.transcripts).length === 0 ? 'no successful transcripts' : null,

    buildRequest: (input) => ({
        prompt: buildPrompt(input),
        functionDeclaration: declaration(Object.keys(input.transcripts).sort()),
    }),

    schema: ArgsSchema,

    validate: (args, input) => {
        if (!Object.hasOwn(input.transcripts, args.primaryBackend)) {
            return `primaryBackend "${args.primaryBackend}" is not a successful backend`;
        }
        if (args.consensusTranscript.trim().length === 0) {
            return 'consensusTranscript is empty';
        }
        return null;
    },

    accept: (args, input) => {
        const consensusTranscript = args.consensusTranscript.trim();
        const suggested = args.transcriptionVariants.map(v => v.trim()).filter(v => v.length > 0 && v !== consensusTranscript);
        return {
            consensusTranscript,
            agreementScore: args.agreementScore,
            primaryBackend: args.primaryBackend,
            transcriptionVariants: [...new Set([...suggested, ...variantsOf(input.transcripts, consensusTranscript)])],
        };
    },

    // Lexicographically first backend with a non-blank transcript wins
    fallback: (input) => {
        const names = Object.keys(input.transcripts).sort();
        const first = names.find(name => input.transcripts[name].trim().length > 0) ?? names[0];
        if (first === undefined) {
            return { consensusTranscript: '', agreementScore: 0, primaryBackend: '', transcriptionVariants: [] };
        }
        const consensusTranscript = input.transcripts[first];
        return {
            consensusTranscript,
            agreementScore: 0,
            primaryBackend: first,
            transcriptionVariants: variantsOf(input.transcripts, consensusTranscript.trim()),
        };
    },
};

export const create = (runner: RunnerInstance): Stage<RequestContext, ConsensusFields> =>
    (context, signal) => runner.run(spec, context, signal);
