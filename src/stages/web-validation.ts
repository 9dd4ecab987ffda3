/**
 * Web Validation Stage
 *
 * Runs every search query concurrently, then asks the generation service to
 * confirm spellings against the evidence. The validated transcript never
 * falls below the consensus: every failure path keeps it verbatim.
 */

import { z } from 'zod';
import * as Logging from '../logging';
import { FunctionDeclaration } from '../generation/types';
import { RunnerInstance, skipped } from '../pipeline/runner';
import { SearchContext, SearchEvidence, Stage, StageSpec, ValidationFields } from '../pipeline/types';
import { SearchClient } from '../search/types';
import { describeError } from '../util/http';

export const FUNCTION_NAME = 'validate_with_web_context';

const DECLARATION: FunctionDeclaration = {
    name: FUNCTION_NAME,
    description: 'Confirm the transcript against web search evidence',
    parameters: {
        type: 'object',
        properties: {
            finalConsensus: {
                type: 'string',
                description: 'The transcript, changed only where the evidence clearly corrects a term',
            },
            confirmedProperNouns: {
                type: 'array',
                items: { type: 'string' },
                description: 'Proper nouns whose spelling the evidence confirms',
            },
            validatedCorrections: {
                type: 'array',
                items: { type: 'string' },
                description: 'Each correction applied, as "original -> corrected"',
            },
        },
        required: ['finalConsensus'],
    },
};

const ArgsSchema = z.object({
    finalConsensus: z.string(),
    confirmedProperNouns: z.array(z.string()).default([]),
    validatedCorrections: z.array(z.string()).default([]),
});

type ValidationArgs = z.infer<typeof ArgsSchema>;

export interface ValidationInput {
    context: SearchContext;
    evidence: SearchEvidence[];
}

const formatEvidence = (evidence: readonly SearchEvidence[]): string => evidence.map((item, index) => {
    const results = item.topResults
        .map(result => `  - ${result.title}: ${result.content} (${result.url})`)
        .join('\n');
    return `${index + 1}. Query: "${item.query}"\n  Answer: ${item.answer || '(none)'}\n${results}`;
}).join('\n\n');

const passThrough = (input: ValidationInput): ValidationFields => ({
    validatedTranscript: input.context.consensusTranscript,
    searchEvidence: input.evidence,
    confirmedProperNouns: [],
    validatedCorrections: [],
});

export const spec: StageSpec<ValidationInput, ValidationFields, ValidationArgs> = {
    name: 'web-validation',

    buildRequest: ({ context, evidence }) => ({
        prompt: `Check this transcript against web search evidence.

Consensus transcript: "${context.consensusTranscript}"
Primary backend: ${context.primaryBackend}
Agreement score: ${context.agreementScore}

Search reasoning: ${context.searchReasoning}

Evidence:
${formatEvidence(evidence)}

Instructions:
- Keep the transcript's length and meaning
- Change a term only when the evidence clearly shows the correct spelling
- Otherwise return the consensus transcript exactly as given

Call ${FUNCTION_NAME} with your analysis.`,
        functionDeclaration: DECLARATION,
    }),

    schema: ArgsSchema,

    validate: (args) => args.finalConsensus.trim().length === 0 ? 'finalConsensus is empty' : null,

    accept: (args, input) => ({
        validatedTranscript: args.finalConsensus.trim(),
        searchEvidence: input.evidence,
        confirmedProperNouns: args.confirmedProperNouns.map(noun => noun.trim()).filter(noun => noun.length > 0),
        validatedCorrections: args.validatedCorrections.map(item => item.trim()).filter(item => item.length > 0),
    }),

    fallback: passThrough,
};

export const create = (runner: RunnerInstance, search: SearchClient): Stage<SearchContext, ValidationFields> => {
    const logger = Logging.getLogger();

    return async (context, signal) => {
        const startTime = Date.now();
        if (context.searchQueries.length === 0) {
            return skipped(passThrough({ context, evidence: [] }), 'no search queries', startTime);
        }

        const settled = await Promise.allSettled(context.searchQueries.map(query => search.search(query, { signal })));
        const evidence: SearchEvidence[] = [];
        settled.forEach((outcome, index) => {
            if (outcome.status === 'fulfilled') {
                evidence.push({
                    query: outcome.value.query,
                    answer: outcome.value.answer,
                    topResults: outcome.value.results,
                });
            } else {
                logger.warn('Search for "%s" failed: %s', context.searchQueries[index], describeError(outcome.reason));
            }
        });

        if (evidence.length === 0) {
            return skipped(passThrough({ context, evidence }), 'every search failed', startTime);
        }

        const outcome = await runner.run(spec, { context, evidence }, signal);
        return { ...outcome, durationMs: Date.now() - startTime };
    };
};
