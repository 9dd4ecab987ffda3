/**
 * Search Analysis Stage
 *
 * Chooses the terms in the consensus transcript worth checking on the web.
 * An empty query list is a normal result.
 */

import { z } from 'zod';
import { FunctionDeclaration } from '../generation/types';
import { RunnerInstance } from '../pipeline/runner';
import { ConsensusContext, SearchFields, Stage, StageSpec } from '../pipeline/types';

export const FUNCTION_NAME = 'identify_search_worthy_terms';

const declaration = (maxQueries: number): FunctionDeclaration => ({
    name: FUNCTION_NAME,
    description: 'List terms in the transcript that need web validation and the queries to check them',
    parameters: {
        type: 'object',
        properties: {
            searchQueries: {
                type: 'array',
                items: { type: 'string' },
                maxItems: maxQueries,
                description: `At most ${maxQueries} precise web search queries; empty when nothing needs checking`,
            },
            searchReasoning: { type: 'string', description: 'Why these terms need validation' },
            uncertainTerms: { type: 'array', items: { type: 'string' } },
            properNouns: { type: 'array', items: { type: 'string' } },
            technicalTerms: { type: 'array', items: { type: 'string' } },
        },
        required: ['searchQueries', 'searchReasoning'],
    },
});

const ArgsSchema = z.object({
    searchQueries: z.array(z.string()),
    searchReasoning: z.string(),
    uncertainTerms: z.array(z.string()).default([]),
    properNouns: z.array(z.string()).default([]),
    technicalTerms: z.array(z.string()).default([]),
});

type SearchArgs = z.infer<typeof ArgsSchema>;

/**
 * Trim, drop blanks and case-insensitive duplicates, keep the first `max`.
 */
export const normalizeQueries = (queries: readonly string[], max: number): string[] => {
    const seen = new Set<string>();
    const result: string[] = [];
    for (const raw of queries) {
        const query = raw.trim().replace(/\s+/g, ' ');
        const key = query.toLowerCase();
        if (query.length === 0 || seen.has(key)) continue;
        seen.add(key);
        result.push(query);
    }
    return result.slice(0, max);
};

const cleanTerms = (terms: readonly string[]): string[] =>
    [...new Set(terms.map(term => term.trim()).filter(term => term.length > 0))];

export interface SearchAnalysisOptions {
    maxQueries: number;
}

export const createSpec = (options: SearchAnalysisOptions): StageSpec<ConsensusContext, SearchFields, SearchArgs> => ({
    name: 'search-analysis',

    skip: (input) => {
        if (options.maxQueries === 0) return 'web search disabled';
        if (input.consensusTranscript.trim().length === 0) return 'empty consensus transcript';
        return null;
    },

    buildRequest: (input) => ({
        prompt: `Identify terms in this transcript that should be checked with a web search.

Context: ${input.userContext}

Consensus transcript: "${input.consensusTranscript}"

Instructions:
- Focus on proper nouns, brand names, technical terms and unusual words
- Suggest at most ${options.maxQueries} precise search queries
- Do not search for common words that are clearly correct
- Return an empty query list when nothing needs checking

Call ${FUNCTION_NAME} with your analysis.`,
        functionDeclaration: declaration(options.maxQueries),
    }),

    schema: ArgsSchema,

    accept: (args) => ({
        searchQueries: normalizeQueries(args.searchQueries, options.maxQueries),
        searchReasoning: args.searchReasoning.trim(),
        uncertainTerms: cleanTerms(args.uncertainTerms),
        properNouns: cleanTerms(args.properNouns),
        technicalTerms: cleanTerms(args.technicalTerms),
    }),

    fallback: () => ({
        searchQueries: [],
        searchReasoning: 'Search analysis unavailable; no terms selected for web validation',
        uncertainTerms: [],
        properNouns: [],
        technicalTerms: [],
    }),
});

export const create = (runner: RunnerInstance, options: SearchAnalysisOptions): Stage<ConsensusContext, SearchFields> => {
    const spec = createSpec(options);
    return (context, signal) => runner.run(spec, context, signal);
};
