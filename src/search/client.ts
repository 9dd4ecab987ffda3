/**
 * Web Search Client
 *
 * Tavily-style search API: POST a query, get an answer string and a short
 * list of results. Only the top `topResults` hits are kept.
 */

import { z } from 'zod';
import * as Logging from '../logging';
import { FetchFn, defaultFetch, describeError, isTimeoutError, linkSignals, readSnippet } from '../util/http';
import { SearchClient, SearchConfig, SearchError, SearchResult } from './types';

const SearchResponseSchema = z.object({
    answer: z.string().nullish(),
    results: z.array(z.object({
        title: z.string().nullish(),
        content: z.string().nullish(),
        snippet: z.string().nullish(),
        url: z.string().nullish(),
    })).default([]),
});

export const create = (config: SearchConfig, options: { fetch?: FetchFn } = {}): SearchClient => {
    const logger = Logging.getLogger();
    const doFetch = options.fetch ?? defaultFetch;

    const isConfigured = (): boolean => Boolean(config.apiKey);

    const search = async (query: string, callOptions: { signal?: AbortSignal } = {}): Promise<SearchResult> => {
        if (!config.apiKey) {
            throw new SearchError('Search service is not configured (no API key)', query);
        }

        let response: Response;
        try {
            response = await doFetch(config.url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({
                    api_key: config.apiKey,
                    query,
                    search_depth: 'basic',
                    include_answer: true,
                    include_raw_content: false,
                    max_results: config.maxResults,
                }),
                signal: linkSignals(config.timeoutMs, callOptions.signal),
            });
        } catch (error) {
            const detail = isTimeoutError(error) ? `timed out after ${config.timeoutMs}ms` : describeError(error);
            throw new SearchError(`Search failed for "${query}": ${detail}`, query, { cause: error });
        }

        if (!response.ok) {
            throw new SearchError(`Search failed for "${query}": HTTP ${response.status} ${await readSnippet(response)}`, query);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            throw new SearchError(`Search returned malformed JSON for "${query}"`, query, { cause: error });
        }

        const parsed = SearchResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new SearchError(`Search returned an unexpected shape for "${query}"`, query, { cause: parsed.error });
        }

        logger.debug('Search "%s" returned %d results', query, parsed.data.results.length);
        return {
            query,
            answer: parsed.data.answer ?? '',
            results: parsed.data.results.slice(0, config.topResults).map(hit => ({
                title: hit.title ?? '',
                content: hit.content ?? hit.snippet ?? '',
                url: hit.url ?? '',
            })),
        };
    };

    return { search, isConfigured };
};
