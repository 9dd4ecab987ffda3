export interface SearchHit {
    title: string;
    content: string;
    url: string;
}

export interface SearchResult {
    query: string;
    answer: string;
    results: SearchHit[];
}

export interface SearchConfig {
    url: string;
    apiKey?: string;
    timeoutMs: number;
    maxResults: number;
    topResults: number;
}

export interface SearchClient {
    search(query: string, options?: { signal?: AbortSignal }): Promise<SearchResult>;
    isConfigured(): boolean;
}

export class SearchError extends Error {
    readonly query: string;

    constructor(message: string, query: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SearchError';
        this.query = query;
    }
}
