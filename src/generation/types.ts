/**
 * Generation Types
 *
 * Boundary of the structured-generation service: a prompt plus an optional
 * function declaration in, free text or a named function call out.
 */

export type JsonSchema = { [key: string]: unknown };

export type FunctionParameters = {
    type: 'object';
    properties: Record<string, JsonSchema>;
    required?: string[];
};

export interface FunctionDeclaration {
    name: string;
    description: string;
    parameters: FunctionParameters;
}

export interface GenerationRequest {
    prompt: string;
    systemPrompt?: string;
    /** When present the service is forced to call this function */
    functionDeclaration?: FunctionDeclaration;
}

export type GenerationResponse =
    | { kind: 'text'; text: string }
    | { kind: 'function_call'; name: string; arguments: Record<string, unknown> };

export interface GenerationOptions {
    signal?: AbortSignal;
}

export interface GenerationClient {
    generate(request: GenerationRequest, options?: GenerationOptions): Promise<GenerationResponse>;
    isConfigured(): boolean;
}

export interface GenerationConfig {
    model: string;
    apiKey?: string;
    baseURL?: string;
    temperature: number;
    timeoutMs: number;
}

export type GenerationErrorKind = 'configuration' | 'transport' | 'response';

export class GenerationError extends Error {
    readonly kind: GenerationErrorKind;

    constructor(message: string, kind: GenerationErrorKind, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GenerationError';
        this.kind = kind;
    }
}
