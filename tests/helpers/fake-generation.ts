import {
    GenerationClient,
    GenerationError,
    GenerationRequest,
    GenerationResponse,
} from '../../src/generation/types';

export type Script =
    | Record<string, unknown>
    | Error
    | ((request: GenerationRequest, signal?: AbortSignal) => GenerationResponse | Promise<GenerationResponse>);

/**
 * Generation client answering each function name from a script. A record
 * becomes that function's arguments; an Error is thrown.
 */
export const scriptedGeneration = (scripts: Record<string, Script>): GenerationClient & { calls: GenerationRequest[] } => {
    const calls: GenerationRequest[] = [];
    return {
        calls,
        isConfigured: () => true,
        generate: async (request, options) => {
            calls.push(request);
            const name = request.functionDeclaration?.name ?? '';
            const script = scripts[name];
            if (script === undefined) {
                throw new GenerationError(`no script for ${name}`, 'transport');
            }
            if (script instanceof Error) {
                throw script;
            }
            if (typeof script === 'function') {
                return script(request, options?.signal);
            }
            return { kind: 'function_call', name, arguments: script };
        },
    };
};

export const unavailableGeneration = (): GenerationClient & { calls: GenerationRequest[] } => {
    const calls: GenerationRequest[] = [];
    return {
        calls,
        isConfigured: () => false,
        generate: async (request) => {
            calls.push(request);
            throw new GenerationError('Generation service is not configured (no API key)', 'configuration');
        },
    };
};
