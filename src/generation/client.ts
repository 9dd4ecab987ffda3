/**
 * Generation Client
 *
 * OpenAI chat completions with forced function calling. Any endpoint that
 * speaks the same protocol works through `baseURL`.
 */

import OpenAI from 'openai';
import * as Logging from '../logging';
import {
    GenerationClient,
    GenerationConfig,
    GenerationError,
    GenerationRequest,
    GenerationResponse,
} from './types';

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

export const create = (config: GenerationConfig): GenerationClient => {
    const logger = Logging.getLogger();

    // Lazy-initialize so an unconfigured service costs nothing
    let client: OpenAI | null = null;
    const getClient = (apiKey: string): OpenAI => {
        if (!client) {
            client = new OpenAI({
                apiKey,
                baseURL: config.baseURL,
                timeout: config.timeoutMs,
                maxRetries: 0,
            });
        }
        return client;
    };

    const isConfigured = (): boolean => Boolean(config.apiKey);

    const generate = async (
        request: GenerationRequest,
        options: { signal?: AbortSignal } = {}
    ): Promise<GenerationResponse> => {
        if (!config.apiKey) {
            throw new GenerationError('Generation service is not configured (no API key)', 'configuration');
        }

        const messages: Array<OpenAI.Chat.ChatCompletionMessageParam> = [];
        if (request.systemPrompt) {
            messages.push({ role: 'system', content: request.systemPrompt });
        }
        messages.push({ role: 'user', content: request.prompt });

        const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
            model: config.model,
            temperature: config.temperature,
            messages,
        };
        const declaration = request.functionDeclaration;
        if (declaration) {
            params.tools = [{
                type: 'function',
                function: {
                    name: declaration.name,
                    description: declaration.description,
                    parameters: declaration.parameters,
                },
            }];
            params.tool_choice = { type: 'function', function: { name: declaration.name } };
        }

        const startTime = Date.now();
        logger.debug('Generation request: model=%s function=%s', config.model, declaration?.name ?? '(none)');

        let response: OpenAI.Chat.ChatCompletion;
        try {
            response = await getClient(config.apiKey).chat.completions.create(params, { signal: options.signal });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new GenerationError(`Generation request failed: ${message}`, 'transport', { cause: error });
        }
        logger.verbose('Generation model responded in %dms', Date.now() - startTime);

        const choice = response.choices[0];
        if (!choice) {
            throw new GenerationError('Generation response contained no choices', 'response');
        }

        const toolCall = choice.message.tool_calls?.find(tc => 'function' in tc);
        if (toolCall && 'function' in toolCall) {
            let args: unknown;
            try {
                args = JSON.parse(toolCall.function.arguments);
            } catch (error) {
                throw new GenerationError(
                    `Function ${toolCall.function.name} returned malformed arguments`,
                    'response',
                    { cause: error }
                );
            }
            if (!isRecord(args)) {
                throw new GenerationError(`Function ${toolCall.function.name} arguments are not an object`, 'response');
            }
            return { kind: 'function_call', name: toolCall.function.name, arguments: args };
        }

        return { kind: 'text', text: choice.message.content ?? '' };
    };

    return { generate, isConfigured };
};
