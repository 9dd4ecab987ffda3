/**
 * Stage Runner
 *
 * Executes one StageSpec: Built → Sent → Succeeded | Failed. Failures of
 * any kind resolve to the stage's fallback; nothing is thrown past here and
 * nothing is retried.
 */

import * as Logging from '../logging';
import { GenerationClient, GenerationResponse } from '../generation/types';
import { describeError, linkSignals, raceAbort } from '../util/http';
import { FailureKind, StageOutcome, StageSpec } from './types';

export interface RunnerConfig {
    client: GenerationClient;
    timeoutMs: number;
}

export interface RunnerInstance {
    run<I, O, A>(spec: StageSpec<I, O, A>, input: I, signal?: AbortSignal): Promise<StageOutcome<O>>;
}

class StageFailure extends Error {
    readonly kind: FailureKind;

    constructor(kind: FailureKind, message: string) {
        super(message);
        this.name = 'StageFailure';
        this.kind = kind;
    }
}

const isPresent = (value: unknown): boolean => value !== undefined && value !== null;

export const create = (config: RunnerConfig): RunnerInstance => {
    const logger = Logging.getLogger();

    const run = async <I, O, A>(spec: StageSpec<I, O, A>, input: I, signal?: AbortSignal): Promise<StageOutcome<O>> => {
        const startTime = Date.now();
        const elapsed = () => Date.now() - startTime;

        const skipReason = spec.skip?.(input) ?? null;
        if (skipReason !== null) {
            logger.verbose('Stage %s skipped: %s', spec.name, skipReason);
            return {
                ok: false,
                value: spec.fallback(input),
                durationMs: elapsed(),
                source: 'skipped',
                failure: 'skipped',
                reason: `skipped: ${skipReason}`,
            };
        }

        const deadline = linkSignals(config.timeoutMs, signal);
        try {
            // Built
            const request = spec.buildRequest(input);
            const declaration = request.functionDeclaration;

            // Sent
            let response: GenerationResponse;
            try {
                response = await raceAbort(config.client.generate({
                    prompt: request.prompt,
                    systemPrompt: request.systemPrompt,
                    functionDeclaration: declaration,
                }, { signal: deadline }), deadline);
            } catch (error) {
                if (deadline.aborted) {
                    const detail = signal?.aborted ? 'request deadline reached' : `no reply within ${config.timeoutMs}ms`;
                    throw new StageFailure('timeout', detail);
                }
                throw new StageFailure('transport', describeError(error));
            }

            if (response.kind !== 'function_call') {
                throw new StageFailure('validation', `expected a call to ${declaration.name}, got free text`);
            }
            if (response.name !== declaration.name) {
                throw new StageFailure('validation', `expected a call to ${declaration.name}, got ${response.name}`);
            }

            const args = response.arguments;
            const missing = (declaration.parameters.required ?? []).filter(field => !isPresent(args[field]));
            if (missing.length > 0) {
                throw new StageFailure('validation', `missing required field(s): ${missing.join(', ')}`);
            }

            const parsed = spec.schema.safeParse(args);
            if (!parsed.success) {
                const issues = parsed.error.issues
                    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                    .join('; ');
                throw new StageFailure('validation', issues);
            }

            const problem = spec.validate?.(parsed.data, input) ?? null;
            if (problem !== null) {
                throw new StageFailure('validation', problem);
            }

            const value = spec.accept(parsed.data, input);
            logger.verbose('Stage %s succeeded in %dms', spec.name, elapsed());
            return { ok: true, value, durationMs: elapsed(), source: 'generation' };
        } catch (error) {
            const kind: FailureKind = error instanceof StageFailure ? error.kind : 'validation';
            const reason = `${kind}: ${describeError(error)}`;
            logger.warn('Stage %s fell back (%s)', spec.name, reason);
            return {
                ok: false,
                value: spec.fallback(input),
                durationMs: elapsed(),
                source: 'fallback',
                failure: kind,
                reason,
            };
        }
    };

    return { run };
};

/**
 * Outcome for a stage that decided not to call the generation service.
 */
export const skipped = <T>(value: T, reason: string, startTime: number): StageOutcome<T> => ({
    ok: false,
    value,
    durationMs: Date.now() - startTime,
    source: 'skipped',
    failure: 'skipped',
    reason: `skipped: ${reason}`,
});
