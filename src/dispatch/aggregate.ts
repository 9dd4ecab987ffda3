/**
 * Result Aggregation
 *
 * Folds per-backend results into a DispatchEnvelope and derives the views
 * the pipeline reads from it.
 */

import { z } from 'zod';
import { NO_HEALTHY_BACKENDS } from '../constants';
import { BackendResult, BackendSuccess, DispatchEnvelope, PhonemeTrack, TimedPhoneme } from './types';

export interface FoldInput {
    audioFilename: string;
    startedAt: number;
    requestedBackends: string[];
    healthyBackends: string[];
    results: BackendResult[];
}

export const fold = (input: FoldInput): DispatchEnvelope => {
    const results: Record<string, BackendResult> = {};
    for (const result of input.results) {
        results[result.backend] = result;
    }
    const successCount = input.results.filter(result => result.status === 'success').length;

    const envelope: DispatchEnvelope = {
        audioFilename: input.audioFilename,
        timestamp: new Date(input.startedAt).toISOString(),
        requestedBackends: input.requestedBackends,
        healthyBackends: input.healthyBackends,
        results,
        successCount,
        totalElapsedMs: Date.now() - input.startedAt,
    };
    if (input.healthyBackends.length === 0) {
        envelope.error = NO_HEALTHY_BACKENDS;
    }
    return envelope;
};

export const successes = (envelope: DispatchEnvelope): BackendSuccess[] =>
    Object.values(envelope.results).filter((result): result is BackendSuccess => result.status === 'success');

/**
 * `{backend → transcript}` for successful backends, optionally leaving some out
 */
export const transcripts = (envelope: DispatchEnvelope, exclude: readonly string[] = []): Record<string, string> => {
    const view: Record<string, string> = {};
    for (const result of successes(envelope)) {
        if (!exclude.includes(result.backend)) {
            view[result.backend] = result.transcript;
        }
    }
    return view;
};

export const failures = (envelope: DispatchEnvelope): Record<string, string> => {
    const view: Record<string, string> = {};
    for (const result of Object.values(envelope.results)) {
        if (result.status === 'error') {
            view[result.backend] = result.errorMessage;
        }
    }
    return view;
};

const TimedPhonemeSchema = z.object({
    phoneme: z.string().min(1),
    start: z.number().nonnegative(),
    end: z.number().nonnegative(),
});

/**
 * Entries that fail validation are dropped rather than poisoning the track.
 */
export const parseTimedPhonemes = (raw: unknown): TimedPhoneme[] => {
    if (!Array.isArray(raw)) {
        return [];
    }
    const timed: TimedPhoneme[] = [];
    for (const entry of raw) {
        const parsed = TimedPhonemeSchema.safeParse(entry);
        if (parsed.success && parsed.data.end >= parsed.data.start) {
            timed.push(parsed.data);
        }
    }
    return timed.sort((a, b) => a.start - b.start);
};

export const phonemeTrack = (envelope: DispatchEnvelope, backend: string): PhonemeTrack | null => {
    const result = envelope.results[backend];
    if (!result || result.status !== 'success') {
        return null;
    }
    return {
        backend,
        phonemes: result.transcript.split(/\s+/).filter(phoneme => phoneme.length > 0),
        timedPhonemes: parseTimedPhonemes(result.diagnostics.timed_phonemes),
    };
};
