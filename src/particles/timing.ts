/**
 * Phoneme Timing Analysis
 *
 * Splits a timed phoneme stream at silences and looks for short, isolated
 * segments that resemble a registered particle. The output only informs the
 * detection prompt; thresholds are policy knobs.
 */

import { TimedPhoneme } from '../dispatch/types';
import { ParticleForm, normalizePhoneme } from './registry';

export interface TimingPolicy {
    minGapMs: number;
    maxSegmentPhonemes: number;
    maxPhonemeDistance: number;
}

export interface PhonemeSegment {
    index: number;
    phonemes: string[];
    /** seconds */
    start: number;
    /** seconds */
    end: number;
    /** null at the utterance boundary */
    gapBeforeMs: number | null;
    gapAfterMs: number | null;
}

export interface ParticleHint {
    particle: string;
    region: string;
    phonemes: string[];
    start: number;
    end: number;
    distance: number;
    confidence: number;
    segmentIndex: number;
}

export interface SpeechMetrics {
    durationSec: number;
    phonemeCount: number;
    phonemesPerSecond: number;
    segmentCount: number;
}

export interface TimingAnalysis {
    segments: PhonemeSegment[];
    isolated: PhonemeSegment[];
    hints: ParticleHint[];
    metrics: SpeechMetrics;
}

const gapMs = (from: number, to: number): number => Math.round((to - from) * 1000);

export const segment = (timed: readonly TimedPhoneme[], minGapMs: number): PhonemeSegment[] => {
    const sorted = [...timed].sort((a, b) => a.start - b.start);
    const segments: PhonemeSegment[] = [];
    let current: TimedPhoneme[] = [];

    const close = () => {
        if (current.length === 0) return;
        segments.push({
            index: segments.length,
            phonemes: current.map(p => p.phoneme),
            start: current[0].start,
            end: current[current.length - 1].end,
            gapBeforeMs: null,
            gapAfterMs: null,
        });
        current = [];
    };

    for (const phoneme of sorted) {
        const previous = current[current.length - 1];
        if (previous && gapMs(previous.end, phoneme.start) >= minGapMs) {
            close();
        }
        current.push(phoneme);
    }
    close();

    for (let i = 1; i < segments.length; i++) {
        const gap = gapMs(segments[i - 1].end, segments[i].start);
        segments[i - 1].gapAfterMs = gap;
        segments[i].gapBeforeMs = gap;
    }
    return segments;
};

/**
 * Levenshtein distance over phoneme symbols
 */
export const editDistance = (a: readonly string[], b: readonly string[]): number => {
    let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
    for (let i = 1; i <= a.length; i++) {
        const row = [i];
        for (let j = 1; j <= b.length; j++) {
            const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
            row.push(Math.min(previous[j] + 1, row[j - 1] + 1, substitution));
        }
        previous = row;
    }
    return previous[b.length];
};

const isIsolated = (seg: PhonemeSegment, policy: TimingPolicy): boolean =>
    seg.phonemes.length <= policy.maxSegmentPhonemes
    && (seg.gapBeforeMs === null || seg.gapBeforeMs >= policy.minGapMs)
    && (seg.gapAfterMs === null || seg.gapAfterMs >= policy.minGapMs);

export const analyze = (
    timed: readonly TimedPhoneme[],
    forms: readonly ParticleForm[],
    policy: TimingPolicy
): TimingAnalysis => {
    const segments = segment(timed, policy.minGapMs);
    // A lone segment is the whole utterance, not an isolated particle
    const isolated = segments.length > 1 ? segments.filter(seg => isIsolated(seg, policy)) : [];

    const hints: ParticleHint[] = [];
    for (const seg of isolated) {
        const observed = seg.phonemes.map(normalizePhoneme);
        const best = new Map<string, ParticleHint>();
        for (const form of forms) {
            const distance = editDistance(observed, form.phonemes);
            if (distance > policy.maxPhonemeDistance) continue;
            const known = best.get(form.particle);
            if (known && known.distance <= distance) continue;
            best.set(form.particle, {
                particle: form.particle,
                region: form.region,
                phonemes: seg.phonemes,
                start: seg.start,
                end: seg.end,
                distance,
                confidence: Number((1 - distance / Math.max(observed.length, form.phonemes.length, 1)).toFixed(2)),
                segmentIndex: seg.index,
            });
        }
        hints.push(...[...best.values()].sort((a, b) => a.distance - b.distance || a.particle.localeCompare(b.particle)));
    }

    const first = segments[0];
    const last = segments[segments.length - 1];
    const durationSec = first && last ? last.end - first.start : 0;
    const phonemeCount = timed.length;

    return {
        segments,
        isolated,
        hints,
        metrics: {
            durationSec: Number(durationSec.toFixed(3)),
            phonemeCount,
            phonemesPerSecond: durationSec > 0 ? Number((phonemeCount / durationSec).toFixed(2)) : 0,
            segmentCount: segments.length,
        },
    };
};
