/**
 * Particle insertion over whitespace-delimited words.
 *
 * Word indices are 0-based; -1 places a particle before the first word.
 */

export interface Placement {
    surfaceForm: string;
    insertAfterWordIndex: number;
}

export const words = (transcript: string): string[] =>
    transcript.trim().split(/\s+/).filter(word => word.length > 0);

const bare = (word: string): string => word.toLowerCase().replace(/^[^\p{L}\p{N}']+|[^\p{L}\p{N}']+$/gu, '');

/**
 * Character offset just past word `index` in the original transcript (0 for -1).
 */
export const charOffsetAfterWord = (transcript: string, index: number): number => {
    if (index < 0) {
        return 0;
    }
    const spans = [...transcript.matchAll(/\S+/g)];
    const span = spans[Math.min(index, spans.length - 1)];
    if (!span || span.index === undefined) {
        return 0;
    }
    return span.index + span[0].length;
};

/**
 * Index of the last word ending at or before `offset` (-1 when none does).
 * Null for an offset outside the transcript.
 */
export const wordIndexAtOffset = (transcript: string, offset: number): number | null => {
    if (!Number.isInteger(offset) || offset < 0 || offset > transcript.length) {
        return null;
    }
    let index = -1;
    for (const span of transcript.matchAll(/\S+/g)) {
        if (span.index === undefined || span.index + span[0].length > offset) break;
        index++;
    }
    return index;
};

/**
 * Settle the word a particle follows. The index wins when it agrees with
 * `afterWord` (or no word is given); otherwise the occurrence of `afterWord`
 * nearest the index is used. Returns null when neither can be placed.
 */
export const resolveWordIndex = (
    tokens: readonly string[],
    index: number | undefined,
    afterWord?: string
): number | null => {
    const slot = index !== undefined && Number.isInteger(index) && index >= -1 && index < tokens.length
        ? index
        : null;
    const target = afterWord ? bare(afterWord) : '';
    if (!target) {
        return slot;
    }
    if (slot !== null && slot >= 0 && bare(tokens[slot]) === target) {
        return slot;
    }
    const anchor = index ?? 0;
    let nearest: number | null = null;
    for (let position = 0; position < tokens.length; position++) {
        if (bare(tokens[position]) !== target) continue;
        if (nearest === null || Math.abs(position - anchor) < Math.abs(nearest - anchor)) {
            nearest = position;
        }
    }
    return nearest ?? slot;
};

/**
 * Insert particles after their words. Particles sharing a slot keep their
 * input order. Out-of-range slots are ignored.
 */
export const insertParticles = (transcript: string, placements: readonly Placement[]): string => {
    const tokens = words(transcript);
    const slots = new Map<number, string[]>();
    for (const placement of placements) {
        const slot = placement.insertAfterWordIndex;
        if (!Number.isInteger(slot) || slot < -1 || slot >= tokens.length) continue;
        slots.set(slot, [...(slots.get(slot) ?? []), placement.surfaceForm]);
    }
    const output = [...(slots.get(-1) ?? [])];
    tokens.forEach((token, position) => {
        output.push(token, ...(slots.get(position) ?? []));
    });
    return output.join(' ');
};
