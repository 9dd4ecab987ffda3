import { describe, expect, it } from 'vitest';
import * as Insertion from '../../src/particles/insertion';

const transcript = "don't be like that man";
const tokens = Insertion.words(transcript);

describe('Word helpers', () => {
    it('splits on any whitespace', () => {
        expect(Insertion.words('  a  b\tc ')).toEqual(['a', 'b', 'c']);
        expect(Insertion.words('   ')).toEqual([]);
    });

    it('finds the character offset after a word', () => {
        expect(Insertion.charOffsetAfterWord(transcript, 3)).toBe(18);
        expect(Insertion.charOffsetAfterWord(transcript, -1)).toBe(0);
        expect(Insertion.charOffsetAfterWord(transcript, 10)).toBe(22);
    });

    it('finds the word a character offset follows', () => {
        expect(Insertion.wordIndexAtOffset(transcript, 18)).toBe(3);
        expect(Insertion.wordIndexAtOffset(transcript, 20)).toBe(3);
        expect(Insertion.wordIndexAtOffset(transcript, 2)).toBe(-1);
        expect(Insertion.wordIndexAtOffset(transcript, 22)).toBe(4);
        expect(Insertion.wordIndexAtOffset(transcript, 23)).toBeNull();
    });
});

describe('Resolving word positions', () => {
    it('keeps an index that agrees with the word', () => {
        expect(Insertion.resolveWordIndex(tokens, 3, 'that')).toBe(3);
        expect(Insertion.resolveWordIndex(tokens, 3, 'That,')).toBe(3);
    });

    it('moves to the nearest matching word when the index disagrees', () => {
        expect(Insertion.resolveWordIndex(tokens, 1, 'that')).toBe(3);
        expect(Insertion.resolveWordIndex(tokens, 9, 'man')).toBe(4);
        expect(Insertion.resolveWordIndex(tokens, undefined, 'like')).toBe(2);
        expect(Insertion.resolveWordIndex(['no', 'no', 'no'], 5, 'no')).toBe(2);
    });

    it('falls back to the index when the word is absent', () => {
        expect(Insertion.resolveWordIndex(tokens, 2, 'zebra')).toBe(2);
    });

    it('accepts -1 and rejects out-of-range or fractional indices', () => {
        expect(Insertion.resolveWordIndex(tokens, -1)).toBe(-1);
        expect(Insertion.resolveWordIndex(tokens, 5)).toBeNull();
        expect(Insertion.resolveWordIndex(tokens, 2.5)).toBeNull();
        expect(Insertion.resolveWordIndex(tokens, 9, 'zebra')).toBeNull();
    });
});

describe('Inserting particles', () => {
    it('places a particle after its word', () => {
        expect(Insertion.insertParticles(transcript, [{ surfaceForm: 'la', insertAfterWordIndex: 3 }]))
            .toBe("don't be like that la man");
    });

    it('supports leading and trailing positions', () => {
        expect(Insertion.insertParticles(transcript, [
            { surfaceForm: 'oh', insertAfterWordIndex: -1 },
            { surfaceForm: 'lah', insertAfterWordIndex: 4 },
        ])).toBe("oh don't be like that man lah");
    });

    it('keeps input order within a slot', () => {
        expect(Insertion.insertParticles(transcript, [
            { surfaceForm: 'lah', insertAfterWordIndex: 1 },
            { surfaceForm: 'meh', insertAfterWordIndex: 1 },
        ])).toBe("don't be lah meh like that man");
    });

    it('ignores invalid slots', () => {
        expect(Insertion.insertParticles(transcript, [
            { surfaceForm: 'la', insertAfterWordIndex: 7 },
            { surfaceForm: 'lor', insertAfterWordIndex: 1.5 },
        ])).toBe(transcript);
    });
});
