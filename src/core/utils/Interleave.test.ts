import { describe, it, expect } from 'vitest';
import { interleaveTracks, deinterleaveTracks } from './Interleave';
import { InterleaveLengthError } from '../models/Errors';

describe('interleaveTracks', () => {
    it('should alternate tracks per time step', () => {
        const vocal = [10, 11, 12];
        const instrumental = [20, 21, 22];

        const output = interleaveTracks([vocal, instrumental]);

        expect(output).toEqual([10, 20, 11, 21, 12, 22]);
        expect(output).toHaveLength(6);
        for (let k = 0; k < 3; k++) {
            expect(output[2 * k]).toBe(vocal[k]);
            expect(output[2 * k + 1]).toBe(instrumental[k]);
        }
    });

    it('should return an empty stream for empty tracks', () => {
        expect(interleaveTracks([[], []])).toEqual([]);
        expect(interleaveTracks([])).toEqual([]);
    });

    it('should reject tracks of unequal length', () => {
        expect(() => interleaveTracks([[1, 2], [3]])).toThrow(InterleaveLengthError);
        expect(() => interleaveTracks([[1, 2], [3]])).toThrow('Cannot interleave tracks of unequal length: 2, 1');
    });
});

describe('deinterleaveTracks', () => {
    it('should split a time-major stream back into tracks', () => {
        expect(deinterleaveTracks([10, 20, 11, 21], 2)).toEqual([[10, 11], [20, 21]]);
    });

    it('should drop a trailing partial step', () => {
        expect(deinterleaveTracks([1, 2, 3], 2)).toEqual([[1], [2]]);
    });

    it('should reject a non-positive track count', () => {
        expect(() => deinterleaveTracks([1], 0)).toThrow(RangeError);
    });
});
