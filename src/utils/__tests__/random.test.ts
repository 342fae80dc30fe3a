/**
 * Random Source Tests
 */

import { createSeededRandom, createSequenceRandom } from '../random';

function draw(source: () => number, n: number): number[] {
    return Array.from({ length: n }, () => source());
}

describe('createSeededRandom', () => {
    test('same seed, same sequence', () => {
        expect(draw(createSeededRandom(42), 20)).toEqual(draw(createSeededRandom(42), 20));
    });

    test('different seeds diverge', () => {
        expect(draw(createSeededRandom(1), 5)).not.toEqual(draw(createSeededRandom(2), 5));
    });

    test('draws fall in [0, 1)', () => {
        for (const value of draw(createSeededRandom(7), 1000)) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });
});

describe('createSequenceRandom', () => {
    test('replays and cycles', () => {
        expect(draw(createSequenceRandom([0.1, 0.9]), 5)).toEqual([0.1, 0.9, 0.1, 0.9, 0.1]);
    });

    test('rejects an empty sequence', () => {
        expect(() => createSequenceRandom([])).toThrow('createSequenceRandom requires at least one value');
    });
});
