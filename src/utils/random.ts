/**
 * Seedable random source for reproducible replays.
 *
 * The engine never reads Math.random: every stochastic draw goes through a
 * RandomSource handed in at construction, so a seed pins the whole run.
 */

/**
 * Uniform draw in [0, 1)
 */
export type RandomSource = () => number;

/**
 * mulberry32 generator
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed | 0;
    return function () {
        state = (state + 0x6D2B79F5) | 0;
        let t = Math.imul(state ^ (state >>> 15), 1 | state);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Source that replays a fixed sequence of draws, cycling when exhausted.
 * Used to force execution outcomes deterministically.
 */
export function createSequenceRandom(values: readonly number[]): RandomSource {
    if (values.length === 0) {
        throw new Error('createSequenceRandom requires at least one value');
    }
    let index = 0;
    return () => {
        const value = values[index % values.length];
        index++;
        return value;
    };
}
