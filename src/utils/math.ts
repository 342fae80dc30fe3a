import BigNumber from 'bignumber.js';

export const toBigNumber = (value: string | number | BigNumber): BigNumber => {
    return new BigNumber(value);
};

export const calculateMean = (values: readonly number[]): number => {
    if (values.length === 0) return 0;
    const sum = values.reduce((a, b) => a + b, 0);
    return sum / values.length;
};

/**
 * Sample standard deviation (n - 1 denominator).
 * Returns 0 for fewer than two values.
 */
export const calculateSampleStdDev = (values: readonly number[]): number => {
    if (values.length < 2) return 0;
    const mean = calculateMean(values);
    const squared = values.reduce((acc, v) => acc + (v - mean) * (v - mean), 0);
    return Math.sqrt(squared / (values.length - 1));
};

/**
 * Fractional change from previous to current (0.05 = +5%)
 */
export const calculatePercentageChange = (
    current: number,
    previous: number
): number => {
    if (previous === 0) return 0;
    return (current - previous) / previous;
};
