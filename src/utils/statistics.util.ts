export function mean(values: readonly number[]): number {
    if (values.length === 0) {
        return 0;
    }
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Population standard deviation (divides by n). */
export function populationStdDev(values: readonly number[]): number {
    if (values.length === 0) {
        return 0;
    }
    const avg = mean(values);
    return Math.sqrt(mean(values.map(value => (value - avg) ** 2)));
}

/**
 * Least-squares slope of values against their index
 */
export function linearSlope(values: readonly number[]): number {
    const n = values.length;
    if (n < 2) {
        return 0;
    }
    const xMean = (n - 1) / 2;
    const yMean = mean(values);
    let numerator = 0;
    let denominator = 0;
    values.forEach((y, x) => {
        numerator += (x - xMean) * (y - yMean);
        denominator += (x - xMean) ** 2;
    });
    return numerator / denominator;
}

export function clamp(value: number, min: number, max: number): number {
    if (Number.isNaN(value)) {
        return min;
    }
    return Math.min(max, Math.max(min, value));
}
