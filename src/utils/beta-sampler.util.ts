export type RandomSource = () => number;

/**
 * Standard normal draw (Box-Muller)
 */
function sampleNormal(random: RandomSource): number {
    let u = 0;
    while (u === 0) {
        u = random();
    }
    const v = random();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/**
 * Gamma(shape, 1) draw using Marsaglia and Tsang's method.
 * Shapes below 1 are boosted: Gamma(a) = Gamma(a + 1) * U^(1/a).
 */
export function sampleGamma(shape: number, random: RandomSource = Math.random): number {
    if (!(shape > 0)) {
        throw new RangeError(`Gamma shape must be positive, got ${shape}`);
    }

    if (shape < 1) {
        let u = 0;
        while (u === 0) {
            u = random();
        }
        return sampleGamma(shape + 1, random) * Math.pow(u, 1 / shape);
    }

    const d = shape - 1 / 3;
    const c = 1 / Math.sqrt(9 * d);

    for (;;) {
        let x: number;
        let v: number;
        do {
            x = sampleNormal(random);
            v = 1 + c * x;
        } while (v <= 0);

        v = v * v * v;
        const u = random();

        if (u < 1 - 0.0331 * x ** 4) {
            return d * v;
        }
        if (u > 0 && Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) {
            return d * v;
        }
    }
}

/**
 * Beta(alpha, beta) draw from two independent gamma draws
 */
export function sampleBeta(alpha: number, beta: number, random: RandomSource = Math.random): number {
    const x = sampleGamma(alpha, random);
    const y = sampleGamma(beta, random);
    return x / (x + y);
}
