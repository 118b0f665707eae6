import { GoodnessStats, Grid } from "../shared/SpectrumTypes";

// Degrees of freedom removed from the pixel count
export const modelParameterCount = 6;

export function computeGoodness(data: Grid, model: Grid, noise: number): GoodnessStats {
    const values = data.flat();
    const fitted = model.flat();
    const n = values.length;

    let chiSquared = 0;
    let residualSq = 0;
    let total = 0;
    for(let i = 0; i < n; ++i) {
        const d = values[i] - fitted[i];
        chiSquared += (d / noise) * (d / noise);
        residualSq += d * d;
        total += values[i];
    }
    const avg = total / n;
    let totalSq = 0;
    for(const v of values) {
        totalSq += (v - avg) * (v - avg);
    }

    return {
        chiSquared,
        reducedChiSquared: n > modelParameterCount ? chiSquared / (n - modelParameterCount) : NaN,
        rSquared: totalSq > 0 ? 1 - residualSq / totalSq : NaN,
    };
}

export const missingGoodness = (): GoodnessStats=> ({
    chiSquared: NaN,
    reducedChiSquared: NaN,
    rSquared: NaN,
});
