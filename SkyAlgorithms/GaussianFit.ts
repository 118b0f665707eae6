import { FitParameters, Grid, StepResult, failed, succeeded } from "../shared/SpectrumTypes";
import { argMax, median } from "../shared/Algebra";
import { minimize, SolverOptions, defaultSolverOptions } from "./LevenbergMarquardt";

export type GaussianFit = {
    parameters: FitParameters;
    // Model evaluated on the patch grid
    model: Grid;
    evaluations: number;
    iterations: number;
}

export function gaussianValue(p: FitParameters, x: number, y: number) {
    const dx = x - p.x0;
    const dy = y - p.y0;
    return p.offset + p.height * Math.exp(-(dx * dx + dy * dy) / (2 * p.sigma * p.sigma));
}

export function evaluateModel(p: FitParameters, width: number, height: number): Grid {
    const result: Grid = [];
    for(let y = 0; y < height; ++y) {
        const row: number[] = [];
        for(let x = 0; x < width; ++x) {
            row.push(gaussianValue(p, x, y));
        }
        result.push(row);
    }
    return result;
}

export function initialGuess(patch: Grid): FitParameters {
    const rowSums = patch.map(row=>row.reduce((acc, v)=>acc + v, 0));
    const colSums = patch[0].map((_, x)=>patch.reduce((acc, row)=>acc + row[x], 0));
    const x0 = argMax(colSums);
    const y0 = argMax(rowSums);
    return {
        x0,
        y0,
        sigma: 1.0,
        height: patch[y0][x0],
        offset: median(patch.flat()),
    };
}

function toVector(p: FitParameters) {
    return [p.x0, p.y0, p.sigma, p.height, p.offset];
}

function fromVector(v: number[]): FitParameters {
    return {x0: v[0], y0: v[1], sigma: v[2], height: v[3], offset: v[4]};
}

// Weighted fit of offset + height * exp(-r²/2sigma²), uniform weight 1/noise
export function fitGaussian(patch: Grid, noise: number, options: SolverOptions = defaultSolverOptions): StepResult<GaussianFit> {
    if (!(noise > 0) || !Number.isFinite(noise)) {
        return failed("FitDivergence", `unusable noise estimate: ${noise}`);
    }
    const height = patch.length;
    const width = height ? patch[0].length : 0;
    const pixels: Array<[number, number, number]> = [];
    for(let y = 0; y < height; ++y) {
        for(let x = 0; x < width; ++x) {
            pixels.push([x, y, patch[y][x]]);
        }
    }
    if (!pixels.every(([, , v])=>Number.isFinite(v))) {
        return failed("FitDivergence", "patch holds non finite values");
    }

    const outcome = minimize({
        residuals: (v)=>{
            const p = fromVector(v);
            return pixels.map(([x, y, d])=>(d - gaussianValue(p, x, y)) / noise);
        },
        jacobian: (v)=>{
            const [x0, y0, sigma, h] = v;
            const s2 = sigma * sigma;
            return pixels.map(([x, y])=>{
                const dx = x - x0;
                const dy = y - y0;
                const r2 = dx * dx + dy * dy;
                const e = Math.exp(-r2 / (2 * s2));
                return [
                    -h * e * dx / s2 / noise,
                    -h * e * dy / s2 / noise,
                    -h * e * r2 / (s2 * sigma) / noise,
                    -e / noise,
                    -1 / noise,
                ];
            });
        },
    }, toVector(initialGuess(patch)), options);

    if (!outcome.converged) {
        return failed("FitDivergence", outcome.reason);
    }
    const parameters = fromVector(outcome.parameters);
    // Only sigma² enters the model
    parameters.sigma = Math.abs(parameters.sigma);
    if (parameters.sigma === 0 || !Object.values(parameters).every(Number.isFinite)) {
        return failed("FitDivergence", "degenerate fitted parameters");
    }
    return succeeded({
        parameters,
        model: evaluateModel(parameters, width, height),
        evaluations: outcome.evaluations,
        iterations: outcome.iterations,
    });
}
