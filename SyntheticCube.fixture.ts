// Deterministic star fields used by the tests
import { ArraySliceSource } from './SliceSource';
import { Grid } from './shared/SpectrumTypes';

export type SyntheticStar = {
    x: number;
    y: number;
    sigma: number;
    // Per slice peak height
    height: (index: number)=>number;
}

export type SyntheticField = {
    width: number;
    height: number;
    offset: number;
    stars: SyntheticStar[];
    // Amplitude of the fixed ripple standing for noise
    ripple: number;
}

export function ripple(x: number, y: number, amplitude: number) {
    return amplitude * (((x * 7 + y * 13) % 5) - 2) / 2;
}

export function constantGrid(width: number, height: number, value: number): Grid {
    const result: Grid = [];
    for(let y = 0; y < height; ++y) {
        result.push(new Array<number>(width).fill(value));
    }
    return result;
}

export function syntheticSlice(field: SyntheticField, index: number): Grid {
    const result: Grid = [];
    for(let y = 0; y < field.height; ++y) {
        const row: number[] = [];
        for(let x = 0; x < field.width; ++x) {
            let v = field.offset + ripple(x, y, field.ripple);
            for(const star of field.stars) {
                const dx = x - star.x;
                const dy = y - star.y;
                v += star.height(index) * Math.exp(-(dx * dx + dy * dy) / (2 * star.sigma * star.sigma));
            }
            row.push(v);
        }
        result.push(row);
    }
    return result;
}

export function syntheticSource(field: SyntheticField, count: number, override: (index: number)=>Grid|undefined = ()=>undefined) {
    const intensity: Grid[] = [];
    const uncertainty: Grid[] = [];
    for(let i = 0; i < count; ++i) {
        intensity.push(override(i) ?? syntheticSlice(field, i));
        uncertainty.push(constantGrid(field.width, field.height, 1));
    }
    return new ArraySliceSource(intensity, uncertainty);
}
