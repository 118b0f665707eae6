import { Grid } from "../shared/SpectrumTypes";
import { stddev } from "../shared/Algebra";

export const cornerSize = 3;

// Pixels of the four corner blocks, assumed to hold no star light
export function cornerPixels(patch: Grid, block = cornerSize): number[] {
    const height = patch.length;
    const width = height ? patch[0].length : 0;
    const result: number[] = [];
    for(const [y0, x0] of [[0, 0], [0, width - block], [height - block, 0], [height - block, width - block]]) {
        for(let y = y0; y < y0 + block; ++y) {
            for(let x = x0; x < x0 + block; ++x) {
                result.push(patch[y][x]);
            }
        }
    }
    return result;
}

export function estimateNoise(patch: Grid): number {
    return stddev(cornerPixels(patch));
}
