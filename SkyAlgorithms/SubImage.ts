import { Grid, Slice, StepResult, SubImage, failed, succeeded } from "../shared/SpectrumTypes";

export const defaultHalfWidth = 7;

function crop(grid: Grid, x0: number, y0: number, size: number): Grid {
    const result: Grid = [];
    for(let y = y0; y < y0 + size && y < grid.length; ++y) {
        result.push(grid[y].slice(x0, x0 + size));
    }
    return result;
}

function hasShape(grid: Grid, size: number) {
    return grid.length === size && grid.every(row=>row.length === size);
}

function fieldWidth(grid: Grid) {
    return grid.length ? grid[0].length : 0;
}

export function extractSubImage(slice: Slice, x: number, y: number, halfWidth = defaultHalfWidth): StepResult<SubImage> {
    const size = 2 * halfWidth + 1;
    const width = fieldWidth(slice.intensity);
    const height = slice.intensity.length;
    if (x - halfWidth < 0 || y - halfWidth < 0 || x + halfWidth >= width || y + halfWidth >= height) {
        return failed("OutOfBounds", `patch around (${x}, ${y}) exceeds the ${width}x${height} field`);
    }

    const originX = x - halfWidth;
    const originY = y - halfWidth;
    const data = crop(slice.intensity, originX, originY, size);
    const uncertainty = crop(slice.uncertainty, originX, originY, size);
    if (!hasShape(data, size) || !hasShape(uncertainty, size)) {
        return failed("ShapeMismatch", `patch around (${x}, ${y}) is not ${size}x${size}`);
    }
    return succeeded({data, uncertainty, originX, originY});
}
