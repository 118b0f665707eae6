import { Grid, Star, StepResult, failed, succeeded } from "../shared/SpectrumTypes";
import { roundHalfEven } from "../shared/Algebra";
import { GaussianFit, gaussianValue } from "./GaussianFit";

export type ValueRange = {
    min: number;
    max: number;
}

// Side window in field coordinates, relative to the star position
export type BackgroundWindow = {
    dx: number;
    dy: number;
    width: number;
    height: number;
}

export type IntensitySettings = {
    peakHeightRange: ValueRange;
    apertureHalfWidth: number;
    apertureScale: number;
    background: BackgroundWindow;
}

export type Intensities = {
    peak: StepResult<number>;
    aperture: number;
    pixel: number;
}

function sumWindow(grid: Grid, x0: number, y0: number, width: number, height: number) {
    let sum = 0;
    const yMin = Math.max(0, y0);
    const yMax = Math.min(grid.length, y0 + height);
    for(let y = yMin; y < yMax; ++y) {
        const row = grid[y];
        const xMin = Math.max(0, x0);
        const xMax = Math.min(row.length, x0 + width);
        for(let x = xMin; x < xMax; ++x) {
            sum += row[x];
        }
    }
    return sum;
}

export function peakIntensity(height: number, range: ValueRange): StepResult<number> {
    if (height > range.min && height < range.max) {
        return succeeded(height);
    }
    return failed("ImplausibleValue", `fitted height ${height} outside (${range.min}, ${range.max})`);
}

export function extractIntensities(fit: GaussianFit, field: Grid, star: Star, settings: IntensitySettings): Intensities {
    const cx = roundHalfEven(fit.parameters.x0);
    const cy = roundHalfEven(fit.parameters.y0);
    const hw = settings.apertureHalfWidth;
    const apertureSize = 2 * hw + 1;

    const modelSum = sumWindow(fit.model, cx - hw, cy - hw, apertureSize, apertureSize);
    const bg = settings.background;
    const background = sumWindow(field, star.x + bg.dx, star.y + bg.dy, bg.width, bg.height);

    return {
        peak: peakIntensity(fit.parameters.height, settings.peakHeightRange),
        aperture: (modelSum - background) * settings.apertureScale,
        pixel: gaussianValue(fit.parameters, cx, cy),
    };
}
