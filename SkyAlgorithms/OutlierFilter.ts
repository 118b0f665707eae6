import { MethodSpectrum } from "../shared/SpectrumTypes";
import { isPresent, mean, presentValues, stddev } from "../shared/Algebra";

export const defaultOutlierThreshold = 3.0;

// Replace values whose |z-score| reaches the threshold by NaN. Missing values do not enter the statistic.
export function rejectOutliers(spectrum: MethodSpectrum, threshold = defaultOutlierThreshold): MethodSpectrum {
    const values = presentValues(spectrum);
    if (values.length < 2) {
        return [...spectrum];
    }
    const moy = mean(values);
    const sd = stddev(values);
    if (!(sd > 0)) {
        return [...spectrum];
    }
    return spectrum.map(v=>(isPresent(v) && Math.abs((v - moy) / sd) >= threshold ? NaN : v));
}
