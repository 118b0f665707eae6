import { MethodSpectrum } from "../shared/SpectrumTypes";
import { isPresent, median } from "../shared/Algebra";

// Median of peak/aperture where both are present. Null without overlap.
export function computeScaleFactor(peak: MethodSpectrum, aperture: MethodSpectrum): number|null {
    const ratios: number[] = [];
    const n = Math.min(peak.length, aperture.length);
    for(let i = 0; i < n; ++i) {
        if (!isPresent(peak[i]) || !isPresent(aperture[i])) {
            continue;
        }
        const ratio = peak[i] / aperture[i];
        if (Number.isFinite(ratio)) {
            ratios.push(ratio);
        }
    }
    if (ratios.length === 0) {
        return null;
    }
    return median(ratios);
}

export function applyScaleFactor(aperture: MethodSpectrum, factor: number): MethodSpectrum {
    return aperture.map(v=>(isPresent(v) ? v * factor : v));
}

export function calibrateAperture(peak: MethodSpectrum, aperture: MethodSpectrum) {
    const scaleFactor = computeScaleFactor(peak, aperture);
    return {
        scaleFactor,
        aperture: scaleFactor === null ? [...aperture] : applyScaleFactor(aperture, scaleFactor),
    };
}
