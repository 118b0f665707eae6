import Log from './Log';
import { SliceSource } from './SliceSource';
import { extractSubImage } from './SkyAlgorithms/SubImage';
import { estimateNoise } from './SkyAlgorithms/NoiseEstimator';
import { fitGaussian } from './SkyAlgorithms/GaussianFit';
import { computeGoodness, missingGoodness } from './SkyAlgorithms/GoodnessOfFit';
import { extractIntensities, Intensities, IntensitySettings } from './SkyAlgorithms/IntensityExtractor';
import { Failure, FailureKind, FitParameters, GoodnessStats, Method, MethodResult, Star, methods } from './shared/SpectrumTypes';

const logger = Log.logger(__filename);

export type IndexRange = {
    start: number;
    end: number;
}

export type AssemblerSettings = IntensitySettings & {
    halfWidth: number;
    excludedBand: IndexRange|null;
}

export type IndexOutcome = {
    status: "excluded";
} | {
    status: "failed";
    failure: Failure;
} | {
    status: "fitted";
    parameters: FitParameters;
    goodness: GoodnessStats;
    intensities: Intensities;
}

export type AssembledSpectra = {
    byMethod: {[M in Method]: MethodResult};
    parameters: Array<FitParameters|null>;
    failures: {[K in FailureKind]: number};
    fitted: number;
}

export const noFailures = (): {[K in FailureKind]: number}=> ({
    OutOfBounds: 0,
    ShapeMismatch: 0,
    FitDivergence: 0,
    ImplausibleValue: 0,
});

export function emptyMethodResult(): MethodResult {
    return {
        spectrum: [],
        goodness: {chiSquared: [], reducedChiSquared: [], rSquared: []},
    };
}

export function inExcludedBand(index: number, band: IndexRange|null) {
    return band !== null && index >= band.start && index <= band.end;
}

// Slice source errors are not per index failures: they propagate
export function processIndex(source: SliceSource, star: Star, index: number, settings: AssemblerSettings): IndexOutcome {
    if (inExcludedBand(index, settings.excludedBand)) {
        return {status: "excluded"};
    }
    const slice = source.getSlice(index);

    const subImage = extractSubImage(slice, star.x, star.y, settings.halfWidth);
    if (!subImage.ok) {
        return {status: "failed", failure: subImage.failure};
    }
    const noise = estimateNoise(subImage.value.data);
    const fit = fitGaussian(subImage.value.data, noise);
    if (!fit.ok) {
        return {status: "failed", failure: fit.failure};
    }
    return {
        status: "fitted",
        parameters: fit.value.parameters,
        goodness: computeGoodness(subImage.value.data, fit.value.model, noise),
        intensities: extractIntensities(fit.value, slice.intensity, star, settings),
    };
}

function push(result: MethodResult, value: number, goodness: GoodnessStats) {
    result.spectrum.push(value);
    result.goodness.chiSquared.push(goodness.chiSquared);
    result.goodness.reducedChiSquared.push(goodness.reducedChiSquared);
    result.goodness.rSquared.push(goodness.rSquared);
}

export function assembleSpectra(source: SliceSource, star: Star, count: number, settings: AssemblerSettings): AssembledSpectra {
    const result: AssembledSpectra = {
        byMethod: {
            peak: emptyMethodResult(),
            aperture: emptyMethodResult(),
            pixel: emptyMethodResult(),
        },
        parameters: [],
        failures: noFailures(),
        fitted: 0,
    };

    for(let index = 0; index < count; ++index) {
        const outcome = processIndex(source, star, index, settings);
        switch(outcome.status) {
            case "excluded":
                for(const method of methods) {
                    push(result.byMethod[method], NaN, missingGoodness());
                }
                result.parameters.push(null);
                break;
            case "failed":
                logger.debug('Index failed', {star: star.id, index, ...outcome.failure});
                result.failures[outcome.failure.kind]++;
                for(const method of methods) {
                    push(result.byMethod[method], NaN, missingGoodness());
                }
                result.parameters.push(null);
                break;
            case "fitted": {
                const {peak, aperture, pixel} = outcome.intensities;
                if (peak.ok) {
                    push(result.byMethod.peak, peak.value, outcome.goodness);
                } else {
                    logger.debug('Peak rejected', {star: star.id, index, ...peak.failure});
                    result.failures[peak.failure.kind]++;
                    push(result.byMethod.peak, NaN, missingGoodness());
                }
                push(result.byMethod.aperture, aperture, outcome.goodness);
                push(result.byMethod.pixel, pixel, outcome.goodness);
                result.parameters.push(outcome.parameters);
                result.fitted++;
                break;
            }
        }
    }
    return result;
}

// Pad with missing values (or cut) to the axis length
export function padMethodResult(result: MethodResult, length: number): MethodResult {
    const fit = (values: number[])=>{
        const copy = values.slice(0, length);
        while(copy.length < length) {
            copy.push(NaN);
        }
        return copy;
    };
    return {
        spectrum: fit(result.spectrum),
        goodness: {
            chiSquared: fit(result.goodness.chiSquared),
            reducedChiSquared: fit(result.goodness.reducedChiSquared),
            rSquared: fit(result.goodness.rSquared),
        },
    };
}
