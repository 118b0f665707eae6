import Log from './Log';
import * as Metrics from './Metrics';
import { SliceSource } from './SliceSource';
import FitResultCache, { CachedStar, fromCacheTable } from './FitResultCache';
import { AssemblerSettings, assembleSpectra, noFailures, padMethodResult } from './SpectrumAssembler';
import { AxisDefinition, buildWavelengthAxis } from './SkyAlgorithms/WavelengthAxis';
import { rejectOutliers } from './SkyAlgorithms/OutlierFilter';
import { calibrateAperture } from './SkyAlgorithms/CrossMethodCalibrator';
import { FailureKind, Method, MethodResult, Star, StarSpectra, failureKinds } from './shared/SpectrumTypes';

const logger = Log.logger(__filename);

export type PipelineSettings = AssemblerSettings & {
    axis: AxisDefinition;
    sliceCount: number|null;
    outlierThreshold: number;
}

export type PipelineOptions = {
    // Ignore any cached result
    recompute?: boolean;
}

type RunCounters = {
    stars: number;
    cacheHits: number;
    fittedIndices: number;
    failures: {[K in FailureKind]: number};
}

// Outlier rejection; a rejected value voids its goodness fields as well
export function filterMethodResult(result: MethodResult, threshold: number): MethodResult {
    const spectrum = rejectOutliers(result.spectrum, threshold);
    const keep = (values: number[])=>values.map((v, i)=>(Number.isNaN(spectrum[i]) ? NaN : v));
    return {
        spectrum,
        goodness: {
            chiSquared: keep(result.goodness.chiSquared),
            reducedChiSquared: keep(result.goodness.reducedChiSquared),
            rSquared: keep(result.goodness.rSquared),
        },
    };
}

export default class SpectrumPipeline {
    readonly source: SliceSource;
    readonly cache: FitResultCache;
    readonly settings: PipelineSettings;
    readonly wavelengths: number[];
    private readonly options: PipelineOptions;
    private readonly counters: RunCounters;

    constructor(source: SliceSource, cache: FitResultCache, settings: PipelineSettings, options: PipelineOptions = {}) {
        this.source = source;
        this.cache = cache;
        this.settings = settings;
        this.options = options;
        this.wavelengths = buildWavelengthAxis(settings.axis, settings.sliceCount ?? source.sliceCount);
        this.counters = {
            stars: 0,
            cacheHits: 0,
            fittedIndices: 0,
            failures: noFailures(),
        };
    }

    private filterAll(byMethod: {[M in Method]: MethodResult}) {
        const length = this.wavelengths.length;
        const threshold = this.settings.outlierThreshold;
        return {
            peak: filterMethodResult(padMethodResult(byMethod.peak, length), threshold),
            aperture: filterMethodResult(padMethodResult(byMethod.aperture, length), threshold),
            pixel: filterMethodResult(padMethodResult(byMethod.pixel, length), threshold),
        };
    }

    private fromCache(star: Star, cached: CachedStar): StarSpectra {
        const length = this.wavelengths.length;
        const byMethod = this.filterAll({
            peak: fromCacheTable(cached.peak, length),
            aperture: fromCacheTable(cached.aperture, length),
            pixel: fromCacheTable(cached.pixel, length),
        });
        this.counters.cacheHits++;
        logger.info('Loaded cached spectra', {star: star.id});
        return {
            star,
            wavelengths: this.wavelengths,
            fromCache: true,
            scaleFactor: cached.aperture.scaleFactor ?? null,
            byMethod,
            failures: noFailures(),
        };
    }

    private compute(star: Star): StarSpectra {
        logger.info('Computing spectra', {star: star.id, slices: this.wavelengths.length});
        const assembled = assembleSpectra(this.source, star, this.wavelengths.length, this.settings);
        const filtered = this.filterAll(assembled.byMethod);

        const calibration = calibrateAperture(filtered.peak.spectrum, filtered.aperture.spectrum);
        if (calibration.scaleFactor === null) {
            logger.warn('No common index between peak and aperture, aperture left uncalibrated', {star: star.id});
        }
        const byMethod = {
            ...filtered,
            aperture: {...filtered.aperture, spectrum: calibration.aperture},
        };

        this.cache.save(star.id, byMethod, calibration.scaleFactor);

        this.counters.fittedIndices += assembled.fitted;
        for(const kind of failureKinds) {
            this.counters.failures[kind] += assembled.failures[kind];
        }
        logger.info('Spectra computed', {star: star.id, fitted: assembled.fitted, failures: assembled.failures, scaleFactor: calibration.scaleFactor});
        return {
            star,
            wavelengths: this.wavelengths,
            fromCache: false,
            scaleFactor: calibration.scaleFactor,
            byMethod,
            failures: assembled.failures,
        };
    }

    processStar(star: Star): StarSpectra {
        this.counters.stars++;
        if (!this.options.recompute) {
            const cached = this.cache.load(star.id);
            if (cached !== undefined) {
                return this.fromCache(star, cached);
            }
        }
        return this.compute(star);
    }

    run(stars: Star[]): StarSpectra[] {
        return stars.map(star=>this.processStar(star));
    }

    getMetrics(): Metrics.Definition[] {
        const ret: Metrics.Definition[] = [
            {
                name: 'spectra_stars_total',
                help: 'Stars processed',
                type: 'counter',
                value: this.counters.stars,
            },
            {
                name: 'spectra_cache_hits_total',
                help: 'Stars loaded from cache',
                type: 'counter',
                value: this.counters.cacheHits,
            },
            {
                name: 'spectra_fitted_indices_total',
                help: 'Wavelength indices with a successful fit',
                type: 'counter',
                value: this.counters.fittedIndices,
            },
            {
                name: 'spectra_index_failures_total',
                help: 'Per index failures by kind',
                type: 'counter',
            },
        ];
        for(const kind of failureKinds) {
            ret.push({
                name: 'spectra_index_failures_total',
                value: this.counters.failures[kind],
                labels: {kind},
            });
        }
        return ret;
    }
}
