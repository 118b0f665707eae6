import fs from 'fs';
import path from 'path';
import Log from './Log';
import { safeFileName } from './FitResultCache';
import { Method, MethodSpectrum, StarSpectra, methods } from './shared/SpectrumTypes';

const logger = Log.logger(__filename);

export type PlotPoint = [number, number];

export type PlotSeries = {
    name: string;
    points: PlotPoint[];
}

export type Plot = {
    title: string;
    series: PlotSeries[];
}

export interface PlotSink {
    render(plot: Plot): void;
}

// Missing values are dropped, never drawn as zero
export function toPoints(wavelengths: number[], spectrum: MethodSpectrum): PlotPoint[] {
    const result: PlotPoint[] = [];
    const n = Math.min(wavelengths.length, spectrum.length);
    for(let i = 0; i < n; ++i) {
        if (Number.isFinite(spectrum[i])) {
            result.push([wavelengths[i], spectrum[i]]);
        }
    }
    return result;
}

export function starPlot(spectra: StarSpectra, which: readonly Method[] = methods): Plot {
    return {
        title: spectra.star.id,
        series: which.map(method=>({
            name: method,
            points: toPoints(spectra.wavelengths, spectra.byMethod[method].spectrum),
        })),
    };
}

// One series per star, same method
export function methodPlot(title: string, all: StarSpectra[], method: Method): Plot {
    return {
        title,
        series: all.map(spectra=>({
            name: spectra.star.id,
            points: toPoints(spectra.wavelengths, spectra.byMethod[method].spectrum),
        })),
    };
}

export class JsonPlotExporter implements PlotSink {
    readonly directory: string;

    constructor(directory: string) {
        this.directory = directory;
        fs.mkdirSync(directory, {recursive: true});
    }

    fileFor(title: string) {
        return path.join(this.directory, safeFileName(title) + '.json');
    }

    render(plot: Plot) {
        const file = this.fileFor(plot.title);
        fs.writeFileSync(file, JSON.stringify(plot));
        logger.debug('Plot exported', {file, series: plot.series.length});
    }
}
