#!/usr/bin/env node
'use strict';

import "source-map-support/register";
import fs from 'fs';

import Log from './Log';
import * as Metrics from "./Metrics";
import { ConfigError } from './ConfigStore';
import { loadSettings, Settings } from './Settings';
import { loadCatalog, toStars } from './Catalog';
import { loadJsonCube } from './SliceSource';
import FitResultCache, { FileCacheStore } from './FitResultCache';
import SpectrumPipeline from './SpectrumPipeline';
import { JsonPlotExporter, methodPlot, starPlot } from './PlotSink';
import { methods, Star } from './shared/SpectrumTypes';

const logger = Log.logger(__filename);

export type CliOptions = {
    config: string;
    configDir: string;
    cube: string|null;
    catalog: string|null;
    stars: string[];
    recompute: boolean;
    clearCache: boolean;
    plots: string|null;
    metrics: string|null;
}

export const usage = "usage: app [--config <name>] [--config-dir <dir>] [--cube <file>] [--catalog <file>] [--star <id>]... [--recompute] [--clear-cache] [--plots <dir>] [--metrics <file>]";

export function parseArguments(argv: string[]): CliOptions {
    const options: CliOptions = {
        config: 'spectra',
        configDir: 'local',
        cube: null,
        catalog: null,
        stars: [],
        recompute: false,
        clearCache: false,
        plots: null,
        metrics: null,
    };

    for(let i = 0; i < argv.length; ++i) {
        const arg = argv[i];
        const value = ()=> {
            if (i + 1 >= argv.length) {
                throw new ConfigError(`Missing value for ${arg}\n${usage}`);
            }
            return argv[++i];
        };
        switch(arg) {
            case "--config":
                options.config = value();
                break;
            case "--config-dir":
                options.configDir = value();
                break;
            case "--cube":
                options.cube = value();
                break;
            case "--catalog":
                options.catalog = value();
                break;
            case "--star":
                options.stars.push(value());
                break;
            case "--recompute":
                options.recompute = true;
                break;
            case "--clear-cache":
                options.clearCache = true;
                break;
            case "--plots":
                options.plots = value();
                break;
            case "--metrics":
                options.metrics = value();
                break;
            default:
                throw new ConfigError(`Unknown argument ${arg}\n${usage}`);
        }
    }
    return options;
}

export function selectStars(settings: Settings, options: CliOptions): Star[] {
    const catalogFile = options.catalog ?? settings.catalogFile;
    const stars = catalogFile !== null ? loadCatalog(catalogFile) : toStars(settings.stars);
    if (!options.stars.length) {
        return stars;
    }
    const known = new Set(stars.map(s=>s.id));
    for(const id of options.stars) {
        if (!known.has(id)) {
            throw new ConfigError(`Star ${id} is not in the catalog`);
        }
    }
    return stars.filter(s=>options.stars.includes(s.id));
}

export function run(options: CliOptions) {
    const settings = loadSettings(options.config, options.configDir);
    const cubeFile = options.cube ?? settings.cubeFile;
    if (cubeFile === null) {
        throw new ConfigError("No cube given (--cube or cubeFile setting)");
    }
    const stars = selectStars(settings, options);
    const source = loadJsonCube(cubeFile);
    const cache = new FitResultCache(new FileCacheStore(settings.cacheDir));
    if (options.clearCache) {
        for(const star of stars) {
            cache.clear(star.id);
        }
        logger.info('Cache cleared', {stars: stars.length});
    }

    const pipeline = new SpectrumPipeline(source, cache, settings, {recompute: options.recompute});
    const results = pipeline.run(stars);

    const plotDir = options.plots ?? settings.plotDir;
    if (plotDir !== null) {
        const sink = new JsonPlotExporter(plotDir);
        for(const spectra of results) {
            sink.render(starPlot(spectra));
        }
        if (results.length > 1) {
            for(const method of methods) {
                sink.render(methodPlot('all.' + method, results, method));
            }
        }
    }

    if (options.metrics !== null) {
        fs.writeFileSync(options.metrics, Metrics.format(pipeline.getMetrics()));
    }
    logger.info('Done', {stars: results.length, fromCache: results.filter(r=>r.fromCache).length});
    return results;
}

export function main(argv: string[]): number {
    try {
        run(parseArguments(argv));
        return 0;
    } catch(e) {
        logger.error('Spectrum extraction failed', e);
        return 1;
    }
}

if (require.main === module) {
    process.exitCode = main(process.argv.slice(2));
}
