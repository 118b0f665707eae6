import { z } from 'zod';
import ConfigStore, { ConfigError } from './ConfigStore';

const rangeSchema = z.object({
    min: z.number(),
    max: z.number(),
}).refine(r=>r.min < r.max, {message: "min must be lower than max"});

const starSchema = z.object({
    id: z.string().optional(),
    x: z.number().int(),
    y: z.number().int(),
});

export const settingsSchema = z.object({
    axis: z.object({
        refWavelength: z.number(),
        refPixel: z.number(),
        step: z.number().refine(v=>v !== 0, {message: "step must not be zero"}),
    }),
    // Defaults to the slice count of the cube
    sliceCount: z.number().int().positive().nullable(),
    // Inclusive range of never fitted indices
    excludedBand: z.object({
        start: z.number().int(),
        end: z.number().int(),
    }).nullable(),
    halfWidth: z.number().int().min(2),
    apertureHalfWidth: z.number().int().nonnegative(),
    apertureScale: z.number(),
    background: z.object({
        dx: z.number().int(),
        dy: z.number().int(),
        width: z.number().int().nonnegative(),
        height: z.number().int().nonnegative(),
    }),
    peakHeightRange: rangeSchema,
    outlierThreshold: z.number().positive(),
    cacheDir: z.string(),
    plotDir: z.string().nullable(),
    cubeFile: z.string().nullable(),
    catalogFile: z.string().nullable(),
    stars: z.array(starSchema),
});

export type Settings = z.infer<typeof settingsSchema>;

export type StarEntry = z.infer<typeof starSchema>;

export { starSchema };

export const defaultSettings = ():Settings=> ({
    axis: {
        refWavelength: 4749.75,
        refPixel: 0,
        step: 1.25,
    },
    sliceCount: null,
    excludedBand: {
        start: 824,
        end: 1040,
    },
    halfWidth: 7,
    apertureHalfWidth: 2,
    apertureScale: 0.2,
    background: {
        dx: 7,
        dy: -2,
        width: 5,
        height: 5,
    },
    peakHeightRange: {
        min: -10000,
        max: 10000,
    },
    outlierThreshold: 3.0,
    cacheDir: 'cache',
    plotDir: 'plots',
    cubeFile: null,
    catalogFile: null,
    stars: [],
});

export function parseSettings(content: unknown): Settings {
    const parsed = settingsSchema.safeParse(content);
    if (!parsed.success) {
        throw new ConfigError("Invalid settings: " + parsed.error.issues.map(i=>i.path.join('.') + ': ' + i.message).join(', '));
    }
    return parsed.data;
}

export function loadSettings(name = 'spectra', configDir = 'local'): Settings {
    return new ConfigStore<Settings>(name, defaultSettings(), parseSettings, configDir).content;
}
