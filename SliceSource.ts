import fs from 'fs';
import { z } from 'zod';
import Log from './Log';
import { Grid, Slice } from './shared/SpectrumTypes';

const logger = Log.logger(__filename);

export interface SliceSource {
    readonly sliceCount: number;
    getSlice(index: number): Slice;
}

export class SliceNotFoundError extends Error {
    readonly index: number;

    constructor(index: number, sliceCount: number) {
        super(`No slice ${index} (cube holds ${sliceCount} slices)`);
        this.name = "SliceNotFoundError";
        this.index = index;
    }
}

export class CubeFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "CubeFormatError";
    }
}

export class ArraySliceSource implements SliceSource {
    private readonly intensity: Grid[];
    private readonly uncertainty: Grid[];

    // Both cubes are indexed [wavelength][y][x]
    constructor(intensity: Grid[], uncertainty: Grid[]) {
        if (intensity.length !== uncertainty.length) {
            throw new CubeFormatError(`intensity and uncertainty cubes differ in length: ${intensity.length} vs ${uncertainty.length}`);
        }
        this.intensity = intensity;
        this.uncertainty = uncertainty;
    }

    get sliceCount() {
        return this.intensity.length;
    }

    getSlice(index: number): Slice {
        if (!Number.isInteger(index) || index < 0 || index >= this.intensity.length) {
            throw new SliceNotFoundError(index, this.intensity.length);
        }
        return {
            intensity: this.intensity[index],
            uncertainty: this.uncertainty[index],
        };
    }
}

// null stands for a blank pixel
const cubeSchema = z.array(z.array(z.array(z.number().nullable())));

const cubeFileSchema = z.object({
    intensity: cubeSchema,
    uncertainty: cubeSchema,
});

function toGrids(cube: Array<Array<Array<number|null>>>): Grid[] {
    return cube.map(plane=>plane.map(row=>row.map(v=>(v === null ? NaN : v))));
}

export function loadJsonCube(path: string): ArraySliceSource {
    let content: unknown;
    try {
        content = JSON.parse(fs.readFileSync(path, 'utf8'));
    } catch(e) {
        throw new CubeFormatError(`Unable to read cube ${path}: ${e instanceof Error ? e.message : e}`);
    }
    const parsed = cubeFileSchema.safeParse(content);
    if (!parsed.success) {
        throw new CubeFormatError(`Invalid cube ${path}: ${parsed.error.message}`);
    }
    const source = new ArraySliceSource(toGrids(parsed.data.intensity), toGrids(parsed.data.uncertainty));
    logger.info('Loaded cube', {path, sliceCount: source.sliceCount});
    return source;
}
