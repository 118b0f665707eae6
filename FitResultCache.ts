import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import Log from './Log';
import { CacheRecord, CacheTable, Method, MethodResult, methods } from './shared/SpectrumTypes';

const logger = Log.logger(__filename);

export interface CacheStore {
    read(starId: string, method: Method): CacheTable|undefined;
    write(table: CacheTable): void;
    clear(starId?: string): void;
}

export class MemoryCacheStore implements CacheStore {
    private readonly tables = new Map<string, CacheTable>();

    private key(starId: string, method: Method) {
        return starId + "\u0000" + method;
    }

    read(starId: string, method: Method) {
        const table = this.tables.get(this.key(starId, method));
        return table === undefined ? undefined : structuredClone(table);
    }

    write(table: CacheTable) {
        this.tables.set(this.key(table.starId, table.method), structuredClone(table));
    }

    clear(starId?: string) {
        for(const [k, table] of [...this.tables.entries()]) {
            if (starId === undefined || table.starId === starId) {
                this.tables.delete(k);
            }
        }
    }
}

const nullableNumber = z.number().nullable();

const tableFileSchema = z.object({
    starId: z.string(),
    method: z.enum(methods),
    complete: z.boolean(),
    scaleFactor: nullableNumber.optional(),
    rows: z.array(z.object({
        index: z.number().int().nonnegative(),
        intensity: nullableNumber,
        chiSquared: nullableNumber,
        reducedChiSquared: nullableNumber,
        rSquared: nullableNumber,
    })),
});

type StoredTable = z.infer<typeof tableFileSchema>;

const toStored = (v: number)=>(Number.isFinite(v) ? v : null);
const fromStored = (v: number|null)=>(v === null ? NaN : v);

// Distinct ids map to distinct names
export function safeFileName(starId: string) {
    return encodeURIComponent(starId).replace(/[!'()*]/g, c=>'%' + c.charCodeAt(0).toString(16).toUpperCase());
}

// One JSON file per star and method. Files are replaced atomically.
export class FileCacheStore implements CacheStore {
    readonly directory: string;

    constructor(directory: string) {
        this.directory = directory;
        fs.mkdirSync(directory, {recursive: true});
    }

    private fileName(starId: string, method: Method) {
        return path.join(this.directory, safeFileName(starId) + '.' + method + '.json');
    }

    read(starId: string, method: Method): CacheTable|undefined {
        const file = this.fileName(starId, method);
        if (!fs.existsSync(file)) {
            return undefined;
        }
        let content: unknown;
        try {
            content = JSON.parse(fs.readFileSync(file, 'utf8'));
        } catch(e) {
            logger.warn('Unreadable cache file, ignored', {file}, e);
            return undefined;
        }
        const parsed = tableFileSchema.safeParse(content);
        if (!parsed.success || parsed.data.starId !== starId || parsed.data.method !== method) {
            logger.warn('Invalid cache file, ignored', {file});
            return undefined;
        }
        const stored = parsed.data;
        return {
            starId: stored.starId,
            method: stored.method,
            complete: stored.complete,
            scaleFactor: stored.scaleFactor,
            rows: stored.rows.map(row=>({
                index: row.index,
                intensity: fromStored(row.intensity),
                chiSquared: fromStored(row.chiSquared),
                reducedChiSquared: fromStored(row.reducedChiSquared),
                rSquared: fromStored(row.rSquared),
            })),
        };
    }

    write(table: CacheTable) {
        const target = this.fileName(table.starId, table.method);
        const stored: StoredTable = {
            starId: table.starId,
            method: table.method,
            complete: table.complete,
            scaleFactor: table.scaleFactor,
            rows: table.rows.map(row=>({
                index: row.index,
                intensity: toStored(row.intensity),
                chiSquared: toStored(row.chiSquared),
                reducedChiSquared: toStored(row.reducedChiSquared),
                rSquared: toStored(row.rSquared),
            })),
        };

        const temp = target + '.' + process.pid + '.tmp';
        try {
            const fd = fs.openSync(temp, 'w');
            try {
                fs.writeFileSync(fd, JSON.stringify(stored, null, 1), 'utf8');
                fs.fsyncSync(fd);
            } finally {
                fs.closeSync(fd);
            }
            fs.renameSync(temp, target);
        } catch(e) {
            logger.error('Error saving cache', {target}, e);
            if (fs.existsSync(temp)) {
                fs.unlinkSync(temp);
            }
            throw e;
        }
        logger.debug('Saved cache', {target, rows: stored.rows.length});
    }

    clear(starId?: string) {
        for(const file of fs.readdirSync(this.directory)) {
            if (!file.endsWith('.json')) {
                continue;
            }
            if (starId !== undefined && !methods.some(m=>file === safeFileName(starId) + '.' + m + '.json')) {
                continue;
            }
            fs.unlinkSync(path.join(this.directory, file));
        }
    }
}

export function toCacheTable(starId: string, method: Method, result: MethodResult, scaleFactor?: number|null): CacheTable {
    const rows: CacheRecord[] = result.spectrum.map((intensity, index)=>{
        // A missing intensity voids the whole record
        const present = !Number.isNaN(intensity);
        return {
            index,
            intensity,
            chiSquared: present ? result.goodness.chiSquared[index] : NaN,
            reducedChiSquared: present ? result.goodness.reducedChiSquared[index] : NaN,
            rSquared: present ? result.goodness.rSquared[index] : NaN,
        };
    });
    const table: CacheTable = {starId, method, complete: true, rows};
    if (scaleFactor !== undefined) {
        table.scaleFactor = scaleFactor;
    }
    return table;
}

export function fromCacheTable(table: CacheTable, length: number): MethodResult {
    const result: MethodResult = {
        spectrum: new Array<number>(length).fill(NaN),
        goodness: {
            chiSquared: new Array<number>(length).fill(NaN),
            reducedChiSquared: new Array<number>(length).fill(NaN),
            rSquared: new Array<number>(length).fill(NaN),
        },
    };
    for(const row of table.rows) {
        if (row.index >= length) {
            continue;
        }
        result.spectrum[row.index] = row.intensity;
        result.goodness.chiSquared[row.index] = row.chiSquared;
        result.goodness.reducedChiSquared[row.index] = row.reducedChiSquared;
        result.goodness.rSquared[row.index] = row.rSquared;
    }
    return result;
}

export type CachedStar = {[M in Method]: CacheTable};

export default class FitResultCache {
    readonly store: CacheStore;

    constructor(store: CacheStore) {
        this.store = store;
    }

    // All tables of a star, only when every one carries the completion marker
    load(starId: string): CachedStar|undefined {
        const peak = this.store.read(starId, "peak");
        const aperture = this.store.read(starId, "aperture");
        const pixel = this.store.read(starId, "pixel");
        if (peak === undefined || aperture === undefined || pixel === undefined) {
            return undefined;
        }
        if (!peak.complete || !aperture.complete || !pixel.complete) {
            logger.info('Ignoring incomplete cache', {starId});
            return undefined;
        }
        return {peak, aperture, pixel};
    }

    save(starId: string, results: {[M in Method]: MethodResult}, scaleFactor: number|null) {
        // A star with only part of its tables rewritten must read back as uncached
        this.store.clear(starId);
        for(const method of methods) {
            this.store.write(toCacheTable(starId, method, results[method], method === "aperture" ? scaleFactor : undefined));
        }
    }

    clear(starId?: string) {
        this.store.clear(starId);
    }
}
