import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './ConfigStore';
import { StarEntry, starSchema } from './Settings';
import { Star } from './shared/SpectrumTypes';

const catalogSchema = z.array(starSchema);

export function starId(x: number, y: number) {
    return `${x}_${y}`;
}

export function toStars(entries: StarEntry[]): Star[] {
    const result: Star[] = [];
    const seen = new Set<string>();
    for(const entry of entries) {
        const id = entry.id ?? starId(entry.x, entry.y);
        if (seen.has(id)) {
            throw new ConfigError(`Duplicate star id in catalog: ${id}`);
        }
        seen.add(id);
        result.push({id, x: entry.x, y: entry.y});
    }
    return result;
}

export function loadCatalog(path: string): Star[] {
    let content: unknown;
    try {
        content = JSON.parse(fs.readFileSync(path, 'utf8'));
    } catch(e) {
        throw new ConfigError(`Unable to read catalog ${path}: ${e instanceof Error ? e.message : e}`);
    }
    const parsed = catalogSchema.safeParse(content);
    if (!parsed.success) {
        throw new ConfigError(`Invalid catalog ${path}: ${parsed.error.message}`);
    }
    return toStars(parsed.data);
}
