import fs from 'fs';
import path from 'path';
import Log from './Log';
import * as Obj from './shared/Obj';

const logger = Log.logger(__filename);

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

// Default content, patched by <configDir>/<fileName>.json
export default class ConfigStore<T> {
    readonly content: T;
    private readonly fileName: string;
    private readonly localPath: string;

    constructor(fileName:string,
                defaultContent:T,
                readCb:(content:unknown)=>T,
                configDir = 'local')
    {
        this.fileName = fileName;
        this.localPath = path.join(configDir, fileName + '.json');
        const examplePath = path.join(configDir, fileName + '.default.json');

        try {
            if (!fs.existsSync(configDir)) {
                fs.mkdirSync(configDir, {recursive: true});
            }
            if (!fs.existsSync(examplePath)) {
                fs.writeFileSync(examplePath, JSON.stringify(defaultContent, null, 2));
            }
            if (!fs.existsSync(this.localPath)) {
                fs.writeFileSync(this.localPath, '{}');
            }
        } catch(e) {
            logger.error('Unable to save example', {...this.logContext(), examplePath}, e);
        }

        let patch: unknown = {};
        try {
            if (fs.existsSync(this.localPath)) {
                patch = JSON.parse(fs.readFileSync(this.localPath, 'utf8'));
                logger.info('Loaded config patch', {...this.logContext(), patch});
            }
        } catch(e) {
            throw new ConfigError(`Unable to read local config ${this.localPath}: ${e instanceof Error ? e.message : e}`);
        }

        this.content = readCb(applyPatch(Obj.deepCopy(defaultContent), patch));
        logger.debug('Resulting config', {...this.logContext(), config: this.content});
    }

    private logContext(): object {
        return {
            fileName: this.fileName
        };
    }
}

// Objects merge recursively; keys listed in $$removal$$ drop the default entry
export function applyPatch(defaultV:unknown, patchV:unknown): unknown {
    if (!Obj.isObject(patchV)) {
        return patchV;
    }
    const result: {[id: string]: unknown} = {};
    for(const k of Object.keys(patchV)) {
        if (k === '$$removal$$') {
            continue;
        }
        let wanted = patchV[k];
        // Recursive patch
        if (Obj.isObject(defaultV) && Obj.hasKey(defaultV, k)) {
            wanted = applyPatch(defaultV[k], wanted);
        }
        result[k] = wanted;
    }
    if (Obj.isObject(defaultV)) {
        const removalEntry = patchV['$$removal$$'];
        const removed = Array.isArray(removalEntry) ? removalEntry : [];
        for(const k of Object.keys(defaultV)) {
            if (!Obj.hasKey(result, k) && removed.indexOf(k) == -1) {
                result[k] = Obj.deepCopy(defaultV[k]);
            }
        }
    }
    return result;
}
