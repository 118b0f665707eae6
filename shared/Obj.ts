export type PlainObject = {[id: string]: unknown};

function hasKey(obj:object, key:string) {
    return Object.prototype.hasOwnProperty.call(obj, key);
}

function isObject(item:unknown): item is PlainObject {
    return (item !== null && item !== undefined && typeof item === 'object' && !Array.isArray(item));
}

function deepCopy(object:unknown):unknown
{
    if (isObject(object)) {
        const result: PlainObject = {};
        for(const k of Object.keys(object)) {
            result[k] = deepCopy(object[k]);
        }
        return result;
    } else if (Array.isArray(object)) {
        return object.map(deepCopy);
    } else {
        return object;
    }
}

export { hasKey, deepCopy, isObject };
