export function mean(values: number[]) {
    let s = 0;
    for(let i = 0; i < values.length; ++i) {
        s += values[i];
    }
    return s/values.length;
}

// Population standard deviation (divides by n)
export function stddev(values: number[]) {
    if (values.length === 0) return NaN;
    const moy = mean(values);
    return Math.sqrt(values.reduce((c, s)=>c + (s - moy)*(s - moy), 0) / values.length);
}

export function median(values: number[]) {
    if (values.length === 0) return NaN;
    const sorted = [...values].sort((a, b)=>a - b);
    const mid = Math.floor(sorted.length / 2);
    if (sorted.length % 2) {
        return sorted[mid];
    }
    return (sorted[mid - 1] + sorted[mid]) / 2;
}

export function isPresent(v: number) {
    return !Number.isNaN(v);
}

export function presentValues(values: number[]) {
    return values.filter(isPresent);
}

// Nearest integer, ties go to the even neighbour
export function roundHalfEven(v: number) {
    const r = Math.round(v);
    if (Math.abs(v % 1) === 0.5 && r % 2 !== 0) {
        return r - 1;
    }
    return r;
}

export function argMax(values: number[]) {
    let best = -1;
    for(let i = 0; i < values.length; ++i) {
        if (best === -1 || values[i] > values[best]) {
            best = i;
        }
    }
    return best;
}
