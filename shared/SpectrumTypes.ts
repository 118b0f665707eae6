// Row-major pixel grid, indexed [y][x]
export type Grid = number[][];

export type Star = {
    id: string;
    x: number;
    y: number;
}

export type Slice = {
    intensity: Grid;
    uncertainty: Grid;
}

export type SubImage = {
    data: Grid;
    uncertainty: Grid;
    // Position of the patch origin in the field
    originX: number;
    originY: number;
}

export type FitParameters = {
    // Patch local coordinates
    x0: number;
    y0: number;
    sigma: number;
    height: number;
    offset: number;
}

export type GoodnessStats = {
    chiSquared: number;
    reducedChiSquared: number;
    rSquared: number;
}

export const methods = ["peak", "aperture", "pixel"] as const;

export type Method = typeof methods[number];

export const failureKinds = ["OutOfBounds", "ShapeMismatch", "FitDivergence", "ImplausibleValue"] as const;

export type FailureKind = typeof failureKinds[number];

export type Failure = {
    kind: FailureKind;
    message: string;
}

export type Succeeded<T> = {
    ok: true;
    value: T;
}

export type Failed = {
    ok: false;
    failure: Failure;
}

export type StepResult<T> = Succeeded<T>|Failed;

export function succeeded<T>(value: T): Succeeded<T> {
    return {ok: true, value};
}

export function failed(kind: FailureKind, message: string): Failed {
    return {ok: false, failure: {kind, message}};
}

// NaN marks a missing value
export type MethodSpectrum = number[];

export type GoodnessSequence = {
    chiSquared: number[];
    reducedChiSquared: number[];
    rSquared: number[];
}

export type CacheRecord = {
    index: number;
    intensity: number;
    chiSquared: number;
    reducedChiSquared: number;
    rSquared: number;
}

export type CacheTable = {
    starId: string;
    method: Method;
    // Set only by a finished compute pass
    complete: boolean;
    scaleFactor?: number|null;
    rows: CacheRecord[];
}

export type MethodResult = {
    spectrum: MethodSpectrum;
    goodness: GoodnessSequence;
}

export type StarSpectra = {
    star: Star;
    wavelengths: number[];
    fromCache: boolean;
    // Aperture calibration factor, null when it could not be computed
    scaleFactor: number|null;
    byMethod: {[M in Method]: MethodResult};
    failures: {[K in FailureKind]: number};
}
