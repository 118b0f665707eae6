export type AxisDefinition = {
    refWavelength: number;
    refPixel: number;
    step: number;
}

export function wavelengthAt(axis: AxisDefinition, index: number) {
    return axis.refWavelength + (index - axis.refPixel) * axis.step;
}

export function buildWavelengthAxis(axis: AxisDefinition, count: number): number[] {
    if (axis.step === 0 || !Number.isFinite(axis.step)) {
        throw new Error("Wavelength step must be a non zero finite value");
    }
    const result: number[] = [];
    for(let i = 0; i < count; ++i) {
        result.push(wavelengthAt(axis, i));
    }
    return result;
}
