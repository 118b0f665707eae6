import "source-map-support/register";
import 'mocha';
import { expect } from 'chai';
import { AssemblerSettings, assembleSpectra, inExcludedBand, padMethodResult } from './SpectrumAssembler';
import { SliceNotFoundError } from './SliceSource';
import { constantGrid, SyntheticField, syntheticSource } from './SyntheticCube.fixture';
import { methods } from './shared/SpectrumTypes';

const settings: AssemblerSettings = {
    halfWidth: 7,
    excludedBand: {start: 2, end: 3},
    peakHeightRange: {min: -10000, max: 10000},
    apertureHalfWidth: 2,
    apertureScale: 0.2,
    background: {dx: 7, dy: -2, width: 5, height: 5},
};

function field(height: (i: number)=>number): SyntheticField {
    return {
        width: 30,
        height: 30,
        offset: 100,
        ripple: 1,
        stars: [{x: 12, y: 12, sigma: 1.6, height}],
    };
}

const fitted = [0, 1, 4, 5];
const excluded = [2, 3];

describe("Spectrum assembler", ()=> {
    it("fits every index outside the excluded band", ()=>{
        const source = syntheticSource(field(i=>1000 + 10 * i), 6);
        const result = assembleSpectra(source, {id: "12_12", x: 12, y: 12}, 6, settings);
        expect(result.fitted).to.equal(4);
        for(const method of methods) {
            const r = result.byMethod[method];
            expect(r.spectrum.length).to.equal(6);
            expect(r.goodness.chiSquared.length).to.equal(6);
            expect(r.goodness.reducedChiSquared.length).to.equal(6);
            expect(r.goodness.rSquared.length).to.equal(6);
            for(const i of fitted) {
                expect(Number.isFinite(r.spectrum[i])).to.equal(true, `${method} at ${i}`);
                expect(Number.isFinite(r.goodness.chiSquared[i])).to.equal(true);
            }
            for(const i of excluded) {
                expect(Number.isNaN(r.spectrum[i])).to.equal(true);
                expect(Number.isNaN(r.goodness.chiSquared[i])).to.equal(true);
                expect(Number.isNaN(r.goodness.reducedChiSquared[i])).to.equal(true);
                expect(Number.isNaN(r.goodness.rSquared[i])).to.equal(true);
            }
        }
        expect(result.byMethod.peak.spectrum[0]).to.be.closeTo(1000, 5);
        expect(result.byMethod.peak.spectrum[5]).to.be.closeTo(1050, 5);
        expect(result.parameters[2]).to.equal(null);
        expect(result.parameters[0]?.x0).to.be.closeTo(7, 0.02);
    });

    it("shares goodness between the three methods", ()=>{
        const source = syntheticSource(field(()=>800), 2);
        const result = assembleSpectra(source, {id: "s", x: 12, y: 12}, 2, {...settings, excludedBand: null});
        expect(result.byMethod.aperture.goodness).to.deep.equal(result.byMethod.peak.goodness);
        expect(result.byMethod.pixel.goodness).to.deep.equal(result.byMethod.peak.goodness);
    });

    it("gives an all missing spectrum for a star near the edge", ()=>{
        const source = syntheticSource(field(()=>1000), 6);
        const result = assembleSpectra(source, {id: "2_2", x: 2, y: 2}, 6, settings);
        expect(result.fitted).to.equal(0);
        expect(result.failures.OutOfBounds).to.equal(4);
        for(const method of methods) {
            expect(result.byMethod[method].spectrum.every(Number.isNaN)).to.equal(true);
        }
    });

    it("drops an implausible peak but keeps aperture and pixel", ()=>{
        const source = syntheticSource(field(()=>15000), 6);
        const result = assembleSpectra(source, {id: "s", x: 12, y: 12}, 6, settings);
        expect(result.failures.ImplausibleValue).to.equal(4);
        for(const i of fitted) {
            expect(Number.isNaN(result.byMethod.peak.spectrum[i])).to.equal(true);
            expect(Number.isNaN(result.byMethod.peak.goodness.rSquared[i])).to.equal(true);
            expect(Number.isFinite(result.byMethod.aperture.spectrum[i])).to.equal(true);
            expect(Number.isFinite(result.byMethod.pixel.spectrum[i])).to.equal(true);
            expect(Number.isFinite(result.byMethod.aperture.goodness.rSquared[i])).to.equal(true);
        }
    });

    it("turns a failed fit into a gap and goes on", ()=>{
        const source = syntheticSource(field(()=>1000), 6, i=>(i === 1 ? constantGrid(30, 30, 5) : undefined));
        const result = assembleSpectra(source, {id: "s", x: 12, y: 12}, 6, settings);
        expect(result.failures.FitDivergence).to.equal(1);
        expect(Number.isNaN(result.byMethod.pixel.spectrum[1])).to.equal(true);
        expect(Number.isFinite(result.byMethod.pixel.spectrum[0])).to.equal(true);
        expect(Number.isFinite(result.byMethod.pixel.spectrum[4])).to.equal(true);
    });

    it("lets slice source errors through", ()=>{
        const source = syntheticSource(field(()=>1000), 6);
        expect(()=>assembleSpectra(source, {id: "s", x: 12, y: 12}, 7, settings)).to.throw(SliceNotFoundError);
    });

    it("treats the excluded band as inclusive", ()=>{
        const band = {start: 2, end: 3};
        expect([1, 2, 3, 4].map(i=>inExcludedBand(i, band))).to.deep.equal([false, true, true, false]);
        expect(inExcludedBand(2, null)).to.equal(false);
    });

    it("pads and cuts to the axis length", ()=>{
        const r = {spectrum: [1, 2], goodness: {chiSquared: [3, 4], reducedChiSquared: [5, 6], rSquared: [7, 8]}};
        expect(padMethodResult(r, 3)).to.deep.equal({spectrum: [1, 2, NaN], goodness: {chiSquared: [3, 4, NaN], reducedChiSquared: [5, 6, NaN], rSquared: [7, 8, NaN]}});
        expect(padMethodResult(r, 1).spectrum).to.deep.equal([1]);
    });
});
