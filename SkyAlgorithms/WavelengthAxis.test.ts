import "source-map-support/register";
import 'mocha';
import { expect } from 'chai';
import { buildWavelengthAxis, wavelengthAt } from "./WavelengthAxis";

describe("Wavelength axis", ()=> {
    const axis = {refWavelength: 4749.75, refPixel: 0, step: 1.25};

    it("follows the linear formula", ()=>{
        const values = buildWavelengthAxis(axis, 4);
        expect(values).to.deep.equal([4749.75, 4751, 4752.25, 4753.5]);
    });

    it("uses the reference pixel as origin", ()=>{
        expect(wavelengthAt({refWavelength: 5000, refPixel: 10, step: 2}, 0)).to.equal(4980);
        expect(wavelengthAt({refWavelength: 5000, refPixel: 10, step: 2}, 10)).to.equal(5000);
    });

    it("has one value per slice and is monotonic", ()=>{
        const values = buildWavelengthAxis({refWavelength: 7000, refPixel: 3, step: -0.5}, 50);
        expect(values.length).to.equal(50);
        for(let i = 1; i < values.length; ++i) {
            expect(values[i]).to.be.lessThan(values[i - 1]);
        }
    });

    it("rejects a null step", ()=>{
        expect(()=>buildWavelengthAxis({refWavelength: 7000, refPixel: 0, step: 0}, 3)).to.throw(/non zero/);
    });
});
