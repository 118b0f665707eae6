import "source-map-support/register";
import 'mocha';
import { expect } from 'chai';
import { rejectOutliers } from "./OutlierFilter";

describe("Outlier filter", ()=> {
    it("removes a value far away from a tight cluster", ()=>{
        const values: number[] = [];
        for(let i = 0; i < 20; ++i) {
            values.push(i % 2 ? 10.1 : 9.9);
        }
        values.push(1000);
        const filtered = rejectOutliers(values);
        expect(Number.isNaN(filtered[20])).to.equal(true);
        expect(filtered.slice(0, 20)).to.deep.equal(values.slice(0, 20));
    });

    it("ignores missing values in the statistic and keeps them missing", ()=>{
        const values: number[] = [NaN];
        for(let i = 0; i < 20; ++i) {
            values.push(i % 2 ? 10.1 : 9.9);
            values.push(NaN);
        }
        values.push(1000);
        const filtered = rejectOutliers(values);
        expect(filtered.length).to.equal(values.length);
        expect(Number.isNaN(filtered[0])).to.equal(true);
        expect(Number.isNaN(filtered[filtered.length - 1])).to.equal(true);
        expect(filtered[1]).to.equal(9.9);
        expect(filtered[3]).to.equal(10.1);
    });

    it("leaves a constant sequence untouched", ()=>{
        expect(rejectOutliers([4, 4, 4, NaN, 4])).to.deep.equal([4, 4, 4, NaN, 4]);
    });

    it("leaves a single value untouched", ()=>{
        expect(rejectOutliers([NaN, 12, NaN])).to.deep.equal([NaN, 12, NaN]);
    });

    it("uses the threshold inclusively", ()=>{
        // mean 0, population deviation 1: both values at |z| = 1
        expect(rejectOutliers([-1, 1], 1)).to.deep.equal([NaN, NaN]);
        expect(rejectOutliers([-1, 1], 1.5)).to.deep.equal([-1, 1]);
    });
});
