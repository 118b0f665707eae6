import "source-map-support/register";
import 'mocha';
import { expect } from 'chai';
import fs from 'fs';
import tmp from 'tmp';
import { JsonPlotExporter, methodPlot, Plot, PlotSink, starPlot, toPoints } from './PlotSink';
import { MethodResult, StarSpectra } from './shared/SpectrumTypes';
import { noFailures } from './SpectrumAssembler';

function result(spectrum: number[]): MethodResult {
    const nan = spectrum.map(()=>NaN);
    return {spectrum, goodness: {chiSquared: nan, reducedChiSquared: nan, rSquared: nan}};
}

function spectra(id: string, peak: number[]): StarSpectra {
    return {
        star: {id, x: 0, y: 0},
        wavelengths: [500, 501, 502],
        fromCache: false,
        scaleFactor: 1,
        byMethod: {
            peak: result(peak),
            aperture: result([NaN, NaN, NaN]),
            pixel: result([1, 2, 3]),
        },
        failures: noFailures(),
    };
}

describe("Plot sink", ()=> {
    it("drops missing values", ()=>{
        expect(toPoints([1, 2, 3, 4], [10, NaN, 30, Infinity])).to.deep.equal([[1, 10], [3, 30]]);
    });

    it("draws one series per method for a star", ()=>{
        const rendered: Plot[] = [];
        const sink: PlotSink = {render: (plot)=>rendered.push(plot)};
        sink.render(starPlot(spectra("a", [5, NaN, 7])));
        expect(rendered).to.deep.equal([{
            title: "a",
            series: [
                {name: "peak", points: [[500, 5], [502, 7]]},
                {name: "aperture", points: []},
                {name: "pixel", points: [[500, 1], [501, 2], [502, 3]]},
            ],
        }]);
    });

    it("draws one series per star for a method", ()=>{
        const plot = methodPlot("all.peak", [spectra("a", [1, 2, 3]), spectra("b", [NaN, 4, NaN])], "peak");
        expect(plot.series).to.deep.equal([
            {name: "a", points: [[500, 1], [501, 2], [502, 3]]},
            {name: "b", points: [[501, 4]]},
        ]);
    });

    it("writes plots as json files", ()=>{
        const dir = tmp.dirSync({unsafeCleanup: true});
        try {
            const exporter = new JsonPlotExporter(dir.name);
            exporter.render(starPlot(spectra("12_34", [5, 6, 7]), ["peak"]));
            const content = JSON.parse(fs.readFileSync(exporter.fileFor("12_34"), "utf8"));
            expect(content).to.deep.equal({title: "12_34", series: [{name: "peak", points: [[500, 5], [501, 6], [502, 7]]}]});
        } finally {
            dir.removeCallback();
        }
    });

    it("gives distinct titles distinct files", ()=>{
        const dir = tmp.dirSync({unsafeCleanup: true});
        try {
            const exporter = new JsonPlotExporter(dir.name);
            exporter.render(starPlot(spectra("a/b", [1, 2, 3]), ["peak"]));
            exporter.render(starPlot(spectra("a_b", [4, 5, 6]), ["peak"]));
            expect(fs.readdirSync(dir.name).sort()).to.deep.equal(["a%2Fb.json", "a_b.json"]);
            expect(JSON.parse(fs.readFileSync(exporter.fileFor("a/b"), "utf8")).title).to.equal("a/b");
        } finally {
            dir.removeCallback();
        }
    });
});
