import "source-map-support/register";
import 'mocha';
import { expect } from 'chai';
import fs from 'fs';
import path from 'path';
import tmp from 'tmp';
import ConfigStore, { applyPatch, ConfigError } from './ConfigStore';
import { defaultSettings, loadSettings, parseSettings } from './Settings';

describe("Config patch", ()=> {
    it("merges objects recursively", ()=>{
        expect(applyPatch({a: {b: 1, c: 2}, d: 3}, {a: {c: 5}})).to.deep.equal({a: {b: 1, c: 5}, d: 3});
    });

    it("replaces arrays and scalars", ()=>{
        expect(applyPatch({a: [1, 2], b: null}, {a: [3], b: {x: 1}})).to.deep.equal({a: [3], b: {x: 1}});
    });

    it("drops removed keys", ()=>{
        expect(applyPatch({a: 1, b: 2}, {"$$removal$$": ["b"]})).to.deep.equal({a: 1});
    });
});

describe("Config store", ()=> {
    let dir: tmp.DirResult;

    beforeEach(()=>{
        dir = tmp.dirSync({unsafeCleanup: true});
    });

    afterEach(()=>{
        dir.removeCallback();
    });

    it("creates the example and an empty patch", ()=>{
        const store = new ConfigStore<unknown>("test", {a: 1}, (c)=>c, dir.name);
        expect(store.content).to.deep.equal({a: 1});
        expect(JSON.parse(fs.readFileSync(path.join(dir.name, "test.default.json"), "utf8"))).to.deep.equal({a: 1});
        expect(fs.readFileSync(path.join(dir.name, "test.json"), "utf8")).to.equal("{}");
    });

    it("applies the local patch to settings", ()=>{
        fs.writeFileSync(path.join(dir.name, "spectra.json"), JSON.stringify({
            peakHeightRange: {min: -5000},
            excludedBand: null,
            stars: [{x: 10, y: 20}],
        }));
        const settings = loadSettings("spectra", dir.name);
        expect(settings.peakHeightRange).to.deep.equal({min: -5000, max: 10000});
        expect(settings.excludedBand).to.equal(null);
        expect(settings.stars).to.deep.equal([{x: 10, y: 20}]);
        expect(settings.axis).to.deep.equal(defaultSettings().axis);
    });

    it("rejects invalid settings", ()=>{
        fs.writeFileSync(path.join(dir.name, "spectra.json"), JSON.stringify({axis: {step: 0}}));
        expect(()=>loadSettings("spectra", dir.name)).to.throw(ConfigError, /axis.step/);
    });

    it("rejects an unreadable patch", ()=>{
        fs.writeFileSync(path.join(dir.name, "spectra.json"), "{");
        expect(()=>loadSettings("spectra", dir.name)).to.throw(ConfigError);
    });
});

describe("Settings", ()=> {
    it("accepts the defaults", ()=>{
        expect(parseSettings(defaultSettings())).to.deep.equal(defaultSettings());
    });

    it("requires an ordered peak range", ()=>{
        expect(()=>parseSettings({...defaultSettings(), peakHeightRange: {min: 10, max: -10}})).to.throw(ConfigError, /peakHeightRange/);
    });
});
