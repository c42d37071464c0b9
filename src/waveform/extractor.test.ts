/*
    Copyright (C) 2026 Andrew Capatina

    This program is free software: you can redistribute it and/or modify
    it under the terms of the GNU Affero General Public License as
    published by the Free Software Foundation, either version 3 of the
    License, or (at your option) any later version.

    This program is distributed in the hope that it will be useful,
    but WITHOUT ANY WARRANTY; without even the implied warranty of
    MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
    GNU Affero General Public License for more details.

    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>.
*/
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { LogChannel } from '../log.js';
import { isVcdError } from './errors.js';
import { extractFromSource, extractFromText, WaveExtractor } from './extractor.js';
import type { DisplayFormat } from './format.js';
import { toWaveJson } from './model.js';
import { LineSource, SourceLine, TextLineSource } from './source.js';

const FIXTURE = fileURLToPath(new URL('../../test/fixtures/counter.vcd', import.meta.url));

function recorder(): LogChannel & { lines: string[] } {
    const lines: string[] = [];
    return { lines, appendLine: (value: string) => { lines.push(value); } };
}

class ClosingSource implements LineSource {
    closed = 0;
    private readonly inner: TextLineSource;

    constructor(text: string) {
        this.inner = new TextLineSource(text);
    }

    nextLine(): SourceLine | null {
        return this.inner.nextLine();
    }

    close(): void {
        this.closed++;
        this.inner.close();
    }
}

describe('WaveExtractor', () => {
    it('parses the header once on open', () => {
        const log = recorder();
        const extractor = WaveExtractor.open(FIXTURE, { log });
        expect(extractor.header.version).toBe('Test bench writer 1.0');
        expect(extractor.listSignals().map(d => d.path)).toEqual(['tb/clk', 'tb/rst', 'tb/dut/count', 'tb/dut/clk']);
        expect(log.lines).toEqual([`[File] Parsed header of ${FIXTURE}: 4 signals, timescale 1ns`]);
    });

    it('samples the whole file at a coarse chunk', () => {
        const extractor = WaveExtractor.open(FIXTURE);
        const model = extractor.extract(['tb/clk', 'tb/rst', 'tb/dut/count', 'tb/dut/clk'], { window: { chunkSize: 5 } });
        expect(model.window).toEqual({ startTime: 0, endTime: 30, chunkSize: 5 });
        expect(toWaveJson(model).signal).toEqual([
            { name: 'clk', wave: '0101010' },
            { name: 'rst', wave: '1.0....' },
            { name: 'count', wave: 'x.==.=.', data: ['0', '1', '2'] },
            { name: 'clk', wave: '0101010' },
        ]);
    });

    it('samples every tick at chunk size one', () => {
        const model = WaveExtractor.open(FIXTURE).extract(['tb/dut/count']);
        const expected = 'x' + '.'.repeat(9) + '=' + '.'.repeat(4) + '=' + '.'.repeat(9) + '=' + '.'.repeat(5);
        expect(toWaveJson(model).signal[0].wave).toBe(expected);
        expect(model.sampleCount).toBe(31);
    });

    it('logs unresolved paths and a summary', () => {
        const log = recorder();
        const extractor = WaveExtractor.open(FIXTURE, { log });
        extractor.extract(['tb/clk', 'tb/dut/count', 'tb/nope'], { window: { chunkSize: 5 } });
        expect(log.lines.slice(1)).toEqual([
            '[Extract] Unresolved paths: tb/nope',
            '[Extract] 2 of 3 signals, t=0..30, chunk=5',
        ]);
    });

    it('keeps formats set on the extractor, overridden per call', () => {
        const extractor = WaveExtractor.open(FIXTURE);
        extractor.setFormat('/tb/dut/count/', 'b');
        const window = { chunkSize: 5 };
        expect(toWaveJson(extractor.extract(['tb/dut/count'], { window })).signal[0].data)
            .toEqual(['0000', '0001', '0010']);
        expect(toWaveJson(extractor.extract(['tb/dut/count'], { window, formats: { 'tb/dut/count': 'u' } })).signal[0].data)
            .toEqual(['0', '1', '2']);
    });

    it('validates formats and paths given to setFormat', () => {
        const extractor = WaveExtractor.open(FIXTURE);
        expect(() => extractor.setFormat('tb/dut/count', 'q')).toThrow("'q': Invalid format character.");
        expect(() => extractor.setFormat('tb/none', 'x')).toThrow('Signal path not found: tb/none');
    });

    it('reports a missing file', () => {
        let caught: unknown;
        try {
            WaveExtractor.open('/nonexistent/missing.vcd');
        } catch (err) {
            caught = err;
        }
        expect(isVcdError(caught, 'FILE_NOT_FOUND')).toBe(true);
    });
});

describe('extractFromSource', () => {
    it('closes the source after a successful walk', () => {
        const source = new ClosingSource('$var wire 1 ! a $end\n$enddefinitions $end\n#0\n1!');
        const model = extractFromSource(source, ['a']);
        expect(toWaveJson(model).signal).toEqual([{ name: 'a', wave: '1' }]);
        expect(source.closed).toBe(1);
    });

    it('records formats for signals named like object members', () => {
        const text = '$var wire 4 # constructor $end\n$var wire 4 % toString $end\n$enddefinitions $end\n#0\nb1010 #\nb11 %';
        const binary: DisplayFormat = 'b';
        const model = extractFromText(text, ['constructor', 'toString'], { formats: { toString: binary } });
        expect(model.formats).toEqual({ constructor: 'x', toString: 'b' });
        expect(toWaveJson(model).signal.map(row => row.data)).toEqual([['a'], ['0011']]);
    });

    it('closes the source when parsing fails', () => {
        const source = new ClosingSource('$var wire 1 ! a $end\n#0');
        expect(() => extractFromSource(source, ['a'])).toThrow('Value change before $enddefinitions');
        expect(source.closed).toBe(1);
    });
});
