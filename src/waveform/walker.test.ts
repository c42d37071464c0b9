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
import { describe, expect, it } from 'vitest';
import { parseHeader } from './declarations.js';
import { VcdError } from './errors.js';
import { VcdLexer } from './lexer.js';
import { TextLineSource } from './source.js';
import { ValueChangeEvent } from './types.js';
import { ChangeStreamWalker, extendBits, parseRealValue, WalkerOptions } from './walker.js';

const HEADER = [
    '$var wire 4 # bus $end',
    '$var wire 1 ! a $end',
    '$var real 64 % r $end',
    '$enddefinitions $end',
].join('\n');

function walker(body: string, options?: WalkerOptions): ChangeStreamWalker {
    const lexer = new VcdLexer(new TextLineSource(`${HEADER}\n${body}`));
    return new ChangeStreamWalker(lexer, parseHeader(lexer), options);
}

function events(w: ChangeStreamWalker): ValueChangeEvent[] {
    const out: ValueChangeEvent[] = [];
    for (let ev = w.next(); ev; ev = w.next()) { out.push(ev); }
    return out;
}

function walkError(body: string): VcdError {
    try {
        events(walker(body));
    } catch (err) {
        if (err instanceof VcdError) { return err; }
        throw err;
    }
    throw new Error('expected the walk to fail');
}

describe('ChangeStreamWalker', () => {
    it('stamps every change with the current time', () => {
        const w = walker('#0\nb101 #\nx!\n#3\nbx #\nbz1 #\nr2.5 %');
        expect(events(w)).toEqual([
            { time: 0, code: '#', value: { kind: 'bits', bits: '0101' } },
            { time: 0, code: '!', value: { kind: 'bits', bits: 'x' } },
            { time: 3, code: '#', value: { kind: 'bits', bits: 'xxxx' } },
            { time: 3, code: '#', value: { kind: 'bits', bits: 'zzz1' } },
            { time: 3, code: '%', value: { kind: 'real', real: 2.5 } },
        ]);
        expect(w.time).toBe(3);
        expect(w.next()).toBeNull();
    });

    it('widens scalar changes on vectors and lower-cases vector bits', () => {
        const w = walker('#0\n1#\n#1\nz#\n#2\nB1X #');
        expect(events(w).map(e => e.value)).toEqual([
            { kind: 'bits', bits: '0001' },
            { kind: 'bits', bits: 'zzzz' },
            { kind: 'bits', bits: '001x' },
        ]);
    });

    it('reads changes inside $dumpvars and skips comments', () => {
        const w = walker('$dumpvars\n0!\nb0 #\n$end\n$comment checkpoint $end\n#4\n1!');
        expect(events(w).map(e => [e.time, e.code])).toEqual([[0, '!'], [0, '#'], [4, '!']]);
    });

    it('only keeps state for tracked codes', () => {
        const w = walker('#0\n1!\nb11 #', { track: ['!'] });
        expect(w.valueOf('!')).toEqual({ kind: 'bits', bits: 'x' });
        events(w);
        expect(w.valueOf('!')).toEqual({ kind: 'bits', bits: '1' });
        expect(w.valueOf('#')).toBeUndefined();
    });

    it('keeps state for every code when no tracking set is given', () => {
        const w = walker('#0\nb11 #');
        events(w);
        expect(w.valueOf('#')).toEqual({ kind: 'bits', bits: '0011' });
        expect(w.valueOf('%')).toEqual({ kind: 'bits', bits: 'x'.repeat(64) });
    });

    it('refuses to track undeclared codes', () => {
        expect(() => walker('', { track: ['?'] })).toThrow("Cannot track undeclared code '?'");
    });

    it('fails on unknown identifier codes', () => {
        const err = walkError('#0\n1?');
        expect(err.code).toBe('UNKNOWN_IDENTIFIER');
        expect(err.location?.line).toBe(6);
    });

    it('fails on bad symbols, oversized vectors and bad reals', () => {
        expect(walkError('#0\nb102 #').code).toBe('INVALID_VALUE_SYMBOL');
        expect(walkError('#0\nb10101 #').code).toBe('INVALID_WIDTH');
        expect(walkError('#0\nrabc %').code).toBe('INVALID_VALUE_SYMBOL');
    });

    it('fails when time goes backwards', () => {
        expect(walkError('#5\n1!\n#3\n0!').message).toBe('Time #3 goes backwards from #5 (line 7, byte 93)');
    });

    it('fails on declarations after $enddefinitions', () => {
        expect(walkError('#0\n$var wire 1 & late $end').code).toBe('MALFORMED_SYNTAX');
    });

    it('advances tracked state up to a time without passing it', () => {
        const w = walker('#0\n1!\n#5\n0!\n#9\n1!', { track: ['!'] });
        expect(w.advanceTo(5)).toBe(true);
        expect(w.time).toBe(0);
        expect(w.valueOf('!')).toEqual({ kind: 'bits', bits: '1' });
        expect(w.advanceTo(5)).toBe(true);
        expect(w.time).toBe(0);
        expect(w.advanceTo(10)).toBe(false);
        expect(w.time).toBe(9);
        expect(w.valueOf('!')).toEqual({ kind: 'bits', bits: '1' });
    });

    it('hands back changes at a held time marker on the next pull', () => {
        const w = walker('#0\n1!\n#5\n0!');
        expect(w.advanceTo(3)).toBe(true);
        expect(w.next()).toEqual({ time: 5, code: '!', value: { kind: 'bits', bits: '0' } });
        expect(w.next()).toBeNull();
    });

    it('stops at the next time marker once aborted', () => {
        const controller = new AbortController();
        const w = walker('#0\n1!\n#1\n0!', { signal: controller.signal });
        expect(w.next()?.time).toBe(0);
        controller.abort(new Error('cancelled'));
        expect(() => w.next()).toThrow('cancelled');
    });
});

describe('extendBits', () => {
    it('pads with zeros, or repeats a leading x or z', () => {
        expect(extendBits('101', 4)).toBe('0101');
        expect(extendBits('x1', 4)).toBe('xxx1');
        expect(extendBits('z', 3)).toBe('zzz');
        expect(extendBits('1100', 4)).toBe('1100');
    });
});

describe('parseRealValue', () => {
    it('parses decimal, exponent and special forms', () => {
        expect(parseRealValue('-1.25e2')).toBe(-125);
        expect(parseRealValue('.5')).toBe(0.5);
        expect(parseRealValue('-inf')).toBe(-Infinity);
        expect(parseRealValue('NaN')).toBeNaN();
    });
});
