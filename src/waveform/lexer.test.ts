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
import { VcdError } from './errors.js';
import { Token, VcdLexer } from './lexer.js';
import { TextLineSource } from './source.js';

function lex(text: string): Token[] {
    const lexer = new VcdLexer(new TextLineSource(text));
    const tokens: Token[] = [];
    for (;;) {
        const tok = lexer.next();
        tokens.push(tok);
        if (tok.kind === 'EndOfInput') { return tokens; }
    }
}

function lexError(text: string): VcdError {
    try {
        lex(text);
    } catch (err) {
        if (err instanceof VcdError) { return err; }
        throw err;
    }
    throw new Error('expected the lexer to fail');
}

const SAMPLE = [
    '$timescale 10 ps $end',
    '$var wire 1 # a $end',
    '$enddefinitions $end',
    '#0',
    '1#',
    'b101 #',
    'r1.5 #',
].join('\n');

describe('VcdLexer', () => {
    it('classifies header words and value changes', () => {
        expect(lex(SAMPLE).map(t => t.kind)).toEqual([
            'CommandStart', 'Identifier', 'Identifier', 'CommandEnd',
            'CommandStart', 'Identifier', 'Identifier', 'Identifier', 'Identifier', 'CommandEnd',
            'CommandStart', 'CommandEnd',
            'TimeMarker',
            'ScalarValueChange',
            'VectorValueChange',
            'RealValueChange',
            'EndOfInput',
        ]);
    });

    it('treats # as an identifier code after a value and as a time marker at the start of a word', () => {
        const tokens = lex(SAMPLE);
        expect(tokens[12]).toEqual({ kind: 'TimeMarker', time: 0, loc: { line: 4, offset: 64 } });
        expect(tokens[13]).toEqual({ kind: 'ScalarValueChange', value: '1', code: '#', loc: { line: 5, offset: 67 } });
        expect(tokens[14]).toEqual({ kind: 'VectorValueChange', bits: '101', code: '#', loc: { line: 6, offset: 70 } });
        expect(tokens[15]).toEqual({ kind: 'RealValueChange', text: '1.5', code: '#', loc: { line: 7, offset: 77 } });
    });

    it('reads a $var body as plain words', () => {
        const tokens = lex(SAMPLE).slice(4, 10);
        expect(tokens[0]).toMatchObject({ kind: 'CommandStart', keyword: 'var' });
        expect(tokens.slice(1, 5).map(t => (t.kind === 'Identifier' ? t.text : t.kind))).toEqual(['wire', '1', '#', 'a']);
    });

    it('lower-cases scalar symbols', () => {
        const tokens = lex('X!\nZ"');
        expect(tokens[0]).toMatchObject({ value: 'x', code: '!' });
        expect(tokens[1]).toMatchObject({ value: 'z', code: '"' });
    });

    it('lexes $dumpvars bodies as value changes', () => {
        expect(lex('$dumpvars\n0!\nbx "\n$end').map(t => t.kind)).toEqual([
            'CommandStart', 'ScalarValueChange', 'VectorValueChange', 'CommandEnd', 'EndOfInput',
        ]);
    });

    it('accepts identifier codes that start with $ inside declarations', () => {
        const words = lex('$var wire 1 $ clk $end').filter(t => t.kind === 'Identifier');
        expect(words.map(t => (t.kind === 'Identifier' ? t.text : ''))).toEqual(['wire', '1', '$', 'clk']);
    });

    it('reports byte offsets past multi-byte characters', () => {
        const tokens = lex('$comment é $end\n#1');
        expect(tokens[2]).toEqual({ kind: 'CommandEnd', loc: { line: 1, offset: 12 } });
        expect(tokens[3]).toEqual({ kind: 'TimeMarker', time: 1, loc: { line: 2, offset: 17 } });
    });

    it('rejects an unterminated $scope with the position of the command', () => {
        const err = lexError('$scope module top\n$var wire 1 ! a $end');
        expect(err.code).toBe('MALFORMED_SYNTAX');
        expect(err.location).toEqual({ line: 1, offset: 0 });
        expect(err.message).toBe('Unterminated $scope command before $var (line 1, byte 0)');
    });

    it('rejects a command left open at end of input', () => {
        expect(lexError('$comment hello').message).toBe('Unterminated $comment command (line 1, byte 0)');
    });

    it('rejects malformed value-change words', () => {
        expect(lexError('$end').message).toBe('$end without an open command (line 1, byte 0)');
        expect(lexError('#12a').message).toBe("Invalid time marker '#12a' (line 1, byte 0)");
        expect(lexError('b101').message).toBe("Value 'b101' is missing its identifier code (line 1, byte 0)");
        expect(lexError('#0\nq!').message).toBe("Unexpected token 'q!' (line 2, byte 3)");
        expect(lexError('$dumpvars\n#5\n$end').code).toBe('MALFORMED_SYNTAX');
    });
});
