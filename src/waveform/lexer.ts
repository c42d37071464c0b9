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
import { SourceLocation, VcdError } from './errors.js';
import { LineSource, SourceLine } from './source.js';

export type ScalarSymbol = '0' | '1' | 'x' | 'z';

export type Token =
    | { kind: 'CommandStart'; keyword: string; loc: SourceLocation }
    | { kind: 'CommandEnd'; loc: SourceLocation }
    | { kind: 'Identifier'; text: string; loc: SourceLocation }
    | { kind: 'TimeMarker'; time: number; loc: SourceLocation }
    | { kind: 'ScalarValueChange'; value: ScalarSymbol; code: string; loc: SourceLocation }
    | { kind: 'VectorValueChange'; bits: string; code: string; loc: SourceLocation }
    | { kind: 'RealValueChange'; text: string; code: string; loc: SourceLocation }
    | { kind: 'EndOfInput'; loc: SourceLocation };

interface Word {
    text: string;
    loc: SourceLocation;
}

// Commands whose bodies are value changes rather than words
const DUMP_COMMANDS = new Set(['dumpvars', 'dumpall', 'dumpon', 'dumpoff']);

// Commands whose bodies can never contain another keyword; hitting one means a missing $end
const STRICT_COMMANDS = new Set(['scope', 'upscope', 'var', 'timescale', 'enddefinitions', ...DUMP_COMMANDS]);

// Identifier codes may themselves start with '$', so only these words open or close commands
const KEYWORDS = new Set([
    '$end', '$comment', '$date', '$version', '$timescale', '$scope', '$upscope', '$var',
    '$enddefinitions', '$dumpvars', '$dumpall', '$dumpon', '$dumpoff',
]);

const ASCII_ONLY = /^[\x00-\x7f]*$/;

function scalarSymbol(ch: string): ScalarSymbol | null {
    switch (ch) {
        case '0': return '0';
        case '1': return '1';
        case 'x': case 'X': return 'x';
        case 'z': case 'Z': return 'z';
        default: return null;
    }
}

/**
 * Splits a VCD line stream into tokens. Single forward cursor: a lexer cannot
 * be rewound, build a new one over a new source instead.
 */
export class VcdLexer {
    private readonly source: LineSource;
    private line: SourceLine | null = null;
    private lineAscii = true;
    private readonly wordPattern = /\S+/g;
    private command: { keyword: string; loc: SourceLocation } | null = null;
    private lastLoc: SourceLocation = { line: 0, offset: 0 };

    constructor(source: LineSource) {
        this.source = source;
    }

    /** Keyword of the command currently open, if any. */
    get openCommand(): string | null {
        return this.command?.keyword ?? null;
    }

    next(): Token {
        const word = this.nextWord();
        if (!word) {
            if (this.command) {
                throw new VcdError(
                    'MALFORMED_SYNTAX',
                    `Unterminated $${this.command.keyword} command`,
                    this.command.loc,
                );
            }
            return { kind: 'EndOfInput', loc: this.lastLoc };
        }

        const { text, loc } = word;

        if (text[0] === '$' && (KEYWORDS.has(text) || !this.command)) {
            return this.lexCommandWord(text, loc);
        }

        if (this.command && !DUMP_COMMANDS.has(this.command.keyword)) {
            return { kind: 'Identifier', text, loc };
        }

        return this.lexValueChange(text, loc);
    }

    private lexCommandWord(text: string, loc: SourceLocation): Token {
        if (text === '$end') {
            if (!this.command) {
                throw new VcdError('MALFORMED_SYNTAX', '$end without an open command', loc);
            }
            this.command = null;
            return { kind: 'CommandEnd', loc };
        }
        if (this.command) {
            if (STRICT_COMMANDS.has(this.command.keyword)) {
                throw new VcdError(
                    'MALFORMED_SYNTAX',
                    `Unterminated $${this.command.keyword} command before ${text}`,
                    this.command.loc,
                );
            }
            return { kind: 'Identifier', text, loc };
        }
        const keyword = text.slice(1);
        if (!keyword) {
            throw new VcdError('MALFORMED_SYNTAX', 'Empty command keyword', loc);
        }
        this.command = { keyword, loc };
        return { kind: 'CommandStart', keyword, loc };
    }

    private lexValueChange(text: string, loc: SourceLocation): Token {
        const lead = text[0];

        if (lead === '#') {
            if (this.command) {
                throw new VcdError('MALFORMED_SYNTAX', `Time marker inside $${this.command.keyword}`, loc);
            }
            const digits = text.slice(1);
            const time = Number(digits);
            if (!/^\d+$/.test(digits) || !Number.isSafeInteger(time)) {
                throw new VcdError('MALFORMED_SYNTAX', `Invalid time marker '${text}'`, loc);
            }
            return { kind: 'TimeMarker', time, loc };
        }

        if (lead === 'b' || lead === 'B' || lead === 'r' || lead === 'R') {
            const value = text.slice(1);
            const code = this.nextWord();
            if (!value || !code || KEYWORDS.has(code.text)) {
                throw new VcdError('MALFORMED_SYNTAX', `Value '${text}' is missing its identifier code`, loc);
            }
            return lead === 'b' || lead === 'B'
                ? { kind: 'VectorValueChange', bits: value, code: code.text, loc }
                : { kind: 'RealValueChange', text: value, code: code.text, loc };
        }

        const symbol = scalarSymbol(lead);
        if (symbol) {
            const code = text.slice(1);
            if (!code) {
                throw new VcdError('MALFORMED_SYNTAX', `Scalar value '${text}' is missing its identifier code`, loc);
            }
            return { kind: 'ScalarValueChange', value: symbol, code, loc };
        }

        throw new VcdError('MALFORMED_SYNTAX', `Unexpected token '${text}'`, loc);
    }

    private nextWord(): Word | null {
        for (;;) {
            if (this.line) {
                const m = this.wordPattern.exec(this.line.text);
                if (m) {
                    const prefix = this.lineAscii
                        ? m.index
                        : Buffer.byteLength(this.line.text.slice(0, m.index), 'utf8');
                    const loc = { line: this.line.line, offset: this.line.offset + prefix };
                    this.lastLoc = loc;
                    return { text: m[0], loc };
                }
            }
            const line = this.source.nextLine();
            if (!line) {
                this.line = null;
                return null;
            }
            this.line = line;
            this.lineAscii = ASCII_ONLY.test(line.text);
            this.wordPattern.lastIndex = 0;
        }
    }
}
