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
import { VcdLexer } from './lexer.js';
import { SignalValue, unknownValue, ValueChangeEvent, VcdHeader } from './types.js';

export interface WalkerOptions {
    /** Codes whose current value should be kept. Defaults to every declared code. */
    track?: Iterable<string>;
    /** Checked at every time marker. */
    signal?: AbortSignal;
}

const REAL_NUMBER = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const REAL_SPECIAL = /^([-+]?inf(inity)?|nan)$/i;

/**
 * Widen a vector to its declared width: a leading x or z is repeated,
 * anything else is extended with zeros.
 */
export function extendBits(bits: string, width: number): string {
    if (bits.length >= width) { return bits; }
    const lead = bits[0];
    return bits.padStart(width, lead === 'x' || lead === 'z' ? lead : '0');
}

export function parseRealValue(text: string, loc?: SourceLocation): number {
    if (REAL_NUMBER.test(text)) { return Number(text); }
    if (REAL_SPECIAL.test(text)) {
        const lower = text.toLowerCase();
        if (lower === 'nan') { return NaN; }
        return lower.startsWith('-') ? -Infinity : Infinity;
    }
    throw new VcdError('INVALID_VALUE_SYMBOL', `Invalid real value '${text}'`, loc);
}

/**
 * Pull-based walk over the value-change section. Each `next()` call advances
 * the lexer just far enough to produce one event, so the caller decides how
 * much of the file is read. `advanceTo` moves the tracked state up to a time
 * without handing back the events.
 */
export class ChangeStreamWalker {
    private readonly lexer: VcdLexer;
    private readonly header: VcdHeader;
    private readonly state = new Map<string, SignalValue>();
    private readonly signal?: AbortSignal;
    private currentTime = 0;
    // Time marker read but not yet entered
    private held: number | null = null;
    private finished = false;

    constructor(lexer: VcdLexer, header: VcdHeader, options: WalkerOptions = {}) {
        this.lexer = lexer;
        this.header = header;
        this.signal = options.signal;
        const codes = options.track ?? header.byCode.keys();
        for (const code of codes) {
            const aliases = header.byCode.get(code);
            if (!aliases || aliases.length === 0) {
                throw new VcdError('UNKNOWN_IDENTIFIER', `Cannot track undeclared code '${code}'`);
            }
            this.state.set(code, unknownValue(aliases[0].width));
        }
    }

    /** Time of the most recently entered `#` marker. */
    get time(): number {
        return this.currentTime;
    }

    /** Current value of a tracked code, or undefined if the code is not tracked. */
    valueOf(code: string): SignalValue | undefined {
        return this.state.get(code);
    }

    next(): ValueChangeEvent | null {
        for (;;) {
            const step = this.step(Number.POSITIVE_INFINITY);
            if (step !== 'held') { return step; }
        }
    }

    /**
     * Apply every change stamped before `limit`, stopping at the first time
     * marker at or after it. Returns false once the input is exhausted.
     */
    advanceTo(limit: number): boolean {
        for (;;) {
            const step = this.step(limit);
            if (step === null) { return false; }
            if (step === 'held') { return true; }
        }
    }

    private enter(time: number): void {
        this.currentTime = time;
        this.signal?.throwIfAborted();
    }

    private step(limit: number): ValueChangeEvent | 'held' | null {
        if (this.held !== null) {
            if (this.held >= limit) { return 'held'; }
            this.enter(this.held);
            this.held = null;
        }
        while (!this.finished) {
            const tok = this.lexer.next();
            switch (tok.kind) {
                case 'EndOfInput':
                    this.finished = true;
                    return null;

                case 'TimeMarker':
                    if (tok.time < this.currentTime) {
                        throw new VcdError(
                            'MALFORMED_SYNTAX',
                            `Time #${tok.time} goes backwards from #${this.currentTime}`,
                            tok.loc,
                        );
                    }
                    if (tok.time >= limit) {
                        this.held = tok.time;
                        return 'held';
                    }
                    this.enter(tok.time);
                    break;

                case 'CommandStart':
                    if (tok.keyword === 'enddefinitions' || tok.keyword === 'scope' || tok.keyword === 'var') {
                        throw new VcdError('MALFORMED_SYNTAX', `$${tok.keyword} after $enddefinitions`, tok.loc);
                    }
                    break;

                case 'CommandEnd':
                case 'Identifier':
                    // $dumpvars framing and $comment text
                    break;

                case 'ScalarValueChange': {
                    const width = this.widthAt(tok.code, tok.loc);
                    const bits = width === 1 ? tok.value : extendBits(tok.value, width);
                    return this.emit(tok.code, { kind: 'bits', bits });
                }

                case 'VectorValueChange': {
                    const width = this.widthAt(tok.code, tok.loc);
                    const bits = tok.bits.toLowerCase();
                    if (!/^[01xz]+$/.test(bits)) {
                        throw new VcdError('INVALID_VALUE_SYMBOL', `Invalid bits 'b${tok.bits}' for '${tok.code}'`, tok.loc);
                    }
                    if (bits.length > width) {
                        throw new VcdError(
                            'INVALID_WIDTH',
                            `Value 'b${tok.bits}' has ${bits.length} bits, '${tok.code}' is declared ${width}`,
                            tok.loc,
                        );
                    }
                    return this.emit(tok.code, { kind: 'bits', bits: extendBits(bits, width) });
                }

                case 'RealValueChange':
                    this.widthAt(tok.code, tok.loc);
                    return this.emit(tok.code, { kind: 'real', real: parseRealValue(tok.text, tok.loc) });
            }
        }
        return null;
    }

    private emit(code: string, value: SignalValue): ValueChangeEvent {
        if (this.state.has(code)) {
            this.state.set(code, value);
        }
        return { time: this.currentTime, code, value };
    }

    private widthAt(code: string, loc: SourceLocation): number {
        const aliases = this.header.byCode.get(code);
        if (!aliases || aliases.length === 0) {
            throw new VcdError('UNKNOWN_IDENTIFIER', `Unknown identifier code '${code}'`, loc);
        }
        return aliases[0].width;
    }
}
