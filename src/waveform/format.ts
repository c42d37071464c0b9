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
import { SignalValue } from './types.js';

/** b = binary, d = signed decimal, u = unsigned decimal, x/X = hex */
export const DISPLAY_FORMATS = ['b', 'd', 'u', 'x', 'X'] as const;

export type DisplayFormat = typeof DISPLAY_FORMATS[number];

export const DEFAULT_FORMAT: DisplayFormat = 'x';

export function isDisplayFormat(value: string): value is DisplayFormat {
    return DISPLAY_FORMATS.some(f => f === value);
}

export function isBinary(bits: string): boolean {
    return /^[01]+$/.test(bits);
}

/** Format a fully binary vector. Widths beyond 53 bits go through BigInt. */
export function formatBits(bits: string, width: number, fmt: DisplayFormat = DEFAULT_FORMAT): string {
    if (!isBinary(bits)) {
        throw new Error(`Cannot format non-binary value '${bits}'`);
    }
    const padded = bits.padStart(width, '0');
    if (fmt === 'b') { return padded; }

    let n = BigInt(`0b${padded}`);
    switch (fmt) {
        case 'u':
            return n.toString(10);
        case 'd':
            if (padded[0] === '1') { n -= 1n << BigInt(width); }
            return n.toString(10);
        case 'X':
            return n.toString(16).toUpperCase().padStart(Math.ceil(width / 4), '0');
        case 'x':
            return n.toString(16).padStart(Math.ceil(width / 4), '0');
    }
}

export function formatReal(real: number): string {
    return String(real);
}

/**
 * Symbol and annotation for a bus cell: '=' with formatted data for known
 * values, 'z' for a fully floating bus, 'x' for anything else.
 */
export function busCell(value: SignalValue, width: number, fmt: DisplayFormat): { symbol: '=' | 'x' | 'z'; data?: string } {
    if (value.kind === 'real') {
        return { symbol: '=', data: formatReal(value.real) };
    }
    if (isBinary(value.bits)) {
        return { symbol: '=', data: formatBits(value.bits, width, fmt) };
    }
    if (/^z+$/.test(value.bits)) {
        return { symbol: 'z' };
    }
    return { symbol: 'x' };
}
