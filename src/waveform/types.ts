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

export const VAR_KINDS = [
    // IEEE 1364
    'event', 'integer', 'parameter', 'real', 'realtime', 'reg', 'supply0', 'supply1', 'time',
    'tri', 'triand', 'trior', 'trireg', 'tri0', 'tri1', 'wand', 'wire', 'wor',
    // SystemVerilog writers
    'logic', 'bit', 'int', 'shortint', 'longint', 'byte', 'shortreal',
] as const;

export type VarKind = typeof VAR_KINDS[number];

export const PATH_SEPARATOR = '/';

export interface SignalDefinition {
    /** Scope names followed by the leaf name, e.g. "tb/dut/counter" */
    path: string;
    name: string;
    /** Identifier code used by value changes; may be shared by aliases */
    code: string;
    width: number;
    kind: VarKind;
    /** Bit range as written after the name, e.g. "[7:0]" */
    range?: string;
}

export type TimeUnit = 's' | 'ms' | 'us' | 'ns' | 'ps' | 'fs';

export interface Timescale {
    magnitude: 1 | 10 | 100;
    unit: TimeUnit;
}

/** Declaration-time tree node; carries no parent link. */
export interface ScopeNode {
    name: string;
    type: string;
    children: ScopeNode[];
    signals: SignalDefinition[];
}

export interface VcdHeader {
    date: string;
    version: string;
    comment: string;
    timescale: Timescale;
    root: ScopeNode;
    /** Declaration order */
    definitions: SignalDefinition[];
    byCode: ReadonlyMap<string, readonly SignalDefinition[]>;
    byPath: ReadonlyMap<string, SignalDefinition>;
}

/** Bits are most-significant first over {0, 1, x, z}; reals stay numeric. */
export type SignalValue =
    | { kind: 'bits'; bits: string }
    | { kind: 'real'; real: number };

export interface ValueChangeEvent {
    time: number;
    code: string;
    value: SignalValue;
}

export function unknownValue(width: number): SignalValue {
    return { kind: 'bits', bits: 'x'.repeat(width) };
}

export function sameValue(a: SignalValue, b: SignalValue): boolean {
    if (a.kind === 'bits') { return b.kind === 'bits' && a.bits === b.bits; }
    if (b.kind !== 'real') { return false; }
    return a.real === b.real || (Number.isNaN(a.real) && Number.isNaN(b.real));
}

/** Strip the leading/trailing separators callers tend to include. */
export function normalizePath(path: string): string {
    return path.trim().replace(/^\/+|\/+$/g, '');
}
