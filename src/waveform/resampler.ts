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
import { VcdError } from './errors.js';
import { busCell, DEFAULT_FORMAT, DisplayFormat } from './format.js';
import { ScalarSymbol } from './lexer.js';
import {
    normalizePath,
    sameValue,
    SignalDefinition,
    SignalValue,
    unknownValue,
    VcdHeader,
} from './types.js';
import { ChangeStreamWalker } from './walker.js';

export interface SampleWindow {
    startTime: number;
    /** Omitted: run to the last time marker in the file. */
    endTime?: number;
    /** Ticks per display group. Omitted: the smallest size that keeps the grid within the sample cap. */
    chunkSize?: number;
}

export interface ResolvedWindow {
    startTime: number;
    endTime: number;
    chunkSize: number;
}

/** Default upper bound on samples per signal. */
export const MAX_SAMPLES = 10_000;

export type Sample =
    | { kind: 'level'; symbol: ScalarSymbol }
    | { kind: 'bus'; symbol: '=' | 'x' | 'z'; data?: string }
    | { kind: 'same' };

export interface SampledSignal {
    definition: SignalDefinition;
    format: DisplayFormat;
    samples: Sample[];
    /** Value held by each group, parallel to `samples` */
    values: SignalValue[];
}

export interface ResampleRequest {
    /** Output order follows this list */
    paths: readonly string[];
    window?: Partial<SampleWindow>;
    formats?: Readonly<Record<string, DisplayFormat>>;
    /** Samples per signal the grid may hold, at least 2. Defaults to MAX_SAMPLES. */
    maxSamples?: number;
}

export interface ResampleResult {
    signals: SampledSignal[];
    /** Requested paths with no matching declaration, as given */
    unresolved: string[];
    window: ResolvedWindow;
}

const REAL_KINDS = new Set(['real', 'realtime', 'shortreal']);

function scalar(bits: string): ScalarSymbol {
    switch (bits) {
        case '0': return '0';
        case '1': return '1';
        case 'z': return 'z';
        default: return 'x';
    }
}

export function isLevelSignal(def: SignalDefinition): boolean {
    return def.width === 1 && !REAL_KINDS.has(def.kind);
}

export function validateWindow(window: Partial<SampleWindow> = {}): SampleWindow {
    const startTime = window.startTime ?? 0;
    const { endTime, chunkSize } = window;
    if (!Number.isSafeInteger(startTime) || startTime < 0) {
        throw new VcdError('INVALID_WINDOW', `Start time ${startTime} must be a non-negative integer`);
    }
    if (chunkSize !== undefined && (!Number.isSafeInteger(chunkSize) || chunkSize <= 0)) {
        throw new VcdError('INVALID_WINDOW', `Chunk size ${chunkSize} must be a positive integer`);
    }
    if (endTime !== undefined) {
        if (!Number.isSafeInteger(endTime)) {
            throw new VcdError('INVALID_WINDOW', `End time ${endTime} must be an integer`);
        }
        if (startTime > endTime) {
            throw new VcdError('INVALID_WINDOW', `Start time ${startTime} is after end time ${endTime}`);
        }
    }
    return { startTime, endTime, chunkSize };
}

/** Number of display groups a resolved window produces. */
export function sampleCount(window: ResolvedWindow): number {
    return Math.floor((window.endTime - window.startTime) / window.chunkSize) + 1;
}

/**
 * Turn per-group values into samples. A cell only carries a symbol when the
 * value differs from the previous group; otherwise it continues.
 */
export function toSamples(def: SignalDefinition, values: readonly SignalValue[], fmt: DisplayFormat): Sample[] {
    const level = isLevelSignal(def);
    const samples: Sample[] = [];
    let prev: SignalValue | undefined;
    for (const value of values) {
        if (prev && sameValue(prev, value)) {
            samples.push({ kind: 'same' });
        } else if (level && value.kind === 'bits') {
            samples.push({ kind: 'level', symbol: scalar(value.bits) });
        } else {
            samples.push({ kind: 'bus', ...busCell(value, def.width, fmt) });
        }
        prev = value;
    }
    return samples;
}

interface Target {
    definition: SignalDefinition;
    format: DisplayFormat;
    values: SignalValue[];
}

function tooManySamples(needed: number | null, chunkSize: number, maxSamples: number): VcdError {
    const count = needed === null
        ? `more than ${maxSamples} samples at chunk ${chunkSize}`
        : `${needed} samples at chunk ${chunkSize}, more than the limit of ${maxSamples}`;
    return new VcdError('INVALID_WINDOW', `Window needs ${count}; raise the chunk size or narrow the window`);
}

/**
 * Sample the requested signals on a regular grid in one forward pass.
 *
 * Group k covers [start + k*chunk, start + (k+1)*chunk). A group holds the
 * value active at its start unless events fall inside it, in which case the
 * last of them wins. The walk stops at the first time marker past the end
 * time. Values are read from the walker, which must track every resolved
 * signal.
 *
 * Without a chunk size the grid starts at one tick per group and doubles
 * whenever it would outgrow `maxSamples`, merging pairs of groups.
 */
export function resample(header: VcdHeader, walker: ChangeStreamWalker, request: ResampleRequest): ResampleResult {
    if (request.paths.length === 0) {
        throw new VcdError('NO_SIGNALS_REQUESTED', 'No signal paths requested');
    }
    const window = validateWindow(request.window);
    const maxSamples = request.maxSamples ?? MAX_SAMPLES;
    if (!Number.isSafeInteger(maxSamples) || maxSamples < 2) {
        throw new VcdError('INVALID_WINDOW', `Sample limit ${maxSamples} must be an integer of at least 2`);
    }

    const targets: Target[] = [];
    const unresolved: string[] = [];
    for (const requested of request.paths) {
        const path = normalizePath(requested);
        const definition = header.byPath.get(path);
        if (!definition) {
            unresolved.push(requested);
            continue;
        }
        if (definition.width <= 0) {
            throw new VcdError('INVALID_WIDTH', `Signal '${path}' has width ${definition.width}`);
        }
        if (walker.valueOf(definition.code) === undefined) {
            throw new Error(`Walker does not track '${definition.code}' for '${path}'`);
        }
        targets.push({ definition, format: formatFor(request.formats, path, requested), values: [] });
    }

    const { startTime, endTime } = window;
    const span = endTime === undefined ? undefined : endTime - startTime;
    let chunkSize = window.chunkSize ?? 1;
    const adaptive = window.chunkSize === undefined && span === undefined;
    if (span !== undefined) {
        if (window.chunkSize === undefined) {
            chunkSize = Math.max(1, Math.ceil(span / (maxSamples - 1)));
        } else if (Math.floor(span / chunkSize) + 1 > maxSamples) {
            throw tooManySamples(Math.floor(span / chunkSize) + 1, chunkSize, maxSamples);
        }
    }
    // Pairs merge cleanly only from an even count
    const mergeAt = maxSamples - (maxSamples % 2);

    let group = 0;
    const groupEnd = () => startTime + (group + 1) * chunkSize;
    const lastGroup = (end: number) => Math.floor((end - startTime) / chunkSize);

    const closeGroup = () => {
        if (group >= maxSamples || (adaptive && group >= mergeAt)) {
            if (!adaptive) { throw tooManySamples(null, chunkSize, maxSamples); }
            for (const t of targets) {
                t.values = t.values.filter((_, i) => i % 2 === 1);
            }
            group /= 2;
            chunkSize *= 2;
            return;
        }
        for (const t of targets) {
            t.values.push(walker.valueOf(t.definition.code) ?? unknownValue(t.definition.width));
        }
        group++;
    };

    let end = startTime;
    if (targets.length > 0) {
        if (endTime !== undefined) {
            const last = lastGroup(endTime);
            while (group <= last) {
                walker.advanceTo(Math.min(groupEnd(), endTime + 1));
                closeGroup();
            }
            end = endTime;
        } else {
            while (walker.advanceTo(groupEnd())) { closeGroup(); }
            end = Math.max(walker.time, startTime);
            while (group <= lastGroup(end)) { closeGroup(); }
        }
    } else {
        end = endTime ?? startTime;
    }

    return {
        signals: targets.map(t => ({
            definition: t.definition,
            format: t.format,
            samples: toSamples(t.definition, t.values, t.format),
            values: t.values,
        })),
        unresolved,
        window: { startTime, endTime: end, chunkSize },
    };
}

function formatFor(
    formats: Readonly<Record<string, DisplayFormat>> | undefined,
    path: string,
    requested: string,
): DisplayFormat {
    if (formats && Object.hasOwn(formats, path)) { return formats[path]; }
    if (formats && Object.hasOwn(formats, requested)) { return formats[requested]; }
    return DEFAULT_FORMAT;
}
