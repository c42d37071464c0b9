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
import { DisplayFormat } from './format.js';
import { isLevelSignal, ResampleResult, ResolvedWindow, Sample, SampledSignal } from './resampler.js';
import { sameValue, Timescale } from './types.js';

export interface WaveModel {
    readonly signals: readonly SampledSignal[];
    readonly unresolved: readonly string[];
    readonly window: ResolvedWindow;
    readonly sampleCount: number;
    /** Display format used for each multi-bit signal, keyed by path */
    readonly formats: Readonly<Record<string, DisplayFormat>>;
    readonly timescale: Timescale;
}

export interface WaveJsonSignal {
    name: string;
    wave: string;
    data?: string[];
}

export interface WaveJson {
    signal: WaveJsonSignal[];
    head: { tock: number };
}

// Matches the resampler's group-level dedup, so sample counts never change.
function collapseRepeats(signal: SampledSignal): SampledSignal {
    const samples = signal.samples.map((sample, i): Sample =>
        sample.kind === 'bus' && i > 0 && sameValue(signal.values[i - 1], signal.values[i])
            ? { kind: 'same' }
            : sample,
    );
    return { ...signal, samples };
}

/**
 * Assemble resampled signals into the exported model. Every signal must
 * carry the same number of samples, since rows are drawn side by side.
 */
export function buildWaveModel(result: ResampleResult, timescale: Timescale): WaveModel {
    const count = result.signals.length > 0 ? result.signals[0].samples.length : 0;
    for (const s of result.signals) {
        if (s.samples.length !== count || s.values.length !== count) {
            throw new Error(
                `Sample count mismatch: '${s.definition.path}' has ${s.samples.length}, expected ${count}`,
            );
        }
    }
    const signals = result.signals.map(collapseRepeats);

    const formats: Record<string, DisplayFormat> = Object.fromEntries(
        signals
            .filter(s => !isLevelSignal(s.definition))
            .map((s): [string, DisplayFormat] => [s.definition.path, s.format]),
    );

    return Object.freeze({
        signals: Object.freeze(signals),
        unresolved: Object.freeze([...result.unresolved]),
        window: Object.freeze({ ...result.window }),
        sampleCount: count,
        formats: Object.freeze(formats),
        timescale,
    });
}

export function waveString(samples: readonly Sample[]): string {
    let wave = '';
    for (const s of samples) {
        wave += s.kind === 'same' ? '.' : s.symbol;
    }
    return wave;
}

/** WaveDrom document for the model. Rows are named by leaf name unless `fullPaths` is set. */
export function toWaveJson(model: WaveModel, options: { fullPaths?: boolean } = {}): WaveJson {
    const signal = model.signals.map((s): WaveJsonSignal => {
        const row: WaveJsonSignal = {
            name: options.fullPaths ? s.definition.path : s.definition.name,
            wave: waveString(s.samples),
        };
        if (!isLevelSignal(s.definition)) {
            row.data = s.samples.flatMap(c => (c.kind === 'bus' && c.data !== undefined ? [c.data] : []));
        }
        return row;
    });
    return { signal, head: { tock: 1 } };
}

export function serializeWaveJson(model: WaveModel, options: { fullPaths?: boolean } = {}): string {
    return JSON.stringify(toWaveJson(model, options), null, 2);
}
