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
import { ExtractionConfig, windowFrom } from '../config.js';
import { LogChannel, silentLog } from '../log.js';
import { WaveExtractor } from '../waveform/extractor.js';
import { DisplayFormat, formatBits, isBinary } from '../waveform/format.js';
import { serializeWaveJson } from '../waveform/model.js';
import { normalizePath, SignalValue } from '../waveform/types.js';

export interface ExtractWaveArgs {
    signals: string[];
    start_time?: number;
    end_time?: number;
    chunk_size?: number;
    formats?: Record<string, DisplayFormat>;
    full_paths?: boolean;
}

const NOT_LOADED = 'No waveform loaded. Call load_waveform first.';

function describeValue(value: SignalValue, width: number, fmt: DisplayFormat): string {
    if (value.kind === 'real') { return String(value.real); }
    if (width === 1 || !isBinary(value.bits)) { return value.bits; }
    return `${value.bits} (${formatBits(value.bits, width, fmt)})`;
}

/** State behind the MCP tools: at most one loaded waveform at a time. */
export class WaveformSession {
    private extractor: WaveExtractor | null = null;
    private readonly config: ExtractionConfig;
    private readonly log: LogChannel;

    constructor(config: ExtractionConfig, log: LogChannel = silentLog) {
        this.config = config;
        this.log = log;
    }

    get loaded(): boolean {
        return this.extractor !== null;
    }

    load(filePath: string): string {
        const extractor = WaveExtractor.open(filePath, { log: this.log });
        this.extractor = extractor;
        const { timescale, definitions } = extractor.header;
        return (
            `Loaded ${filePath}\n` +
            `  Signals: ${definitions.length}\n` +
            `  Timescale: ${timescale.magnitude}${timescale.unit}`
        );
    }

    listSignals(): string {
        if (!this.extractor) { return NOT_LOADED; }
        const signals = this.extractor.listSignals().map(d => ({
            path: d.path,
            kind: d.kind,
            width: d.width,
            code: d.code,
        }));
        return JSON.stringify(signals, null, 2);
    }

    extractWave(args: ExtractWaveArgs): string {
        if (!this.extractor) { return NOT_LOADED; }
        const formats = new Map<string, DisplayFormat>();
        for (const p of args.signals) { formats.set(normalizePath(p), this.config.format); }
        for (const [p, fmt] of Object.entries(args.formats ?? {})) { formats.set(normalizePath(p), fmt); }

        const model = this.extractor.extract(args.signals, {
            window: windowFrom(this.config, {
                startTime: args.start_time,
                endTime: args.end_time,
                chunkSize: args.chunk_size,
            }),
            formats: Object.fromEntries(formats),
            maxSamples: this.config.maxSamples,
        });

        const { startTime, endTime, chunkSize } = model.window;
        const lines = [
            `Extracted ${model.signals.length} of ${args.signals.length} signals, ` +
            `t=${startTime}..${endTime}, chunk=${chunkSize}, samples=${model.sampleCount}`,
        ];
        if (model.unresolved.length > 0) {
            lines.push(`Unresolved: ${model.unresolved.join(', ')}`);
        }
        lines.push(serializeWaveJson(model, { fullPaths: args.full_paths }));
        return lines.join('\n');
    }

    valueAt(signalPath: string, time: number): string {
        if (!this.extractor) { return NOT_LOADED; }
        const model = this.extractor.extract([signalPath], {
            window: { startTime: time, endTime: time, chunkSize: 1 },
        });
        const sampled = model.signals[0];
        if (!sampled) { return `Signal not found: ${signalPath}`; }
        const value = describeValue(sampled.values[0], sampled.definition.width, sampled.format);
        return `"${sampled.definition.path}" at t=${time}: ${value}`;
    }
}
