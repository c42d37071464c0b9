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
import { LogChannel, silentLog } from '../log.js';
import { parseHeader } from './declarations.js';
import { DisplayFormat, isDisplayFormat } from './format.js';
import { VcdLexer } from './lexer.js';
import { buildWaveModel, WaveModel } from './model.js';
import { resample, SampleWindow } from './resampler.js';
import { FileLineSource, LineSource, TextLineSource } from './source.js';
import { normalizePath, SignalDefinition, VcdHeader } from './types.js';
import { ChangeStreamWalker } from './walker.js';

export interface ExtractOptions {
    window?: Partial<SampleWindow>;
    formats?: Readonly<Record<string, DisplayFormat>>;
    /** Samples per signal, see `resample` */
    maxSamples?: number;
}

/** Declared signals in declaration order, without sampling anything. */
export function listSignals(header: VcdHeader): SignalDefinition[] {
    return [...header.definitions];
}

/**
 * One complete extraction over a fresh source. The header is re-read because
 * the source cannot seek; the source is closed however the walk ends.
 */
export function extractFromSource(
    source: LineSource,
    paths: readonly string[],
    options: ExtractOptions = {},
    log: LogChannel = silentLog,
): WaveModel {
    try {
        const lexer = new VcdLexer(source);
        const header = parseHeader(lexer);
        const codes = new Set<string>();
        for (const p of paths) {
            const def = header.byPath.get(normalizePath(p));
            if (def) { codes.add(def.code); }
        }
        const walker = new ChangeStreamWalker(lexer, header, { track: codes });
        const result = resample(header, walker, {
            paths,
            window: options.window,
            formats: options.formats,
            maxSamples: options.maxSamples,
        });
        if (result.unresolved.length > 0) {
            log.appendLine(`[Extract] Unresolved paths: ${result.unresolved.join(', ')}`);
        }
        log.appendLine(
            `[Extract] ${result.signals.length} of ${paths.length} signals, ` +
            `t=${result.window.startTime}..${result.window.endTime}, chunk=${result.window.chunkSize}`,
        );
        return buildWaveModel(result, header.timescale);
    } finally {
        source.close();
    }
}

export function extractFromText(
    text: string,
    paths: readonly string[],
    options: ExtractOptions = {},
    log: LogChannel = silentLog,
): WaveModel {
    return extractFromSource(new TextLineSource(text), paths, options, log);
}

/**
 * Extract signals from a VCD file and sample them for a timing diagram.
 * The header is parsed once on open; every `extract` call walks the file
 * again through its own read handle.
 */
export class WaveExtractor {
    readonly filePath: string;
    readonly header: VcdHeader;
    private readonly formats = new Map<string, DisplayFormat>();
    private readonly log: LogChannel;

    private constructor(filePath: string, header: VcdHeader, log: LogChannel) {
        this.filePath = filePath;
        this.header = header;
        this.log = log;
    }

    static open(filePath: string, options: { log?: LogChannel } = {}): WaveExtractor {
        const log = options.log ?? silentLog;
        const source = new FileLineSource(filePath);
        try {
            const header = parseHeader(new VcdLexer(source));
            log.appendLine(`[File] Parsed header of ${filePath}: ${header.definitions.length} signals, timescale ${header.timescale.magnitude}${header.timescale.unit}`);
            return new WaveExtractor(filePath, header, log);
        } finally {
            source.close();
        }
    }

    listSignals(): SignalDefinition[] {
        return listSignals(this.header);
    }

    /** Set the display format of a multi-bit signal. */
    setFormat(signalPath: string, fmt: string): void {
        if (!isDisplayFormat(fmt)) {
            throw new Error(`'${fmt}': Invalid format character.`);
        }
        const path = normalizePath(signalPath);
        if (!this.header.byPath.has(path)) {
            throw new Error(`Signal path not found: ${path}`);
        }
        this.formats.set(path, fmt);
    }

    extract(paths: readonly string[], options: ExtractOptions = {}): WaveModel {
        const merged = new Map(this.formats);
        for (const [path, fmt] of Object.entries(options.formats ?? {})) {
            merged.set(normalizePath(path), fmt);
        }
        const formats = Object.fromEntries(merged);
        return extractFromSource(new FileLineSource(this.filePath), paths, { ...options, formats }, this.log);
    }
}
