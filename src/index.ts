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
export { VcdError, isVcdError } from './waveform/errors.js';
export type { SourceLocation, VcdErrorCode } from './waveform/errors.js';
export { FileLineSource, TextLineSource } from './waveform/source.js';
export type { LineSource, SourceLine } from './waveform/source.js';
export { VcdLexer } from './waveform/lexer.js';
export type { ScalarSymbol, Token } from './waveform/lexer.js';
export { DeclarationBuilder, parseHeader, parseTimescale } from './waveform/declarations.js';
export { ChangeStreamWalker, extendBits } from './waveform/walker.js';
export type { WalkerOptions } from './waveform/walker.js';
export { DISPLAY_FORMATS, DEFAULT_FORMAT, formatBits, isDisplayFormat } from './waveform/format.js';
export type { DisplayFormat } from './waveform/format.js';
export { MAX_SAMPLES, resample, sampleCount, validateWindow } from './waveform/resampler.js';
export type {
    ResampleRequest,
    ResampleResult,
    ResolvedWindow,
    Sample,
    SampledSignal,
    SampleWindow,
} from './waveform/resampler.js';
export { buildWaveModel, serializeWaveJson, toWaveJson, waveString } from './waveform/model.js';
export type { WaveJson, WaveJsonSignal, WaveModel } from './waveform/model.js';
export { WaveExtractor, extractFromSource, extractFromText, listSignals } from './waveform/extractor.js';
export type { ExtractOptions } from './waveform/extractor.js';
export type {
    ScopeNode,
    SignalDefinition,
    SignalValue,
    Timescale,
    ValueChangeEvent,
    VarKind,
    VcdHeader,
} from './waveform/types.js';
export { loadConfig, ExtractionConfigSchema } from './config.js';
export type { ExtractionConfig } from './config.js';
export { createStderrLog, silentLog } from './log.js';
export type { LogChannel } from './log.js';
