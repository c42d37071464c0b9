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
import { z } from 'zod';
import { DISPLAY_FORMATS } from './waveform/format.js';
import { MAX_SAMPLES, SampleWindow } from './waveform/resampler.js';

/**
 * Defaults for extraction requests. The engine itself reads no environment;
 * only the server surface calls `loadConfig`.
 */
export const ExtractionConfigSchema = z.object({
    /** Omitted: sized from the window so the grid stays within `maxSamples` */
    chunkSize: z.coerce.number().int().positive().optional(),
    startTime: z.coerce.number().int().nonnegative().default(0),
    endTime: z.coerce.number().int().nonnegative().optional(),
    format: z.enum(DISPLAY_FORMATS).default('x'),
    maxSamples: z.coerce.number().int().min(2).default(MAX_SAMPLES),
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

const ENV_KEYS = {
    chunkSize: 'VCD_WAVE_CHUNK_SIZE',
    startTime: 'VCD_WAVE_START_TIME',
    endTime: 'VCD_WAVE_END_TIME',
    format: 'VCD_WAVE_FORMAT',
    maxSamples: 'VCD_WAVE_MAX_SAMPLES',
} as const;

const ENV_NAMES = new Map<string | number, string>(Object.entries(ENV_KEYS));

export function loadConfig(env: Record<string, string | undefined> = process.env): ExtractionConfig {
    const parsed = ExtractionConfigSchema.safeParse({
        chunkSize: env[ENV_KEYS.chunkSize] || undefined,
        startTime: env[ENV_KEYS.startTime],
        endTime: env[ENV_KEYS.endTime] || undefined,
        format: env[ENV_KEYS.format],
        maxSamples: env[ENV_KEYS.maxSamples],
    });
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(i => `${ENV_NAMES.get(i.path[0]) ?? i.path.join('.')}: ${i.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }
    return parsed.data;
}

/** Window defaults, overridden field by field by a request. */
export function windowFrom(config: ExtractionConfig, overrides: Partial<SampleWindow> = {}): Partial<SampleWindow> {
    return {
        startTime: overrides.startTime ?? config.startTime,
        endTime: overrides.endTime ?? config.endTime,
        chunkSize: overrides.chunkSize ?? config.chunkSize,
    };
}
