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
import * as fs from 'fs';
import { StringDecoder } from 'string_decoder';
import { VcdError } from './errors.js';

export interface SourceLine {
    text: string;
    /** 1-based line number */
    line: number;
    /** Byte offset of the first character of the line */
    offset: number;
}

/** Forward-only line reader. Lines are yielded without their terminator. */
export interface LineSource {
    nextLine(): SourceLine | null;
    close(): void;
}

const DEFAULT_CHUNK_BYTES = 64 * 1024;

abstract class BufferedLineSource implements LineSource {
    private pending = '';
    private cursor = 0;
    private exhausted = false;
    private lineNo = 0;
    private offset = 0;

    /** Next slice of decoded text, or null once the input is used up. */
    protected abstract fill(): string | null;

    abstract close(): void;

    nextLine(): SourceLine | null {
        let nl = this.pending.indexOf('\n', this.cursor);
        while (nl < 0 && !this.exhausted) {
            const more = this.fill();
            if (more === null) {
                this.exhausted = true;
                break;
            }
            const searchFrom = this.pending.length - this.cursor;
            this.pending = this.pending.slice(this.cursor) + more;
            this.cursor = 0;
            nl = this.pending.indexOf('\n', searchFrom);
        }

        let raw: string;
        if (nl >= 0) {
            raw = this.pending.slice(this.cursor, nl);
            this.cursor = nl + 1;
        } else if (this.cursor < this.pending.length) {
            raw = this.pending.slice(this.cursor);
            this.cursor = this.pending.length;
        } else {
            return null;
        }

        const line: SourceLine = {
            text: raw.endsWith('\r') ? raw.slice(0, -1) : raw,
            line: ++this.lineNo,
            offset: this.offset,
        };
        this.offset += Buffer.byteLength(raw, 'utf8') + (nl >= 0 ? 1 : 0);
        return line;
    }
}

/** Lines over VCD text already held in memory. */
export class TextLineSource extends BufferedLineSource {
    private text: string | null;

    constructor(text: string) {
        super();
        this.text = text;
    }

    protected fill(): string | null {
        const text = this.text;
        this.text = null;
        return text;
    }

    close(): void {
        this.text = null;
    }
}

/**
 * Lines read incrementally from a file through a fixed-size buffer.
 * Multi-byte UTF-8 sequences split across reads are reassembled by the decoder.
 */
export class FileLineSource extends BufferedLineSource {
    readonly filePath: string;
    private fd: number | null;
    private readonly buffer: Buffer;
    private readonly decoder = new StringDecoder('utf8');

    constructor(filePath: string, chunkBytes = DEFAULT_CHUNK_BYTES) {
        super();
        this.filePath = filePath;
        this.buffer = Buffer.alloc(chunkBytes);
        try {
            this.fd = fs.openSync(filePath, 'r');
        } catch (err: unknown) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
                throw new VcdError('FILE_NOT_FOUND', `VCD file not found: ${filePath}`);
            }
            throw err;
        }
    }

    protected fill(): string | null {
        if (this.fd === null) { return null; }
        const n = fs.readSync(this.fd, this.buffer, 0, this.buffer.length, null);
        if (n === 0) {
            const tail = this.decoder.end();
            this.close();
            return tail.length > 0 ? tail : null;
        }
        return this.decoder.write(this.buffer.subarray(0, n));
    }

    close(): void {
        if (this.fd !== null) {
            fs.closeSync(this.fd);
            this.fd = null;
        }
    }
}
