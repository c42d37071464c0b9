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

export type VcdErrorCode =
    | 'MALFORMED_SYNTAX'
    | 'UNBALANCED_SCOPE'
    | 'INVALID_WIDTH'
    | 'INVALID_VALUE_SYMBOL'
    | 'UNKNOWN_IDENTIFIER'
    | 'INVALID_WINDOW'
    | 'NO_SIGNALS_REQUESTED'
    | 'FILE_NOT_FOUND';

/** Position of a token in the dump: 1-based line, 0-based byte offset from the start of the file. */
export interface SourceLocation {
    line: number;
    offset: number;
}

export class VcdError extends Error {
    readonly code: VcdErrorCode;
    readonly location?: SourceLocation;

    constructor(code: VcdErrorCode, message: string, location?: SourceLocation) {
        super(location ? `${message} (line ${location.line}, byte ${location.offset})` : message);
        this.name = 'VcdError';
        this.code = code;
        this.location = location;
    }
}

export function isVcdError(err: unknown, code?: VcdErrorCode): err is VcdError {
    return err instanceof VcdError && (code === undefined || err.code === code);
}
