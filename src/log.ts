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

/** Line-oriented log sink. Callers prefix lines with a `[Tag]`. */
export interface LogChannel {
    appendLine(value: string): void;
}

export const silentLog: LogChannel = {
    appendLine() { /* discarded */ },
};

/** Writes to stderr; stdout belongs to the MCP stdio transport. */
export function createStderrLog(): LogChannel {
    return {
        appendLine(value: string) {
            console.error(value);
        },
    };
}
