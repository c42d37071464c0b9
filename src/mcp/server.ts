#!/usr/bin/env node
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
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import * as fs from "fs";
import { loadConfig } from "../config.js";
import { createStderrLog } from "../log.js";
import { DISPLAY_FORMATS } from "../waveform/format.js";
import { WaveformSession } from "./session.js";

const log = createStderrLog();
const session = new WaveformSession(loadConfig(), log);

const server = new McpServer({
    name: "vcd-wave",
    version: "0.1.0",
});

function text(value: string) {
    return { content: [{ type: "text" as const, text: value }] };
}

// Tool failures are reported back to the caller rather than killing the server
function run(action: () => string) {
    try {
        return text(action());
    } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        log.appendLine(`[Tool] Error: ${msg}`);
        return text(`Error: ${msg}`);
    }
}

// ── load_waveform ────────────────────────────────────────────────────────────

server.registerTool(
    "load_waveform",
    {
        description: "Load a VCD file for extraction. Replaces any previously loaded waveform.",
        inputSchema: {
            file_path: z.string().describe("Absolute path to a .vcd file"),
        },
    },
    async ({ file_path }) => {
        if (!fs.existsSync(file_path)) {
            return text(`File not found: ${file_path}`);
        }
        return run(() => session.load(file_path));
    }
);

// ── list_signals ─────────────────────────────────────────────────────────────

server.registerTool(
    "list_signals",
    {
        description: "List every declared signal of the loaded waveform with its kind, width and identifier code.",
        inputSchema: {},
    },
    async () => run(() => session.listSignals())
);

// ── extract_wave ─────────────────────────────────────────────────────────────

server.registerTool(
    "extract_wave",
    {
        description: "Sample signals on a regular grid and return a WaveJSON timing diagram. Unknown paths are listed, not fatal.",
        inputSchema: {
            signals: z.array(z.string()).describe("Signal paths, '/'-separated, in display order"),
            start_time: z.number().int().optional().describe("First tick of the window (default 0)"),
            end_time: z.number().int().optional().describe("Last tick of the window (default: end of file)"),
            chunk_size: z.number().int().optional().describe("Ticks per diagram cell (default: sized to fit the sample limit)"),
            formats: z.record(z.enum(DISPLAY_FORMATS)).optional().describe("Per-path display format for buses: b, d, u, x or X"),
            full_paths: z.boolean().optional().describe("Label rows with full paths instead of leaf names"),
        },
    },
    async (args) => run(() => session.extractWave(args))
);

// ── get_value_at ─────────────────────────────────────────────────────────────

server.registerTool(
    "get_value_at",
    {
        description: "Get the value of a signal at a specific timestamp.",
        inputSchema: {
            signal: z.string().describe("Full signal path"),
            time: z.number().int().describe("Timestamp to query"),
        },
    },
    async ({ signal, time }) => run(() => session.valueAt(signal, time))
);

// ── main ─────────────────────────────────────────────────────────────────────

async function main() {
    const filePath = process.argv[2];
    if (filePath) {
        if (!fs.existsSync(filePath)) {
            console.error(`File not found: ${filePath}`);
            process.exit(1);
        }
        log.appendLine(`Loading waveform: ${filePath}`);
        log.appendLine(session.load(filePath));
    }

    const transport = new StdioServerTransport();
    await server.connect(transport);
    log.appendLine("VCD Wave MCP Server running on stdio");
}

main().catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
});
