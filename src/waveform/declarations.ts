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
import { SourceLocation, VcdError } from './errors.js';
import { VcdLexer } from './lexer.js';
import {
    PATH_SEPARATOR,
    ScopeNode,
    SignalDefinition,
    Timescale,
    VAR_KINDS,
    VarKind,
    VcdHeader,
} from './types.js';

const DEFAULT_TIMESCALE: Timescale = { magnitude: 1, unit: 'ns' };

function isVarKind(word: string): word is VarKind {
    return VAR_KINDS.some(k => k === word);
}

export function parseTimescale(text: string, loc?: SourceLocation): Timescale {
    const m = text.replace(/\s+/g, '').match(/^(1|10|100)(s|ms|us|ns|ps|fs)$/);
    if (!m) {
        throw new VcdError('MALFORMED_SYNTAX', `Invalid timescale '${text}'`, loc);
    }
    const magnitude = m[1] === '100' ? 100 : m[1] === '10' ? 10 : 1;
    const unit = m[2];
    switch (unit) {
        case 's': case 'ms': case 'us': case 'ns': case 'ps': case 'fs':
            return { magnitude, unit };
        default:
            throw new VcdError('MALFORMED_SYNTAX', `Invalid timescale unit '${unit}'`, loc);
    }
}

/**
 * Builds the identifier table and scope tree from the header of a dump.
 * Leaves the lexer positioned right after `$enddefinitions $end`.
 */
export class DeclarationBuilder {
    private readonly lexer: VcdLexer;
    private built = false;

    private readonly root: ScopeNode = { name: '', type: 'root', children: [], signals: [] };
    private readonly stack: ScopeNode[] = [this.root];
    private readonly definitions: SignalDefinition[] = [];
    private readonly byCode = new Map<string, SignalDefinition[]>();
    private readonly byPath = new Map<string, SignalDefinition>();
    private date = '';
    private version = '';
    private comment = '';
    private timescale: Timescale = DEFAULT_TIMESCALE;

    constructor(lexer: VcdLexer) {
        this.lexer = lexer;
    }

    build(): VcdHeader {
        if (this.built) {
            throw new Error('DeclarationBuilder.build() can only be called once');
        }
        this.built = true;

        for (;;) {
            const tok = this.lexer.next();
            switch (tok.kind) {
                case 'EndOfInput':
                    throw new VcdError('MALFORMED_SYNTAX', "Can't find $enddefinitions in VCD file", tok.loc);
                case 'CommandStart':
                    if (this.command(tok.keyword, tok.loc)) {
                        return this.result();
                    }
                    break;
                default:
                    throw new VcdError('MALFORMED_SYNTAX', 'Value change before $enddefinitions', tok.loc);
            }
        }
    }

    private readBody(keyword: string, loc: SourceLocation): string[] {
        if (this.lexer.openCommand !== keyword || keyword.startsWith('dump')) {
            throw new VcdError('MALFORMED_SYNTAX', `$${keyword} before $enddefinitions`, loc);
        }
        const words: string[] = [];
        for (;;) {
            const tok = this.lexer.next();
            if (tok.kind === 'CommandEnd') { return words; }
            if (tok.kind === 'Identifier') {
                words.push(tok.text);
                continue;
            }
            throw new VcdError('MALFORMED_SYNTAX', `Unexpected ${tok.kind} inside $${keyword}`, tok.loc);
        }
    }

    /** Returns true once $enddefinitions has been consumed. */
    private command(keyword: string, loc: SourceLocation): boolean {
        const words = this.readBody(keyword, loc);
        switch (keyword) {
            case 'date': this.date = words.join(' '); break;
            case 'version': this.version = words.join(' '); break;
            case 'comment': this.comment = words.join(' '); break;
            case 'timescale': this.timescale = parseTimescale(words.join(''), loc); break;
            case 'scope': this.pushScope(words, loc); break;
            case 'upscope':
                if (this.stack.length <= 1) {
                    throw new VcdError('UNBALANCED_SCOPE', '$upscope without a matching $scope', loc);
                }
                this.stack.pop();
                break;
            case 'var': this.addVar(words, loc); break;
            case 'enddefinitions':
                if (this.stack.length > 1) {
                    const open = this.stack.slice(1).map(s => s.name).join(PATH_SEPARATOR);
                    throw new VcdError('UNBALANCED_SCOPE', `$enddefinitions with open scope '${open}'`, loc);
                }
                return true;
            default:
                // $attrbegin and other writer-specific extensions
                break;
        }
        return false;
    }

    private pushScope(words: string[], loc: SourceLocation): void {
        if (words.length < 2) {
            throw new VcdError('MALFORMED_SYNTAX', '$scope needs a type and a name', loc);
        }
        const node: ScopeNode = { name: words[1], type: words[0], children: [], signals: [] };
        this.stack[this.stack.length - 1].children.push(node);
        this.stack.push(node);
    }

    private addVar(words: string[], loc: SourceLocation): void {
        // $var <type> <width> <code> <name> [range] $end
        if (words.length < 4) {
            throw new VcdError('MALFORMED_SYNTAX', `Incomplete $var declaration '${words.join(' ')}'`, loc);
        }
        const [kindWord, widthWord, code, name] = words;
        if (!isVarKind(kindWord)) {
            throw new VcdError('MALFORMED_SYNTAX', `Unknown variable type '${kindWord}'`, loc);
        }
        if (!/^[-+]?\d+$/.test(widthWord)) {
            throw new VcdError('MALFORMED_SYNTAX', `Invalid width '${widthWord}' for '${name}'`, loc);
        }
        const width = parseInt(widthWord, 10);
        if (width <= 0) {
            throw new VcdError('INVALID_WIDTH', `Width ${width} for '${name}' must be positive`, loc);
        }

        const scopes = this.stack.slice(1).map(s => s.name);
        const def: SignalDefinition = {
            path: [...scopes, name].join(PATH_SEPARATOR),
            name,
            code,
            width,
            kind: kindWord,
        };
        if (words.length > 4) { def.range = words.slice(4).join(''); }

        const aliases = this.byCode.get(code);
        if (aliases) {
            if (aliases[0].width !== width) {
                throw new VcdError(
                    'INVALID_WIDTH',
                    `'${def.path}' is ${width} bits but shares code '${code}' with ${aliases[0].width}-bit '${aliases[0].path}'`,
                    loc,
                );
            }
            aliases.push(def);
        } else {
            this.byCode.set(code, [def]);
        }

        this.stack[this.stack.length - 1].signals.push(def);
        this.definitions.push(def);
        if (!this.byPath.has(def.path)) { this.byPath.set(def.path, def); }
    }

    private result(): VcdHeader {
        return {
            date: this.date,
            version: this.version,
            comment: this.comment,
            timescale: this.timescale,
            root: this.root,
            definitions: this.definitions,
            byCode: this.byCode,
            byPath: this.byPath,
        };
    }
}

/** Read the header of a dump. */
export function parseHeader(lexer: VcdLexer): VcdHeader {
    return new DeclarationBuilder(lexer).build();
}
