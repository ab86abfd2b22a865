import type { CueScript } from '../index';
import { tokenizeArguments, type ArgumentToken } from '../utils';
import type { ScriptContainer } from './ScriptContainer';
import { ScriptEntry } from './ScriptEntry';

export interface CommandLine {
    command: string;
    /** Words before the first block */
    args: string[];
    blocks: ScriptBlock[];
    lineNumber: number;
}

/**
 * One `{ ... }` block of a command line
 */
export interface ScriptBlock {
    /** Words between the previous block and this one, e.g. `else if <[x]>`; empty for the first */
    header: string[];
    lines: CommandLine[];
}

interface OpenBlock {
    owner: CommandLine;
    block: ScriptBlock;
}

/**
 * Reads script source into command lines.
 *
 * One command per line, optionally written as a `- ` list item. Lines starting
 * with `#` are comments. A line ending in an unquoted `{` opens a block that a
 * line starting with `}` closes; `} else {` closes one block and opens the next.
 * Commands inside a block become lines of that block.
 */
export class ScriptLoader {
    private readonly engine: CueScript;

    constructor(engine: CueScript) {
        this.engine = engine;
    }

    parse(source: string, scriptName: string | null = null): CommandLine[] {
        const result: CommandLine[] = [];
        const open: OpenBlock[] = [];

        const lines = source.split(/\r?\n/);
        for (let i = 0; i < lines.length; i++) {
            const trimmed = lines[i].trim();
            if (trimmed === '' || trimmed.startsWith('#')) {
                continue;
            }

            if (trimmed.startsWith('}')) {
                const closed = open.pop();
                if (closed === undefined) {
                    this.engine.debug.echoError("Unexpected '}' without an open block.", { script: scriptName, line: i + 1 });
                    continue;
                }
                const rest = this.tokenize(trimmed.slice(1));
                if (rest.length === 0) {
                    continue;
                }
                if (!this.opensBlock(rest)) {
                    this.engine.debug.echoError("Unexpected text after '}'.", { script: scriptName, line: i + 1 });
                    continue;
                }
                const block: ScriptBlock = { header: rest.slice(0, -1).map(token => token.text), lines: [] };
                closed.owner.blocks.push(block);
                open.push({ owner: closed.owner, block });
                continue;
            }

            const tokens = this.tokenize(trimmed === '-' ? '' : trimmed.startsWith('- ') ? trimmed.slice(2) : trimmed);
            const opens = this.opensBlock(tokens);
            const words = (opens ? tokens.slice(0, -1) : tokens).map(token => token.text);
            const [command, ...args] = words;
            if (command === undefined) {
                continue;
            }

            const line: CommandLine = { command, args, blocks: [], lineNumber: i + 1 };
            const parent = open[open.length - 1];
            if (parent === undefined) {
                result.push(line);
            } else {
                parent.block.lines.push(line);
            }
            if (opens) {
                const block: ScriptBlock = { header: [], lines: [] };
                line.blocks.push(block);
                open.push({ owner: line, block });
            }
        }

        const [outermost] = open;
        if (outermost !== undefined) {
            this.engine.debug.echoError(`Block opened by '${outermost.owner.command}' is never closed.`, { script: scriptName, line: outermost.owner.lineNumber });
        }
        return result;
    }

    buildEntries(source: string, script: ScriptContainer | null = null): ScriptEntry[] {
        return this.parse(source, script?.name ?? null)
            .map(line => ScriptEntry.create(this.engine, line.command, line.args, script, line.lineNumber, line.blocks));
    }

    private opensBlock(tokens: ArgumentToken[]): boolean {
        const last = tokens[tokens.length - 1];
        return last !== undefined && !last.quoted && last.text === '{';
    }

    /**
     * Split a line, separating a `{` typed against the last word
     */
    private tokenize(text: string): ArgumentToken[] {
        const tokens = tokenizeArguments(text);
        const last = tokens[tokens.length - 1];
        if (last !== undefined && !last.quoted && last.text.length > 1 && last.text.endsWith('{') && !last.text.startsWith('<')) {
            tokens[tokens.length - 1] = { text: last.text.slice(0, -1), quoted: false };
            tokens.push({ text: '{', quoted: false });
        }
        return tokens;
    }
}
