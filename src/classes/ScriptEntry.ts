import type { CueScript } from '../index';
import type { TemplateContext } from '../types/Template.type';
import { quoteArgument, valueToString, type Value } from '../utils';
import type { AbstractCommand } from './AbstractCommand';
import { Argument, InternalArgument, findPrefixSplit } from './Argument';
import type { DebugScope } from './Debug';
import { InvalidArgumentsError } from './exceptions';
import type { ScriptContainer } from './ScriptContainer';
import type { CommandLine, ScriptBlock } from './ScriptLoader';
import type { ScriptQueue } from './ScriptQueue';

/**
 * One `{ ... }` block of a braced command, with the words that introduced it
 */
export interface BracedData {
    /** `if` for the first block of an if, `else if <[x]>` for a later one */
    key: string;
    /** Words before the block, without the command name */
    args: string[];
    entries: ScriptEntry[];
}

/**
 * Everything computed when the entry was preprocessed. Shared, unchanged, by every clone.
 */
export interface ScriptEntryInternal {
    /** Keyword as written, lower-cased and without `^` or `~` */
    command: string;
    actualCommand: AbstractCommand;
    /** The handler that was asked for, when argument count validation replaced it */
    intendedCommand: AbstractCommand | null;
    originalArgs: string[];
    /** Ordinary arguments, blocks written out flat, before any tag is filled */
    preTaggedArgs: string[];
    /** `if:`, `save:` and handler-reserved arguments, in the order written */
    preprocArgs: InternalArgument[];
    /** Ordinary arguments, all of which come before the first block */
    allArguments: InternalArgument[];
    /** allArguments minus those the handler reads by prefix or raw value */
    argumentsToUse: InternalArgument[];
    /** Lower-cased literal arguments */
    rawInputArgs: string[];
    /** Lower-cased (remapped) prefix to index in allArguments */
    argPrefixMap: Map<string, number>;
    bracedSet: BracedData[] | null;
    hasBraces: boolean;
    instant: boolean;
    waitfor: boolean;
    hasTags: boolean;
    brokenArgs: boolean;
    lineNumber: number;
    script: ScriptContainer | null;
}

const META_PREFIXES = new Set(['if', 'save']);

function splitBraceTypos(engine: CueScript, keyword: string, args: string[], scope: DebugScope): string[] {
    const tokens: string[] = [];
    for (const arg of args) {
        if (arg.length > 1 && arg.endsWith('{') && !arg.endsWith('<{')) {
            engine.debug.echoError(`Command '${keyword}' has argument '${arg}', which is missing a space before '{'.`, scope);
            tokens.push(arg.slice(0, -1), '{');
        } else {
            tokens.push(arg);
        }
    }
    return tokens;
}

interface FoldedTokens {
    args: string[];
    blocks: ScriptBlock[];
    unclosed: boolean;
}

/**
 * Fold a flat token list into words and blocks. Commands inside a block are separated by `-`.
 */
function foldBlocks(tokens: string[], lineNumber: number): FoldedTokens {
    let pos = 0;
    let unclosed = false;

    // Words and blocks of one command, up to a `-` or `}` of the enclosing block
    function readCommand(nested: boolean): { words: string[]; blocks: ScriptBlock[] } {
        const words: string[] = [];
        const blocks: ScriptBlock[] = [];
        let header: string[] = [];
        while (pos < tokens.length) {
            const token = tokens[pos];
            if (nested && (token === '}' || token === '-')) {
                break;
            }
            pos++;
            if (token === '{') {
                blocks.push({ header, lines: readLines() });
                header = [];
            } else if (blocks.length === 0) {
                words.push(token);
            } else {
                header.push(token);
            }
        }
        return { words, blocks };
    }

    function readLines(): CommandLine[] {
        const lines: CommandLine[] = [];
        while (pos < tokens.length) {
            const token = tokens[pos];
            if (token === '}') {
                pos++;
                return lines;
            }
            if (token === '-') {
                pos++;
                continue;
            }
            const { words, blocks } = readCommand(true);
            const [command, ...args] = words;
            if (command !== undefined) {
                lines.push({ command, args, blocks, lineNumber });
            }
        }
        unclosed = true;
        return lines;
    }

    const { words, blocks } = readCommand(false);
    return { args: words, blocks, unclosed };
}

/**
 * Blocks written out again as flat tokens, for display and argument counts
 */
function flattenBlocks(blocks: ScriptBlock[]): string[] {
    const tokens: string[] = [];
    for (const block of blocks) {
        tokens.push(...block.header, '{');
        for (const line of block.lines) {
            tokens.push('-', line.command, ...line.args, ...flattenBlocks(line.blocks));
        }
        tokens.push('}');
    }
    return tokens;
}

function buildBracedSet(
    engine: CueScript,
    keyword: string,
    args: string[],
    blocks: ScriptBlock[],
    script: ScriptContainer | null
): BracedData[] {
    return blocks.map((block, index) => ({
        key: index === 0 ? keyword : block.header.join(' ').toLowerCase(),
        args: index === 0 ? args : block.header,
        entries: block.lines.map(line => ScriptEntry.create(engine, line.command, line.args, script, line.lineNumber, line.blocks))
    }));
}

/**
 * A single command as it sits in a queue
 */
export class ScriptEntry {
    readonly engine: CueScript;
    readonly internal: ScriptEntryInternal;
    context: TemplateContext;
    /** Entry that injected this one, e.g. the repeat an iteration callback belongs to */
    owner: ScriptEntry | null = null;
    /** Command-specific state carried between executions */
    data: unknown = null;
    forceInstant = false;

    private residingQueue: ScriptQueue | null = null;
    private objects = new Map<string, Value>();
    private finished = false;
    private processedArgs: Argument[] = [];

    constructor(engine: CueScript, internal: ScriptEntryInternal) {
        this.engine = engine;
        this.internal = internal;
        this.context = { entry: this, queue: null, script: internal.script };
    }

    /**
     * Preprocess a command into an entry.
     *
     * Blocks come either already split, as the loader passes them, or inside `args`
     * as flat tokens: `{`, commands separated by `-`, then `}`.
     * Malformed input is reported and yields an entry bound to the invalid-command handler.
     */
    static create(
        engine: CueScript,
        command: string,
        args: string[] | null = null,
        script: ScriptContainer | null = null,
        lineNumber: number = -1,
        blocks: ScriptBlock[] | null = null
    ): ScriptEntry {
        let keyword = command;
        let instant = false;
        let waitfor = false;
        if (keyword.startsWith('^')) {
            instant = true;
            keyword = keyword.slice(1);
        } else if (keyword.startsWith('~')) {
            waitfor = true;
            keyword = keyword.slice(1);
        }
        keyword = keyword.toLowerCase();

        const givenArgs = args ? [...args] : [];
        const originalArgs = blocks === null ? givenArgs : [...givenArgs, ...flattenBlocks(blocks)];
        const scope: DebugScope = {
            script: script?.name ?? null,
            line: lineNumber,
            command: [command, ...originalArgs.map(quoteArgument)].join(' ')
        };

        const found = engine.commands.get(keyword);
        let handler: AbstractCommand = found ?? engine.commands.invalid;
        if (found === null) {
            engine.debug.echoError(`Unknown command '${keyword}'.`, scope);
        } else if (waitfor && !found.isHoldable) {
            engine.debug.echoError(`The command '${keyword}' cannot be waited for!`, scope);
            waitfor = false;
        }
        if (handler.forceHold) {
            waitfor = true;
        }

        let words = givenArgs;
        let blockList = blocks ?? [];
        if (blocks === null) {
            const folded = foldBlocks(splitBraceTypos(engine, keyword, givenArgs, scope), lineNumber);
            if (folded.unclosed) {
                engine.debug.echoError(`Command '${keyword}' has an unclosed block.`, scope);
            }
            words = folded.args;
            blockList = folded.blocks;
        }
        const hasBraces = blockList.length > 0;

        const wordArgs: string[] = [];
        const preprocArgs: InternalArgument[] = [];
        const allArguments: InternalArgument[] = [];
        let hasTags = false;

        for (const arg of words) {
            const colon = findPrefixSplit(arg, handler.anyPrefixSymbolAllowed);
            let compiled: InternalArgument;
            if (colon !== -1) {
                const prefixText = arg.slice(0, colon);
                const prefix = new InternalArgument(prefixText, engine.tags.compile(prefixText));
                compiled = new InternalArgument(arg, engine.tags.compile(arg.slice(colon + 1)), prefix, true);
                const lowerPrefix = prefixText.toLowerCase();
                if (META_PREFIXES.has(lowerPrefix) || handler.reservedPrefixes.has(lowerPrefix)) {
                    preprocArgs.push(compiled);
                    hasTags = hasTags || compiled.shouldProcess;
                    continue;
                }
            } else {
                compiled = new InternalArgument(arg, engine.tags.compile(arg), null, arg.indexOf(':') > 0);
            }

            wordArgs.push(arg);
            allArguments.push(compiled);
            hasTags = hasTags || compiled.shouldProcess;
        }
        const preTaggedArgs = [...wordArgs, ...flattenBlocks(blockList)];

        const rawInputArgs: string[] = [];
        const argPrefixMap = new Map<string, number>();
        allArguments.forEach((arg, index) => {
            if (!arg.shouldProcess) {
                rawInputArgs.push(arg.fullOriginalRawValue.toLowerCase());
            }
            const prefixText = arg.prefix?.value.rawValue;
            if (prefixText !== null && prefixText !== undefined) {
                const lower = prefixText.toLowerCase();
                const key = handler.prefixRemapper.get(lower) ?? lower;
                if (!argPrefixMap.has(key)) {
                    argPrefixMap.set(key, index);
                }
            }
        });

        const argumentsToUse = allArguments.filter(arg => {
            const prefixText = arg.prefix?.value.rawValue;
            if (prefixText !== null && prefixText !== undefined) {
                const lower = prefixText.toLowerCase();
                return !handler.prefixesHandled.has(handler.prefixRemapper.get(lower) ?? lower);
            }
            const raw = arg.prefix === null ? arg.rawValue : null;
            return raw === null || !handler.rawValuesHandled.has(raw.toLowerCase());
        });

        let intendedCommand: AbstractCommand | null = null;
        let brokenArgs = false;
        const count = preTaggedArgs.length;
        if (handler !== engine.commands.invalid
            && (count < handler.minimumArguments || (count > handler.maximumArguments && !hasBraces))) {
            brokenArgs = true;
            intendedCommand = handler;
            handler = engine.commands.invalid;
        }

        let bracedSet: BracedData[] | null = null;
        if (handler.isBraced) {
            bracedSet = buildBracedSet(engine, keyword, wordArgs, blockList, script);
        }

        return new ScriptEntry(engine, {
            command: keyword,
            actualCommand: handler,
            intendedCommand,
            originalArgs,
            preTaggedArgs,
            preprocArgs,
            allArguments,
            argumentsToUse,
            rawInputArgs,
            argPrefixMap,
            bracedSet,
            hasBraces,
            instant,
            waitfor,
            hasTags,
            brokenArgs,
            lineNumber,
            script
        });
    }

    get command(): AbstractCommand {
        return this.internal.actualCommand;
    }

    get queue(): ScriptQueue | null {
        return this.residingQueue;
    }

    set queue(queue: ScriptQueue | null) {
        this.residingQueue = queue;
        this.updateContext();
    }

    get isFinished(): boolean {
        return this.finished;
    }

    /**
     * Once finished, an entry stays finished
     */
    markFinished(): void {
        this.finished = true;
    }

    isInstant(): boolean {
        return this.internal.instant || this.forceInstant;
    }

    setInstant(instant: boolean): void {
        this.forceInstant = instant;
    }

    shouldWaitFor(): boolean {
        return this.internal.waitfor && !this.finished;
    }

    /**
     * The queue this entry runs on, following conversions from instant to timed
     */
    getResidingQueue(): ScriptQueue | null {
        let queue = this.residingQueue;
        while (queue !== null && queue.replacedBy !== null) {
            queue = queue.replacedBy;
        }
        return queue;
    }

    updateContext(): void {
        this.context = { entry: this, queue: this.getResidingQueue(), script: this.internal.script };
    }

    /**
     * Same command, fresh object store and context, not finished
     */
    clone(): ScriptEntry {
        const copy = new ScriptEntry(this.engine, this.internal);
        copy.copyFrom(this);
        return copy;
    }

    /**
     * Take over another entry's scheduling state
     */
    copyFrom(entry: ScriptEntry): void {
        this.forceInstant = entry.forceInstant;
        this.owner = entry.owner;
        this.queue = entry.queue;
    }

    /**
     * Resolve one compiled argument against the current context
     */
    resolveArgument(arg: InternalArgument): Argument {
        if (arg.rawArgument !== null) {
            return arg.rawArgument;
        }
        const prefix = arg.prefix === null ? null : valueToString(arg.prefix.value.resolve(this.context));
        const object = arg.value.resolve(this.context);
        if (prefix === null && arg.hadColon && this.command.allowedDynamicPrefixes && typeof object === 'string') {
            return Argument.fromText(object, this.command.anyPrefixSymbolAllowed, true);
        }
        return new Argument(prefix, object);
    }

    /**
     * Resolve every argument the handler parses. Called by the executor before parseArgs.
     */
    resolveArguments(): Argument[] {
        this.processedArgs = this.internal.argumentsToUse.map(arg => this.resolveArgument(arg));
        return this.processedArgs;
    }

    getProcessedArgs(): Argument[] {
        return this.processedArgs;
    }

    [Symbol.iterator](): Iterator<Argument> {
        return this.processedArgs[Symbol.iterator]();
    }

    /**
     * Resolve arbitrary text, such as a block's header words, in this entry's context
     */
    resolveText(text: string): Value {
        return this.engine.tags.compile(text).resolve(this.context);
    }

    argForPrefix(prefix: string): Argument | null {
        const index = this.internal.argPrefixMap.get(prefix.toLowerCase());
        if (index === undefined) {
            return null;
        }
        return this.resolveArgument(this.internal.allArguments[index]);
    }

    argForPrefixAsText(prefix: string, defaultValue: string | null = null): string | null {
        const arg = this.argForPrefix(prefix);
        return arg === null ? defaultValue : arg.asText();
    }

    requiredArgForPrefixAsText(prefix: string): string {
        const text = this.argForPrefixAsText(prefix);
        if (text === null) {
            throw new InvalidArgumentsError(`Missing '${prefix}' argument!`);
        }
        return text;
    }

    /**
     * True when the word appears as a bare argument, or as `name:true`
     */
    argAsBoolean(name: string): boolean {
        const arg = this.argForPrefix(name);
        if (arg !== null) {
            return arg.asBoolean();
        }
        return this.internal.rawInputArgs.includes(name.toLowerCase());
    }

    addObject(key: string, value: Value): this {
        this.objects.set(key.toLowerCase(), value);
        return this;
    }

    /**
     * Set a value only if nothing was parsed for it
     */
    defaultObject(key: string, value: Value): this {
        if (!this.hasObject(key)) {
            this.addObject(key, value);
        }
        return this;
    }

    hasObject(key: string): boolean {
        return this.objects.has(key.toLowerCase());
    }

    getObject(key: string): Value | undefined {
        return this.objects.get(key.toLowerCase());
    }

    /**
     * A stored object as text, or null
     */
    getElement(key: string): string | null {
        const value = this.getObject(key);
        return value === undefined ? null : valueToString(value);
    }

    getObjects(): Map<string, Value> {
        return new Map(this.objects);
    }

    getUsageHint(): string {
        return (this.internal.intendedCommand ?? this.internal.actualCommand).getUsageHint();
    }

    debugScope(): DebugScope {
        const script = this.internal.script;
        return {
            queueId: this.getResidingQueue()?.id ?? null,
            script: script?.name ?? null,
            line: this.internal.lineNumber,
            command: this.toString(),
            source: script?.source ?? null,
            debug: script?.debug ?? true
        };
    }

    toString(): string {
        let prefix = '';
        if (this.internal.instant) {
            prefix = '^';
        } else if (this.internal.waitfor && !this.internal.actualCommand.forceHold) {
            prefix = '~';
        }
        return [prefix + this.internal.command, ...this.internal.originalArgs.map(quoteArgument)].join(' ');
    }
}
