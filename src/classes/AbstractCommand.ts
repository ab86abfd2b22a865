import { errorMessage } from '../utils';
import { ScriptRuntimeError } from './exceptions';
import type { ScriptEntry } from './ScriptEntry';
import type { ScriptQueue } from './ScriptQueue';

/**
 * Base class of every command handler.
 *
 * Subclasses declare their argument contract in the constructor and implement
 * parseArgs (resolved arguments into entry objects) and execute.
 */
export abstract class AbstractCommand {
    name = '';
    syntax = '';
    minimumArguments = 0;
    maximumArguments = Number.MAX_SAFE_INTEGER;
    /** May run on a procedural queue */
    isProcedural = false;
    /** May leave its entry unfinished while background work runs; allows `~` */
    isHoldable = false;
    /** Always waited for, even without `~` */
    forceHold = false;
    isBraced = false;
    anyPrefixSymbolAllowed = false;
    /** Split `prefix:value` again when a tag resolves to such text */
    allowedDynamicPrefixes = false;
    /** Prefixes read with entry.argForPrefix, left out of the parsed argument list */
    readonly prefixesHandled = new Set<string>();
    /** Bare words read with entry.argAsBoolean, left out of the parsed argument list */
    readonly rawValuesHandled = new Set<string>();
    /** Alias prefix to canonical prefix */
    readonly prefixRemapper = new Map<string, string>();
    /** Prefixes resolved by the executor before parseArgs and stored on the entry */
    readonly reservedPrefixes = new Set<string>();

    protected setName(name: string): void {
        this.name = name.toLowerCase();
    }

    protected setSyntax(syntax: string): void {
        this.syntax = syntax;
    }

    protected setRequiredArguments(min: number, max: number): void {
        this.minimumArguments = min;
        this.maximumArguments = max;
    }

    protected setPrefixesHandled(...prefixes: string[]): void {
        for (const prefix of prefixes) {
            this.prefixesHandled.add(prefix.toLowerCase());
        }
    }

    protected setBooleansHandled(...words: string[]): void {
        for (const word of words) {
            this.rawValuesHandled.add(word.toLowerCase());
        }
    }

    protected addRemappedPrefixes(target: string, ...aliases: string[]): void {
        for (const alias of aliases) {
            this.prefixRemapper.set(alias.toLowerCase(), target.toLowerCase());
        }
    }

    getUsageHint(): string {
        return `Usage: ${this.syntax || this.name}`;
    }

    /**
     * Read the entry's resolved arguments into entry objects.
     * The default accepts no free arguments.
     */
    parseArgs(entry: ScriptEntry): void {
        for (const arg of entry) {
            arg.reportUnhandled();
        }
    }

    abstract execute(entry: ScriptEntry): void;

    protected requireQueue(entry: ScriptEntry): ScriptQueue {
        const queue = entry.getResidingQueue();
        if (queue === null) {
            throw new ScriptRuntimeError(`The command '${this.name}' must run on a queue.`);
        }
        return queue;
    }

    /**
     * Run background work for a held entry. The result is applied, and the entry
     * finished, on a later heartbeat; a result for a stopped queue is dropped.
     */
    protected runHeld<T>(
        entry: ScriptEntry,
        work: () => Promise<T>,
        onDone: (result: T) => void,
        onError: (error: unknown) => void = error => {
            entry.engine.debug.echoError(`'${this.name}' failed: ${errorMessage(error)}`, entry.debugScope(), error);
        }
    ): void {
        const settle = (apply: () => void) => {
            const queue = entry.getResidingQueue();
            try {
                if (queue !== null && queue.state === 'stopped') {
                    entry.engine.debug.echoDebug(`Discarding '${this.name}' result: queue '${queue.id}' was stopped`, entry.debugScope());
                } else {
                    apply();
                }
            } finally {
                entry.markFinished();
            }
        };
        entry.engine.scheduler.runAsync(
            work,
            result => settle(() => onDone(result)),
            error => settle(() => onError(error))
        );
    }
}
