import type {
    CommandMetadata,
    CommandModule,
    ModuleMetadata
} from '../index';
import { AbstractCommand } from '../classes/AbstractCommand';
import { BracedCommand } from '../classes/BracedCommand';
import { DeltaTimeDelayTracker, SystemTimeDelayTracker } from '../classes/DelayTracker';
import { InvalidArgumentsError, ScriptRuntimeError } from '../classes/exceptions';
import { ScriptEntry } from '../classes/ScriptEntry';
import type { ScriptQueue } from '../classes/ScriptQueue';
import { TimedQueue } from '../classes/TimedQueue';
import {
    asBoolean,
    asNumber,
    describeValue,
    formatDuration,
    parseListArgument,
    valueToString,
    type Value
} from '../utils';

/**
 * Queue module
 * Commands that control the queue they run on: definitions, blocks, loops, delays
 */

// ============================================================================
// define / determine / stop
// ============================================================================

export class DefineCommand extends AbstractCommand {
    constructor() {
        super();
        this.setName('define');
        this.setSyntax('define [<id>](:<value>)');
        this.setRequiredArguments(1, 2);
        this.isProcedural = true;
        this.allowedDynamicPrefixes = true;
    }

    parseArgs(entry: ScriptEntry): void {
        for (const arg of entry) {
            if (!entry.hasObject('definition')) {
                if (arg.prefix !== null) {
                    entry.addObject('definition', arg.prefix);
                    entry.addObject('value', arg.object);
                } else {
                    entry.addObject('definition', arg.rawValue);
                }
            } else if (!entry.hasObject('value')) {
                entry.addObject('value', arg.object);
            } else {
                arg.reportUnhandled();
            }
        }
        if (!entry.hasObject('definition')) {
            throw new InvalidArgumentsError('Must specify a definition name!');
        }
    }

    execute(entry: ScriptEntry): void {
        const queue = this.requireQueue(entry);
        const name = entry.getElement('definition') ?? '';
        const value = entry.getObject('value');
        entry.engine.debug.report(this.name, {
            definition: name,
            value: value === undefined ? '(removed)' : describeValue(value)
        }, entry.debugScope());
        if (value === undefined) {
            queue.removeDefinition(name);
        } else {
            queue.addDefinition(name, value);
        }
    }
}

export class DetermineCommand extends AbstractCommand {
    constructor() {
        super();
        this.setName('determine');
        this.setSyntax('determine (passively) [<value>]');
        this.setRequiredArguments(1, 2);
        this.isProcedural = true;
    }

    parseArgs(entry: ScriptEntry): void {
        for (const arg of entry) {
            if (!entry.hasObject('passively') && arg.prefix === null && arg.matches('passively')) {
                entry.addObject('passively', true);
            } else if (!entry.hasObject('outcome')) {
                entry.addObject('outcome', arg.object);
            } else {
                arg.reportUnhandled();
            }
        }
        entry.defaultObject('outcome', 'none');
        entry.defaultObject('passively', false);
    }

    execute(entry: ScriptEntry): void {
        const queue = this.requireQueue(entry);
        const outcome = entry.getObject('outcome') ?? 'none';
        const passively = entry.getObject('passively') === true;
        entry.engine.debug.report(this.name, {
            outcome: describeValue(outcome),
            passively: String(passively)
        }, entry.debugScope());
        queue.addDetermination(outcome);
        if (!passively) {
            queue.clear();
            queue.stop();
        }
    }
}

export class StopCommand extends AbstractCommand {
    constructor() {
        super();
        this.setName('stop');
        this.setSyntax('stop');
        this.setRequiredArguments(0, 0);
        this.isProcedural = true;
    }

    execute(entry: ScriptEntry): void {
        const queue = this.requireQueue(entry);
        queue.clear();
        queue.stop();
    }
}

// ============================================================================
// if
// ============================================================================

const COMPARISON_OPERATORS = ['==', '!=', '<', '>', '<=', '>='];

function splitOn(tokens: string[], separator: string): string[][] {
    const groups: string[][] = [[]];
    for (const token of tokens) {
        if (token === separator) {
            groups.push([]);
        } else {
            groups[groups.length - 1].push(token);
        }
    }
    return groups;
}

function valuesEqual(left: Value, right: Value): boolean {
    const leftNumber = asNumber(left);
    const rightNumber = asNumber(right);
    if (leftNumber !== null && rightNumber !== null) {
        return leftNumber === rightNumber;
    }
    return valueToString(left).toLowerCase() === valueToString(right).toLowerCase();
}

export class IfCommand extends BracedCommand {
    constructor() {
        super();
        this.setName('if');
        this.setSyntax('if [<value>] (!)(<operator> <value>) (&&/|| ...) [<commands>] (else (if <comparison>) [<commands>])');
        this.setRequiredArguments(1, Number.MAX_SAFE_INTEGER);
        this.isProcedural = true;
    }

    parseArgs(entry: ScriptEntry): void {
        if (!entry.internal.hasBraces) {
            throw new InvalidArgumentsError('Must have a block of commands to run!');
        }
    }

    execute(entry: ScriptEntry): void {
        const queue = this.requireQueue(entry);
        const blocks = this.getBracedCommands(entry);
        for (let i = 0; i < blocks.length; i++) {
            const block = blocks[i];
            let condition: string[] | null = block.args;
            if (i > 0) {
                const [first, second, ...rest] = block.args;
                if (first === undefined || first.toLowerCase() !== 'else') {
                    throw new ScriptRuntimeError(`Expected 'else' before the next block, found '${block.args.join(' ')}'.`);
                }
                if (second === undefined) {
                    condition = null;
                } else if (second.toLowerCase() === 'if') {
                    condition = rest;
                } else {
                    throw new ScriptRuntimeError(`Expected 'else' or 'else if', found '${block.args.join(' ')}'.`);
                }
            }
            if (condition === null || this.evaluate(entry, condition)) {
                entry.engine.debug.report(this.name, { branch: String(i + 1), entries: String(block.entries.length) }, entry.debugScope());
                queue.injectEntriesAtStart(block.entries);
                return;
            }
        }
        entry.engine.debug.report(this.name, { branch: 'none' }, entry.debugScope());
    }

    /**
     * `||` binds looser than `&&`; each part is a value or a comparison
     */
    evaluate(entry: ScriptEntry, tokens: string[]): boolean {
        if (tokens.length === 0) {
            throw new InvalidArgumentsError('Missing condition!');
        }
        return splitOn(tokens, '||').some(group =>
            splitOn(group, '&&').every(part => this.compare(entry, part)));
    }

    private compare(entry: ScriptEntry, tokens: string[]): boolean {
        if (tokens.length === 0) {
            throw new InvalidArgumentsError('Empty condition around && or ||');
        }
        const opIndex = tokens.findIndex(token => COMPARISON_OPERATORS.includes(token));
        if (opIndex === -1) {
            const text = tokens.join(' ');
            const negate = text.startsWith('!');
            const value = entry.resolveText(negate ? text.slice(1) : text);
            const result = asBoolean(value) === true;
            return negate ? !result : result;
        }

        const operator = tokens[opIndex];
        const left = entry.resolveText(tokens.slice(0, opIndex).join(' '));
        const right = entry.resolveText(tokens.slice(opIndex + 1).join(' '));
        if (operator === '==') {
            return valuesEqual(left, right);
        }
        if (operator === '!=') {
            return !valuesEqual(left, right);
        }
        const leftNumber = asNumber(left);
        const rightNumber = asNumber(right);
        if (leftNumber === null || rightNumber === null) {
            throw new ScriptRuntimeError(`Cannot compare ${describeValue(left)} ${operator} ${describeValue(right)}: both sides must be numbers.`);
        }
        switch (operator) {
            case '<':
                return leftNumber < rightNumber;
            case '>':
                return leftNumber > rightNumber;
            case '<=':
                return leftNumber <= rightNumber;
            default:
                return leftNumber >= rightNumber;
        }
    }
}

// ============================================================================
// repeat
// ============================================================================

export const CALLBACK_MARKER = '\0callback';

/**
 * Loop state, kept on the repeat entry and reached from its callback marker through `owner`
 */
export class RepeatData {
    index: number;
    readonly target: number;
    readonly valueName: string;
    /** Binding of the loop variable before the loop, undefined when there was none */
    readonly originalValue: Value | undefined;

    constructor(from: number, amount: number, valueName: string, originalValue: Value | undefined) {
        this.index = from;
        this.target = from + amount - 1;
        this.valueName = valueName;
        this.originalValue = originalValue;
    }

    restore(queue: ScriptQueue): void {
        if (this.originalValue === undefined) {
            queue.removeDefinition(this.valueName);
        } else {
            queue.addDefinition(this.valueName, this.originalValue);
        }
    }
}

export function isCallbackMarker(entry: ScriptEntry): boolean {
    const args = entry.internal.originalArgs;
    return entry.internal.command === 'repeat' && args.length === 1 && args[0] === CALLBACK_MARKER;
}

export class RepeatCommand extends BracedCommand {
    constructor() {
        super();
        this.setName('repeat');
        this.setSyntax('repeat [stop/next/<amount>] (from:<#>) (as:<name>) [<commands>]');
        this.setRequiredArguments(1, 3);
        this.isProcedural = true;
        this.setPrefixesHandled('from', 'as');
        this.setBooleansHandled('stop', 'next', CALLBACK_MARKER);
    }

    parseArgs(entry: ScriptEntry): void {
        for (const arg of entry) {
            if (!entry.hasObject('quantity') && arg.prefix === null && arg.matchesInteger()) {
                entry.addObject('quantity', arg.asInt());
            } else {
                arg.reportUnhandled();
            }
        }
        const control = entry.argAsBoolean('stop') || entry.argAsBoolean('next') || entry.argAsBoolean(CALLBACK_MARKER);
        if (!control && !entry.hasObject('quantity')) {
            throw new InvalidArgumentsError('Must specify a quantity, or stop or next!');
        }
        const from = entry.argForPrefix('from');
        entry.addObject('from', from === null ? 1 : from.asInt());
        entry.addObject('as', entry.argForPrefixAsText('as', 'value'));
    }

    execute(entry: ScriptEntry): void {
        const queue = this.requireQueue(entry);
        if (entry.argAsBoolean('stop')) {
            this.endLoop(entry, queue, true);
        } else if (entry.argAsBoolean('next')) {
            this.endLoop(entry, queue, false);
        } else if (entry.argAsBoolean(CALLBACK_MARKER)) {
            this.iterate(entry, queue);
        } else {
            this.startLoop(entry, queue);
        }
    }

    private startLoop(entry: ScriptEntry, queue: ScriptQueue): void {
        const amount = Number(entry.getObject('quantity'));
        const from = Number(entry.getObject('from'));
        const valueName = entry.getElement('as') ?? 'value';
        entry.engine.debug.report(this.name, { quantity: String(amount), from: String(from), as: valueName }, entry.debugScope());
        if (amount <= 0) {
            return;
        }
        const blocks = this.getBracedCommands(entry);
        if (blocks.length === 0 || blocks[0].entries.length === 0) {
            throw new ScriptRuntimeError('Empty subsection - did you forget a { or a - ?');
        }
        const data = new RepeatData(from, amount, valueName, queue.getDefinition(valueName));
        entry.data = data;
        queue.addDefinition(valueName, data.index);
        this.inject(entry, queue, blocks[0].entries);
    }

    private iterate(callback: ScriptEntry, queue: ScriptQueue): void {
        const owner = callback.owner;
        const data = owner?.data;
        if (owner === null || !(data instanceof RepeatData)) {
            throw new ScriptRuntimeError('Loop callback has no loop to continue.');
        }
        data.index++;
        if (data.index <= data.target) {
            queue.addDefinition(data.valueName, data.index);
            this.inject(owner, queue, this.getBracedCommands(owner)[0].entries);
        } else {
            data.restore(queue);
        }
    }

    /**
     * Drop pending entries up to the loop's callback marker. `stop` removes the
     * marker and restores the loop variable; `next` leaves the marker to run.
     */
    private endLoop(entry: ScriptEntry, queue: ScriptQueue, stop: boolean): void {
        for (let i = 0; i < queue.getQueueSize(); i++) {
            const pending = queue.getEntry(i);
            if (pending === null || !isCallbackMarker(pending)) {
                continue;
            }
            const remove = stop ? i + 1 : i;
            for (let n = 0; n < remove; n++) {
                queue.removeFirst();
            }
            const data = pending.owner?.data;
            if (stop && data instanceof RepeatData) {
                data.restore(queue);
            }
            entry.engine.debug.report(this.name, { [stop ? 'stop' : 'next']: `skipped ${i} entries` }, entry.debugScope());
            return;
        }
        throw new ScriptRuntimeError(`Cannot ${stop ? 'stop' : 'skip'} repeat: not inside a loop!`);
    }

    private inject(owner: ScriptEntry, queue: ScriptQueue, body: ScriptEntry[]): void {
        const callback = ScriptEntry.create(owner.engine, 'repeat', [CALLBACK_MARKER], owner.internal.script, owner.internal.lineNumber);
        callback.owner = owner;
        const entries = [...body, callback];
        for (const injected of entries) {
            injected.setInstant(true);
        }
        queue.injectEntriesAtStart(entries);
    }
}

// ============================================================================
// wait / run
// ============================================================================

export class WaitCommand extends AbstractCommand {
    constructor() {
        super();
        this.setName('wait');
        this.setSyntax('wait (<duration>) (queue:<name>) (system)');
        this.setRequiredArguments(0, 3);
        this.setPrefixesHandled('queue');
        this.setBooleansHandled('system');
    }

    parseArgs(entry: ScriptEntry): void {
        for (const arg of entry) {
            if (!entry.hasObject('delay') && arg.prefix === null && arg.matchesDuration()) {
                entry.addObject('delay', arg.asDuration());
            } else {
                arg.reportUnhandled();
            }
        }
        entry.defaultObject('delay', 3000);
    }

    execute(entry: ScriptEntry): void {
        const engine = entry.engine;
        const delay = Number(entry.getObject('delay'));
        const queueId = entry.argForPrefixAsText('queue');
        let queue: ScriptQueue | null;
        if (queueId === null) {
            queue = this.requireQueue(entry);
        } else {
            queue = engine.queues.get(queueId);
            if (queue === null) {
                throw new ScriptRuntimeError(`Queue '${queueId}' does not exist or has ended.`);
            }
        }
        const system = entry.argAsBoolean('system');
        engine.debug.report(this.name, {
            delay: formatDuration(delay),
            queue: queue.id,
            clock: system ? 'system' : 'delta'
        }, entry.debugScope());

        const tracker = system
            ? new SystemTimeDelayTracker(delay)
            : new DeltaTimeDelayTracker(engine.scheduler, delay);
        if (queue instanceof TimedQueue) {
            queue.delayFor(tracker);
        } else {
            engine.forceToTimed(queue, tracker);
        }
    }
}

export class RunCommand extends AbstractCommand {
    constructor() {
        super();
        this.setName('run');
        this.setSyntax('run [<script>] (def:<element>|...) (id:<name>) (instant) (speed:<duration>)');
        this.setRequiredArguments(1, 5);
        this.isHoldable = true;
        this.setPrefixesHandled('def', 'id', 'speed');
        this.setBooleansHandled('instant');
    }

    parseArgs(entry: ScriptEntry): void {
        for (const arg of entry) {
            if (!entry.hasObject('script') && arg.prefix === null) {
                entry.addObject('script', arg.rawValue);
            } else {
                arg.reportUnhandled();
            }
        }
        if (!entry.hasObject('script')) {
            throw new InvalidArgumentsError('Must specify a script to run!');
        }
        const speed = entry.argForPrefix('speed');
        if (speed !== null) {
            entry.addObject('speed', speed.asDuration());
        }
    }

    execute(entry: ScriptEntry): void {
        const engine = entry.engine;
        const name = entry.getElement('script') ?? '';
        if (engine.getScript(name) === null) {
            throw new ScriptRuntimeError(`Script '${name}' does not exist.`);
        }
        const id = entry.argForPrefixAsText('id');
        if (id !== null && engine.queues.has(id)) {
            throw new ScriptRuntimeError(`A queue with id '${id}' is already running.`);
        }
        const defArg = entry.argForPrefix('def');
        const speed = entry.getObject('speed');
        const type = speed !== undefined ? 'timed' : entry.argAsBoolean('instant') ? 'instant' : engine.config.defaultQueueType;

        const queue = engine.runScript(name, {
            type,
            id: id ?? undefined,
            speedMillis: speed === undefined ? undefined : Number(speed),
            args: defArg === null ? [] : parseListArgument(defArg.object),
            start: false
        });
        entry.addObject('created_queue', queue.id);
        engine.debug.report(this.name, { script: name, queue: queue.id, type }, entry.debugScope());

        if (entry.shouldWaitFor()) {
            queue.onComplete(() => entry.markFinished());
        } else {
            entry.markFinished();
        }
        queue.start();
    }
}

export const QueueCommands: AbstractCommand[] = [
    new DefineCommand(),
    new DetermineCommand(),
    new StopCommand(),
    new IfCommand(),
    new RepeatCommand(),
    new WaitCommand(),
    new RunCommand()
];

export const QueueCommandMetadata: Record<string, CommandMetadata> = {
    define: {
        description: 'Sets a definition on the current queue, or removes it when no value is given',
        parameters: [
            {
                name: 'id',
                dataType: 'string',
                description: 'Definition name, optionally followed by :value',
                formInputType: 'text',
                required: true
            },
            {
                name: 'value',
                dataType: 'any',
                description: 'Value to store',
                formInputType: 'text',
                required: false
            }
        ],
        example: 'define count:3'
    },

    determine: {
        description: 'Adds a determination to the queue and, unless passively, ends the queue',
        parameters: [
            {
                name: 'passively',
                dataType: 'boolean',
                description: 'Keep running after determining',
                formInputType: 'checkbox',
                required: false
            },
            {
                name: 'value',
                dataType: 'any',
                description: 'The determined value',
                formInputType: 'text',
                required: true
            }
        ],
        example: 'determine <[a].add[<[b]>]>'
    },

    stop: {
        description: 'Stops the current queue',
        parameters: [],
        example: 'stop'
    },

    if: {
        description: 'Runs the first block whose condition holds',
        parameters: [
            {
                name: 'condition',
                dataType: 'string',
                description: 'A value, or two values around ==, !=, <, >, <=, >=, joined by && and ||',
                formInputType: 'code',
                required: true
            }
        ],
        example: 'if <[count]> > 2 {'
    },

    repeat: {
        description: 'Runs the block a number of times, binding the loop index to a definition',
        parameters: [
            {
                name: 'amount',
                dataType: 'number',
                description: 'Number of iterations, or stop / next inside a loop',
                formInputType: 'number',
                required: true
            },
            {
                name: 'from',
                prefix: 'from',
                dataType: 'number',
                description: 'First index',
                formInputType: 'number',
                required: false,
                defaultValue: 1
            },
            {
                name: 'as',
                prefix: 'as',
                dataType: 'string',
                description: 'Definition that holds the index',
                formInputType: 'text',
                required: false,
                defaultValue: 'value'
            }
        ],
        example: 'repeat 5 as:i {'
    },

    wait: {
        description: 'Delays the queue, converting it to a timed queue when needed',
        parameters: [
            {
                name: 'duration',
                dataType: 'duration',
                description: 'How long to wait',
                formInputType: 'text',
                required: false,
                defaultValue: '3s'
            },
            {
                name: 'queue',
                prefix: 'queue',
                dataType: 'string',
                description: 'Queue to delay instead of the current one',
                formInputType: 'text',
                required: false
            },
            {
                name: 'system',
                dataType: 'boolean',
                description: 'Count wall-clock time instead of heartbeat time',
                formInputType: 'checkbox',
                required: false
            }
        ],
        example: 'wait 2s'
    },

    run: {
        description: 'Starts a script on a new queue; with ~ the current queue waits for it',
        parameters: [
            {
                name: 'script',
                dataType: 'string',
                description: 'Name of the script',
                formInputType: 'text',
                required: true
            },
            {
                name: 'def',
                prefix: 'def',
                dataType: 'list',
                description: 'Values bound to the script definitions, in order',
                formInputType: 'text',
                required: false
            },
            {
                name: 'id',
                prefix: 'id',
                dataType: 'string',
                description: 'Id for the new queue',
                formInputType: 'text',
                required: false
            },
            {
                name: 'instant',
                dataType: 'boolean',
                description: 'Run on an instant queue',
                formInputType: 'checkbox',
                required: false
            },
            {
                name: 'speed',
                prefix: 'speed',
                dataType: 'duration',
                description: 'Run on a timed queue with this pause between entries',
                formInputType: 'text',
                required: false
            }
        ],
        saveKeys: ['created_queue'],
        example: '~run greet def:world save:greeting'
    }
};

export const QueueModuleMetadata: ModuleMetadata = {
    description: 'Definitions, blocks, loops, delays and sub-scripts on the current queue',
    commands: Object.keys(QueueCommandMetadata)
};

const QueueModule: CommandModule = {
    name: 'queue',
    commands: QueueCommands,
    commandMetadata: QueueCommandMetadata,
    moduleMetadata: QueueModuleMetadata
};

export default QueueModule;
