import type { CueScript } from '../index';
import type { Value } from '../utils';
import type { ScriptContainer } from './ScriptContainer';
import type { ScriptEntry } from './ScriptEntry';

export type QueueState = 'idle' | 'running' | 'paused' | 'stopped' | 'finished';

export type CompletionListener = (queue: ScriptQueue) => void;

export interface QueueOptions {
    /** Reuse an id, as a timed queue does when it replaces an instant one */
    id?: string;
    procedural?: boolean;
    script?: ScriptContainer | null;
}

/**
 * A list of pending entries and the definitions, saved entries and
 * determinations they share. Subclasses decide how far each heartbeat advances.
 */
export abstract class ScriptQueue {
    readonly id: string;
    readonly name: string;
    readonly debugId: number;
    state: QueueState = 'idle';
    procedural: boolean;
    script: ScriptContainer | null;
    determinations: Value[] | null = null;
    lastEntryExecuted: ScriptEntry | null = null;
    /** Set when this queue was converted and another one carries on its entries */
    replacedBy: ScriptQueue | null = null;

    protected readonly engine: CueScript;
    protected entries: ScriptEntry[] = [];
    private definitions = new Map<string, Value>();
    private heldEntries = new Map<string, ScriptEntry>();
    private completionListeners: CompletionListener[] = [];

    constructor(engine: CueScript, name: string, options: QueueOptions = {}) {
        this.engine = engine;
        this.name = name;
        this.id = options.id ?? engine.queues.generateId(name);
        this.debugId = engine.queues.nextDebugId();
        this.procedural = options.procedural ?? false;
        this.script = options.script ?? null;
    }

    abstract get type(): 'instant' | 'timed';

    /**
     * Called once per scheduler heartbeat while the queue is registered
     */
    abstract heartbeat(): void;

    protected abstract onStart(): void;

    // Definitions

    getDefinition(name: string): Value | undefined {
        return this.definitions.get(name.toLowerCase());
    }

    addDefinition(name: string, value: Value): void {
        this.definitions.set(name.toLowerCase(), value);
    }

    removeDefinition(name: string): void {
        this.definitions.delete(name.toLowerCase());
    }

    hasDefinition(name: string): boolean {
        return this.definitions.has(name.toLowerCase());
    }

    getAllDefinitions(): Map<string, Value> {
        return new Map(this.definitions);
    }

    // Saved entries and determinations

    holdScriptEntry(name: string, entry: ScriptEntry): void {
        this.heldEntries.set(name.toLowerCase(), entry);
    }

    getHeldScriptEntry(name: string): ScriptEntry | null {
        return this.heldEntries.get(name.toLowerCase()) ?? null;
    }

    addDetermination(value: Value): void {
        if (this.determinations === null) {
            this.determinations = [];
        }
        this.determinations.push(value);
    }

    // Pending entries

    addEntries(entries: ScriptEntry[]): this {
        for (const entry of entries) {
            entry.queue = this;
        }
        this.entries.push(...entries);
        return this;
    }

    /**
     * Put entries at the head of the list, keeping their order
     */
    injectEntriesAtStart(entries: ScriptEntry[]): this {
        for (const entry of entries) {
            entry.queue = this;
        }
        this.entries.unshift(...entries);
        return this;
    }

    removeFirst(): ScriptEntry | null {
        return this.entries.shift() ?? null;
    }

    getEntry(index: number): ScriptEntry | null {
        return this.entries[index] ?? null;
    }

    getQueueSize(): number {
        return this.entries.length;
    }

    clear(): void {
        this.entries = [];
    }

    // Lifecycle

    onComplete(listener: CompletionListener): void {
        if (this.isEnded()) {
            listener(this);
            return;
        }
        this.completionListeners.push(listener);
    }

    isRunning(): boolean {
        return this.state === 'running';
    }

    isEnded(): boolean {
        return this.state === 'stopped' || this.state === 'finished';
    }

    start(): void {
        if (this.state !== 'idle') {
            return;
        }
        this.state = 'running';
        this.engine.queues.register(this);
        this.engine.debug.echoDebug(`Starting ${this.type} queue '${this.id}' with ${this.entries.length} entries`, { queueId: this.id });
        this.onStart();
    }

    pause(): void {
        if (this.state === 'running') {
            this.state = 'paused';
        }
    }

    resume(): void {
        if (this.state === 'paused') {
            this.state = 'running';
        }
    }

    /**
     * End the queue early. Pending entries are dropped; background work still
     * running for it will find the queue stopped and discard its result.
     */
    stop(): void {
        if (this.isEnded()) {
            return;
        }
        this.state = 'stopped';
        this.entries = [];
        this.complete();
    }

    /**
     * The pending list ran out
     */
    protected finish(): void {
        if (this.isEnded()) {
            return;
        }
        this.state = 'finished';
        this.complete();
    }

    private complete(): void {
        this.engine.queues.unregister(this);
        this.engine.debug.echoDebug(`Completed queue '${this.id}' (${this.state})`, { queueId: this.id });
        const listeners = this.completionListeners;
        this.completionListeners = [];
        for (const listener of listeners) {
            listener(this);
        }
    }

    /**
     * Run one entry through the executor
     */
    protected runEntry(entry: ScriptEntry): boolean {
        this.lastEntryExecuted = entry;
        return this.engine.executor.execute(entry);
    }

    /**
     * Whether the last entry holds the queue until its background work is done
     */
    protected isWaiting(): boolean {
        return this.lastEntryExecuted !== null && this.lastEntryExecuted.shouldWaitFor();
    }

    /**
     * Take over another queue's pending entries and shared state. The old queue
     * is marked replaced and ends without notifying its listeners, which move here.
     */
    adoptFrom(old: ScriptQueue): void {
        this.addEntries(old.entries);
        old.entries = [];
        this.definitions = old.definitions;
        this.heldEntries = old.heldEntries;
        this.determinations = old.determinations;
        this.procedural = old.procedural;
        this.script = old.script;
        this.lastEntryExecuted = old.lastEntryExecuted;
        this.completionListeners = old.completionListeners;
        old.completionListeners = [];
        old.replacedBy = this;
        old.state = 'stopped';
    }

    toString(): string {
        return `${this.type} queue '${this.id}'`;
    }
}
