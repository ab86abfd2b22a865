import type { CueScript } from '../index';
import type { ScriptEntry } from './ScriptEntry';

export type ScriptType = 'task' | 'procedure';

export interface ScriptOptions {
    type?: ScriptType;
    /** Names bound, in order, to the values a run or procedure call passes in */
    definitions?: string[];
    /** Set false to silence trace output for this script */
    debug?: boolean;
}

/**
 * A named script. Its entries are preprocessed once and cloned for every run.
 */
export class ScriptContainer {
    readonly name: string;
    readonly source: string;
    readonly type: ScriptType;
    readonly definitions: string[];
    debug: boolean;

    private readonly engine: CueScript;
    private baseEntries: ScriptEntry[] | null = null;

    constructor(engine: CueScript, name: string, source: string, options: ScriptOptions = {}) {
        this.engine = engine;
        this.name = name;
        this.source = source;
        this.type = options.type ?? 'task';
        this.definitions = options.definitions ?? [];
        this.debug = options.debug ?? true;
    }

    getBaseEntries(): ScriptEntry[] {
        if (this.baseEntries === null) {
            this.baseEntries = this.engine.loader.buildEntries(this.source, this);
        }
        return this.baseEntries;
    }

    /**
     * Fresh entries for one run
     */
    getEntries(): ScriptEntry[] {
        return this.getBaseEntries().map(entry => entry.clone());
    }
}
