import { AbstractCommand } from './AbstractCommand';
import type { BracedData, ScriptEntry } from './ScriptEntry';

/**
 * A command that owns `{ ... }` blocks of further commands
 */
export abstract class BracedCommand extends AbstractCommand {
    constructor() {
        super();
        this.isBraced = true;
    }

    /**
     * Fresh copies of the entry's blocks, owned by the entry and bound to its queue
     */
    getBracedCommands(entry: ScriptEntry): BracedData[] {
        const queue = entry.getResidingQueue();
        return (entry.internal.bracedSet ?? []).map(block => ({
            key: block.key,
            args: block.args,
            entries: block.entries.map(base => {
                const copy = base.clone();
                copy.owner = entry;
                copy.queue = queue;
                return copy;
            })
        }));
    }
}
