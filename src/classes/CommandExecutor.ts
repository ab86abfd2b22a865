import type { CueScript } from '../index';
import { errorMessage } from '../utils';
import { InvalidArgumentsError, ScriptRuntimeError } from './exceptions';
import type { ScriptEntry } from './ScriptEntry';

/**
 * Runs one entry: meta arguments, then the handler's parse and execute steps
 */
export class CommandExecutor {
    private readonly engine: CueScript;

    constructor(engine: CueScript) {
        this.engine = engine;
    }

    /**
     * @returns true when the entry ran or was skipped by `if:`, false when it failed
     */
    execute(entry: ScriptEntry): boolean {
        const debug = this.engine.debug;
        const command = entry.command;
        entry.updateContext();
        const queue = entry.getResidingQueue();
        const scope = entry.debugScope();

        debug.queueExecute(entry.toString(), scope);

        if (queue !== null && queue.procedural && !command.isProcedural) {
            debug.echoError(`The command '${entry.internal.command}' cannot be used in a procedure.`, scope);
            entry.markFinished();
            return false;
        }

        try {
            let saveName: string | null = null;
            for (const meta of entry.internal.preprocArgs) {
                const arg = entry.resolveArgument(meta);
                const prefix = (arg.prefix ?? '').toLowerCase();
                if (prefix === 'if') {
                    const outcome = arg.rawValue.toLowerCase();
                    if (outcome !== 'true' && outcome !== '!false') {
                        debug.echoDebug(`Skipping '${entry.internal.command}': if:${arg.rawValue}`, scope);
                        entry.markFinished();
                        return true;
                    }
                } else if (prefix === 'save') {
                    saveName = arg.rawValue;
                } else {
                    entry.addObject(prefix, arg.object);
                }
            }

            entry.resolveArguments();
            command.parseArgs(entry);
            command.execute(entry);

            if (saveName !== null) {
                entry.getResidingQueue()?.holdScriptEntry(saveName, entry);
            }
            if (!command.isHoldable) {
                entry.markFinished();
            }
            return true;
        } catch (error) {
            if (error instanceof InvalidArgumentsError) {
                debug.echoError(
                    `Invalid arguments were specified!\n${error.message}\n${entry.getUsageHint()}`,
                    scope,
                    error
                );
            } else if (error instanceof ScriptRuntimeError) {
                debug.echoError(error.message, scope, error);
            } else {
                debug.echoError(`Internal error running '${entry.internal.command}': ${errorMessage(error)}`, scope, error);
            }
            entry.markFinished();
            return false;
        }
    }
}
