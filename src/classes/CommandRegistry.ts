import { AbstractCommand } from './AbstractCommand';
import { InvalidArgumentsError } from './exceptions';
import type { ScriptEntry } from './ScriptEntry';

/**
 * Stands in for unknown commands and for entries with a wrong argument count.
 * Its parse step always fails, so the entry is reported when it runs.
 */
class InvalidCommand extends AbstractCommand {
    constructor() {
        super();
        this.setName('invalid');
        this.isProcedural = true;
    }

    parseArgs(entry: ScriptEntry): void {
        const { internal } = entry;
        const intended = internal.intendedCommand;
        if (intended !== null) {
            const count = internal.preTaggedArgs.length;
            const range = intended.maximumArguments === Number.MAX_SAFE_INTEGER
                ? `at least ${intended.minimumArguments}`
                : intended.minimumArguments === intended.maximumArguments
                    ? `exactly ${intended.minimumArguments}`
                    : `${intended.minimumArguments} to ${intended.maximumArguments}`;
            throw new InvalidArgumentsError(
                `The command '${internal.command}' takes ${range} argument(s), but ${count} were given.`
            );
        }
        throw new InvalidArgumentsError(`Unknown command '${internal.command}'.`);
    }

    execute(): void {
        // parseArgs always throws
    }
}

/**
 * Case-insensitive command lookup
 */
export class CommandRegistry {
    readonly invalid: AbstractCommand = new InvalidCommand();
    private commands = new Map<string, AbstractCommand>();

    register(command: AbstractCommand): void {
        this.commands.set(command.name.toLowerCase(), command);
    }

    get(name: string): AbstractCommand | null {
        return this.commands.get(name.toLowerCase()) ?? null;
    }

    has(name: string): boolean {
        return this.commands.has(name.toLowerCase());
    }

    list(): AbstractCommand[] {
        return Array.from(this.commands.values());
    }
}
