import type {
    CommandMetadata,
    CommandModule,
    ModuleMetadata
} from '../index';
import { AbstractCommand } from '../classes/AbstractCommand';
import { InvalidArgumentsError } from '../classes/exceptions';
import type { ScriptEntry } from '../classes/ScriptEntry';

/**
 * Core module
 * Script output through the engine's diagnostics sink
 */

const DEBUG_TYPES = ['log', 'echo', 'error'];

export class DebugCommand extends AbstractCommand {
    constructor() {
        super();
        this.setName('debug');
        this.setSyntax('debug (log/echo/error) [<message>]');
        this.setRequiredArguments(1, Number.MAX_SAFE_INTEGER);
        this.isProcedural = true;
    }

    parseArgs(entry: ScriptEntry): void {
        const args = entry.getProcessedArgs();
        let words = args;
        const [first] = args;
        if (args.length > 1 && first.prefix === null && first.matches(...DEBUG_TYPES)) {
            entry.addObject('type', first.rawValue.toLowerCase());
            words = args.slice(1);
        }
        if (words.length === 0) {
            throw new InvalidArgumentsError('Must specify a message!');
        }
        entry.defaultObject('type', 'log');
        entry.addObject('message', words.map(arg => arg.toString()).join(' '));
    }

    execute(entry: ScriptEntry): void {
        const debug = entry.engine.debug;
        const message = entry.getElement('message') ?? '';
        const scope = entry.debugScope();
        switch (entry.getElement('type')) {
            case 'echo':
                debug.echoDebug(message, scope);
                break;
            case 'error':
                debug.echoError(message, scope);
                break;
            default:
                debug.log(message, scope);
        }
    }
}

export const CoreCommands: AbstractCommand[] = [
    new DebugCommand()
];

export const CoreCommandMetadata: Record<string, CommandMetadata> = {
    debug: {
        description: 'Writes a message to the diagnostics sink',
        parameters: [
            {
                name: 'type',
                dataType: 'string',
                description: 'log (always shown), echo (verbose mode only) or error',
                formInputType: 'select',
                required: false,
                defaultValue: 'log'
            },
            {
                name: 'message',
                label: 'Message',
                dataType: 'string',
                description: 'Words to write; tags are filled in',
                formInputType: 'text',
                required: true
            }
        ],
        example: 'debug log "Count is <[count]>"'
    }
};

export const CoreModuleMetadata: ModuleMetadata = {
    description: 'Script output',
    commands: Object.keys(CoreCommandMetadata)
};

const CoreModule: CommandModule = {
    name: 'core',
    commands: CoreCommands,
    commandMetadata: CoreCommandMetadata,
    moduleMetadata: CoreModuleMetadata
};

export default CoreModule;
