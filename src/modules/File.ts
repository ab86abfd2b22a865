import { copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { copyFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type {
    CommandMetadata,
    CommandModule,
    ModuleMetadata
} from '../index';
import { AbstractCommand } from '../classes/AbstractCommand';
import type { EngineConfig } from '../classes/Config';
import { InvalidArgumentsError, ScriptRuntimeError } from '../classes/exceptions';
import type { ScriptEntry } from '../classes/ScriptEntry';
import { errorMessage, type Value } from '../utils';

/**
 * File module
 * Reads, writes and copies files under the configured data folder.
 * With `~` the work runs in the background and the queue waits for it;
 * otherwise it completes before the next entry runs.
 */

/**
 * Resolve a script path under the data folder, refusing paths that leave the configured limit
 */
export function resolveDataPath(config: EngineConfig, target: string): string {
    const base = path.resolve(config.dataFolder);
    const full = path.resolve(base, target);
    if (config.filePathLimit.toLowerCase() !== 'none') {
        const limit = path.resolve(base, config.filePathLimit);
        const relative = path.relative(limit, full);
        if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
            throw new ScriptRuntimeError(`Path '${target}' is outside the folder file commands may use.`);
        }
    }
    return full;
}

function toBytes(value: Value): Uint8Array {
    if (value instanceof Uint8Array) {
        return value;
    }
    return new Uint8Array(Buffer.from(typeof value === 'string' ? value : JSON.stringify(value), 'utf8'));
}

function requireAllowed(allowed: boolean, key: keyof EngineConfig, action: string): void {
    if (!allowed) {
        throw new ScriptRuntimeError(`${action} is disabled in the engine config (${key}).`);
    }
}

export class FileReadCommand extends AbstractCommand {
    constructor() {
        super();
        this.setName('fileread');
        this.setSyntax('fileread [path:<path>]');
        this.setRequiredArguments(1, 1);
        this.isHoldable = true;
        this.setPrefixesHandled('path');
    }

    parseArgs(entry: ScriptEntry): void {
        super.parseArgs(entry);
        entry.addObject('path', entry.requiredArgForPrefixAsText('path'));
    }

    execute(entry: ScriptEntry): void {
        const config = entry.engine.config;
        requireAllowed(config.allowFileRead, 'allowFileRead', 'Reading files');
        const target = entry.getElement('path') ?? '';
        const full = resolveDataPath(config, target);
        entry.engine.debug.report(this.name, { path: full }, entry.debugScope());

        if (entry.shouldWaitFor()) {
            this.runHeld(entry, () => readFile(full), data => {
                entry.addObject('data', new Uint8Array(data));
            });
            return;
        }
        try {
            entry.addObject('data', new Uint8Array(readFileSync(full)));
        } catch (error) {
            throw new ScriptRuntimeError(`Cannot read '${target}': ${errorMessage(error)}`);
        } finally {
            entry.markFinished();
        }
    }
}

export class FileWriteCommand extends AbstractCommand {
    constructor() {
        super();
        this.setName('filewrite');
        this.setSyntax('filewrite [path:<path>] [data:<binary>]');
        this.setRequiredArguments(2, 2);
        this.isHoldable = true;
        this.setPrefixesHandled('path', 'data');
    }

    parseArgs(entry: ScriptEntry): void {
        super.parseArgs(entry);
        entry.addObject('path', entry.requiredArgForPrefixAsText('path'));
        const data = entry.argForPrefix('data');
        if (data === null) {
            throw new InvalidArgumentsError("Missing 'data' argument!");
        }
        entry.addObject('data', toBytes(data.object));
    }

    execute(entry: ScriptEntry): void {
        const config = entry.engine.config;
        requireAllowed(config.allowFileWrite, 'allowFileWrite', 'Writing files');
        const target = entry.getElement('path') ?? '';
        const full = resolveDataPath(config, target);
        const data = toBytes(entry.getObject('data') ?? '');
        entry.engine.debug.report(this.name, { path: full, bytes: String(data.length) }, entry.debugScope());

        if (entry.shouldWaitFor()) {
            this.runHeld(entry, async () => {
                await mkdir(path.dirname(full), { recursive: true });
                await writeFile(full, data);
            }, () => undefined);
            return;
        }
        try {
            mkdirSync(path.dirname(full), { recursive: true });
            writeFileSync(full, data);
        } catch (error) {
            throw new ScriptRuntimeError(`Cannot write '${target}': ${errorMessage(error)}`);
        } finally {
            entry.markFinished();
        }
    }
}

export class FileCopyCommand extends AbstractCommand {
    constructor() {
        super();
        this.setName('filecopy');
        this.setSyntax('filecopy [origin:<path>] [destination:<path>] (overwrite)');
        this.setRequiredArguments(2, 3);
        this.isHoldable = true;
        this.setPrefixesHandled('origin', 'destination');
        this.setBooleansHandled('overwrite');
    }

    parseArgs(entry: ScriptEntry): void {
        super.parseArgs(entry);
        entry.addObject('origin', entry.requiredArgForPrefixAsText('origin'));
        entry.addObject('destination', entry.requiredArgForPrefixAsText('destination'));
        entry.addObject('overwrite', entry.argAsBoolean('overwrite'));
    }

    execute(entry: ScriptEntry): void {
        const config = entry.engine.config;
        requireAllowed(config.allowFileCopy, 'allowFileCopy', 'Copying files');
        const origin = resolveDataPath(config, entry.getElement('origin') ?? '');
        const destination = resolveDataPath(config, entry.getElement('destination') ?? '');
        const overwrite = entry.getObject('overwrite') === true;
        entry.engine.debug.report(this.name, { origin, destination, overwrite: String(overwrite) }, entry.debugScope());

        // a refused copy still completes, with success false
        let refusal: string | null = null;
        if (!existsSync(origin)) {
            refusal = `Cannot copy '${entry.getElement('origin')}': file does not exist.`;
        } else if (!overwrite && existsSync(destination)) {
            refusal = `Cannot copy to '${entry.getElement('destination')}': file exists and overwrite was not given.`;
        }
        if (refusal !== null) {
            entry.engine.debug.echoError(refusal, entry.debugScope());
            entry.addObject('success', false);
            entry.markFinished();
            return;
        }

        if (entry.shouldWaitFor()) {
            this.runHeld(entry, async () => {
                await mkdir(path.dirname(destination), { recursive: true });
                await copyFile(origin, destination);
            }, () => {
                entry.addObject('success', true);
            }, error => {
                entry.addObject('success', false);
                entry.engine.debug.echoError(`Cannot copy file: ${errorMessage(error)}`, entry.debugScope(), error);
            });
            return;
        }
        try {
            mkdirSync(path.dirname(destination), { recursive: true });
            copyFileSync(origin, destination);
            entry.addObject('success', true);
        } catch (error) {
            entry.addObject('success', false);
            entry.engine.debug.echoError(`Cannot copy file: ${errorMessage(error)}`, entry.debugScope(), error);
        } finally {
            entry.markFinished();
        }
    }
}

export const FileCommands: AbstractCommand[] = [
    new FileReadCommand(),
    new FileWriteCommand(),
    new FileCopyCommand()
];

export const FileCommandMetadata: Record<string, CommandMetadata> = {
    fileread: {
        description: 'Reads a file as binary data',
        parameters: [
            {
                name: 'path',
                prefix: 'path',
                dataType: 'string',
                description: 'File path, relative to the data folder',
                formInputType: 'file',
                required: true
            }
        ],
        saveKeys: ['data'],
        example: '~fileread path:notes.txt save:notes'
    },

    filewrite: {
        description: 'Writes binary data or text to a file, creating folders as needed',
        parameters: [
            {
                name: 'path',
                prefix: 'path',
                dataType: 'string',
                description: 'File path, relative to the data folder',
                formInputType: 'file',
                required: true
            },
            {
                name: 'data',
                prefix: 'data',
                dataType: 'binary',
                description: 'Content to write; text is written as UTF-8',
                formInputType: 'textarea',
                required: true
            }
        ],
        example: '~filewrite path:out.txt data:<element[hello].utf8_encode>'
    },

    filecopy: {
        description: 'Copies a file',
        parameters: [
            {
                name: 'origin',
                prefix: 'origin',
                dataType: 'string',
                description: 'File to copy',
                formInputType: 'file',
                required: true
            },
            {
                name: 'destination',
                prefix: 'destination',
                dataType: 'string',
                description: 'Where to copy it',
                formInputType: 'file',
                required: true
            },
            {
                name: 'overwrite',
                dataType: 'boolean',
                description: 'Replace the destination if it exists',
                formInputType: 'checkbox',
                required: false
            }
        ],
        saveKeys: ['success'],
        example: '~filecopy origin:a.txt destination:backup/a.txt overwrite save:copy'
    }
};

export const FileModuleMetadata: ModuleMetadata = {
    description: 'File access under the configured data folder',
    commands: Object.keys(FileCommandMetadata)
};

const FileModule: CommandModule = {
    name: 'file',
    commands: FileCommands,
    commandMetadata: FileCommandMetadata,
    moduleMetadata: FileModuleMetadata
};

export default FileModule;
