import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type {
    CommandMetadata,
    CommandModule,
    ModuleMetadata
} from '../index';
import { AbstractCommand } from '../classes/AbstractCommand';
import { InvalidArgumentsError, ScriptRuntimeError } from '../classes/exceptions';
import type { ScriptEntry } from '../classes/ScriptEntry';
import { errorMessage, formatDuration, parseMapArgument, type Value } from '../utils';
import { resolveDataPath } from './File';

/**
 * Web module
 * HTTP requests through the global fetch API. The request always runs in the
 * background; with `~` the queue waits for the response.
 */

const METHODS = ['GET', 'POST', 'HEAD', 'OPTIONS', 'PUT', 'DELETE', 'PATCH'];

interface WebRequest {
    url: string;
    method: string;
    headers: Record<string, string>;
    body: string | Uint8Array | undefined;
    timeoutMillis: number;
    saveFile: string | null;
}

interface WebResponse {
    status: number | null;
    failed: boolean;
    body: Uint8Array;
    headers: Record<string, string>;
    timeRan: number;
    error: string | null;
}

const toBody = (value: Value): string | Uint8Array => {
    if (value instanceof Uint8Array) {
        return value;
    }
    return typeof value === 'string' ? value : JSON.stringify(value);
};

const performRequest = async (request: WebRequest): Promise<WebResponse> => {
    const started = performance.now();
    const result: WebResponse = {
        status: null,
        failed: true,
        body: new Uint8Array(0),
        headers: {},
        timeRan: 0,
        error: null
    };
    try {
        const response = await fetch(request.url, {
            method: request.method,
            headers: request.headers,
            body: request.body,
            signal: AbortSignal.timeout(request.timeoutMillis)
        });
        result.status = response.status;
        result.failed = !response.ok;
        response.headers.forEach((value, key) => {
            result.headers[key] = value;
        });
        result.body = new Uint8Array(await response.arrayBuffer());
        if (!response.ok) {
            result.error = `HTTP ${response.status} ${response.statusText}`.trim();
        }
    } catch (error) {
        result.error = errorMessage(error);
    }
    result.timeRan = Math.round(performance.now() - started);

    if (!result.failed && request.saveFile !== null) {
        await mkdir(path.dirname(request.saveFile), { recursive: true });
        await writeFile(request.saveFile, result.body);
    }
    return result;
};

export class WebGetCommand extends AbstractCommand {
    constructor() {
        super();
        this.setName('webget');
        this.setSyntax('webget [<url>] (data:<data>) (method:<method>) (headers:<map>) (timeout:<duration>/{10s}) (savefile:<path>) (hide_failure)');
        this.setRequiredArguments(1, 7);
        this.isHoldable = true;
        this.setPrefixesHandled('data', 'method', 'headers', 'timeout', 'savefile');
        this.setBooleansHandled('hide_failure');
        this.addRemappedPrefixes('data', 'post');
    }

    parseArgs(entry: ScriptEntry): void {
        for (const arg of entry) {
            if (entry.hasObject('url')) {
                arg.reportUnhandled();
            }
            // `https://host` splits like a prefixed argument, so take the whole text
            entry.addObject('url', arg.toString());
        }
        const url = entry.getElement('url');
        if (url === null) {
            throw new InvalidArgumentsError('Must specify a URL!');
        }
        if (!/^https?:\/\//i.test(url)) {
            throw new InvalidArgumentsError(`Invalid URL '${url}': must start with http:// or https://`);
        }

        const hasData = entry.argForPrefix('data') !== null;
        const method = (entry.argForPrefixAsText('method') ?? (hasData ? 'POST' : 'GET')).toUpperCase();
        if (!METHODS.includes(method)) {
            throw new InvalidArgumentsError(`Unknown method '${method}', must be one of ${METHODS.join(', ')}`);
        }
        entry.addObject('method', method);
        const timeout = entry.argForPrefix('timeout');
        entry.addObject('timeout', timeout === null ? 10000 : timeout.asDuration());
    }

    execute(entry: ScriptEntry): void {
        const config = entry.engine.config;
        if (!config.allowWebget) {
            throw new ScriptRuntimeError('Web requests are disabled in the engine config (allowWebget).');
        }
        const saveFileText = entry.argForPrefixAsText('savefile');
        let saveFile: string | null = null;
        if (saveFileText !== null) {
            if (!config.allowFileWrite) {
                throw new ScriptRuntimeError('Writing files is disabled in the engine config (allowFileWrite).');
            }
            saveFile = resolveDataPath(config, saveFileText);
        }
        const headersArg = entry.argForPrefix('headers');
        const dataArg = entry.argForPrefix('data');
        const request: WebRequest = {
            url: entry.getElement('url') ?? '',
            method: entry.getElement('method') ?? 'GET',
            headers: headersArg === null ? {} : parseMapArgument(headersArg.object),
            body: dataArg === null ? undefined : toBody(dataArg.object),
            timeoutMillis: Number(entry.getObject('timeout')),
            saveFile
        };
        const hideFailure = entry.argAsBoolean('hide_failure');
        entry.engine.debug.report(this.name, {
            url: request.url,
            method: request.method,
            timeout: formatDuration(request.timeoutMillis)
        }, entry.debugScope());

        this.runHeld(entry, () => performRequest(request), response => {
            entry.addObject('status', response.status);
            entry.addObject('failed', response.failed);
            entry.addObject('result', Buffer.from(response.body).toString('utf8'));
            entry.addObject('result_binary', response.body);
            entry.addObject('result_headers', response.headers);
            entry.addObject('time_ran', response.timeRan);
            if (response.failed && !hideFailure) {
                entry.engine.debug.echoError(`Request to '${request.url}' failed: ${response.error ?? 'unknown error'}`, entry.debugScope());
            }
        });
    }
}

export const WebCommands: AbstractCommand[] = [
    new WebGetCommand()
];

export const WebCommandMetadata: Record<string, CommandMetadata> = {
    webget: {
        description: 'Sends an HTTP request and saves the response on the entry',
        parameters: [
            {
                name: 'url',
                dataType: 'string',
                description: 'Address to request, starting with http:// or https://',
                formInputType: 'text',
                required: true
            },
            {
                name: 'data',
                prefix: 'data',
                dataType: 'binary',
                description: 'Request body; text is sent as UTF-8. Also accepted as post:',
                formInputType: 'textarea',
                required: false
            },
            {
                name: 'method',
                prefix: 'method',
                dataType: 'string',
                description: 'HTTP method; GET, or POST when data is given',
                formInputType: 'select',
                required: false
            },
            {
                name: 'headers',
                prefix: 'headers',
                dataType: 'map',
                description: 'Request headers as a map or name=value|name=value',
                formInputType: 'json',
                required: false
            },
            {
                name: 'timeout',
                prefix: 'timeout',
                dataType: 'string',
                description: 'How long to wait for a response',
                formInputType: 'text',
                required: false,
                defaultValue: '10s'
            },
            {
                name: 'savefile',
                prefix: 'savefile',
                dataType: 'string',
                description: 'Also write the response body to this file',
                formInputType: 'file',
                required: false
            },
            {
                name: 'hide_failure',
                dataType: 'boolean',
                description: 'Do not report failed requests',
                formInputType: 'checkbox',
                required: false
            }
        ],
        saveKeys: ['status', 'failed', 'result', 'result_binary', 'result_headers', 'time_ran'],
        example: '~webget https://example.com/api timeout:5s save:request'
    }
};

export const WebModuleMetadata: ModuleMetadata = {
    description: 'HTTP requests',
    commands: Object.keys(WebCommandMetadata)
};

const WebModule: CommandModule = {
    name: 'web',
    commands: WebCommands,
    commandMetadata: WebCommandMetadata,
    moduleMetadata: WebModuleMetadata
};

export default WebModule;
