import { readFileSync } from 'node:fs';
import JSON5 from 'json5';
import { errorMessage } from '../utils';
import { ConfigError } from './exceptions';

export type QueueType = 'instant' | 'timed';

export interface EngineConfig {
    /** Trace every command; VITE_DEBUG=true turns it on as well */
    debug: boolean;
    allowWebget: boolean;
    allowFileRead: boolean;
    allowFileWrite: boolean;
    allowFileCopy: boolean;
    /** Base folder that file command paths are relative to */
    dataFolder: string;
    /** Folder, relative to dataFolder, that file commands may not leave; 'none' lifts the limit */
    filePathLimit: string;
    heartbeatMillis: number;
    defaultQueueType: QueueType;
}

export const DEFAULT_CONFIG: Readonly<EngineConfig> = {
    debug: false,
    allowWebget: true,
    allowFileRead: false,
    allowFileWrite: false,
    allowFileCopy: false,
    dataFolder: '.',
    filePathLimit: '.',
    heartbeatMillis: 50,
    defaultQueueType: 'instant'
};

function expectBoolean(key: string, value: unknown): boolean {
    if (typeof value !== 'boolean') {
        throw new ConfigError(`Config '${key}' must be true or false`, key);
    }
    return value;
}

function expectString(key: string, value: unknown): string {
    if (typeof value !== 'string' || value === '') {
        throw new ConfigError(`Config '${key}' must be a non-empty string`, key);
    }
    return value;
}

/**
 * Validate a parsed config object over the defaults
 */
export function resolveConfig(input: unknown): EngineConfig {
    const config: EngineConfig = { ...DEFAULT_CONFIG };
    if (input === undefined || input === null) {
        return config;
    }
    if (typeof input !== 'object' || Array.isArray(input)) {
        throw new ConfigError('Config must be an object');
    }
    for (const [key, raw] of Object.entries(input)) {
        const value: unknown = raw;
        if (value === undefined) {
            continue;
        }
        switch (key) {
            case 'debug':
                config.debug = expectBoolean(key, value);
                break;
            case 'allowWebget':
                config.allowWebget = expectBoolean(key, value);
                break;
            case 'allowFileRead':
                config.allowFileRead = expectBoolean(key, value);
                break;
            case 'allowFileWrite':
                config.allowFileWrite = expectBoolean(key, value);
                break;
            case 'allowFileCopy':
                config.allowFileCopy = expectBoolean(key, value);
                break;
            case 'dataFolder':
                config.dataFolder = expectString(key, value);
                break;
            case 'filePathLimit':
                config.filePathLimit = expectString(key, value);
                break;
            case 'heartbeatMillis':
                if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
                    throw new ConfigError(`Config '${key}' must be a positive number`, key);
                }
                config.heartbeatMillis = value;
                break;
            case 'defaultQueueType':
                if (value !== 'instant' && value !== 'timed') {
                    throw new ConfigError(`Config '${key}' must be 'instant' or 'timed'`, key);
                }
                config.defaultQueueType = value;
                break;
            default:
                throw new ConfigError(`Unknown config key '${key}'`, key);
        }
    }
    return config;
}

/**
 * Parse JSON5 config text
 */
export function parseConfig(text: string): EngineConfig {
    let parsed: unknown;
    try {
        parsed = JSON5.parse(text);
    } catch (error) {
        throw new ConfigError(`Config is not valid JSON5: ${errorMessage(error)}`);
    }
    return resolveConfig(parsed);
}

export function loadConfig(path: string): EngineConfig {
    let text: string;
    try {
        text = readFileSync(path, 'utf8');
    } catch (error) {
        throw new ConfigError(`Cannot read config file '${path}': ${errorMessage(error)}`);
    }
    return parseConfig(text);
}
