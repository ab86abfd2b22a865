/**
 * Exception classes raised while preparing and executing command entries
 */

/**
 * A command was given arguments it cannot use. Reported together with the command's usage hint.
 */
export class InvalidArgumentsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentsError';
    }
}

/**
 * A command failed for a reason the script author can act on. Reported with its message only.
 */
export class ScriptRuntimeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ScriptRuntimeError';
    }
}

/**
 * Engine configuration could not be read
 */
export class ConfigError extends Error {
    readonly key: string | null;
    constructor(message: string, key: string | null = null) {
        super(message);
        this.key = key;
        this.name = 'ConfigError';
    }
}
