/**
 * Diagnostics for the engine: command execution traces, reports and errors
 */

import { formatErrorWithContext } from '../utils';

export type DebugEventType = 'log' | 'debug' | 'error' | 'report' | 'execute';

/**
 * Where a diagnostic came from. Built by ScriptEntry.debugScope().
 */
export interface DebugScope {
    queueId?: string | null;
    script?: string | null;
    line?: number | null;
    command?: string | null;
    source?: string | null;
    debug?: boolean;
}

export interface DebugEvent {
    type: DebugEventType;
    message: string;
    queueId: string | null;
    script: string | null;
    line: number | null;
    command: string | null;
    error: unknown;
    timestamp: number;
}

export interface DiagnosticsSink {
    emit(event: DebugEvent): void;
}

/**
 * Writes diagnostics to the console
 */
export class ConsoleSink implements DiagnosticsSink {
    emit(event: DebugEvent): void {
        const where = event.queueId ? ` ${event.queueId}` : '';
        const line = `[CueScript${where}] ${event.message}`;
        if (event.type === 'error') {
            console.error(line);
        } else {
            console.log(line);
        }
    }
}

/**
 * Keeps every event in memory. Useful for hosts that render their own console, and for tests.
 */
export class CollectingSink implements DiagnosticsSink {
    readonly events: DebugEvent[] = [];

    emit(event: DebugEvent): void {
        this.events.push(event);
    }

    messages(type?: DebugEventType): string[] {
        return this.events
            .filter(event => type === undefined || event.type === type)
            .map(event => event.message);
    }

    clear(): void {
        this.events.length = 0;
    }
}

export class Debug {
    /**
     * Verbose mode flag - set to true to trace every executed command
     * Can be controlled via VITE_DEBUG environment variable or set programmatically
     */
    static verbose: boolean = (() => {
        if (typeof process !== 'undefined' && process.env?.VITE_DEBUG === 'true') {
            return true;
        }
        return false;
    })();

    private sink: DiagnosticsSink;
    enabled: boolean;

    constructor(sink: DiagnosticsSink = new ConsoleSink(), enabled: boolean = Debug.verbose) {
        this.sink = sink;
        this.enabled = enabled;
    }

    setSink(sink: DiagnosticsSink): void {
        this.sink = sink;
    }

    getSink(): DiagnosticsSink {
        return this.sink;
    }

    /**
     * Script output. Always emitted.
     */
    log(message: string, scope: DebugScope = {}): void {
        this.emit('log', message, scope, null);
    }

    /**
     * Trace output, emitted only in verbose mode
     */
    echoDebug(message: string, scope: DebugScope = {}): void {
        if (!this.shouldDebug(scope)) {
            return;
        }
        this.emit('debug', message, scope, null);
    }

    /**
     * Errors are always emitted, with the script location appended
     */
    echoError(message: string, scope: DebugScope = {}, error: unknown = null): void {
        const formatted = formatErrorWithContext({
            message,
            script: scope.script,
            line: scope.line,
            queueId: scope.queueId,
            command: scope.command,
            source: scope.source
        });
        this.emit('error', formatted, scope, error);
    }

    /**
     * Report the values a command parsed, e.g. `repeat: qty=3 from=1`
     */
    report(name: string, values: Record<string, string>, scope: DebugScope = {}): void {
        if (!this.shouldDebug(scope)) {
            return;
        }
        const parts = Object.entries(values).map(([key, value]) => `${key}=${value}`);
        this.emit('report', `${name}: ${parts.join(' ')}`.trim(), scope, null);
    }

    queueExecute(command: string, scope: DebugScope = {}): void {
        if (!this.shouldDebug(scope)) {
            return;
        }
        this.emit('execute', `Executing: ${command}`, scope, null);
    }

    private shouldDebug(scope: DebugScope): boolean {
        return this.enabled && scope.debug !== false;
    }

    private emit(type: DebugEventType, message: string, scope: DebugScope, error: unknown): void {
        this.sink.emit({
            type,
            message,
            queueId: scope.queueId ?? null,
            script: scope.script ?? null,
            line: scope.line ?? null,
            command: scope.command ?? null,
            error,
            timestamp: Date.now()
        });
    }
}
