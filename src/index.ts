/**
 * CueScript Interpreter
 *
 * Scripts run as lists of command entries on queues. Instant queues run their
 * entries back to back; timed queues run one entry per heartbeat and can wait.
 * The host drives every queue through the scheduler heartbeat.
 */

import type { Value } from './utils';

import {
    CommandExecutor,
    CommandRegistry,
    Debug,
    InstantQueue,
    QueueRegistry,
    Scheduler,
    ScriptContainer,
    ScriptLoader,
    ScriptRuntimeError,
    TagManager,
    TimedQueue,
    loadConfig,
    resolveConfig
} from './classes';
import type {
    AbstractCommand,
    DelayTracker,
    DiagnosticsSink,
    EngineConfig,
    QueueType,
    ScriptOptions,
    ScriptQueue
} from './classes';

import type {
    CommandMetadata,
    CommandModule,
    ModuleMetadata
} from './types/Module.type';

// Import native modules
import CoreModule from './modules/Core';
import QueueModule from './modules/Queue';
import FileModule from './modules/File';
import WebModule from './modules/Web';

// Re-export types for external use
export type { Value };
export type {
    DataType,
    FormInputType,
    ParameterMetadata,
    CommandMetadata,
    ModuleMetadata,
    CommandModule
} from './types/Module.type';
export type { TemplateContext, CompiledTemplate, TemplateResolver } from './types/Template.type';

export * from './classes';
export * from './utils';

export interface CueScriptOptions {
    config?: Partial<EngineConfig>;
    /** Where diagnostics go; the console by default */
    sink?: DiagnosticsSink;
    /** Extra command modules, loaded after the native ones */
    modules?: CommandModule[];
}

export interface RunOptions {
    type?: QueueType;
    /** Queue id; generated from the script name when absent */
    id?: string;
    /** Timed queues only: pause after each entry */
    speedMillis?: number;
    /** Bound in order to the script's declared definition names */
    args?: Value[];
    definitions?: Record<string, Value>;
    /** Start the queue right away (default true) */
    start?: boolean;
}

export interface RunCommandsOptions extends Omit<RunOptions, 'args'> {
    /** Queue name, used for the generated id */
    name?: string;
}

// ============================================================================
// CueScript Interpreter
// ============================================================================

export class CueScript {
    readonly config: EngineConfig;
    readonly debug: Debug;
    readonly commands = new CommandRegistry();
    readonly tags: TagManager;
    readonly executor: CommandExecutor;
    readonly scheduler: Scheduler;
    readonly queues = new QueueRegistry();
    readonly loader: ScriptLoader;

    private readonly scripts = new Map<string, ScriptContainer>();
    private readonly commandMetadata = new Map<string, CommandMetadata>();
    private readonly moduleMetadata = new Map<string, ModuleMetadata>();

    constructor(options: CueScriptOptions = {}) {
        this.config = resolveConfig(options.config);
        this.debug = new Debug(options.sink, this.config.debug || Debug.verbose);
        this.tags = new TagManager(this);
        this.executor = new CommandExecutor(this);
        this.scheduler = new Scheduler(this);
        this.loader = new ScriptLoader(this);

        this.loadNativeModules();
        for (const module of options.modules ?? []) {
            this.loadModule(module);
        }
    }

    /**
     * Build an engine from a JSON5 config file
     */
    static fromConfigFile(path: string, options: Omit<CueScriptOptions, 'config'> = {}): CueScript {
        return new CueScript({ ...options, config: loadConfig(path) });
    }

    /**
     * Native modules registry
     * Add new modules here to auto-load them
     */
    private static readonly NATIVE_MODULES: CommandModule[] = [
        CoreModule,
        QueueModule,
        FileModule,
        WebModule
    ];

    private loadNativeModules(): void {
        for (const module of CueScript.NATIVE_MODULES) {
            this.loadModule(module);
        }
    }

    /**
     * Register a module's commands and metadata
     */
    loadModule(module: CommandModule): void {
        for (const command of module.commands) {
            this.commands.register(command);
        }
        for (const [name, metadata] of Object.entries(module.commandMetadata)) {
            this.commandMetadata.set(name.toLowerCase(), metadata);
        }
        this.moduleMetadata.set(module.name, module.moduleMetadata);
    }

    registerCommand(command: AbstractCommand, metadata?: CommandMetadata): void {
        this.commands.register(command);
        if (metadata) {
            this.commandMetadata.set(command.name, metadata);
        }
    }

    getCommandMetadata(name: string): CommandMetadata | null {
        return this.commandMetadata.get(name.toLowerCase()) ?? null;
    }

    getModuleInfo(name: string): ModuleMetadata | null {
        return this.moduleMetadata.get(name) ?? null;
    }

    getAllModuleInfo(): Map<string, ModuleMetadata> {
        return new Map(this.moduleMetadata);
    }

    // ------------------------------------------------------------------------
    // Scripts
    // ------------------------------------------------------------------------

    /**
     * Register (or replace) a named script
     */
    registerScript(name: string, source: string, options: ScriptOptions = {}): ScriptContainer {
        const script = new ScriptContainer(this, name, source, options);
        this.scripts.set(name.toLowerCase(), script);
        return script;
    }

    getScript(name: string): ScriptContainer | null {
        return this.scripts.get(name.toLowerCase()) ?? null;
    }

    createQueue(type: QueueType, name: string, options: { id?: string; speedMillis?: number; procedural?: boolean; script?: ScriptContainer | null } = {}): ScriptQueue {
        if (type === 'timed') {
            return new TimedQueue(this, name, options);
        }
        return new InstantQueue(this, name, options);
    }

    /**
     * Run a registered script on a new queue
     */
    runScript(name: string, options: RunOptions = {}): ScriptQueue {
        const script = this.getScript(name);
        if (script === null) {
            throw new ScriptRuntimeError(`Script '${name}' does not exist.`);
        }
        const queue = this.createQueue(options.type ?? this.config.defaultQueueType, script.name, {
            id: options.id,
            speedMillis: options.speedMillis,
            script
        });
        const args = options.args ?? [];
        script.definitions.forEach((definition, index) => {
            if (index < args.length) {
                queue.addDefinition(definition, args[index]);
            }
        });
        for (const [key, value] of Object.entries(options.definitions ?? {})) {
            queue.addDefinition(key, value);
        }
        queue.addEntries(script.getEntries());
        if (options.start ?? true) {
            queue.start();
        }
        return queue;
    }

    /**
     * Run script source on a new queue without registering it
     */
    runCommands(source: string, options: RunCommandsOptions = {}): ScriptQueue {
        const queue = this.createQueue(options.type ?? this.config.defaultQueueType, options.name ?? 'commands', {
            id: options.id,
            speedMillis: options.speedMillis
        });
        for (const [key, value] of Object.entries(options.definitions ?? {})) {
            queue.addDefinition(key, value);
        }
        queue.addEntries(this.loader.buildEntries(source));
        if (options.start ?? true) {
            queue.start();
        }
        return queue;
    }

    /**
     * Run a procedure script to completion and return its first determination
     */
    runProcedure(name: string, args: Value[] = []): Value {
        const script = this.getScript(name);
        if (script === null) {
            throw new ScriptRuntimeError(`Procedure '${name}' does not exist.`);
        }
        if (script.type !== 'procedure') {
            throw new ScriptRuntimeError(`Script '${name}' is not a procedure.`);
        }
        const queue = new InstantQueue(this, script.name, { procedural: true, script });
        script.definitions.forEach((definition, index) => {
            if (index < args.length) {
                queue.addDefinition(definition, args[index]);
            }
        });
        queue.addEntries(script.getEntries());
        queue.runToCompletion();
        if (!queue.isEnded()) {
            queue.stop();
        }
        const determinations = queue.determinations;
        if (determinations === null || determinations.length === 0) {
            throw new ScriptRuntimeError(`Procedure '${name}' did not determine a value.`);
        }
        return determinations[0];
    }

    // ------------------------------------------------------------------------
    // Queues and heartbeat
    // ------------------------------------------------------------------------

    getQueue(id: string): ScriptQueue | null {
        return this.queues.get(id);
    }

    /**
     * Replace a running queue with a timed queue under the same id that waits out the delay first
     */
    forceToTimed(queue: ScriptQueue, delay: DelayTracker | null = null): TimedQueue {
        const timed = new TimedQueue(this, queue.name, { id: queue.id });
        timed.adoptFrom(queue);
        if (delay !== null) {
            timed.delayFor(delay);
        }
        this.debug.echoDebug(`Converted instant queue '${queue.id}' to a timed queue`, { queueId: queue.id });
        timed.start();
        return timed;
    }

    /**
     * Advance every queue once
     */
    tick(deltaSeconds?: number): void {
        this.scheduler.tick(deltaSeconds);
    }

    startHeartbeat(intervalMillis?: number): void {
        this.scheduler.start(intervalMillis);
    }

    stopHeartbeat(): void {
        this.scheduler.stop();
    }
}
