/**
 * Barrel export for all engine classes
 */

export { Argument, InternalArgument, findPrefixSplit } from './Argument';
export { ScriptEntry } from './ScriptEntry';
export type { BracedData, ScriptEntryInternal } from './ScriptEntry';
export { AbstractCommand } from './AbstractCommand';
export { BracedCommand } from './BracedCommand';
export { CommandRegistry } from './CommandRegistry';
export { CommandExecutor } from './CommandExecutor';
export { DeltaTimeDelayTracker, SystemTimeDelayTracker } from './DelayTracker';
export type { DelayTracker } from './DelayTracker';
export { Scheduler } from './Scheduler';
export type { Handoff } from './Scheduler';
export { QueueRegistry } from './QueueRegistry';
export { ScriptQueue } from './ScriptQueue';
export type { QueueState, QueueOptions, CompletionListener } from './ScriptQueue';
export { InstantQueue } from './InstantQueue';
export { TimedQueue } from './TimedQueue';
export type { TimedQueueOptions } from './TimedQueue';
export { ScriptContainer } from './ScriptContainer';
export type { ScriptType, ScriptOptions } from './ScriptContainer';
export { ScriptLoader } from './ScriptLoader';
export type { CommandLine } from './ScriptLoader';
export { DEFAULT_CONFIG, resolveConfig, parseConfig, loadConfig } from './Config';
export type { EngineConfig, QueueType } from './Config';
export { Debug, ConsoleSink, CollectingSink } from './Debug';
export type { DebugEventType, DebugScope, DebugEvent, DiagnosticsSink } from './Debug';
export { TagManager, TagAttribute } from './TagManager';
export type { TagSegment, TagNode, TagBaseHandler, TagAttributeHandler } from './TagManager';
export { InvalidArgumentsError, ScriptRuntimeError, ConfigError } from './exceptions';
