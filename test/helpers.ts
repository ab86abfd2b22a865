import { CollectingSink, CueScript, type EngineConfig } from '../src/index';

export interface TestEngine {
    engine: CueScript;
    sink: CollectingSink;
}

export function createEngine(config: Partial<EngineConfig> = {}): TestEngine {
    const sink = new CollectingSink();
    const engine = new CueScript({ config, sink });
    return { engine, sink };
}

/**
 * Script output written by `debug log`
 */
export function logs(sink: CollectingSink): string[] {
    return sink.messages('log');
}

/**
 * First line of every reported error, without the location suffix
 */
export function errors(sink: CollectingSink): string[] {
    return sink.messages('error').map(message => message.split('\n')[0]);
}
