import { describe, expect, it } from 'vitest';
import { CALLBACK_MARKER, RepeatData } from '../src/modules/Queue';
import { createEngine, errors, logs } from './helpers';

describe('repeat', () => {
    it('should run its block once per iteration and restore the loop variable', () => {
        const { engine, sink } = createEngine();
        const queue = engine.runCommands([
            'define value original',
            'repeat 3 {',
            '    - debug log "iteration <[value]>"',
            '}',
            'debug log "after <[value]>"'
        ].join('\n'));
        expect(logs(sink)).toEqual(['iteration 1', 'iteration 2', 'iteration 3', 'after original']);
        expect(queue.state).toBe('finished');
    });

    it('should count from a start value under another name', () => {
        const { engine, sink } = createEngine();
        const queue = engine.runCommands('repeat 2 from:5 as:n {\n- debug log <[n]>\n}');
        expect(logs(sink)).toEqual(['5', '6']);
        expect(queue.hasDefinition('n')).toBe(false);
    });

    it('should restore an earlier binding of the loop variable', () => {
        const { engine, sink } = createEngine();
        const queue = engine.runCommands('define n before\nrepeat 5 as:n {\n- debug log <[n]>\n}\ndebug log "after <[n]>"');
        expect(logs(sink)).toEqual(['1', '2', '3', '4', '5', 'after before']);
        expect(queue.getDefinition('n')).toBe('before');
    });

    it('should skip the block for a zero count', () => {
        const { engine, sink } = createEngine();
        engine.runCommands('repeat 0 {\n- debug log inside\n}\ndebug log done');
        expect(logs(sink)).toEqual(['done']);
    });

    it('should stop early', () => {
        const { engine, sink } = createEngine();
        const queue = engine.runCommands([
            'repeat 5 {',
            '    - if <[value]> == 3 {',
            '        - repeat stop',
            '    }',
            '    - debug log "n <[value]>"',
            '}',
            'debug log done'
        ].join('\n'));
        expect(logs(sink)).toEqual(['n 1', 'n 2', 'done']);
        expect(queue.hasDefinition('value')).toBe(false);
    });

    it('should skip to the next iteration', () => {
        const { engine, sink } = createEngine();
        engine.runCommands([
            'repeat 4 {',
            '    - if <[value]> == 2 || <[value]> == 3 {',
            '        - repeat next',
            '    }',
            '    - debug log <[value]>',
            '}'
        ].join('\n'));
        expect(logs(sink)).toEqual(['1', '4']);
    });

    it('should nest, with stop and next acting on the innermost loop', () => {
        const { engine, sink } = createEngine();
        engine.runCommands([
            'repeat 2 as:outer {',
            '    - repeat 3 as:inner {',
            '        - if <[inner]> == 2 {',
            '            - repeat next',
            '        }',
            '        - debug log "<[outer]>-<[inner]>"',
            '    }',
            '    - repeat 3 as:inner {',
            '        - repeat stop',
            '        - debug log never',
            '    }',
            '}'
        ].join('\n'));
        expect(logs(sink)).toEqual(['1-1', '1-3', '2-1', '2-3']);
        expect(errors(sink)).toEqual([]);
    });

    it('should run its iterations as instant entries of a timed queue', () => {
        const { engine, sink } = createEngine();
        engine.runCommands('debug log start\nrepeat 3 {\n- debug log <[value]>\n}\ndebug log end', { type: 'timed' });
        expect(logs(sink)).toEqual(['start']);
        // the repeat entry itself takes this beat
        engine.tick();
        expect(logs(sink)).toEqual(['start']);
        engine.tick();
        expect(logs(sink)).toEqual(['start', '1', '2', '3', 'end']);
    });

    it('should report an empty block', () => {
        const { engine, sink } = createEngine();
        engine.runCommands('repeat 2 {\n}');
        expect(errors(sink)).toEqual(['Empty subsection - did you forget a { or a - ?']);
    });

    it('should leave the queue alone when stop is used outside a loop', () => {
        const { engine, sink } = createEngine();
        const queue = engine.runCommands('define value kept\nrepeat stop\ndebug log a\ndebug log b');
        expect(errors(sink)).toEqual(['Cannot stop repeat: not inside a loop!']);
        expect(queue.getQueueSize()).toBe(2);
        expect(queue.getDefinition('value')).toBe('kept');
    });

    it('should report next outside a loop', () => {
        const { engine, sink } = createEngine();
        engine.runCommands('repeat next');
        expect(errors(sink)).toEqual(['Cannot skip repeat: not inside a loop!']);
    });

    it('should keep its state where the callback marker can reach it', () => {
        const { engine } = createEngine();
        const queue = engine.runCommands('repeat 2 {\n- wait 1s\n}');
        const timed = engine.getQueue(queue.id);
        const marker = timed?.getEntry(0);
        expect(marker?.internal.originalArgs).toEqual([CALLBACK_MARKER]);
        const data = marker?.owner?.data;
        expect(data).toBeInstanceOf(RepeatData);
        if (data instanceof RepeatData) {
            expect(data.index).toBe(1);
            expect(data.target).toBe(2);
            expect(data.valueName).toBe('value');
        }
    });
});

describe('if', () => {
    const script = [
        'if <[x]> > 3 && <[x]> < 10 {',
        '    - debug log in-range',
        '} else if <[x]> == 20 {',
        '    - debug log twenty',
        '} else {',
        '    - debug log other',
        '}',
        'debug log done'
    ].join('\n');

    it('should run the first block whose condition holds', () => {
        const { engine, sink } = createEngine();
        engine.runCommands(script, { definitions: { x: 5 } });
        expect(logs(sink)).toEqual(['in-range', 'done']);
    });

    it('should fall through to else if', () => {
        const { engine, sink } = createEngine();
        engine.runCommands(script, { definitions: { x: '20' } });
        expect(logs(sink)).toEqual(['twenty', 'done']);
    });

    it('should fall through to else', () => {
        const { engine, sink } = createEngine();
        engine.runCommands(script, { definitions: { x: 1 } });
        expect(logs(sink)).toEqual(['other', 'done']);
    });

    it('should test bare values and negation', () => {
        const { engine, sink } = createEngine();
        engine.runCommands([
            'define ready true',
            'if <[ready]> {',
            '    - debug log ready',
            '}',
            'if !<[ready]> {',
            '    - debug log waiting',
            '}'
        ].join('\n'));
        expect(logs(sink)).toEqual(['ready']);
    });

    it('should compare text without case', () => {
        const { engine, sink } = createEngine();
        engine.runCommands('define name Ada\nif <[name]> == ada && <[name]> != bob {\n- debug log match\n}');
        expect(logs(sink)).toEqual(['match']);
    });

    it('should report an ordering comparison on text', () => {
        const { engine, sink } = createEngine();
        engine.runCommands('if abc < 3 {\n- debug log never\n}');
        expect(errors(sink)).toEqual(['Cannot compare string@abc < string@3: both sides must be numbers.']);
        expect(logs(sink)).toEqual([]);
    });

    it('should need a block', () => {
        const { engine, sink } = createEngine();
        engine.runCommands('if true');
        expect(sink.messages('error')[0].split('\n').slice(0, 2)).toEqual([
            'Invalid arguments were specified!',
            'Must have a block of commands to run!'
        ]);
    });
});

describe('determine and procedures', () => {
    it('should return the first determination of a procedure', () => {
        const { engine } = createEngine();
        engine.registerScript('pick', 'determine passively first\ndetermine second\ndetermine third', { type: 'procedure' });
        expect(engine.runProcedure('pick')).toBe('first');
    });

    it('should bind context values to definitions', () => {
        const { engine, sink } = createEngine();
        engine.registerScript('double', 'determine <[n].mul[2]>', { type: 'procedure', definitions: ['n'] });
        engine.runCommands('define result <proc[double].context[21]>\ndebug log <[result]>');
        expect(logs(sink)).toEqual(['42']);
    });

    it('should refuse commands that cannot run in a procedure', () => {
        const { engine, sink } = createEngine();
        engine.registerScript('slow', 'wait 1s\ndetermine done', { type: 'procedure' });
        expect(engine.runProcedure('slow')).toBe('done');
        expect(errors(sink)).toEqual(["The command 'wait' cannot be used in a procedure."]);
    });

    it('should fail when nothing was determined', () => {
        const { engine } = createEngine();
        engine.registerScript('silent', 'debug log hi', { type: 'procedure' });
        engine.registerScript('task', 'determine x');
        expect(() => engine.runProcedure('silent')).toThrow("Procedure 'silent' did not determine a value.");
        expect(() => engine.runProcedure('task')).toThrow("Script 'task' is not a procedure.");
        expect(() => engine.runProcedure('missing')).toThrow("Procedure 'missing' does not exist.");
    });

    it('should stop a queue when determining', () => {
        const { engine, sink } = createEngine();
        const queue = engine.runCommands('determine 5\ndebug log never');
        expect(queue.state).toBe('stopped');
        expect(queue.determinations).toEqual(['5']);
        expect(logs(sink)).toEqual([]);
    });
});

describe('run', () => {
    it('should start a script on a new queue with its definitions', () => {
        const { engine, sink } = createEngine();
        engine.registerScript('child', 'debug log "child <[greeting]>"', { definitions: ['greeting'] });
        engine.runCommands('run child def:hello save:r\ndebug log "parent <entry[r].created_queue>"');
        expect(logs(sink)).toEqual(['child hello', 'parent child_1']);
    });

    it('should wait for the new queue with ~', () => {
        const { engine, sink } = createEngine();
        engine.registerScript('child', 'wait 1s\ndebug log child');
        const parent = engine.runCommands('~run child save:r\ndebug log "parent <entry[r].created_queue>"');
        expect(logs(sink)).toEqual([]);
        engine.tick(1);
        expect(logs(sink)).toEqual(['child']);
        engine.tick();
        expect(logs(sink)).toEqual(['child']);
        engine.tick();
        expect(logs(sink)).toEqual(['child', 'parent child_1']);
        expect(parent.state).toBe('finished');
    });

    it('should run a timed queue at the given speed', () => {
        const { engine, sink } = createEngine();
        engine.registerScript('slow', 'debug log a\ndebug log b');
        engine.runCommands('run slow speed:100ms id:slowpoke');
        const queue = engine.getQueue('slowpoke');
        expect(queue?.type).toBe('timed');
        expect(logs(sink)).toEqual(['a']);
        engine.tick(0.1);
        expect(logs(sink)).toEqual(['a', 'b']);
    });

    it('should report a missing script', () => {
        const { engine, sink } = createEngine();
        engine.runCommands('run nowhere');
        expect(errors(sink)).toEqual(["Script 'nowhere' does not exist."]);
    });
});
