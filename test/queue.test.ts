import { afterEach, describe, expect, it, vi } from 'vitest';
import { DeltaTimeDelayTracker, InstantQueue, SystemTimeDelayTracker, TimedQueue } from '../src/index';
import { createEngine, errors, logs } from './helpers';

describe('queues', () => {
    describe('InstantQueue', () => {
        it('should run every entry when started', () => {
            const { engine, sink } = createEngine();
            const queue = engine.runCommands('debug log a\ndebug log b\ndebug log c');
            expect(queue).toBeInstanceOf(InstantQueue);
            expect(logs(sink)).toEqual(['a', 'b', 'c']);
            expect(queue.state).toBe('finished');
            expect(engine.queues.has(queue.id)).toBe(false);
        });

        it('should generate ids from the queue name', () => {
            const { engine } = createEngine();
            const first = engine.runCommands('debug log a', { name: 'My Task', start: false });
            const second = engine.runCommands('debug log a', { name: 'My Task', start: false });
            expect(first.id).toBe('my_task_1');
            expect(second.id).toBe('my_task_2');
        });

        it('should share definitions between entries', () => {
            const { engine, sink } = createEngine();
            const queue = engine.runCommands('define count 3\ndefine count <[count].add[1]>\ndebug log <[count]>');
            expect(logs(sink)).toEqual(['4']);
            expect(queue.getDefinition('COUNT')).toBe(4);
        });

        it('should remove a definition given no value', () => {
            const { engine } = createEngine();
            const queue = engine.runCommands('define a 1\ndefine b 2\ndefine a');
            expect(Array.from(queue.getAllDefinitions().keys())).toEqual(['b']);
        });

        it('should split a prefix produced by a tag', () => {
            const { engine, sink } = createEngine();
            engine.runCommands('define key score\ndefine <[key]>:5\ndebug log <[score]>');
            expect(logs(sink)).toEqual(['5']);
        });

        it('should drop pending entries on stop', () => {
            const { engine, sink } = createEngine();
            const queue = engine.runCommands('debug log a\nstop\ndebug log b');
            expect(logs(sink)).toEqual(['a']);
            expect(queue.state).toBe('stopped');
            expect(queue.getQueueSize()).toBe(0);
        });

        it('should notify completion listeners once', () => {
            const { engine } = createEngine();
            const queue = engine.runCommands('debug log a', { start: false });
            const listener = vi.fn();
            queue.onComplete(listener);
            queue.start();
            queue.stop();
            expect(listener).toHaveBeenCalledTimes(1);
            expect(listener).toHaveBeenCalledWith(queue);

            const late = vi.fn();
            queue.onComplete(late);
            expect(late).toHaveBeenCalledTimes(1);
        });

        it('should not advance while paused', () => {
            const { engine, sink } = createEngine();
            const queue = engine.runCommands('repeat stop\ndebug log after');
            queue.pause();
            engine.tick();
            expect(logs(sink)).toEqual([]);
            queue.resume();
            engine.tick();
            expect(logs(sink)).toEqual(['after']);
        });
    });

    describe('TimedQueue', () => {
        it('should run one entry per heartbeat, the first at start', () => {
            const { engine, sink } = createEngine();
            const queue = engine.runCommands('debug log a\ndebug log b\ndebug log c', { type: 'timed' });
            expect(queue).toBeInstanceOf(TimedQueue);
            expect(logs(sink)).toEqual(['a']);
            engine.tick();
            expect(logs(sink)).toEqual(['a', 'b']);
            engine.tick();
            expect(logs(sink)).toEqual(['a', 'b', 'c']);
            expect(queue.state).toBe('running');
            engine.tick();
            expect(queue.state).toBe('finished');
        });

        it('should run instant entries in the same heartbeat', () => {
            const { engine, sink } = createEngine();
            engine.runCommands('^debug log a\n^debug log b\ndebug log c\ndebug log d', { type: 'timed' });
            expect(logs(sink)).toEqual(['a', 'b', 'c']);
            engine.tick();
            expect(logs(sink)).toEqual(['a', 'b', 'c', 'd']);
        });

        it('should pause between entries at its speed', () => {
            const { engine, sink } = createEngine();
            engine.runCommands('debug log a\ndebug log b', { type: 'timed', speedMillis: 100 });
            expect(logs(sink)).toEqual(['a']);
            engine.tick(0.05);
            expect(logs(sink)).toEqual(['a']);
            engine.tick(0.05);
            expect(logs(sink)).toEqual(['a', 'b']);
        });

        it('should wait out a delay', () => {
            const { engine, sink } = createEngine();
            const queue = engine.runCommands('debug log a\nwait 1s\ndebug log b', { type: 'timed' });
            engine.tick();
            expect(queue).toBeInstanceOf(TimedQueue);
            expect(logs(sink)).toEqual(['a']);
            engine.tick(0.5);
            expect(logs(sink)).toEqual(['a']);
            engine.tick(0.5);
            expect(logs(sink)).toEqual(['a', 'b']);
        });

        it('should not count heartbeat time against a system clock wait', () => {
            const { engine, sink } = createEngine();
            engine.runCommands('wait 1h system\ndebug log done', { type: 'timed' });
            engine.tick(7200);
            expect(logs(sink)).toEqual([]);
        });
    });

    describe('delay trackers', () => {
        it('should count system time from the clock it is given', () => {
            let now = 1000;
            const tracker = new SystemTimeDelayTracker(500, () => now);
            expect(tracker.isDelayed()).toBe(true);
            now = 1499;
            expect(tracker.isDelayed()).toBe(true);
            now = 1500;
            expect(tracker.isDelayed()).toBe(false);
        });

        it('should count heartbeat time', () => {
            const { engine } = createEngine();
            const tracker = new DeltaTimeDelayTracker(engine.scheduler, 100);
            engine.tick(0.05);
            expect(tracker.isDelayed()).toBe(true);
            engine.tick(0.05);
            expect(tracker.isDelayed()).toBe(false);
        });
    });

    describe('conversion to timed', () => {
        it('should replace an instant queue that waits, keeping its id', () => {
            const { engine, sink } = createEngine();
            const queue = engine.runCommands('define x 1\ndebug log a\nwait 2s\ndebug log <[x]>');
            expect(logs(sink)).toEqual(['a']);
            expect(queue.state).toBe('stopped');

            const timed = engine.getQueue(queue.id);
            expect(timed).toBeInstanceOf(TimedQueue);
            expect(queue.replacedBy).toBe(timed);
            expect(timed?.getDefinition('x')).toBe('1');

            engine.tick(1);
            expect(logs(sink)).toEqual(['a']);
            engine.tick(1);
            expect(logs(sink)).toEqual(['a', '1']);
            engine.tick();
            expect(timed?.state).toBe('finished');
            expect(engine.queues.size).toBe(0);
        });

        it('should hand completion listeners to the new queue', () => {
            const { engine } = createEngine();
            const queue = engine.runCommands('wait 1s', { start: false });
            const listener = vi.fn();
            queue.onComplete(listener);
            queue.start();
            expect(listener).not.toHaveBeenCalled();
            engine.tick(1);
            engine.tick();
            expect(listener).toHaveBeenCalledTimes(1);
        });

        it('should delay another queue by id', () => {
            const { engine, sink } = createEngine();
            const target = engine.runCommands('debug log a\ndebug log b', { type: 'timed', id: 'target' });
            engine.runCommands('wait 1s queue:target');
            engine.tick();
            expect(logs(sink)).toEqual(['a']);
            engine.tick(1);
            expect(logs(sink)).toEqual(['a', 'b']);
            expect(target.id).toBe('target');
        });

        it('should report a wait on a missing queue', () => {
            const { engine, sink } = createEngine();
            engine.runCommands('wait 1s queue:ghost');
            expect(errors(sink)).toEqual(["Queue 'ghost' does not exist or has ended."]);
        });
    });
});

describe('Scheduler', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('should run handoffs before queues, in order', () => {
        const { engine, sink } = createEngine();
        const order: string[] = [];
        engine.runCommands('repeat stop\ndebug log queue');
        engine.scheduler.runOnHeartbeat(() => order.push(`first ${logs(sink).length}`));
        engine.scheduler.runOnHeartbeat(() => order.push(`second ${logs(sink).length}`));
        engine.tick();
        expect(order).toEqual(['first 0', 'second 0']);
        expect(logs(sink)).toEqual(['queue']);
    });

    it('should report a failing handoff and keep going', () => {
        const { engine, sink } = createEngine();
        const after = vi.fn();
        engine.scheduler.runOnHeartbeat(() => {
            throw new Error('broken task');
        });
        engine.scheduler.runOnHeartbeat(after);
        engine.tick();
        expect(errors(sink)).toEqual(['Scheduled task failed: broken task']);
        expect(after).toHaveBeenCalledTimes(1);
    });

    it('should count heartbeat time', () => {
        const { engine } = createEngine({ heartbeatMillis: 20 });
        engine.tick();
        engine.tick(1);
        expect(engine.scheduler.deltaTimeMillis).toBe(1020);
        expect(engine.scheduler.heartbeatCount).toBe(2);
    });

    it('should beat on a timer until stopped', () => {
        vi.useFakeTimers();
        const { engine } = createEngine();
        engine.startHeartbeat(50);
        expect(engine.scheduler.isRunning).toBe(true);
        vi.advanceTimersByTime(150);
        expect(engine.scheduler.heartbeatCount).toBe(3);
        engine.stopHeartbeat();
        vi.advanceTimersByTime(150);
        expect(engine.scheduler.heartbeatCount).toBe(3);
        expect(engine.scheduler.isRunning).toBe(false);
    });
});
