import type { CueScript } from '../index';
import type { DelayTracker } from './DelayTracker';
import { DeltaTimeDelayTracker } from './DelayTracker';
import { ScriptQueue, type QueueOptions } from './ScriptQueue';

export interface TimedQueueOptions extends QueueOptions {
    /** Pause after each non-instant entry; 0 paces one entry per heartbeat */
    speedMillis?: number;
}

/**
 * Runs one non-instant entry per heartbeat, and waits out delays set by commands such as wait
 */
export class TimedQueue extends ScriptQueue {
    speedMillis: number;
    private delay: DelayTracker | null = null;

    constructor(engine: CueScript, name: string, options: TimedQueueOptions = {}) {
        super(engine, name, options);
        this.speedMillis = options.speedMillis ?? 0;
    }

    get type(): 'timed' {
        return 'timed';
    }

    delayFor(tracker: DelayTracker): void {
        this.delay = tracker;
    }

    isDelayed(): boolean {
        return this.delay !== null && this.delay.isDelayed();
    }

    protected onStart(): void {
        this.heartbeat();
    }

    heartbeat(): void {
        if (this.state !== 'running') {
            return;
        }
        if (this.delay !== null) {
            if (this.delay.isDelayed()) {
                return;
            }
            this.delay = null;
        }
        this.advance();
    }

    private advance(): void {
        while (this.state === 'running' && this.replacedBy === null) {
            if (this.isWaiting()) {
                return;
            }
            const entry = this.removeFirst();
            if (entry === null) {
                this.finish();
                return;
            }
            if (!this.runEntry(entry)) {
                return;
            }
            // the command set a delay, e.g. wait
            if (this.delay !== null) {
                return;
            }
            if (!entry.isInstant()) {
                if (this.speedMillis > 0) {
                    this.delay = new DeltaTimeDelayTracker(this.engine.scheduler, this.speedMillis);
                }
                return;
            }
        }
    }
}
