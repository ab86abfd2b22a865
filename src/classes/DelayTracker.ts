import type { Scheduler } from './Scheduler';

/**
 * Holds a timed queue back until a delay has passed
 */
export interface DelayTracker {
    isDelayed(): boolean;
}

/**
 * Counts heartbeat time, so it pauses with the scheduler
 */
export class DeltaTimeDelayTracker implements DelayTracker {
    private readonly scheduler: Scheduler;
    private readonly end: number;

    constructor(scheduler: Scheduler, delayMillis: number) {
        this.scheduler = scheduler;
        this.end = scheduler.deltaTimeMillis + delayMillis;
    }

    isDelayed(): boolean {
        return this.scheduler.deltaTimeMillis < this.end;
    }
}

/**
 * Counts wall-clock time on the monotonic clock
 */
export class SystemTimeDelayTracker implements DelayTracker {
    private readonly end: number;
    private readonly now: () => number;

    constructor(delayMillis: number, now: () => number = () => performance.now()) {
        this.now = now;
        this.end = now() + delayMillis;
    }

    isDelayed(): boolean {
        return this.now() < this.end;
    }
}
