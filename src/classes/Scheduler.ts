import type { CueScript } from '../index';
import { errorMessage } from '../utils';

export type Handoff = () => void;

/**
 * The heartbeat that drives every queue.
 *
 * Each tick first runs the handoffs queued since the last tick (background
 * results, scheduled tasks), in order, then advances each registered queue once.
 * Background work never touches queue or entry state itself; it queues a
 * handoff that does so on the next tick.
 */
export class Scheduler {
    /** Heartbeat time accumulated over all ticks */
    deltaTimeMillis = 0;
    heartbeatCount = 0;

    private readonly engine: CueScript;
    private handoffs: Handoff[] = [];
    private readonly inFlight = new Set<Promise<void>>();
    private timer: NodeJS.Timeout | null = null;

    constructor(engine: CueScript) {
        this.engine = engine;
    }

    tick(deltaSeconds: number = this.engine.config.heartbeatMillis / 1000): void {
        this.deltaTimeMillis += deltaSeconds * 1000;
        this.heartbeatCount++;

        const pending = this.handoffs;
        this.handoffs = [];
        for (const handoff of pending) {
            try {
                handoff();
            } catch (error) {
                this.engine.debug.echoError(`Scheduled task failed: ${errorMessage(error)}`, {}, error);
            }
        }

        for (const queue of this.engine.queues.all()) {
            try {
                queue.heartbeat();
            } catch (error) {
                this.engine.debug.echoError(`Queue heartbeat failed: ${errorMessage(error)}`, { queueId: queue.id }, error);
            }
        }
    }

    /**
     * Run a task at the start of the next heartbeat
     */
    runOnHeartbeat(handoff: Handoff): void {
        this.handoffs.push(handoff);
    }

    /**
     * Run background work. Its outcome is handed to onDone or onError on a later heartbeat.
     */
    runAsync<T>(work: () => Promise<T>, onDone: (result: T) => void, onError: (error: unknown) => void): void {
        const task: Promise<void> = Promise.resolve()
            .then(work)
            .then(
                result => this.runOnHeartbeat(() => onDone(result)),
                error => this.runOnHeartbeat(() => onError(error))
            )
            .finally(() => {
                this.inFlight.delete(task);
            });
        this.inFlight.add(task);
    }

    /**
     * Background work still running, plus handoffs waiting for a heartbeat
     */
    get pendingCount(): number {
        return this.inFlight.size + this.handoffs.length;
    }

    /**
     * Resolves once all background work started so far has queued its handoff
     */
    async whenSettled(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.allSettled(Array.from(this.inFlight));
        }
    }

    start(intervalMillis: number = this.engine.config.heartbeatMillis): void {
        if (this.timer !== null) {
            return;
        }
        this.timer = setInterval(() => this.tick(intervalMillis / 1000), intervalMillis);
        this.timer.unref();
    }

    stop(): void {
        if (this.timer !== null) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    get isRunning(): boolean {
        return this.timer !== null;
    }
}
