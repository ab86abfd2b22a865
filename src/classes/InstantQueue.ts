import { ScriptQueue } from './ScriptQueue';

/**
 * Runs entries back to back until the list is empty or an entry holds it
 */
export class InstantQueue extends ScriptQueue {
    get type(): 'instant' {
        return 'instant';
    }

    protected onStart(): void {
        this.advance();
    }

    heartbeat(): void {
        if (this.state === 'running') {
            this.advance();
        }
    }

    /**
     * Run the whole queue now, stepping past failed entries, until it ends or an entry holds it
     */
    runToCompletion(): void {
        this.start();
        while (this.state === 'running' && this.replacedBy === null && !this.isWaiting()) {
            this.advance();
        }
    }

    /**
     * A failed entry ends this pass; the rest runs on the next heartbeat
     */
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
        }
    }
}
