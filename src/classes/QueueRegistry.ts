import type { ScriptQueue } from './ScriptQueue';

/**
 * Live queues by id, in the order they started
 */
export class QueueRegistry {
    private readonly queues = new Map<string, ScriptQueue>();
    private readonly counters = new Map<string, number>();
    private debugIds = 0;

    /**
     * A fresh id such as `my_script_3`
     */
    generateId(name: string): string {
        const base = name.toLowerCase().replace(/[^a-z0-9_]+/g, '_') || 'queue';
        let id: string;
        do {
            const next = (this.counters.get(base) ?? 0) + 1;
            this.counters.set(base, next);
            id = `${base}_${next}`;
        } while (this.queues.has(id));
        return id;
    }

    nextDebugId(): number {
        return ++this.debugIds;
    }

    register(queue: ScriptQueue): void {
        this.queues.set(queue.id.toLowerCase(), queue);
    }

    /**
     * Remove a queue, unless its id now belongs to the queue that replaced it
     */
    unregister(queue: ScriptQueue): void {
        const key = queue.id.toLowerCase();
        if (this.queues.get(key) === queue) {
            this.queues.delete(key);
        }
    }

    get(id: string): ScriptQueue | null {
        return this.queues.get(id.toLowerCase()) ?? null;
    }

    has(id: string): boolean {
        return this.queues.has(id.toLowerCase());
    }

    all(): ScriptQueue[] {
        return Array.from(this.queues.values());
    }

    get size(): number {
        return this.queues.size;
    }
}
