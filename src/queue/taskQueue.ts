import { QueueClosedError } from '@/errors';

/**
 * FIFO of task ids waiting for a worker. Task records live in the
 * TaskRepository; an id may be enqueued more than once (recovery), and the
 * state machine rejects the second pick-up.
 */
export class TaskQueue {
    private queue: string[] = [];
    private waiters: (() => void)[] = [];
    private closed = false;

    enqueue(id: string): void {
        if (this.closed) throw new QueueClosedError();
        this.queue.push(id);
        this.notifyOne();
    }

    /** Resolves with the next id, or null once the queue has been closed. */
    async dequeue(): Promise<string | null> {
        while (this.queue.length === 0) {
            if (this.closed) return null;
            await new Promise<void>((resolve) => {
                this.waiters.push(resolve);
            });
        }
        if (this.closed) return null;
        return this.queue.shift() ?? null;
    }

    get size(): number {
        return this.queue.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** Stops handing out work; ids still queued stay pending in the store. */
    close(): void {
        this.closed = true;
        for (const resolve of this.waiters.splice(0)) resolve();
    }

    private notifyOne(): void {
        const resolve = this.waiters.shift();
        if (resolve) resolve();
    }
}
