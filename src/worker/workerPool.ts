import { Worker, type WorkerDeps } from '@/worker/worker';
import type { Logger } from '@/utils/logger';

/** Each worker holds at most one browser session, so the pool size caps concurrent sessions. */
export class WorkerPool {
    private workers: Worker[] = [];

    constructor(
        count: number,
        private readonly deps: WorkerDeps,
        logger: Logger,
    ) {
        for (let i = 0; i < Math.max(1, count); i++) {
            this.workers.push(new Worker(`W-${String(i + 1)}`, deps, logger));
        }
    }

    get size(): number {
        return this.workers.length;
    }

    start(): void {
        for (const worker of this.workers) {
            worker.start();
        }
    }

    /** Stops handing out work and waits for in-flight tasks to settle. */
    async stop(): Promise<void> {
        this.deps.queue.close();
        await Promise.all(this.workers.map((w) => w.stop()));
    }
}
