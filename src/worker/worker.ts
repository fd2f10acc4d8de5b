import { TaskNotFoundError, TaskTransitionError, errorMessage } from '@/errors';
import type { TaskQueue } from '@/queue/taskQueue';
import type { ProductScraper } from '@/scraper/productScraper';
import type { ProductSink } from '@/sink/csvSink';
import type { ProductRepository } from '@/store/types';
import type { TaskStateMachine } from '@/tasks/taskStateMachine';
import type { BlockedState, Product, Task } from '@/types';
import type { Logger, ScopedLogger } from '@/utils/logger';
import type { Stats } from '@/utils/stats';

export interface WorkerDeps {
    queue: TaskQueue;
    machine: TaskStateMachine;
    products: ProductRepository;
    scraper: ProductScraper;
    sink: ProductSink | null;
    stats: Stats;
}

export class Worker {
    private readonly logger: ScopedLogger;
    private readonly abort = new AbortController();
    private running: Promise<void> | null = null;

    constructor(
        private readonly id: string,
        private readonly deps: WorkerDeps,
        parentLogger: Logger,
    ) {
        this.logger = parentLogger.scoped(id);
        this.deps.stats.registerWorker(id);
    }

    start(): void {
        if (!this.running) this.running = this.loop();
    }

    /** Cancels any challenge wait and resolves when the loop has exited. */
    async stop(): Promise<void> {
        this.abort.abort();
        await this.running;
    }

    private async loop(): Promise<void> {
        while (true) {
            this.deps.stats.setWorkerStatus(this.id, 'idle');
            const taskId = await this.deps.queue.dequeue();
            if (taskId === null) return;

            try {
                await this.process(taskId);
            } catch (err) {
                this.logger.activity(`Task ${taskId} could not be settled: ${errorMessage(err)}`, 'error');
            }
        }
    }

    /**
     * Executes one task end to end. Returns the settled task, or null when the
     * task was not pending (another worker owns it or it already settled).
     */
    async process(taskId: string): Promise<Task | null> {
        const { machine, products, scraper, stats } = this.deps;

        let task: Task;
        try {
            task = await machine.begin(taskId);
        } catch (err) {
            if (err instanceof TaskTransitionError || err instanceof TaskNotFoundError) {
                this.logger.log(`Skipping ${taskId}: ${err.message}`);
                return null;
            }
            throw err;
        }

        const started = Date.now();
        const taskLogger = this.logger.scoped(taskId);
        stats.setWorkerStatus(this.id, 'active', taskId);

        let settled: Task;
        try {
            const fields = await scraper.scrape(task, taskLogger, {
                signal: this.abort.signal,
                onBlocked: (blocked) => this.onBlocked(taskId, blocked),
            });
            const product: Product = {
                taskId: task.id,
                clientName: task.clientName,
                category: task.category,
                title: fields.title,
                price: fields.price,
                images: fields.images,
                aboutThisItem: fields.aboutThisItem,
                colors: fields.colors,
                sizes: fields.sizes,
                productUrl: task.url,
                relatedLinks: fields.relatedLinks,
                scrapedAt: new Date().toISOString(),
            };

            if (await products.insertOnce(product)) {
                await this.export(product, taskLogger);
            } else {
                taskLogger.log('Product already stored for this task, keeping the first write');
            }
            settled = await machine.complete(taskId);
            this.logger.activity(`${task.url} scraped in ${String(Date.now() - started)}ms`, 'success');
        } catch (err) {
            const msg = errorMessage(err);
            settled = await machine.fail(taskId, msg);
            this.logger.activity(`${task.url}: ${msg}`, 'error');
        }

        stats.recordTaskSettled(this.id, settled.status === 'completed' ? 'completed' : 'failed', Date.now() - started);
        return settled;
    }

    /** Sink failures are reported but never fail the task. */
    private async export(product: Product, logger: ScopedLogger): Promise<void> {
        if (!this.deps.sink) return;
        try {
            await this.deps.sink.append(product);
        } catch (err) {
            logger.activity(`CSV export failed: ${errorMessage(err)}`, 'error');
        }
    }

    private async onBlocked(taskId: string, blocked: BlockedState | null): Promise<void> {
        await this.deps.machine.setBlocked(taskId, blocked);
        if (blocked) {
            this.deps.stats.recordChallenge();
            this.deps.stats.setWorkerStatus(this.id, 'blocked', taskId);
        } else {
            this.deps.stats.setWorkerStatus(this.id, 'active', taskId);
        }
    }
}
