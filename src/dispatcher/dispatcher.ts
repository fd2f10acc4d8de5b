import { QueueClosedError, TaskNotFoundError, TaskTransitionError } from '@/errors';
import type { TaskQueue } from '@/queue/taskQueue';
import type { TaskRepository } from '@/store/types';
import type { TaskStateMachine } from '@/tasks/taskStateMachine';
import type { SubmitTaskInput, Task } from '@/types';
import type { ScopedLogger } from '@/utils/logger';

export const INTERRUPTED_ERROR = 'Interrupted: worker stopped before completion';

export class Dispatcher {
    constructor(
        private readonly machine: TaskStateMachine,
        private readonly queue: TaskQueue,
        private readonly tasks: TaskRepository,
        private readonly logger: ScopedLogger,
    ) {}

    /** The task record exists before this resolves; execution happens on a worker. */
    async submit(input: SubmitTaskInput): Promise<Task> {
        if (this.queue.isClosed) throw new QueueClosedError();
        const task = await this.machine.create(input);
        this.queue.enqueue(task.id);
        this.logger.log(`Task ${task.id} queued for ${task.url}`);
        return task;
    }

    /** Re-runs a failed task as a new task that points back at it. */
    async resubmit(taskId: string): Promise<Task> {
        const original = await this.tasks.get(taskId);
        if (!original) throw new TaskNotFoundError(taskId);
        if (original.status !== 'failed') {
            throw new TaskTransitionError(taskId, original.status, 'pending');
        }
        if (this.queue.isClosed) throw new QueueClosedError();
        const task = await this.machine.create(
            { clientName: original.clientName, category: original.category, url: original.url },
            original.id,
        );
        this.queue.enqueue(task.id);
        this.logger.activity(`Task ${original.id} resubmitted as ${task.id}`, 'info');
        return task;
    }

    /**
     * Startup recovery against a persistent store: pending tasks are queued
     * again, running tasks belong to a worker that no longer exists.
     */
    async recover(): Promise<{ requeued: number; interrupted: number }> {
        const pending = await this.tasks.list({ status: 'pending' });
        for (const task of [...pending].reverse()) {
            this.queue.enqueue(task.id);
        }

        const running = await this.tasks.list({ status: 'running' });
        for (const task of running) {
            await this.machine.fail(task.id, INTERRUPTED_ERROR);
        }

        if (pending.length > 0 || running.length > 0) {
            this.logger.activity(
                `Recovered ${String(pending.length)} pending, failed ${String(running.length)} interrupted`,
                'info',
            );
        }
        return { requeued: pending.length, interrupted: running.length };
    }
}
