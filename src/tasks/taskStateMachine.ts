import { Mutex } from 'async-mutex';
import { nanoid } from 'nanoid';
import { TaskNotFoundError, TaskTransitionError } from '@/errors';
import type { TaskPatch, TaskRepository } from '@/store/types';
import type { BlockedState, SubmitTaskInput, Task, TaskStatus } from '@/types';

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
    pending: ['running'],
    running: ['completed', 'failed'],
    completed: [],
    failed: [],
};

export function isTerminal(status: TaskStatus): boolean {
    return TRANSITIONS[status].length === 0;
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

export interface TaskStateMachineOptions {
    now?: () => number;
}

/**
 * Owns every write to a task record. Writes for one task are serialized
 * through a per-task mutex and applied with compare-and-set, so a task can
 * only ever be started by one worker and settles exactly once.
 */
export class TaskStateMachine {
    private readonly locks = new Map<string, Mutex>();
    private readonly settleWaiters = new Map<string, ((task: Task) => void)[]>();
    private readonly now: () => number;

    constructor(
        private readonly tasks: TaskRepository,
        options: TaskStateMachineOptions = {},
    ) {
        this.now = options.now ?? Date.now;
    }

    async create(input: SubmitTaskInput, retryOf: string | null = null): Promise<Task> {
        const task: Task = {
            id: nanoid(),
            clientName: input.clientName,
            category: input.category,
            url: input.url,
            status: 'pending',
            createdAt: this.now(),
            startedAt: null,
            finishedAt: null,
            error: null,
            blocked: null,
            retryOf,
        };
        await this.tasks.insert(task);
        return task;
    }

    begin(id: string): Promise<Task> {
        return this.transition(id, 'running', { startedAt: this.now() });
    }

    complete(id: string): Promise<Task> {
        return this.transition(id, 'completed', { finishedAt: this.now(), blocked: null });
    }

    fail(id: string, error: string): Promise<Task> {
        return this.transition(id, 'failed', { finishedAt: this.now(), blocked: null, error });
    }

    /** Marks or clears the CAPTCHA suspension on a running task. */
    async setBlocked(id: string, blocked: BlockedState | null): Promise<Task> {
        return this.lockFor(id).runExclusive(async () => {
            const updated = await this.tasks.compareAndSet(id, 'running', { blocked });
            if (updated) return updated;
            const current = await this.tasks.get(id);
            if (!current) throw new TaskNotFoundError(id);
            throw new TaskTransitionError(id, current.status, 'running');
        });
    }

    /** Resolves once the task is completed or failed. */
    async waitForSettled(id: string): Promise<Task> {
        const pending = new Promise<Task>((resolve) => {
            const list = this.settleWaiters.get(id) ?? [];
            list.push(resolve);
            this.settleWaiters.set(id, list);
        });
        const current = await this.tasks.get(id);
        if (!current) {
            this.settleWaiters.delete(id);
            throw new TaskNotFoundError(id);
        }
        if (isTerminal(current.status)) {
            this.notifySettled(current);
        }
        return pending;
    }

    private async transition(id: string, to: TaskStatus, patch: TaskPatch): Promise<Task> {
        const updated = await this.lockFor(id).runExclusive(async () => {
            const current = await this.tasks.get(id);
            if (!current) throw new TaskNotFoundError(id);
            if (!canTransition(current.status, to)) {
                throw new TaskTransitionError(id, current.status, to);
            }
            const next = await this.tasks.compareAndSet(id, current.status, { ...patch, status: to });
            // Another process moved the task between the read and the write.
            if (!next) throw new TaskTransitionError(id, current.status, to);
            return next;
        });

        if (isTerminal(updated.status)) {
            this.locks.delete(id);
            this.notifySettled(updated);
        }
        return updated;
    }

    private lockFor(id: string): Mutex {
        let lock = this.locks.get(id);
        if (!lock) {
            lock = new Mutex();
            this.locks.set(id, lock);
        }
        return lock;
    }

    private notifySettled(task: Task): void {
        const waiters = this.settleWaiters.get(task.id);
        if (!waiters) return;
        this.settleWaiters.delete(task.id);
        for (const resolve of waiters) resolve(task);
    }
}
