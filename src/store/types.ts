import type { Client, Product, ProductFilter, Task, TaskFilter, TaskStatus } from '@/types';

export type TaskPatch = Partial<Pick<Task, 'status' | 'startedAt' | 'finishedAt' | 'error' | 'blocked'>>;

export interface TaskRepository {
    insert(task: Task): Promise<void>;
    get(id: string): Promise<Task | null>;
    /**
     * Applies `patch` only if the stored task is still in `expected` status.
     * Returns the updated task, or null when the status no longer matches.
     */
    compareAndSet(id: string, expected: TaskStatus, patch: TaskPatch): Promise<Task | null>;
    /** Newest `createdAt` first. */
    list(filter?: TaskFilter): Promise<Task[]>;
    countByStatus(): Promise<Record<TaskStatus, number>>;
}

export interface ProductRepository {
    /** Returns false when a product for the same task already exists. */
    insertOnce(product: Product): Promise<boolean>;
    getByTask(taskId: string): Promise<Product | null>;
    /** Newest `scrapedAt` first. */
    list(filter?: ProductFilter): Promise<Product[]>;
}

export interface ClientRepository {
    /** Throws DuplicateClientError when the email is taken. */
    insert(client: Client): Promise<void>;
}
