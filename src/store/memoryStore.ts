import { DuplicateClientError } from '@/errors';
import type { Client, Product, ProductFilter, Task, TaskFilter, TaskStatus } from '@/types';
import type { ClientRepository, ProductRepository, TaskPatch, TaskRepository } from '@/store/types';

export class MemoryTaskRepository implements TaskRepository {
    private store = new Map<string, Task>();

    async insert(task: Task): Promise<void> {
        if (this.store.has(task.id)) throw new Error(`Task ${task.id} already exists`);
        this.store.set(task.id, structuredClone(task));
    }

    async get(id: string): Promise<Task | null> {
        const task = this.store.get(id);
        return task ? structuredClone(task) : null;
    }

    async compareAndSet(id: string, expected: TaskStatus, patch: TaskPatch): Promise<Task | null> {
        const task = this.store.get(id);
        if (!task || task.status !== expected) return null;
        Object.assign(task, patch);
        return structuredClone(task);
    }

    async list(filter: TaskFilter = {}): Promise<Task[]> {
        return [...this.store.values()]
            .filter(
                (t) =>
                    (!filter.clientName || t.clientName === filter.clientName) &&
                    (!filter.status || t.status === filter.status) &&
                    (!filter.category || t.category === filter.category),
            )
            .sort((a, b) => b.createdAt - a.createdAt)
            .map((t) => structuredClone(t));
    }

    async countByStatus(): Promise<Record<TaskStatus, number>> {
        const counts: Record<TaskStatus, number> = { pending: 0, running: 0, completed: 0, failed: 0 };
        for (const task of this.store.values()) {
            counts[task.status]++;
        }
        return counts;
    }
}

export class MemoryProductRepository implements ProductRepository {
    private byTask = new Map<string, Product>();

    async insertOnce(product: Product): Promise<boolean> {
        if (this.byTask.has(product.taskId)) return false;
        this.byTask.set(product.taskId, structuredClone(product));
        return true;
    }

    async getByTask(taskId: string): Promise<Product | null> {
        const product = this.byTask.get(taskId);
        return product ? structuredClone(product) : null;
    }

    async list(filter: ProductFilter = {}): Promise<Product[]> {
        return [...this.byTask.values()]
            .filter(
                (p) =>
                    (!filter.clientName || p.clientName === filter.clientName) &&
                    (!filter.category || p.category === filter.category) &&
                    inPriceRange(p.price, filter),
            )
            .sort((a, b) => b.scrapedAt.localeCompare(a.scrapedAt))
            .map((p) => structuredClone(p));
    }
}

export class MemoryClientRepository implements ClientRepository {
    private byEmail = new Map<string, Client>();

    async insert(client: Client): Promise<void> {
        if (this.byEmail.has(client.clientEmail)) throw new DuplicateClientError(client.clientEmail);
        this.byEmail.set(client.clientEmail, structuredClone(client));
    }
}

/** Price bounds only ever match numeric prices. */
export function inPriceRange(price: Product['price'], filter: Pick<ProductFilter, 'minPrice' | 'maxPrice'>): boolean {
    if (filter.minPrice === undefined && filter.maxPrice === undefined) return true;
    if (typeof price !== 'number') return false;
    if (filter.minPrice !== undefined && price < filter.minPrice) return false;
    if (filter.maxPrice !== undefined && price > filter.maxPrice) return false;
    return true;
}
