import { describe, expect, it } from 'vitest';
import { DuplicateClientError } from '@/errors';
import {
    MemoryClientRepository,
    MemoryProductRepository,
    MemoryTaskRepository,
    inPriceRange,
} from '@/store/memoryStore';
import type { Task } from '@/types';
import { product } from '../helpers';

function task(id: string, overrides: Partial<Task> = {}): Task {
    return {
        id,
        clientName: 'Acme',
        category: 'shoes',
        url: `https://shop.test/ip/${id}`,
        status: 'pending',
        createdAt: 0,
        startedAt: null,
        finishedAt: null,
        error: null,
        blocked: null,
        retryOf: null,
        ...overrides,
    };
}

describe('MemoryTaskRepository', () => {
    it('lists newest first with filters', async () => {
        const repo = new MemoryTaskRepository();
        await repo.insert(task('a', { createdAt: 1 }));
        await repo.insert(task('b', { createdAt: 3, category: 'toys' }));
        await repo.insert(task('c', { createdAt: 2, clientName: 'Globex' }));

        expect((await repo.list()).map((t) => t.id)).toEqual(['b', 'c', 'a']);
        expect((await repo.list({ category: 'shoes' })).map((t) => t.id)).toEqual(['c', 'a']);
        expect((await repo.list({ clientName: 'Globex' })).map((t) => t.id)).toEqual(['c']);
    });

    it('only writes when the expected status matches', async () => {
        const repo = new MemoryTaskRepository();
        await repo.insert(task('a'));
        expect(await repo.compareAndSet('a', 'running', { status: 'completed' })).toBeNull();
        expect((await repo.compareAndSet('a', 'pending', { status: 'running' }))?.status).toBe('running');
        expect(await repo.countByStatus()).toEqual({ pending: 0, running: 1, completed: 0, failed: 0 });
    });

    it('hands out copies', async () => {
        const repo = new MemoryTaskRepository();
        await repo.insert(task('a'));
        const copy = await repo.get('a');
        if (copy) copy.status = 'failed';
        expect((await repo.get('a'))?.status).toBe('pending');
    });

    it('rejects a second insert of the same id', async () => {
        const repo = new MemoryTaskRepository();
        await repo.insert(task('a'));
        await expect(repo.insert(task('a'))).rejects.toThrow('Task a already exists');
    });
});

describe('MemoryProductRepository', () => {
    it('keeps the first product stored for a task', async () => {
        const repo = new MemoryProductRepository();
        expect(await repo.insertOnce(product({ taskId: 't-1', title: 'First' }))).toBe(true);
        expect(await repo.insertOnce(product({ taskId: 't-1', title: 'Second' }))).toBe(false);
        expect((await repo.getByTask('t-1'))?.title).toBe('First');
        expect(await repo.getByTask('t-2')).toBeNull();
    });

    it('filters by price and lists the newest scrape first', async () => {
        const repo = new MemoryProductRepository();
        await repo.insertOnce(product({ taskId: 'cheap', price: 5, scrapedAt: '2026-01-01T00:00:00.000Z' }));
        await repo.insertOnce(product({ taskId: 'mid', price: 20, scrapedAt: '2026-01-03T00:00:00.000Z' }));
        await repo.insertOnce(product({ taskId: 'text', price: 'Contact us', scrapedAt: '2026-01-02T00:00:00.000Z' }));

        expect((await repo.list()).map((p) => p.taskId)).toEqual(['mid', 'text', 'cheap']);
        expect((await repo.list({ minPrice: 10 })).map((p) => p.taskId)).toEqual(['mid']);
        expect((await repo.list({ maxPrice: 10 })).map((p) => p.taskId)).toEqual(['cheap']);
    });
});

describe('inPriceRange', () => {
    it('accepts everything without bounds and only numbers with them', () => {
        expect(inPriceRange('Contact us', {})).toBe(true);
        expect(inPriceRange('Contact us', { minPrice: 0 })).toBe(false);
        expect(inPriceRange(10, { minPrice: 10, maxPrice: 10 })).toBe(true);
    });
});

describe('MemoryClientRepository', () => {
    it('rejects a second client with the same email', async () => {
        const repo = new MemoryClientRepository();
        const client = { id: 'c1', clientName: 'Acme', clientEmail: 'ops@acme.test', registeredAt: 1 };
        await repo.insert(client);
        await expect(repo.insert({ ...client, id: 'c2' })).rejects.toBeInstanceOf(DuplicateClientError);
        await expect(repo.insert({ ...client, id: 'c3', clientEmail: 'sales@acme.test' })).resolves.toBeUndefined();
    });
});
