import { Hono, type Context } from 'hono';
import type { ZodError } from 'zod';
import { issueList, productQuerySchema, registerClientSchema, submitTaskSchema, taskQuerySchema } from '@/api/schemas';
import type { ClientRegistry } from '@/clients/clientRegistry';
import type { Dispatcher } from '@/dispatcher/dispatcher';
import { DuplicateClientError, QueueClosedError, TaskNotFoundError, TaskTransitionError } from '@/errors';
import type { TaskQueue } from '@/queue/taskQueue';
import type { ProductRepository, TaskRepository } from '@/store/types';
import type { Stats } from '@/utils/stats';
import type { ChallengeGate } from '@/worker/challengeGate';

export interface RouteDeps {
    dispatcher: Dispatcher;
    tasks: TaskRepository;
    products: ProductRepository;
    clients: ClientRegistry;
    gate: ChallengeGate;
    queue: TaskQueue;
    stats: Stats;
    workerCount: number;
}

function invalid(c: Context, error: ZodError) {
    return c.json({ error: 'Validation failed', details: issueList(error) }, 400);
}

async function readJson(c: Context): Promise<unknown> {
    try {
        return await c.req.json<unknown>();
    } catch {
        return undefined;
    }
}

export function createRoutes(deps: RouteDeps): Hono {
    const { dispatcher, tasks, products, clients, gate, queue, stats } = deps;
    const app = new Hono({ strict: false });

    app.post('/clients', async (c) => {
        const parsed = registerClientSchema.safeParse(await readJson(c));
        if (!parsed.success) return invalid(c, parsed.error);
        try {
            const client = await clients.register(parsed.data.clientName, parsed.data.clientEmail);
            return c.json({ clientId: client.id }, 201);
        } catch (err) {
            if (err instanceof DuplicateClientError) return c.json({ error: err.message }, 409);
            throw err;
        }
    });

    app.post('/tasks', async (c) => {
        const parsed = submitTaskSchema.safeParse(await readJson(c));
        if (!parsed.success) return invalid(c, parsed.error);
        try {
            const task = await dispatcher.submit(parsed.data);
            return c.json({ taskId: task.id, status: task.status }, 201);
        } catch (err) {
            if (err instanceof QueueClosedError) return c.json({ error: 'Service is shutting down' }, 503);
            throw err;
        }
    });

    app.get('/tasks', async (c) => {
        const parsed = taskQuerySchema.safeParse(c.req.query());
        if (!parsed.success) return invalid(c, parsed.error);
        return c.json(await tasks.list(parsed.data));
    });

    app.get('/tasks/:taskId', async (c) => {
        const task = await tasks.get(c.req.param('taskId'));
        if (!task) return c.json({ error: 'Task not found' }, 404);
        return c.json(task);
    });

    app.get('/tasks/:taskId/product', async (c) => {
        const product = await products.getByTask(c.req.param('taskId'));
        if (!product) return c.json({ error: 'Product not found' }, 404);
        return c.json(product);
    });

    app.post('/tasks/:taskId/resubmit', async (c) => {
        try {
            const task = await dispatcher.resubmit(c.req.param('taskId'));
            return c.json({ taskId: task.id, retryOf: task.retryOf }, 201);
        } catch (err) {
            if (err instanceof TaskNotFoundError) return c.json({ error: 'Task not found' }, 404);
            if (err instanceof QueueClosedError) return c.json({ error: 'Service is shutting down' }, 503);
            if (err instanceof TaskTransitionError) {
                return c.json({ error: `Only failed tasks can be resubmitted (status: ${err.from})` }, 409);
            }
            throw err;
        }
    });

    app.post('/tasks/:taskId/resolve-challenge', (c) => {
        if (!gate.resolve(c.req.param('taskId'))) {
            return c.json({ error: 'No challenge is waiting for this task' }, 404);
        }
        return c.json({ resolved: true });
    });

    app.get('/challenges', (c) => c.json(gate.list()));

    app.get('/products', async (c) => {
        const parsed = productQuerySchema.safeParse(c.req.query());
        if (!parsed.success) return invalid(c, parsed.error);
        return c.json(await products.list(parsed.data));
    });

    app.get('/health', async (c) =>
        c.json({
            status: 'ok',
            uptimeMs: Date.now() - stats.startedAt,
            workerCount: deps.workerCount,
            queueDepth: queue.size,
            tasks: await tasks.countByStatus(),
            totalCompleted: stats.totalCompleted,
            totalFailed: stats.totalFailed,
            totalChallenges: stats.totalChallenges,
            tasksPerHour: stats.getTasksPerHour(),
            avgTaskMs: Math.round(stats.taskDuration.avg),
            maxTaskMs: stats.taskDuration.max,
            workers: [...stats.workers.values()],
            logs: stats.logs,
        }),
    );

    app.get('/logs', (c) => {
        // newest first
        const logs = [...stats.logs].reverse();
        return c.json({ logs });
    });

    return app;
}
