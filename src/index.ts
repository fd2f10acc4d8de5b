import { serve } from '@hono/node-server';
import { createRoutes } from '@/api/routes';
import { createSessionFactory } from '@/browser/sessionFactory';
import { ClientRegistry } from '@/clients/clientRegistry';
import { config } from '@/config';
import { Dispatcher } from '@/dispatcher/dispatcher';
import { loadSelectorProfile } from '@/extraction/profile';
import { DEFAULT_PROFILE } from '@/extraction/selectors';
import { TaskQueue } from '@/queue/taskQueue';
import { ProductScraper } from '@/scraper/productScraper';
import { CsvSink } from '@/sink/csvSink';
import { MemoryClientRepository, MemoryProductRepository, MemoryTaskRepository } from '@/store/memoryStore';
import { TaskStateMachine } from '@/tasks/taskStateMachine';
import { Logger } from '@/utils/logger';
import { Stats } from '@/utils/stats';
import { ChallengeGate } from '@/worker/challengeGate';
import { WorkerPool } from '@/worker/workerPool';

const stats = new Stats();
const logger = new Logger(stats);
const serverLog = logger.scoped('Server');

const profile = config.SELECTOR_PROFILE ? await loadSelectorProfile(config.SELECTOR_PROFILE) : DEFAULT_PROFILE;
if (config.SELECTOR_PROFILE) serverLog.log(`Loaded selector profile from ${config.SELECTOR_PROFILE}`);

const tasks = new MemoryTaskRepository();
const products = new MemoryProductRepository();
const machine = new TaskStateMachine(tasks);
const taskQueue = new TaskQueue();
const gate = new ChallengeGate();
const dispatcher = new Dispatcher(machine, taskQueue, tasks, logger.scoped('Dispatcher'));

const sessions = createSessionFactory({
    driver: config.BROWSER_DRIVER,
    headless: config.HEADLESS,
    executablePath: config.BROWSER_EXECUTABLE_PATH,
    userAgent: config.USER_AGENT,
    navigationTimeoutMs: config.NAVIGATION_TIMEOUT_MS,
});
const scraper = new ProductScraper(sessions, gate, profile, {
    navigationSettleMs: config.NAVIGATION_SETTLE_MS,
    scrollSettleMs: config.SCROLL_SETTLE_MS,
    imageSettleMs: config.IMAGE_SETTLE_MS,
    challengeWaitMs: config.CAPTCHA_WAIT_MS,
});

const pool = new WorkerPool(
    config.WORKER_COUNT,
    { queue: taskQueue, machine, products, scraper, sink: new CsvSink(config.CSV_FILE), stats },
    logger,
);

await dispatcher.recover();
pool.start();
serverLog.log(`Worker pool started (${String(pool.size)} workers, ${config.BROWSER_DRIVER} driver)`);

const app = createRoutes({
    dispatcher,
    tasks,
    products,
    clients: new ClientRegistry(new MemoryClientRepository()),
    gate,
    queue: taskQueue,
    stats,
    workerCount: pool.size,
});

const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    serverLog.log(`Listening on http://localhost:${String(info.port)}`);
});

function shutdown(signal: string): void {
    serverLog.log(`${signal} received, draining workers`);
    server.close();
    pool.stop()
        .then(() => {
            logger.destroy();
            process.exit(0);
        })
        .catch((err: unknown) => {
            serverLog.log(`Shutdown failed: ${String(err)}`);
            process.exit(1);
        });
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
