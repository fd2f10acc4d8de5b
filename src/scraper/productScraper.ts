import type { PageHandle, SessionFactory } from '@/browser/page';
import { ChallengeTimeoutError, errorMessage } from '@/errors';
import { detectChallenge } from '@/extraction/challenge';
import { extractProduct, type ExtractionTiming } from '@/extraction/extractor';
import type { SelectorProfile } from '@/extraction/profile';
import type { BlockedState, ProductFields, Task } from '@/types';
import type { ScopedLogger } from '@/utils/logger';
import { sleep } from '@/utils/sleep';
import type { ChallengeGate } from '@/worker/challengeGate';

export interface ScrapeTiming extends ExtractionTiming {
    navigationSettleMs: number;
    /** How long a challenge page may wait for an operator; 0 fails at once. */
    challengeWaitMs: number;
}

export interface ScrapeHooks {
    onBlocked(blocked: BlockedState | null): Promise<void>;
    signal?: AbortSignal;
}

/** Runs one task's browser session from launch to close. */
export class ProductScraper {
    constructor(
        private readonly sessions: SessionFactory,
        private readonly gate: ChallengeGate,
        private readonly profile: SelectorProfile,
        private readonly timing: ScrapeTiming,
    ) {}

    async scrape(task: Task, logger: ScopedLogger, hooks: ScrapeHooks): Promise<ProductFields> {
        const session = await this.sessions.open();
        try {
            logger.log(`Navigating to ${task.url}`);
            await session.page.goto(task.url);
            await sleep(this.timing.navigationSettleMs);
            await this.clearChallenge(task, session.page, logger, hooks);
            return await extractProduct(session.page, this.profile, this.timing, logger);
        } finally {
            try {
                await session.close();
            } catch (err) {
                logger.log(`Session close failed: ${errorMessage(err)}`);
            }
        }
    }

    private async clearChallenge(task: Task, page: PageHandle, logger: ScopedLogger, hooks: ScrapeHooks): Promise<void> {
        const markers = this.profile.challengeMarkers;
        if (!detectChallenge(await page.content(), markers)) return;

        const since = Date.now();
        const deadline = since + this.timing.challengeWaitMs;
        logger.activity(`CAPTCHA on ${task.url}, waiting for intervention`, 'info');
        await hooks.onBlocked({ reason: 'captcha', since });
        try {
            while (true) {
                const remaining = deadline - Date.now();
                const resolved =
                    remaining > 0 && (await this.gate.wait({ taskId: task.id, url: task.url, since }, remaining, hooks.signal));
                if (!resolved) throw new ChallengeTimeoutError(this.timing.challengeWaitMs);
                if (!detectChallenge(await page.content(), markers)) {
                    logger.activity(`CAPTCHA cleared for ${task.url}`, 'info');
                    return;
                }
                logger.log('Challenge still present after resolution, waiting again');
            }
        } finally {
            await hooks.onBlocked(null);
        }
    }
}
