import { chromium, errors } from 'playwright-core';
import type { Browser, BrowserContext, ElementHandle, Page } from 'playwright-core';
import type { BrowserSession, PageElement, PageHandle, SessionFactory } from '@/browser/page';
import { SessionError, errorMessage } from '@/errors';

export interface PlaywrightSessionOptions {
    headless: boolean;
    executablePath?: string;
    userAgent: string;
    navigationTimeoutMs: number;
    clickTimeoutMs?: number;
}

const CLOSED_PATTERNS = [
    'Target page, context or browser has been closed',
    'Target closed',
    'Browser has been closed',
    'browser has disconnected',
    'Page crashed',
];

/** Rethrows closed-target failures as SessionError; everything else unchanged. */
async function guard<T>(op: () => Promise<T>): Promise<T> {
    try {
        return await op();
    } catch (err) {
        const msg = errorMessage(err);
        if (CLOSED_PATTERNS.some((p) => msg.includes(p))) {
            throw new SessionError(msg, { cause: err });
        }
        throw err;
    }
}

class PlaywrightElement implements PageElement {
    constructor(
        private readonly handle: ElementHandle,
        private readonly clickTimeoutMs: number,
    ) {}

    text(): Promise<string> {
        return guard(async () => (await this.handle.innerText()) || ((await this.handle.textContent()) ?? ''));
    }

    attribute(name: string): Promise<string | null> {
        return guard(() => this.handle.getAttribute(name));
    }

    click(): Promise<void> {
        return guard(() => this.handle.click({ timeout: this.clickTimeoutMs }));
    }

    scrollIntoView(): Promise<void> {
        return guard(() => this.handle.scrollIntoViewIfNeeded({ timeout: this.clickTimeoutMs }));
    }

    queryAll(selector: string): Promise<PageElement[]> {
        return guard(async () => {
            const handles = await this.handle.$$(selector);
            return handles.map((h) => new PlaywrightElement(h, this.clickTimeoutMs));
        });
    }
}

class PlaywrightPage implements PageHandle {
    constructor(
        private readonly page: Page,
        private readonly options: PlaywrightSessionOptions,
    ) {}

    private get clickTimeoutMs(): number {
        return this.options.clickTimeoutMs ?? 5000;
    }

    goto(url: string): Promise<void> {
        return guard(async () => {
            const res = await this.page.goto(url, {
                waitUntil: 'domcontentloaded',
                timeout: this.options.navigationTimeoutMs,
            });
            if (res && res.status() >= 400) {
                throw new Error(`Unexpected status: ${String(res.status())} for ${url}`);
            }
        });
    }

    url(): string {
        return this.page.url();
    }

    content(): Promise<string> {
        return guard(() => this.page.content());
    }

    async waitFor(selector: string, timeoutMs: number): Promise<PageElement | null> {
        try {
            const handle = await guard(() => this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs }));
            return handle ? new PlaywrightElement(handle, this.clickTimeoutMs) : null;
        } catch (err) {
            if (err instanceof errors.TimeoutError) return null;
            throw err;
        }
    }

    query(selector: string): Promise<PageElement | null> {
        return guard(async () => {
            const handle = await this.page.$(selector);
            return handle ? new PlaywrightElement(handle, this.clickTimeoutMs) : null;
        });
    }

    queryAll(selector: string): Promise<PageElement[]> {
        return guard(async () => {
            const handles = await this.page.$$(selector);
            return handles.map((h) => new PlaywrightElement(h, this.clickTimeoutMs));
        });
    }
}

/** One Chromium instance per session; the session owns it until close. */
export class PlaywrightSessionFactory implements SessionFactory {
    constructor(private readonly options: PlaywrightSessionOptions) {}

    async open(): Promise<BrowserSession> {
        let browser: Browser;
        try {
            browser = await chromium.launch({
                headless: this.options.headless,
                executablePath: this.options.executablePath,
                args: [
                    '--no-sandbox',
                    '--disable-gpu',
                    '--disable-dev-shm-usage',
                    '--disable-blink-features=AutomationControlled',
                    '--lang=en-US,en',
                ],
            });
        } catch (err) {
            throw new SessionError(`Browser failed to start: ${errorMessage(err)}`, { cause: err });
        }

        let context: BrowserContext;
        let page: Page;
        try {
            context = await browser.newContext({
                viewport: { width: 1920, height: 1080 },
                userAgent: this.options.userAgent,
                locale: 'en-US',
            });
            page = await context.newPage();
        } catch (err) {
            const failure = new SessionError(`Browser context failed to open: ${errorMessage(err)}`, { cause: err });
            await browser.close().catch((closeErr: unknown) => {
                failure.message += ` (browser close failed: ${errorMessage(closeErr)})`;
            });
            throw failure;
        }

        return {
            page: new PlaywrightPage(page, this.options),
            close: async () => {
                try {
                    await context.close();
                } finally {
                    await browser.close();
                }
            },
        };
    }
}
