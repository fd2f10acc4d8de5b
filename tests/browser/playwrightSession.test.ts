import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PlaywrightSessionFactory } from '@/browser/playwrightSession';
import { SessionError } from '@/errors';

const pw = vi.hoisted(() => {
    class TimeoutError extends Error {}
    return { launch: vi.fn(), TimeoutError };
});

vi.mock('playwright-core', () => ({
    chromium: { launch: pw.launch },
    errors: { TimeoutError: pw.TimeoutError },
}));

const CLOSED = 'Target page, context or browser has been closed';
const PAGE_URL = 'https://shop.test/ip/widget/1';

function fakePage() {
    return {
        goto: vi.fn().mockResolvedValue(null),
        url: vi.fn().mockReturnValue(PAGE_URL),
        content: vi.fn().mockResolvedValue('<html></html>'),
        waitForSelector: vi.fn(),
        $: vi.fn().mockResolvedValue(null),
        $$: vi.fn().mockResolvedValue([]),
    };
}

function fakeHandle(text: string) {
    return {
        innerText: vi.fn().mockResolvedValue(text),
        textContent: vi.fn().mockResolvedValue(text),
        getAttribute: vi.fn().mockResolvedValue(null),
        click: vi.fn().mockResolvedValue(undefined),
        scrollIntoViewIfNeeded: vi.fn().mockResolvedValue(undefined),
        $$: vi.fn().mockResolvedValue([]),
    };
}

function fakeBrowser(page = fakePage()) {
    const context = { newPage: vi.fn().mockResolvedValue(page), close: vi.fn().mockResolvedValue(undefined) };
    const browser = { newContext: vi.fn().mockResolvedValue(context), close: vi.fn().mockResolvedValue(undefined) };
    pw.launch.mockResolvedValue(browser);
    return { browser, context, page };
}

const factory = () => new PlaywrightSessionFactory({ headless: true, userAgent: 'test-agent', navigationTimeoutMs: 1000 });

describe('PlaywrightSessionFactory', () => {
    beforeEach(() => {
        pw.launch.mockReset();
    });

    describe('open', () => {
        it('reports a launch failure as a session error', async () => {
            pw.launch.mockRejectedValue(new Error('Executable not found at /opt/chrome'));
            const opening = factory().open();
            await expect(opening).rejects.toBeInstanceOf(SessionError);
            await expect(opening).rejects.toThrow('Browser failed to start: Executable not found at /opt/chrome');
        });

        it('closes the browser when the context cannot open', async () => {
            const { browser } = fakeBrowser();
            browser.newContext.mockRejectedValue(new Error('Protocol error'));

            await expect(factory().open()).rejects.toThrow('Browser context failed to open: Protocol error');
            expect(browser.close).toHaveBeenCalledTimes(1);
        });

        it('keeps the context error when the browser close fails too', async () => {
            const { browser } = fakeBrowser();
            browser.newContext.mockRejectedValue(new Error('Protocol error'));
            browser.close.mockRejectedValue(new Error('Browser has been closed'));

            await expect(factory().open()).rejects.toThrow(
                'Browser context failed to open: Protocol error (browser close failed: Browser has been closed)',
            );
        });
    });

    describe('close', () => {
        it('closes the context and then the browser', async () => {
            const { browser, context } = fakeBrowser();
            const session = await factory().open();
            await session.close();
            expect(context.close).toHaveBeenCalledTimes(1);
            expect(browser.close).toHaveBeenCalledTimes(1);
        });

        it('still closes the browser when the context is already gone', async () => {
            const { browser, context } = fakeBrowser();
            context.close.mockRejectedValue(new Error(CLOSED));
            const session = await factory().open();

            await expect(session.close()).rejects.toThrow(CLOSED);
            expect(browser.close).toHaveBeenCalledTimes(1);
        });
    });

    describe('page', () => {
        it('fails navigation on an error status', async () => {
            const { page } = fakeBrowser();
            page.goto.mockResolvedValue({ status: () => 503 });
            const session = await factory().open();

            await expect(session.page.goto(PAGE_URL)).rejects.toThrow(`Unexpected status: 503 for ${PAGE_URL}`);
        });

        it('turns closed-target failures into session errors', async () => {
            const { page } = fakeBrowser();
            page.goto.mockRejectedValue(new Error(`page.goto: ${CLOSED}`));
            const session = await factory().open();

            await expect(session.page.goto(PAGE_URL)).rejects.toBeInstanceOf(SessionError);
        });

        it('leaves other navigation errors as they are', async () => {
            const { page } = fakeBrowser();
            page.goto.mockRejectedValue(new Error('net::ERR_NAME_NOT_RESOLVED'));
            const session = await factory().open();

            const err: unknown = await session.page.goto(PAGE_URL).catch((e: unknown) => e);
            expect(err).toBeInstanceOf(Error);
            expect(err).not.toBeInstanceOf(SessionError);
        });

        it('returns null when a selector wait times out', async () => {
            const { page } = fakeBrowser();
            page.waitForSelector.mockRejectedValue(new pw.TimeoutError('Timeout 100ms exceeded'));
            const session = await factory().open();

            expect(await session.page.waitFor('h1', 100)).toBeNull();
        });

        it('rethrows other selector wait errors', async () => {
            const { page } = fakeBrowser();
            page.waitForSelector.mockRejectedValue(new Error('Unsupported token "@"'));
            const session = await factory().open();

            await expect(session.page.waitFor('h1@', 100)).rejects.toThrow('Unsupported token "@"');
        });

        it('reads text from the matched element, falling back to textContent', async () => {
            const { page } = fakeBrowser();
            const visible = fakeHandle('Blue Widget');
            const hidden = fakeHandle('');
            hidden.textContent.mockResolvedValue('Hidden label');
            page.waitForSelector.mockResolvedValue(visible);
            page.$$.mockResolvedValue([hidden]);
            const session = await factory().open();

            const title = await session.page.waitFor('h1', 100);
            expect(await title?.text()).toBe('Blue Widget');
            const [label] = await session.page.queryAll('label');
            expect(await label?.text()).toBe('Hidden label');
        });

        it('turns a detached element into a session error once the page is closed', async () => {
            const { page } = fakeBrowser();
            const handle = fakeHandle('Blue Widget');
            handle.getAttribute.mockRejectedValue(new Error(`elementHandle.getAttribute: ${CLOSED}`));
            page.$.mockResolvedValue(handle);
            const session = await factory().open();

            const el = await session.page.query('img');
            await expect(el?.attribute('src')).rejects.toBeInstanceOf(SessionError);
        });
    });
});
