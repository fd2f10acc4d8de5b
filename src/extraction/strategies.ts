import type { PageElement, PageHandle } from '@/browser/page';
import { errorMessage, isSessionError } from '@/errors';
import type { FieldChain, SelectorStrategy } from '@/extraction/profile';
import type { ScopedLogger } from '@/utils/logger';
import { sleep } from '@/utils/sleep';

export async function readStrategy(el: PageElement, strategy: SelectorStrategy): Promise<string> {
    const value = strategy.attribute ? await el.attribute(strategy.attribute) : await el.text();
    return (value ?? '').trim();
}

/**
 * Tries each strategy in order and returns the first non-empty value, or null
 * when the whole chain comes up empty. Only session errors escape.
 */
export async function firstMatch(page: PageHandle, chain: FieldChain, logger?: ScopedLogger): Promise<string | null> {
    for (const strategy of chain.strategies) {
        try {
            const el = await page.waitFor(strategy.selector, chain.timeoutMs);
            if (!el) continue;
            const value = await readStrategy(el, strategy);
            if (value) return value;
        } catch (err) {
            if (isSessionError(err)) throw err;
            logger?.log(`Selector ${strategy.selector} failed: ${errorMessage(err)}`);
        }
    }
    return null;
}

/**
 * Text of every element matched by the first selector group that yields at
 * least one accepted value. Groups are never merged.
 */
export async function collectFirstGroup(
    page: PageHandle,
    groups: readonly string[],
    accept: (value: string) => boolean = () => true,
): Promise<string[]> {
    for (const selector of groups) {
        const values = new Set<string>();
        for (const el of await page.queryAll(selector)) {
            const value = (await el.text()).trim();
            if (value && accept(value)) values.add(value);
        }
        if (values.size > 0) return [...values];
    }
    return [];
}

export async function scrollTo(
    page: PageHandle,
    selector: string,
    timeoutMs: number,
    settleMs: number,
): Promise<PageElement | null> {
    const el = await page.waitFor(selector, timeoutMs);
    if (!el) return null;
    await el.scrollIntoView();
    await sleep(settleMs);
    return el;
}

/** Runs one field's extraction; anything short of a session error yields the fallback. */
export async function absorb<T>(field: string, fallback: T, run: () => Promise<T>, logger?: ScopedLogger): Promise<T> {
    try {
        return await run();
    } catch (err) {
        if (isSessionError(err)) throw err;
        logger?.log(`${field} extraction failed, using default: ${errorMessage(err)}`);
        return fallback;
    }
}

export function resolveUrl(href: string, base: string): string | null {
    try {
        return new URL(href, base).toString();
    } catch {
        return null;
    }
}

export function stripQuery(url: string): string {
    return url.split('?')[0] ?? url;
}
