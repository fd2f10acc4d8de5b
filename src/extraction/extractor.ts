import type { PageHandle } from '@/browser/page';
import { errorMessage, isSessionError } from '@/errors';
import { parsePrice } from '@/extraction/price';
import type { FieldChain, SelectorProfile } from '@/extraction/profile';
import { absorb, collectFirstGroup, firstMatch, resolveUrl, scrollTo, stripQuery } from '@/extraction/strategies';
import type { ProductFields } from '@/types';
import type { ScopedLogger } from '@/utils/logger';
import { sleep } from '@/utils/sleep';

export const NOT_AVAILABLE = 'N/A';

export interface ExtractionTiming {
    /** Pause after scrolling a panel into view. */
    scrollSettleMs: number;
    /** Pause after clicking a gallery thumbnail. */
    imageSettleMs: number;
}

/**
 * Pulls every product field from a loaded page. Steps run in a fixed order
 * because later ones rely on the scroll position left by earlier ones.
 */
export async function extractProduct(
    page: PageHandle,
    profile: SelectorProfile,
    timing: ExtractionTiming,
    logger?: ScopedLogger,
): Promise<ProductFields> {
    const title = await absorb<string>(
        'title',
        NOT_AVAILABLE,
        async () => (await firstMatch(page, profile.title, logger)) ?? NOT_AVAILABLE,
        logger,
    );
    const price = await absorb<number | string>('price', 0, () => extractPrice(page, profile.price, logger), logger);
    const images = await absorb<string[]>(
        'images',
        [],
        () => extractImages(page, profile.gallery, timing, logger),
        logger,
    );
    const colors = await absorb<string[]>('colors', [NOT_AVAILABLE], () => extractColors(page, profile.colors), logger);
    const sizes = await absorb<string[]>('sizes', [NOT_AVAILABLE], () => extractSizes(page, profile.sizes), logger);
    const aboutThisItem = await absorb<string[]>(
        'aboutThisItem',
        [],
        () => extractAbout(page, profile.about, timing),
        logger,
    );
    const relatedLinks = await absorb<string[]>(
        'relatedLinks',
        [],
        () => extractRelatedLinks(page, profile.relatedLinks),
        logger,
    );

    return { title, price, images, aboutThisItem, colors, sizes, relatedLinks };
}

export async function extractPrice(page: PageHandle, chain: FieldChain, logger?: ScopedLogger): Promise<number | string> {
    const text = await firstMatch(page, chain, logger);
    return text === null ? 0 : parsePrice(text);
}

/** Clicks through the first thumbnails and records each main image the gallery shows. */
export async function extractImages(
    page: PageHandle,
    gallery: SelectorProfile['gallery'],
    timing: ExtractionTiming,
    logger?: ScopedLogger,
): Promise<string[]> {
    await scrollTo(page, gallery.container, gallery.timeoutMs, timing.scrollSettleMs);
    const thumbnails = (await page.queryAll(gallery.thumbnails)).slice(0, gallery.limit);
    const urls: string[] = [];

    for (const thumb of thumbnails) {
        try {
            await thumb.click();
            await sleep(timing.imageSettleMs);
            const main = await page.query(gallery.mainImage);
            const src = main ? (await main.attribute('src'))?.trim() : undefined;
            const url = src ? resolveUrl(src, page.url()) : null;
            if (url && !urls.includes(url)) urls.push(url);
        } catch (err) {
            if (isSessionError(err)) throw err;
            logger?.log(`Thumbnail skipped: ${errorMessage(err)}`);
        }
    }
    return urls;
}

export async function extractColors(page: PageHandle, colors: SelectorProfile['colors']): Promise<string[]> {
    const labelled = await collectFirstGroup(page, colors.groups);
    if (labelled.length > 0) return labelled;

    const fromAlt = new Set<string>();
    for (const img of await page.queryAll(colors.imageAltFallback)) {
        const alt = (await img.attribute('alt'))?.trim();
        if (alt) fromAlt.add(alt);
    }
    return fromAlt.size > 0 ? [...fromAlt] : [NOT_AVAILABLE];
}

export async function extractSizes(page: PageHandle, sizes: SelectorProfile['sizes']): Promise<string[]> {
    const placeholder = sizes.placeholder.toLowerCase();
    const found = await collectFirstGroup(page, sizes.groups, (value) => value.toLowerCase() !== placeholder);
    return found.length > 0 ? found : [NOT_AVAILABLE];
}

export async function extractAbout(
    page: PageHandle,
    about: SelectorProfile['about'],
    timing: ExtractionTiming,
): Promise<string[]> {
    await scrollTo(page, about.container, about.scrollTimeoutMs, timing.scrollSettleMs);
    const panel = await page.waitFor(about.container, about.timeoutMs);
    if (!panel) return [];

    const bullets: string[] = [];
    for (const item of await panel.queryAll(about.item)) {
        const text = (await item.text()).trim();
        if (text) bullets.push(text);
    }
    return bullets;
}

export async function extractRelatedLinks(
    page: PageHandle,
    related: SelectorProfile['relatedLinks'],
): Promise<string[]> {
    const links = new Set<string>();
    for (const anchor of await page.queryAll(related.anchor)) {
        const href = (await anchor.attribute('href'))?.trim();
        if (!href) continue;
        const url = resolveUrl(href, page.url());
        if (url) links.add(stripQuery(url));
    }
    return [...links];
}
