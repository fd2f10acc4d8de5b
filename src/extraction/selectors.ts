import type { SelectorProfile } from '@/extraction/profile';

/** Selectors for the product-detail markup the service was built against. */
export const DEFAULT_PROFILE = {
    title: {
        strategies: [{ selector: 'h1.prod-ProductTitle' }, { selector: 'h1[itemprop="name"]' }],
        timeoutMs: 15_000,
    },
    price: {
        strategies: [
            { selector: 'span[itemprop="price"]' },
            { selector: 'span[data-automation-id="product-price"]' },
            { selector: 'span.price-characteristic' },
            { selector: 'div[data-testid="price"] span' },
            { selector: 'meta[itemprop="price"]', attribute: 'content' },
        ],
        timeoutMs: 10_000,
    },
    gallery: {
        container: 'div[data-testid="media-gallery"]',
        thumbnails: 'img[data-testid="media-gallery-thumbnail-image"]',
        mainImage: 'div[data-testid="media-gallery"] img',
        limit: 5,
        timeoutMs: 10_000,
    },
    colors: {
        groups: [
            'ul[data-tl-id*="color"] button span',
            'ul[data-tl-id*="color"] label span',
            'div[data-automation-id="color-picker"] label span',
            '[aria-label*="Color"]',
            'button[aria-checked="true"] span',
            '[itemprop="color"]',
        ],
        imageAltFallback: 'img[alt*="color"], img[alt*="Color"]',
    },
    sizes: {
        groups: [
            'ul[data-tl-id*="size"] button span',
            'ul[data-tl-id*="size"] label span',
            'div[data-automation-id="size-picker"] label',
            '[aria-label*="Size"]',
            'button[aria-checked="true"] span',
        ],
        placeholder: 'select',
    },
    about: {
        container: 'div.dangerous-html.mb3',
        item: 'p',
        scrollTimeoutMs: 15_000,
        timeoutMs: 12_000,
    },
    relatedLinks: {
        anchor: 'a[href*="/ip/"]',
    },
    challengeMarkers: ['captcha'],
} satisfies SelectorProfile;
