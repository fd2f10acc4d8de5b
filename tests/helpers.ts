import { HtmlPage, type HtmlPageOptions } from '@/browser/htmlPage';
import type { BrowserSession, SessionFactory } from '@/browser/page';
import type { ProductSink } from '@/sink/csvSink';
import type { Product } from '@/types';
import { Logger } from '@/utils/logger';
import { Stats } from '@/utils/stats';

export function quietLogger(stats = new Stats()): Logger {
    return new Logger(stats, { stdout: false, file: null });
}

/** Serves fixed HTML per URL; unknown URLs fail like a DNS error. */
export class FakeSessions implements SessionFactory {
    opened = 0;
    closed = 0;
    lastPage: HtmlPage | null = null;

    constructor(
        public pages: Record<string, string>,
        private readonly options: HtmlPageOptions = {},
    ) {}

    async open(): Promise<BrowserSession> {
        this.opened++;
        const page = new HtmlPage(async (url) => {
            const html = this.pages[url];
            if (html === undefined) throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
            return html;
        }, this.options);
        this.lastPage = page;
        return {
            page,
            close: async () => {
                this.closed++;
            },
        };
    }
}

export class MemorySink implements ProductSink {
    rows: Product[] = [];

    async append(product: Product): Promise<void> {
        this.rows.push(product);
    }
}

export function productPage(title: string, price: string): string {
    return `<html><body>
        <h1 itemprop="name">${title}</h1>
        <span itemprop="price">${price}</span>
    </body></html>`;
}

export function product(overrides: Partial<Product> = {}): Product {
    return {
        taskId: 't-1',
        clientName: 'Acme',
        category: 'shoes',
        title: 'Trail Runner',
        price: 59.99,
        images: [],
        aboutThisItem: [],
        colors: ['N/A'],
        sizes: ['N/A'],
        productUrl: 'https://shop.test/ip/trail-runner/1',
        relatedLinks: [],
        scrapedAt: '2026-01-01T00:00:00.000Z',
        ...overrides,
    };
}
