import { request } from 'undici';
import { HtmlPage, type HtmlLoader } from '@/browser/htmlPage';
import type { BrowserSession, SessionFactory } from '@/browser/page';

export interface StaticSessionOptions {
    userAgent: string;
    timeoutMs: number;
}

/**
 * Plain HTTP fetch of the product page, parsed with cheerio. Suitable for
 * server-rendered pages; galleries that need script to swap images will
 * yield only the initially rendered image.
 */
export class StaticSessionFactory implements SessionFactory {
    constructor(private readonly options: StaticSessionOptions) {}

    async open(): Promise<BrowserSession> {
        const page = new HtmlPage(this.fetchHtml);
        return {
            page,
            close: async () => {},
        };
    }

    private fetchHtml: HtmlLoader = async (url) => {
        const res = await request(url, {
            method: 'GET',
            headers: {
                accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'accept-language': 'en-US,en;q=0.9',
                'user-agent': this.options.userAgent,
            },
            maxRedirections: 5,
            headersTimeout: this.options.timeoutMs,
            bodyTimeout: this.options.timeoutMs,
        });
        const body = await res.body.text();
        if (res.statusCode < 200 || res.statusCode >= 300) {
            throw new Error(`Unexpected status: ${String(res.statusCode)} for ${url}`);
        }
        return body;
    };
}
