import { load, type CheerioAPI } from 'cheerio';
import type { PageElement, PageHandle } from '@/browser/page';

type Selection = ReturnType<CheerioAPI>;

export type HtmlLoader = (url: string) => Promise<string>;

/**
 * Called when an element is clicked. The handler may mutate the document,
 * which is how gallery thumbnails swap the main image in a static page.
 */
export type ClickHandler = (target: Selection, $: CheerioAPI) => void;

export interface HtmlPageOptions {
    onClick?: ClickHandler;
}

class HtmlElement implements PageElement {
    constructor(
        private readonly page: HtmlPage,
        private readonly selection: Selection,
    ) {}

    async text(): Promise<string> {
        return this.selection.text();
    }

    async attribute(name: string): Promise<string | null> {
        return this.selection.attr(name) ?? null;
    }

    async click(): Promise<void> {
        this.page.dispatchClick(this.selection);
    }

    async scrollIntoView(): Promise<void> {}

    async queryAll(selector: string): Promise<PageElement[]> {
        return this.page.wrapAll(this.selection.find(selector));
    }
}

/**
 * A page over a parsed HTML document. Nothing renders, so every element is
 * present immediately and waits never block.
 */
export class HtmlPage implements PageHandle {
    private $: CheerioAPI = load('');
    private currentUrl = 'about:blank';

    constructor(
        private readonly loader: HtmlLoader,
        private readonly options: HtmlPageOptions = {},
    ) {}

    async goto(url: string): Promise<void> {
        const html = await this.loader(url);
        this.$ = load(html);
        this.currentUrl = url;
    }

    url(): string {
        return this.currentUrl;
    }

    async content(): Promise<string> {
        return this.$.html();
    }

    async waitFor(selector: string, _timeoutMs: number): Promise<PageElement | null> {
        return this.query(selector);
    }

    async query(selector: string): Promise<PageElement | null> {
        const first = this.$(selector).first();
        return first.length > 0 ? new HtmlElement(this, first) : null;
    }

    async queryAll(selector: string): Promise<PageElement[]> {
        return this.wrapAll(this.$(selector));
    }

    wrapAll(selection: Selection): PageElement[] {
        return selection.toArray().map((el) => new HtmlElement(this, this.$(el)));
    }

    dispatchClick(target: Selection): void {
        this.options.onClick?.(target, this.$);
    }
}
