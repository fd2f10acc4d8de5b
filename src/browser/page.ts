/**
 * The slice of browser automation the extraction engine needs. Drivers map
 * their own errors onto two outcomes: a selector wait that times out yields
 * null, and a dead page/context/browser throws SessionError.
 */
export interface PageElement {
    text(): Promise<string>;
    attribute(name: string): Promise<string | null>;
    click(): Promise<void>;
    scrollIntoView(): Promise<void>;
    queryAll(selector: string): Promise<PageElement[]>;
}

export interface PageHandle {
    goto(url: string): Promise<void>;
    url(): string;
    content(): Promise<string>;
    waitFor(selector: string, timeoutMs: number): Promise<PageElement | null>;
    query(selector: string): Promise<PageElement | null>;
    queryAll(selector: string): Promise<PageElement[]>;
}

export interface BrowserSession {
    readonly page: PageHandle;
    close(): Promise<void>;
}

export interface SessionFactory {
    open(): Promise<BrowserSession>;
}
