export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed';

export const TASK_STATUSES = ['pending', 'running', 'completed', 'failed'] as const satisfies readonly TaskStatus[];

/** Set while a running task waits for someone to clear an anti-bot challenge. */
export interface BlockedState {
    reason: 'captcha';
    since: number;
}

export interface Task {
    id: string;
    clientName: string;
    category: string;
    url: string;
    status: TaskStatus;
    createdAt: number;
    startedAt: number | null;
    finishedAt: number | null;
    error: string | null;
    blocked: BlockedState | null;
    retryOf: string | null;
}

export interface SubmitTaskInput {
    clientName: string;
    category: string;
    url: string;
}

export interface Product {
    taskId: string;
    clientName: string;
    category: string;
    title: string;
    /** Raw text when the page price could not be parsed as a number. */
    price: number | string;
    images: string[];
    aboutThisItem: string[];
    colors: string[];
    sizes: string[];
    productUrl: string;
    relatedLinks: string[];
    scrapedAt: string;
}

export type ProductFields = Pick<
    Product,
    'title' | 'price' | 'images' | 'aboutThisItem' | 'colors' | 'sizes' | 'relatedLinks'
>;

export interface Client {
    id: string;
    clientName: string;
    clientEmail: string;
    registeredAt: number;
}

export interface TaskFilter {
    clientName?: string;
    status?: TaskStatus;
    category?: string;
}

export interface ProductFilter {
    clientName?: string;
    category?: string;
    minPrice?: number;
    maxPrice?: number;
}
