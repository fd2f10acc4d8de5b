import { Mutex } from 'async-mutex';
import { appendFileSync, existsSync, mkdirSync, statSync } from 'node:fs';
import path from 'node:path';
import type { Product } from '@/types';

export interface ProductSink {
    append(product: Product): Promise<void>;
}

const COLUMNS: [string, (p: Product) => unknown][] = [
    ['client_name', (p) => p.clientName],
    ['category', (p) => p.category],
    ['task_id', (p) => p.taskId],
    ['title', (p) => p.title],
    ['price', (p) => p.price],
    ['images', (p) => p.images],
    ['about_this_item', (p) => p.aboutThisItem],
    ['colors', (p) => p.colors],
    ['sizes', (p) => p.sizes],
    ['product_url', (p) => p.productUrl],
    ['related_links', (p) => p.relatedLinks],
    ['scraped_at', (p) => p.scrapedAt],
];

/**
 * Appends one row per product to a flat file. The header goes in only when
 * the file is missing or empty; rows are written one at a time.
 */
export class CsvSink implements ProductSink {
    private readonly mutex = new Mutex();

    constructor(
        private readonly filePath: string,
        private readonly delimiter: ',' | ';' | '\t' = ',',
    ) {}

    append(product: Product): Promise<void> {
        return this.mutex.runExclusive(() => {
            mkdirSync(path.dirname(this.filePath), { recursive: true });
            const needsHeader = !existsSync(this.filePath) || statSync(this.filePath).size === 0;
            const lines: string[] = [];
            if (needsHeader) lines.push(this.headerRow());
            lines.push(this.row(product));
            appendFileSync(this.filePath, lines.map((l) => `${l}\n`).join(''), 'utf-8');
        });
    }

    headerRow(): string {
        return COLUMNS.map(([header]) => escapeCsvValue(header, this.delimiter)).join(this.delimiter);
    }

    row(product: Product): string {
        return COLUMNS.map(([, read]) => escapeCsvValue(cellText(read(product)), this.delimiter)).join(this.delimiter);
    }
}

function cellText(value: unknown): string {
    if (Array.isArray(value)) return JSON.stringify(value);
    if (value === null || value === undefined) return '';
    return String(value);
}

export function escapeCsvValue(value: string, delimiter: string): string {
    const needsQuoting =
        value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r');
    return needsQuoting ? `"${value.replace(/"/g, '""')}"` : value;
}
