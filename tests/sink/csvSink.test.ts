import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CsvSink, escapeCsvValue } from '@/sink/csvSink';
import { product } from '../helpers';

const HEADER =
    'client_name,category,task_id,title,price,images,about_this_item,colors,sizes,product_url,related_links,scraped_at';

describe('CsvSink', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'csv-sink-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('writes the header once followed by one row per product', async () => {
        const file = path.join(dir, 'nested', 'products.csv');
        const sink = new CsvSink(file);
        await sink.append(
            product({
                taskId: 't1',
                title: 'Trail "Pro" Runner',
                images: ['https://shop.test/a.jpg'],
                aboutThisItem: ['Light, breathable'],
                colors: ['Red'],
            }),
        );
        await sink.append(product({ taskId: 't2', price: 'Contact us' }));

        expect(readFileSync(file, 'utf-8').split('\n')).toEqual([
            HEADER,
            'Acme,shoes,t1,"Trail ""Pro"" Runner",59.99,"[""https://shop.test/a.jpg""]","[""Light, breathable""]","[""Red""]","[""N/A""]",https://shop.test/ip/trail-runner/1,[],2026-01-01T00:00:00.000Z',
            'Acme,shoes,t2,Trail Runner,Contact us,[],[],"[""N/A""]","[""N/A""]",https://shop.test/ip/trail-runner/1,[],2026-01-01T00:00:00.000Z',
            '',
        ]);
    });

    it('adds the header to an existing empty file', async () => {
        const file = path.join(dir, 'products.csv');
        writeFileSync(file, '');
        await new CsvSink(file).append(product());
        expect(readFileSync(file, 'utf-8').startsWith(`${HEADER}\n`)).toBe(true);
    });

    it('keeps concurrent appends on separate lines', async () => {
        const file = path.join(dir, 'products.csv');
        const sink = new CsvSink(file);
        await Promise.all(['a', 'b', 'c'].map((taskId) => sink.append(product({ taskId }))));
        const lines = readFileSync(file, 'utf-8').trimEnd().split('\n');
        expect(lines).toHaveLength(4);
        expect(lines.filter((l) => l === HEADER)).toHaveLength(1);
    });
});

describe('escapeCsvValue', () => {
    it('quotes only when needed for the delimiter in use', () => {
        expect(escapeCsvValue('a;b', ';')).toBe('"a;b"');
        expect(escapeCsvValue('a,b', ';')).toBe('a,b');
        expect(escapeCsvValue('line\nbreak', ',')).toBe('"line\nbreak"');
        expect(escapeCsvValue('plain', ',')).toBe('plain');
    });
});
