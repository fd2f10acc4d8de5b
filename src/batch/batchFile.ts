export interface BatchEntry {
    category: string;
    url: string;
    /** File-name-safe identifier for the entry's output. */
    key: string;
}

export interface ParsedBatch {
    entries: BatchEntry[];
    rejected: string[];
}

/**
 * One product per line, either `url` or `category,url` (tab also separates).
 * Blank lines and `#` comments are skipped; repeated URLs are kept once.
 */
export function parseBatchFile(text: string, defaultCategory: string): ParsedBatch {
    const entries: BatchEntry[] = [];
    const rejected: string[] = [];
    const seen = new Set<string>();

    for (const rawLine of text.split('\n')) {
        const line = rawLine.trim();
        if (line.length === 0 || line.startsWith('#')) continue;

        const sep = line.search(/[,\t]/);
        const category = sep > 0 ? line.slice(0, sep).trim() : defaultCategory;
        const url = (sep > 0 ? line.slice(sep + 1) : line).trim();

        if (!isHttpUrl(url) || category.length === 0) {
            rejected.push(line);
            continue;
        }
        if (seen.has(url)) continue;
        seen.add(url);
        entries.push({ category, url, key: outputKey(url) });
    }

    return { entries, rejected };
}

export function outputKey(url: string): string {
    const { hostname, pathname } = new URL(url);
    return `${hostname}${pathname}`
        .replace(/[^a-zA-Z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .slice(0, 120);
}

function isHttpUrl(value: string): boolean {
    try {
        const { protocol } = new URL(value);
        return protocol === 'http:' || protocol === 'https:';
    } catch {
        return false;
    }
}
