import '@/utils/env';

const int = (key: string, fallback: number): number => {
    const v = process.env[key];
    return v ? parseInt(v, 10) : fallback;
};

const bool = (key: string, fallback: boolean): boolean => {
    const v = process.env[key];
    if (!v) return fallback;
    return v === 'true' || v === '1';
};

const choice = <T extends string>(key: string, options: readonly T[], fallback: T): T => {
    const v = process.env[key];
    return options.find((o) => o === v) ?? fallback;
};

export const BROWSER_DRIVERS = ['playwright', 'static'] as const;
export type BrowserDriver = (typeof BROWSER_DRIVERS)[number];

export const config = Object.freeze({
    PORT: int('PORT', 3000),
    WORKER_COUNT: int('WORKER_COUNT', 2),
    DEBUG: bool('DEBUG', false),
    LOG_STDOUT: bool('LOG_STDOUT', true),

    // Browser sessions
    BROWSER_DRIVER: choice('BROWSER_DRIVER', BROWSER_DRIVERS, 'playwright'),
    HEADLESS: bool('HEADLESS', true),
    BROWSER_EXECUTABLE_PATH: process.env['BROWSER_EXECUTABLE_PATH'] || undefined,
    USER_AGENT:
        process.env['USER_AGENT'] ??
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/133.0.0.0 Safari/537.36',
    NAVIGATION_TIMEOUT_MS: int('NAVIGATION_TIMEOUT_MS', 45_000),
    NAVIGATION_SETTLE_MS: int('NAVIGATION_SETTLE_MS', 3000),
    SCROLL_SETTLE_MS: int('SCROLL_SETTLE_MS', 2000),
    IMAGE_SETTLE_MS: int('IMAGE_SETTLE_MS', 1000),
    CAPTCHA_WAIT_MS: int('CAPTCHA_WAIT_MS', 120_000),

    // Output
    CSV_FILE: process.env['CSV_FILE'] ?? 'output/products.csv',
    SELECTOR_PROFILE: process.env['SELECTOR_PROFILE'] || undefined,

    // Executor config
    URLS_FILE: process.env['URLS_FILE'] ?? 'urls.txt',
    BATCH_CATEGORY: process.env['BATCH_CATEGORY'] ?? 'uncategorized',
    OUTPUT_DIR: process.env['OUTPUT_DIR'] ?? 'output',
    API_BASE_URL: process.env['API_BASE_URL'] ?? 'http://localhost:3000',
    POLL_INTERVAL: int('POLL_INTERVAL', 1000),
});
