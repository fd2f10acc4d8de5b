import type { BrowserDriver } from '@/config';
import type { SessionFactory } from '@/browser/page';
import { PlaywrightSessionFactory } from '@/browser/playwrightSession';
import { StaticSessionFactory } from '@/browser/staticSession';

export interface DriverSettings {
    driver: BrowserDriver;
    headless: boolean;
    executablePath?: string;
    userAgent: string;
    navigationTimeoutMs: number;
}

export function createSessionFactory(settings: DriverSettings): SessionFactory {
    switch (settings.driver) {
        case 'static':
            return new StaticSessionFactory({
                userAgent: settings.userAgent,
                timeoutMs: settings.navigationTimeoutMs,
            });
        case 'playwright':
            return new PlaywrightSessionFactory({
                headless: settings.headless,
                executablePath: settings.executablePath,
                userAgent: settings.userAgent,
                navigationTimeoutMs: settings.navigationTimeoutMs,
            });
    }
}
