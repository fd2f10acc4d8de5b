import { describe, expect, it } from 'vitest';
import { PlaywrightSessionFactory } from '@/browser/playwrightSession';
import { createSessionFactory } from '@/browser/sessionFactory';
import { StaticSessionFactory } from '@/browser/staticSession';

const settings = { headless: true, userAgent: 'test-agent', navigationTimeoutMs: 1000 };

describe('createSessionFactory', () => {
    it('builds the driver that is configured', () => {
        expect(createSessionFactory({ ...settings, driver: 'static' })).toBeInstanceOf(StaticSessionFactory);
        expect(createSessionFactory({ ...settings, driver: 'playwright' })).toBeInstanceOf(PlaywrightSessionFactory);
    });
});
