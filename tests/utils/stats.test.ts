import { describe, expect, it } from 'vitest';
import { LOG_RING_SIZE, Stats } from '@/utils/stats';
import { quietLogger } from '../helpers';

describe('Stats', () => {
    it('keeps only the most recent log entries', () => {
        const stats = new Stats();
        for (let i = 0; i < LOG_RING_SIZE + 5; i++) {
            stats.pushLog({ time: i, workerId: 'W-1', message: `m${String(i)}`, type: 'info' });
        }
        expect(stats.logs).toHaveLength(LOG_RING_SIZE);
        expect(stats.logs[0]?.message).toBe('m5');
    });

    it('counts settled tasks per worker', () => {
        const stats = new Stats();
        stats.registerWorker('W-1');
        stats.recordTaskSettled('W-1', 'completed', 100);
        stats.recordTaskSettled('W-1', 'failed', 300);
        expect(stats.totalCompleted).toBe(1);
        expect(stats.totalFailed).toBe(1);
        expect(stats.workers.get('W-1')?.tasksHandled).toBe(2);
        expect(stats.taskDuration.max).toBe(300);
    });

    it('receives activity lines from scoped loggers', () => {
        const stats = new Stats();
        quietLogger(stats).scoped('W-1').scoped('task').activity('scraped', 'success');
        expect(stats.logs).toEqual([
            { time: expect.any(Number), workerId: 'W-1/task', message: 'scraped', type: 'success' },
        ]);
    });
});
