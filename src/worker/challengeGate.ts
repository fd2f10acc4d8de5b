export interface PendingChallenge {
    taskId: string;
    url: string;
    since: number;
}

interface Waiter {
    info: PendingChallenge;
    finish: (resolved: boolean) => void;
}

/**
 * Where a worker parks a task whose page shows an anti-bot challenge until an
 * operator reports it solved. Every wait is bounded and abortable so a stuck
 * page cannot hold a worker forever.
 */
export class ChallengeGate {
    private readonly waiting = new Map<string, Waiter>();

    /** Resolves true when `resolve(taskId)` is called, false on timeout or abort. */
    wait(info: PendingChallenge, timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
        if (timeoutMs <= 0 || signal?.aborted) return Promise.resolve(false);
        this.waiting.get(info.taskId)?.finish(false);

        return new Promise<boolean>((resolve) => {
            const onAbort = () => finish(false);
            const timer = setTimeout(() => finish(false), timeoutMs);
            const finish = (resolved: boolean) => {
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                if (this.waiting.get(info.taskId)?.finish === finish) this.waiting.delete(info.taskId);
                resolve(resolved);
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiting.set(info.taskId, { info, finish });
        });
    }

    resolve(taskId: string): boolean {
        const waiter = this.waiting.get(taskId);
        if (!waiter) return false;
        waiter.finish(true);
        return true;
    }

    list(): PendingChallenge[] {
        return [...this.waiting.values()].map((w) => ({ ...w.info })).sort((a, b) => a.since - b.since);
    }

    cancelAll(): void {
        for (const waiter of [...this.waiting.values()]) waiter.finish(false);
    }
}
