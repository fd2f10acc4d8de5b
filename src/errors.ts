import type { TaskStatus } from '@/types';

/**
 * The browser session itself is unusable (closed target, crashed browser,
 * failed launch). Field extraction never absorbs it; the task fails.
 */
export class SessionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SessionError';
    }
}

export class ChallengeTimeoutError extends SessionError {
    constructor(waitedMs: number) {
        super(
            waitedMs > 0
                ? `CAPTCHA challenge not resolved within ${String(Math.round(waitedMs / 1000))}s`
                : 'CAPTCHA challenge detected and no intervention window is configured',
        );
        this.name = 'ChallengeTimeoutError';
    }
}

export class TaskTransitionError extends Error {
    constructor(
        readonly taskId: string,
        readonly from: TaskStatus,
        readonly to: TaskStatus,
    ) {
        super(`Task ${taskId} cannot move from ${from} to ${to}`);
        this.name = 'TaskTransitionError';
    }
}

export class TaskNotFoundError extends Error {
    constructor(readonly taskId: string) {
        super(`Task ${taskId} not found`);
        this.name = 'TaskNotFoundError';
    }
}

/** The service is shutting down and takes no new work. */
export class QueueClosedError extends Error {
    constructor() {
        super('Task queue is closed');
        this.name = 'QueueClosedError';
    }
}

export class DuplicateClientError extends Error {
    constructor(readonly clientEmail: string) {
        super('Client already registered');
        this.name = 'DuplicateClientError';
    }
}

export function isSessionError(err: unknown): err is SessionError {
    return err instanceof SessionError;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
