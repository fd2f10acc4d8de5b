import type { TaskStatus } from '@/types';

export interface LogEntry {
    time: number;
    workerId: string;
    message: string;
    type: 'success' | 'error' | 'info';
}

export interface WorkerState {
    id: string;
    status: 'idle' | 'active' | 'blocked';
    currentTaskId: string | null;
    tasksHandled: number;
}

class RunningStats {
    max = 0;
    avg = 0;
    private count = 0;
    private alpha = 0.1;

    record(value: number): void {
        this.count++;
        if (value > this.max) this.max = value;
        this.avg = this.count === 1 ? value : this.avg * (1 - this.alpha) + value * this.alpha;
    }
}

export const LOG_RING_SIZE = 50;
const THROUGHPUT_WINDOW_MS = 60_000;

export class Stats {
    readonly taskDuration = new RunningStats();
    totalCompleted = 0;
    totalFailed = 0;
    totalChallenges = 0;
    readonly workers = new Map<string, WorkerState>();
    readonly logs: LogEntry[] = [];
    readonly startedAt = Date.now();

    private completionTimes: number[] = [];

    registerWorker(id: string): void {
        this.workers.set(id, { id, status: 'idle', currentTaskId: null, tasksHandled: 0 });
    }

    setWorkerStatus(id: string, status: WorkerState['status'], taskId: string | null = null): void {
        const w = this.workers.get(id);
        if (w) {
            w.status = status;
            w.currentTaskId = taskId;
        }
    }

    recordTaskSettled(workerId: string, status: Extract<TaskStatus, 'completed' | 'failed'>, durationMs: number): void {
        if (status === 'completed') {
            this.totalCompleted++;
            this.completionTimes.push(Date.now());
        } else {
            this.totalFailed++;
        }
        this.taskDuration.record(durationMs);

        const w = this.workers.get(workerId);
        if (w) w.tasksHandled++;
    }

    recordChallenge(): void {
        this.totalChallenges++;
    }

    pushLog(entry: LogEntry): void {
        this.logs.push(entry);
        if (this.logs.length > LOG_RING_SIZE) this.logs.shift();
    }

    getTasksPerHour(): number {
        const now = Date.now();
        const cutoff = now - THROUGHPUT_WINDOW_MS;
        this.completionTimes = this.completionTimes.filter((t) => t >= cutoff);
        const first = this.completionTimes[0];
        if (first === undefined) return 0;
        const windowMs = now - first;
        if (windowMs < 1000) return 0;
        return Math.round((this.completionTimes.length / windowMs) * 3_600_000);
    }
}
