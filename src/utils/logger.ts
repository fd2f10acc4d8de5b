import fs from 'node:fs';
import path from 'node:path';
import { config } from '@/config';
import type { Stats, LogEntry } from '@/utils/stats';

export interface LoggerOptions {
    /** Mirror every line to stdout. */
    stdout?: boolean;
    /** Append every line to this file. */
    file?: string | null;
}

export class ScopedLogger {
    constructor(
        private prefix: string,
        private logger: Logger,
    ) {}

    log(...args: unknown[]): void {
        this.logger.write(this.prefix, args.map(String).join(' '));
    }

    activity(message: string, type: LogEntry['type']): void {
        this.logger.write(this.prefix, message, {
            time: Date.now(),
            workerId: this.prefix,
            message,
            type,
        });
    }

    scoped(childPrefix: string): ScopedLogger {
        return new ScopedLogger(`${this.prefix}/${childPrefix}`, this.logger);
    }
}

export class Logger {
    private stream: fs.WriteStream | null = null;
    private stats: Stats;
    private stdout: boolean;

    constructor(stats: Stats, options: LoggerOptions = {}) {
        this.stats = stats;
        this.stdout = options.stdout ?? config.LOG_STDOUT;

        const file = options.file === undefined ? defaultLogFile() : options.file;
        if (file) {
            fs.mkdirSync(path.dirname(file), { recursive: true });
            this.stream = fs.createWriteStream(file, { flags: 'a' });
        }
    }

    scoped(prefix: string): ScopedLogger {
        return new ScopedLogger(prefix, this);
    }

    write(prefix: string, message: string, activityEntry?: LogEntry): void {
        if (this.stream || this.stdout) {
            const line = `${new Date().toISOString()} [${prefix}] ${message}\n`;
            this.stream?.write(line);
            if (this.stdout) process.stdout.write(line);
        }
        if (activityEntry) {
            this.stats.pushLog(activityEntry);
        }
    }

    destroy(): void {
        this.stream?.end();
    }
}

function defaultLogFile(): string | null {
    return config.DEBUG ? path.join(process.cwd(), 'logs', 'debug.log') : null;
}
