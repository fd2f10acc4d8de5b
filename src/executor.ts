import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { parseBatchFile, type BatchEntry } from '@/batch/batchFile';
import { config } from '@/config';
import { TASK_STATUSES } from '@/types';
import { getEnv } from '@/utils/env';
import { sleep } from '@/utils/sleep';

interface TaskTracker {
    taskId: string;
    entry: BatchEntry;
}

const submittedSchema = z.object({ taskId: z.string() });
const taskSchema = z.object({
    status: z.enum(TASK_STATUSES),
    error: z.string().nullable(),
});

async function main(): Promise<void> {
    console.log('🚀 Product Batch Executor\n');

    const clientName = getEnv('BATCH_CLIENT_NAME');
    const urlsPath = config.URLS_FILE;
    if (!existsSync(urlsPath)) {
        console.error(`❌ URLs file not found: ${urlsPath}`);
        process.exit(1);
    }

    const { entries, rejected } = parseBatchFile(readFileSync(urlsPath, 'utf-8'), config.BATCH_CATEGORY);
    for (const line of rejected) console.warn(`⚠️  Ignoring line: ${line}`);

    if (entries.length === 0) {
        console.error('❌ No valid URLs found in file');
        process.exit(1);
    }

    console.log(`📋 Loaded ${String(entries.length)} URLs from ${urlsPath}`);

    const outputDir = config.OUTPUT_DIR;
    if (!existsSync(outputDir)) {
        mkdirSync(outputDir, { recursive: true });
        console.log(`📁 Created output directory: ${outputDir}`);
    }

    const toProcess = entries.filter((entry) => !existsSync(join(outputDir, `${entry.key}.json`)));

    const skipped = entries.length - toProcess.length;
    if (skipped > 0) {
        console.log(`⏭️  Skipping ${String(skipped)} URLs (already have output files)`);
    }

    if (toProcess.length === 0) {
        console.log('\n✅ All URLs already processed!');
        process.exit(0);
    }

    console.log(`\n🚀 Submitting ${String(toProcess.length)} tasks as ${clientName}...`);

    const pending: TaskTracker[] = [];
    const baseUrl = config.API_BASE_URL;

    for (const entry of toProcess) {
        try {
            const res = await fetch(`${baseUrl}/tasks`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ clientName, category: entry.category, url: entry.url }),
            });

            if (!res.ok) {
                console.error(`❌ Failed to submit ${entry.url}: ${res.statusText}`);
                continue;
            }

            const data = submittedSchema.parse(await res.json());
            pending.push({ taskId: data.taskId, entry });
        } catch (err) {
            console.error(`❌ Failed to submit ${entry.url}:`, err);
        }
    }

    console.log(`✓ Submitted ${String(pending.length)} tasks\n`);

    if (pending.length === 0) {
        console.error('❌ No tasks were submitted successfully');
        process.exit(1);
    }

    let completed = 0;
    let failed = 0;
    const startTime = Date.now();

    while (pending.length > 0) {
        const stillPending: TaskTracker[] = [];

        for (const tracker of pending) {
            try {
                const res = await fetch(`${baseUrl}/tasks/${tracker.taskId}`);
                if (!res.ok) {
                    stillPending.push(tracker);
                    continue;
                }

                const task = taskSchema.parse(await res.json());

                if (task.status === 'completed') {
                    const productRes = await fetch(`${baseUrl}/tasks/${tracker.taskId}/product`);
                    if (!productRes.ok) {
                        stillPending.push(tracker);
                        continue;
                    }
                    const product: unknown = await productRes.json();
                    const outputPath = join(outputDir, `${tracker.entry.key}.json`);
                    writeFileSync(outputPath, JSON.stringify(product, null, 2));
                    completed++;
                    console.log(`✓ ${tracker.entry.url} → ${outputPath}`);
                } else if (task.status === 'failed') {
                    failed++;
                    console.log(`✗ ${tracker.entry.url} → ${task.error ?? 'Unknown error'}`);
                } else {
                    stillPending.push(tracker);
                }
            } catch (err) {
                console.error(`⚠️  Poll failed for ${tracker.taskId}:`, err);
                stillPending.push(tracker);
            }
        }

        pending.length = 0;
        pending.push(...stillPending);

        if (pending.length > 0) {
            const total = completed + failed + pending.length;
            const progress = Math.round(((completed + failed) / total) * 100);
            process.stdout.write(
                `\r⏳ Processing... ${String(progress)}% (${String(completed)} done, ${String(failed)} failed, ${String(pending.length)} remaining)   `,
            );
            await sleep(config.POLL_INTERVAL);
        }
    }

    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log('\n\n📊 Summary:');
    console.log(`   Completed: ${String(completed)}`);
    console.log(`   Failed: ${String(failed)}`);
    console.log(`   Skipped: ${String(skipped)}`);
    console.log(`   Duration: ${duration}s`);
}

main().catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exit(1);
});
