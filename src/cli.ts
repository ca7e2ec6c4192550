#!/usr/bin/env node
import process from 'node:process';
import type pino from 'pino';
import { createReportContext } from './context.js';
import { cleanupOldReports } from './report/archive.js';
import { isDevEnv, loadEnvFile, resolveLogDir, resolveLogLevel } from './report/config.js';
import { fileExists, readText } from './report/fs.js';
import { generateReport } from './report/generate.js';
import { createLogger, parseLevel } from './report/logger.js';
import { ensureFresh } from './report/projects.js';
import { dumpSamplePage } from './report/sample.js';

function usage(): void {
  console.error(`task-report CLI\n\nUsage:\n  task-report [run]              # refresh projects, then write target/tasks_report.{md,txt}\n  task-report projects [--force] # refresh the project name cache\n  task-report cleanup            # delete archived reports older than 7 days\n  task-report sample             # dump SAMPLE_TASK_PAGE_ID to target/sample_task.json\n  task-report show [md|txt]      # print the current report\n`);
  process.exit(2);
  return;
}

async function main() {
  loadEnvFile();
  const log = createLogger({
    level: parseLevel(resolveLogLevel()),
    logDir: resolveLogDir(),
    console: isDevEnv()
  });

  try {
    await runCommand(log);
  } catch (err) {
    log.fatal({ err }, 'task-report failed');
    throw err;
  }
}

async function runCommand(log: pino.Logger) {
  const [, , cmd = 'run', ...rest] = process.argv;
  const ctx = await createReportContext({ log });

  if (cmd === 'run') {
    const { buckets } = await generateReport(ctx);
    console.log(
      `high:${buckets.highPriority.length} today:${buckets.dueToday.length} overdue:${buckets.overdue.length} ` +
        `older:${buckets.olderOverdueCount} nodue:${buckets.noDueCount}`
    );
    return;
  }

  if (cmd === 'projects') {
    const cache = await ensureFresh(ctx, { force: rest.includes('--force') });
    console.log(`${Object.keys(cache.projects).length} projects (generated_at ${cache.generated_at})`);
    return;
  }

  if (cmd === 'cleanup') {
    const deleted = await cleanupOldReports(ctx);
    for (const p of deleted) console.log(p);
    return;
  }

  if (cmd === 'sample') {
    const pageId = process.env.SAMPLE_TASK_PAGE_ID;
    if (!pageId) {
      console.error('SAMPLE_TASK_PAGE_ID is not set');
      process.exit(2);
    }
    await dumpSamplePage(ctx, pageId);
    console.log(ctx.paths.sampleFile);
    return;
  }

  if (cmd === 'show') {
    const format = rest[0] ?? 'md';
    if (format !== 'md' && format !== 'txt') return usage();
    const p = format === 'md' ? ctx.paths.reportMd : ctx.paths.reportTxt;
    if (!(await fileExists(p))) {
      console.error(`No report at ${p}`);
      process.exit(1);
    }
    process.stdout.write(await readText(p));
    return;
  }

  return usage();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
