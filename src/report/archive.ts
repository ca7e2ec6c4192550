import path from 'node:path';
import { archiveStamp } from './dates.js';
import { fileExists, listFiles, modifiedAt, moveFile, removeFile } from './fs.js';
import type { ReportContext } from './types.js';

export const RETENTION_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

// Same shape as the glob tasks_report_*.{md,txt}
const ARCHIVE_RE = /^tasks_report_.*\.(md|txt)$/;

export function archivePathFor(reportPath: string, stamp: string): string {
  const ext = path.extname(reportPath);
  const base = path.basename(reportPath, ext);
  return path.join(path.dirname(reportPath), `${base}_${stamp}${ext}`);
}

/** Moves the current report pair to dated archive names. Returns the new paths. */
export async function rotateReports(ctx: ReportContext): Promise<string[]> {
  const stamp = archiveStamp(ctx.clock(), ctx.timeZone);
  const moved: string[] = [];
  for (const current of [ctx.paths.reportMd, ctx.paths.reportTxt]) {
    if (!(await fileExists(current))) continue;
    const target = archivePathFor(current, stamp);
    await moveFile(current, target);
    ctx.log.info({ from: current, to: target }, 'Archived report');
    moved.push(target);
  }
  return moved;
}

/**
 * Deletes dated reports whose age in whole days exceeds the retention threshold.
 * A file that cannot be inspected or removed is logged and skipped.
 */
export async function cleanupOldReports(ctx: ReportContext): Promise<string[]> {
  const now = ctx.clock().getTime();
  const deleted: string[] = [];
  const files = await listFiles(ctx.paths.targetDir, (name) => ARCHIVE_RE.test(name));

  for (const file of files) {
    try {
      const mtime = await modifiedAt(file);
      const ageDays = Math.floor((now - mtime.getTime()) / DAY_MS);
      if (ageDays <= RETENTION_DAYS) continue;
      await removeFile(file);
      ctx.log.info({ path: file }, 'Deleted old file');
      deleted.push(file);
    } catch (err) {
      ctx.log.error({ err, path: file }, 'Error deleting file');
    }
  }
  return deleted;
}

export async function rotateAndCleanup(ctx: ReportContext): Promise<{ rotated: string[]; deleted: string[] }> {
  const rotated = await rotateReports(ctx);
  const deleted = await cleanupOldReports(ctx);
  return { rotated, deleted };
}
