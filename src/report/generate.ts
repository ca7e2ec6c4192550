import { rotateAndCleanup } from './archive.js';
import { collectTasks } from './classifier.js';
import { ensureFresh } from './projects.js';
import { writeReport, type RenderedReport } from './render.js';
import type { ReportContext, TaskBuckets } from './types.js';

export interface GenerationResult {
  buckets: TaskBuckets;
  report: RenderedReport;
  rotated: string[];
  deleted: string[];
}

/**
 * One full run: refresh project names, classify tasks, archive the previous pair,
 * sweep old archives, write the new pair. A project refresh failure aborts before
 * anything on disk changes. Later failures are logged and rethrown; the report may
 * then be incomplete.
 */
export async function generateReport(ctx: ReportContext): Promise<GenerationResult> {
  const cache = await ensureFresh(ctx);
  try {
    const buckets = await collectTasks(ctx);
    const { rotated, deleted } = await rotateAndCleanup(ctx);
    const report = await writeReport(ctx, buckets, cache);
    return { buckets, report, rotated, deleted };
  } catch (err) {
    ctx.log.error({ err }, 'Error generating report');
    throw err;
  }
}
