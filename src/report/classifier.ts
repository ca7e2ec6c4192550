import { ymd } from './dates.js';
import { buildBucketQueries, type BucketQuery } from './filters.js';
import { normalizeTask } from './normalize.js';
import type { RawRecord, ReportContext, TaskBuckets, TaskRecord } from './types.js';

function normalizeAll(ctx: ReportContext, records: RawRecord[]): TaskRecord[] {
  const out: TaskRecord[] = [];
  for (const raw of records) {
    try {
      out.push(normalizeTask(raw, ctx.schema));
    } catch (err) {
      ctx.log.error({ err, pageId: raw.id }, 'Error processing task');
    }
  }
  return out;
}

async function runQuery(ctx: ReportContext, q: BucketQuery): Promise<RawRecord[] | null> {
  try {
    return await ctx.store.query(ctx.tasksDb, q.filter, q.properties);
  } catch (err) {
    ctx.log.error({ err, bucket: q.key }, `Error fetching ${q.label} tasks`);
    return null;
  }
}

/**
 * Runs the five bucket queries one after another. A failed query leaves its bucket
 * empty (or zero) without affecting the others.
 */
export async function collectTasks(ctx: ReportContext): Promise<TaskBuckets> {
  const today = ymd(ctx.clock(), ctx.timeZone);
  ctx.log.info({ today }, 'Fetching tasks from Notion API...');

  const buckets: TaskBuckets = {
    highPriority: [],
    dueToday: [],
    overdue: [],
    noDueCount: 0,
    olderOverdueCount: 0
  };

  for (const q of buildBucketQueries(ctx.schema, today)) {
    const records = await runQuery(ctx, q);
    if (records === null) continue;

    switch (q.key) {
      case 'highPriority':
      case 'dueToday':
      case 'overdue':
        buckets[q.key] = normalizeAll(ctx, records);
        ctx.log.info({ count: buckets[q.key].length }, `Found ${q.label} tasks`);
        break;
      case 'noDue':
        buckets.noDueCount = records.length;
        ctx.log.info({ count: records.length }, `Found tasks with ${q.label}`);
        break;
      case 'olderOverdue':
        buckets.olderOverdueCount = records.length;
        ctx.log.info({ count: records.length }, `Found tasks ${q.label}`);
        break;
    }
  }

  ctx.log.debug(
    { highPriority: buckets.highPriority, dueToday: buckets.dueToday, overdue: buckets.overdue },
    'Collected task buckets'
  );
  return buckets;
}
