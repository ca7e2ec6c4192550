import type { BaseLogger } from 'pino';
import { NotionTaskStore } from './notion/store.js';
import {
  loadSchema,
  requireEnv,
  resolveReportPaths,
  resolveTimeZone,
  resolveTimeoutMs
} from './report/config.js';
import { ensureDir } from './report/fs.js';
import type { Clock, ReportContext, TaskStore } from './report/types.js';

export interface ContextOptions {
  log: BaseLogger;
  env?: NodeJS.ProcessEnv;
  /** Overrides the Notion-backed store (tests, dry runs). */
  store?: TaskStore;
  clock?: Clock;
}

/** Everything a report run needs, resolved once from the environment. */
export async function createReportContext(opts: ContextOptions): Promise<ReportContext> {
  const env = opts.env ?? process.env;
  const paths = resolveReportPaths(env);
  await ensureDir(paths.targetDir);

  const store =
    opts.store ??
    NotionTaskStore.create({
      auth: requireEnv('NOTION_API_KEY', env),
      timeoutMs: resolveTimeoutMs(env),
      log: opts.log
    });

  return {
    store,
    tasksDb: requireEnv('NOTION_TASKS_DB', env),
    projectsDb: requireEnv('NOTION_PROJECTS_DB', env),
    paths,
    schema: await loadSchema(env),
    clock: opts.clock ?? (() => new Date()),
    log: opts.log,
    timeZone: resolveTimeZone(env)
  };
}
