import { fileExists, readText, writeJson } from './fs.js';
import { extractProject, isRecord } from './normalize.js';
import type { ProjectCache, RawRecord, ReportContext } from './types.js';

export const FRESHNESS_MS = 24 * 60 * 60 * 1000;

function isProjectCache(x: unknown): x is ProjectCache {
  if (!isRecord(x)) return false;
  if (typeof x.generated_at !== 'string' || Number.isNaN(Date.parse(x.generated_at))) return false;
  if (!isRecord(x.projects)) return false;
  return Object.values(x.projects).every((v) => typeof v === 'string');
}

/** The persisted cache, or null when it is missing or unreadable. */
export async function loadProjectCache(ctx: ReportContext): Promise<ProjectCache | null> {
  const p = ctx.paths.projectsFile;
  if (!(await fileExists(p))) return null;
  try {
    const data: unknown = JSON.parse(await readText(p));
    if (isProjectCache(data)) return data;
    ctx.log.warn({ path: p }, 'Project cache has an unexpected shape, ignoring it');
  } catch (err) {
    ctx.log.warn({ err, path: p }, 'Project cache is unreadable, ignoring it');
  }
  return null;
}

// A stamp from the future (clock skew, hand edits) counts as stale.
export function isFresh(cache: ProjectCache, now: Date): boolean {
  const age = now.getTime() - Date.parse(cache.generated_at);
  return age >= 0 && age < FRESHNESS_MS;
}

export async function refreshProjectCache(ctx: ReportContext): Promise<ProjectCache> {
  ctx.log.info('Fetching projects from Notion API...');

  let results: RawRecord[];
  try {
    results = await ctx.store.query(ctx.projectsDb);
  } catch (err) {
    ctx.log.error({ err }, 'Error fetching projects');
    throw new Error(`Project refresh failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }

  const projects: Record<string, string> = {};
  for (const raw of results) {
    try {
      const entry = extractProject(raw, ctx.schema.nameProperty);
      if (entry) projects[entry.id] = entry.name;
    } catch (err) {
      ctx.log.warn({ err, pageId: raw.id }, 'Skipping project entry');
    }
  }

  const cache: ProjectCache = { generated_at: ctx.clock().toISOString(), projects };
  await writeJson(ctx.paths.projectsFile, cache, 4);
  ctx.log.info({ count: Object.keys(projects).length }, 'Projects info refreshed.');
  return cache;
}

/**
 * Returns the persisted cache when it is younger than 24 hours; otherwise refreshes it
 * from the projects database. A failed refresh throws and leaves the file untouched.
 */
export async function ensureFresh(ctx: ReportContext, opts?: { force?: boolean }): Promise<ProjectCache> {
  const cached = opts?.force ? null : await loadProjectCache(ctx);
  if (cached && isFresh(cached, ctx.clock())) {
    ctx.log.info('Project info is up to date.');
    return cached;
  }
  return await refreshProjectCache(ctx);
}
