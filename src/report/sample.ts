import { writeJson } from './fs.js';
import type { RawRecord, ReportContext } from './types.js';

/** Fetches one page and saves it verbatim, to inspect how properties are laid out. */
export async function dumpSamplePage(ctx: ReportContext, pageId: string): Promise<RawRecord> {
  ctx.log.info({ pageId }, 'Fetching sample task');
  const page = await ctx.store.retrievePage(pageId);
  await writeJson(ctx.paths.sampleFile, page, 4);
  ctx.log.info({ path: ctx.paths.sampleFile, page }, 'Sample task data saved');
  return page;
}
