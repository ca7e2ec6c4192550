import type { BaseLogger } from 'pino';
import { formatTimestamp } from './dates.js';
import { writeTextAtomic } from './fs.js';
import { UNKNOWN_STATUS } from './normalize.js';
import type { ProjectCache, ReportContext, TaskBuckets, TaskRecord } from './types.js';

export interface RenderedReport {
  markdown: string;
  text: string;
}

export interface RenderOptions {
  generatedAt: Date;
  timeZone?: string;
  /** Name of the due-date property, used in the "no due date" note. */
  dueLabel: string;
  log: BaseLogger;
}

export const SECTION_TITLES = {
  highPriority: 'High Priority',
  dueToday: 'Due Today',
  overdue: 'Overdue (Last 7 Days)'
} as const;

const SECTION_ORDER = ['highPriority', 'dueToday', 'overdue'] as const;

const CHECKBOX = '- [ ] ';

/** Rich (markdown) line for one task, without trailing newline. */
export function formatTaskLine(task: TaskRecord, projects: Record<string, string>): string {
  let line = `${CHECKBOX}[${task.name}](${task.url})`;
  const id = task.projectId;
  const projectName = id !== undefined && Object.hasOwn(projects, id) ? projects[id] : undefined;
  if (projectName !== undefined) line += ` (Project: ${projectName})`;
  if (task.status && task.status !== UNKNOWN_STATUS) line += `, Status: ${task.status}`;
  return line;
}

// Every bracket goes, including ones inside task or project names.
export function toPlainLine(richLine: string): string {
  const rest = richLine.startsWith(CHECKBOX) ? richLine.slice(CHECKBOX.length) : richLine;
  return `- ${rest.replace(/[[\]]/g, '')}`;
}

export function renderReport(buckets: TaskBuckets, cache: ProjectCache, opts: RenderOptions): RenderedReport {
  const md: string[] = [];
  const txt: string[] = [];

  const title = `# Task Report (${formatTimestamp(opts.generatedAt, opts.timeZone)})\n\n`;
  md.push(title);
  txt.push(title);

  for (const key of SECTION_ORDER) {
    const tasks = buckets[key];
    if (!tasks.length) continue;

    const sectionTitle = SECTION_TITLES[key];
    md.push(`## ${sectionTitle}\n`);
    txt.push(`${sectionTitle}:\n`);
    for (const task of tasks) {
      try {
        const line = formatTaskLine(task, cache.projects);
        md.push(`${line}\n`);
        txt.push(`${toPlainLine(line)}\n`);
      } catch (err) {
        opts.log.error({ err, section: sectionTitle }, 'Error writing task to report');
      }
    }
    md.push('\n');
    txt.push('\n');
  }

  if (buckets.olderOverdueCount) {
    const note = `Note: ${buckets.olderOverdueCount} tasks are overdue for more than 7 days.`;
    md.push(`\n*${note}*\n`);
    txt.push(`\n${note}\n`);
  }

  if (buckets.noDueCount) {
    const note = `Note: ${buckets.noDueCount} tasks have no ${opts.dueLabel}.`;
    md.push(`\n*${note}*\n`);
    txt.push(`\n${note}\n`);
  }

  return { markdown: md.join(''), text: txt.join('') };
}

/**
 * Renders both formats in memory, then writes each file atomically. Any failure is
 * logged and rethrown; the caller should treat the report as possibly incomplete.
 */
export async function writeReport(ctx: ReportContext, buckets: TaskBuckets, cache: ProjectCache): Promise<RenderedReport> {
  try {
    ctx.log.debug('Now generating report');
    const report = renderReport(buckets, cache, {
      generatedAt: ctx.clock(),
      timeZone: ctx.timeZone,
      dueLabel: ctx.schema.dueProperty,
      log: ctx.log
    });
    await writeTextAtomic(ctx.paths.reportMd, report.markdown);
    await writeTextAtomic(ctx.paths.reportTxt, report.text);
    ctx.log.info({ path: ctx.paths.reportMd }, 'Task report generated successfully.');
    return report;
  } catch (err) {
    ctx.log.error({ err }, 'Error generating report');
    throw err;
  }
}
