import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';

import { DEFAULT_SCHEMA } from '../src/report/config.js';
import type {
  DateCondition,
  QueryFilter,
  RawRecord,
  ReportContext,
  ReportPaths,
  StatusCondition,
  TaskStore
} from '../src/report/types.js';

export const TASKS_DB = 'tasks-db';
export const PROJECTS_DB = 'projects-db';

// 2026-03-10 12:00 UTC; with timeZone 'UTC' "today" is 2026-03-10.
export const NOW = new Date('2026-03-10T12:00:00.000Z');

export function silentLog() {
  return pino({ level: 'silent' });
}

export async function makeTempDir(prefix = 'task-report-'): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function pathsIn(targetDir: string): ReportPaths {
  return {
    targetDir,
    projectsFile: path.join(targetDir, 'notion-projects.json'),
    reportMd: path.join(targetDir, 'tasks_report.md'),
    reportTxt: path.join(targetDir, 'tasks_report.txt'),
    sampleFile: path.join(targetDir, 'sample_task.json')
  };
}

export function makeContext(targetDir: string, store: TaskStore, now: Date = NOW): ReportContext {
  return {
    store,
    tasksDb: TASKS_DB,
    projectsDb: PROJECTS_DB,
    paths: pathsIn(targetDir),
    schema: { ...DEFAULT_SCHEMA },
    clock: () => now,
    log: silentLog(),
    timeZone: 'UTC'
  };
}

export interface PageInput {
  id: string;
  name?: string;
  status?: string;
  priority?: string;
  due?: string | null;
  project?: string;
}

/** A page shaped like the Notion API returns it, with the default property names. */
export function page(input: PageInput): RawRecord {
  const properties: Record<string, unknown> = {
    Status: { id: 's', type: 'status', status: input.status === undefined ? null : { name: input.status } },
    Due: { id: 'd', type: 'date', date: input.due ? { start: input.due, end: null } : null },
    Project: { id: 'p', type: 'relation', relation: input.project ? [{ id: input.project }] : [] }
  };
  if (input.name !== undefined) {
    properties.Name = { id: 'title', type: 'title', title: [{ type: 'text', text: { content: input.name }, plain_text: input.name }] };
  }
  if (input.priority !== undefined) {
    properties.Priority = { id: 'pr', type: 'status', status: { name: input.priority } };
  }
  return { object: 'page', id: input.id, url: `https://notion.test/${input.id}`, properties };
}

export function projectPage(id: string, name?: string): RawRecord {
  const properties: Record<string, unknown> = {};
  if (name !== undefined) {
    properties.Name = { id: 'title', type: 'title', title: [{ type: 'text', text: { content: name }, plain_text: name }] };
  }
  return { object: 'page', id, properties };
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function propertyOf(p: RawRecord, name: string): Record<string, unknown> | undefined {
  if (!isRecord(p.properties)) return undefined;
  const prop = p.properties[name];
  return isRecord(prop) ? prop : undefined;
}

function nameField(x: unknown): string | undefined {
  return isRecord(x) && typeof x.name === 'string' ? x.name : undefined;
}

function matchesOption(value: string | undefined, cond: StatusCondition): boolean {
  if ('equals' in cond) return value === cond.equals;
  return value !== cond.does_not_equal;
}

function matchesDate(value: string | undefined, cond: DateCondition): boolean {
  if ('is_empty' in cond) return !value;
  if (!value) return false;
  const day = value.slice(0, 10);
  if ('equals' in cond) return day === cond.equals;
  if ('on_or_before' in cond) return day <= cond.on_or_before;
  if ('on_or_after' in cond) return day >= cond.on_or_after;
  return day < cond.before;
}

/** Evaluates a filter tree the way the remote store would, for the property kinds used here. */
export function matches(p: RawRecord, filter: QueryFilter): boolean {
  if ('and' in filter) return filter.and.every((f) => matches(p, f));
  if ('or' in filter) return filter.or.some((f) => matches(p, f));

  const prop = propertyOf(p, filter.property);
  if ('status' in filter) return matchesOption(nameField(prop?.status), filter.status);
  if ('select' in filter) return matchesOption(nameField(prop?.select), filter.select);
  const date = prop?.date;
  const start = isRecord(date) && typeof date.start === 'string' ? date.start : undefined;
  return matchesDate(start, filter.date);
}

export interface QueryCall {
  databaseId: string;
  filter?: QueryFilter;
  properties?: string[];
}

/** In-process stand-in for the remote store. */
export class MemoryTaskStore implements TaskStore {
  readonly calls: QueryCall[] = [];
  /** Return an Error to make the matching query fail. */
  failWhen?: (call: QueryCall) => Error | undefined;

  constructor(
    private readonly databases: Record<string, RawRecord[]>,
    private readonly pages: Record<string, RawRecord> = {}
  ) {}

  async query(databaseId: string, filter?: QueryFilter, properties?: string[]): Promise<RawRecord[]> {
    const call: QueryCall = { databaseId, filter, properties };
    this.calls.push(call);
    const err = this.failWhen?.(call);
    if (err) throw err;
    const rows = this.databases[databaseId];
    if (!rows) throw new Error(`Could not find database with ID: ${databaseId}`);
    return filter ? rows.filter((r) => matches(r, filter)) : [...rows];
  }

  async retrievePage(pageId: string): Promise<RawRecord> {
    const p = this.pages[pageId];
    if (!p) throw new Error(`Could not find page with ID: ${pageId}`);
    return p;
  }
}
