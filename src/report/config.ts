import path from 'node:path';
import dotenv from 'dotenv';
import yaml from 'js-yaml';
import { fileExists, readText } from './fs.js';
import type { PriorityKind, ReportPaths, TaskSchema } from './types.js';

export const DEFAULT_SCHEMA: TaskSchema = {
  nameProperty: 'Name',
  projectProperty: 'Project',
  dueProperty: 'Due',
  statusProperty: 'Status',
  priorityProperty: 'Priority',
  priorityKind: 'status',
  doneStatus: 'Done',
  highPriority: 'High'
};

// YAML key -> TaskSchema field
const SCHEMA_KEYS: Record<string, keyof TaskSchema> = {
  name_property: 'nameProperty',
  project_property: 'projectProperty',
  due_property: 'dueProperty',
  status_property: 'statusProperty',
  priority_property: 'priorityProperty',
  priority_kind: 'priorityKind',
  done_status: 'doneStatus',
  high_priority: 'highPriority'
};

const PRIORITY_KINDS: PriorityKind[] = ['status', 'select'];

export function isDevEnv(env = process.env): boolean {
  return (env.ENV ?? 'dev') === 'dev';
}

export function resolveEnvFile(env = process.env): string {
  return isDevEnv(env) ? '.env.dev' : '.env';
}

/** Loads `.env.dev` (ENV=dev, the default) or `.env` into process.env. Missing files are fine. */
export function loadEnvFile(env = process.env): string {
  const file = path.resolve(resolveEnvFile(env));
  dotenv.config({ path: file });
  return file;
}

export function requireEnv(name: string, env = process.env): string {
  const v = env[name]?.trim();
  if (!v) throw new Error(`Missing required environment variable: ${name}`);
  return v;
}

export function resolveReportPaths(env = process.env): ReportPaths {
  const targetDir = path.resolve(env.REPORT_TARGET_DIR ?? 'target');
  return {
    targetDir,
    projectsFile: path.join(targetDir, 'notion-projects.json'),
    reportMd: path.join(targetDir, 'tasks_report.md'),
    reportTxt: path.join(targetDir, 'tasks_report.txt'),
    sampleFile: path.join(targetDir, 'sample_task.json')
  };
}

export function resolveLogDir(env = process.env): string {
  return path.resolve(env.LOG_DIR ?? 'logs');
}

export function resolveLogLevel(env = process.env): string {
  return env.LOG_LEVEL ?? (isDevEnv(env) ? 'debug' : 'info');
}

export function resolveTimeZone(env = process.env): string | undefined {
  const tz = env.REPORT_TIMEZONE?.trim();
  if (!tz) return undefined;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
  } catch (err) {
    throw new Error(`Invalid REPORT_TIMEZONE: ${tz}`, { cause: err });
  }
  return tz;
}

function positiveNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) throw new Error(`${name} must be a positive number`);
  return n;
}

export function resolveTimeoutMs(env = process.env): number | undefined {
  return positiveNumber('NOTION_TIMEOUT_MS', env.NOTION_TIMEOUT_MS);
}

export function resolveIntervalMs(env = process.env): number | undefined {
  const minutes = positiveNumber('REPORT_INTERVAL_MINUTES', env.REPORT_INTERVAL_MINUTES);
  return minutes === undefined ? undefined : minutes * 60 * 1000;
}

/** Validates a parsed schema document and merges it over the defaults. */
export function parseSchema(doc: unknown): TaskSchema {
  if (doc === undefined || doc === null) return { ...DEFAULT_SCHEMA };
  if (typeof doc !== 'object' || Array.isArray(doc)) throw new Error('Schema file must contain a mapping');

  const out: TaskSchema = { ...DEFAULT_SCHEMA };
  for (const [key, value] of Object.entries(doc)) {
    const field = Object.hasOwn(SCHEMA_KEYS, key) ? SCHEMA_KEYS[key] : undefined;
    if (!field) throw new Error(`Unknown schema key: ${key}`);
    if (typeof value !== 'string' || value.trim() === '') throw new Error(`${key} must be a non-empty string`);

    if (field === 'priorityKind') {
      const kind = PRIORITY_KINDS.find((k) => k === value);
      if (!kind) throw new Error(`priority_kind must be one of: ${PRIORITY_KINDS.join(', ')}`);
      out.priorityKind = kind;
    } else {
      out[field] = value;
    }
  }
  return out;
}

export async function loadSchema(env = process.env): Promise<TaskSchema> {
  const file = env.NOTION_SCHEMA_FILE;
  if (!file) return { ...DEFAULT_SCHEMA };
  const p = path.resolve(file);
  if (!(await fileExists(p))) throw new Error(`Schema file not found: ${p}`);
  return parseSchema(yaml.load(await readText(p), { schema: yaml.FAILSAFE_SCHEMA }));
}
