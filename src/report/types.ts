import type { BaseLogger } from 'pino';

/** One page object as returned by the remote store, before normalization. */
export type RawRecord = Record<string, unknown>;

export type StatusCondition = { equals: string } | { does_not_equal: string };

export type DateCondition =
  | { equals: string }
  | { on_or_before: string }
  | { on_or_after: string }
  | { before: string }
  | { is_empty: true };

export type PropertyFilter =
  | { property: string; status: StatusCondition }
  | { property: string; select: StatusCondition }
  | { property: string; date: DateCondition };

export type QueryFilter = PropertyFilter | { and: QueryFilter[] } | { or: QueryFilter[] };

/**
 * Narrow view of the remote workspace. The Notion adapter implements it for real runs;
 * tests use an in-memory store.
 */
export interface TaskStore {
  query(databaseId: string, filter?: QueryFilter, properties?: string[]): Promise<RawRecord[]>;
  retrievePage(pageId: string): Promise<RawRecord>;
}

export interface TaskRecord {
  readonly name: string;
  readonly url: string;
  readonly projectId?: string;
  readonly status: string;
}

export interface TaskBuckets {
  highPriority: TaskRecord[];
  dueToday: TaskRecord[];
  overdue: TaskRecord[];
  noDueCount: number;
  olderOverdueCount: number;
}

export interface ProjectCache {
  generated_at: string; // ISO-8601
  projects: Record<string, string>;
}

export type PriorityKind = 'status' | 'select';

export interface TaskSchema {
  nameProperty: string;
  projectProperty: string;
  dueProperty: string;
  statusProperty: string;
  priorityProperty: string;
  priorityKind: PriorityKind;
  doneStatus: string;
  highPriority: string;
}

export interface ReportPaths {
  targetDir: string;
  projectsFile: string;
  reportMd: string;
  reportTxt: string;
  sampleFile: string;
}

export type Clock = () => Date;

export interface ReportContext {
  store: TaskStore;
  tasksDb: string;
  projectsDb: string;
  paths: ReportPaths;
  schema: TaskSchema;
  clock: Clock;
  log: BaseLogger;
  timeZone?: string;
}
