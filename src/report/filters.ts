import { addDaysYmd } from './dates.js';
import type { QueryFilter, TaskSchema } from './types.js';

export type BucketKey = 'highPriority' | 'dueToday' | 'overdue' | 'noDue' | 'olderOverdue';

export interface BucketQuery {
  key: BucketKey;
  label: string;
  filter: QueryFilter;
  properties: string[];
}

function notDone(schema: TaskSchema): QueryFilter {
  return { property: schema.statusProperty, status: { does_not_equal: schema.doneStatus } };
}

function isHighPriority(schema: TaskSchema): QueryFilter {
  const cond = { equals: schema.highPriority };
  return schema.priorityKind === 'select'
    ? { property: schema.priorityProperty, select: cond }
    : { property: schema.priorityProperty, status: cond };
}

/**
 * The five bucket queries for `today` (YYYY-MM-DD), in the order they are issued.
 *
 * The buckets overlap: a task due today is in both Due Today and Overdue, and a high
 * priority task also shows in its dated bucket. Overdue and Older Overdue meet at
 * `today - 7`, which belongs to Overdue.
 */
export function buildBucketQueries(schema: TaskSchema, today: string): BucketQuery[] {
  const weekAgo = addDaysYmd(today, -7);
  const due = schema.dueProperty;
  const base = [schema.nameProperty, schema.projectProperty, due, schema.statusProperty];

  return [
    {
      key: 'highPriority',
      label: 'high priority',
      filter: {
        and: [notDone(schema), isHighPriority(schema), { property: due, date: { on_or_before: today } }]
      },
      properties: [...base, schema.priorityProperty]
    },
    {
      key: 'dueToday',
      label: 'due today',
      filter: { and: [notDone(schema), { property: due, date: { equals: today } }] },
      properties: base
    },
    {
      key: 'overdue',
      label: 'overdue',
      filter: {
        and: [
          notDone(schema),
          { property: due, date: { on_or_after: weekAgo } },
          { property: due, date: { on_or_before: today } }
        ]
      },
      properties: base
    },
    {
      key: 'noDue',
      label: 'no due date',
      filter: { and: [notDone(schema), { property: due, date: { is_empty: true } }] },
      properties: base
    },
    {
      key: 'olderOverdue',
      label: 'overdue for more than 7 days',
      filter: { and: [notDone(schema), { property: due, date: { before: weekAgo } }] },
      properties: base
    }
  ];
}
