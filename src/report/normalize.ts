import type { RawRecord, TaskRecord, TaskSchema } from './types.js';

export const UNKNOWN_TASK = 'Unknown Task';
export const UNKNOWN_STATUS = 'Unknown';

export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

// null/undefined mean "absent"; any other non-object is a malformed record.
function optionalRecord(x: unknown, what: string): Record<string, unknown> | undefined {
  if (x === undefined || x === null) return undefined;
  if (!isRecord(x)) throw new Error(`${what} must be an object`);
  return x;
}

function optionalArray(x: unknown, what: string): unknown[] | undefined {
  if (x === undefined || x === null) return undefined;
  if (!Array.isArray(x)) throw new Error(`${what} must be an array`);
  return x;
}

function propertiesOf(raw: RawRecord): Record<string, unknown> {
  return optionalRecord(raw.properties, 'properties') ?? {};
}

/**
 * Text of the first rich-text item of a title property, or undefined when the
 * property, its title list or the item's text is absent.
 */
export function titleText(properties: Record<string, unknown>, propertyName: string): string | undefined {
  const prop = optionalRecord(properties[propertyName], propertyName);
  const title = optionalArray(prop?.title, `${propertyName}.title`);
  if (!title || title.length === 0) return undefined;

  const first = optionalRecord(title[0], `${propertyName}.title[0]`);
  const text = optionalRecord(first?.text, `${propertyName}.title[0].text`);
  if (typeof text?.content === 'string') return text.content;
  if (typeof first?.plain_text === 'string') return first.plain_text;
  return undefined;
}

function firstRelationId(properties: Record<string, unknown>, propertyName: string): string | undefined {
  const prop = optionalRecord(properties[propertyName], propertyName);
  const relation = optionalArray(prop?.relation, `${propertyName}.relation`);
  if (!relation || relation.length === 0) return undefined;
  const first = optionalRecord(relation[0], `${propertyName}.relation[0]`);
  return typeof first?.id === 'string' ? first.id : undefined;
}

function statusName(properties: Record<string, unknown>, propertyName: string): string {
  const prop = optionalRecord(properties[propertyName], propertyName);
  const status = optionalRecord(prop?.status, `${propertyName}.status`);
  return typeof status?.name === 'string' ? status.name : UNKNOWN_STATUS;
}

/** Throws on a malformed record; callers drop it and keep going. */
export function normalizeTask(raw: RawRecord, schema: TaskSchema): TaskRecord {
  const properties = propertiesOf(raw);

  const projectId = firstRelationId(properties, schema.projectProperty);

  const record: TaskRecord = {
    name: titleText(properties, schema.nameProperty) ?? UNKNOWN_TASK,
    url: typeof raw.url === 'string' ? raw.url : '',
    ...(projectId !== undefined ? { projectId } : {}),
    status: statusName(properties, schema.statusProperty)
  };
  return Object.freeze(record);
}

/** Project id and display name, or null when the entry has no usable name. */
export function extractProject(raw: RawRecord, nameProperty: string): { id: string; name: string } | null {
  if (typeof raw.id !== 'string') return null;
  const name = titleText(propertiesOf(raw), nameProperty);
  if (name === undefined) return null;
  return { id: raw.id, name };
}
