import { Client, LogLevel } from '@notionhq/client';
import type { BaseLogger } from 'pino';
import { isRecord } from '../report/normalize.js';
import type { QueryFilter, RawRecord, TaskStore } from '../report/types.js';

export interface NotionStoreOptions {
  auth: string;
  timeoutMs?: number;
  log: BaseLogger;
}

function bridgeLog(log: BaseLogger) {
  return (level: LogLevel, message: string, extraInfo: Record<string, unknown>): void => {
    const obj = { notion: extraInfo };
    switch (level) {
      case LogLevel.ERROR:
        log.error(obj, message);
        break;
      case LogLevel.WARN:
        log.warn(obj, message);
        break;
      case LogLevel.INFO:
        log.info(obj, message);
        break;
      default:
        log.debug(obj, message);
    }
  };
}

// Keeps only the named properties of a page; the rest of the page object is untouched.
export function pickProperties(page: RawRecord, names: string[]): RawRecord {
  if (!isRecord(page.properties)) return page;
  const props = page.properties;
  const picked = Object.fromEntries(names.filter((n) => Object.hasOwn(props, n)).map((n) => [n, props[n]]));
  return { ...page, properties: picked };
}

/** TaskStore over the Notion REST API. Database queries follow pagination to the end. */
export class NotionTaskStore implements TaskStore {
  constructor(private readonly client: Client) {}

  static create(opts: NotionStoreOptions): NotionTaskStore {
    const client = new Client({
      auth: opts.auth,
      timeoutMs: opts.timeoutMs,
      logLevel: LogLevel.WARN,
      logger: bridgeLog(opts.log)
    });
    return new NotionTaskStore(client);
  }

  async query(databaseId: string, filter?: QueryFilter, properties?: string[]): Promise<RawRecord[]> {
    const out: RawRecord[] = [];
    let cursor: string | undefined;

    do {
      const body: Record<string, unknown> = { page_size: 100 };
      if (filter) body.filter = filter;
      if (cursor) body.start_cursor = cursor;

      const res = await this.client.request<Record<string, unknown>>({
        path: `databases/${databaseId}/query`,
        method: 'post',
        body
      });

      if (!Array.isArray(res.results)) throw new Error(`Unexpected query response for database ${databaseId}`);
      for (const page of res.results) {
        if (!isRecord(page)) throw new Error(`Unexpected non-object result in database ${databaseId}`);
        out.push(properties?.length ? pickProperties(page, properties) : page);
      }

      cursor = res.has_more === true && typeof res.next_cursor === 'string' ? res.next_cursor : undefined;
    } while (cursor);

    return out;
  }

  async retrievePage(pageId: string): Promise<RawRecord> {
    return await this.client.request<Record<string, unknown>>({ path: `pages/${pageId}`, method: 'get' });
  }
}
