import test from 'node:test';
import assert from 'node:assert/strict';

import { buildApp } from '../src/server.js';
import type { QueryFilter, RawRecord } from '../src/report/types.js';
import { MemoryTaskStore, PROJECTS_DB, TASKS_DB, makeContext, makeTempDir, page, projectPage } from './helpers.js';

function fixtures(): Record<string, RawRecord[]> {
  return {
    [PROJECTS_DB]: [projectPage('p1', 'Alpha')],
    [TASKS_DB]: [
      page({ id: 'a', name: 'Fix bug', status: 'Todo', priority: 'High', due: '2026-03-10', project: 'p1' }),
      page({ id: 'b', name: 'Old one', status: 'Todo', due: '2026-02-01' })
    ]
  };
}

/** Holds every query until `release()` is called. */
class GatedStore extends MemoryTaskStore {
  private open: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.open = resolve;
  });
  private markStarted: () => void = () => undefined;
  readonly started = new Promise<void>((resolve) => {
    this.markStarted = resolve;
  });

  release(): void {
    this.open();
  }

  override async query(databaseId: string, filter?: QueryFilter, properties?: string[]): Promise<RawRecord[]> {
    this.markStarted();
    await this.gate;
    return await super.query(databaseId, filter, properties);
  }
}

test('report endpoints serve 404 until a refresh has run', async () => {
  const dir = await makeTempDir();
  const app = await buildApp({ context: makeContext(dir, new MemoryTaskStore(fixtures())), logger: false });

  const md = await app.inject({ method: 'GET', url: '/api/report' });
  assert.equal(md.statusCode, 404);
  assert.deepEqual(md.json(), { ok: false, error: 'Report not generated yet' });

  const projects = await app.inject({ method: 'GET', url: '/api/projects' });
  assert.equal(projects.statusCode, 404);

  await app.close();
});

test('POST /api/refresh generates the report, which is then served in both formats', async () => {
  const dir = await makeTempDir();
  const app = await buildApp({ context: makeContext(dir, new MemoryTaskStore(fixtures())), logger: false });

  const refresh = await app.inject({ method: 'POST', url: '/api/refresh' });
  assert.equal(refresh.statusCode, 200);
  assert.deepEqual(refresh.json(), {
    ok: true,
    counts: { highPriority: 1, dueToday: 1, overdue: 1, olderOverdue: 1, noDue: 0 },
    rotated: 0,
    deleted: 0
  });

  const md = await app.inject({ method: 'GET', url: '/api/report' });
  assert.equal(md.statusCode, 200);
  assert.equal(md.headers['content-type'], 'text/markdown; charset=utf-8');
  assert.equal(
    md.body,
    '# Task Report (2026-03-10 12:00:00)\n\n' +
      '## High Priority\n- [ ] [Fix bug](https://notion.test/a) (Project: Alpha), Status: Todo\n\n' +
      '## Due Today\n- [ ] [Fix bug](https://notion.test/a) (Project: Alpha), Status: Todo\n\n' +
      '## Overdue (Last 7 Days)\n- [ ] [Fix bug](https://notion.test/a) (Project: Alpha), Status: Todo\n\n' +
      '\n*Note: 1 tasks are overdue for more than 7 days.*\n'
  );

  const txt = await app.inject({ method: 'GET', url: '/api/report.txt' });
  assert.equal(txt.headers['content-type'], 'text/plain; charset=utf-8');
  assert.ok(txt.body.startsWith('# Task Report (2026-03-10 12:00:00)\n\nHigh Priority:\n- Fix bug(https://notion.test/a)'));

  const projects = await app.inject({ method: 'GET', url: '/api/projects' });
  assert.deepEqual(projects.json(), { ok: true, generated_at: '2026-03-10T12:00:00.000Z', projects: { p1: 'Alpha' } });

  await app.close();
});

test('a second refresh while one is running is rejected with 409', async () => {
  const dir = await makeTempDir();
  const store = new GatedStore(fixtures());
  const app = await buildApp({ context: makeContext(dir, store), logger: false });

  const first = app.inject({ method: 'POST', url: '/api/refresh' });
  await store.started;

  const second = await app.inject({ method: 'POST', url: '/api/refresh' });
  assert.equal(second.statusCode, 409);
  assert.deepEqual(second.json(), { ok: false, error: 'Report generation already in progress' });

  store.release();
  assert.equal((await first).statusCode, 200);

  const third = await app.inject({ method: 'POST', url: '/api/refresh' });
  assert.equal(third.statusCode, 200);
  assert.equal(third.json().rotated, 2);

  await app.close();
});

test('a failed generation answers 500 and does not block the next one', async () => {
  const dir = await makeTempDir();
  const store = new MemoryTaskStore(fixtures());
  store.failWhen = () => new Error('invalid token');
  const app = await buildApp({ context: makeContext(dir, store), logger: false });

  const failed = await app.inject({ method: 'POST', url: '/api/refresh' });
  assert.equal(failed.statusCode, 500);
  assert.deepEqual(failed.json(), { ok: false, error: 'Project refresh failed: invalid token' });

  store.failWhen = undefined;
  const ok = await app.inject({ method: 'POST', url: '/api/refresh' });
  assert.equal(ok.statusCode, 200);

  await app.close();
});
