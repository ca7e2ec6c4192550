import Fastify from 'fastify';
import cors from '@fastify/cors';
import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { createReportContext } from './context.js';
import { loadEnvFile, resolveIntervalMs, resolveLogLevel } from './report/config.js';
import { generateReport, type GenerationResult } from './report/generate.js';
import { loadProjectCache } from './report/projects.js';
import type { ReportContext } from './report/types.js';

type ServerOptions = {
  /** Prebuilt context; when omitted it is resolved from the environment. */
  context?: ReportContext;
  /** Regenerate the report on this period, in addition to POST /api/refresh. */
  intervalMs?: number;
  logger?: boolean;
};

async function readReport(p: string): Promise<string | null> {
  try {
    return await fs.readFile(p, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
}

export async function buildApp(opts: ServerOptions = {}) {
  const app = Fastify({ logger: opts.logger ?? { level: resolveLogLevel() } });
  const ctx = opts.context ?? (await createReportContext({ log: app.log }));

  if (process.env.CORS === '1' || process.env.CORS === 'true') {
    await app.register(cors, {
      origin: process.env.CORS_ORIGIN ?? true
    });
  }

  // At most one generation at a time.
  let inFlight: Promise<GenerationResult> | null = null;
  function startGeneration(): Promise<GenerationResult> | null {
    if (inFlight) return null;
    const run = generateReport(ctx).finally(() => {
      inFlight = null;
    });
    inFlight = run;
    return run;
  }

  if (opts.intervalMs) {
    const timer = setInterval(() => {
      const run = startGeneration();
      if (!run) {
        app.log.warn('Previous report generation still running, skipping scheduled run');
        return;
      }
      run.catch((err) => app.log.error({ err }, 'Scheduled report generation failed'));
    }, opts.intervalMs);
    app.addHook('onClose', async () => {
      clearInterval(timer);
    });
  }

  app.get('/', async () => {
    return {
      ok: true,
      service: 'task-report',
      endpoints: ['/api/report', '/api/report.txt', '/api/projects', '/api/refresh (POST)']
    };
  });

  app.get('/api/report', async (_req, reply) => {
    const raw = await readReport(ctx.paths.reportMd);
    if (raw === null) {
      reply.status(404).send({ ok: false, error: 'Report not generated yet' });
      return;
    }
    reply.type('text/markdown; charset=utf-8').send(raw);
  });

  app.get('/api/report.txt', async (_req, reply) => {
    const raw = await readReport(ctx.paths.reportTxt);
    if (raw === null) {
      reply.status(404).send({ ok: false, error: 'Report not generated yet' });
      return;
    }
    reply.type('text/plain; charset=utf-8').send(raw);
  });

  app.get('/api/projects', async (_req, reply) => {
    const cache = await loadProjectCache(ctx);
    if (!cache) {
      reply.status(404).send({ ok: false, error: 'Project cache not available' });
      return;
    }
    reply.send({ ok: true, ...cache });
  });

  app.post('/api/refresh', async (_req, reply) => {
    const run = startGeneration();
    if (!run) {
      reply.status(409).send({ ok: false, error: 'Report generation already in progress' });
      return;
    }
    const { buckets, rotated, deleted } = await run;
    reply.send({
      ok: true,
      counts: {
        highPriority: buckets.highPriority.length,
        dueToday: buckets.dueToday.length,
        overdue: buckets.overdue.length,
        olderOverdue: buckets.olderOverdueCount,
        noDue: buckets.noDueCount
      },
      rotated: rotated.length,
      deleted: deleted.length
    });
  });

  // Error handling: return JSON consistently.
  app.setErrorHandler((err, _req, reply) => {
    const msg = err instanceof Error ? err.message : String(err);
    reply.status(err.statusCode ?? 500).send({ ok: false, error: msg });
  });

  return app;
}

async function main(): Promise<void> {
  loadEnvFile();
  const app = await buildApp({ intervalMs: resolveIntervalMs() });
  const host = process.env.HOST ?? '127.0.0.1';
  const port = process.env.PORT ? Number(process.env.PORT) : 8787;
  await app.listen({ host, port });
}

const isMain = process.argv[1] === fileURLToPath(import.meta.url);
if (isMain) {
  main().catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exit(1);
  });
}
