import { Hono } from 'hono';
import type { Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { jwtVerify } from 'jose';
import type { JWTPayload } from 'jose';

import type { AlarmMonitor } from './alarms';
import { displayCop } from './analytics';
import type { AnalyticsEngine } from './analytics';
import type { AppConfig } from './config';
import { buildDashboard } from './dashboard';
import { AnalyticsAbortedError, errorMessage, StorageUnavailableError } from './errors';
import type { MetricPipeline } from './ingest';
import type { RegisterCatalog } from './lib/catalog';
import type { Database } from './lib/db';
import { validateSettingsUpdate } from './lib/schemas';
import { ELECTRICITY_PRICE_KEY, getNum, setSetting } from './lib/settings';
import { InvalidRangeError, resolveRange } from './lib/time';
import type { TimeRange } from './types';
import { getVersion } from './utils/version';

export type AppDeps = {
  db: Database;
  catalog: RegisterCatalog;
  analytics: AnalyticsEngine;
  alarms: AlarmMonitor;
  pipeline?: MetricPipeline;
  config: Pick<AppConfig, 'electricityPrice' | 'updateIntervalSeconds'> & { apiJwtSecret?: string };
  now?: () => Date;
};

type Variables = {
  token?: JWTPayload;
};

type AppContext = Context<{ Variables: Variables }>;

const MAX_EVENTS = 500;

function fail(c: AppContext, error: unknown) {
  if (error instanceof InvalidRangeError) {
    return c.json({ error: error.message }, 400);
  }
  if (error instanceof StorageUnavailableError) {
    console.warn('Storage unavailable for request', c.req.path, error.message);
    return c.json({ error: error.message, retryable: true }, 503);
  }
  if (error instanceof AnalyticsAbortedError) {
    return c.json({ error: error.message }, 408);
  }
  console.error('Request failed', c.req.path, error);
  return c.json({ error: errorMessage(error, 'Internal error') }, 500);
}

function parsePrice(raw: string | undefined): number | null {
  if (raw == null || raw.trim() === '') {
    return null;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidRangeError('price must be a non-negative number');
  }
  return parsed;
}

export function createApp(deps: AppDeps) {
  const { db, catalog, analytics, alarms, pipeline, config } = deps;
  const now = deps.now ?? (() => new Date());
  const app = new Hono<{ Variables: Variables }>();
  const secret = config.apiJwtSecret ? new TextEncoder().encode(config.apiJwtSecret) : null;

  const rangeOf = (c: AppContext): TimeRange =>
    resolveRange({ range: c.req.query('range'), start: c.req.query('start'), end: c.req.query('end') }, now());

  const storedPrice = () => getNum(db, ELECTRICITY_PRICE_KEY, config.electricityPrice, { min: 0 });
  const priceOf = async (c: AppContext) => parsePrice(c.req.query('price')) ?? (await storedPrice());

  app.use('/api/*', async (c, next) => {
    if (!secret) {
      await next();
      return;
    }
    const header = c.req.header('Authorization');
    if (!header || !header.startsWith('Bearer ')) {
      return c.json({ error: 'Missing bearer token' }, 401);
    }
    try {
      const { payload } = await jwtVerify(header.slice('Bearer '.length).trim(), secret, { algorithms: ['HS256'] });
      c.set('token', payload);
    } catch (error) {
      console.warn('Invalid bearer auth token', errorMessage(error, 'unknown error'));
      return c.json({ error: 'Invalid token' }, 401);
    }
    await next();
  });

  app.get('/health', async (c) => {
    try {
      const row = await db.prepare('SELECT 1 as ok').first<{ ok: number }>();
      const version = await getVersion(db);
      return c.json({
        status: version.schema_ok ? 'ok' : 'degraded',
        db: row?.ok === 1 ? 'reachable' : 'unknown',
        ...version,
        ingest: pipeline?.counters ?? null,
      });
    } catch (error) {
      return c.json({ status: 'degraded', error: errorMessage(error, 'Database error') }, 500);
    }
  });

  app.get('/api/config', (c) =>
    c.json({
      brand: catalog.metadata.brand,
      model: catalog.metadata.model,
      displayName: catalog.metadata.displayName,
      capabilities: catalog.capabilities,
      registers: catalog.allDescriptors().map((d) => ({
        registerId: d.registerId,
        logicalName: d.logicalName,
        unit: d.unit,
        valueClass: d.valueClass,
        description: d.description,
      })),
    }),
  );

  app.get('/api/latest', async (c) => {
    try {
      return c.json(await analytics.getLatestValues(now(), { signal: c.req.raw.signal }));
    } catch (error) {
      return fail(c, error);
    }
  });

  app.get('/api/min-max', async (c) => {
    try {
      return c.json(await analytics.getMinMaxValues(rangeOf(c), { signal: c.req.raw.signal }));
    } catch (error) {
      return fail(c, error);
    }
  });

  app.get('/api/series', async (c) => {
    try {
      const names = (c.req.query('names') ?? '')
        .split(',')
        .map((name) => name.trim())
        .filter(Boolean);
      if (names.length === 0) {
        return c.json({ error: 'names is required' }, 400);
      }
      return c.json(await analytics.getSeries(names, rangeOf(c), { signal: c.req.raw.signal }));
    } catch (error) {
      return fail(c, error);
    }
  });

  app.get('/api/cop', async (c) => {
    try {
      const bucketRaw = c.req.query('bucket');
      const bucketSeconds = bucketRaw ? Number(bucketRaw) : undefined;
      if (bucketSeconds !== undefined && !(Number.isFinite(bucketSeconds) && bucketSeconds >= 60)) {
        return c.json({ error: 'bucket must be at least 60 seconds' }, 400);
      }
      const result = await analytics.calculateCop(rangeOf(c), { signal: c.req.raw.signal, bucketSeconds });
      return c.json({ ...result, display: displayCop(result) });
    } catch (error) {
      return fail(c, error);
    }
  });

  app.get('/api/runtime', async (c) => {
    try {
      return c.json(await analytics.calculateRuntimeStats(rangeOf(c), { signal: c.req.raw.signal }));
    } catch (error) {
      return fail(c, error);
    }
  });

  app.get('/api/energy-cost', async (c) => {
    try {
      const range = rangeOf(c);
      const price = await priceOf(c);
      return c.json(await analytics.calculateEnergyCosts(range, price, { signal: c.req.raw.signal }));
    } catch (error) {
      return fail(c, error);
    }
  });

  app.get('/api/hot-water', async (c) => {
    try {
      const minRaw = c.req.query('minCycleSeconds');
      const minCycleSeconds = minRaw ? Number(minRaw) : undefined;
      if (minCycleSeconds !== undefined && !(Number.isFinite(minCycleSeconds) && minCycleSeconds >= 0)) {
        return c.json({ error: 'minCycleSeconds must be a non-negative number' }, 400);
      }
      return c.json(
        await analytics.analyzeHotWaterCycles(rangeOf(c), { signal: c.req.raw.signal, minCycleSeconds }),
      );
    } catch (error) {
      return fail(c, error);
    }
  });

  app.get('/api/energy-flow', async (c) => {
    try {
      return c.json(await analytics.calculateEnergyFlow(rangeOf(c), { signal: c.req.raw.signal }));
    } catch (error) {
      return fail(c, error);
    }
  });

  app.get('/api/alarm', async (c) => {
    try {
      return c.json(await alarms.getAlarmStatus(now(), { signal: c.req.raw.signal }));
    } catch (error) {
      return fail(c, error);
    }
  });

  app.get('/api/events', async (c) => {
    try {
      const limitRaw = Number(c.req.query('limit') ?? 50);
      const limit = Number.isFinite(limitRaw) ? Math.min(Math.max(Math.trunc(limitRaw), 1), MAX_EVENTS) : 50;
      return c.json(await alarms.getEventLog(now(), limit, { signal: c.req.raw.signal }));
    } catch (error) {
      return fail(c, error);
    }
  });

  app.get('/api/dashboard', async (c) => {
    try {
      const range = rangeOf(c);
      const price = await priceOf(c);
      return c.json(await buildDashboard({ analytics, alarms }, range, price, c.req.raw.signal));
    } catch (error) {
      return fail(c, error);
    }
  });

  app.get('/api/settings', async (c) => {
    try {
      return c.json({ electricityPrice: await storedPrice() });
    } catch (error) {
      return fail(c, error);
    }
  });

  app.post('/api/settings', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Body must be JSON' }, 400);
    }
    if (!validateSettingsUpdate(body)) {
      return c.json({ error: 'Invalid settings', details: validateSettingsUpdate.errors }, 400);
    }
    try {
      await setSetting(db, ELECTRICITY_PRICE_KEY, String(body.electricityPrice));
      return c.json({ electricityPrice: body.electricityPrice });
    } catch (error) {
      return fail(c, error);
    }
  });

  app.get('/api/stream', async (c) => {
    let range: TimeRange;
    try {
      range = rangeOf(c);
    } catch (error) {
      return fail(c, error);
    }
    const spanMs = range.end.getTime() - range.start.getTime();
    const intervalMs = config.updateIntervalSeconds * 1000;

    return streamSSE(c, async (stream) => {
      const controller = new AbortController();
      stream.onAbort(() => controller.abort());
      while (!stream.aborted) {
        const end = now();
        try {
          const price = await storedPrice();
          const snapshot = await buildDashboard(
            { analytics, alarms },
            { start: new Date(end.getTime() - spanMs), end },
            price,
            controller.signal,
          );
          await stream.writeSSE({ event: 'dashboard', data: JSON.stringify(snapshot) });
        } catch (error) {
          if (error instanceof AnalyticsAbortedError) {
            break;
          }
          const message = errorMessage(error, 'push failed');
          console.warn('Dashboard push failed', message);
          await stream.writeSSE({ event: 'error', data: JSON.stringify({ error: message }) });
        }
        await stream.sleep(intervalMs);
      }
    });
  });

  return app;
}
