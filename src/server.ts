/**
 * Cleanroom Report Server
 *
 * Minimal HTTP server exposing the anomaly report and the clean record sets.
 * Run: npm run build && npm start
 * Test: curl http://localhost:3030/api/anomalies
 */

import 'reflect-metadata';
import * as http from 'http';

import { getConfig, validateConfig } from './config';
import { closePool } from './db';
import { isCleanroomError } from './errors';
import { PipelineResult, RecordStore } from './interfaces';
import { AnomalyDetectorService } from './services/anomaly-detector.service';
import { CleanerService } from './services/cleaner.service';
import { PipelineService } from './services/pipeline.service';
import { createRecordStore } from './services/record-store.factory';
import { WindowInferenceService } from './services/window-inference.service';

export interface RouteResponse {
  status: number;
  body: unknown;
}

export type Router = (method: string, url: string) => Promise<RouteResponse>;

/**
 * Build the request router. The pipeline runs on first use and the result is
 * cached until POST /api/refresh.
 */
export function createRouter(pipeline: PipelineService, store: RecordStore): Router {
  let cached: Promise<PipelineResult> | null = null;

  async function getResult(): Promise<PipelineResult> {
    if (!cached) {
      cached = pipeline.run(store);
    }
    const current = cached;
    try {
      return await current;
    } catch (error) {
      // a refresh may have replaced the failed run meanwhile
      if (cached === current) {
        cached = null;
      }
      throw error;
    }
  }

  async function route(method: string, path: string): Promise<RouteResponse> {
    if (path === '/health' && method === 'GET') {
      const health = { status: 'ok', service: 'cleanroom', store: store.name };
      if (!store.isReachable) {
        return { status: 200, body: health };
      }
      const reachable = await store.isReachable();
      return reachable
        ? { status: 200, body: { ...health, database: 'ok' } }
        : { status: 503, body: { ...health, status: 'degraded', database: 'unavailable' } };
    }

    if (path === '/api/refresh' && method === 'POST') {
      cached = null;
      const result = await getResult();
      return { status: 200, body: summarize(result) };
    }

    if (method !== 'GET') {
      return { status: 404, body: { error: 'Not found' } };
    }

    switch (path) {
      case '/api/window':
        return { status: 200, body: (await getResult()).window };

      case '/api/anomalies': {
        const { window, anomalies, timestampIssues } = await getResult();
        return { status: 200, body: { window, anomalies, timestampIssues } };
      }

      case '/api/summary':
        return { status: 200, body: summarize(await getResult()) };

      case '/api/clean/users': {
        const rows = (await getResult()).clean.users;
        return { status: 200, body: { count: rows.length, rows } };
      }

      case '/api/clean/transactions': {
        const rows = (await getResult()).clean.transactions;
        return { status: 200, body: { count: rows.length, rows } };
      }

      case '/api/clean/app-events': {
        const rows = (await getResult()).clean.appEvents;
        return { status: 200, body: { count: rows.length, rows } };
      }

      default:
        return { status: 404, body: { error: 'Not found' } };
    }
  }

  return async (method, url) => {
    const path = url.split('?')[0];
    try {
      return await route(method, path);
    } catch (error) {
      if (isCleanroomError(error)) {
        return { status: error.statusCode, body: error.toJSON() };
      }
      console.error('[Cleanroom] Request failed:', error);
      return {
        status: 500,
        body: { error: error instanceof Error ? error.message : 'Internal server error' },
      };
    }
  };
}

export function summarize(result: PipelineResult): Record<string, unknown> {
  return {
    window: result.window,
    clean: {
      users: result.clean.users.length,
      transactions: result.clean.transactions.length,
      appEvents: result.clean.appEvents.length,
    },
    transactionStages: result.transactionStages,
    anomalyRows: result.anomalies.reduce((sum, entry) => sum + entry.badRows, 0),
    stages: result.stages,
    processingTime: result.processingTime,
  };
}

/**
 * Send JSON response
 */
function sendJson(res: http.ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data, null, 2));
}

function main(): void {
  const config = getConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`[Cleanroom] Config error: ${error}`);
    }
    process.exit(1);
  }

  // Manual DI - wire up services
  const pipeline = new PipelineService(
    new WindowInferenceService(),
    new AnomalyDetectorService(),
    new CleanerService(),
  );
  const store = createRecordStore(config);
  const router = createRouter(pipeline, store);

  const server = http.createServer((req, res) => {
    router(req.method || 'GET', req.url || '/')
      .then(({ status, body }) => sendJson(res, status, body))
      .catch((error: unknown) => {
        console.error('[Cleanroom] Failed to write response:', error);
        res.destroy();
      });
  });

  server.listen(config.port, () => {
    console.log(`[Cleanroom] Report server listening on port ${config.port} (store: ${store.name})`);
  });

  process.on('SIGTERM', () => {
    console.log('\n[Cleanroom] Shutting down...');
    server.close(() => {
      closePool()
        .catch((error: unknown) => console.error('[Cleanroom] Failed to close pool:', error))
        .finally(() => process.exit(0));
    });
  });
}

if (require.main === module) {
  main();
}
