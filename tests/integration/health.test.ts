/**
 * Integration tests for health endpoints
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp, type AppDeps } from '@/app/build-app.js';
import { createSalesSnapshot } from '@/infra/database/seeds/index.js';
import { makeSnapshotHealthChecker } from '@/modules/health/index.js';

import {
  makeHealthChecker,
  makeSlowHealthChecker,
  makeFailingHealthChecker,
  makeTestConfig,
} from '../fixtures/builders.js';
import { makeFakeSalesReportRepo } from '../fixtures/fakes.js';

import type { FastifyInstance } from 'fastify';

describe('Health Endpoints', () => {
  let app: FastifyInstance | undefined;

  const startApp = async (healthCheckers: AppDeps['healthCheckers'] = [], version?: string) => {
    app = await createApp({
      fastifyOptions: { logger: false },
      version,
      deps: {
        healthCheckers,
        salesReportRepo: makeFakeSalesReportRepo(),
        config: makeTestConfig(),
      },
    });
    return app;
  };

  afterEach(async () => {
    if (app !== undefined) {
      await app.close();
      app = undefined;
    }
  });

  describe('GET /health/live', () => {
    it('returns 200 with status ok', async () => {
      const server = await startApp([makeFailingHealthChecker('Connection refused')]);

      const response = await server.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok' });
    });
  });

  describe('GET /health/ready', () => {
    it('returns 200 when no health checkers are configured', async () => {
      const server = await startApp();

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('ok');
      expect(body.checks).toEqual([]);
    });

    it('returns 200 when all health checks pass', async () => {
      const server = await startApp([
        makeHealthChecker({ name: 'postgres:adventureworks', status: 'healthy', critical: true }),
      ]);

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('ok');
      expect(body.checks).toEqual([
        { name: 'postgres:adventureworks', status: 'healthy', critical: true },
      ]);
    });

    it('returns 503 when the database check fails', async () => {
      const server = await startApp([
        makeHealthChecker({
          name: 'postgres:adventureworks',
          status: 'unhealthy',
          message: 'Connection refused',
          critical: true,
        }),
      ]);

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(503);
      const body = response.json();
      expect(body.status).toBe('unhealthy');
      expect(body.checks).toContainEqual(
        expect.objectContaining({
          name: 'postgres:adventureworks',
          status: 'unhealthy',
          message: 'Connection refused',
        })
      );
    });

    it('reports an empty seed snapshot as degraded with 200', async () => {
      const server = await startApp([makeSnapshotHealthChecker(createSalesSnapshot())]);

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('degraded');
      expect(body.checks).toEqual([
        {
          name: 'seed-snapshot',
          status: 'unhealthy',
          message: 'Snapshot holds no orders',
          critical: false,
        },
      ]);
    });

    it('handles health checker exceptions', async () => {
      const server = await startApp([
        makeHealthChecker({ name: 'postgres:adventureworks', status: 'healthy' }),
        makeFailingHealthChecker('Connection timeout'),
      ]);

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(503);
      expect(response.json().checks).toContainEqual(
        expect.objectContaining({
          name: 'unknown',
          status: 'unhealthy',
          message: 'Connection timeout',
        })
      );
    });

    it('includes latency when provided by checker', async () => {
      const server = await startApp([
        makeSlowHealthChecker(10, { name: 'postgres:adventureworks', status: 'healthy' }),
      ]);

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.checks[0]).toMatchObject({ name: 'postgres:adventureworks', status: 'healthy' });
      expect(body.checks[0].latencyMs).toBeGreaterThanOrEqual(10);
    });

    it('includes version and uptime', async () => {
      const server = await startApp([], '1.2.3');

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      const body = response.json();
      expect(body.version).toBe('1.2.3');
      expect(typeof body.uptime).toBe('number');
      expect(body.uptime).toBeGreaterThanOrEqual(0);
    });

    it('runs all health checks in parallel', async () => {
      const server = await startApp([
        makeSlowHealthChecker(50, { name: 'check1' }),
        makeSlowHealthChecker(50, { name: 'check2' }),
      ]);

      const startTime = Date.now();
      const response = await server.inject({ method: 'GET', url: '/health/ready' });
      const duration = Date.now() - startTime;

      expect(response.statusCode).toBe(200);
      // In parallel this takes ~50ms, not ~100ms
      expect(duration).toBeLessThan(100);
    });
  });
});
