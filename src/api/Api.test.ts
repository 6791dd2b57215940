/**
 * E2E tests for the HTTP API.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { readFileSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { FastifyInstance } from 'fastify';
import { mergeWithDefaults } from '../config/loader.js';
import { initializeApp, createServer } from '../server.js';

const here = dirname(fileURLToPath(import.meta.url));
const fixtureDir = join(here, '../parsing/fixtures');

function fixture(name: string): string {
  return readFileSync(join(fixtureDir, name), 'utf-8');
}

describe('API E2E Tests', () => {
  let app: FastifyInstance;
  const testDir = resolve(process.cwd(), 'tmp/api-test');

  beforeAll(async () => {
    const ctx = await initializeApp({
      config: mergeWithDefaults({
        server: { logLevel: 'silent' },
        qc: { backgroundAnalyte: 'Blank', standardAnalytes: ['IgG', 'Tet'], outputDir: testDir },
      }),
    });

    app = await createServer(ctx, {
      logLevel: 'silent',
    });

    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('Health Check', () => {
    it('should report the configured QC analytes', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/health',
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body.status).toBe('ok');
      expect(body.timestamp).toBeDefined();
      expect(body.components.qc).toEqual({ configured: true, backgroundAnalyte: 'Blank', standardAnalytes: 2 });
    });

    it('should be degraded without a background analyte', async () => {
      const bare = await createServer(await initializeApp({ config: mergeWithDefaults({}) }), { logLevel: 'silent' });
      const response = await bare.inject({ method: 'GET', url: '/api/health' });
      await bare.close();

      expect(JSON.parse(response.payload).status).toBe('degraded');
    });
  });

  describe('Settings', () => {
    it('should return the configured QC settings', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/qc/settings' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body.settings.backgroundAnalyte).toBe('Blank');
      expect(body.settings.beadThreshold).toBe(50);
      expect(body.settings.blocks.strategy).toBe('auto');
    });
  });

  describe('Plate QC', () => {
    it('should run QC over a posted export', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/qc/plates',
        payload: { content: fixture('ProjA_plate1.csv'), plateId: 'P1' },
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body.plate).toEqual({ plateId: 'P1', passed: true, passingAnalytes: ['IgG'] });
      expect(body.strategy).toBe('fixed-count');
      expect(body.lowBead).toEqual([{ location: '4(1,D1)', sample: 'Sample A', antigen: 'IgG', plate: 'P1' }]);
      expect(body.cleanedCsv.split('\n')[1]).toBe('"1(1,A1)",Standard1,10,1000,500,P1,IgG');
      expect(body.artifacts).toBeUndefined();
    });

    it('should apply per-request overrides', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/qc/plates',
        payload: { content: fixture('ProjA_plate1.csv'), plateId: 'P1', settings: { standardAnalytes: ['Tet'] } },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.payload).plate.passed).toBe(false);
    });

    it('should write artifacts on request', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/qc/plates',
        payload: { content: fixture('ProjA_plate1.csv'), plateId: 'P1', write: true },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.payload).artifacts).toEqual([
        join(testDir, 'P1_clean.csv'),
        join(testDir, 'P1_beadqc_low_df.csv'),
        join(testDir, 'P1_standards_fits.csv'),
      ]);
    });

    it('should reject malformed requests', async () => {
      const missing = await app.inject({ method: 'POST', url: '/api/qc/plates', payload: { plateId: 'P1' } });
      expect(missing.statusCode).toBe(400);
      expect(JSON.parse(missing.payload).error).toBe('BAD_REQUEST');

      const traversal = await app.inject({
        method: 'POST',
        url: '/api/qc/plates',
        payload: { content: 'x', plateId: '../P1' },
      });
      expect(traversal.statusCode).toBe(400);

      const threshold = await app.inject({
        method: 'POST',
        url: '/api/qc/plates',
        payload: { content: 'x', plateId: 'P1', settings: { rSquaredThreshold: 1 } },
      });
      expect(threshold.statusCode).toBe(400);
    });

    it('should return 422 for an export without a bead-count section', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/qc/plates',
        payload: { content: fixture('ProjA_plate3.csv'), plateId: 'P3' },
      });

      expect(response.statusCode).toBe(422);
      expect(JSON.parse(response.payload).error).toBe('BLOCK_NOT_FOUND');
    });

    it('should return 400 for an unknown background analyte', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/qc/plates',
        payload: { content: fixture('ProjA_plate1.csv'), plateId: 'P1', settings: { backgroundAnalyte: 'Buffer' } },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.payload).error).toBe('CONFIG_ERROR');
    });
  });

  describe('Project QC', () => {
    it('should aggregate a folder of exports', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/qc/projects',
        payload: { directory: fixtureDir },
      });

      expect(response.statusCode).toBe(200);
      const { summary } = JSON.parse(response.payload);
      expect(summary.projectName).toBe('ProjA');
      expect(summary.plates.map((p: { plateId: string }) => p.plateId)).toEqual(['ProjA_plate1', 'ProjA_plate2']);
      expect(summary.skipped.map((s: { file: string }) => s.file)).toEqual(['ProjA_plate3.csv']);
    });

    it('should fail a strict run on an unparseable export', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/qc/projects',
        payload: { directory: fixtureDir, strict: true },
      });

      expect(response.statusCode).toBe(422);
      expect(JSON.parse(response.payload).error).toBe('BLOCK_NOT_FOUND');
    });
  });
});
