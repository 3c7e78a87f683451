import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { MemStorage } from './mem-storage';
import { registerRoutes } from './routes';
import { Canonicalizer } from './services/canonicalizer';
import { SchedulerService } from './services/scheduler';
import { ControlledRunner } from './testing/controlled-runner';

const ROACH = {
  caseNumber: '2025CP4601197',
  caseType: 'Foreclosure',
  filingDate: '10/02/2025',
  hearingDate: '11/03/2025',
  courtRoom: '2A',
  plaintiff: { fullName: 'Lakeview Loan Servicing LLC', firstName: '', lastName: '' },
  defendant: { fullName: 'Kenneth Roach', firstName: 'Kenneth', lastName: 'Roach' },
  propertyAddress: { street: '875 Rolling Green Drive', city: 'Rock Hill', state: 'SC', zip: '29730' },
  sourceUrl: 'https://portal.test/york/courtrosters/Roster.aspx',
};

const ESTIMATE = {
  estimateValue: 225000,
  listPrice: null,
  bedrooms: 3,
  bathrooms: 2,
  sqft: 1850,
  yearBuilt: null,
  resolvedAt: '2025-11-01T10:00:00.000Z',
};

const schedule = { intervalDays: 14, hour: 5, minute: 0, timezone: 'America/New_York' };

describe('ops API', () => {
  let storage: MemStorage;
  let runner: ControlledRunner;
  let scheduler: SchedulerService;
  let dataDir: string;
  let app: express.Express;

  beforeEach(async () => {
    storage = new MemStorage();
    runner = new ControlledRunner(undefined, true);
    scheduler = new SchedulerService(() => runner, storage, schedule);
    dataDir = await mkdtemp(path.join(tmpdir(), 'roster-api-'));
    app = express();
    app.use(express.json());
    registerRoutes(app, { storage, scheduler, dataDir });
  });

  afterEach(async () => {
    runner.finish();
    await rm(dataDir, { recursive: true, force: true });
  });

  it('answers 404 for the latest run before any run', async () => {
    const res = await request(app).get('/api/runs/latest');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'No runs yet' });
  });

  it('lists runs newest first', async () => {
    const older = await storage.createPipelineRun({ trigger: 'scheduled', status: 'succeeded', startedAt: new Date('2025-10-01T09:00:00Z') });
    const newer = await storage.createPipelineRun({ trigger: 'manual', status: 'failed', startedAt: new Date('2025-10-15T09:00:00Z') });

    const res = await request(app).get('/api/runs?limit=5');

    expect(res.status).toBe(200);
    expect(res.body.map((run: { id: string }) => run.id)).toEqual([newer, older]);
    expect((await request(app).get('/api/runs/latest')).body.id).toBe(newer);
  });

  it('starts a run in the background and refuses a second one', async () => {
    const first = await request(app).post('/api/runs/trigger');
    const second = await request(app).post('/api/runs/trigger');

    expect(first.status).toBe(202);
    expect(second.status).toBe(409);
    expect(runner.triggers).toEqual(['manual']);

    runner.finish();
    await vi.waitFor(() => expect(scheduler.isRunning()).toBe(false));
  });

  it('passes a stop request to the active run', async () => {
    await request(app).post('/api/runs/trigger');

    const res = await request(app).post('/api/runs/stop');

    expect(res.body).toEqual({ message: 'Stop requested' });
    expect(runner.stopRequested).toBe(true);
  });

  it('reports when there is no run to stop', async () => {
    const res = await request(app).post('/api/runs/stop');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: 'No run in progress' });
    expect(runner.stopRequested).toBe(false);
  });

  it('serves stored cases as export rows', async () => {
    await new Canonicalizer(storage).commitPage('run-1', [
      { record: ROACH, enrichment: ESTIMATE, scrapedAt: new Date('2025-11-01T10:00:00Z') },
    ]);

    const res = await request(app).get('/api/cases');

    expect(res.status).toBe(200);
    expect(res.body).toHaveLength(1);
    expect(res.body[0]).toMatchObject({
      case_number: '2025CP4601197',
      defendant: 'Kenneth Roach',
      property_street: '875 Rolling Green Drive',
      estimate_value: 225000,
    });
  });

  it('lists the conflicts recorded by a run', async () => {
    const canonicalizer = new Canonicalizer(storage);
    const scrapedAt = new Date('2025-11-01T10:00:00Z');
    await canonicalizer.commitPage('run-1', [{ record: ROACH, enrichment: null, scrapedAt }]);
    await canonicalizer.commitPage('run-2', [{ record: { ...ROACH, filingDate: '10/03/2025' }, enrichment: null, scrapedAt }]);

    const res = await request(app).get('/api/conflicts?runId=run-2');

    expect(res.body).toHaveLength(1);
    expect(res.body[0]).toMatchObject({
      caseNumber: '2025CP4601197',
      storedFilingDate: '10/02/2025',
      observedFilingDate: '10/03/2025',
    });
  });

  it('rejects an unknown export format', async () => {
    const res = await request(app).get('/api/export/pdf');

    expect(res.status).toBe(400);
  });

  it('writes and downloads a CSV export', async () => {
    await new Canonicalizer(storage).commitPage('run-1', [
      { record: ROACH, enrichment: ESTIMATE, scrapedAt: new Date('2025-11-01T10:00:00Z') },
    ]);

    const res = await request(app).get('/api/export/csv');

    expect(res.status).toBe(200);
    expect(res.headers['content-disposition']).toMatch(/^attachment; filename="foreclosures_\d{8}_\d{6}\.csv"$/);
    expect(res.text.split('\r\n')[1].startsWith('"2025CP4601197","Foreclosure","10/02/2025"')).toBe(true);
  });
});
