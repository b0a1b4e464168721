/**
 * Tests for the health endpoint.
 *
 * The scan worker module is mocked so the last poll summary can be set
 * without running a cycle.
 */

import { vi, describe, it, expect, beforeEach } from 'vitest';

const { mockConfig, mockLastPoll } = vi.hoisted(() => ({
  mockConfig: { killSwitch: false },
  mockLastPoll: vi.fn(),
}));

vi.mock('../../config.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../config.js')>();
  return { ...actual, appConfig: mockConfig };
});

vi.mock('../../scheduler/scan-worker.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../scheduler/scan-worker.js')>();
  return { ...actual, getLastPollSummary: mockLastPoll };
});

import request from 'supertest';
import { createApp } from '../server.js';

describe('GET /health', () => {
  beforeEach(() => {
    mockConfig.killSwitch = false;
    mockLastPoll.mockReset().mockReturnValue(null);
  });

  it('returns status, kill switch and an empty last poll before the first cycle', async () => {
    const res = await request(createApp()).get('/health').expect(200);

    expect(res.body).toMatchObject({ status: 'ok', killSwitch: false, lastPoll: null });
    expect(typeof res.body.timestamp).toBe('string');
    expect(typeof res.body.version).toBe('string');
  });

  it('reports the kill switch', async () => {
    mockConfig.killSwitch = true;

    const res = await request(createApp()).get('/health').expect(200);

    expect(res.body.killSwitch).toBe(true);
  });

  it('includes the last poll summary', async () => {
    const lastPoll = {
      finishedAt: '2025-06-12T00:00:00.000Z',
      summary: { emailsFound: 3, alreadyProcessed: 2, invoices: 2, review: 1, rejected: 0, errors: [], complete: true },
    };
    mockLastPoll.mockReturnValue(lastPoll);

    const res = await request(createApp()).get('/health').expect(200);

    expect(res.body.lastPoll).toEqual(lastPoll);
  });

  it('returns 404 for unknown routes', async () => {
    await request(createApp()).get('/webhooks/anything').expect(404);
  });
});
