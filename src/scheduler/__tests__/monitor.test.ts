import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Queue } from 'bullmq';
import { intakeConfig } from '../../intake/index.js';
import { monthlyReportPattern, startScanSchedulers } from '../monitor.js';
import type { ScanJobData, ScanJobName, ScanJobResult } from '../types.js';

type ScanQueue = Queue<ScanJobData, ScanJobResult, ScanJobName>;

describe('monthlyReportPattern', () => {
  it('builds a cron pattern for the hour and day', () => {
    expect(monthlyReportPattern(1, 8)).toBe('0 8 1 * *');
  });
});

describe('startScanSchedulers', () => {
  const upsertJobScheduler = vi.fn();
  const queue = { upsertJobScheduler } as unknown as ScanQueue;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    upsertJobScheduler.mockReset().mockResolvedValue(undefined);
    intakeConfig.enabled = true;
  });

  afterEach(() => {
    intakeConfig.enabled = true;
    vi.restoreAllMocks();
  });

  it('schedules the inbox poll and the monthly report', async () => {
    await startScanSchedulers(queue);

    expect(upsertJobScheduler).toHaveBeenCalledTimes(2);
    expect(upsertJobScheduler.mock.calls[0][0]).toBe('poll-inbox');
    expect(upsertJobScheduler.mock.calls[0][1]).toEqual({ every: intakeConfig.pollIntervalMs });
    expect(upsertJobScheduler.mock.calls[0][2]).toMatchObject({ name: 'poll-inbox' });
    expect(upsertJobScheduler.mock.calls[1]).toEqual([
      'monthly-report',
      { pattern: '0 8 1 * *', tz: 'UTC' },
      { name: 'monthly-report', data: {} },
    ]);
  });

  it('only schedules the report when polling is disabled', async () => {
    intakeConfig.enabled = false;

    await startScanSchedulers(queue);

    expect(upsertJobScheduler).toHaveBeenCalledTimes(1);
    expect(upsertJobScheduler.mock.calls[0][0]).toBe('monthly-report');
  });
});
