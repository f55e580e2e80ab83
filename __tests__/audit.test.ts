import { computeHealthPercentage, runAudit, summarizeAudit, type AuditProgressEvent, type RecordSource } from '../lib/audit';
import { InterruptedError, TransportError } from '../lib/errors';
import type { DnsRecord, ReportPaths } from '../lib/types';
import { DAY, NOW, record } from './helpers/fakeWapi';

const paths: ReportPaths = { manifest: 'm.json', review: 'r.csv', summary: 's.json' };

function sourceOf(byType: Record<string, DnsRecord[]>): RecordSource {
  return { fetch: async (recordType) => byType[recordType] ?? [] };
}

const scenario: DnsRecord[] = [
  record({ name: 'a.com', address: '10.0.0.1', lastQueried: NOW - 100 * DAY }),
  record({
    name: 'b.com',
    address: '10.0.0.2',
    lastQueried: NOW - 3 * DAY,
    extendedAttributes: { Cloud_Provider: { value: 'AWS' } },
  }),
];

describe('computeHealthPercentage', () => {
  test('empty grid is fully healthy', () => {
    expect(computeHealthPercentage(0, 0)).toBe(100);
  });

  test('rounds to one decimal', () => {
    expect(computeHealthPercentage(3, 1)).toBe(66.7);
    expect(computeHealthPercentage(3, 2)).toBe(33.3);
    expect(computeHealthPercentage(2, 1)).toBe(50);
    expect(computeHealthPercentage(4, 4)).toBe(0);
  });
});

describe('summarizeAudit', () => {
  test('no candidates while both records are inside their windows', () => {
    const result = summarizeAudit(scenario, { cloudDays: 7, onPremDays: 120 }, NOW);
    expect(result.candidates).toEqual([]);
    expect(result.safeCount).toBe(2);
    expect(result.healthPercentage).toBe(100);
  });

  test('lowering the on-prem threshold flags the on-prem record only', () => {
    const result = summarizeAudit(scenario, { cloudDays: 7, onPremDays: 30 }, NOW);
    expect(result.candidates.map((r) => r.name)).toEqual(['a.com']);
    expect(result.cloudCandidateCount).toBe(0);
    expect(result.onPremCandidateCount).toBe(1);
    expect(result.healthPercentage).toBe(50);
  });

  test('partitions are complete and keep fetch order', () => {
    const records = [
      record({ name: 'r1.example.com' }),
      record({ name: 'r2.example.com', lastQueried: NOW - DAY }),
      record({ name: 'r3.example.com', extendedAttributes: { Cloud_Provider: { value: 'Azure' } } }),
      record({ name: 'r4.example.com', lastQueried: NOW - 60 * DAY }),
    ];
    const result = summarizeAudit(records, { cloudDays: 7, onPremDays: 30 }, NOW);

    expect(result.candidates.map((r) => r.name)).toEqual(['r1.example.com', 'r3.example.com', 'r4.example.com']);
    expect(result.candidates.length + result.safeCount).toBe(result.totalRecords);
    expect(result.cloudCandidateCount + result.onPremCandidateCount).toBe(result.candidates.length);
    expect(result.cloudCandidateCount).toBe(1);
    expect(result.healthPercentage).toBe(25);
  });
});

describe('runAudit', () => {
  test('writes reports in dry-run mode when there are candidates', async () => {
    const writeReports = jest.fn().mockResolvedValue(paths);
    const events: AuditProgressEvent[] = [];

    const result = await runAudit(sourceOf({ 'record:a': scenario }), {
      thresholds: { cloudDays: 7, onPremDays: 30 },
      now: NOW,
      writeReports,
      onProgress: (e) => events.push(e),
    });

    expect(writeReports).toHaveBeenCalledTimes(1);
    expect(writeReports.mock.calls[0][1]).toBe(NOW);
    expect(result.reports).toEqual(paths);
    expect(events.map((e) => e.type)).toEqual([
      'analysis-start',
      'fetch-start',
      'fetch-complete',
      'classified',
      'reports-written',
    ]);
    expect(events[2]).toEqual({ type: 'fetch-complete', recordType: 'record:a', count: 2 });
    expect(events[3]).toEqual({ type: 'classified', cloudCandidates: 0, onPremCandidates: 1, safe: 1 });
  });

  test('computes statistics but writes nothing outside dry-run mode', async () => {
    const writeReports = jest.fn().mockResolvedValue(paths);
    const result = await runAudit(sourceOf({ 'record:a': scenario }), {
      thresholds: { cloudDays: 7, onPremDays: 30 },
      now: NOW,
      dryRun: false,
      writeReports,
    });

    expect(writeReports).not.toHaveBeenCalled();
    expect(result.onPremCandidateCount).toBe(1);
    expect(result.reports).toBeUndefined();
  });

  test('writes nothing when there are no candidates', async () => {
    const writeReports = jest.fn().mockResolvedValue(paths);
    const result = await runAudit(sourceOf({}), {
      thresholds: { cloudDays: 7, onPremDays: 30 },
      now: NOW,
      writeReports,
    });

    expect(writeReports).not.toHaveBeenCalled();
    expect(result.totalRecords).toBe(0);
    expect(result.healthPercentage).toBe(100);
  });

  test('concatenates several record types in the requested order', async () => {
    const source = sourceOf({
      'record:a': [record({ name: 'v4.example.com' })],
      'record:aaaa': [record({ name: 'v6.example.com', recordType: 'record:aaaa', address: '2001:db8::1' })],
    });
    const result = await runAudit(source, {
      thresholds: { cloudDays: 7, onPremDays: 30 },
      recordTypes: ['record:aaaa', 'record:a'],
      now: NOW,
      dryRun: false,
    });

    expect(result.candidates.map((r) => r.name)).toEqual(['v6.example.com', 'v4.example.com']);
  });

  test('fetch failures propagate and no reports are written', async () => {
    const failure = new TransportError('GET https://grid.test failed: HTTP 401 Unauthorized', {
      url: 'https://grid.test',
      reason: 'status',
      status: 401,
    });
    const writeReports = jest.fn().mockResolvedValue(paths);
    const source: RecordSource = { fetch: () => Promise.reject(failure) };

    await expect(
      runAudit(source, { thresholds: { cloudDays: 7, onPremDays: 30 }, now: NOW, writeReports }),
    ).rejects.toBe(failure);
    expect(writeReports).not.toHaveBeenCalled();
  });

  test('a cancellation that lands after the last page still stops the run before reports', async () => {
    const controller = new AbortController();
    const writeReports = jest.fn().mockResolvedValue(paths);
    const source: RecordSource = {
      fetch: async () => {
        controller.abort();
        return scenario;
      },
    };

    await expect(
      runAudit(source, {
        thresholds: { cloudDays: 7, onPremDays: 30 },
        now: NOW,
        writeReports,
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(InterruptedError);
    expect(writeReports).not.toHaveBeenCalled();
  });
});
