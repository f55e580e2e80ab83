import { CONFIG } from './config';
import { isCandidate, recordOrigin } from './classifier';
import { throwIfInterrupted } from './errors';
import logger from './logger';
import { setAuditGauges } from './metrics';
import { writeReports } from './report/emitter';
import type { AuditResult, ClassificationThresholds, DnsRecord, ReportPaths } from './types';

/** Anything that can list records of a WAPI object type; `RecordFetcher` in production. */
export interface RecordSource {
  fetch(recordType: string): Promise<DnsRecord[]>;
}

export type ReportWriter = (result: AuditResult, now: number) => Promise<ReportPaths>;

export type AuditProgressEvent =
  | { type: 'analysis-start'; thresholds: ClassificationThresholds; recordTypes: readonly string[] }
  | { type: 'fetch-start'; recordType: string }
  | { type: 'fetch-complete'; recordType: string; count: number }
  | { type: 'classified'; cloudCandidates: number; onPremCandidates: number; safe: number }
  | { type: 'reports-written'; paths: ReportPaths };

export interface AuditOptions {
  thresholds: ClassificationThresholds;
  recordTypes?: readonly string[];
  dryRun?: boolean;
  now?: number; // epoch seconds, fixed for the whole run
  writeReports?: ReportWriter;
  onProgress?: (event: AuditProgressEvent) => void;
  signal?: AbortSignal; // run-level cancellation
}

/**
 * Share of records that are not candidates, as a percentage rounded to one decimal.
 * An empty grid is 100% healthy.
 */
export function computeHealthPercentage(totalRecords: number, candidateCount: number): number {
  if (totalRecords === 0) return 100;
  return Math.round(((totalRecords - candidateCount) / totalRecords) * 100 * 10) / 10;
}

/**
 * Classify a fetched record set. Pure; never throws.
 */
export function summarizeAudit(
  records: readonly DnsRecord[],
  thresholds: ClassificationThresholds,
  now: number,
): AuditResult {
  const candidates: DnsRecord[] = [];
  for (const record of records) {
    if (isCandidate(record, thresholds, now)) candidates.push(record);
  }

  let cloudCandidateCount = 0;
  for (const record of candidates) {
    if (recordOrigin(record) === 'cloud') cloudCandidateCount++;
  }

  return Object.freeze({
    totalRecords: records.length,
    candidates: Object.freeze(candidates),
    safeCount: records.length - candidates.length,
    cloudCandidateCount,
    onPremCandidateCount: candidates.length - cloudCandidateCount,
    healthPercentage: computeHealthPercentage(records.length, candidates.length),
  });
}

/**
 * Fetch, classify and aggregate one audit run.
 *
 * Fetch failures propagate unchanged. Reports are produced only after every record has been
 * classified, and only in dry-run mode when there is at least one candidate. A run cancelled
 * through `signal` rejects with `InterruptedError` and leaves no reports behind.
 */
export async function runAudit(source: RecordSource, opts: AuditOptions): Promise<AuditResult> {
  const recordTypes = opts.recordTypes?.length ? opts.recordTypes : [CONFIG.DEFAULT_RECORD_TYPE];
  const dryRun = opts.dryRun ?? true;
  const now = opts.now ?? Date.now() / 1000;
  const emit = opts.onProgress ?? (() => undefined);

  emit({ type: 'analysis-start', thresholds: opts.thresholds, recordTypes });

  const batches = await Promise.all(
    recordTypes.map(async (recordType) => {
      emit({ type: 'fetch-start', recordType });
      const records = await source.fetch(recordType);
      emit({ type: 'fetch-complete', recordType, count: records.length });
      return records;
    }),
  );
  // The signal may have fired while the last page body was being read.
  throwIfInterrupted(opts.signal);
  const records = batches.flat();

  const result = summarizeAudit(records, opts.thresholds, now);
  setAuditGauges(
    { cloud: result.cloudCandidateCount, 'on-prem': result.onPremCandidateCount },
    result.healthPercentage,
  );
  logger.debug(
    {
      total: result.totalRecords,
      candidates: result.candidates.length,
      cloud: result.cloudCandidateCount,
      onPrem: result.onPremCandidateCount,
    },
    'audit classified',
  );
  emit({
    type: 'classified',
    cloudCandidates: result.cloudCandidateCount,
    onPremCandidates: result.onPremCandidateCount,
    safe: result.safeCount,
  });

  if (!dryRun || result.candidates.length === 0) return result;

  const writer: ReportWriter =
    opts.writeReports ??
    ((r, at) => writeReports(r, { outputDir: CONFIG.OUTPUT_DIR, now: at, signal: opts.signal }));
  const paths = await writer(result, now);
  emit({ type: 'reports-written', paths });
  return Object.freeze({ ...result, reports: paths });
}

export default runAudit;
