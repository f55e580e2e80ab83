import { rm } from 'fs/promises';
import { join } from 'path';
import { InterruptedError, throwIfInterrupted } from '../errors';
import logger from '../logger';
import type { AuditResult, DnsRecord, ReportPaths } from '../types';
import { atomicWriteFile, atomicWriteJSON } from './atomicWrite';
import { formatReviewCsv } from './csv';
import { fileStamp, formatDateTime } from './format';

export const SUMMARY_FILE_NAME = 'live_scavenging_summary.json';

export interface ReportOptions {
  outputDir: string;
  now: number; // epoch seconds
  signal?: AbortSignal;
}

export interface ManifestEntry {
  _ref?: string;
  record_type: string;
  name: string;
  address: string;
  last_queried: number | null;
  extattrs: Record<string, { value: string }>;
}

export interface AuditSummary {
  total_records: number;
  total_candidates: number;
  cloud_candidates: number;
  onprem_candidates: number;
  health_percentage: number;
  last_run: string;
}

export function toManifestEntry(record: DnsRecord): ManifestEntry {
  const extattrs: Record<string, { value: string }> = {};
  for (const [key, attr] of Object.entries(record.extendedAttributes)) {
    extattrs[key] = { value: attr.value };
  }
  return {
    ...(record.ref ? { _ref: record.ref } : {}),
    record_type: record.recordType,
    name: record.name,
    address: record.address,
    last_queried: record.lastQueried ?? null,
    extattrs,
  };
}

export function buildSummary(result: AuditResult, now: number): AuditSummary {
  return {
    total_records: result.totalRecords,
    total_candidates: result.candidates.length,
    cloud_candidates: result.cloudCandidateCount,
    onprem_candidates: result.onPremCandidateCount,
    health_percentage: result.healthPercentage,
    last_run: formatDateTime(now),
  };
}

/** File names for a run started at `now`. */
export function reportPaths(outputDir: string, now: number): ReportPaths {
  const stamp = fileStamp(now);
  return {
    manifest: join(outputDir, `scavenging_manifest_${stamp}.json`),
    review: join(outputDir, `affected_records_review_${stamp}.csv`),
    summary: join(outputDir, SUMMARY_FILE_NAME),
  };
}

/**
 * Write the technical manifest (JSON), the business review file (CSV) and the live summary (JSON).
 * If `signal` fires before all three are in place, the files already written are removed and the
 * call rejects with `InterruptedError`.
 */
export async function writeReports(result: AuditResult, opts: ReportOptions): Promise<ReportPaths> {
  const paths = reportPaths(opts.outputDir, opts.now);
  const written: string[] = [];
  const write = async (path: string, doWrite: () => Promise<void>) => {
    throwIfInterrupted(opts.signal);
    await doWrite();
    written.push(path);
  };

  try {
    await write(paths.manifest, () => atomicWriteJSON(paths.manifest, result.candidates.map(toManifestEntry)));
    await write(paths.review, () => atomicWriteFile(paths.review, formatReviewCsv(result.candidates, opts.now)));
    await write(paths.summary, () => atomicWriteJSON(paths.summary, buildSummary(result, opts.now)));
    throwIfInterrupted(opts.signal);
  } catch (err) {
    if (err instanceof InterruptedError) {
      logger.debug({ written }, 'report writing interrupted, removing partial output');
      await Promise.all(written.map((path) => rm(path, { force: true })));
    }
    throw err;
  }

  logger.debug({ ...paths, candidates: result.candidates.length }, 'reports written');
  return paths;
}

export default writeReports;
