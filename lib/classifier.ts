import { CONFIG } from './config';
import { ConfigurationError } from './errors';
import logger from './logger';
import type { ClassificationThresholds, DnsRecord, RecordOrigin } from './types';

export const SECONDS_PER_DAY = 86_400;

export const DEFAULT_THRESHOLDS: ClassificationThresholds = Object.freeze({
  cloudDays: CONFIG.THRESHOLDS.CLOUD_DAYS,
  onPremDays: CONFIG.THRESHOLDS.ONPREM_DAYS,
});

/**
 * Cloud provider named by the record's `Cloud_Provider` extensible attribute, or null.
 */
export function cloudProvider(record: DnsRecord): string | null {
  const value = record.extendedAttributes[CONFIG.CLOUD_PROVIDER_ATTRIBUTE]?.value;
  return value ? value : null;
}

export function recordOrigin(record: DnsRecord): RecordOrigin {
  return cloudProvider(record) ? 'cloud' : 'on-prem';
}

export function thresholdDaysFor(record: DnsRecord, thresholds: ClassificationThresholds): number {
  return recordOrigin(record) === 'cloud' ? thresholds.cloudDays : thresholds.onPremDays;
}

/**
 * Decide whether a record is a scavenging candidate.
 *
 * A record that was never queried always is. Otherwise it is a candidate when its last query
 * predates `now - thresholdDays`; a record queried exactly at that boundary is not.
 *
 * @param now epoch seconds, defaults to the current time
 */
export function isCandidate(
  record: DnsRecord,
  thresholds: ClassificationThresholds,
  now: number = Date.now() / 1000,
): boolean {
  if (record.lastQueried === undefined) return true;
  const cutoff = now - thresholdDaysFor(record, thresholds) * SECONDS_PER_DAY;
  return record.lastQueried < cutoff;
}

function parseDays(input: string | number | undefined): number | null {
  if (input === undefined) return null;
  const text = String(input).trim();
  if (!/^\d+$/.test(text)) return null;
  const n = Number(text);
  return Number.isSafeInteger(n) ? n : null;
}

export interface ResolvedThresholds {
  thresholds: ClassificationThresholds;
  error?: ConfigurationError;
}

/**
 * Parse operator-supplied thresholds. If either value is not a non-negative integer both fall
 * back to the defaults; the `ConfigurationError` is returned for the caller to report.
 */
export function resolveThresholds(
  cloudInput: string | number | undefined,
  onPremInput: string | number | undefined,
  defaults: ClassificationThresholds = DEFAULT_THRESHOLDS,
): ResolvedThresholds {
  const cloudDays = parseDays(cloudInput);
  const onPremDays = parseDays(onPremInput);
  if (cloudDays === null || onPremDays === null) {
    const error = new ConfigurationError(
      `Invalid threshold input (cloud: "${cloudInput ?? ''}", on-prem: "${onPremInput ?? ''}"); ` +
        `defaulting to cloud ${defaults.cloudDays} days, on-prem ${defaults.onPremDays} days`,
    );
    logger.warn({ cloudInput, onPremInput }, error.message);
    return { thresholds: defaults, error };
  }
  return { thresholds: Object.freeze({ cloudDays, onPremDays }) };
}
