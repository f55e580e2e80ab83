import { cloudProvider } from '../classifier';
import type { DnsRecord } from '../types';
import { daysBetween, formatDate } from './format';

export const BASE_COLUMNS = ['FQDN', 'IP Address', 'Source', 'Last Queried', 'Days Since Last Query'] as const;

/**
 * Escape a value for CSV output
 */
export function escapeCSV(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Every extended attribute key seen on any record, sorted.
 */
export function collectAttributeKeys(records: readonly DnsRecord[]): string[] {
  const keys = new Set<string>();
  for (const r of records) {
    for (const key of Object.keys(r.extendedAttributes)) keys.add(key);
  }
  return Array.from(keys).sort();
}

export function reviewRow(record: DnsRecord, attributeKeys: readonly string[], now: number): string[] {
  const lq = record.lastQueried;
  return [
    record.name,
    record.address,
    cloudProvider(record) ?? 'On-Prem',
    lq !== undefined ? formatDate(lq) : 'Never',
    lq !== undefined ? String(daysBetween(lq, now)) : 'N/A',
    ...attributeKeys.map((key) => record.extendedAttributes[key]?.value ?? ''),
  ];
}

/**
 * Render the business review CSV: fixed columns, then one `EA:<key>` column per attribute key
 * found across all candidates. A record lacking a key gets an empty cell.
 */
export function formatReviewCsv(records: readonly DnsRecord[], now: number): string {
  const attributeKeys = collectAttributeKeys(records);
  const header = [...BASE_COLUMNS, ...attributeKeys.map((k) => `EA:${k}`)];
  const lines = [header, ...records.map((r) => reviewRow(r, attributeKeys, now))].map((row) =>
    row.map(escapeCSV).join(','),
  );
  return lines.join('\r\n') + '\r\n';
}
