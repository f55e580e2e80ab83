/**
 * Run metrics using `prom-client`.
 *
 * Metrics:
 * - `dns_scavenger_pages_fetched_total{record_type}` (Counter)
 * - `dns_scavenger_records_fetched_total{record_type}` (Counter)
 * - `dns_scavenger_transport_errors_total{reason}` (Counter)
 * - `dns_scavenger_request_latency_seconds` (Histogram)
 * - `dns_scavenger_candidates{origin}` (Gauge)
 * - `dns_scavenger_health_percentage` (Gauge)
 *
 * The CLI can dump `register.metrics()` to a file for the node_exporter textfile collector.
 */

import { Counter, Gauge, Histogram, register } from 'prom-client';
import type { TransportFailure } from './errors';
import type { RecordOrigin } from './types';

export const pagesFetched = new Counter({
  name: 'dns_scavenger_pages_fetched_total',
  help: 'Total number of WAPI pages fetched',
  labelNames: ['record_type'] as const,
});

export const recordsFetched = new Counter({
  name: 'dns_scavenger_records_fetched_total',
  help: 'Total number of records fetched from the grid',
  labelNames: ['record_type'] as const,
});

export const transportErrors = new Counter({
  name: 'dns_scavenger_transport_errors_total',
  help: 'Total number of failed WAPI requests',
  labelNames: ['reason'] as const,
});

export const requestLatency = new Histogram({
  name: 'dns_scavenger_request_latency_seconds',
  help: 'Histogram of WAPI request latency in seconds',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
});

export const candidatesGauge = new Gauge({
  name: 'dns_scavenger_candidates',
  help: 'Scavenging candidates found by the last audit run',
  labelNames: ['origin'] as const,
});

export const healthGauge = new Gauge({
  name: 'dns_scavenger_health_percentage',
  help: 'Share of records that are not scavenging candidates (0-100)',
});

export function observePage(recordType: string, recordCount: number): void {
  pagesFetched.inc({ record_type: recordType });
  recordsFetched.inc({ record_type: recordType }, recordCount);
}

/**
 * Observe request latency in seconds.
 */
export function observeRequestLatency(seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  requestLatency.observe(seconds);
}

export function incTransportError(reason: TransportFailure): void {
  transportErrors.inc({ reason });
}

export function setAuditGauges(counts: Record<RecordOrigin, number>, healthPercentage: number): void {
  candidatesGauge.set({ origin: 'cloud' }, counts.cloud);
  candidatesGauge.set({ origin: 'on-prem' }, counts['on-prem']);
  healthGauge.set(healthPercentage);
}

export { register };
const metrics = { register, observePage, observeRequestLatency, incTransportError, setAuditGauges };
export default metrics;
