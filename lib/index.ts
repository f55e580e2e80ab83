export * from './types';
export * from './errors';
export { CONFIG } from './config';
export { isCandidate, recordOrigin, cloudProvider, resolveThresholds, DEFAULT_THRESHOLDS } from './classifier';
export { runAudit, summarizeAudit, computeHealthPercentage } from './audit';
export type { AuditOptions, AuditProgressEvent, RecordSource, ReportWriter } from './audit';
export { HttpTransport } from './net/httpTransport';
export type { HttpFetch, HttpResponse, HttpTransportOptions } from './net/httpTransport';
export { RecordFetcher, wapiBaseUrl } from './wapi/recordFetcher';
export { openScavengerSession, withScavengerSession } from './wapi/session';
export type { ScavengerSession, ScavengerSessionOptions } from './wapi/session';
export { writeReports } from './report/emitter';
export type { AuditSummary, ManifestEntry } from './report/emitter';
