export interface ExtensibleAttributeValue {
  value: string;
}

export type ExtensibleAttributes = Readonly<Record<string, Readonly<ExtensibleAttributeValue>>>;

export interface DnsRecord {
  readonly recordType: string; // WAPI object type, e.g. "record:a"
  readonly ref?: string; // WAPI `_ref`
  readonly name: string; // FQDN
  readonly address: string; // IPv4 or IPv6 literal
  readonly lastQueried?: number; // epoch seconds; absent = never queried
  readonly extendedAttributes: ExtensibleAttributes;
}

export type RecordOrigin = 'cloud' | 'on-prem';

export interface ClassificationThresholds {
  readonly cloudDays: number;
  readonly onPremDays: number;
}

export interface ReportPaths {
  readonly manifest: string;
  readonly review: string;
  readonly summary: string;
}

export interface AuditResult {
  readonly totalRecords: number;
  readonly candidates: readonly DnsRecord[];
  readonly safeCount: number;
  readonly cloudCandidateCount: number;
  readonly onPremCandidateCount: number;
  readonly healthPercentage: number;
  readonly reports?: ReportPaths;
}
