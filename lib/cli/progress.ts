import type { AuditProgressEvent } from '../audit';

/**
 * Console lines for one progress event.
 */
export function formatProgress(event: AuditProgressEvent): string[] {
  switch (event.type) {
    case 'analysis-start':
      return [
        '',
        '[!] Starting analysis...',
        `    - Cloud Threshold: ${event.thresholds.cloudDays} days`,
        `    - On-Prem Threshold: ${event.thresholds.onPremDays} days`,
      ];
    case 'fetch-start':
      return [`[*] Fetching ${event.recordType} records...`];
    case 'fetch-complete':
      return [`[+] Total ${event.recordType} records retrieved: ${event.count}`];
    case 'classified':
      return [
        '',
        '[+] Analysis Results:',
        `    - Cloud Candidates Identified: ${event.cloudCandidates}`,
        `    - On-Prem Candidates Identified: ${event.onPremCandidates}`,
        `    - Total Records Safe: ${event.safe}`,
      ];
    case 'reports-written':
      return [
        '',
        '[!] Dry Run Complete.',
        `    - Technical Manifest (JSON): ${event.paths.manifest}`,
        `    - Review File for Business (CSV): ${event.paths.review}`,
        `    - Live Presentation Data: ${event.paths.summary}`,
      ];
  }
}

export function createConsoleProgress(print: (line: string) => void): (event: AuditProgressEvent) => void {
  return (event) => {
    for (const line of formatProgress(event)) print(line);
  };
}
