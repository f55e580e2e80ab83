// Timestamp rendering for report names and cells. All times are UTC.

function isoAt(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString();
}

/** `YYYYMMDD_HHMM`, used in report file names. */
export function fileStamp(epochSeconds: number): string {
  const iso = isoAt(epochSeconds);
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 16).replace(':', '')}`;
}

/** `YYYY-MM-DD` */
export function formatDate(epochSeconds: number): string {
  return isoAt(epochSeconds).slice(0, 10);
}

/** `YYYY-MM-DD HH:MM:SS` */
export function formatDateTime(epochSeconds: number): string {
  return isoAt(epochSeconds).slice(0, 19).replace('T', ' ');
}

/** Whole days elapsed between two epoch-second instants. */
export function daysBetween(earlier: number, later: number): number {
  return Math.floor((later - earlier) / 86_400);
}
