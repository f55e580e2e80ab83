// Centralized runtime configuration for timeouts, pool sizes, paging and thresholds.
// Values are read from env with sane defaults and can be overridden in tests.

export function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

// Day thresholds, where 0 is a valid value.
export function envNonNegInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

function envBool(name: string, fallback: boolean): boolean {
  const v = process.env[name];
  if (!v) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase());
}

export const CONFIG = {
  HTTP_TIMEOUT_MS: envInt('HTTP_TIMEOUT_MS', 30_000),

  WAPI: {
    VERSION: process.env.WAPI_VERSION || '2.13.1',
    PAGE_SIZE: envInt('WAPI_PAGE_SIZE', 1000),
    // Certificate verification is on unless explicitly disabled.
    TLS_INSECURE: envBool('WAPI_TLS_INSECURE', false),
  },

  CONCURRENCY: {
    REQUESTS: envInt('WAPI_CONCURRENCY', 10),
    MAX_CONNECTIONS: envInt('WAPI_MAX_CONNECTIONS', 50),
    KEEPALIVE_TIMEOUT_MS: envInt('WAPI_KEEPALIVE_TIMEOUT_MS', 5000),
  },

  THRESHOLDS: {
    CLOUD_DAYS: envNonNegInt('SCAVENGER_CLOUD_DAYS', 14),
    ONPREM_DAYS: envNonNegInt('SCAVENGER_ONPREM_DAYS', 30),
  },

  OUTPUT_DIR: process.env.SCAVENGER_OUTPUT_DIR || '.',

  DEFAULT_RECORD_TYPE: 'record:a',
  CLOUD_PROVIDER_ATTRIBUTE: 'Cloud_Provider',
};

export default CONFIG;
