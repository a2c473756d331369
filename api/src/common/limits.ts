export const WORKSPACE_QUOTA_PER_TENANT = 10;
export const PROJECT_QUOTA_PER_WORKSPACE = 50;

// Audit purges never go below this, whatever the caller asks for.
export const AUDIT_RETENTION_FLOOR_DAYS = 30;

export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;
