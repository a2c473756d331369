// Versioned tables use ReplacingMergeTree(updated_at): an update inserts a new
// row and reads go through FINAL to see the latest version.
export const SCHEMAS: Record<string, string> = {
  workspaces: `
    CREATE TABLE IF NOT EXISTS {database}.workspaces (
      id String,
      tenant_id String,
      name String,
      description String DEFAULT '',
      settings String DEFAULT '{}',
      created_by String,
      deleted_at Nullable(DateTime64(3)),
      created_at DateTime64(3) DEFAULT now64(3),
      updated_at DateTime64(3) DEFAULT now64(3)
    ) ENGINE = ReplacingMergeTree(updated_at)
    ORDER BY id
  `,

  projects: `
    CREATE TABLE IF NOT EXISTS {database}.projects (
      id String,
      workspace_id String,
      name String,
      description String DEFAULT '',
      status Enum8('active' = 1, 'archived' = 2),
      settings String DEFAULT '{}',
      created_by String,
      deleted_at Nullable(DateTime64(3)),
      created_at DateTime64(3) DEFAULT now64(3),
      updated_at DateTime64(3) DEFAULT now64(3)
    ) ENGINE = ReplacingMergeTree(updated_at)
    ORDER BY (workspace_id, id)
  `,

  airtable_bases: `
    CREATE TABLE IF NOT EXISTS {database}.airtable_bases (
      id String,
      project_id String,
      base_id String,
      name String,
      description String DEFAULT '',
      sync_enabled Bool DEFAULT true,
      last_sync_at Nullable(DateTime64(3)),
      deleted_at Nullable(DateTime64(3)),
      created_at DateTime64(3) DEFAULT now64(3),
      updated_at DateTime64(3) DEFAULT now64(3)
    ) ENGINE = ReplacingMergeTree(updated_at)
    ORDER BY (project_id, id)
  `,

  workspace_members: `
    CREATE TABLE IF NOT EXISTS {database}.workspace_members (
      workspace_id String,
      user_id String,
      role Enum8('owner' = 1, 'admin' = 2, 'member' = 3, 'viewer' = 4),
      joined_at DateTime64(3) DEFAULT now64(3),
      updated_at DateTime64(3) DEFAULT now64(3)
    ) ENGINE = ReplacingMergeTree(updated_at)
    ORDER BY (workspace_id, user_id)
  `,

  workspace_audit_logs: `
    CREATE TABLE IF NOT EXISTS {database}.workspace_audit_logs (
      id String,
      workspace_id String,
      user_id String,
      action LowCardinality(String),
      resource_type LowCardinality(String),
      resource_id String,
      changes String DEFAULT '{}',
      created_at DateTime64(3) DEFAULT now64(3)
    ) ENGINE = MergeTree()
    PARTITION BY toYYYYMM(created_at)
    ORDER BY (workspace_id, created_at, id)
  `,
};
