import type postgres from 'postgres';

/**
 * Creates the mirror tables if they are missing.
 *
 * drizzle-kit generates real migrations from `schema.ts`; this keeps a
 * fresh local database usable on first boot.
 */
export async function ensureSchema(sql: postgres.Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS projects (
      id                      UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      external_id             VARCHAR(255) NOT NULL UNIQUE,
      key                     VARCHAR(255),
      name                    VARCHAR(1024),
      is_placeholder          BOOLEAN      NOT NULL DEFAULT false,
      external_last_modified  TIMESTAMPTZ,
      local_modified_at       TIMESTAMPTZ,
      last_synced_at          TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      deleted_at              TIMESTAMPTZ
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS issues (
      id                      UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      external_id             VARCHAR(255) NOT NULL UNIQUE,
      project_id              UUID         NOT NULL REFERENCES projects (id) ON DELETE CASCADE,
      key                     VARCHAR(255),
      summary                 VARCHAR(4096),
      status                  VARCHAR(255),
      external_last_modified  TIMESTAMPTZ,
      local_modified_at       TIMESTAMPTZ,
      last_synced_at          TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      deleted_at              TIMESTAMPTZ
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_projects_deleted_at ON projects (deleted_at)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_issues_project_id ON issues (project_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_issues_deleted_at ON issues (deleted_at)`);
}
