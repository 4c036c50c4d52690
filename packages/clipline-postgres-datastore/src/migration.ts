import type { SqlClient } from './sql-client';

const MIGRATION_UP_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS clipline_tasks (
  id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
  channel_id varchar(255) NOT NULL,
  external_ref varchar(255) NOT NULL,
  status varchar(32) NOT NULL DEFAULT 'draft',
  priority varchar(16) NOT NULL DEFAULT 'normal',
  data jsonb NOT NULL DEFAULT '{}'::jsonb,
  step_progress jsonb NOT NULL DEFAULT '{}'::jsonb,
  claimed_from varchar(32),
  claimed_by varchar(255),
  claimed_at timestamptz,
  review_started_at timestamptz,
  review_completed_at timestamptz,
  error_log text,
  created_at timestamptz NOT NULL DEFAULT now(),
  updated_at timestamptz NOT NULL DEFAULT now()
)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_clipline_tasks_external_ref
  ON clipline_tasks (external_ref)`,
  `CREATE INDEX IF NOT EXISTS idx_clipline_tasks_claim
  ON clipline_tasks (status, priority, created_at)`,
  `CREATE INDEX IF NOT EXISTS idx_clipline_tasks_last_served
  ON clipline_tasks (channel_id, priority, claimed_at)`,
  `CREATE TABLE IF NOT EXISTS clipline_quota_usage (
  channel_id varchar(255) NOT NULL,
  resource varchar(32) NOT NULL,
  day date NOT NULL,
  units_used integer NOT NULL DEFAULT 0 CHECK (units_used >= 0),
  daily_limit integer NOT NULL CHECK (daily_limit > 0),
  updated_at timestamptz NOT NULL DEFAULT now(),
  PRIMARY KEY (channel_id, resource, day)
)`,
];

const MIGRATION_DOWN_STATEMENTS = [
  'DROP TABLE IF EXISTS clipline_quota_usage',
  'DROP INDEX IF EXISTS idx_clipline_tasks_last_served',
  'DROP INDEX IF EXISTS idx_clipline_tasks_claim',
  'DROP INDEX IF EXISTS idx_clipline_tasks_external_ref',
  'DROP TABLE IF EXISTS clipline_tasks',
];

/**
 * SQL to create the clipline_tasks and clipline_quota_usage tables and their indexes.
 * Can be used directly in a migration or executed via migrateUp().
 */
export const MIGRATION_UP_SQL = `${MIGRATION_UP_STATEMENTS.join(';\n\n')};\n`;

/**
 * SQL to drop the Clipline tables and indexes.
 * Can be used directly in a migration or executed via migrateDown().
 */
export const MIGRATION_DOWN_SQL = `${MIGRATION_DOWN_STATEMENTS.join(';\n')};\n`;

/**
 * Creates the tables. Every statement is idempotent, so this is safe to run on each start-up.
 */
export async function migrateUp(client: SqlClient): Promise<void> {
  for (const statement of MIGRATION_UP_STATEMENTS) {
    await client.query(statement);
  }
}

export async function migrateDown(client: SqlClient): Promise<void> {
  for (const statement of MIGRATION_DOWN_STATEMENTS) {
    await client.query(statement);
  }
}
