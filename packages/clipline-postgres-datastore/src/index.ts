export { MIGRATION_DOWN_SQL, MIGRATION_UP_SQL, migrateDown, migrateUp } from './migration';
export { PostgresQuotaStore } from './postgres-quota-store';
export { PostgresTaskStore, type PostgresTaskStoreConfig } from './postgres-task-store';
export { isUniqueViolation, PgSqlClient, type SqlClient, type SqlRow } from './sql-client';
export { type QuotaRow, QuotaRowSchema, type TaskRow, TaskRowSchema } from './types';
