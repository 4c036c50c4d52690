import { PRIORITY_RANK } from '@clipline/core';

/**
 * SQL query constants for the Postgres stores.
 * All queries use prepared statement placeholders ($1, $2, etc.).
 */

const PRIORITY_RANK_SQL = `CASE t.priority ${Object.entries(PRIORITY_RANK)
  .map(([priority, rank]) => `WHEN '${priority}' THEN ${rank}`)
  .join(' ')} END`;

// Tenant rotation: the channel served least recently within a priority tier goes first.
const LAST_SERVED_CTE = `
  WITH last_served AS (
    SELECT channel_id, priority, MAX(claimed_at) AS served_at
    FROM clipline_tasks
    WHERE claimed_at IS NOT NULL
    GROUP BY channel_id, priority
  )
`;

const CLAIM_ORDER = `
  ORDER BY ${PRIORITY_RANK_SQL}, ls.served_at ASC NULLS FIRST, t.created_at ASC, t.id ASC
`;

export const INSERT_TASK_QUERY = `
  INSERT INTO clipline_tasks (channel_id, external_ref, status, priority, data, created_at, updated_at)
  VALUES ($1, $2, $3, $4, $5::jsonb, $6, $6)
  RETURNING *
`;

export const FIND_BY_ID_QUERY = `
  SELECT * FROM clipline_tasks WHERE id = $1
`;

export const FIND_BY_EXTERNAL_REF_QUERY = `
  SELECT * FROM clipline_tasks WHERE external_ref = $1
`;

export const LIST_BY_STATUS_FIFO_QUERY = `
  SELECT * FROM clipline_tasks
  WHERE status = ANY($1::text[])
  ORDER BY created_at ASC, id ASC
  LIMIT $2
`;

export const LIST_BY_STATUS_CLAIM_ORDER_QUERY = `
  ${LAST_SERVED_CTE}
  SELECT t.* FROM clipline_tasks t
  LEFT JOIN last_served ls ON ls.channel_id = t.channel_id AND ls.priority = t.priority
  WHERE t.status = ANY($1::text[])
  ${CLAIM_ORDER}
  LIMIT $2
`;

export const LIST_CLAIM_CANDIDATES_QUERY = `
  ${LAST_SERVED_CTE}
  SELECT t.* FROM clipline_tasks t
  LEFT JOIN last_served ls ON ls.channel_id = t.channel_id AND ls.priority = t.priority
  WHERE t.status = ANY($1::text[])
    OR (t.status = ANY($2::text[]) AND t.updated_at <= $3::timestamptz)
  ${CLAIM_ORDER}
  LIMIT $4
`;

// A row locked by a concurrent claim is skipped rather than waited on. claimed_at comes from the
// database clock so that claims from every worker order on one clock; it is kept to milliseconds
// to survive the round trip through Date.
export const CLAIM_QUERY = `
  UPDATE clipline_tasks
  SET status = $3,
    claimed_from = $4,
    claimed_by = $5,
    claimed_at = date_trunc('milliseconds', clock_timestamp()),
    updated_at = $6
  WHERE id = (
    SELECT id FROM clipline_tasks
    WHERE id = $1
      AND status = $2
      AND ($7::timestamptz IS NULL OR updated_at <= $7::timestamptz)
    FOR UPDATE SKIP LOCKED
  )
  RETURNING *
`;

export const RELEASE_QUERY = `
  UPDATE clipline_tasks
  SET status = $4, claimed_from = $5, claimed_by = $6, claimed_at = $7, updated_at = $8
  WHERE id = $1 AND status = $2 AND claimed_by = $3
  RETURNING *
`;

export const TRANSITION_QUERY = `
  UPDATE clipline_tasks
  SET status = $3,
    review_started_at = COALESCE($5::timestamptz, review_started_at),
    review_completed_at = CASE WHEN $6::boolean THEN $7::timestamptz ELSE review_completed_at END,
    step_progress = CASE WHEN $8::text IS NULL THEN step_progress ELSE step_progress - $8::text END,
    claimed_by = CASE WHEN $9::boolean THEN NULL ELSE claimed_by END,
    claimed_from = CASE WHEN $9::boolean THEN NULL ELSE claimed_from END,
    error_log = CASE WHEN $10::text IS NULL THEN error_log ELSE concat_ws(chr(10), error_log, $10::text) END,
    updated_at = $11
  WHERE id = $1 AND status = $2 AND ($4::text IS NULL OR claimed_by = $4::text)
  RETURNING *
`;

export const SAVE_STEP_PROGRESS_QUERY = `
  UPDATE clipline_tasks
  SET step_progress = step_progress || jsonb_build_object($3::text, $4::jsonb), updated_at = $5
  WHERE id = $1 AND claimed_by = $2
  RETURNING *
`;

export const RENEW_LEASE_QUERY = `
  UPDATE clipline_tasks
  SET updated_at = $4
  WHERE id = $1 AND status = $2 AND claimed_by = $3
  RETURNING *
`;

export const UPDATE_DETAILS_QUERY = `
  UPDATE clipline_tasks
  SET priority = COALESCE($2::text, priority),
    data = COALESCE($3::jsonb, data),
    error_log = CASE WHEN $4::text IS NULL THEN error_log ELSE concat_ws(chr(10), error_log, $4::text) END,
    updated_at = $5
  WHERE id = $1
  RETURNING *
`;

// Leases on a resource: tasks running one of its steps, or claimed from a status that starts one.
export const COUNT_IN_FLIGHT_QUERY = `
  SELECT COUNT(*)::int AS count
  FROM clipline_tasks
  WHERE channel_id = $1
    AND (status = ANY($2::text[]) OR (status = $3 AND claimed_from = ANY($4::text[])))
    AND ($5::uuid IS NULL OR id <> $5::uuid)
    AND (
      $6::timestamptz IS NULL
      OR claimed_at IS NULL
      OR claimed_at < $6::timestamptz
      OR (claimed_at = $6::timestamptz AND id < $7::uuid)
    )
`;

const QUOTA_COLUMNS = 'channel_id, resource, day::text AS day, units_used, daily_limit, updated_at';

export const FIND_QUOTA_QUERY = `
  SELECT ${QUOTA_COLUMNS}
  FROM clipline_quota_usage
  WHERE channel_id = $1 AND resource = $2 AND day = $3::date
`;

export const INCREMENT_QUOTA_QUERY = `
  INSERT INTO clipline_quota_usage (channel_id, resource, day, units_used, daily_limit, updated_at)
  VALUES ($1, $2, $3::date, $4, $5, $6)
  ON CONFLICT (channel_id, resource, day)
  DO UPDATE SET
    units_used = clipline_quota_usage.units_used + EXCLUDED.units_used,
    updated_at = EXCLUDED.updated_at
  RETURNING ${QUOTA_COLUMNS}
`;
