import type { IncrementQuotaInput, QuotaKey, QuotaRecord, QuotaStore } from '@clipline/core';

import { FIND_QUOTA_QUERY, INCREMENT_QUOTA_QUERY } from './queries';
import type { SqlClient } from './sql-client';
import { toQuotaRecord } from './types';

/**
 * Quota records on the clipline_quota_usage table. The increment is a single upsert, so
 * concurrent spends on the same day add up under the row lock.
 */
export class PostgresQuotaStore implements QuotaStore {
  constructor(private readonly client: SqlClient) {}

  async get(key: QuotaKey): Promise<QuotaRecord | undefined> {
    const { rows } = await this.client.query(FIND_QUOTA_QUERY, [key.channelId, key.resource, key.day]);
    const [row] = rows;

    return row ? toQuotaRecord(row) : undefined;
  }

  async increment(input: IncrementQuotaInput): Promise<QuotaRecord> {
    const { rows } = await this.client.query(INCREMENT_QUOTA_QUERY, [
      input.channelId,
      input.resource,
      input.day,
      input.cost,
      input.dailyLimit,
      new Date(),
    ]);
    const [row] = rows;

    if (!row) {
      throw new Error(`Quota increment for ${input.channelId}/${input.resource} on ${input.day} returned no row`);
    }

    return toQuotaRecord(row);
  }
}
