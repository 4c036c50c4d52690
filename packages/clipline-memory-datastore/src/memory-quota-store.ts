import type { IncrementQuotaInput, QuotaKey, QuotaRecord, QuotaStore } from '@clipline/core';

const keyOf = (key: QuotaKey): string => `${key.channelId}:${key.resource}:${key.day}`;

export class MemoryQuotaStore implements QuotaStore {
  #records: Map<string, QuotaRecord>;

  constructor() {
    this.#records = new Map();
  }

  async get(key: QuotaKey): Promise<QuotaRecord | undefined> {
    const record = this.#records.get(keyOf(key));

    return record ? { ...record } : undefined;
  }

  async increment(input: IncrementQuotaInput): Promise<QuotaRecord> {
    const key = keyOf(input);
    const existing = this.#records.get(key);
    const record: QuotaRecord = {
      channelId: input.channelId,
      resource: input.resource,
      day: input.day,
      unitsUsed: (existing?.unitsUsed ?? 0) + input.cost,
      dailyLimit: existing?.dailyLimit ?? input.dailyLimit,
      updatedAt: new Date(),
    };

    this.#records.set(key, record);

    return { ...record };
  }

  /** Seeds a record as if earlier work had already spent `unitsUsed`. */
  seed(record: Omit<QuotaRecord, 'updatedAt'>): void {
    this.#records.set(keyOf(record), { ...record, updatedAt: new Date() });
  }
}
