import { mock } from 'vitest-mock-extended';

import type { QuotaStore } from '../../src/datastore';
import { QuotaLedger } from '../../src/quota/quota-ledger';
import { DEFAULT_RESOURCE_POLICIES, resolveResourceCatalog } from '../../src/quota/resources';
import { Resource } from '../../src/task';
import { calendarDay } from '../../src/utils/calendar-day';

describe('QuotaLedger', () => {
  const store = mock<QuotaStore>();
  const at = new Date('2025-03-10T03:30:00.000Z');

  afterEach(() => {
    vi.resetAllMocks();
  });

  describe('constructor', () => {
    test('should reject an unknown time zone', () => {
      expect(() => new QuotaLedger(store, { timeZone: 'Mars/Olympus_Mons' })).toThrow(RangeError);
    });
  });

  describe('day', () => {
    test('uses the configured time zone to pick the calendar day', () => {
      expect(new QuotaLedger(store).day(at)).toBe('2025-03-10');
      expect(new QuotaLedger(store, { timeZone: 'America/New_York' }).day(at)).toBe('2025-03-09');
    });
  });

  describe('check', () => {
    const ledger = new QuotaLedger(store);

    test('treats a channel without a record as having spent nothing', async () => {
      store.get.mockResolvedValueOnce(undefined);

      await expect(ledger.check('channel-a', Resource.YOUTUBE, 1_600, at)).resolves.toBe(true);
      expect(store.get).toHaveBeenCalledWith({ channelId: 'channel-a', resource: Resource.YOUTUBE, day: '2025-03-10' });
    });

    test('allows spend that lands exactly on the limit', async () => {
      store.get.mockResolvedValueOnce({
        channelId: 'channel-a',
        resource: Resource.YOUTUBE,
        day: '2025-03-10',
        unitsUsed: 8_400,
        dailyLimit: 10_000,
        updatedAt: at,
      });

      await expect(ledger.check('channel-a', Resource.YOUTUBE, 1_600, at)).resolves.toBe(true);
    });

    test('refuses spend that would exceed the limit', async () => {
      store.get.mockResolvedValueOnce({
        channelId: 'channel-a',
        resource: Resource.YOUTUBE,
        day: '2025-03-10',
        unitsUsed: 8_401,
        dailyLimit: 10_000,
        updatedAt: at,
      });

      await expect(ledger.check('channel-a', Resource.YOUTUBE, 1_600, at)).resolves.toBe(false);
    });

    test('always allows an unmetered resource', async () => {
      const unmetered = new QuotaLedger(store, {
        resources: { ...DEFAULT_RESOURCE_POLICIES, [Resource.KLING]: { unitCost: 18 } },
      });

      await expect(unmetered.check('channel-a', Resource.KLING, 1_000_000, at)).resolves.toBe(true);
      expect(store.get).not.toHaveBeenCalled();
    });

    test('rejects a negative or fractional cost', async () => {
      await expect(ledger.check('channel-a', Resource.GEMINI, -1, at)).rejects.toThrow(
        'Quota cost must be a non-negative integer, received -1',
      );
      await expect(ledger.check('channel-a', Resource.GEMINI, 1.5, at)).rejects.toThrow(RangeError);
    });
  });

  describe('record', () => {
    const ledger = new QuotaLedger(store);

    test('increments the record with the policy limit and returns the usage fraction', async () => {
      store.increment.mockResolvedValueOnce({
        channelId: 'channel-a',
        resource: Resource.GEMINI,
        day: '2025-03-10',
        unitsUsed: 440,
        dailyLimit: 500,
        updatedAt: at,
      });

      const usage = await ledger.record('channel-a', Resource.GEMINI, 22, at);

      expect(store.increment).toHaveBeenCalledWith({
        channelId: 'channel-a',
        resource: Resource.GEMINI,
        day: '2025-03-10',
        cost: 22,
        dailyLimit: 500,
      });
      expect(usage).toEqual({
        channelId: 'channel-a',
        resource: Resource.GEMINI,
        day: '2025-03-10',
        total: 440,
        dailyLimit: 500,
        fraction: 0.88,
      });
    });

    test('refuses to record spend on an unmetered resource', async () => {
      const unmetered = new QuotaLedger(store, {
        resources: { ...DEFAULT_RESOURCE_POLICIES, [Resource.KLING]: { unitCost: 18 } },
      });

      await expect(unmetered.record('channel-a', Resource.KLING, 18, at)).rejects.toThrow(
        'Resource kling has no daily limit and is not metered',
      );
      expect(store.increment).not.toHaveBeenCalled();
    });
  });
});

describe('calendarDay', () => {
  test('formats the day as YYYY-MM-DD', () => {
    expect(calendarDay(new Date('2025-12-31T23:59:59.000Z'), 'UTC')).toBe('2025-12-31');
    expect(calendarDay(new Date('2025-12-31T23:59:59.000Z'), 'Asia/Tokyo')).toBe('2026-01-01');
  });
});

describe('resolveResourceCatalog', () => {
  test('merges overrides over the default policies', () => {
    const catalog = resolveResourceCatalog({ [Resource.YOUTUBE]: { dailyLimit: 20_000 } });

    expect(catalog[Resource.YOUTUBE]).toEqual({ unitCost: 1_600, dailyLimit: 20_000 });
    expect(catalog[Resource.GEMINI]).toEqual(DEFAULT_RESOURCE_POLICIES[Resource.GEMINI]);
  });
});
