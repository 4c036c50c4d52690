import { z } from 'zod';

import { Resource, ResourceSchema } from '../task';

export type ResourcePolicy = {
  /** Units a channel may spend per calendar day. Unmetered when absent. */
  dailyLimit?: number;
  /** Units one step run spends */
  unitCost: number;
  /** Simultaneous runs a single worker may have in flight */
  maxConcurrentPerWorker?: number;
};

export type ResourceCatalog = Record<Resource, ResourcePolicy>;

/** YouTube Data API unit prices. */
export const YOUTUBE_OPERATION_COSTS = {
  upload: 1600,
  update: 50,
  list: 1,
  search: 100,
} as const;

export const DEFAULT_RESOURCE_POLICIES: ResourceCatalog = {
  [Resource.GEMINI]: { unitCost: 22, dailyLimit: 500, maxConcurrentPerWorker: 2 },
  [Resource.KLING]: { unitCost: 18, dailyLimit: 180, maxConcurrentPerWorker: 3 },
  [Resource.ELEVENLABS]: { unitCost: 18, dailyLimit: 1_000, maxConcurrentPerWorker: 5 },
  [Resource.YOUTUBE]: { unitCost: YOUTUBE_OPERATION_COSTS.upload, dailyLimit: 10_000 },
};

export const ResourcePolicyOverrideSchema = z
  .object({
    dailyLimit: z.number().int().positive(),
    unitCost: z.number().int().nonnegative(),
    maxConcurrentPerWorker: z.number().int().positive(),
  })
  .partial();

export const ResourceCatalogOverridesSchema = z.record(ResourceSchema, ResourcePolicyOverrideSchema);

export type ResourceCatalogOverrides = Partial<Record<Resource, Partial<ResourcePolicy>>>;

export function resolveResourceCatalog(overrides: ResourceCatalogOverrides = {}): ResourceCatalog {
  const catalog: ResourceCatalog = { ...DEFAULT_RESOURCE_POLICIES };

  for (const resource of Object.values(Resource)) {
    const override = overrides[resource];

    if (override) {
      catalog[resource] = { ...DEFAULT_RESOURCE_POLICIES[resource], ...override };
    }
  }

  return catalog;
}
