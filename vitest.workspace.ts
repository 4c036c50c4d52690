import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  './packages/clipline-core/vitest.config.ts',
  './packages/clipline-memory-datastore/vitest.config.ts',
  './packages/clipline-postgres-datastore/vitest.config.ts',
  './packages/clipline-worker/vitest.config.ts',
]);
