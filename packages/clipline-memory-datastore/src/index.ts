export { MemoryQuotaStore } from './memory-quota-store';
export { MemoryTaskStore, type MemoryTaskStoreConfig } from './memory-task-store';
