export { MockStorageAdapter } from './mock-storage.adapter';
export type { MockStorageOptions } from './mock-storage.adapter';
