export * from './in-memory-storage.adapter';
