export { StatsService, type StatsOptions, type BucketStats, type StorageStats } from './service.js';
