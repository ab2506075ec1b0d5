export * from './price-sync-job';
