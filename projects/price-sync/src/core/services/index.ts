// src/core/services/index.ts
export * from './merge';
export * from './sheet-table';
