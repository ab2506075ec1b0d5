export * from './spreadsheet-gateway';
export * from './sheet-writer';
