#!/usr/bin/env node
// src/index.ts
import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

import { program } from './cli';

export * from './config';
export * from './core/job';
export * from './core/services';
export * from './extractors';
export * from './infrastructure/http';
export * from './infrastructure/lock';
export * from './infrastructure/logging';
export * from './infrastructure/sheets';
export * from './types/catalog';
export * from './utils/error';
export { program };

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
