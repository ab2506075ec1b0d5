export * from './job-lock';
