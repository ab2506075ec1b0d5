export * from './vendor-api-client';
export * from './throttle';
export * from './http-errors';
