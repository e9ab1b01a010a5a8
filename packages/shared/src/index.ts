export * from './postgres';
export * from './envConfig';
export * from './retries/backoff';
