export * from './client';
export * from './json';
export * from './schema';
