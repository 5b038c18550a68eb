export * from './json';
export * from './schema';
export * from './time';
