export * from './schema.js';
export * from './settings.js';
export * from './options.js';
