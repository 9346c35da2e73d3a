export * from './config.js';
export * from './operation.js';
export * from './snapshot.js';
