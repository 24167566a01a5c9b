export * from './domain/dictionary.js';
export * from './domain/businessConfig.js';
