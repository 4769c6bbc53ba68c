export * from './document-handlers.js';
