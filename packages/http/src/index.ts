export * from './request-logger.js';
export * from './error-handler.js';
export * from './server.js';
