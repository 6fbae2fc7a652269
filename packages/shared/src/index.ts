export * from './constants.js';
export * from './errors.js';
export * from './config.js';
export * from './utils/env.js';
export * from './utils/logger.js';
export * from './utils/retry.js';
export * from './utils/slack.js';
