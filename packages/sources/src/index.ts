export * from './types.js';
export * from './formatter.js';
export * from './service-bus.js';
export * from './event-hub.js';
