export * from './counter.js';
export * from './pull-task.js';
export * from './orchestrator.js';
export * from './push.js';
