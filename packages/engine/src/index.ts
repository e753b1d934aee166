export * from './config.js';
export * from './db/index.js';
export * from './db/config-repository.js';
export * from './host/types.js';
export * from './host/collection-store.js';
export * from './host/host-adapter.js';
export * from './services/config.service.js';
export * from './services/rule-engine.service.js';
export * from './services/leech-action.service.js';
export * from './services/notification.service.js';
export * from './services/deferred-task-queue.js';
export * from './services/auto-process.service.js';
export * from './services/run-session.service.js';
export * from './services/rule-choices.service.js';
export * from './session.js';
