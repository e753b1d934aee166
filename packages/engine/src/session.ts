/**
 * Leech Actions Session
 *
 * Process-scoped services for one host session. The host starts the session
 * once its collection is open and shuts it down when the collection closes.
 */

import { config as processConfig } from './config.js';
import { closeDatabase, initializeDatabase } from './db/index.js';
import { ConfigRepository } from './db/config-repository.js';
import { createCollectionStore } from './host/host-adapter.js';
import type { CollectionStore } from './host/collection-store.js';
import type { HostCollection, HostHooks } from './host/types.js';
import { AutoProcessService } from './services/auto-process.service.js';
import { LeechConfigService, type ConfigStorage } from './services/config.service.js';
import { DeferredTaskQueue } from './services/deferred-task-queue.js';
import { LeechActionService } from './services/leech-action.service.js';
import { ConsoleNotifier, type Notifier } from './services/notification.service.js';
import { RuleChoicesService } from './services/rule-choices.service.js';
import { LeechRunSession } from './services/run-session.service.js';

export interface StartOptions {
  host: HostCollection;
  /** Defaults to a ConfigRepository on the configured database */
  storage?: ConfigStorage;
  notifier?: Notifier;
  hooks?: HostHooks;
  configKey?: string;
  dbPath?: string;
}

export interface LeechActions {
  collection: CollectionStore;
  config: LeechConfigService;
  actions: LeechActionService;
  autoProcess: AutoProcessService;
  choices: RuleChoicesService;
  queue: DeferredTaskQueue;
  notifier: Notifier;
  hooks: HostHooks;
  /** Whether shutdown must close the database */
  ownsDatabase: boolean;
}

/**
 * Thrown when the services are requested before the session started
 */
export class SessionNotStartedError extends Error {
  constructor() {
    super('Leech actions session has not been started');
    this.name = 'SessionNotStartedError';
  }
}

let session: LeechActions | null = null;

/**
 * Create the session services
 * A session that is already running is returned as is.
 */
export function startLeechActions(options: StartOptions): LeechActions {
  if (session) {
    return session;
  }

  const collection = createCollectionStore(options.host);

  let storage = options.storage;
  const ownsDatabase = !storage;
  if (!storage) {
    storage = new ConfigRepository(initializeDatabase(options.dbPath));
  }

  const configService = new LeechConfigService(storage, options.configKey || processConfig.configKey);
  const actions = new LeechActionService(collection, configService);
  const queue = new DeferredTaskQueue();
  const notifier = options.notifier ?? new ConsoleNotifier();
  const hooks = options.hooks ?? {};

  session = {
    collection,
    config: configService,
    actions,
    autoProcess: new AutoProcessService(actions, configService, queue, notifier, hooks),
    choices: new RuleChoicesService(collection),
    queue,
    notifier,
    hooks,
    ownsDatabase,
  };

  console.log(`[Session] Leech actions started with ${configService.rules.length} rule(s)`);
  return session;
}

/**
 * Get the running session services
 */
export function getLeechActions(): LeechActions {
  if (!session) {
    throw new SessionNotStartedError();
  }
  return session;
}

/**
 * Open a preview/confirm run over the current leech cards
 */
export function createRunSession(): LeechRunSession {
  const { actions, notifier, hooks } = getLeechActions();
  return new LeechRunSession(actions, notifier, hooks);
}

/**
 * Drop pending work and release the database
 */
export function shutdownLeechActions(): void {
  if (!session) {
    return;
  }
  session.queue.clear();
  if (session.ownsDatabase) {
    closeDatabase();
  }
  session = null;
  console.log('[Session] Leech actions stopped');
}
