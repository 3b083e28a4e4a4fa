import {
  ConfigurationError,
  closeDb,
  getDb,
  type Config,
  type Logger,
  type PolicyTable,
  type UploadExecutor,
} from '@vidfarm/shared';
import {
  DrizzleTaskStore,
  MemoryTaskStore,
  PublishScheduler,
  PublishWorker,
  TimeSelector,
  loadPolicyTable,
  type TaskStore,
} from '@vidfarm/publisher';

export interface Services {
  policies: PolicyTable;
  store: TaskStore;
  scheduler: PublishScheduler;
  createWorker(options?: { executor?: UploadExecutor; platform?: string }): PublishWorker;
  close(): Promise<void>;
}

/** Wire the scheduling engine from configuration. Policy problems surface here, before anything runs. */
export async function createServices(config: Config, logger: Logger): Promise<Services> {
  const policies = await loadPolicyTable(config.platformPoliciesPath);
  logger.info(
    { platforms: [...policies.keys()], source: config.platformPoliciesPath ?? 'built-in', enforceCadence: config.enforceCadence },
    'Platform policies loaded',
  );

  const store = createStore(config, logger);
  const selector = new TimeSelector(policies, logger.child({ component: 'time-selector' }), {
    enforceCadence: config.enforceCadence,
  });
  const scheduler = new PublishScheduler(selector, store, logger.child({ component: 'scheduler' }));

  return {
    policies,
    store,
    scheduler,
    createWorker: (options = {}) =>
      new PublishWorker(store, logger.child({ component: 'worker' }), {
        ...options,
        dryRun: config.dryRun,
        pollIntervalMs: config.workerPollIntervalMs,
      }),
    close: () => (config.taskStore === 'postgres' ? closeDb() : Promise.resolve()),
  };
}

function createStore(config: Config, logger: Logger): TaskStore {
  if (config.taskStore === 'memory') {
    logger.warn('Using in-memory task store; tasks are lost on exit');
    return new MemoryTaskStore();
  }

  if (!config.databaseUrl) {
    throw new ConfigurationError('DATABASE_URL is required for the postgres task store');
  }
  return new DrizzleTaskStore(getDb(config.databaseUrl), logger.child({ component: 'task-store' }));
}
