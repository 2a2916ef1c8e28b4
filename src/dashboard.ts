// src/dashboard.ts
import { KubeconfigContextSource } from './clients/kubeconfigSource';
import type { ContextSource } from './clients/kubeconfigSource';
import { KubernetesClient } from './clients/kubernetesClient';
import type { FetchLike } from './clients/kubernetesClient';
import type { DashboardConfig } from './config';
import { ConfigError, describeError } from './errors';
import { configureLogging, createFileSink, log, LogLevel } from './logging';
import { ActionExecutor } from './services/actionExecutor';
import { ContextRegistry } from './services/contextRegistry';
import { Dispatcher } from './services/dispatcher';
import { ServiceManager } from './services/serviceManager';
import type { ManagedService } from './services/serviceManager';
import { ResourceStore } from './services/store/resourceStore';
import { WatcherPool } from './services/watcherPool';
import { RenderLoop } from './ui/renderLoop';
import type { FrameSink, InputSource } from './ui/renderLoop';
import { TerminalScreen } from './ui/terminal';
import type { ScreenSize } from './ui/viewState';
import { initialAppState } from './ui/viewState';

export interface Screen extends FrameSink, InputSource, ManagedService {
  size(): ScreenSize;
  open(): void;
  restore(): void;
}

export interface DashboardOverrides {
  source?: ContextSource;
  fetchImpl?: FetchLike;
  screen?: Screen;
}

export interface Dashboard {
  services: ServiceManager;
  client: KubernetesClient;
  store: ResourceStore;
  registry: ContextRegistry;
  pool: WatcherPool;
  dispatcher: Dispatcher;
  executor: ActionExecutor;
  screen: Screen;
  loop: RenderLoop;
  /** Resolves when the operator quits */
  done: Promise<void>;
}

/**
 * Wire the services together, open the screen and start on the configured
 * (or current) context. Connection trouble with that context is shown in
 * the UI; only missing contexts are fatal.
 */
export async function activate(config: DashboardConfig, overrides: DashboardOverrides = {}): Promise<Dashboard> {
  configureLogging(config.logLevel, config.logFile ? createFileSink(config.logFile) : undefined);
  log('kubeglance activating...', LogLevel.INFO, true);

  const source = overrides.source ?? KubeconfigContextSource.load(config.kubeconfig);
  const contextIds = source.listContexts().map(ctx => ctx.id);
  if (contextIds.length === 0) {
    throw new ConfigError('No contexts found in the Kubernetes configuration');
  }
  if (config.context && !contextIds.includes(config.context)) {
    throw new ConfigError(`Context '${config.context}' not found; available: ${contextIds.join(', ')}`);
  }

  const services = new ServiceManager();
  const client = services.registerService(
    'kubernetesClient',
    new KubernetesClient(contextId => source.getCredential(contextId), {
      maxAttempts: config.maxAttempts,
      fetchImpl: overrides.fetchImpl
    })
  );
  const store = services.registerService('resourceStore', new ResourceStore());
  const registry = services.registerService('contextRegistry', new ContextRegistry(source, client));
  const pool = services.registerService(
    'watcherPool',
    new WatcherPool(client, store, {
      pollIntervalMs: config.pollIntervalMs,
      namespace: config.namespace,
      onAuthFailure: (contextId, error) => {
        log(`Credentials rejected by ${contextId}: ${error.message}`, LogLevel.ERROR);
        registry.markUnreachable(contextId);
      }
    })
  );
  const dispatcher = services.registerService(
    'dispatcher',
    new Dispatcher(pool, store, registry, {
      graceMs: config.graceMs,
      prefetch: config.prefetch,
      releaseContext: contextId => client.forgetContext(contextId)
    })
  );
  const executor = new ActionExecutor(client);

  const screen = services.registerService('screen', overrides.screen ?? new TerminalScreen());
  const initial = initialAppState(screen.size());
  const loop = services.registerService(
    'renderLoop',
    new RenderLoop(
      { store, pool, dispatcher, executor, registry, sink: screen, input: screen },
      { ...initial, contexts: registry.listContexts() },
      { maxFrameIntervalMs: config.tickRateMs, minFrameIntervalMs: config.minFrameIntervalMs }
    )
  );
  const done = new Promise<void>(resolve => {
    loop.onDidQuit(() => resolve());
  });

  const startContext = config.context ?? registry.getDefaultContextId();
  if (!startContext) {
    await services.dispose();
    throw new ConfigError('No context to start with');
  }

  screen.open();
  loop.start();
  dispatcher
    .switchContext(startContext)
    .then(result => {
      if (result.status === 'success') {
        loop.showContext(startContext);
      } else if (result.status === 'connectionError') {
        loop.notify(`Cannot connect to ${startContext}: ${result.error.message} (press c to pick another context)`, 'error');
      }
    })
    .catch(err => {
      log(`Activating ${startContext} failed: ${err}`, LogLevel.ERROR);
      loop.notify(`Activating ${startContext} failed: ${describeError(err)}`, 'error');
    });

  log(`kubeglance started on context ${startContext}`, LogLevel.INFO, true);
  return { services, client, store, registry, pool, dispatcher, executor, screen, loop, done };
}

export async function deactivate(dashboard: Dashboard): Promise<void> {
  log('kubeglance deactivating', LogLevel.INFO, true);
  try {
    await dashboard.services.dispose();
  } finally {
    configureLogging(LogLevel.INFO, undefined);
  }
}
