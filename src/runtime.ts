/**
 * Runtime assembly: wires the local fabric, registry, signal pipeline,
 * execution store, intent gateway and HTTP server from a FabricConfig.
 */

import type { FabricConfig } from './core/config.js';
import { createLogger, setGlobalLogLevel, type Logger } from './core/logger.js';
import { globalMetrics, type MetricsCollector } from './core/metrics.js';
import { LocalFabric, type LocalFabricOptions } from './local/fabric.js';
import { CatalogAccessPolicy, IntentAuditLog } from './mcop/access-policy.js';
import { DataFabricCapabilityProvider, type McopScheduler } from './mcop/capability-provider.js';
import { CapabilityRegistry } from './mcop/capability-registry.js';
import type { ExecutionStore } from './mcop/execution.js';
import { IntentGateway } from './mcop/intent-gateway.js';
import { DataFabricIntentHandler } from './mcop/intent-handler.js';
import { RegistryCardLoader } from './mcop/registry-loader.js';
import { FeedbackSignalEmitter } from './observability/signal-emitter.js';
import { SignalHub } from './observability/signal-hub.js';
import { FeedbackSignalRegistry } from './observability/signal-registry.js';
import { MemoryExecutionStore } from './storage/memory.js';
import { SqliteExecutionStore } from './storage/sqlite.js';
import { FabricHttpServer } from './transport/http-server.js';
import { TenantRateLimiter } from './transport/rate-limiter.js';

export interface RuntimeOptions {
  fabric?: LocalFabric;
  fabricOptions?: LocalFabricOptions;
  scheduler?: McopScheduler | null;
  metrics?: MetricsCollector;
  logger?: Logger;
  /** Overrides the configured rate limiter clock, for tests */
  now?: () => number;
}

export interface FabricRuntime {
  config: FabricConfig;
  fabric: LocalFabric;
  registry: CapabilityRegistry;
  loader: RegistryCardLoader;
  provider: DataFabricCapabilityProvider;
  signals: FeedbackSignalRegistry;
  emitter: FeedbackSignalEmitter;
  hub: SignalHub;
  audit: IntentAuditLog;
  store: ExecutionStore;
  handler: DataFabricIntentHandler;
  gateway: IntentGateway;
  server: FabricHttpServer;
  start(): Promise<void>;
  /** Stop listening, let running executions finish, close the store. */
  stop(): Promise<void>;
}

export function createStore(config: FabricConfig, logger: Logger): ExecutionStore {
  return config.store.kind === 'sqlite'
    ? new SqliteExecutionStore(config.store.path, logger.child({ component: 'store' }))
    : new MemoryExecutionStore();
}

/** Build every component; registry cards and signal definitions are loaded before the gateway exists. */
export async function createRuntime(config: FabricConfig, options: RuntimeOptions = {}): Promise<FabricRuntime> {
  setGlobalLogLevel(config.logLevel);
  const log = options.logger ?? createLogger('runtime');
  const metrics = options.metrics ?? globalMetrics;

  const fabric = options.fabric ?? new LocalFabric({ ...options.fabricOptions, logger: log.child({ component: 'local-fabric' }) });

  const registry = new CapabilityRegistry();
  const loader = new RegistryCardLoader(registry, config.cardsDir, log.child({ component: 'registry-loader' }));
  const cards = await loader.discoverCards();
  await loader.loadAll(cards);
  const provider = DataFabricCapabilityProvider.fromCards(
    cards,
    options.scheduler ?? null,
    log.child({ component: 'capability-provider' }),
  );
  await provider.provideAllCapabilities();

  const signals = new FeedbackSignalRegistry(log.child({ component: 'signal-registry' }));
  await signals.loadFromDirectory(config.signalsDir);
  const hub = new SignalHub(200, log.child({ component: 'signal-hub' }));
  const emitter = new FeedbackSignalEmitter(signals, hub, { logger: log.child({ component: 'signal-emitter' }), metrics });

  const audit = new IntentAuditLog();
  const store = createStore(config, log);
  const handler = new DataFabricIntentHandler();
  const gateway = new IntentGateway({
    ports: fabric.ports,
    store,
    handler,
    policy: new CatalogAccessPolicy(fabric.namespaces, audit),
    emitter,
    hub,
    provider,
    unitTimeoutMs: config.unitTimeoutMs,
    logger: log.child({ component: 'intent-gateway' }),
    metrics,
  });

  const server = new FabricHttpServer(
    config.transport,
    { gateway, handler, registry, hub, drift: fabric.drift },
    { metrics, rateLimiter: new TenantRateLimiter(config.rateLimits, options.now), logger: log.child({ component: 'http' }) },
  );

  return {
    config,
    fabric,
    registry,
    loader,
    provider,
    signals,
    emitter,
    hub,
    audit,
    store,
    handler,
    gateway,
    server,
    async start() {
      log.info('Runtime starting', { cards: registry.size, signals: signals.getSignalCount().total });
      await server.start();
    },
    async stop() {
      await server.stop();
      await gateway.drain();
      await loader.unloadAll();
      store.close();
      log.info('Runtime stopped');
    },
  };
}
