import { loadConfig, type AppConfig } from './config.js';
import { setLogLevel } from './logger.js';
import { RateLimiter } from './rate-limiter.js';
import { DartClient, type FilingSource } from './dart-client.js';
import { FinancialStore } from './store.js';
import { CompanyResolver } from './resolver.js';
import { AcquisitionOrchestrator } from './acquisition.js';
import { BatchScheduler } from './scheduler.js';

/**
 * Wires the process-wide objects from configuration. Each entry point
 * (CLI, web server, MCP server) builds one container and closes it on exit.
 */

export interface Container {
  config: AppConfig;
  store: FinancialStore;
  source: FilingSource;
  resolver: CompanyResolver;
  acquisition: AcquisitionOrchestrator;
  scheduler: BatchScheduler;
  close(): void;
}

export interface ContainerOverrides {
  store?: FinancialStore;
  source?: FilingSource;
  now?: () => Date;
}

export function createContainer(config: AppConfig = loadConfig(), overrides: ContainerOverrides = {}): Container {
  setLogLevel(config.logLevel);

  const now = overrides.now ?? (() => new Date());
  const store = overrides.store ?? new FinancialStore({ path: config.dbPath, now });
  const source = overrides.source ?? new DartClient({
    apiKey: config.dart.apiKey,
    baseUrl: config.dart.baseUrl,
    rateLimiter: new RateLimiter({ requestsPerSecond: config.dart.requestsPerSecond }),
    timeoutMs: config.dart.timeoutMs,
    directory: store,
    directoryTtlHours: config.dart.corpDirectoryTtlHours,
    now,
  });
  const resolver = new CompanyResolver(store, source);
  const acquisition = new AcquisitionOrchestrator({ source, store, resolver, now });
  const scheduler = new BatchScheduler({
    runBatch: () => acquisition.crawlAll(config.batch.companies),
    hour: config.batch.hour,
    minute: config.batch.minute,
    now,
  });

  return {
    config,
    store,
    source,
    resolver,
    acquisition,
    scheduler,
    close() {
      scheduler.stop();
      store.close();
    },
  };
}
