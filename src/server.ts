// ═══════════════════════════════════════════════════════════════════════════════
// SERVER — Composition Root and Process Lifecycle
// ═══════════════════════════════════════════════════════════════════════════════
//
// Loads configuration once, wires storage, collectors, the classifier and the
// orchestrator, then serves the API until SIGTERM/SIGINT.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Server } from 'node:http';
import { loadConfig, ConfigError, type AppConfig } from './config/index.js';
import { configureLogging, getLogger } from './logging/index.js';
import { createStore, type StoreHandle } from './storage/index.js';
import { createCollectors } from './collectors/index.js';
import { OpenAIClassifierClient } from './analyzers/classifier-client.js';
import { createOrchestrator } from './analyzers/orchestrator.js';
import { KeyValueCacheStore } from './cache/index.js';
import { createApp } from './app.js';
import { errorMessage } from './types/result.js';

const logger = getLogger({ component: 'server' });

const SHUTDOWN_TIMEOUT_MS = 10_000;
const SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

// ─────────────────────────────────────────────────────────────────────────────────
// WIRING
// ─────────────────────────────────────────────────────────────────────────────────

interface Runtime {
  readonly server: Server;
  readonly storage: StoreHandle;
}

function start(config: AppConfig): Runtime {
  configureLogging(config.logging);

  if (!config.classifier.apiKey) {
    logger.warn('DEEPSEEK_API_KEY not set; classification requests will fail');
  }

  const storage = createStore({ redisUrl: config.storage.redisUrl });
  const classifier = new OpenAIClassifierClient({ config: config.classifier });
  const collectors = createCollectors(config.collectors, classifier);
  const cache = new KeyValueCacheStore(storage.store, config.cache);

  const orchestrator = createOrchestrator({
    config,
    collectors,
    classifier,
    cache,
  });

  const app = createApp({
    orchestrator,
    store: storage.store,
    version: config.version,
    corsOrigins: config.server.corsOrigins,
    environment: config.environment,
  });

  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info('Server listening', {
      host: config.server.host,
      port: config.server.port,
      environment: config.environment,
      storage: storage.backend,
      version: config.version,
    });
  });

  return { server, storage };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SHUTDOWN
// ─────────────────────────────────────────────────────────────────────────────────

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

function installSignalHandlers(runtime: Runtime): void {
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      logger.warn('Received signal during shutdown, ignoring', { signal });
      return;
    }
    shuttingDown = true;
    logger.info('Starting graceful shutdown', { signal });

    const forced = setTimeout(() => {
      logger.error('Shutdown timed out', undefined, { timeoutMs: SHUTDOWN_TIMEOUT_MS });
      process.exit(124);
    }, SHUTDOWN_TIMEOUT_MS);
    forced.unref();

    try {
      await closeServer(runtime.server);
      await runtime.storage.store.close();
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', error);
      process.exit(1);
    }
  };

  for (const signal of SIGNALS) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }

  process.on('uncaughtException', (error) => {
    logger.fatal('Uncaught exception', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal('Unhandled rejection', reason);
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// MAIN
// ─────────────────────────────────────────────────────────────────────────────────

function main(): void {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    const issues = error instanceof ConfigError ? error.issues : [errorMessage(error)];
    logger.fatal('Invalid configuration', error, { issues });
    process.exit(1);
  }

  installSignalHandlers(start(config));
}

main();
