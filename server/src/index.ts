/**
 * Server entry point for the gift catalog backend.
 *
 * The catalog lets a gift-shopping client browse products by category, sort
 * them, and manage each product's purchasable options. The server is made of
 * three layers:
 *   - infra: the HTTP transport and its error mapping
 *   - app: orchestration of catalog operations, collaborators, configuration
 *   - domain: pure product rules (sorting, entity updates, error kinds)
 *
 * This file wires them together:
 *   1. load configuration and the seed categories
 *   2. build the store, the collaborators and the orchestrator
 *   3. start the HTTP server and log unexpected process errors
 */
import { loadCategories } from './app/config.js';
import { CategoryResolver } from './app/categories.js';
import { OptionManager } from './app/options.js';
import { ProductOrchestrator } from './app/orchestrator/index.js';
import { InMemoryProductStore } from './app/store.js';
import { createHttpApp } from './infra/http.js';
import { logger } from './logger.js';

// Default development port. Allow overrides via PORT for production deployments.
const PORT = Number(process.env.PORT ?? 3000);

const store = new InMemoryProductStore();
const orch = new ProductOrchestrator({
  store,
  categories: new CategoryResolver(loadCategories()),
  options: new OptionManager(store),
});

const { httpServer } = createHttpApp(orch);

// Fail loudly on server errors instead of serving from a half-started process.
httpServer.on('error', (err: NodeJS.ErrnoException) => {
  const code = err.code ?? 'UNKNOWN';
  logger.error({ event: 'server.error', code, message: err.message, port: PORT });
  if (code === 'EADDRINUSE') {
    logger.error({ event: 'server.port_in_use', port: PORT }, 'Port already in use');
  }
  process.exit(1);
});

httpServer.listen(PORT, () => {
  logger.info({ event: 'server.started', port: PORT }, 'HTTP server started');
});

// Guard against silent crashes caused by unhandled promises or sync exceptions.
process.on('unhandledRejection', (reason) => {
  logger.error({ event: 'unhandledRejection', reason: String(reason) });
});
process.on('uncaughtException', (err) => {
  logger.error({ event: 'uncaughtException', error: err.message });
});
