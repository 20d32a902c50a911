import { serve } from '@hono/node-server';
import {
  describeProviders,
  loadConfig,
  loadEnvironment,
  resolveConfigPath,
  resolveLogLevel
} from './config.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import { ProviderRegistry } from './providers/index.js';
import { createApp } from './server.js';

type Server = ReturnType<typeof serve>;

let server: Server | null = null;

async function main(): Promise<void> {
  loadEnvironment();

  const configPath = resolveConfigPath(process.argv.slice(2));
  logger.info(`Loading configuration from: ${configPath}`);
  const config = loadConfig(configPath);

  logger.level = resolveLogLevel(config.server.logLevel, process.env.LOG_LEVEL);

  logger.info(`Loaded ${config.providers.length} provider(s)`, {
    providers: describeProviders(config.providers)
  });

  const registry = ProviderRegistry.fromConfig(config.providers, {
    timeoutMs: config.server.providerTimeoutMs
  });
  const app = createApp(registry);

  server = serve(
    {
      fetch: app.fetch,
      hostname: config.server.host,
      port: config.server.port
    },
    (info) => {
      logger.info(`Server listening on http://${info.address}:${info.port}`);
      logger.info(`Serving providers: ${registry.names().join(', ')}`);
      logger.info('DDNS endpoint: GET /ddns/{provider}/{host}/{ip}');
    }
  );
}

// Cleanup function to handle graceful shutdown
function cleanup(exitCode = 0): void {
  logger.info('Shutting down gracefully...');
  if (!server) {
    process.exit(exitCode);
  }
  server.close(() => process.exit(exitCode));
}

process.once('SIGTERM', () => cleanup());
process.once('SIGINT', () => cleanup());

process.once('uncaughtException', (error) => {
  logger.error('Uncaught exception:', { error: error.message, stack: error.stack });
  cleanup(1);
});

process.once('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection:', { error: errorMessage(reason) });
  cleanup(1);
});

main().catch((error) => {
  logger.error('Fatal error:', { error: errorMessage(error) });
  process.exit(1);
});
