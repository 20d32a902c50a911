import { Hono } from 'hono';
import { accessLog } from './access-log.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { ProviderRegistry } from './providers/index.js';
import { failure, reconcile } from './reconcile.js';

/**
 * Builds the HTTP app. Well-formed DDNS requests always get a 200 and
 * carry their outcome in the JSON body.
 */
export function createApp(registry: ProviderRegistry): Hono {
  const app = new Hono();

  app.use('*', accessLog());

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.get('/ddns/:provider/:host/:ip', async (c) => {
    const { provider, host, ip } = c.req.param();

    const resolved = registry.resolve(provider);
    if (!resolved) {
      logger.warn(`Provider not found: ${provider}`, { hostname: host, ip });
      return c.json(failure(`Provider not found: ${provider}`));
    }

    const result = await reconcile(
      resolved.client,
      resolved.zoneId,
      host,
      ip,
      logger.child({ provider: resolved.name })
    );
    return c.json(result);
  });

  app.notFound((c) => c.json(failure('Not found'), 404));

  app.onError((error, c) => {
    logger.error('Unhandled request error', {
      path: c.req.path,
      error: errorMessage(error),
      stack: error.stack
    });
    return c.json(failure('Internal server error'), 500);
  });

  return app;
}
