import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';
import { createDeviceRoutes } from './routes/devices';
import { createReportRoutes } from './routes/reports';
import { currentTime, type QueryContext } from './routes/context';

export interface QueryAppOptions extends QueryContext {
  /** Request logging through hono/logger; tests turn it off */
  requestLogging?: boolean;
  /** Include error messages in 500 responses */
  exposeErrors?: boolean;
}

export function createQueryApp(options: QueryAppOptions) {
  const app = new Hono();

  if (options.requestLogging !== false) {
    app.use('*', logger());
  }
  app.use('*', secureHeaders());

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: currentTime(options).toISOString(),
      devices: options.registry.devices.length
    });
  });

  app.route('/devices', createDeviceRoutes(options));
  app.route('/reports', createReportRoutes(options));

  app.notFound((c) => {
    return c.json({ error: 'Not Found', path: c.req.path }, 404);
  });

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message || 'Request failed' }, err.status);
    }

    console.error('[QueryApi] Request failed:', err);
    return c.json(
      {
        error: 'Internal Server Error',
        message: options.exposeErrors ? err.message : undefined
      },
      500
    );
  });

  return app;
}
