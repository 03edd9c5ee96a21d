import http from 'node:http';
import logger, { type Logger } from '../logger.js';
import { createApiRouter, sendJson, type ApiRouter, type ApiRouterOptions } from './routes/api.js';

export interface HttpServerOptions extends ApiRouterOptions {
  port?: number;
  host?: string;
}

export interface HttpServerRuntime {
  server: http.Server;
  router: ApiRouter;
  port: number;
  close: () => Promise<void>;
}

export function createRequestListener(router: ApiRouter, log: Logger = logger): http.RequestListener {
  return (req, res) => {
    try {
      if (router.handle(req, res)) {
        return;
      }

      sendJson(res, 404, { error: 'Not found' });
    } catch (error) {
      log.error({ err: error }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  };
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 8080;
  const host = options.host ?? '0.0.0.0';
  const log = options.log ?? logger;
  const router = createApiRouter(options);

  const server = http.createServer(createRequestListener(router, log));

  server.on('close', () => {
    router.close();
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  log.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    router,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        router.close();
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      })
  };
}

export default startHttpServer;
