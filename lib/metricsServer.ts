import { createServer, Server } from 'http';
import logger from './logger';
import { register } from './metrics';

/**
 * Serve `register.metrics()` on GET /metrics for Prometheus scraping.
 */
export function startMetricsServer(port: number, host = '0.0.0.0'): Server {
  const server = createServer((req, res) => {
    if (req.method !== 'GET' || req.url !== '/metrics') {
      res.writeHead(404).end();
      return;
    }
    register
      .metrics()
      .then((body) => {
        res.writeHead(200, { 'Content-Type': register.contentType }).end(body);
      })
      .catch((err: unknown) => {
        logger.error({ err }, 'failed to render metrics');
        res.writeHead(500).end();
      });
  });

  server.on('error', (err) => logger.error({ err, port }, 'metrics server error'));
  server.listen(port, host, () => logger.info({ port, host }, 'metrics endpoint listening'));
  return server;
}

export default startMetricsServer;
