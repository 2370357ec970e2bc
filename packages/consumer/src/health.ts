import http from 'http';
import type { SyncStats } from '@hitboard/core';

export interface HealthSource {
  getStats(): Readonly<SyncStats>;
}

export interface HealthServerConfig {
  port: number;
  bridge: HealthSource;
  /** Whether the counter store connection is usable */
  storeReady: () => boolean;
}

export interface HealthResponse {
  statusCode: number;
  body?: Record<string, unknown>;
}

/** Response for a request path; 404 for anything but /healthz and /health. */
export function healthResponse(
  url: string | undefined,
  config: Omit<HealthServerConfig, 'port'>,
  startedAt: number,
  now: number = Date.now()
): HealthResponse {
  if (url !== '/healthz' && url !== '/health') {
    return { statusCode: 404 };
  }

  const ready = config.storeReady();
  return {
    statusCode: ready ? 200 : 503,
    body: {
      status: ready ? 'ok' : 'degraded',
      uptime: Math.floor((now - startedAt) / 1000),
      store: ready ? 'up' : 'down',
      stats: config.bridge.getStats(),
    },
  };
}

export function createHealthServer(config: HealthServerConfig): http.Server {
  const startedAt = Date.now();

  const server = http.createServer((req, res) => {
    const { statusCode, body } = healthResponse(req.url, config, startedAt);
    if (body) {
      res.writeHead(statusCode, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(body));
    } else {
      res.writeHead(statusCode);
      res.end();
    }
  });

  server.listen(config.port);
  return server;
}
