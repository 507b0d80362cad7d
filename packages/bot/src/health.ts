import http from 'http';
import type { EngineStats } from '@suit-tally/types';

export interface StatsSource {
  getStats(): Readonly<EngineStats>;
}

export interface HealthRequest {
  url?: string;
}

export interface HealthResponse {
  writeHead(statusCode: number, headers?: Record<string, string>): unknown;
  end(body?: string): unknown;
}

export interface HealthServerConfig {
  port: number;
  engine: StatsSource;
}

export function createHealthHandler(
  engine: StatsSource,
  clock: () => number = Date.now
): (req: HealthRequest, res: HealthResponse) => void {
  const startedAt = clock();

  return (req, res) => {
    if (req.url === '/healthz' || req.url === '/health') {
      const body = JSON.stringify({
        status: 'ok',
        uptime: Math.floor((clock() - startedAt) / 1000),
        stats: engine.getStats(),
      });
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(body);
    } else {
      res.writeHead(404);
      res.end();
    }
  };
}

export function createHealthServer(config: HealthServerConfig): http.Server {
  const handle = createHealthHandler(config.engine);
  const server = http.createServer((req, res) => handle(req, res));
  server.listen(config.port);
  return server;
}
