import { createServer } from 'http';
import type { GateMetricsSnapshot, InstanceLease } from '../types/index.js';
import type { UpdatePollerStats } from './update-poller.js';

export interface StatusServerDeps {
  port: number;
  ownerId: string;
  metricsSnapshot: () => GateMetricsSnapshot;
  resetAll: () => void;
  pollerStats: () => UpdatePollerStats;
  currentLease: () => Promise<InstanceLease | undefined>;
}

/**
 * Loopback-only HTTP surface for health checks and operational controls.
 *
 *   GET  /health   lease ownership and poller state
 *   GET  /metrics  admission metrics snapshot
 *   POST /reset    clears admission, breaker and navigation state
 */
export class StatusServer {
  private httpServer?: ReturnType<typeof createServer>;

  constructor(private deps: StatusServerDeps) {}

  async start(): Promise<number> {
    const server = createServer((req, res) => {
      const pathname = new URL(req.url || '/', 'http://127.0.0.1').pathname;

      void (async () => {
        try {
          if (req.method === 'GET' && pathname === '/health') {
            const lease = await this.deps.currentLease();
            const poller = this.deps.pollerStats();
            const leader = !!lease && lease.ownerId === this.deps.ownerId && Date.now() <= lease.expiresAt;
            res.writeHead(leader && poller.running ? 200 : 503, { 'Content-Type': 'application/json' });
            res.end(
              JSON.stringify({
                ownerId: this.deps.ownerId,
                leader,
                lease: lease ?? null,
                poller,
              }),
            );
            return;
          }

          if (req.method === 'GET' && pathname === '/metrics') {
            res.writeHead(200, { 'Content-Type': 'application/json' });
            res.end(JSON.stringify(this.deps.metricsSnapshot()));
            return;
          }

          if (pathname === '/reset') {
            if (req.method !== 'POST') {
              res.writeHead(405);
              res.end('Method not allowed');
              return;
            }
            this.deps.resetAll();
            res.writeHead(200);
            res.end('OK');
            return;
          }

          res.writeHead(404);
          res.end('Not found');
        } catch (error) {
          console.error('[status] request processing error:', error);
          res.writeHead(500);
          res.end('Internal error');
        }
      })();
    });

    server.on('error', (err) => {
      console.error('[status] HTTP server error:', err);
    });

    this.httpServer = server;
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.deps.port, '127.0.0.1', () => {
        server.off('error', reject);
        resolve();
      });
    });
    const address = server.address();
    const port = address && typeof address === 'object' ? address.port : this.deps.port;
    console.log(`[status] listening on http://127.0.0.1:${port}`);
    return port;
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    this.httpServer = undefined;
    if (!server) return;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}
