import http from 'node:http';

import { registry } from './metrics';
import type { PlaytestReport } from './runner';

export interface MetricsServerHandle {
  close(): Promise<void>;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

/** Serves the run's prom-client registry and its report until closed. */
export async function startMetricsServer(port: number, report: PlaytestReport): Promise<MetricsServerHandle> {
  const server = http.createServer(async (req, res) => {
    switch (req.url) {
      case '/metrics':
        try {
          const metrics = await registry.metrics();
          res.writeHead(200, { 'content-type': registry.contentType });
          res.end(metrics);
        } catch (error) {
          sendJson(res, 500, { error: 'collect_failed', message: String(error) });
        }
        return;
      case '/report':
        sendJson(res, 200, report);
        return;
      case '/health':
        sendJson(res, 200, { status: 'ok', uptime_s: Math.round(process.uptime()) });
        return;
      default:
        sendJson(res, 404, { error: 'not_found' });
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, '0.0.0.0', () => {
      server.off('error', reject);
      resolve();
    });
  });

  return {
    close: async () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      }),
  };
}
