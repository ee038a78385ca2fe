/**
 * Operator status endpoint for the gateway
 */
import { createServer, type IncomingMessage, type ServerResponse } from 'http';
import { errorMessage } from '@parley/types';
import { createLogger, type Logger } from '@parley/utils';

export const VERSION = '0.1.0';

export interface HealthReport {
  status: 'healthy';
  component: string;
  version: string;
  uptime: number;
}

export interface StatusServerOptions {
  port?: number;
  componentName?: string;
  /** Produces the body of GET /status */
  getStatus: () => unknown;
  logger?: Logger;
}

export interface StatusResponse {
  statusCode: number;
  body: unknown;
}

let startTime: number = Date.now();

/**
 * Uptime in seconds
 */
export function getUptime(): number {
  return Math.floor((Date.now() - startTime) / 1000);
}

/**
 * Reset the start time (for testing)
 */
export function resetStartTime(): void {
  startTime = Date.now();
}

export function getHealth(componentName = 'gateway'): HealthReport {
  return { status: 'healthy', component: componentName, version: VERSION, uptime: getUptime() };
}

/**
 * Resolve a request to a status code and JSON body
 */
export function handleStatusRequest(
  method: string | undefined,
  url: string | undefined,
  options: Pick<StatusServerOptions, 'getStatus' | 'componentName'>
): StatusResponse {
  if (method !== 'GET') {
    return { statusCode: 405, body: { error: 'Method Not Allowed' } };
  }

  const path = (url ?? '/').split('?')[0];
  switch (path) {
    case '/health':
      return { statusCode: 200, body: getHealth(options.componentName) };
    case '/status':
      try {
        return { statusCode: 200, body: options.getStatus() };
      } catch (error) {
        return { statusCode: 500, body: { error: errorMessage(error) } };
      }
    default:
      return { statusCode: 404, body: { error: 'Not Found' } };
  }
}

/**
 * Create an HTTP server exposing GET /health and GET /status
 */
export function createStatusServer(options: StatusServerOptions): {
  server: ReturnType<typeof createServer>;
  start: () => Promise<number>;
  stop: () => Promise<void>;
} {
  const port = options.port ?? 8081;
  const logger = options.logger ?? createLogger('status');

  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    const { statusCode, body } = handleStatusRequest(req.method, req.url, options);
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body, null, 2));
  });

  return {
    server,
    start: () =>
      new Promise<number>((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
          server.off('error', reject);
          const address = server.address();
          const bound = typeof address === 'object' && address ? address.port : port;
          logger.info(`Status server listening on port ${bound}`);
          resolve(bound);
        });
      }),
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
          } else {
            resolve();
          }
        });
      }),
  };
}
