import express, { NextFunction, Request, Response } from 'express';
import type { Duplex } from 'stream';
import type { ProxyConfig } from './config';
import type { ItemTypeCacheStats } from './itemTypeCache';
import type { RequestRouter } from './router';
import type { TransparentForwarder } from './forwarder';
import { synthesizePlaybackInfo } from './synthesizer';
import { ProxyError, errorMessage } from './errors';
import { logger as defaultLogger, type Logger } from './logger';

// Served by the proxy itself; every other path belongs to the upstream.
export const HEALTH_PATH = '/__fastplay/health';

const BAD_REQUEST = 'HTTP/1.1 400 Bad Request\r\nConnection: close\r\nContent-Length: 0\r\n\r\n';

// `clientError` listener. Requests Node's HTTP parser rejects never reach
// Express, so they are answered on the raw socket and never forwarded.
export function rejectMalformedRequest(err: NodeJS.ErrnoException, socket: Duplex): void {
  if (err.code === 'ECONNRESET' || !socket.writable) {
    socket.destroy();
    return;
  }
  defaultLogger.warn(`⚠️  Malformed request rejected: ${err.code ?? err.message}`);
  socket.end(BAD_REQUEST);
}

export interface AppDependencies {
  config: ProxyConfig;
  router: RequestRouter;
  forwarder: TransparentForwarder;
  cacheStats?: () => ItemTypeCacheStats;
  logger?: Logger;
}

export function createApp(deps: AppDependencies): express.Express {
  const { config, router, forwarder } = deps;
  const log = deps.logger ?? defaultLogger;
  const app = express();

  // Nothing may be added to relayed responses, and bodies stay unparsed so they
  // can be streamed upstream.
  app.disable('x-powered-by');
  app.disable('etag');

  app.get(HEALTH_PATH, (_req: Request, res: Response) => {
    res.json({
      status:      'ok',
      environment: config.environment,
      upstream:    config.upstream.baseUrl,
      cache:       deps.cacheStats?.(),
      timestamp:   new Date().toISOString(),
    });
  });

  // Mounted without a path pattern so Express never decodes the URL itself.
  app.use(async (req: Request, res: Response, next: NextFunction) => {
    try {
      const decision = await router.decide(req.method, req.originalUrl);

      if (decision.kind === 'bypass') {
        res.status(200).json(synthesizePlaybackInfo(decision.itemId, decision.mediaSourceId));
        return;
      }

      await forwarder.forward(req, res);
    } catch (err) {
      next(err);
    }
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof ProxyError ? err.statusCode : 500;
    if (status >= 500) log.error(`Server error on ${req.method} ${req.originalUrl}:`, err);
    else log.warn(`⚠️  Rejected ${req.method} ${req.originalUrl}: ${errorMessage(err)}`);

    if (res.headersSent) {
      res.destroy();
      return;
    }
    res.status(status).json({
      error:   status === 400 ? 'Bad Request' : 'Internal Server Error',
      message: errorMessage(err),
    });
  });

  return app;
}
