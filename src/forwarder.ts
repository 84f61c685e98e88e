import type { Request, Response } from 'express';
import fetch, { Headers, Response as FetchResponse } from 'node-fetch';
import { Readable } from 'stream';
import type { UpstreamTarget } from './config';
import type { UpstreamAgents } from './agents';
import {
  ForwardingError,
  MalformedRequestError,
  ProxyError,
  UpstreamTimeoutError,
  errorMessage,
  isAbortError,
} from './errors';
import { logger as defaultLogger, type Logger } from './logger';

// ---------------------------------------------------------------------------
// Transparent forwarding
// ---------------------------------------------------------------------------
// Relays a request to the upstream and its response back without touching
// method, target, end-to-end headers or body bytes. Only hop-by-hop headers are
// dropped; Node's HTTP stack re-frames the message on each leg.

// RFC 9110 §7.6.1 connection-specific fields, plus `host` (set from the
// upstream URL) and `expect` (the proxy's own server already answered it).
const HOP_BY_HOP_HEADERS = new Set<string>([
  'connection',
  'keep-alive',
  'proxy-connection',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

const REQUEST_ONLY_SKIPPED = new Set<string>(['host', 'expect']);

export interface ForwarderOptions {
  /** Time allowed until upstream response headers arrive. */
  ttfbTimeoutMs: number;
  /** Idle time allowed between body chunks once streaming has begun. */
  stallTimeoutMs: number;
  agents?: UpstreamAgents;
  logger?: Logger;
}

// Field names the sender listed in its own Connection header are hop-by-hop too.
function connectionTokens(value: string | undefined): Set<string> {
  if (!value) return new Set();
  return new Set(value.split(',').map(t => t.trim().toLowerCase()).filter(Boolean));
}

export function buildUpstreamHeaders(rawHeaders: readonly string[]): Headers {
  let connectionValue: string | undefined;
  for (let i = 0; i < rawHeaders.length; i += 2) {
    if (rawHeaders[i].toLowerCase() === 'connection') connectionValue = rawHeaders[i + 1];
  }
  const listed = connectionTokens(connectionValue);

  const headers = new Headers();
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    const name = rawHeaders[i];
    const lower = name.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(lower) || REQUEST_ONLY_SKIPPED.has(lower) || listed.has(lower)) continue;
    headers.append(name, rawHeaders[i + 1]);
  }
  return headers;
}

export function relayableResponseHeaders(
  upstreamHeaders: Record<string, string[]>,
  rewriteLocation: (location: string) => string = location => location,
): Record<string, string | string[]> {
  const listed = connectionTokens(upstreamHeaders['connection']?.join(','));
  const out: Record<string, string | string[]> = {};

  for (const [name, values] of Object.entries(upstreamHeaders)) {
    const lower = name.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(lower) || listed.has(lower)) continue;
    if (lower === 'location') {
      out[name] = values.map(rewriteLocation);
      continue;
    }
    out[name] = values.length === 1 ? values[0] : values;
  }
  return out;
}

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

// A body is present when the client framed one (RFC 9112 §6.3). GET and HEAD
// bodies have no defined meaning and are not relayed.
function requestHasBody(req: Request): boolean {
  if (BODYLESS_METHODS.has(req.method)) return false;
  if (req.headers['transfer-encoding'] !== undefined) return true;
  const length = req.headers['content-length'];
  return length !== undefined && length !== '0';
}

export class TransparentForwarder {
  private readonly log: Logger;

  constructor(
    private readonly target: UpstreamTarget,
    private readonly options: ForwarderOptions,
  ) {
    this.log = options.logger ?? defaultLogger;
  }

  targetUrl(requestTarget: string): string {
    if (requestTarget.startsWith('/')) return this.target.baseUrl + requestTarget;

    // absolute-form, as sent by clients configured to use us as an HTTP proxy
    try {
      const url = new URL(requestTarget);
      return this.target.baseUrl + url.pathname + url.search;
    } catch {
      throw new MalformedRequestError(`Unsupported request target: ${requestTarget}`);
    }
  }

  // node-fetch resolves Location against the upstream URL in manual redirect
  // mode. Upstream-relative locations are handed back as paths on this proxy.
  unresolveLocation(location: string): string {
    const base = this.target.baseUrl;
    if (location === base) return '/';
    if (location.startsWith(`${base}/`) || location.startsWith(`${base}?`)) {
      return location.slice(base.length).replace(/^\?/, '/?');
    }
    return location;
  }

  async forward(req: Request, res: Response): Promise<void> {
    const url = this.targetUrl(req.originalUrl);
    const controller = new AbortController();

    let timedOut = false;
    const ttfbTimer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.ttfbTimeoutMs);

    // `close` after `finish` is a normal end; before it, the client went away.
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    const headers = buildUpstreamHeaders(req.rawHeaders);
    const hasBody = requestHasBody(req);
    if (!hasBody) {
      headers.delete('content-length');
      req.resume(); // discard anything the client sent anyway
    }

    let upstream: FetchResponse;
    try {
      upstream = await fetch(url, {
        method:   req.method,
        headers,
        body:     hasBody ? req : undefined,
        redirect: 'manual',
        compress: false,
        agent:    this.options.agents?.select(url),
        signal:   controller.signal,
      });
    } catch (err) {
      if (timedOut) {
        this.log.error(`❌ Upstream timeout for ${req.method} ${req.originalUrl}`);
        this.fail(res, new UpstreamTimeoutError(this.options.ttfbTimeoutMs));
        return;
      }
      if (isAbortError(err)) return; // client disconnected before headers
      this.log.error(`❌ Forward failed for ${req.method} ${req.originalUrl}:`, errorMessage(err));
      this.fail(res, new ForwardingError(`Could not reach upstream: ${errorMessage(err)}`, { cause: err }));
      return;
    } finally {
      clearTimeout(ttfbTimer);
    }

    if (res.writableEnded || res.destroyed) {
      controller.abort();
      return;
    }

    res.writeHead(
      upstream.status,
      upstream.statusText,
      relayableResponseHeaders(upstream.headers.raw(), location => this.unresolveLocation(location)),
    );

    this.relayBody(upstream, res, controller);
  }

  private relayBody(upstream: FetchResponse, res: Response, controller: AbortController): void {
    const body = upstream.body;
    if (!(body instanceof Readable)) {
      res.end();
      return;
    }

    let stallTimer: ReturnType<typeof setTimeout> | undefined;
    let finished = false;
    const stallTimeoutMs = this.options.stallTimeoutMs;

    const cancelStall = (): void => {
      clearTimeout(stallTimer);
    };
    const scheduleStall = (): void => {
      cancelStall();
      if (finished) return;
      stallTimer = setTimeout(() => {
        this.log.error(`❌ Upstream stall: no data for ${stallTimeoutMs}ms, aborting`);
        controller.abort();
        body.destroy(new Error('Upstream stall timeout'));
      }, stallTimeoutMs);
    };

    // Only upstream silence counts as a stall. While the client is slow to read,
    // pipe pauses the body and the timer waits for the client to drain.
    scheduleStall();
    body.on('data', scheduleStall);
    body.on('pause', cancelStall);
    res.on('drain', scheduleStall);
    body.on('end', () => {
      finished = true;
      cancelStall();
    });

    res.on('close', () => {
      finished = true;
      cancelStall();
      if (!res.writableFinished) body.destroy();
    });

    body.on('error', (err: Error) => {
      finished = true;
      cancelStall();
      if (!isAbortError(err)) this.log.error('❌ Upstream stream error:', err.message);
      // Headers are out: a clean end would pass a truncated body off as
      // complete, so reset the connection instead.
      res.destroy();
    });

    body.pipe(res);
  }

  private fail(res: Response, err: ProxyError): void {
    if (res.headersSent) {
      res.destroy();
      return;
    }
    res.status(err.statusCode).json({ error: 'Proxy error', message: err.message, type: err.name });
  }
}
