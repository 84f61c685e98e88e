// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------
//
//   UpstreamUnavailableError  metadata lookup failed; the router fails open
//   ForwardingError           upstream unreachable while relaying  → 502
//   UpstreamTimeoutError      no upstream headers within the TTFB  → 504
//   MalformedRequestError     request cannot be classified         → 400

export class ProxyError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class UpstreamUnavailableError extends ProxyError {
  readonly itemId: string;

  constructor(itemId: string, reason: string, options?: { cause?: unknown }) {
    super(`Metadata lookup for item ${itemId} failed: ${reason}`, 503, options);
    this.itemId = itemId;
  }
}

export class ForwardingError extends ProxyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, options);
  }
}

export class UpstreamTimeoutError extends ProxyError {
  constructor(timeoutMs: number) {
    super(`Upstream sent no response headers within ${timeoutMs}ms`, 504);
  }
}

export class MalformedRequestError extends ProxyError {
  constructor(message: string) {
    super(message, 400);
  }
}

// node-fetch rejects with an AbortError; Node's own streams use ABORT_ERR.
export function isAbortError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = (err as NodeJS.ErrnoException).code;
  return err.name === 'AbortError' || code === 'ABORT_ERR';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
