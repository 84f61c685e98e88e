import type { ItemTypeResolver } from './itemTypeCache';
import { MalformedRequestError, errorMessage } from './errors';
import { logger as defaultLogger, type Logger } from './logger';

// ---------------------------------------------------------------------------
// Request classification
// ---------------------------------------------------------------------------

export type RouteDecision =
  | { kind: 'passthrough' }
  | { kind: 'bypass'; itemId: string; mediaSourceId: string };

const PASSTHROUGH: RouteDecision = { kind: 'passthrough' };

// [/emby]/Items/{id}/PlaybackInfo, matched case-insensitively like the server does.
const PLAYBACK_INFO_PATH = /^(?:\/[^/]+)?\/items\/([^/]+)\/playbackinfo\/?$/i;

const CLASSIFIED_METHODS = new Set(['GET', 'POST']);

/** Item id of a PlaybackInfo path, or null for every other path. */
export function matchPlaybackInfo(pathname: string): string | null {
  const m = PLAYBACK_INFO_PATH.exec(pathname);
  if (!m) return null;

  try {
    return decodeURIComponent(m[1]);
  } catch {
    throw new MalformedRequestError(`Invalid item id in path: ${pathname}`);
  }
}

function parseRequestTarget(url: string): URL {
  try {
    // Origin-form targets are joined rather than resolved so "//x" stays a path.
    return url.startsWith('/') ? new URL(`http://proxy.invalid${url}`) : new URL(url);
  } catch {
    throw new MalformedRequestError(`Unparseable request target: ${url}`);
  }
}

function mediaSourceIdFrom(searchParams: URLSearchParams): string | undefined {
  for (const [key, value] of searchParams) {
    if (key.toLowerCase() === 'mediasourceid' && value) return value;
  }
  return undefined;
}

export class RequestRouter {
  constructor(
    private readonly itemTypes: ItemTypeResolver,
    private readonly log: Logger = defaultLogger,
  ) {}

  /**
   * @param url  request target as received (path plus query string)
   * @throws MalformedRequestError when the target or the item id cannot be decoded
   */
  async decide(method: string, url: string): Promise<RouteDecision> {
    if (!CLASSIFIED_METHODS.has(method.toUpperCase())) return PASSTHROUGH;

    const parsed = parseRequestTarget(url);
    const itemId = matchPlaybackInfo(parsed.pathname);
    if (itemId === null) return PASSTHROUGH;

    let isStrm: boolean;
    let name: string | undefined;
    try {
      ({ isStrm, name } = await this.itemTypes.resolve(itemId));
    } catch (err) {
      // Bypass is an optimisation; the server's own answer is always acceptable.
      this.log.warn(`⚠️  Item type lookup failed, passing through: ${errorMessage(err)}`);
      return PASSTHROUGH;
    }

    if (!isStrm) return PASSTHROUGH;

    this.log.log(`⚡ Bypassing probe for strm item ${itemId}${name ? ` (${name})` : ''}`);
    return {
      kind: 'bypass',
      itemId,
      mediaSourceId: mediaSourceIdFrom(parsed.searchParams) ?? itemId,
    };
  }
}
