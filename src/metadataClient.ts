import fetch from 'node-fetch';
import { z } from 'zod';
import type { UpstreamTarget } from './config';
import type { UpstreamAgents } from './agents';
import { UpstreamUnavailableError, errorMessage, isAbortError } from './errors';

// ---------------------------------------------------------------------------
// Upstream metadata client
// ---------------------------------------------------------------------------
// Answers one question about a library item: is it a .strm reference? Uses the
// plain item endpoint (GET /Items/{id}), never PlaybackInfo, so the server does
// not probe the remote stream to answer it.

export interface ItemMetadata {
  isStrm: boolean;
  name?: string;
}

export interface ItemMetadataSource {
  lookup(itemId: string): Promise<ItemMetadata>;
}

const itemSchema = z
  .object({
    Name: z.string().nullish(),
    Path: z.string().nullish(),
    MediaSources: z
      .array(z.object({ Path: z.string().nullish() }).passthrough())
      .nullish(),
  })
  .passthrough();

export type UpstreamItem = z.infer<typeof itemSchema>;

const STRM_EXTENSION = /\.strm$/i;

export function isStrmItem(item: UpstreamItem): boolean {
  if (item.Path && STRM_EXTENSION.test(item.Path)) return true;
  return (item.MediaSources ?? []).some(source => !!source.Path && STRM_EXTENSION.test(source.Path));
}

export interface EmbyMetadataClientOptions {
  timeoutMs: number;
  agents?: UpstreamAgents;
}

export class EmbyMetadataClient implements ItemMetadataSource {
  constructor(
    private readonly target: UpstreamTarget,
    private readonly options: EmbyMetadataClientOptions,
  ) {}

  // The key travels in a header so it never appears in a URL that error
  // messages and logs repeat.
  itemUrl(itemId: string): string {
    return `${this.target.baseUrl}/Items/${encodeURIComponent(itemId)}`;
  }

  async lookup(itemId: string): Promise<ItemMetadata> {
    const url = this.itemUrl(itemId);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(url, {
        headers: { Accept: 'application/json', 'X-Emby-Token': this.target.apiKey },
        agent: this.options.agents?.select(url),
        signal: controller.signal,
      });

      if (!response.ok) {
        response.body.resume();
        throw new UpstreamUnavailableError(itemId, `HTTP ${response.status}: ${response.statusText}`);
      }

      const parsed = itemSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new UpstreamUnavailableError(itemId, 'unexpected item payload', { cause: parsed.error });
      }

      return {
        isStrm: isStrmItem(parsed.data),
        name: parsed.data.Name ?? undefined,
      };
    } catch (err) {
      if (err instanceof UpstreamUnavailableError) throw err;
      if (isAbortError(err)) {
        throw new UpstreamUnavailableError(itemId, `timed out after ${this.options.timeoutMs}ms`, { cause: err });
      }
      throw new UpstreamUnavailableError(itemId, errorMessage(err), { cause: err });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
