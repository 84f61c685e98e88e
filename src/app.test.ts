import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as http from 'http';
import * as net from 'net';
import { createApp, HEALTH_PATH, rejectMalformedRequest } from './app';
import { loadConfig } from './config';
import { TransparentForwarder } from './forwarder';
import { ItemTypeCache } from './itemTypeCache';
import { EmbyMetadataClient } from './metadataClient';
import { RequestRouter } from './router';
import { synthesizePlaybackInfo } from './synthesizer';
import { silentLogger } from './logger';
import { listen, rawRequest, type RunningServer } from './testUtils';

const API_KEY = 'test-key';

const ITEMS: Record<string, { Path: string } | 'hang' | 'error'> = {
  'strm-1':  { Path: '/media/movies/Remote.strm' },
  'local-1': { Path: '/media/movies/Local.mkv' },
  'slow-1':  'hang',
  'broken-1': 'error',
};

const PROBED = { MediaSources: [{ Id: 'probed', Container: 'mkv', RunTimeTicks: 72_000_000_000 }], PlaySessionId: 'srv' };

// Stand-in for the media server: item lookups, a probing PlaybackInfo endpoint
// and an echo for everything else.
function createMediaServer() {
  const counters = { itemLookups: 0, probes: 0, other: 0 };

  const listener: http.RequestListener = (req, res) => {
    const url = new URL(req.url ?? '/', 'http://upstream.invalid');
    const lookup = /^\/Items\/([^/]+)$/.exec(url.pathname);
    const probe = /^\/(?:emby\/)?Items\/([^/]+)\/PlaybackInfo$/.exec(url.pathname);

    if (lookup) {
      counters.itemLookups++;
      const item = ITEMS[lookup[1]];
      if (item === 'hang') return;
      if (item === undefined || item === 'error' || req.headers['x-emby-token'] !== API_KEY) {
        res.writeHead(500);
        res.end();
        return;
      }
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ Id: lookup[1], Name: lookup[1], ...item }));
      return;
    }

    if (probe) {
      counters.probes++;
      res.writeHead(200, { 'Content-Type': 'application/json; charset=utf-8' });
      res.end(JSON.stringify(PROBED));
      return;
    }

    counters.other++;
    res.writeHead(200, { 'Content-Type': 'text/plain', 'X-Echo-Method': req.method ?? '' });
    res.end(`echo ${req.url}`);
  };

  return { listener, counters };
}

describe('proxy app', () => {
  let upstream: RunningServer;
  let proxy: RunningServer;
  let counters: ReturnType<typeof createMediaServer>['counters'];
  let cache: ItemTypeCache;

  beforeEach(async () => {
    const media = createMediaServer();
    counters = media.counters;
    upstream = await listen(media.listener);

    const config = loadConfig([upstream.url, API_KEY, '8097'], { NODE_ENV: 'test', METADATA_TIMEOUT_MS: '100' });
    cache = new ItemTypeCache(
      new EmbyMetadataClient(config.upstream, { timeoutMs: config.timeouts.metadataMs }),
      { ttlMs: config.cache.ttlMs, maxEntries: config.cache.maxEntries, logger: silentLogger },
    );
    const app = createApp({
      config,
      router:     new RequestRouter(cache, silentLogger),
      forwarder:  new TransparentForwarder(config.upstream, {
        ttfbTimeoutMs:  config.timeouts.forwardTtfbMs,
        stallTimeoutMs: config.timeouts.forwardStallMs,
        logger:         silentLogger,
      }),
      cacheStats: () => cache.stats(),
      logger:     silentLogger,
    });
    proxy = await listen(app);
    proxy.server.on('clientError', rejectMalformedRequest);
  });

  afterEach(async () => {
    await Promise.all([proxy.close(), upstream.close()]);
  });

  it('answers PlaybackInfo for strm items without asking the server to probe', async () => {
    const response = await rawRequest(`${proxy.url}/emby/Items/strm-1/PlaybackInfo?UserId=u1&MediaSourceId=ms-9`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"DeviceProfile":{}}',
    });

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(JSON.parse(response.body.toString())).toEqual(synthesizePlaybackInfo('strm-1', 'ms-9'));
    expect(counters).toEqual({ itemLookups: 1, probes: 0, other: 0 });
  });

  it('looks each item up only once while cached', async () => {
    await rawRequest(`${proxy.url}/Items/strm-1/PlaybackInfo`);
    await rawRequest(`${proxy.url}/Items/strm-1/PlaybackInfo`);
    await rawRequest(`${proxy.url}/Items/local-1/PlaybackInfo`);
    await rawRequest(`${proxy.url}/Items/local-1/PlaybackInfo`);

    expect(counters.itemLookups).toBe(2);
    expect(counters.probes).toBe(2);
  });

  it('coalesces concurrent first requests for one item', async () => {
    const responses = await Promise.all(
      Array.from({ length: 5 }, () => rawRequest(`${proxy.url}/Items/strm-1/PlaybackInfo`)),
    );

    expect(responses.map(r => r.status)).toEqual([200, 200, 200, 200, 200]);
    expect(counters.itemLookups).toBe(1);
    expect(counters.probes).toBe(0);
  });

  it('forwards PlaybackInfo for local files to the server', async () => {
    const response = await rawRequest(`${proxy.url}/Items/local-1/PlaybackInfo`);

    expect(response.status).toBe(200);
    expect(response.body.toString()).toBe(JSON.stringify(PROBED));
    expect(counters.probes).toBe(1);
  });

  it('falls back to the server when the item lookup times out', async () => {
    const response = await rawRequest(`${proxy.url}/Items/slow-1/PlaybackInfo`);

    expect(response.status).toBe(200);
    expect(response.body.toString()).toBe(JSON.stringify(PROBED));
    expect(counters.probes).toBe(1);
    expect(cache.peek('slow-1')).toBeUndefined();
  });

  it('falls back to the server when the item lookup errors', async () => {
    const response = await rawRequest(`${proxy.url}/Items/broken-1/PlaybackInfo`);

    expect(response.status).toBe(200);
    expect(response.body.toString()).toBe(JSON.stringify(PROBED));
  });

  it('forwards every other request without a lookup', async () => {
    const response = await rawRequest(`${proxy.url}/Users/u1/Items?ParentId=p1`, { method: 'DELETE' });

    expect(response.status).toBe(200);
    expect(response.headers['x-echo-method']).toBe('DELETE');
    expect(response.body.toString()).toBe('echo /Users/u1/Items?ParentId=p1');
    expect(counters).toEqual({ itemLookups: 0, probes: 0, other: 1 });
  });

  it('rejects a PlaybackInfo path with an undecodable item id', async () => {
    const response = await rawRequest(`${proxy.url}/Items/%E0%A4%A/PlaybackInfo`);

    expect(response.status).toBe(400);
    expect(JSON.parse(response.body.toString())).toEqual({
      error:   'Bad Request',
      message: 'Invalid item id in path: /Items/%E0%A4%A/PlaybackInfo',
    });
    expect(counters).toEqual({ itemLookups: 0, probes: 0, other: 0 });
  });

  it('answers unparseable HTTP with 400 and forwards nothing', async () => {
    const reply = await new Promise<string>((resolve, reject) => {
      const socket = net.connect(proxy.port, '127.0.0.1', () => socket.write('NOT HTTP AT ALL\r\n\r\n'));
      let data = '';
      socket.on('data', chunk => {
        data += chunk.toString();
      });
      socket.on('end', () => resolve(data));
      socket.on('error', reject);
    });

    expect(reply.split('\r\n')[0]).toBe('HTTP/1.1 400 Bad Request');
    expect(counters).toEqual({ itemLookups: 0, probes: 0, other: 0 });
  });

  it('serves its own health endpoint', async () => {
    await rawRequest(`${proxy.url}/Items/strm-1/PlaybackInfo`);
    const response = await rawRequest(`${proxy.url}${HEALTH_PATH}`);
    const body = JSON.parse(response.body.toString());

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      status:      'ok',
      environment: 'test',
      upstream:    upstream.url,
      cache:       { size: 1, misses: 1 },
    });
    expect(counters.other).toBe(0);
  });
});
