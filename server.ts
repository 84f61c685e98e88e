/**
 * strm fast-play proxy entry point.
 *
 * Usage: node dist/server.js [upstreamUrl] [apiKey] [port]
 * (or UPSTREAM_URL / API_KEY / PORT in the environment or a .env file)
 */

import * as dotenv from 'dotenv';
dotenv.config(); // Load .env before anything else reads process.env

import type { Server } from 'http';
import { createApp, HEALTH_PATH, rejectMalformedRequest } from './src/app';
import { createUpstreamAgents, type UpstreamAgents } from './src/agents';
import { ConfigError, describeConfig, loadConfig, type ProxyConfig } from './src/config';
import { TransparentForwarder } from './src/forwarder';
import { ItemTypeCache } from './src/itemTypeCache';
import { EmbyMetadataClient } from './src/metadataClient';
import { RequestRouter } from './src/router';
import { IS_DEV, logger } from './src/logger';

function startServer(config: ProxyConfig, agents: UpstreamAgents): Server {
  const cache = new ItemTypeCache(
    new EmbyMetadataClient(config.upstream, { timeoutMs: config.timeouts.metadataMs, agents }),
    { ttlMs: config.cache.ttlMs, maxEntries: config.cache.maxEntries },
  );

  const app = createApp({
    config,
    router:     new RequestRouter(cache),
    forwarder:  new TransparentForwarder(config.upstream, {
      ttfbTimeoutMs:  config.timeouts.forwardTtfbMs,
      stallTimeoutMs: config.timeouts.forwardStallMs,
      agents,
    }),
    cacheStats: () => cache.stats(),
  });

  const server = app.listen(config.listen.port, config.listen.host, () => {
    // Startup banner always prints regardless of environment so you know it's running
    console.log(`🚀 strm fast-play proxy running on port ${config.listen.port}`);
    for (const line of describeConfig(config)) console.log(`   ${line}`);
    if (IS_DEV) console.log(`📍 Health check: http://localhost:${config.listen.port}${HEALTH_PATH}`);
  });

  server.on('clientError', rejectMalformedRequest);
  return server;
}

function shutdown(server: Server, agents: UpstreamAgents, signal: string): void {
  logger.warn(`Received ${signal}: shutting down...`);
  server.close(err => {
    agents.destroy();
    if (err) {
      logger.error('Error during shutdown:', err);
      process.exitCode = 1;
    }
  });
  server.closeIdleConnections();
}

function main(): void {
  let config: ProxyConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const agents = createUpstreamAgents();
  const server = startServer(config, agents);

  process.once('SIGINT',  () => shutdown(server, agents, 'SIGINT'));
  process.once('SIGTERM', () => shutdown(server, agents, 'SIGTERM'));
}

main();
