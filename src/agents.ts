import * as http from 'http';
import * as https from 'https';

// Keep-alive agents for connection reuse with the upstream server. Players open
// many parallel requests (images, segments, session pings), so the pool is wide.
export interface UpstreamAgents {
  select(url: string): http.Agent | https.Agent;
  destroy(): void;
}

export function createUpstreamAgents(maxSockets = 128, maxFreeSockets = 32): UpstreamAgents {
  const httpAgent  = new http.Agent({ keepAlive: true, maxSockets, maxFreeSockets });
  const httpsAgent = new https.Agent({ keepAlive: true, maxSockets, maxFreeSockets });

  return {
    select: (url: string) => (url.startsWith('https:') ? httpsAgent : httpAgent),
    destroy: () => {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}
