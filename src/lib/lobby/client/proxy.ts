/**
 * Proxy routing and the fail-closed safety switch
 */

import type { Agent } from 'node:http';
import * as http from 'node:http';
import * as https from 'node:https';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { ConnectError } from '../errors';
import { logger } from '../../utils/logger';
import type { ProxyConfig } from '../config/monitor-config';

export interface ProxyProbe {
  /**
   * Public address the verify endpoint sees, through `agent` when given
   */
  lookupEgressAddress(verifyUrl: string, agent?: Agent): Promise<string>;
}

/**
 * Asks a plain-text "what is my IP" endpoint over HTTP(S)
 */
export class HttpEgressProbe implements ProxyProbe {
  constructor(private readonly timeoutMs: number) {}

  lookupEgressAddress(verifyUrl: string, agent?: Agent): Promise<string> {
    const get = verifyUrl.startsWith('https:') ? https.get : http.get;

    return new Promise((resolve, reject) => {
      const request = get(verifyUrl, { agent, timeout: this.timeoutMs }, (response) => {
        const status = response.statusCode ?? 0;
        if (status < 200 || status >= 300) {
          response.resume();
          reject(new Error(`Verify endpoint answered HTTP ${status}`));
          return;
        }

        const chunks: Buffer[] = [];
        response.on('data', (chunk: Buffer) => chunks.push(chunk));
        response.on('end', () => resolve(Buffer.concat(chunks).toString('utf8').trim()));
        response.on('error', reject);
      });

      request.on('timeout', () => {
        request.destroy(new Error(`Verify endpoint did not answer within ${this.timeoutMs}ms`));
      });
      request.on('error', reject);
    });
  }
}

export function createProxyAgent(proxy: ProxyConfig): SocksProxyAgent {
  try {
    return new SocksProxyAgent(proxy.url);
  } catch (error) {
    throw new ConnectError(`Invalid proxy URL ${proxy.url}`, { cause: error });
  }
}

/**
 * Pre-flight check for the safety switch: the proxied egress address must be known
 * and must differ from the direct one. Resolves with the proxied address.
 */
export async function verifyProxy(proxy: ProxyConfig, agent: Agent, probe: ProxyProbe): Promise<string> {
  let proxied: string;
  try {
    proxied = await probe.lookupEgressAddress(proxy.verifyUrl, agent);
  } catch (error) {
    throw new ConnectError('Proxy verification failed: no answer through the proxy', { cause: error });
  }

  if (!proxied) {
    throw new ConnectError('Proxy verification failed: empty egress address');
  }

  let direct: string | null = null;
  try {
    direct = await probe.lookupEgressAddress(proxy.verifyUrl);
  } catch (error) {
    // No direct route means nothing can leak around the proxy
    logger.debug('Direct egress lookup failed', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  if (direct === proxied) {
    throw new ConnectError('Proxy verification failed: proxied and direct egress addresses match');
  }

  logger.info('Proxy verified', { egress: proxied });
  return proxied;
}
