import { describe, it, expect } from 'vitest';
import { Agent } from 'node:http';
import { createProxyAgent, verifyProxy, type ProxyProbe } from './proxy';
import { WebSocketConnector } from './websocket-transport';
import { ConnectError } from '../errors';
import type { ProxyConfig } from '../config/monitor-config';

const proxy: ProxyConfig = {
  url: 'socks5h://127.0.0.1:9050',
  safetySwitch: true,
  verifyUrl: 'https://egress.test/ip',
};

class FakeProbe implements ProxyProbe {
  lookups: Array<{ proxied: boolean }> = [];

  constructor(
    private readonly proxied: string | Error,
    private readonly direct: string | Error
  ) {}

  async lookupEgressAddress(_verifyUrl: string, agent?: Agent): Promise<string> {
    this.lookups.push({ proxied: agent !== undefined });
    const answer = agent ? this.proxied : this.direct;
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  }
}

describe('verifyProxy', () => {
  const agent = new Agent();

  it('resolves with the proxied address when it differs from the direct one', async () => {
    const probe = new FakeProbe('203.0.113.5', '198.51.100.7');

    await expect(verifyProxy(proxy, agent, probe)).resolves.toBe('203.0.113.5');
    expect(probe.lookups).toEqual([{ proxied: true }, { proxied: false }]);
  });

  it('refuses when both routes leave from the same address', async () => {
    const probe = new FakeProbe('198.51.100.7', '198.51.100.7');

    await expect(verifyProxy(proxy, agent, probe)).rejects.toThrow(
      'Proxy verification failed: proxied and direct egress addresses match'
    );
  });

  it('refuses when the proxy does not answer', async () => {
    const probe = new FakeProbe(new Error('socket hang up'), '198.51.100.7');

    await expect(verifyProxy(proxy, agent, probe)).rejects.toBeInstanceOf(ConnectError);
  });

  it('refuses an empty proxied address', async () => {
    const probe = new FakeProbe('', '198.51.100.7');

    await expect(verifyProxy(proxy, agent, probe)).rejects.toThrow('empty egress address');
  });

  it('accepts the proxy when there is no direct route', async () => {
    const probe = new FakeProbe('203.0.113.5', new Error('ENETUNREACH'));

    await expect(verifyProxy(proxy, agent, probe)).resolves.toBe('203.0.113.5');
  });
});

describe('createProxyAgent', () => {
  it('rejects a malformed proxy URL', () => {
    expect(() => createProxyAgent({ ...proxy, url: 'not a proxy' })).toThrow(ConnectError);
  });
});

describe('WebSocketConnector with the safety switch', () => {
  it('does not open a connection when verification fails', async () => {
    const probe = new FakeProbe('198.51.100.7', '198.51.100.7');
    const connector = new WebSocketConnector({ connectTimeoutMs: 1000, proxyProbe: probe });

    await expect(connector.connect('lobby.test:1337', proxy)).rejects.toBeInstanceOf(ConnectError);
    expect(probe.lookups).toHaveLength(2);
  });
});
