/**
 * WebSocket Transport
 * One frame per WebSocket message, optionally through a SOCKS proxy
 */

import WebSocket from 'ws';
import type { Agent } from 'node:http';
import { WEBSOCKET_CONSTANTS } from '../constants';
import { ClosedError, ConnectError } from '../errors';
import { FrameChannel, type TransportConnector } from './types';
import { HttpEgressProbe, createProxyAgent, verifyProxy, type ProxyProbe } from './proxy';
import { logger } from '../../utils/logger';
import type { ProxyConfig } from '../config/monitor-config';

export interface WebSocketConnectorOptions {
  connectTimeoutMs: number;
  /** Egress lookup used by the proxy safety switch */
  proxyProbe?: ProxyProbe;
}

function toUrl(address: string): string {
  return /^wss?:\/\//i.test(address) ? address : `ws://${address}`;
}

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) {
    return new Uint8Array(Buffer.concat(data));
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

export class WebSocketChannel extends FrameChannel {
  private closingLocally = false;

  constructor(private readonly ws: WebSocket) {
    super();

    ws.on('message', (data) => {
      this.deliver(toBytes(data));
    });

    ws.on('error', (error) => {
      logger.warn('WebSocket error', { connectionId: this.connectionId, error: error.message });
      this.emit('error', error);
    });

    ws.on('close', (code, reason) => {
      logger.info('WebSocket connection closed', {
        connectionId: this.connectionId,
        code,
        reason: reason.toString(),
      });
      this.markClosed(
        new ClosedError(`WebSocket closed with code ${code}`, code),
        !this.closingLocally
      );
    });
  }

  sendFrame(frame: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.isOpen || this.ws.readyState !== WebSocket.OPEN) {
        reject(new ClosedError('WebSocket not connected'));
        return;
      }

      this.ws.send(frame, { binary: false }, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  close(): void {
    if (this.closingLocally) {
      return;
    }
    this.closingLocally = true;

    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(WEBSOCKET_CONSTANTS.CLOSE_CODES.NORMAL, 'Client disconnect');
    }

    // Pending receives fail now rather than after the closing handshake
    this.markClosed(new ClosedError('Closed locally', WEBSOCKET_CONSTANTS.CLOSE_CODES.NORMAL), false);
  }
}

export class WebSocketConnector implements TransportConnector {
  readonly variant = 'websocket' as const;

  constructor(private readonly options: WebSocketConnectorOptions) {}

  async connect(address: string, proxy: ProxyConfig | null): Promise<WebSocketChannel> {
    const url = toUrl(address);
    let agent: Agent | undefined;

    if (proxy) {
      agent = createProxyAgent(proxy);
      if (proxy.safetySwitch) {
        const probe = this.options.proxyProbe ?? new HttpEgressProbe(this.options.connectTimeoutMs);
        await verifyProxy(proxy, agent, probe);
      }
    }

    return this.open(url, agent);
  }

  private open(url: string, agent: Agent | undefined): Promise<WebSocketChannel> {
    return new Promise((resolve, reject) => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(url, { agent, handshakeTimeout: this.options.connectTimeoutMs });
      } catch (error) {
        reject(new ConnectError(`Invalid WebSocket address ${url}`, { cause: error }));
        return;
      }

      const onError = (error: Error) => {
        cleanup();
        ws.on('error', (late) => {
          logger.debug('WebSocket error after failed connect', { url, error: late.message });
        });
        reject(new ConnectError(`Could not connect to ${url}: ${error.message}`, { cause: error }));
      };
      const onClose = (code: number) => {
        cleanup();
        reject(new ConnectError(`Connection to ${url} closed during handshake (code ${code})`));
      };
      const onOpen = () => {
        cleanup();
        logger.info('WebSocket connection opened', { url });
        resolve(new WebSocketChannel(ws));
      };
      const cleanup = () => {
        ws.off('error', onError);
        ws.off('close', onClose);
        ws.off('open', onOpen);
      };

      ws.on('error', onError);
      ws.on('close', onClose);
      ws.on('open', onOpen);
    });
  }
}
