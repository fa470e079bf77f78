/**
 * Transport selection by protocol variant
 */

import { UdpConnector } from './udp-transport';
import { WebSocketConnector } from './websocket-transport';
import type { MonitorConfig } from '../config/monitor-config';
import type { TransportConnector } from './types';

export function createConnector(config: MonitorConfig): TransportConnector {
  switch (config.variant) {
    case 'websocket':
      return new WebSocketConnector({ connectTimeoutMs: config.connectTimeoutMs });
    case 'raknet':
      return new UdpConnector({ connectTimeoutMs: config.connectTimeoutMs });
  }
}

export { FrameChannel, parseHostPort } from './types';
export { WebSocketConnector, WebSocketChannel } from './websocket-transport';
export { UdpConnector, UdpChannel } from './udp-transport';
export { DatagramAssembler } from './datagram-assembler';
export { HttpEgressProbe, createProxyAgent, verifyProxy } from './proxy';
export type { TransportConnector, TransportEvents } from './types';
export type { WebSocketConnectorOptions } from './websocket-transport';
export type { UdpConnectorOptions } from './udp-transport';
export type { AssemblyResult, DatagramAssemblerOptions } from './datagram-assembler';
export type { ProxyProbe } from './proxy';
