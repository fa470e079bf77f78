/**
 * UDP Transport
 * Connected dgram socket with RakNet-style datagram reassembly
 */

import * as dgram from 'node:dgram';
import { isIP } from 'node:net';
import { RAKNET_CONSTANTS } from '../constants';
import { ClosedError, ConnectError, DecodeError } from '../errors';
import { DatagramAssembler, type AssemblyResult, type DatagramAssemblerOptions } from './datagram-assembler';
import { FrameChannel, parseHostPort, type TransportConnector } from './types';
import { logger } from '../../utils/logger';
import type { ProxyConfig } from '../config/monitor-config';

export interface UdpConnectorOptions {
  connectTimeoutMs: number;
  assembler?: DatagramAssemblerOptions;
}

export class UdpChannel extends FrameChannel {
  private readonly pollTimer: ReturnType<typeof setInterval>;

  constructor(
    private readonly socket: dgram.Socket,
    private readonly assembler: DatagramAssembler,
    pollIntervalMs: number
  ) {
    super();

    socket.on('message', (datagram) => this.handleDatagram(datagram));
    socket.on('error', (error) => {
      // ICMP unreachable and friends surface here on a connected socket
      logger.warn('UDP socket error', { connectionId: this.connectionId, error: error.message });
      this.shutdown(new ClosedError(`UDP socket error: ${error.message}`), true);
    });
    socket.on('close', () => {
      this.shutdown(new ClosedError('UDP socket closed'), true);
    });

    this.pollTimer = setInterval(() => this.dispatch(this.assembler.poll()), pollIntervalMs);
    this.pollTimer.unref();
  }

  sendFrame(frame: Uint8Array): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(new ClosedError('UDP channel is closed'));
    }
    if (frame.byteLength > RAKNET_CONSTANTS.MAX_DATAGRAM_SIZE) {
      return Promise.reject(
        new RangeError(`Datagram of ${frame.byteLength} bytes exceeds ${RAKNET_CONSTANTS.MAX_DATAGRAM_SIZE}`)
      );
    }

    return new Promise((resolve, reject) => {
      this.socket.send(frame, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  close(): void {
    if (!this.isOpen) {
      return;
    }
    this.shutdown(new ClosedError('Closed locally'), false);
  }

  private handleDatagram(datagram: Buffer): void {
    try {
      this.dispatch(this.assembler.push(new Uint8Array(datagram)));
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        throw error;
      }
      this.emit('error', error);
    }
  }

  private dispatch(result: AssemblyResult): void {
    for (const message of result.messages) {
      this.deliver(message);
    }
    for (const error of result.errors) {
      this.emit('error', error);
    }
  }

  private shutdown(error: ClosedError, remote: boolean): void {
    if (!this.isOpen) {
      return;
    }
    clearInterval(this.pollTimer);
    this.assembler.reset();
    this.markClosed(error, remote);
    this.socket.removeAllListeners();
    // Keep a sink for late errors once our listeners are gone
    this.socket.on('error', (late) => {
      logger.debug('UDP socket error after close', { error: late.message });
    });
    try {
      this.socket.close();
    } catch (closeError) {
      logger.debug('UDP socket already closed', {
        error: closeError instanceof Error ? closeError.message : String(closeError),
      });
    }
  }
}

export class UdpConnector implements TransportConnector {
  readonly variant = 'raknet' as const;

  constructor(private readonly options: UdpConnectorOptions) {}

  connect(address: string, proxy: ProxyConfig | null): Promise<UdpChannel> {
    if (proxy) {
      return Promise.reject(
        new ConnectError('UDP transport cannot be routed through a proxy; refusing to connect directly')
      );
    }

    const { host, port } = parseHostPort(address, RAKNET_CONSTANTS.DEFAULT_PORT);
    const socket = dgram.createSocket(isIP(host) === 6 ? 'udp6' : 'udp4');
    const assemblerOptions = this.options.assembler ?? {};
    const pollIntervalMs = Math.max(50, Math.floor((assemblerOptions.reorderTimeoutMs ?? 1000) / 2));

    return new Promise((resolve, reject) => {
      const fail = (error: Error) => {
        clearTimeout(timer);
        socket.removeAllListeners();
        socket.on('error', (late) => {
          logger.debug('UDP socket error after failed connect', { error: late.message });
        });
        socket.close();
        reject(new ConnectError(`Could not open UDP socket to ${host}:${port}: ${error.message}`, { cause: error }));
      };

      const timer = setTimeout(() => {
        fail(new Error(`no route within ${this.options.connectTimeoutMs}ms`));
      }, this.options.connectTimeoutMs);

      socket.once('error', fail);
      socket.connect(port, host, () => {
        clearTimeout(timer);
        socket.off('error', fail);
        logger.info('UDP socket connected', { host, port });
        resolve(new UdpChannel(socket, new DatagramAssembler(assemblerOptions), pollIntervalMs));
      });
    });
  }
}
