/**
 * UDP Transport
 *
 * One `node:dgram` socket per call, bound to an ephemeral port.
 * Supports unicast, broadcast and an inbound datagram subscription.
 */

import dgram from 'node:dgram';
import { ConnectionError } from '../core/errors.js';
import { silentLogger } from '../types/logger.js';
import type {
  DatagramListener,
  DatagramTransport,
  TransportFactory,
  TransportOpenOptions,
} from '../types/udp.js';

export interface UdpTransportOptions extends TransportOpenOptions {
  /**
   * Socket type
   * @default 'udp4'
   */
  type?: 'udp4' | 'udp6';
}

/**
 * UDP Transport
 *
 * @example
 * ```typescript
 * const transport = await UdpTransport.open({ broadcast: true });
 * try {
 *   const off = transport.onMessage((msg, rinfo) => console.log(rinfo.address, msg.toString()));
 *   await transport.send(Buffer.from('{"method":"registration"}'), 38899, '255.255.255.255');
 *   off();
 * } finally {
 *   await transport.close();
 * }
 * ```
 */
export class UdpTransport implements DatagramTransport {
  private closed = false;

  private constructor(
    private readonly socket: dgram.Socket,
    readonly localPort: number
  ) {}

  /**
   * Create and bind a socket. Rejects with ConnectionError if binding or
   * enabling broadcast fails; the socket is closed in that case.
   */
  static async open(options: UdpTransportOptions = {}): Promise<UdpTransport> {
    const logger = options.logger ?? silentLogger;
    const socket = dgram.createSocket({ type: options.type ?? 'udp4' });

    try {
      await new Promise<void>((resolve, reject) => {
        socket.once('error', reject);
        socket.bind(0, options.localAddress, () => {
          socket.removeListener('error', reject);
          resolve();
        });
      });

      if (options.broadcast) {
        socket.setBroadcast(true);
      }
    } catch (err) {
      closeQuietly(socket);
      throw new ConnectionError(
        `Failed to open UDP socket${options.localAddress ? ` on ${options.localAddress}` : ''}: ${errorMessage(err)}`,
        { address: options.localAddress, code: errorCode(err), cause: err }
      );
    }

    // An unhandled 'error' event would crash the process
    socket.on('error', (err) => {
      logger.log('error', `Socket error: ${err.message}`);
    });

    const address = socket.address();
    const transport = new UdpTransport(socket, address.port);
    logger.log('trace', `Bound to local port ${transport.localPort}`);
    return transport;
  }

  send(payload: Buffer, port: number, address: string): Promise<number> {
    if (this.closed) {
      return Promise.reject(new ConnectionError('Socket is closed', { address, port }));
    }

    return new Promise((resolve, reject) => {
      this.socket.send(payload, 0, payload.length, port, address, (err, bytes) => {
        if (err) {
          reject(
            new ConnectionError(`Failed to send to ${address}:${port}: ${err.message}`, {
              address,
              port,
              code: errorCode(err),
              cause: err,
            })
          );
        } else {
          resolve(bytes);
        }
      });
    });
  }

  onMessage(listener: DatagramListener): () => void {
    this.socket.on('message', listener);
    return () => {
      this.socket.removeListener('message', listener);
    };
  }

  /**
   * Close the socket. Safe to call more than once.
   */
  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    return new Promise((resolve) => {
      this.socket.close(() => resolve());
    });
  }
}

/**
 * Default transport factory
 */
export const openUdpTransport: TransportFactory = (options) => UdpTransport.open(options);

function closeQuietly(socket: dgram.Socket): void {
  try {
    socket.close();
  } catch {
    // Never bound, nothing to release
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
