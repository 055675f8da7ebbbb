/**
 * UDP and message types for wizlink
 *
 * Provides type definitions for:
 * - Wire messages and replies
 * - The datagram transport seam used by both engines
 * - Per-call options
 */

import type { RemoteInfo } from 'node:dgram';
import type { RetryPolicy } from '../retry/policy.js';
import type { LogSink } from './logger.js';

// ============================================================================
// Messages
// ============================================================================

/**
 * Outbound request, serialized to one UTF-8 JSON datagram
 */
export interface Message {
  method: string;
  params?: Record<string, unknown>;
  [key: string]: unknown;
}

/**
 * Parsed reply tagged with its sender
 */
export interface Reply {
  /** Top-level JSON object as sent by the device */
  data: Record<string, unknown>;
  /** Sender IP address */
  address: string;
  /** Sender UDP port */
  port: number;
  /** Datagram bytes, kept for diagnostics */
  raw: Buffer;
}

// ============================================================================
// Transport
// ============================================================================

export type DatagramListener = (msg: Buffer, rinfo: RemoteInfo) => void;

/**
 * One UDP socket owned by exactly one call
 */
export interface DatagramTransport {
  /** Ephemeral local port the socket is bound to */
  readonly localPort: number;

  /**
   * Send one datagram, resolving with the number of bytes written
   */
  send(payload: Buffer, port: number, address: string): Promise<number>;

  /**
   * Subscribe to inbound datagrams. Returns the unsubscribe function.
   */
  onMessage(listener: DatagramListener): () => void;

  /**
   * Close the socket and release resources
   */
  close(): Promise<void>;
}

export interface TransportOpenOptions {
  /**
   * Enable SO_BROADCAST before the first send
   * @default false
   */
  broadcast?: boolean;

  /**
   * Bind to a specific local address (ephemeral port either way)
   */
  localAddress?: string;

  /**
   * Receives socket errors raised outside a send
   */
  logger?: LogSink;
}

/**
 * Opens a bound transport. Rejects with ConnectionError when the socket cannot be set up.
 */
export type TransportFactory = (options: TransportOpenOptions) => Promise<DatagramTransport>;

// ============================================================================
// Options
// ============================================================================

export interface EngineOptions {
  /**
   * Socket factory, swapped out in tests
   * @default openUdpTransport
   */
  transportFactory?: TransportFactory;

  /**
   * Log sink
   * @default silentLogger
   */
  logger?: LogSink;
}

export interface SendOptions {
  /**
   * Destination UDP port
   * @default 38899
   */
  port?: number;

  /**
   * Per-attempt timeout in milliseconds. Every retry waits this long again.
   * @default 3000
   */
  timeout?: number;

  /**
   * Retry policy for silent attempts
   * @default exponential, 5 retries from 750ms capped at 3s
   */
  retry?: RetryPolicy;
}

export interface DiscoverOptions {
  /**
   * Broadcast address
   * @default '255.255.255.255'
   */
  broadcastAddress?: string;

  /**
   * Total window in milliseconds. Every broadcast and every reply shares it.
   * @default 10000
   */
  timeout?: number;

  /**
   * Schedule of repeat broadcasts inside the window
   * @default exponential, 5 retries from 500ms capped at 3s
   */
  retry?: RetryPolicy;

  /**
   * Destination UDP port
   * @default 38899
   */
  port?: number;

  /**
   * Local address to bind the broadcast socket to
   */
  localAddress?: string;
}

/**
 * Light found by a discovery broadcast
 */
export interface DiscoveredDevice {
  ip: string;
  port: number;
  mac: string;
  moduleName?: string;
  fwVersion?: string;
}

/**
 * IPv4 interface considered for per-interface discovery
 */
export interface InterfaceAddress {
  name: string;
  address: string;
}

export interface DiscoverAllOptions extends Omit<DiscoverOptions, 'broadcastAddress' | 'localAddress'> {
  /**
   * Interface provider
   * @default non-internal IPv4 entries of os.networkInterfaces()
   */
  interfaces?: () => InterfaceAddress[];
}
