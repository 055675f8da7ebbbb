/**
 * Point-to-point exchange
 *
 * Sends one message to one light and returns its first reply, retrying only
 * when an attempt goes unanswered. Each attempt gets the full timeout, so the
 * worst case is roughly `timeout × attempts + Σ retry intervals`.
 */

import type { RemoteInfo } from 'node:dgram';
import { ConnectionError, MethodNotFoundError, ResponseError, TimeoutError } from '../core/errors.js';
import { ResultSlot, awaitOutcome, waitForSettle } from '../core/result-slot.js';
import { DEFAULT_SEND_RETRY, type RetryPolicy } from '../retry/policy.js';
import { openUdpTransport } from '../transport/udp.js';
import { silentLogger, type LogSink } from '../types/logger.js';
import type {
  DatagramTransport,
  EngineOptions,
  Message,
  Reply,
  SendOptions,
  TransportFactory,
} from '../types/udp.js';
import { decodeDatagram, encodeMessage } from './codec.js';
import {
  DEFAULT_TIMEOUT_MS,
  ERROR_CODE_METHOD_NOT_FOUND,
  RESULT_GRACE_MS,
  WIZ_PORT,
} from '../constants.js';

export interface ExchangeOptions extends EngineOptions {
  /**
   * How long to wait for a result after the attempt loop ends before
   * forcing a TimeoutError
   * @default 1000
   */
  graceMs?: number;
}

/**
 * In-flight state of one `send()` call
 */
interface PendingRequest {
  readonly address: string;
  readonly port: number;
  readonly method: string;
  readonly timeout: number;
  readonly retry: RetryPolicy;
  readonly slot: ResultSlot<Reply>;
  attempts: number;
  interval: number;
}

/**
 * @example
 * ```typescript
 * const exchange = new Exchange({ logger: consoleLogger('debug') });
 *
 * const reply = await exchange.send('192.168.1.100', { method: 'getPilot', params: {} });
 * console.log(reply.data.result);
 *
 * // No retries, 1s timeout
 * await exchange.send('192.168.1.100', message, { timeout: 1000, retry: RetryPolicy.disabled() });
 * ```
 */
export class Exchange {
  private readonly transportFactory: TransportFactory;
  private readonly logger: LogSink;
  private readonly graceMs: number;

  constructor(options: ExchangeOptions = {}) {
    this.transportFactory = options.transportFactory ?? openUdpTransport;
    this.logger = options.logger ?? silentLogger;
    this.graceMs = options.graceMs ?? RESULT_GRACE_MS;
  }

  /**
   * Send `message` to `address` and resolve with the first reply.
   *
   * Rejects with:
   * - ConnectionError when the socket cannot be opened or a send fails
   * - ResponseError when a reply is unparseable or carries an error code
   * - MethodNotFoundError when the light answers -32601
   * - TimeoutError when every attempt went unanswered
   *
   * Only silence is retried. Any reply ends the call, whatever method it answers.
   */
  async send(address: string, message: Message, options: SendOptions = {}): Promise<Reply> {
    const payload = encodeMessage(message);
    const request: PendingRequest = {
      address,
      port: options.port ?? WIZ_PORT,
      method: message.method,
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      retry: options.retry ?? DEFAULT_SEND_RETRY,
      slot: new ResultSlot<Reply>(),
      attempts: 0,
      interval: 0,
    };
    request.interval = request.retry.baseInterval;

    this.logger.log('info', `Sending ${request.method} to ${address}:${request.port}`);
    this.logger.log('debug', `Request: ${payload.toString('utf8')}`);

    const transport = await this.openTransport(request);
    const unsubscribe = transport.onMessage((msg, rinfo) => this.handleDatagram(request, msg, rinfo));

    try {
      await this.runAttempts(transport, payload, request);
      return await awaitOutcome(
        request.slot,
        this.graceMs,
        () =>
          new TimeoutError({ address, timeout: request.timeout, attempts: request.attempts })
      );
    } finally {
      unsubscribe();
      await transport.close();
      this.logger.log('trace', 'Socket closed');
    }
  }

  private async openTransport(request: PendingRequest): Promise<DatagramTransport> {
    try {
      return await this.transportFactory({ logger: this.logger });
    } catch (err) {
      this.logger.log('error', `Socket error: ${err instanceof Error ? err.message : String(err)}`);
      if (err instanceof ConnectionError) throw err;
      throw new ConnectionError(`Socket error with ${request.address}:${request.port}`, {
        address: request.address,
        port: request.port,
        cause: err,
      });
    }
  }

  private async runAttempts(
    transport: DatagramTransport,
    payload: Buffer,
    request: PendingRequest
  ): Promise<void> {
    const { slot, retry, address, port, timeout } = request;
    const maxAttempts = retry.maxAttempts;

    while (!slot.isSettled && request.attempts < maxAttempts) {
      request.attempts++;

      let bytesSent: number;
      try {
        bytesSent = await transport.send(payload, port, address);
      } catch (err) {
        this.logger.log('error', `Send failed: ${err instanceof Error ? err.message : String(err)}`);
        slot.fail(
          err instanceof ConnectionError
            ? err
            : new ConnectionError(`Failed to send to ${address}:${port}`, { address, port, cause: err })
        );
        return;
      }

      this.logger.log('debug', `Attempt ${request.attempts}/${maxAttempts}: sent ${bytesSent} bytes`);

      if (bytesSent !== payload.length) {
        this.logger.log('error', `Incomplete send: ${bytesSent}/${payload.length} bytes`);
        slot.fail(new ConnectionError(`Failed to send to ${address}:${port}`, { address, port }));
        return;
      }

      if (await waitForSettle(slot, timeout)) return;
      this.logger.log('debug', `Attempt ${request.attempts} timed out after ${timeout}ms`);

      if (request.attempts < maxAttempts) {
        this.logger.log('trace', `Waiting ${request.interval}ms before retry`);
        // A late reply during the pause still counts
        if (await waitForSettle(slot, request.interval)) return;
        request.interval = retry.nextInterval(request.interval);
      } else {
        this.logger.log('error', `Timeout after ${request.attempts} attempts to ${address}`);
        slot.fail(new TimeoutError({ address, timeout, attempts: request.attempts }));
      }
    }
  }

  private handleDatagram(request: PendingRequest, msg: Buffer, rinfo: RemoteInfo): void {
    const { slot, address, method } = request;
    const decoded = decodeDatagram(msg);
    this.logger.log('debug', `Received from ${rinfo.address}: ${decoded.text}`);

    if (slot.isSettled) {
      this.logger.log('trace', 'Ignoring reply after a result was produced');
      return;
    }

    switch (decoded.kind) {
      case 'invalid':
        this.logger.log('error', `Failed to parse response: ${String(decoded.cause)}`);
        slot.fail(
          new ResponseError(`Failed to parse response from ${address}`, {
            rawResponse: decoded.text,
            cause: decoded.cause,
          })
        );
        return;

      case 'error': {
        const { code } = decoded.error;
        const errorMessage = decoded.error.message ?? 'Unknown error';
        this.logger.log('error', `Error response: code=${code}, message=${errorMessage}`);

        if (code === ERROR_CODE_METHOD_NOT_FOUND) {
          slot.fail(new MethodNotFoundError({ method, address }));
          return;
        }
        slot.fail(
          new ResponseError(`Error from light: ${errorMessage}`, {
            code,
            rawResponse: decoded.text,
          })
        );
        return;
      }

      case 'result':
        this.logger.log('info', `Success: ${method} response from ${address}`);
        slot.succeed({ data: decoded.data, address: rinfo.address, port: rinfo.port, raw: msg });
        return;
    }
  }
}
