export class WizError extends Error {
  suggestions: string[];
  retriable: boolean;

  constructor(
    message: string,
    suggestions: string[] = [],
    retriable = false,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'WizError';
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * Local socket failure: bind, broadcast permission, send error or short write.
 * Never retried by the exchange engine, the socket itself is broken.
 */
export class ConnectionError extends WizError {
  address?: string;
  port?: number;
  code?: string;

  constructor(
    message: string,
    options?: {
      address?: string;
      port?: number;
      code?: string;
      cause?: unknown;
    }
  ) {
    super(
      message,
      [
        'Verify the local network interface is up and has an IPv4 address.',
        'Check firewall rules for outbound UDP traffic.',
        'Broadcast requires permission on some hosts; try a subnet broadcast address.'
      ],
      false,
      options?.cause
    );
    this.name = 'ConnectionError';
    this.address = options?.address;
    this.port = options?.port;
    this.code = options?.code;
  }
}

/**
 * The device stayed silent through every attempt.
 */
export class TimeoutError extends WizError {
  address: string;

  /**
   * Per-attempt timeout (ms)
   */
  timeout: number;

  /**
   * Number of datagrams sent before giving up
   */
  attempts: number;

  constructor(options: { address: string; timeout: number; attempts: number }) {
    super(
      `Light at ${options.address} did not respond after ${options.attempts} attempt${options.attempts === 1 ? '' : 's'} (${options.timeout}ms timeout)`,
      [
        'Confirm the light is powered and joined to the same network.',
        'Increase the per-attempt timeout or the retry count on lossy Wi-Fi.',
        'Run discovery to check whether the light changed its address.'
      ],
      true
    );
    this.name = 'TimeoutError';
    this.address = options.address;
    this.timeout = options.timeout;
    this.attempts = options.attempts;
  }

  /**
   * Alias kept for callers that count attempts as "retries"
   */
  get retryCount(): number {
    return this.attempts;
  }
}

/**
 * The device firmware rejected the method (-32601).
 */
export class MethodNotFoundError extends WizError {
  method: string;
  address: string;

  constructor(options: { method: string; address: string }) {
    super(
      `Method "${options.method}" not supported by light at ${options.address}`,
      [
        'Older firmware lacks some methods; fall back to an older equivalent.',
        'Check the method name spelling.'
      ],
      false
    );
    this.name = 'MethodNotFoundError';
    this.method = options.method;
    this.address = options.address;
  }
}

/**
 * The device answered with an application error, or its reply could not be parsed.
 */
export class ResponseError extends WizError {
  code?: number;
  rawResponse?: string;

  constructor(
    message: string,
    options?: {
      code?: number;
      rawResponse?: string;
      cause?: unknown;
    }
  ) {
    super(
      message,
      [
        'Inspect rawResponse for the device error details.',
        'Verify the params match what the firmware expects.'
      ],
      false,
      options?.cause
    );
    this.name = 'ResponseError';
    this.code = options?.code;
    this.rawResponse = options?.rawResponse;
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends WizError {
  field?: string;
  value?: unknown;

  constructor(
    message: string,
    options?: {
      field?: string;
      value?: unknown;
    }
  ) {
    super(
      message,
      [
        'Check the input format and constraints.',
        'Ensure required fields are provided.'
      ],
      false
    );
    this.name = 'ValidationError';
    this.field = options?.field;
    this.value = options?.value;
  }
}
