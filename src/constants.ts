/**
 * Global constants for wizlink
 * Centralizes protocol keys, magic numbers and configuration defaults
 */

// Network
export const WIZ_PORT = 38899;
export const DEFAULT_BROADCAST_ADDRESS = '255.255.255.255';

// Timeouts
export const DEFAULT_TIMEOUT_MS = 3000; // Per attempt, point-to-point
export const DEFAULT_DISCOVERY_TIMEOUT_MS = 10000; // Total window
export const RESULT_GRACE_MS = 1000;

// Retry defaults
export const DEFAULT_SEND_RETRIES = 5;
export const DEFAULT_SEND_INTERVAL_MS = 750;
export const DEFAULT_DISCOVERY_RETRIES = 5;
export const DEFAULT_DISCOVERY_INTERVAL_MS = 500;
export const DEFAULT_MAX_BACKOFF_MS = 3000;

// setTimeout stores delays as a signed 32-bit integer
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

// Max UDP payload over IPv4
export const MAX_DATAGRAM_SIZE = 65507;

// Methods
export const METHOD_GET_PILOT = 'getPilot';
export const METHOD_SET_PILOT = 'setPilot';
export const METHOD_REGISTRATION = 'registration';
export const METHOD_GET_SYSTEM_CONFIG = 'getSystemConfig';
export const METHOD_GET_USER_CONFIG = 'getUserConfig';
export const METHOD_GET_MODEL_CONFIG = 'getModelConfig';
export const METHOD_REBOOT = 'reboot';
export const METHOD_RESET = 'reset';

// Message keys
export const KEY_RESULT = 'result';
export const KEY_ERROR = 'error';

// JSON-RPC style error codes
export const ERROR_CODE_METHOD_NOT_FOUND = -32601;

// Registration placeholders; devices answer regardless of these values
export const DISCOVERY_PHONE_MAC = 'AAAAAAAAAAAA';
export const DISCOVERY_PHONE_IP = '1.2.3.4';
export const DISCOVERY_REQUEST_ID = '1';
