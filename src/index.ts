/**
 * wizlink
 *
 * UDP/JSON client for WiZ-style smart lights.
 */

export { Client, createClient } from './client.js';
export { DEFAULT_CLIENT_OPTIONS, detectLogger, resolveClientOptions } from './config.js';
export type { ClientOptions, ResolvedClientOptions } from './config.js';

export { Exchange } from './protocol/exchange.js';
export type { ExchangeOptions } from './protocol/exchange.js';
export { decodeDatagram, encodeMessage, resultOf } from './protocol/codec.js';
export type { DecodedDatagram, ErrorObject } from './protocol/codec.js';

export {
  DiscoveryCollector,
  buildRegistrationMessage,
  listIPv4Interfaces,
  parseRegistrationReply,
} from './discovery/collector.js';

export { RetryPolicy, DEFAULT_DISCOVERY_RETRY, DEFAULT_SEND_RETRY } from './retry/policy.js';
export type { RetryPolicyInit, RetryStrategy } from './retry/policy.js';

export { ResultSlot, awaitOutcome, waitForSettle } from './core/result-slot.js';
export type { SlotOutcome, SlotState } from './core/result-slot.js';

export {
  WizError,
  ConnectionError,
  TimeoutError,
  MethodNotFoundError,
  ResponseError,
  ValidationError,
} from './core/errors.js';

export { UdpTransport, openUdpTransport } from './transport/udp.js';
export type { UdpTransportOptions } from './transport/udp.js';

export { Light } from './device/light.js';
export type { LightOptions, WhiteBalance } from './device/light.js';
export {
  runOnGroup,
  getGroupStates,
  turnOnGroup,
  turnOffGroup,
  toggleGroup,
  setGroupBrightness,
  setGroupColor,
  setGroupTemperature,
  setGroupWarmWhite,
  setGroupColdWhite,
  setGroupWhite,
  setGroupSpeed,
} from './device/group.js';
export type { GroupOperationResult } from './device/group.js';
export {
  buildSetPilot,
  parsePilotState,
  parseSystemConfig,
  pilotParamsSchema,
  pilotStateSchema,
  systemConfigSchema,
} from './device/pilot.js';
export type { PilotParams, PilotState, SystemConfig } from './device/pilot.js';

export {
  LOG_LEVELS,
  consoleLogger,
  createLevelLogger,
  fromLogger,
  isEnabled,
  silentLogger,
} from './types/logger.js';
export type { LogLevel, LogSink, Logger } from './types/logger.js';

export type {
  DatagramListener,
  DatagramTransport,
  DiscoverAllOptions,
  DiscoverOptions,
  DiscoveredDevice,
  EngineOptions,
  InterfaceAddress,
  Message,
  Reply,
  SendOptions,
  TransportFactory,
  TransportOpenOptions,
} from './types/udp.js';

export * from './constants.js';
