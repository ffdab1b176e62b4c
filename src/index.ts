/**
 * pi30-mqtt-bridge – poll PI30 protocol inverters over serial and publish
 * their readings to MQTT with Home Assistant discovery.
 */

// Frame codec
export { FRAME_START, FRAME_END, crcPi, addCrc, encodeCommand, encode, decodeResponse, formatFrame } from "./frame.js";

// Queries & decoders
export { QueryType, QUERY_DEFINITIONS, ALL_QUERY_TYPES, parseQueryType, queriesWithCadence } from "./queries.js";
export type { Cadence, QueryDefinition } from "./queries.js";

export {
  LAYOUTS,
  METRIC_DESCRIPTORS,
  parseLayouts,
  decodeTokens,
  decodeStatusSnapshot,
  decodeRatedSettings,
  decodeTemperatureAndStage,
  decodeMode,
  decodeIdentity,
  decodeProtocolId,
  decodeFirmware,
  decodePVSecondary,
  formatMetric,
  metricJsonValue,
} from "./decoders.js";
export type { MetricValue, MetricKind, MetricSet, FieldLayout, LayoutTable, MetricDescriptor } from "./decoders.js";

// Errors
export {
  Pi30Error,
  FramingError,
  ChecksumError,
  CommandRejectedError,
  TokenCountError,
  FieldFormatError,
  ResponseTimeoutError,
  PortOpenError,
  PortIOError,
  PublishError,
  ConfigError,
  describeError,
} from "./errors.js";
export type { ErrorCategory } from "./errors.js";

// Serial transport & sessions
export { SerialPortTransport, createSerialPortTransport } from "./transport.js";
export type { ControlLines, SerialOptions, SerialTransport, TransportFactory } from "./transport.js";

export { DeviceSession } from "./session.js";
export type { DeviceIdentity, DeviceState, DeviceSessionOptions, PhaseRole, SessionState } from "./session.js";

// Scheduling & aggregation
export { Scheduler, DevicePoller } from "./scheduler.js";
export type { SchedulerOptions, CycleResult } from "./scheduler.js";

export { aggregatePhaseGroup, phaseGroups } from "./aggregator.js";
export type { SystemAggregate } from "./aggregator.js";

// Publishing
export { Publisher, ONLINE, OFFLINE } from "./publisher.js";
export type { BusClient, PublishOptions, PublishTarget, DiscoveryPayload, DiscoveryRecord, PublisherOptions } from "./publisher.js";

export { MqttBusClient } from "./mqtt.js";
export type { MqttBusOptions } from "./mqtt.js";

// Configuration, logging & the bridge
export { loadConfig, buildConfig, parseOptions, resolveByIdPath } from "./config.js";
export type { BridgeConfig, PathResolver } from "./config.js";

export { createConsoleLogger, childLogger, nullLogger, parseLogLevel } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";

export { Bridge, runUntilSignalled } from "./bridge.js";
export type { BridgeOptions, BusConnection } from "./bridge.js";
