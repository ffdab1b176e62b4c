/**
 * Bridge: wires configuration, serial sessions, the scheduler and the MQTT
 * publisher together and owns their lifecycle.
 */

import type { BridgeConfig } from "./config.js";
import { describeError } from "./errors.js";
import { childLogger, type Logger, nullLogger } from "./logger.js";
import { MqttBusClient } from "./mqtt.js";
import { type BusClient, ONLINE, Publisher } from "./publisher.js";
import { Scheduler } from "./scheduler.js";
import { DeviceSession } from "./session.js";
import { createSerialPortTransport, type TransportFactory } from "./transport.js";

export const VERSION = "0.2.0";

/** A bus the bridge can connect and disconnect. */
export interface BusConnection extends BusClient {
  connect(): void;
  disconnect(): Promise<void>;
}

export interface BridgeOptions {
  logger?: Logger;
  /** Default: serialport backed transports */
  transportFactory?: TransportFactory;
  /**
   * Default: an MQTT client for `config.mqtt`. A bus passed in here must call
   * `handleBusConnect()` itself after every (re)connect.
   */
  bus?: BusConnection;
  now?: () => number;
}

export class Bridge {
  public readonly config: BridgeConfig;
  public readonly publisher: Publisher;
  public readonly sessions: readonly DeviceSession[];
  public readonly scheduler: Scheduler;

  private readonly log: Logger;
  private readonly bus: BusConnection;
  private started = false;

  constructor(config: BridgeConfig, options: BridgeOptions = {}) {
    this.config = config;
    this.log = options.logger ?? nullLogger;

    const bridgeTopic = `${config.baseTopic}/bridge/availability`;
    this.bus =
      options.bus ??
      new MqttBusClient({
        host: config.mqtt.host,
        port: config.mqtt.port,
        username: config.mqtt.username,
        password: config.mqtt.password,
        availabilityTopic: bridgeTopic,
        logger: childLogger(this.log, "mqtt"),
        onConnect: () => this.handleBusConnect(),
      });

    this.publisher = new Publisher(this.bus, {
      discoveryPrefix: config.discoveryPrefix,
      baseTopic: config.baseTopic,
      legacyTopic: config.legacyTopic,
      swVersion: VERSION,
      logger: childLogger(this.log, "publisher"),
    });

    const transportFactory = options.transportFactory ?? createSerialPortTransport(this.log);
    this.sessions = config.devices.map(
      (identity) =>
        new DeviceSession(identity, {
          transportFactory,
          logger: childLogger(this.log, identity.name),
          failureThreshold: config.failureThreshold,
          openBackoffMs: config.openBackoffMs,
          maxOpenBackoffMs: config.maxOpenBackoffMs,
          now: options.now,
        })
    );

    this.scheduler = new Scheduler(this.sessions, this.publisher, {
      readIntervalMs: config.readIntervalMs,
      logger: this.log,
      now: options.now,
    });
  }

  get statusTopic(): string {
    return `${this.config.discoveryPrefix}/status`;
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    for (const device of this.config.devices) {
      this.log.info(`Device ${device.name} (${device.id}): ${device.path} @ ${device.baudRate} baud, role ${device.role}`);
    }

    // Home Assistant drops discovered entities when it restarts; its birth
    // message asks us to announce them again
    await this.bus.subscribe(this.statusTopic, (payload) => {
      if (payload.trim() !== ONLINE) return;
      this.log.info("Home Assistant came online, re-announcing discovery");
      this.publisher.reannounce().catch((err: unknown) => {
        this.log.error(`Re-announcement failed: ${describeError(err)}`);
      });
    });
    this.bus.connect();
    this.scheduler.start();
  }

  /** Called after every broker (re)connect. */
  async handleBusConnect(): Promise<void> {
    await this.publisher.reannounce();
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    await this.scheduler.stop();
    await this.bus.disconnect();
  }
}

/** Stop the bridge on SIGINT/SIGTERM. Resolves once it has stopped. */
export function runUntilSignalled(bridge: Bridge, logger: Logger = nullLogger): Promise<void> {
  return new Promise((resolve, reject) => {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info(`Received ${signal}, shutting down`);
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      bridge.stop().then(resolve, reject);
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });
}
