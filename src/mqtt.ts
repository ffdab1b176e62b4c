/**
 * MQTT bus client.
 *
 * Thin `BusClient` over the `mqtt` package. The broker connection is kept
 * alive by the library's own reconnect loop; the bridge availability topic is
 * registered as the last will and set back online on every (re)connect.
 */

import { connect, type IClientOptions, type MqttClient } from "mqtt";
import { describeError, PublishError } from "./errors.js";
import { type Logger, nullLogger } from "./logger.js";
import type { BusClient, PublishOptions } from "./publisher.js";
import { OFFLINE, ONLINE } from "./publisher.js";

export interface MqttBusOptions {
  host: string;
  /** Default: 1883 */
  port?: number;
  username?: string;
  password?: string;
  /** Default: pi30-bridge-<random> */
  clientId?: string;
  /** Topic carrying the retained online/offline state of the bridge */
  availabilityTopic: string;
  /** Delay between reconnect attempts in milliseconds. Default: 5000 */
  reconnectPeriodMs?: number;
  logger?: Logger;
  /** Called after every successful (re)connect, once availability is online */
  onConnect?: () => Promise<void>;
}

export class MqttBusClient implements BusClient {
  private readonly options: MqttBusOptions;
  private readonly log: Logger;
  private readonly handlers = new Map<string, (payload: string) => void>();
  private client: MqttClient | null = null;

  constructor(options: MqttBusOptions) {
    this.options = options;
    this.log = options.logger ?? nullLogger;
  }

  get connected(): boolean {
    return this.client?.connected ?? false;
  }

  get url(): string {
    return `mqtt://${this.options.host}:${this.options.port ?? 1883}`;
  }

  /** Start connecting. Returns at once; the client keeps retrying in the background. */
  connect(): void {
    if (this.client) return;

    const opts: IClientOptions = {
      clientId: this.options.clientId ?? `pi30-bridge-${Math.random().toString(16).slice(2, 10)}`,
      clean: true,
      connectTimeout: 30_000,
      reconnectPeriod: this.options.reconnectPeriodMs ?? 5000,
      will: {
        topic: this.options.availabilityTopic,
        payload: Buffer.from(OFFLINE),
        qos: 1,
        retain: true,
      },
    };
    if (this.options.username) {
      opts.username = this.options.username;
      opts.password = this.options.password;
    }

    this.log.info(`Connecting to MQTT broker at ${this.url}...`);
    const client = connect(this.url, opts);
    this.client = client;

    client.on("connect", () => {
      this.log.info("Connected to MQTT broker");
      this.onConnected().catch((err: unknown) => {
        this.log.error(`Post-connect setup failed: ${describeError(err)}`);
      });
    });
    client.on("reconnect", () => this.log.debug("Reconnecting to MQTT broker"));
    client.on("offline", () => this.log.warn("MQTT client went offline"));
    client.on("error", (err: Error) => this.log.warn(`MQTT error: ${err.message}`));
    client.on("message", (topic: string, message: Buffer) => {
      const handler = this.handlers.get(topic);
      if (handler) handler(message.toString());
    });
  }

  async publish(topic: string, payload: string, options: PublishOptions = {}): Promise<void> {
    const client = this.client;
    if (!client || !client.connected) {
      throw new PublishError(topic, "not connected to the broker");
    }
    try {
      await client.publishAsync(topic, payload, { retain: options.retain ?? false, qos: options.qos ?? 0 });
    } catch (err) {
      throw new PublishError(topic, err);
    }
  }

  async subscribe(topic: string, handler: (payload: string) => void): Promise<void> {
    this.handlers.set(topic, handler);
    if (this.client?.connected) {
      await this.client.subscribeAsync(topic, { qos: 1 });
      this.log.debug(`Subscribed to ${topic}`);
    }
    // Otherwise the subscription is made on connect
  }

  /** Mark the bridge offline and disconnect. */
  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;
    if (client.connected) {
      try {
        await client.publishAsync(this.options.availabilityTopic, OFFLINE, { retain: true, qos: 1 });
      } catch (err) {
        this.log.warn(`Could not publish offline state: ${describeError(err)}`);
      }
    }
    await client.endAsync();
    this.client = null;
    this.log.info("Disconnected from MQTT broker");
  }

  private async onConnected(): Promise<void> {
    const client = this.client;
    if (!client) return;
    for (const topic of this.handlers.keys()) {
      await client.subscribeAsync(topic, { qos: 1 });
      this.log.debug(`Subscribed to ${topic}`);
    }
    await client.publishAsync(this.options.availabilityTopic, ONLINE, { retain: true, qos: 1 });
    if (this.options.onConnect) {
      await this.options.onConnect();
    }
  }
}
