/**
 * In-process stand-ins for the serial port and the MQTT broker.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { PortOpenError, ResponseTimeoutError } from "../src/errors.js";
import { addCrc } from "../src/frame.js";
import type { BusClient, PublishOptions } from "../src/publisher.js";
import type { DeviceIdentity } from "../src/session.js";
import type { ControlLines, SerialOptions, SerialTransport } from "../src/transport.js";

export const QPIGS_PAYLOAD =
  "220.0 50.0 230.0 50.0 0345 0300 015 380 52.40 012 085 0035 01.5 120.0 52.45 00000 00010110 00 00 00180 010";
export const QPIRI_PAYLOAD =
  "230.0 21.7 230.0 50.0 21.7 5000 4000 48.0 46.0 42.0 56.4 54.0 2 30 060 0 1 2 1 01 0 0 52.0 0 1";
export const Q1_PAYLOAD =
  "00000 00000 01 01 00 049 048 046 062 00 00 000 0000 0000 0000 00.00 10 0 060 030 100 030 58.40 000 120 0 0000";

/** Build a response frame the way an inverter sends it. */
export function responseFrame(payload: string): Buffer {
  return addCrc(Buffer.from(`(${payload}`, "latin1"));
}

/** QPIGS payload with the given AC output active power. */
export function statusPayload(activePower: number): string {
  const tokens = QPIGS_PAYLOAD.split(" ");
  tokens[5] = String(activePower).padStart(4, "0");
  return tokens.join(" ");
}

export type Reply = Buffer | Error | "timeout" | { hangMs: number };

/** Scripted serial transport: replies are looked up by command mnemonic. */
export class FakeTransport implements SerialTransport {
  public readonly path: string;
  public isOpen = false;
  public opens = 0;
  public readonly requests: string[] = [];
  public readonly controlLines: ControlLines[] = [];

  private failOpens: number;
  private readonly replies = new Map<string, Reply>();
  private readonly queued = new Map<string, Reply[]>();

  constructor(path: string, options: { failOpens?: number } = {}) {
    this.path = path;
    this.failOpens = options.failOpens ?? 0;
  }

  /** Answer `command` with `reply` from now on. */
  respond(command: string, reply: Reply | string): this {
    const value: Reply = typeof reply !== "string" ? reply : reply === "timeout" ? "timeout" : responseFrame(reply);
    this.replies.set(command, value);
    return this;
  }

  /** Answer the next request for `command` with `reply`, then fall back. */
  once(command: string, reply: Reply): this {
    const list = this.queued.get(command) ?? [];
    list.push(reply);
    this.queued.set(command, list);
    return this;
  }

  /** Replies of a healthy PI30 inverter for every query. */
  healthy(activePower = 300): this {
    return this.respond("QPIGS", statusPayload(activePower))
      .respond("QMOD", "L")
      .respond("QPIGS2", "02.1 150.0 00315")
      .respond("Q1", Q1_PAYLOAD)
      .respond("QPIRI", QPIRI_PAYLOAD)
      .respond("QID", "92932105100001")
      .respond("QPI", "PI30")
      .respond("QVFW", "VERFW:00072.70");
  }

  async open(): Promise<void> {
    this.opens++;
    if (this.failOpens > 0) {
      this.failOpens--;
      throw new PortOpenError(this.path, "No such file or directory");
    }
    this.isOpen = true;
  }

  async close(): Promise<void> {
    this.isOpen = false;
  }

  async setControlLines(lines: ControlLines): Promise<void> {
    this.controlLines.push(lines);
  }

  async request(frame: Buffer, timeoutMs: number): Promise<Buffer> {
    const command = frame.subarray(0, frame.length - 3).toString("ascii");
    this.requests.push(command);

    const reply = this.queued.get(command)?.shift() ?? this.replies.get(command) ?? "timeout";
    if (reply === "timeout") throw new ResponseTimeoutError(timeoutMs);
    if (reply instanceof Error) throw reply;
    if (Buffer.isBuffer(reply)) return reply;
    await sleep(Math.min(reply.hangMs, timeoutMs));
    throw new ResponseTimeoutError(timeoutMs);
  }
}

/** Transport factory handing out pre-built fakes by port path. */
export function fakeFactory(transports: Record<string, FakeTransport>): (options: SerialOptions) => SerialTransport {
  return (options) => {
    const transport = transports[options.path];
    if (!transport) throw new Error(`No fake transport for ${options.path}`);
    return transport;
  };
}

export interface PublishedMessage {
  topic: string;
  payload: string;
  retain: boolean;
}

/** Bus that records every publish. */
export class RecordingBus implements BusClient {
  public readonly messages: PublishedMessage[] = [];
  public readonly handlers = new Map<string, (payload: string) => void>();
  public failing = false;
  public connects = 0;
  public disconnects = 0;

  async publish(topic: string, payload: string, options: PublishOptions = {}): Promise<void> {
    if (this.failing) throw new Error("broker unreachable");
    this.messages.push({ topic, payload, retain: options.retain ?? false });
  }

  async subscribe(topic: string, handler: (payload: string) => void): Promise<void> {
    this.handlers.set(topic, handler);
  }

  connect(): void {
    this.connects++;
  }

  async disconnect(): Promise<void> {
    this.disconnects++;
  }

  topics(): string[] {
    return this.messages.map((m) => m.topic);
  }

  /** Payloads published to `topic`, oldest first. */
  payloads(topic: string): string[] {
    return this.messages.filter((m) => m.topic === topic).map((m) => m.payload);
  }

  /** Last payload on `topic`, parsed as JSON. */
  lastJson(topic: string): unknown {
    const payloads = this.payloads(topic);
    const last = payloads[payloads.length - 1];
    if (last === undefined) throw new Error(`Nothing published to ${topic}`);
    return JSON.parse(last);
  }

  clear(): void {
    this.messages.length = 0;
  }
}

export function identity(overrides: Partial<DeviceIdentity> = {}): DeviceIdentity {
  return {
    id: "inverter",
    name: "Inverter",
    path: "/dev/ttyUSB0",
    baudRate: 2400,
    timeoutMs: 100,
    role: "standalone",
    group: "inverter",
    primary: true,
    ...overrides,
  };
}
