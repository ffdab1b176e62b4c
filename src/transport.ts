/**
 * Serial transport.
 *
 * The session talks to the inverter through `SerialTransport`, a
 * request/response channel over CR terminated frames. `SerialPortTransport`
 * implements it on top of the `serialport` package.
 */

import { DelimiterParser, SerialPort } from "serialport";
import { PortIOError, PortOpenError, ResponseTimeoutError } from "./errors.js";
import { FRAME_END } from "./frame.js";
import { type Logger, nullLogger } from "./logger.js";

export interface ControlLines {
  dtr: boolean;
  rts: boolean;
}

export interface SerialOptions {
  path: string;
  baudRate: number;
}

export interface SerialTransport {
  readonly path: string;
  readonly isOpen: boolean;
  /** @throws PortOpenError */
  open(): Promise<void>;
  close(): Promise<void>;
  setControlLines(lines: ControlLines): Promise<void>;
  /**
   * Write a frame and resolve with the next CR terminated frame received.
   *
   * @throws ResponseTimeoutError  nothing arrived within `timeoutMs`
   * @throws PortIOError           the port failed or went away
   */
  request(frame: Buffer, timeoutMs: number): Promise<Buffer>;
}

export type TransportFactory = (options: SerialOptions) => SerialTransport;

interface PendingRequest {
  resolve: (frame: Buffer) => void;
  reject: (err: Error) => void;
}

export class SerialPortTransport implements SerialTransport {
  public readonly path: string;
  public readonly baudRate: number;

  private readonly log: Logger;
  private port: SerialPort | null = null;
  private pending: PendingRequest | null = null;

  constructor(options: SerialOptions, logger: Logger = nullLogger) {
    this.path = options.path;
    this.baudRate = options.baudRate;
    this.log = logger;
  }

  get isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  async open(): Promise<void> {
    if (this.isOpen) return;

    const port = new SerialPort({ path: this.path, baudRate: this.baudRate, autoOpen: false });
    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(new PortOpenError(this.path, err));
        } else {
          resolve();
        }
      });
    });

    const parser = port.pipe(new DelimiterParser({ delimiter: Buffer.from([FRAME_END]), includeDelimiter: true }));
    parser.on("data", (frame: Buffer) => this.onFrame(frame));

    port.on("error", (err: Error) => {
      this.log.debug(`Serial error on ${this.path}: ${err.message}`);
      this.failPending(new PortIOError(this.path, err));
    });
    port.on("close", (err?: Error | null) => {
      this.log.debug(`Serial port ${this.path} closed`);
      this.failPending(new PortIOError(this.path, err ?? "port closed"));
      if (this.port === port) this.port = null;
    });

    this.port = port;
    this.log.debug(`Opened ${this.path} @ ${this.baudRate} baud`);
  }

  async close(): Promise<void> {
    const port = this.port;
    this.port = null;
    if (!port || !port.isOpen) return;

    await new Promise<void>((resolve) => {
      port.close((err) => {
        if (err) this.log.debug(`Closing ${this.path} failed: ${err.message}`);
        resolve();
      });
    });
  }

  async setControlLines(lines: ControlLines): Promise<void> {
    const port = this.requirePort();
    await new Promise<void>((resolve, reject) => {
      port.set({ dtr: lines.dtr, rts: lines.rts }, (err) => {
        if (err) {
          reject(new PortIOError(this.path, err));
        } else {
          resolve();
        }
      });
    });
  }

  async request(frame: Buffer, timeoutMs: number): Promise<Buffer> {
    const port = this.requirePort();
    if (this.pending) {
      throw new PortIOError(this.path, "a request is already in flight");
    }

    // Drop anything a previous, timed out request left behind
    await new Promise<void>((resolve) => {
      port.flush((err) => {
        if (err) this.log.debug(`Flush on ${this.path} failed: ${err.message}`);
        resolve();
      });
    });

    this.log.debug(`[${this.path}] SENT: ${frame.toString("hex")}`);

    return new Promise<Buffer>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pending = null;
        reject(new ResponseTimeoutError(timeoutMs));
      }, timeoutMs);

      this.pending = {
        resolve: (data: Buffer) => {
          clearTimeout(timeout);
          this.pending = null;
          resolve(data);
        },
        reject: (err: Error) => {
          clearTimeout(timeout);
          this.pending = null;
          reject(err);
        },
      };

      port.write(frame, (err) => {
        if (err) this.failPending(new PortIOError(this.path, err));
      });
    });
  }

  private onFrame(frame: Buffer): void {
    this.log.debug(`[${this.path}] RECD: ${frame.toString("hex")}`);
    if (this.pending) {
      this.pending.resolve(frame);
    } else {
      this.log.debug(`[DISCARDED] ${this.path}: ${frame.toString("hex")}`);
    }
  }

  private failPending(err: Error): void {
    if (this.pending) {
      this.pending.reject(err);
    }
  }

  private requirePort(): SerialPort {
    if (!this.port || !this.port.isOpen) {
      throw new PortIOError(this.path, "port is not open");
    }
    return this.port;
  }
}

export const createSerialPortTransport =
  (logger: Logger = nullLogger): TransportFactory =>
  (options) =>
    new SerialPortTransport(options, logger);
