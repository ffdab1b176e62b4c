/**
 * Device session: one serial connection to one inverter.
 *
 * State machine:
 *
 *   closed -> opening -> open -> (reading <-> idle) -> closed
 *
 * A failed open leaves the session closed and schedules the next attempt with
 * exponential backoff capped at `maxOpenBackoffMs`; attempts never stop. A
 * failed query bumps the consecutive-failure counter and clears availability
 * once `failureThreshold` is reached. Only a `PortIOError` closes the
 * connection.
 */

import { EventEmitter } from "node:events";
import { setTimeout as delay } from "node:timers/promises";
import { decodeTokens, type MetricSet } from "./decoders.js";
import { CommandRejectedError, describeError, PortIOError } from "./errors.js";
import { decodeResponse, encode } from "./frame.js";
import { type Logger, nullLogger } from "./logger.js";
import { QueryType, QUERY_DEFINITIONS } from "./queries.js";
import type { SerialTransport, TransportFactory } from "./transport.js";

// ---------- Device identity & state ----------

export type PhaseRole = "standalone" | "L1" | "L2" | "L3";

export interface DeviceIdentity {
  /** Slug used in topics and unique ids */
  readonly id: string;
  readonly name: string;
  readonly path: string;
  readonly baudRate: number;
  readonly timeoutMs: number;
  readonly role: PhaseRole;
  /** Phase group the device aggregates into */
  readonly group: string;
  /** First configured device; also served on the legacy topics */
  readonly primary: boolean;
}

export type SessionState = "closed" | "opening" | "open" | "reading" | "idle";

export interface DeviceState {
  readonly identity: DeviceIdentity;
  readonly sessionState: SessionState;
  readonly available: boolean;
  readonly consecutiveFailures: number;
  readonly lastSuccessAt: Date | null;
  readonly readings: Readonly<Partial<Record<QueryType, MetricSet>>>;
  readonly unsupported: readonly QueryType[];
}

// ---------- Options ----------

export interface DeviceSessionOptions {
  transportFactory: TransportFactory;
  logger?: Logger;
  /** Consecutive failures before the device is marked unavailable. Default: 3 */
  failureThreshold?: number;
  /** First reopen delay in milliseconds. Default: 1000 */
  openBackoffMs?: number;
  /** Reopen delay ceiling in milliseconds. Default: 60000 */
  maxOpenBackoffMs?: number;
  /** Pause between the two control-line transitions. Default: 50 */
  wakeDelayMs?: number;
  /** Clock used for backoff bookkeeping. Default: Date.now */
  now?: () => number;
}

export const DEFAULT_FAILURE_THRESHOLD = 3;
export const DEFAULT_OPEN_BACKOFF_MS = 1000;
export const DEFAULT_MAX_OPEN_BACKOFF_MS = 60_000;

// ---------- Session ----------

/**
 * Events:
 * - `availability` (available: boolean)
 * - `open` ()
 * - `openFailed` (err: Error, attempt: number, retryInMs: number)
 * - `closed` (reason: string)
 */
export class DeviceSession extends EventEmitter {
  public readonly identity: DeviceIdentity;
  public readonly failureThreshold: number;
  public readonly openBackoffMs: number;
  public readonly maxOpenBackoffMs: number;

  private readonly log: Logger;
  private readonly transport: SerialTransport;
  private readonly wakeDelayMs: number;
  private readonly now: () => number;

  private _state: SessionState = "closed";
  private _available = false;
  private consecutiveFailures = 0;
  private openFailures = 0;
  private nextOpenAt = 0;
  private lastSuccessAt: Date | null = null;
  private readings: Partial<Record<QueryType, MetricSet>> = {};
  private readonly unsupported = new Set<QueryType>();

  constructor(identity: DeviceIdentity, options: DeviceSessionOptions) {
    super();
    this.identity = identity;
    this.log = options.logger ?? nullLogger;
    this.failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.openBackoffMs = options.openBackoffMs ?? DEFAULT_OPEN_BACKOFF_MS;
    this.maxOpenBackoffMs = options.maxOpenBackoffMs ?? DEFAULT_MAX_OPEN_BACKOFF_MS;
    this.wakeDelayMs = options.wakeDelayMs ?? 50;
    this.now = options.now ?? Date.now;
    this.transport = options.transportFactory({ path: identity.path, baudRate: identity.baudRate });
  }

  get state(): SessionState {
    return this._state;
  }

  get available(): boolean {
    return this._available;
  }

  get isOpen(): boolean {
    return this._state === "open" || this._state === "reading" || this._state === "idle";
  }

  /** Milliseconds until the next open attempt is allowed (0 when due). */
  openDelay(): number {
    return Math.max(0, this.nextOpenAt - this.now());
  }

  /** Delay before reopen attempt number `attempt + 1` after `attempt` failures. */
  backoffFor(attempt: number): number {
    return Math.min(this.openBackoffMs * 2 ** Math.max(0, attempt - 1), this.maxOpenBackoffMs);
  }

  isSupported(type: QueryType): boolean {
    return !this.unsupported.has(type);
  }

  // ---------- Connection management ----------

  /**
   * Make one attempt to open the port. Never throws: a failure is logged,
   * counted and schedules the next attempt.
   *
   * @returns true when the session is open afterwards
   */
  async open(): Promise<boolean> {
    if (this.isOpen) return true;
    if (this._state === "opening") return false;

    this._state = "opening";
    try {
      await this.transport.open();
    } catch (err) {
      this.openFailures++;
      const retryIn = this.backoffFor(this.openFailures);
      this.nextOpenAt = this.now() + retryIn;
      this._state = "closed";
      this.log.warn(
        `Open attempt ${this.openFailures} on ${this.identity.path} failed: ${describeError(err)}; retrying in ${retryIn} ms`
      );
      this.countFailure();
      this.emit("openFailed", err, this.openFailures, retryIn);
      return false;
    }

    await this.wake();
    this.openFailures = 0;
    this.nextOpenAt = 0;
    this._state = "open";
    this.log.info(`Opened ${this.identity.path} @ ${this.identity.baudRate} baud`);
    this.emit("open");
    return true;
  }

  /** Open the port if it is closed and the backoff delay has elapsed. */
  async ensureOpen(): Promise<boolean> {
    if (this.isOpen) return true;
    if (this._state === "opening" || this.openDelay() > 0) return false;
    return this.open();
  }

  async close(reason = "shutdown"): Promise<void> {
    const wasOpen = this._state !== "closed";
    this._state = "closed";
    try {
      await this.transport.close();
    } catch (err) {
      this.log.debug(`Closing ${this.identity.path} failed: ${describeError(err)}`);
    }
    if (wasOpen) {
      this.log.info(`Closed ${this.identity.path} (${reason})`);
      this.emit("closed", reason);
    }
  }

  /** Toggle DTR/RTS low then high; some adapters only answer after this. */
  private async wake(): Promise<void> {
    try {
      await this.transport.setControlLines({ dtr: false, rts: false });
      await delay(this.wakeDelayMs);
      await this.transport.setControlLines({ dtr: true, rts: true });
    } catch (err) {
      this.log.debug(`Control line toggle on ${this.identity.path} failed: ${describeError(err)}`);
    }
  }

  // ---------- Queries ----------

  /**
   * Send a query and decode the response.
   *
   * @throws any protocol or transport error; the failure has already been
   *         counted when it reaches the caller
   */
  async query(type: QueryType): Promise<MetricSet> {
    const { command } = QUERY_DEFINITIONS[type];
    if (!this.isOpen) {
      const err = new PortIOError(this.identity.path, "session is not open");
      this.countFailure();
      throw err;
    }

    this._state = "reading";
    try {
      const response = await this.transport.request(encode(type), this.identity.timeoutMs);
      const metrics = decodeTokens(type, decodeResponse(response, command));
      this.recordSuccess(type, metrics);
      return metrics;
    } catch (err) {
      if (err instanceof CommandRejectedError) {
        // The inverter is alive, it just does not know the command
        this.unsupported.add(type);
        this.log.info(`${command} is not supported by ${this.identity.name}; no longer polling it`);
      } else {
        this.countFailure();
        if (err instanceof PortIOError) {
          await this.close("I/O error");
        }
      }
      throw err;
    } finally {
      if (this._state === "reading") this._state = "idle";
    }
  }

  private recordSuccess(type: QueryType, metrics: MetricSet): void {
    this.consecutiveFailures = 0;
    this.lastSuccessAt = new Date(this.now());
    this.readings = { ...this.readings, [type]: metrics };
    this.setAvailable(true);
  }

  private countFailure(): void {
    this.consecutiveFailures++;
    if (this.consecutiveFailures >= this.failureThreshold) {
      this.setAvailable(false);
    }
  }

  private setAvailable(available: boolean): void {
    if (this._available === available) return;
    this._available = available;
    this.log.info(`${this.identity.name} is now ${available ? "available" : "unavailable"}`);
    this.emit("availability", available);
  }

  /** Consistent, frozen copy of the device state. */
  snapshot(): DeviceState {
    return Object.freeze({
      identity: this.identity,
      sessionState: this._state,
      available: this._available,
      consecutiveFailures: this.consecutiveFailures,
      lastSuccessAt: this.lastSuccessAt,
      readings: Object.freeze({ ...this.readings }),
      unsupported: Object.freeze([...this.unsupported]),
    });
  }
}
