/**
 * Polling scheduler.
 *
 * Every device runs in its own async loop, so a slow or absent inverter only
 * delays itself: each query is bounded by the device's read timeout. After a
 * cycle with a successful status snapshot the device state is published,
 * followed by its phase group aggregate when it belongs to one.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { aggregatePhaseGroup, phaseGroups } from "./aggregator.js";
import { describeError, PortIOError } from "./errors.js";
import { type Logger, nullLogger } from "./logger.js";
import type { Publisher, PublishTarget } from "./publisher.js";
import { QueryType, QUERY_DEFINITIONS } from "./queries.js";
import type { DeviceSession } from "./session.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Order in which due queries run within one cycle. */
const CYCLE_ORDER: readonly QueryType[] = [
  QueryType.ProtocolId,
  QueryType.Identity,
  QueryType.Firmware,
  QueryType.RatedSettings,
  QueryType.StatusSnapshot,
  QueryType.PVSecondary,
  QueryType.Mode,
  QueryType.TemperatureAndStage,
];

export interface SchedulerOptions {
  /** Status snapshot interval in milliseconds */
  readIntervalMs: number;
  /** Rated settings refresh interval. Default: 24 h */
  ratedSettingsIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

export interface CycleResult {
  device: string;
  attempted: QueryType[];
  succeeded: QueryType[];
  failed: QueryType[];
  open: boolean;
}

// ---------- Per-device cadence ----------

export class DevicePoller {
  public readonly session: DeviceSession;

  private readonly readIntervalMs: number;
  private readonly ratedSettingsIntervalMs: number;
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly lastRun = new Map<QueryType, number>();
  private readonly startupPending = new Set<QueryType>([
    QueryType.ProtocolId,
    QueryType.Identity,
    QueryType.Firmware,
  ]);

  constructor(session: DeviceSession, options: SchedulerOptions) {
    this.session = session;
    this.readIntervalMs = options.readIntervalMs;
    this.ratedSettingsIntervalMs = options.ratedSettingsIntervalMs ?? DAY_MS;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? nullLogger;
  }

  /** Interval between runs of a query type, or null for startup-only queries. */
  intervalFor(type: QueryType): number | null {
    switch (QUERY_DEFINITIONS[type].cadence) {
      case "frequent":
        return this.readIntervalMs;
      case "periodic":
        return Math.max(2 * this.readIntervalMs, this.readIntervalMs);
      case "once-then-daily":
        return this.ratedSettingsIntervalMs;
      case "startup":
        return null;
    }
  }

  /** Query types due at `at`, in execution order. */
  dueQueries(at: number = this.now()): QueryType[] {
    return CYCLE_ORDER.filter((type) => {
      if (!this.session.isSupported(type)) return false;
      const interval = this.intervalFor(type);
      if (interval === null) return this.startupPending.has(type);
      const last = this.lastRun.get(type);
      return last === undefined || at - last >= interval;
    });
  }

  /**
   * Run one polling cycle: open the port if needed, then issue every due
   * query. Failures are logged and skipped.
   */
  async runCycle(): Promise<CycleResult> {
    const result: CycleResult = {
      device: this.session.identity.id,
      attempted: [],
      succeeded: [],
      failed: [],
      open: false,
    };

    if (!(await this.session.ensureOpen())) {
      return result;
    }
    result.open = true;

    const startedAt = this.now();
    for (const type of this.dueQueries(startedAt)) {
      result.attempted.push(type);
      this.lastRun.set(type, startedAt);
      try {
        await this.session.query(type);
        result.succeeded.push(type);
        this.startupPending.delete(type);
      } catch (err) {
        result.failed.push(type);
        if (!this.session.isSupported(type)) this.startupPending.delete(type);
        this.log.warn(`${QUERY_DEFINITIONS[type].command} failed: ${describeError(err)}`);
        if (err instanceof PortIOError) {
          result.open = false;
          break;
        }
      }
    }
    return result;
  }

  /** Delay before the next cycle, given when the last one started. */
  nextDelay(cycleStartedAt: number): number {
    if (!this.session.isOpen) {
      return Math.min(this.readIntervalMs, Math.max(this.session.openDelay(), 100));
    }
    return Math.max(0, cycleStartedAt + this.readIntervalMs - this.now());
  }
}

// ---------- Scheduler ----------

export class Scheduler {
  public readonly pollers: readonly DevicePoller[];

  private readonly publisher: Publisher;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly groups: Map<string, DevicePoller[]>;
  private readonly abort = new AbortController();
  private loops: Promise<void>[] = [];
  private running = false;

  constructor(sessions: readonly DeviceSession[], publisher: Publisher, options: SchedulerOptions) {
    this.publisher = publisher;
    this.log = options.logger ?? nullLogger;
    this.now = options.now ?? Date.now;
    this.pollers = sessions.map(
      (session) => new DevicePoller(session, { ...options, logger: options.logger })
    );

    const grouped = phaseGroups(sessions.map((s) => s.identity));
    this.groups = new Map();
    for (const [group, members] of grouped) {
      const ids = new Set(members.map((m) => m.id));
      this.groups.set(
        group,
        this.pollers.filter((p) => ids.has(p.session.identity.id))
      );
    }

    for (const poller of this.pollers) {
      poller.session.on("availability", (available: boolean) => {
        this.onAvailability(poller, available).catch((err: unknown) => {
          this.log.error(`Availability update for ${poller.session.identity.name} failed: ${describeError(err)}`);
        });
      });
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Start one polling loop per device. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.loops = this.pollers.map((poller) => this.runLoop(poller));
    this.log.info(`Polling ${this.pollers.length} device(s)`);
  }

  /**
   * Stop every loop. In-flight queries finish or time out first, then every
   * session is closed.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.abort.abort();
    await Promise.all(this.loops);
    await Promise.all(this.pollers.map((p) => p.session.close()));
    this.loops = [];
    this.log.info("Polling stopped");
  }

  /** Run a single cycle of every device concurrently and publish the results. */
  async runCycleAll(): Promise<CycleResult[]> {
    return Promise.all(this.pollers.map((poller) => this.cycle(poller)));
  }

  private async cycle(poller: DevicePoller): Promise<CycleResult> {
    const result = await poller.runCycle();
    if (result.succeeded.includes(QueryType.StatusSnapshot)) {
      await this.publishDevice(poller);
    }
    return result;
  }

  private async runLoop(poller: DevicePoller): Promise<void> {
    while (this.running) {
      const startedAt = this.now();
      try {
        await this.cycle(poller);
      } catch (err) {
        this.log.error(`Cycle for ${poller.session.identity.name} failed: ${describeError(err)}`);
      }
      if (!this.running) break;
      try {
        await sleep(poller.nextDelay(startedAt), undefined, { signal: this.abort.signal });
      } catch (err) {
        if (!this.abort.signal.aborted) throw err;
      }
    }
  }

  private async publishDevice(poller: DevicePoller): Promise<void> {
    await this.publisher.publishDeviceState(poller.session.snapshot());
    await this.publishGroup(poller.session.identity.group);
  }

  private async publishGroup(group: string): Promise<void> {
    const members = this.groups.get(group);
    if (!members) return;
    const snapshots = members.map((p) => p.session.snapshot());
    const aggregate = aggregatePhaseGroup(group, snapshots, new Date(this.now()));
    await this.publisher.publishState({ kind: "system", group }, aggregate);
  }

  private async onAvailability(poller: DevicePoller, available: boolean): Promise<void> {
    const target: PublishTarget = { kind: "device", identity: poller.session.identity };
    await this.publisher.setAvailability(target, available);
    if (!available) {
      // Drop the member from its group right away instead of on the next read
      await this.publishGroup(poller.session.identity.group);
    }
  }
}
