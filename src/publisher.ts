/**
 * MQTT publication with Home Assistant discovery.
 *
 * Topics (defaults):
 *
 *   homeassistant/<sensor|binary_sensor>/pi30_<node>/<metric>/config   discovery, retained
 *   pi30/<node>/state                                                  JSON state, retained
 *   pi30/<node>/availability                                           online | offline, retained
 *   pi30/bridge/availability                                           bridge last will
 *
 * `<node>` is a device id or `system_<group>` for a phase group. The primary
 * device is additionally served on the single-device legacy layout
 * (`<legacyTopic>/<key>`, `<legacyTopic>/availability`).
 */

import type { SystemAggregate } from "./aggregator.js";
import {
  formatMetric,
  type MetricDescriptor,
  METRIC_DESCRIPTORS,
  metricJsonValue,
  type MetricSet,
  type MetricValue,
} from "./decoders.js";
import { PublishError } from "./errors.js";
import { type Logger, nullLogger } from "./logger.js";
import { QueryType } from "./queries.js";
import type { DeviceIdentity, DeviceState } from "./session.js";

// ---------- Bus client ----------

export interface PublishOptions {
  retain?: boolean;
  qos?: 0 | 1 | 2;
}

export interface BusClient {
  publish(topic: string, payload: string, options?: PublishOptions): Promise<void>;
  subscribe(topic: string, handler: (payload: string) => void): Promise<void>;
}

// ---------- Targets & records ----------

export type PublishTarget =
  | { kind: "device"; identity: DeviceIdentity }
  | { kind: "system"; group: string };

export interface AvailabilityEntry {
  topic: string;
  payload_available: string;
  payload_not_available: string;
}

export interface DiscoveryPayload {
  name: string;
  unique_id: string;
  object_id: string;
  state_topic: string;
  value_template: string;
  unit_of_measurement?: string;
  device_class?: string;
  state_class?: string;
  suggested_display_precision?: number;
  availability: AvailabilityEntry[];
  availability_mode: "all";
  device: {
    identifiers: string[];
    name: string;
    manufacturer: string;
    model: string;
    sw_version?: string;
    serial_number?: string;
  };
}

export interface DiscoveryRecord {
  topic: string;
  payload: DiscoveryPayload;
}

export interface PublisherOptions {
  /** Default: "homeassistant" */
  discoveryPrefix?: string;
  /** Default: "pi30" */
  baseTopic?: string;
  /** Single-device topic prefix kept for older consumers; null disables */
  legacyTopic?: string | null;
  manufacturer?: string;
  swVersion?: string;
  logger?: Logger;
}

export const ONLINE = "online";
export const OFFLINE = "offline";

// Older single-device consumers read these keys under the legacy prefix
export const LEGACY_KEYS: Readonly<Record<string, string>> = {
  grid_voltage: "ac_input_voltage_v",
  grid_frequency: "ac_input_frequency_hz",
  output_voltage: "ac_output_voltage_v",
  output_frequency: "ac_output_frequency_hz",
  output_apparent_power: "ac_output_apparent_power_va",
  output_active_power: "ac_output_active_power_w",
  load_percent: "ac_output_load_percent",
  bus_voltage: "bus_voltage_v",
  battery_voltage: "battery_voltage_v",
  battery_charging_current: "battery_charging_current_a",
  battery_capacity: "battery_capacity_percent",
  heatsink_temperature: "inverter_heatsink_temp_c",
  pv_input_current: "pv_input_current_a",
  pv_input_voltage: "pv_input_voltage_v",
  pv_charging_power: "pv_input_power_w",
  battery_discharge_current: "battery_discharge_current_a",
  pv2_input_current: "pv2_input_current_a",
  pv2_input_voltage: "pv2_input_voltage_v",
  pv2_charging_power: "pv2_input_power_w",
};

const systemDescriptors: MetricDescriptor[] = [
  { name: "active_power", label: "Total Active Power", kind: "integer", unit: "W", queryType: QueryType.StatusSnapshot },
  { name: "apparent_power", label: "Total Apparent Power", kind: "integer", unit: "VA", queryType: QueryType.StatusSnapshot },
  { name: "pv_power", label: "Total PV Power", kind: "integer", unit: "W", queryType: QueryType.StatusSnapshot },
  { name: "members_online", label: "Phases Online", kind: "integer", queryType: QueryType.StatusSnapshot },
];

const SYSTEM_DESCRIPTORS: ReadonlyMap<string, MetricDescriptor> = new Map(
  systemDescriptors.map((d): [string, MetricDescriptor] => [d.name, d])
);

const DEVICE_CLASS_BY_UNIT: Readonly<Record<string, string>> = {
  V: "voltage",
  A: "current",
  W: "power",
  VA: "apparent_power",
  Hz: "frequency",
  "°C": "temperature",
  s: "duration",
};

/** Order in which readings are merged into one device state message. */
const STATE_ORDER: readonly QueryType[] = [
  QueryType.StatusSnapshot,
  QueryType.PVSecondary,
  QueryType.Mode,
  QueryType.TemperatureAndStage,
  QueryType.RatedSettings,
  QueryType.Identity,
  QueryType.ProtocolId,
  QueryType.Firmware,
];

export function isSystemAggregate(values: MetricSet | SystemAggregate): values is SystemAggregate {
  return "computedAt" in values && values.computedAt instanceof Date;
}

/** Express an aggregate as a metric set so it shares the device publication path. */
export function aggregateMetrics(aggregate: SystemAggregate): MetricSet {
  const metrics: Record<string, MetricValue> = {
    active_power: { kind: "integer", value: aggregate.activePower, unit: "W" },
    apparent_power: { kind: "integer", value: aggregate.apparentPower, unit: "VA" },
    pv_power: { kind: "integer", value: aggregate.pvPower, unit: "W" },
    members_online: { kind: "integer", value: aggregate.members.length },
  };
  return Object.freeze(metrics);
}

/** Merge every reading of a device into one metric set. */
export function mergeReadings(state: DeviceState): MetricSet {
  const merged: Record<string, MetricValue> = {};
  for (const type of STATE_ORDER) {
    const metrics = state.readings[type];
    if (metrics) Object.assign(merged, metrics);
  }
  return Object.freeze(merged);
}

function titleCase(name: string): string {
  return name
    .split("_")
    .map((part) => (part ? part[0].toUpperCase() + part.slice(1) : part))
    .join(" ");
}

// ---------- Publisher ----------

export class Publisher {
  public readonly discoveryPrefix: string;
  public readonly baseTopic: string;
  public readonly legacyTopic: string | null;
  public readonly bridgeAvailabilityTopic: string;

  private readonly bus: BusClient;
  private readonly log: Logger;
  private readonly manufacturer: string;
  private readonly swVersion: string | undefined;

  /** discovery topic -> serialized payload that the broker holds */
  private readonly announced = new Map<string, string>();
  /** discovery topic -> last record, for re-announcement */
  private readonly records = new Map<string, DiscoveryRecord>();
  /** availability topic -> wanted payload / published payload */
  private readonly wantedAvailability = new Map<string, string>();
  private readonly publishedAvailability = new Map<string, string>();
  /** node -> device block details learnt from identity queries */
  private readonly deviceDetails = new Map<string, { serial?: string; firmware?: string }>();

  constructor(bus: BusClient, options: PublisherOptions = {}) {
    this.bus = bus;
    this.discoveryPrefix = options.discoveryPrefix ?? "homeassistant";
    this.baseTopic = options.baseTopic ?? "pi30";
    this.legacyTopic = options.legacyTopic ?? null;
    this.bridgeAvailabilityTopic = `${this.baseTopic}/bridge/availability`;
    this.manufacturer = options.manufacturer ?? "Voltronic";
    this.swVersion = options.swVersion;
    this.log = options.logger ?? nullLogger;
  }

  // ---------- Topics ----------

  nodeId(target: PublishTarget): string {
    return target.kind === "device" ? target.identity.id : `system_${target.group}`;
  }

  stateTopic(target: PublishTarget): string {
    return `${this.baseTopic}/${this.nodeId(target)}/state`;
  }

  availabilityTopic(target: PublishTarget): string {
    return `${this.baseTopic}/${this.nodeId(target)}/availability`;
  }

  discoveryTopic(target: PublishTarget, metric: string, component: "sensor" | "binary_sensor"): string {
    return `${this.discoveryPrefix}/${component}/${this.baseTopic}_${this.nodeId(target)}/${metric}/config`;
  }

  private isLegacyTarget(target: PublishTarget): boolean {
    return this.legacyTopic !== null && target.kind === "device" && target.identity.primary;
  }

  // ---------- Discovery ----------

  /**
   * Build the discovery record for one metric of a target.
   */
  discoveryRecord(target: PublishTarget, name: string, value: MetricValue): DiscoveryRecord {
    const descriptor =
      target.kind === "system" ? SYSTEM_DESCRIPTORS.get(name) : METRIC_DESCRIPTORS.get(name);
    const kind = descriptor?.kind ?? value.kind;
    const component = kind === "flag" ? "binary_sensor" : "sensor";
    const node = this.nodeId(target);
    const uniqueId = `${this.baseTopic}_${node}_${name}`;

    const payload: DiscoveryPayload = {
      name: descriptor?.label ?? titleCase(name),
      unique_id: uniqueId,
      object_id: uniqueId,
      state_topic: this.stateTopic(target),
      value_template:
        kind === "flag"
          ? `{{ 'ON' if value_json.${name} else 'OFF' }}`
          : `{{ value_json.${name} }}`,
      availability: [
        { topic: this.bridgeAvailabilityTopic, payload_available: ONLINE, payload_not_available: OFFLINE },
        { topic: this.availabilityTopic(target), payload_available: ONLINE, payload_not_available: OFFLINE },
      ],
      availability_mode: "all",
      device: this.deviceBlock(target),
    };

    const unit = descriptor?.unit ?? ("unit" in value ? value.unit : undefined);
    if (unit !== undefined) {
      payload.unit_of_measurement = unit;
      const deviceClass = unit === "%" ? (name === "battery_capacity" ? "battery" : undefined) : DEVICE_CLASS_BY_UNIT[unit];
      if (deviceClass !== undefined) payload.device_class = deviceClass;
    }
    if (kind === "integer" || kind === "decimal") {
      payload.state_class = "measurement";
    }
    const precision = descriptor?.precision ?? (value.kind === "decimal" ? value.precision : undefined);
    if (precision !== undefined) {
      payload.suggested_display_precision = precision;
    }

    return { topic: this.discoveryTopic(target, name, component), payload };
  }

  private deviceBlock(target: PublishTarget): DiscoveryPayload["device"] {
    const node = this.nodeId(target);
    if (target.kind === "system") {
      return {
        identifiers: [`${this.baseTopic}_${node}`],
        name: `Inverter System ${target.group}`,
        manufacturer: this.manufacturer,
        model: "Phase group",
        sw_version: this.swVersion,
      };
    }
    const details = this.deviceDetails.get(node);
    const role = target.identity.role === "standalone" ? "PI30 inverter" : `PI30 inverter (${target.identity.role})`;
    return {
      identifiers: [`${this.baseTopic}_${node}`],
      name: target.identity.name,
      manufacturer: this.manufacturer,
      model: role,
      sw_version: details?.firmware ?? this.swVersion,
      serial_number: details?.serial,
    };
  }

  /**
   * Publish a discovery record unless the broker already holds the same one.
   *
   * @returns true when a message was published
   */
  async announce(record: DiscoveryRecord): Promise<boolean> {
    const serialized = JSON.stringify(record.payload);
    this.records.set(record.topic, record);
    if (this.announced.get(record.topic) === serialized) {
      return false;
    }
    const sent = await this.send(record.topic, serialized, true);
    if (sent) {
      this.announced.set(record.topic, serialized);
      this.log.debug(`Announced ${record.topic}`);
    }
    return sent;
  }

  /** Announce every metric of a set that the broker does not know yet. */
  async announceMetrics(target: PublishTarget, metrics: MetricSet): Promise<number> {
    let published = 0;
    for (const [name, value] of Object.entries(metrics)) {
      if (await this.announce(this.discoveryRecord(target, name, value))) published++;
    }
    return published;
  }

  /** Forget what the broker holds and send every known record again. */
  async reannounce(): Promise<number> {
    this.announced.clear();
    this.publishedAvailability.clear();
    let published = 0;
    for (const record of [...this.records.values()]) {
      if (await this.announce(record)) published++;
    }
    for (const topic of this.wantedAvailability.keys()) {
      await this.flushAvailability(topic);
    }
    this.log.info(`Re-announced ${published} discovery records`);
    return published;
  }

  // ---------- State ----------

  /**
   * Publish one state message for a device or a phase group, announcing any
   * metric seen for the first time.
   *
   * @param available  device availability; defaults to the last value set.
   *                   A phase group is available while any member contributes.
   */
  async publishState(
    target: PublishTarget,
    values: MetricSet | SystemAggregate,
    available?: boolean
  ): Promise<void> {
    const metrics = isSystemAggregate(values) ? aggregateMetrics(values) : values;
    const online = isSystemAggregate(values) ? values.members.length > 0 : available ?? this.isWantedOnline(target);

    if (target.kind === "device") this.learnDeviceDetails(target, metrics);
    await this.announceMetrics(target, metrics);
    await this.setAvailability(target, online);

    const state: Record<string, number | string | boolean> = {};
    for (const [name, value] of Object.entries(metrics)) {
      state[name] = metricJsonValue(value);
    }
    state.availability = online ? ONLINE : OFFLINE;
    state.last_update = new Date().toISOString();
    await this.send(this.stateTopic(target), JSON.stringify(state), true);

    if (this.isLegacyTarget(target)) {
      await this.publishLegacy(metrics);
    }
  }

  /** Publish the merged readings of a device snapshot. */
  async publishDeviceState(snapshot: DeviceState): Promise<void> {
    const target: PublishTarget = { kind: "device", identity: snapshot.identity };
    await this.publishState(target, mergeReadings(snapshot), snapshot.available);
  }

  private async publishLegacy(metrics: MetricSet): Promise<void> {
    for (const [name, value] of Object.entries(metrics)) {
      const key = LEGACY_KEYS[name];
      if (key === undefined) continue;
      await this.send(`${this.legacyTopic}/${key}`, formatMetric(value), false);
    }
  }

  private learnDeviceDetails(target: PublishTarget, metrics: MetricSet): void {
    const serial = metrics.serial_number;
    const firmware = metrics.firmware_version;
    const node = this.nodeId(target);
    const details = { ...this.deviceDetails.get(node) };
    if (serial?.kind === "text") details.serial = serial.value;
    if (firmware?.kind === "text") details.firmware = firmware.value;
    this.deviceDetails.set(node, details);
  }

  // ---------- Availability ----------

  private isWantedOnline(target: PublishTarget): boolean {
    const wanted = this.wantedAvailability.get(this.availabilityTopic(target));
    return wanted === undefined || wanted === ONLINE;
  }

  /** Record and publish a target's availability; only changes reach the bus. */
  async setAvailability(target: PublishTarget, available: boolean): Promise<void> {
    const payload = available ? ONLINE : OFFLINE;
    const topic = this.availabilityTopic(target);
    this.wantedAvailability.set(topic, payload);
    await this.flushAvailability(topic);
    if (this.isLegacyTarget(target)) {
      const legacy = `${this.legacyTopic}/availability`;
      this.wantedAvailability.set(legacy, payload);
      await this.flushAvailability(legacy);
    }
  }

  private async flushAvailability(topic: string): Promise<void> {
    const wanted = this.wantedAvailability.get(topic);
    if (wanted === undefined || this.publishedAvailability.get(topic) === wanted) return;
    if (await this.send(topic, wanted, true)) {
      this.publishedAvailability.set(topic, wanted);
    }
  }

  // ---------- Transport ----------

  /** Best-effort publish: failures are logged and reported as false. */
  private async send(topic: string, payload: string, retain: boolean): Promise<boolean> {
    try {
      await this.bus.publish(topic, payload, { retain, qos: retain ? 1 : 0 });
      return true;
    } catch (err) {
      const error = new PublishError(topic, err);
      this.log.warn(error.message);
      return false;
    }
  }
}
