/**
 * Phase-group aggregation.
 *
 * Several single-phase inverters configured into the same group are folded
 * into one system reading. Only the members' current state is used.
 */

import type { MetricSet } from "./decoders.js";
import { QueryType } from "./queries.js";
import type { DeviceIdentity, DeviceState } from "./session.js";

export interface SystemAggregate {
  group: string;
  /** Sum of AC output active power, W */
  activePower: number;
  /** Sum of AC output apparent power, VA */
  apparentPower: number;
  /** Sum of PV charging power, W */
  pvPower: number;
  /** Ids of the devices that contributed */
  members: string[];
  /** Number of devices configured in the group */
  memberCount: number;
  computedAt: Date;
}

export const AGGREGATED_METRICS = {
  activePower: "output_active_power",
  apparentPower: "output_apparent_power",
  pvPower: "pv_charging_power",
} as const;

function numeric(metrics: MetricSet, name: string): number {
  const metric = metrics[name];
  if (metric && (metric.kind === "integer" || metric.kind === "decimal")) {
    return metric.value;
  }
  return 0;
}

/**
 * Sum power readings over the available members of a group.
 *
 * A member that is unavailable, or has no status reading yet, is left out.
 */
export function aggregatePhaseGroup(
  group: string,
  snapshots: readonly DeviceState[],
  now: Date = new Date()
): SystemAggregate {
  const members = snapshots.filter((s) => s.identity.group === group);
  const aggregate: SystemAggregate = {
    group,
    activePower: 0,
    apparentPower: 0,
    pvPower: 0,
    members: [],
    memberCount: members.length,
    computedAt: now,
  };

  for (const member of members) {
    const status = member.readings[QueryType.StatusSnapshot];
    if (!member.available || !status) continue;
    aggregate.activePower += numeric(status, AGGREGATED_METRICS.activePower);
    aggregate.apparentPower += numeric(status, AGGREGATED_METRICS.apparentPower);
    aggregate.pvPower += numeric(status, AGGREGATED_METRICS.pvPower);
    aggregate.members.push(member.identity.id);
  }

  return aggregate;
}

/** Groups with at least two devices; single devices are never aggregated. */
export function phaseGroups(devices: readonly DeviceIdentity[]): Map<string, DeviceIdentity[]> {
  const groups = new Map<string, DeviceIdentity[]>();
  for (const device of devices) {
    const members = groups.get(device.group) ?? [];
    members.push(device);
    groups.set(device.group, members);
  }
  for (const [group, members] of groups) {
    if (members.length < 2) groups.delete(group);
  }
  return groups;
}
