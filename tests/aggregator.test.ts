import { describe, it, expect } from "vitest";
import { aggregatePhaseGroup, phaseGroups } from "../src/aggregator.js";
import { decodeStatusSnapshot, type MetricSet } from "../src/decoders.js";
import { QueryType } from "../src/queries.js";
import type { DeviceState } from "../src/session.js";
import { identity, statusPayload } from "./fakes.js";

function state(id: string, available: boolean, status?: MetricSet, group = "system"): DeviceState {
  return {
    identity: identity({ id, name: id, path: `/dev/${id}`, group, role: "L1", primary: false }),
    sessionState: available ? "idle" : "closed",
    available,
    consecutiveFailures: available ? 0 : 3,
    lastSuccessAt: null,
    readings: status ? { [QueryType.StatusSnapshot]: status } : {},
    unsupported: [],
  };
}

const status = (activePower: number) => decodeStatusSnapshot(statusPayload(activePower).split(" "));

describe("aggregatePhaseGroup", () => {
  const now = new Date("2026-01-01T00:00:00Z");

  it("sums available members and excludes unavailable ones", () => {
    const aggregate = aggregatePhaseGroup(
      "system",
      [state("l1", true, status(100)), state("l2", true, status(150)), state("l3", false, status(900))],
      now
    );

    expect(aggregate).toEqual({
      group: "system",
      activePower: 250,
      apparentPower: 690,
      pvPower: 360,
      members: ["l1", "l2"],
      memberCount: 3,
      computedAt: now,
    });
  });

  it("skips members that have no status reading yet", () => {
    const aggregate = aggregatePhaseGroup("system", [state("l1", true, status(100)), state("l2", true)], now);
    expect(aggregate.activePower).toBe(100);
    expect(aggregate.members).toEqual(["l1"]);
  });

  it("ignores devices of other groups", () => {
    const aggregate = aggregatePhaseGroup(
      "system",
      [state("l1", true, status(100)), state("garage", true, status(500), "garage")],
      now
    );
    expect(aggregate.activePower).toBe(100);
    expect(aggregate.memberCount).toBe(1);
  });

  it("yields zeros when nobody is available", () => {
    const aggregate = aggregatePhaseGroup("system", [state("l1", false, status(100))], now);
    expect(aggregate.activePower).toBe(0);
    expect(aggregate.members).toEqual([]);
  });
});

describe("phaseGroups", () => {
  it("returns only groups with two or more devices", () => {
    const groups = phaseGroups([
      identity({ id: "l1", group: "system" }),
      identity({ id: "l2", group: "system" }),
      identity({ id: "garage", group: "garage" }),
    ]);
    expect([...groups.keys()]).toEqual(["system"]);
    expect(groups.get("system")?.map((d) => d.id)).toEqual(["l1", "l2"]);
  });

  it("returns nothing for a single device", () => {
    expect(phaseGroups([identity()]).size).toBe(0);
  });
});
