import { describe, it, expect } from "vitest";
import {
  decodeStatusSnapshot,
  decodeRatedSettings,
  decodeTemperatureAndStage,
  decodeMode,
  decodeIdentity,
  decodeProtocolId,
  decodeFirmware,
  decodePVSecondary,
  decodeTokens,
  formatMetric,
  metricJsonValue,
  parseLayouts,
  LAYOUTS,
  METRIC_DESCRIPTORS,
} from "../src/decoders.js";
import { decodeResponse } from "../src/frame.js";
import { QueryType, QUERY_DEFINITIONS, ALL_QUERY_TYPES } from "../src/queries.js";
import { ConfigError, FieldFormatError, TokenCountError } from "../src/errors.js";

const tokens = (s: string) => s.split(" ");

const QPIGS =
  "220.0 50.0 230.0 50.0 0345 0300 015 380 52.40 012 085 0035 01.5 120.0 52.45 00000 00010110 00 00 00180 010";
const QPIRI =
  "230.0 21.7 230.0 50.0 21.7 5000 4000 48.0 46.0 42.0 56.4 54.0 2 30 060 0 1 2 1 01 0 0 52.0 0 1";
const Q1 =
  "00000 00000 01 01 00 049 048 046 062 00 00 000 0000 0000 0000 00.00 10 0 060 030 100 030 58.40 000 120 0 0000";

describe("Layouts", () => {
  it("match the arity of every query", () => {
    for (const type of ALL_QUERY_TYPES) {
      expect(LAYOUTS[type].length).toBe(QUERY_DEFINITIONS[type].arity);
    }
  });

  it("rejects a layout document with a missing query type", () => {
    expect(() => parseLayouts({ StatusSnapshot: [] })).toThrow(ConfigError);
  });

  it("describes flag bits as separate metrics", () => {
    expect(METRIC_DESCRIPTORS.get("load_on")).toEqual({
      name: "load_on",
      label: "Load On",
      kind: "flag",
      queryType: QueryType.StatusSnapshot,
    });
    expect(METRIC_DESCRIPTORS.has("device_status")).toBe(false);
  });
});

describe("StatusSnapshot", () => {
  const metrics = decodeStatusSnapshot(tokens(QPIGS));

  it("decodes voltages, percentages and powers", () => {
    expect(metrics.grid_voltage).toEqual({ kind: "decimal", value: 220, unit: "V", precision: 3 });
    expect(metrics.output_voltage).toEqual({ kind: "decimal", value: 230, unit: "V", precision: 3 });
    expect(metrics.load_percent).toEqual({ kind: "integer", value: 15, unit: "%" });
    expect(metrics.battery_voltage).toEqual({ kind: "decimal", value: 52.4, unit: "V", precision: 3 });
    expect(metrics.output_active_power).toEqual({ kind: "integer", value: 300, unit: "W" });
    expect(metrics.heatsink_temperature).toEqual({ kind: "integer", value: 35, unit: "°C" });
    expect(metrics.pv_input_current).toEqual({ kind: "decimal", value: 1.5, unit: "A", precision: 1 });
    expect(metrics.pv_charging_power).toEqual({ kind: "integer", value: 180, unit: "W" });
  });

  it("presents battery voltage with three decimals", () => {
    expect(formatMetric(metrics.battery_voltage)).toBe("52.400");
    expect(formatMetric(metrics.grid_voltage)).toBe("220.000");
  });

  it("decodes device status bits most significant first", () => {
    expect(metrics.sbu_priority_version).toEqual({ kind: "flag", value: false });
    expect(metrics.load_on).toEqual({ kind: "flag", value: true });
    expect(metrics.battery_voltage_steady).toEqual({ kind: "flag", value: false });
    expect(metrics.charging).toEqual({ kind: "flag", value: true });
    expect(metrics.scc_charging).toEqual({ kind: "flag", value: true });
    expect(metrics.ac_charging).toEqual({ kind: "flag", value: false });
    expect(metrics.switched_on).toEqual({ kind: "flag", value: true });
    expect(metrics.charging_to_float).toEqual({ kind: "flag", value: false });
  });

  it("applies the fan offset scale", () => {
    const t = tokens(QPIGS);
    t[17] = "05";
    expect(decodeStatusSnapshot(t).fan_offset_voltage).toEqual({
      kind: "decimal",
      value: 0.05,
      unit: "V",
      precision: 3,
    });
  });

  it("returns a frozen metric set", () => {
    expect(Object.isFrozen(metrics)).toBe(true);
  });

  it("decodes straight from a response frame", () => {
    const frame = Buffer.concat([Buffer.from(`(${QPIGS}`), Buffer.from([0x93, 0x09, 0x0d])]);
    const decoded = decodeTokens(QueryType.StatusSnapshot, decodeResponse(frame, "QPIGS"));
    expect(decoded.battery_capacity).toEqual({ kind: "integer", value: 85, unit: "%" });
  });

  it("rejects a short token set", () => {
    const run = () => decodeStatusSnapshot(tokens(QPIGS).slice(0, 20));
    expect(run).toThrow(TokenCountError);
    expect(run).toThrow("QPIGS response has 20 tokens, expected 21");
  });

  it("rejects a non-numeric token", () => {
    const t = tokens(QPIGS);
    t[8] = "5x.40";
    expect(() => decodeStatusSnapshot(t)).toThrow(new FieldFormatError("QPIGS", "battery_voltage", "5x.40"));
  });

  it("rejects a flags token of the wrong width", () => {
    const t = tokens(QPIGS);
    t[16] = "0001011";
    expect(() => decodeStatusSnapshot(t)).toThrow(FieldFormatError);
  });
});

describe("RatedSettings", () => {
  const metrics = decodeRatedSettings(tokens(QPIRI));

  it("decodes ratings and labelled settings", () => {
    expect(metrics.rated_output_active_power).toEqual({ kind: "integer", value: 4000, unit: "W" });
    expect(metrics.battery_float_voltage).toEqual({ kind: "decimal", value: 54, unit: "V", precision: 3 });
    expect(metrics.battery_type).toEqual({ kind: "enum", code: "2", label: "User" });
    expect(metrics.max_charging_current).toEqual({ kind: "integer", value: 60, unit: "A" });
    expect(metrics.output_source_priority).toEqual({ kind: "enum", code: "1", label: "Solar first" });
    expect(metrics.charger_source_priority).toEqual({ kind: "enum", code: "2", label: "Solar and utility" });
    expect(metrics.machine_type).toEqual({ kind: "enum", code: "01", label: "Off grid" });
    expect(metrics.pv_power_balance).toEqual({ kind: "enum", code: "1", label: "Max charging power plus load" });
  });

  it("labels unknown enum codes", () => {
    const t = tokens(QPIRI);
    t[12] = "7";
    expect(decodeRatedSettings(t).battery_type).toEqual({ kind: "enum", code: "7", label: "unknown(7)" });
  });

  it("matches zero padded enum codes", () => {
    const t = tokens(QPIRI);
    t[16] = "02";
    expect(decodeRatedSettings(t).output_source_priority).toEqual({ kind: "enum", code: "02", label: "SBU first" });
  });
});

describe("TemperatureAndStage", () => {
  const metrics = decodeTemperatureAndStage(tokens(Q1));

  it("decodes temperatures and the charge stage", () => {
    expect(metrics.scc_temperature).toEqual({ kind: "integer", value: 49, unit: "°C" });
    expect(metrics.inverter_temperature).toEqual({ kind: "integer", value: 48, unit: "°C" });
    expect(metrics.battery_temperature).toEqual({ kind: "integer", value: 46, unit: "°C" });
    expect(metrics.transformer_temperature).toEqual({ kind: "integer", value: 62, unit: "°C" });
    expect(metrics.scc_status).toEqual({ kind: "enum", code: "01", label: "Communicating" });
    expect(metrics.sync_frequency).toEqual({ kind: "decimal", value: 0, unit: "Hz", precision: 2 });
    expect(metrics.charge_stage).toEqual({ kind: "enum", code: "10", label: "Not charging" });
  });

  it("skips reserved fields", () => {
    expect(Object.keys(metrics)).toHaveLength(15);
  });
});

describe("Single value queries", () => {
  it("decodes the device mode", () => {
    expect(decodeMode(["B"]).mode).toEqual({ kind: "enum", code: "B", label: "Battery" });
    expect(formatMetric(decodeMode(["L"]).mode)).toBe("Line");
  });

  it("decodes identity, protocol and firmware", () => {
    expect(decodeIdentity(["92932105100001"]).serial_number).toEqual({ kind: "text", value: "92932105100001" });
    expect(decodeProtocolId(["PI30"]).protocol_id).toEqual({ kind: "text", value: "PI30" });
    expect(decodeFirmware(["VERFW:00072.70"]).firmware_version).toEqual({ kind: "text", value: "00072.70" });
  });

  it("decodes the second PV input", () => {
    const metrics = decodePVSecondary(["02.1", "150.0", "00315"]);
    expect(metrics.pv2_input_current).toEqual({ kind: "decimal", value: 2.1, unit: "A", precision: 1 });
    expect(metrics.pv2_input_voltage).toEqual({ kind: "decimal", value: 150, unit: "V", precision: 3 });
    expect(metrics.pv2_charging_power).toEqual({ kind: "integer", value: 315, unit: "W" });
  });
});

describe("Presentation", () => {
  it("formats flags as ON/OFF and keeps JSON values typed", () => {
    expect(formatMetric({ kind: "flag", value: true })).toBe("ON");
    expect(metricJsonValue({ kind: "flag", value: false })).toBe(false);
    expect(metricJsonValue({ kind: "decimal", value: 52.4, precision: 3 })).toBe(52.4);
    expect(metricJsonValue({ kind: "enum", code: "B", label: "Battery" })).toBe("Battery");
  });
});
