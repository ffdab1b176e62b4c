/**
 * PI30 response decoders.
 *
 * Each query type has a fixed, ordered field layout in `layouts/pi30.json`.
 * A decoder walks the layout and the token set in lockstep, so changing a
 * layout is a data change. Layouts are part of the published interface: a
 * change to names, order or units is a breaking change.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError, FieldFormatError, TokenCountError } from "./errors.js";
import { ALL_QUERY_TYPES, QueryType, QUERY_DEFINITIONS } from "./queries.js";

// ---------- Metric values ----------

export type MetricValue =
  | { kind: "integer"; value: number; unit?: string }
  | { kind: "decimal"; value: number; unit?: string; precision: number }
  | { kind: "enum"; code: string; label: string }
  | { kind: "flag"; value: boolean }
  | { kind: "text"; value: string };

export type MetricKind = MetricValue["kind"];

/** Metric name to value, in layout order. */
export type MetricSet = Readonly<Record<string, MetricValue>>;

// ---------- Layout tables ----------

const metricName = z.string().regex(/^[a-z][a-z0-9_]*$/);

const fieldSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("decimal"),
    name: metricName,
    label: z.string(),
    unit: z.string().optional(),
    precision: z.number().int().min(0).max(6),
    scale: z.number().positive().optional(),
  }),
  z.object({
    type: z.literal("integer"),
    name: metricName,
    label: z.string(),
    unit: z.string().optional(),
  }),
  z.object({
    type: z.literal("enum"),
    name: metricName,
    label: z.string(),
    labels: z.record(z.string(), z.string()),
  }),
  z.object({
    type: z.literal("flags"),
    name: metricName,
    bits: z.array(z.object({ name: metricName, label: z.string() })).min(1),
  }),
  z.object({
    type: z.literal("text"),
    name: metricName,
    label: z.string(),
    prefix: z.string().optional(),
  }),
  z.object({ type: z.literal("reserved") }),
]);

export type FieldLayout = z.infer<typeof fieldSchema>;

const layoutFileSchema = z.record(z.string(), z.array(fieldSchema));

export type LayoutTable = Readonly<Record<QueryType, readonly FieldLayout[]>>;

/** Parse and check a layout document against the query catalogue. */
export function parseLayouts(document: unknown): LayoutTable {
  const parsed = layoutFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(`Invalid layout table: ${parsed.error.message}`);
  }
  const fieldsFor = (type: QueryType): readonly FieldLayout[] => {
    const fields = parsed.data[type];
    if (!fields) {
      throw new ConfigError(`Layout table has no entry for ${type}`);
    }
    const { arity, command } = QUERY_DEFINITIONS[type];
    if (fields.length !== arity) {
      throw new ConfigError(`Layout for ${command} has ${fields.length} fields, expected ${arity}`);
    }
    return fields;
  };
  return {
    [QueryType.StatusSnapshot]: fieldsFor(QueryType.StatusSnapshot),
    [QueryType.RatedSettings]: fieldsFor(QueryType.RatedSettings),
    [QueryType.TemperatureAndStage]: fieldsFor(QueryType.TemperatureAndStage),
    [QueryType.Mode]: fieldsFor(QueryType.Mode),
    [QueryType.Identity]: fieldsFor(QueryType.Identity),
    [QueryType.ProtocolId]: fieldsFor(QueryType.ProtocolId),
    [QueryType.Firmware]: fieldsFor(QueryType.Firmware),
    [QueryType.PVSecondary]: fieldsFor(QueryType.PVSecondary),
  };
}

const LAYOUT_FILE = new URL("../layouts/pi30.json", import.meta.url);

export const LAYOUTS: LayoutTable = parseLayouts(JSON.parse(readFileSync(LAYOUT_FILE, "utf8")));

// ---------- Metric descriptors ----------

export interface MetricDescriptor {
  name: string;
  label: string;
  kind: MetricKind;
  unit?: string;
  precision?: number;
  queryType: QueryType;
}

function buildDescriptors(table: LayoutTable): ReadonlyMap<string, MetricDescriptor> {
  const descriptors = new Map<string, MetricDescriptor>();
  for (const queryType of ALL_QUERY_TYPES) {
    for (const field of table[queryType]) {
      switch (field.type) {
        case "reserved":
          break;
        case "flags":
          for (const bit of field.bits) {
            descriptors.set(bit.name, { name: bit.name, label: bit.label, kind: "flag", queryType });
          }
          break;
        case "decimal":
          descriptors.set(field.name, {
            name: field.name,
            label: field.label,
            kind: "decimal",
            unit: field.unit,
            precision: field.precision,
            queryType,
          });
          break;
        case "integer":
          descriptors.set(field.name, {
            name: field.name,
            label: field.label,
            kind: "integer",
            unit: field.unit,
            queryType,
          });
          break;
        case "enum":
        case "text":
          descriptors.set(field.name, { name: field.name, label: field.label, kind: field.type, queryType });
          break;
      }
    }
  }
  return descriptors;
}

export const METRIC_DESCRIPTORS: ReadonlyMap<string, MetricDescriptor> = buildDescriptors(LAYOUTS);

// ---------- Token parsing ----------

const INTEGER_TOKEN = /^[+-]?\d+$/;
const DECIMAL_TOKEN = /^[+-]?\d+(\.\d+)?$/;
const FLAGS_TOKEN = /^[01]+$/;

function roundTo(value: number, precision: number): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

function enumLabel(labels: Readonly<Record<string, string>>, code: string): string {
  const exact = labels[code];
  if (exact !== undefined) return exact;
  // "02" and "2" name the same code
  if (INTEGER_TOKEN.test(code)) {
    const normalized = labels[String(parseInt(code, 10))];
    if (normalized !== undefined) return normalized;
  }
  return `unknown(${code})`;
}

function decodeField(
  command: string,
  field: FieldLayout,
  token: string,
  out: Record<string, MetricValue>
): void {
  switch (field.type) {
    case "reserved":
      return;
    case "integer": {
      if (!INTEGER_TOKEN.test(token)) throw new FieldFormatError(command, field.name, token);
      out[field.name] = { kind: "integer", value: parseInt(token, 10), unit: field.unit };
      return;
    }
    case "decimal": {
      if (!DECIMAL_TOKEN.test(token)) throw new FieldFormatError(command, field.name, token);
      const raw = parseFloat(token) * (field.scale ?? 1);
      out[field.name] = {
        kind: "decimal",
        value: roundTo(raw, field.precision),
        unit: field.unit,
        precision: field.precision,
      };
      return;
    }
    case "enum":
      out[field.name] = { kind: "enum", code: token, label: enumLabel(field.labels, token) };
      return;
    case "flags": {
      if (!FLAGS_TOKEN.test(token) || token.length !== field.bits.length) {
        throw new FieldFormatError(command, field.name, token);
      }
      field.bits.forEach((bit, i) => {
        out[bit.name] = { kind: "flag", value: token[i] === "1" };
      });
      return;
    }
    case "text": {
      const value =
        field.prefix !== undefined && token.startsWith(field.prefix) ? token.slice(field.prefix.length) : token;
      out[field.name] = { kind: "text", value };
      return;
    }
  }
}

/**
 * Map a token set onto the layout of a query type.
 *
 * @throws TokenCountError   token count differs from the query's arity
 * @throws FieldFormatError  a token does not parse to its declared type
 */
export function decodeTokens(
  queryType: QueryType,
  tokens: readonly string[],
  layouts: LayoutTable = LAYOUTS
): MetricSet {
  const { command, arity } = QUERY_DEFINITIONS[queryType];
  if (tokens.length !== arity) {
    throw new TokenCountError(command, arity, tokens.length);
  }
  const fields = layouts[queryType];
  const out: Record<string, MetricValue> = {};
  fields.forEach((field, i) => decodeField(command, field, tokens[i], out));
  return Object.freeze(out);
}

export const decodeStatusSnapshot = (tokens: readonly string[]): MetricSet =>
  decodeTokens(QueryType.StatusSnapshot, tokens);
export const decodeRatedSettings = (tokens: readonly string[]): MetricSet =>
  decodeTokens(QueryType.RatedSettings, tokens);
export const decodeTemperatureAndStage = (tokens: readonly string[]): MetricSet =>
  decodeTokens(QueryType.TemperatureAndStage, tokens);
export const decodeMode = (tokens: readonly string[]): MetricSet => decodeTokens(QueryType.Mode, tokens);
export const decodeIdentity = (tokens: readonly string[]): MetricSet => decodeTokens(QueryType.Identity, tokens);
export const decodeProtocolId = (tokens: readonly string[]): MetricSet =>
  decodeTokens(QueryType.ProtocolId, tokens);
export const decodeFirmware = (tokens: readonly string[]): MetricSet => decodeTokens(QueryType.Firmware, tokens);
export const decodePVSecondary = (tokens: readonly string[]): MetricSet =>
  decodeTokens(QueryType.PVSecondary, tokens);

// ---------- Presentation ----------

/** Render a metric as text; decimals keep their declared precision. */
export function formatMetric(metric: MetricValue): string {
  switch (metric.kind) {
    case "integer":
      return String(metric.value);
    case "decimal":
      return metric.value.toFixed(metric.precision);
    case "enum":
      return metric.label;
    case "flag":
      return metric.value ? "ON" : "OFF";
    case "text":
      return metric.value;
  }
}

/** JSON value of a metric as carried in state payloads. */
export function metricJsonValue(metric: MetricValue): number | string | boolean {
  switch (metric.kind) {
    case "integer":
    case "decimal":
      return metric.value;
    case "enum":
      return metric.label;
    case "flag":
      return metric.value;
    case "text":
      return metric.value;
  }
}
