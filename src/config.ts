/**
 * Bridge configuration.
 *
 * Sources, later wins: built-in defaults, environment variables, then the
 * options file. Both the single-device shape (top-level `port`) and the
 * multi-device shape (`devices: [...]`) are accepted.
 */

import { readdir, readFile, realpath } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError, describeError } from "./errors.js";
import { type LogLevel, parseLogLevel } from "./logger.js";
import type { DeviceIdentity, PhaseRole } from "./session.js";

export const DEFAULT_OPTIONS_PATH = "/data/options.json";
export const BY_ID_DIR = "/dev/serial/by-id";
export const DEFAULT_GROUP = "system";

/** Environment variable → option key. */
export const ENV_KEYS: Readonly<Record<string, string>> = {
  PORT: "port",
  BAUDRATE: "baudrate",
  TIMEOUT: "timeout",
  READ_INTERVAL: "read_interval",
  LOG_LEVEL: "log_level",
  MQTT_HOST: "mqtt_host",
  MQTT_PORT: "mqtt_port",
  MQTT_USERNAME: "mqtt_username",
  MQTT_PASSWORD: "mqtt_password",
};

// ---------- Schema ----------

const logLevelSchema = z.string().transform((value, ctx): LogLevel => {
  const level = parseLogLevel(value);
  if (!level) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown log level "${value}"` });
    return z.NEVER;
  }
  return level;
});

const deviceSchema = z.object({
  name: z.string().min(1),
  port: z.string().min(1),
  baudrate: z.coerce.number().int().positive().optional(),
  timeout: z.coerce.number().positive().optional(),
  role: z.enum(["standalone", "L1", "L2", "L3"]).optional(),
  group: z.string().min(1).optional(),
  prefer_by_id: z.boolean().optional(),
});

export const optionsSchema = z.object({
  port: z.string().min(1).default("/dev/ttyUSB0"),
  baudrate: z.coerce.number().int().positive().default(2400),
  timeout: z.coerce.number().positive().default(3),
  prefer_by_id: z.boolean().default(true),
  devices: z.array(deviceSchema).min(1).optional(),
  read_interval: z.coerce.number().positive().default(30),
  log_level: logLevelSchema.default("WARNING"),
  mqtt_host: z.string().min(1).default("core-mosquitto"),
  mqtt_port: z.coerce.number().int().min(1).max(65535).default(1883),
  mqtt_username: z.string().default(""),
  mqtt_password: z.string().default(""),
  discovery_prefix: z.string().min(1).default("homeassistant"),
  base_topic: z.string().min(1).default("pi30"),
  legacy_topic: z.string().default("easun/easun_inverter"),
  failure_threshold: z.coerce.number().int().positive().default(3),
  open_backoff: z.coerce.number().positive().default(1),
  max_open_backoff: z.coerce.number().positive().default(60),
});

export type DeviceOptions = z.output<typeof deviceSchema>;
export type RawOptions = z.input<typeof optionsSchema>;
export type Options = z.output<typeof optionsSchema>;

export interface BridgeConfig {
  devices: DeviceIdentity[];
  readIntervalMs: number;
  logLevel: LogLevel;
  mqtt: {
    host: string;
    port: number;
    username?: string;
    password?: string;
  };
  discoveryPrefix: string;
  baseTopic: string;
  /** null when the legacy topics are disabled */
  legacyTopic: string | null;
  failureThreshold: number;
  openBackoffMs: number;
  maxOpenBackoffMs: number;
}

// ---------- Port resolution ----------

export interface PathResolver {
  readdir(dir: string): Promise<string[]>;
  realpath(path: string): Promise<string>;
}

const fsResolver: PathResolver = {
  readdir: (dir) => readdir(dir),
  realpath: (path) => realpath(path),
};

/**
 * Return the `/dev/serial/by-id/` link that points at the same device as
 * `port`, or `port` itself when there is none.
 */
export async function resolveByIdPath(
  port: string,
  resolver: PathResolver = fsResolver,
  byIdDir: string = BY_ID_DIR
): Promise<string> {
  if (port.startsWith(`${byIdDir}/`)) return port;
  try {
    const target = await resolver.realpath(port);
    const entries = (await resolver.readdir(byIdDir)).sort();
    for (const entry of entries) {
      const candidate = join(byIdDir, entry);
      if ((await resolver.realpath(candidate)) === target) return candidate;
    }
  } catch {
    // No by-id directory, or the port does not exist yet
    return port;
  }
  return port;
}

// ---------- Loading ----------

export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug || "inverter";
}

/** Options taken from the environment, keyed like the options file. */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const options: Record<string, string> = {};
  for (const [variable, key] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== "") options[key] = value;
  }
  return options;
}

/**
 * Read the JSON options file. A missing file is only an error when the path
 * was given explicitly.
 */
export async function readOptionsFile(path: string, required: boolean): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (!required && err instanceof Error && "code" in err && err.code === "ENOENT") return {};
    throw new ConfigError(`Cannot read options file ${path}: ${describeError(err)}`, err);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Options file ${path} is not valid JSON: ${describeError(err)}`, err);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Options file ${path} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function parseOptions(raw: Record<string, unknown>): Options {
  const result = optionsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`, result.error);
  }
  return result.data;
}

/**
 * Turn validated options into the runtime configuration, resolving every port
 * to its persistent by-id path where asked to.
 */
export async function buildConfig(options: Options, resolver: PathResolver = fsResolver): Promise<BridgeConfig> {
  const entries: DeviceOptions[] = options.devices ?? [{ name: "Inverter", port: options.port }];

  const seen = new Set<string>();
  const devices: DeviceIdentity[] = [];
  for (const [index, entry] of entries.entries()) {
    let id = slugify(entry.name);
    for (let n = 2; seen.has(id); n++) id = `${slugify(entry.name)}_${n}`;
    seen.add(id);

    const role: PhaseRole = entry.role ?? "standalone";
    const preferById = entry.prefer_by_id ?? options.prefer_by_id;
    devices.push({
      id,
      name: entry.name,
      path: preferById ? await resolveByIdPath(entry.port, resolver) : entry.port,
      baudRate: entry.baudrate ?? options.baudrate,
      timeoutMs: Math.round((entry.timeout ?? options.timeout) * 1000),
      role,
      // Standalone devices only aggregate when grouped explicitly
      group: entry.group ?? (role === "standalone" ? id : DEFAULT_GROUP),
      primary: index === 0,
    });
  }

  if (options.max_open_backoff < options.open_backoff) {
    throw new ConfigError("max_open_backoff must not be smaller than open_backoff");
  }

  return {
    devices,
    readIntervalMs: Math.round(options.read_interval * 1000),
    logLevel: options.log_level,
    mqtt: {
      host: options.mqtt_host,
      port: options.mqtt_port,
      username: options.mqtt_username || undefined,
      password: options.mqtt_password || undefined,
    },
    discoveryPrefix: options.discovery_prefix,
    baseTopic: options.base_topic,
    legacyTopic: options.legacy_topic || null,
    failureThreshold: options.failure_threshold,
    openBackoffMs: Math.round(options.open_backoff * 1000),
    maxOpenBackoffMs: Math.round(options.max_open_backoff * 1000),
  };
}

export interface LoadConfigOptions {
  /** Options file; when omitted the default path is tried and may be absent */
  path?: string;
  env?: NodeJS.ProcessEnv;
  resolver?: PathResolver;
}

/** @throws ConfigError */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<BridgeConfig> {
  const file = await readOptionsFile(options.path ?? DEFAULT_OPTIONS_PATH, options.path !== undefined);
  const merged = { ...optionsFromEnv(options.env), ...file };
  return buildConfig(parseOptions(merged), options.resolver);
}
