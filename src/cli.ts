#!/usr/bin/env node

/**
 * pi30 CLI – run the MQTT bridge, or talk to a single PI30 inverter directly.
 */

import { Command } from "commander";
import { Bridge, runUntilSignalled, VERSION } from "./bridge.js";
import { loadConfig } from "./config.js";
import { decodeTokens, metricJsonValue, type MetricSet } from "./decoders.js";
import { describeError } from "./errors.js";
import { decodeResponse, encodeCommand, formatFrame } from "./frame.js";
import { createConsoleLogger, type LogLevel, nullLogger, parseLogLevel } from "./logger.js";
import { ALL_QUERY_TYPES, parseQueryType, QueryType, QUERY_DEFINITIONS } from "./queries.js";
import { DeviceSession } from "./session.js";
import { SerialPortTransport } from "./transport.js";

const PROBE_COMMANDS = ["QPI", "QID", "QPIGS"];

const program = new Command();

program
  .name("pi30")
  .description("Poll PI30 (Voltronic/Axpert) inverters over serial and publish to MQTT")
  .version(VERSION);

const int = (v: string) => parseInt(v, 10);

function fail(err: unknown): never {
  console.error(`Error: ${describeError(err)}`);
  process.exit(1);
}

function queryTypeArg(value: string): QueryType {
  const type = parseQueryType(value);
  if (type === undefined) {
    const known = ALL_QUERY_TYPES.map((t) => `${t} (${QUERY_DEFINITIONS[t].command})`).join(", ");
    throw new Error(`Unknown query type "${value}". Known: ${known}`);
  }
  return type;
}

function toJson(metrics: MetricSet): Record<string, number | string | boolean> {
  return Object.fromEntries(Object.entries(metrics).map(([name, value]) => [name, metricJsonValue(value)]));
}

// ---------- run ----------

program
  .command("run")
  .description("Run the bridge until SIGINT/SIGTERM")
  .option("-c, --config <path>", "Options file (default: /data/options.json, if present)")
  .option("-l, --log-level <level>", "Override the configured log level")
  .action(async (opts: { config?: string; logLevel?: string }) => {
    try {
      const config = await loadConfig({ path: opts.config });
      let level: LogLevel = config.logLevel;
      if (opts.logLevel !== undefined) {
        const parsed = parseLogLevel(opts.logLevel);
        if (!parsed) throw new Error(`Unknown log level "${opts.logLevel}"`);
        level = parsed;
      }
      const logger = createConsoleLogger(level);
      const bridge = new Bridge(config, { logger });
      await bridge.start();
      await runUntilSignalled(bridge, logger);
    } catch (err) {
      fail(err);
    }
  });

// ---------- query ----------

program
  .command("query")
  .description("Send queries to one inverter and print the decoded metrics as JSON")
  .argument("<type...>", "Query types, by name or command (e.g. StatusSnapshot or QPIGS)")
  .requiredOption("-p, --port <path>", "Serial port")
  .option("-b, --baud <rate>", "Baud rate", int, 2400)
  .option("-t, --timeout <seconds>", "Read timeout in seconds", parseFloat, 3)
  .option("-v, --verbose", "Log serial traffic", false)
  .action(async (types: string[], opts: { port: string; baud: number; timeout: number; verbose: boolean }) => {
    let session: DeviceSession | null = null;
    try {
      const queries = types.map(queryTypeArg);
      const logger = opts.verbose ? createConsoleLogger("DEBUG") : nullLogger;
      session = new DeviceSession(
        {
          id: "cli",
          name: opts.port,
          path: opts.port,
          baudRate: opts.baud,
          timeoutMs: Math.round(opts.timeout * 1000),
          role: "standalone",
          group: "cli",
          primary: true,
        },
        { transportFactory: (serial) => new SerialPortTransport(serial, logger), logger }
      );
      if (!(await session.open())) {
        throw new Error(`Cannot open ${opts.port}`);
      }

      const result: Record<string, Record<string, number | string | boolean>> = {};
      for (const type of queries) {
        result[type] = toJson(await session.query(type));
      }
      console.log(JSON.stringify(result, null, 2));
    } catch (err) {
      fail(err);
    } finally {
      await session?.close();
    }
  });

// ---------- probe ----------

program
  .command("probe")
  .description("Try baud rates with QPI/QID/QPIGS and print the raw responses")
  .requiredOption("-p, --port <path>", "Serial port")
  .option("-b, --bauds <list>", "Comma separated baud rates", "2400,9600")
  .option("-t, --timeout <seconds>", "Read timeout in seconds", parseFloat, 2)
  .action(async (opts: { port: string; bauds: string; timeout: number }) => {
    const bauds = opts.bauds
      .split(",")
      .map((b) => int(b.trim()))
      .filter((b) => Number.isFinite(b) && b > 0);

    for (const baudRate of bauds) {
      console.log(`=== ${opts.port} @ ${baudRate} baud ===`);
      const transport = new SerialPortTransport({ path: opts.port, baudRate });
      try {
        await transport.open();
        for (const command of PROBE_COMMANDS) {
          try {
            const response = await transport.request(encodeCommand(command), Math.round(opts.timeout * 1000));
            console.log(`${command.padEnd(6)} ${formatFrame(response)}`);
          } catch (err) {
            console.log(`${command.padEnd(6)} (${describeError(err)})`);
          }
        }
      } catch (err) {
        console.log(`open failed: ${describeError(err)}`);
      } finally {
        await transport.close();
      }
    }
  });

// ---------- encode ----------

program
  .command("encode")
  .description("Print the frame for a command as hex")
  .argument("<command>", "Command mnemonic, e.g. QPIGS")
  .action((command: string) => {
    try {
      console.log(encodeCommand(command).toString("hex"));
    } catch (err) {
      fail(err);
    }
  });

// ---------- decode ----------

program
  .command("decode")
  .description("Validate and decode a captured response frame")
  .argument("<type>", "Query type the response answers, e.g. QPIGS")
  .argument("<hex...>", "Hex bytes of the frame (e.g. 28 32 33 ... 0d)")
  .action((typeName: string, hexBytes: string[]) => {
    try {
      const type = queryTypeArg(typeName);
      const hex = hexBytes.join("").replace(/\s+/g, "");
      if (!/^([0-9a-fA-F]{2})+$/.test(hex)) {
        throw new Error("Frame must be an even number of hex digits");
      }
      const tokens = decodeResponse(Buffer.from(hex, "hex"), QUERY_DEFINITIONS[type].command);
      console.log(JSON.stringify(toJson(decodeTokens(type, tokens)), null, 2));
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);
