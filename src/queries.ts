/**
 * Catalogue of the PI30 queries the bridge issues.
 */

export enum QueryType {
  StatusSnapshot = "StatusSnapshot",
  RatedSettings = "RatedSettings",
  TemperatureAndStage = "TemperatureAndStage",
  Mode = "Mode",
  Identity = "Identity",
  ProtocolId = "ProtocolId",
  Firmware = "Firmware",
  PVSecondary = "PVSecondary",
}

/**
 * How often a query is polled.
 *
 * - `frequent`: every read interval
 * - `periodic`: every second read interval
 * - `once-then-daily`: at startup, then every 24 hours
 * - `startup`: once, after the first successful open
 */
export type Cadence = "frequent" | "periodic" | "once-then-daily" | "startup";

export interface QueryDefinition {
  type: QueryType;
  /** Command mnemonic sent on the wire */
  command: string;
  /** Number of whitespace separated tokens in a valid response */
  arity: number;
  cadence: Cadence;
}

export const QUERY_DEFINITIONS: Readonly<Record<QueryType, QueryDefinition>> = {
  [QueryType.StatusSnapshot]: {
    type: QueryType.StatusSnapshot,
    command: "QPIGS",
    arity: 21,
    cadence: "frequent",
  },
  [QueryType.Mode]: {
    type: QueryType.Mode,
    command: "QMOD",
    arity: 1,
    cadence: "frequent",
  },
  [QueryType.PVSecondary]: {
    type: QueryType.PVSecondary,
    command: "QPIGS2",
    arity: 3,
    cadence: "frequent",
  },
  [QueryType.TemperatureAndStage]: {
    type: QueryType.TemperatureAndStage,
    command: "Q1",
    arity: 27,
    cadence: "periodic",
  },
  [QueryType.RatedSettings]: {
    type: QueryType.RatedSettings,
    command: "QPIRI",
    arity: 25,
    cadence: "once-then-daily",
  },
  [QueryType.Identity]: {
    type: QueryType.Identity,
    command: "QID",
    arity: 1,
    cadence: "startup",
  },
  [QueryType.ProtocolId]: {
    type: QueryType.ProtocolId,
    command: "QPI",
    arity: 1,
    cadence: "startup",
  },
  [QueryType.Firmware]: {
    type: QueryType.Firmware,
    command: "QVFW",
    arity: 1,
    cadence: "startup",
  },
};

export const ALL_QUERY_TYPES: readonly QueryType[] = Object.values(QueryType);

/** Look up a query type by its enum name or command mnemonic (case-insensitive). */
export function parseQueryType(value: string): QueryType | undefined {
  const wanted = value.toLowerCase();
  for (const def of Object.values(QUERY_DEFINITIONS)) {
    if (def.type.toLowerCase() === wanted || def.command.toLowerCase() === wanted) {
      return def.type;
    }
  }
  return undefined;
}

export function queriesWithCadence(cadence: Cadence): QueryType[] {
  return ALL_QUERY_TYPES.filter((type) => QUERY_DEFINITIONS[type].cadence === cadence);
}
