/**
 * PI30 frame construction and parsing.
 *
 * Requests are the ASCII command followed by a two byte CRC and a carriage
 * return. Responses are `(` + space separated payload + CRC + CR, with the CRC
 * computed over the leading parenthesis and the payload.
 */

import { ChecksumError, CommandRejectedError, FramingError } from "./errors.js";
import { QueryType, QUERY_DEFINITIONS } from "./queries.js";

export const FRAME_START = 0x28; // "("
export const FRAME_END = 0x0d; // CR

// ---------- CRC ----------

// Nibble table for CRC-16/XMODEM (polynomial 0x1021)
const CRC_TABLE = new Uint16Array(16);
for (let i = 0; i < 16; i++) {
  let crc = i << 12;
  for (let j = 0; j < 4; j++) {
    crc = crc & 0x8000 ? ((crc << 1) ^ 0x1021) & 0xffff : (crc << 1) & 0xffff;
  }
  CRC_TABLE[i] = crc;
}

// CRC bytes that would read as framing characters (or NUL) are bumped by one.
const RESERVED_CRC_BYTES = new Set([0x28, 0x0d, 0x0a, 0x00]);

function adjustCrcByte(byte: number): number {
  return RESERVED_CRC_BYTES.has(byte) ? byte + 1 : byte;
}

/** Calculate the PI30 CRC over the given bytes and return `[high, low]`. */
export function crcPi(data: Buffer): [number, number] {
  let crc = 0;
  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    let da = crc >>> 12;
    crc = (crc << 4) & 0xffff;
    crc ^= CRC_TABLE[da ^ (byte >>> 4)];
    da = crc >>> 12;
    crc = (crc << 4) & 0xffff;
    crc ^= CRC_TABLE[da ^ (byte & 0x0f)];
  }
  return [adjustCrcByte(crc >>> 8), adjustCrcByte(crc & 0xff)];
}

/** Append the PI30 CRC and terminator to the given body. */
export function addCrc(body: Buffer): Buffer {
  const [high, low] = crcPi(body);
  return Buffer.concat([body, Buffer.from([high, low, FRAME_END])]);
}

// ---------- Requests ----------

/** Build the wire frame for a raw command mnemonic such as `QPIGS`. */
export function encodeCommand(command: string): Buffer {
  if (!/^[\x21-\x7e]+$/.test(command)) {
    throw new FramingError(`Command must be printable ASCII without spaces: ${JSON.stringify(command)}`);
  }
  return addCrc(Buffer.from(command, "ascii"));
}

/** Build the wire frame for a query type. */
export function encode(queryType: QueryType): Buffer {
  return encodeCommand(QUERY_DEFINITIONS[queryType].command);
}

// ---------- Responses ----------

/**
 * Validate a response frame and split its payload into tokens.
 *
 * @param frame    Raw bytes up to and including the CR terminator
 * @param command  Command the frame answers, used in error messages
 * @throws FramingError          terminator or start byte missing, frame too short
 * @throws ChecksumError         CRC does not match the payload
 * @throws CommandRejectedError  the inverter answered NAK
 */
export function decodeResponse(frame: Buffer, command = "response"): string[] {
  // "(" + CRC (2) + CR is the shortest possible frame
  if (frame.length < 4) {
    throw new FramingError(`Frame too short (${frame.length} bytes)`);
  }
  if (frame[frame.length - 1] !== FRAME_END) {
    throw new FramingError("Frame is not terminated by CR");
  }
  if (frame[0] !== FRAME_START) {
    throw new FramingError(`Frame does not start with "(" (got 0x${frame[0].toString(16).padStart(2, "0")})`);
  }

  const body = frame.subarray(0, frame.length - 3);
  const [high, low] = crcPi(body);
  const receivedHigh = frame[frame.length - 3];
  const receivedLow = frame[frame.length - 2];
  if (high !== receivedHigh || low !== receivedLow) {
    throw new ChecksumError((high << 8) | low, (receivedHigh << 8) | receivedLow);
  }

  const payload = body.subarray(1).toString("latin1");
  if (payload.trim() === "NAK") {
    throw new CommandRejectedError(command);
  }
  return payload.split(/\s+/).filter((token) => token.length > 0);
}

/** Render a frame as text, escaping non-printable bytes as `\xHH`. */
export function formatFrame(frame: Buffer): string {
  let out = "";
  for (const byte of frame) {
    if (byte >= 0x20 && byte < 0x7f) {
      out += String.fromCharCode(byte);
    } else {
      out += `\\x${byte.toString(16).padStart(2, "0")}`;
    }
  }
  return out;
}
