import { describe, it, expect } from "vitest";
import { crcPi, addCrc, encodeCommand, encode, decodeResponse, formatFrame } from "../src/frame.js";
import { QueryType } from "../src/queries.js";
import { ChecksumError, CommandRejectedError, FramingError } from "../src/errors.js";

const hex = (s: string) => Buffer.from(s.replace(/\s+/g, ""), "hex");

describe("PI30 CRC", () => {
  it("should calculate known command CRCs", () => {
    expect(crcPi(Buffer.from("QPIGS"))).toEqual([0xb7, 0xa9]);
    expect(crcPi(Buffer.from("QMOD"))).toEqual([0x49, 0xc1]);
    expect(crcPi(Buffer.from("QPIRI"))).toEqual([0xf8, 0x54]);
    expect(crcPi(Buffer.from("QPI"))).toEqual([0xbe, 0xac]);
    expect(crcPi(Buffer.from("QID"))).toEqual([0xd6, 0xea]);
    expect(crcPi(Buffer.from("QVFW"))).toEqual([0x62, 0x99]);
    expect(crcPi(Buffer.from("QPIGS2"))).toEqual([0x68, 0x2d]);
    expect(crcPi(Buffer.from("Q1"))).toEqual([0x1b, 0xfc]);
  });

  it("should calculate the CRC of a response body including the parenthesis", () => {
    expect(crcPi(Buffer.from("(NAK"))).toEqual([0x73, 0x73]);
    expect(crcPi(Buffer.from("(PI30"))).toEqual([0x9a, 0x0b]);
  });

  it("addCrc should append CRC and CR", () => {
    const frame = addCrc(Buffer.from("QMOD"));
    expect(frame.length).toBe(7);
    expect(frame.subarray(4)).toEqual(Buffer.from([0x49, 0xc1, 0x0d]));
  });
});

describe("Request encoding", () => {
  it("encodes the status snapshot query", () => {
    expect(encode(QueryType.StatusSnapshot)).toEqual(hex("5150494753 b7a9 0d"));
  });

  it("encodes every query type with its mnemonic", () => {
    expect(encode(QueryType.Mode).toString("hex")).toBe("514d4f4449c10d");
    expect(encode(QueryType.TemperatureAndStage).toString("hex")).toBe("51311bfc0d");
    expect(encode(QueryType.PVSecondary).toString("hex")).toBe("515049475332682d0d");
  });

  it("rejects commands that are not printable ASCII", () => {
    expect(() => encodeCommand("")).toThrow(FramingError);
    expect(() => encodeCommand("QP IGS")).toThrow(FramingError);
    expect(() => encodeCommand("QPIGS\r")).toThrow(FramingError);
  });
});

describe("Response decoding", () => {
  it("splits a valid frame into tokens", () => {
    expect(decodeResponse(hex("2830322e31203135302e30203030333135 f42c 0d"))).toEqual([
      "02.1",
      "150.0",
      "00315",
    ]);
  });

  it("decodes a single token frame", () => {
    expect(decodeResponse(hex("28504933309a0b0d"))).toEqual(["PI30"]);
  });

  it("rejects a frame without CR terminator", () => {
    expect(() => decodeResponse(hex("28504933309a0b"))).toThrow(FramingError);
  });

  it("rejects a frame that does not start with a parenthesis", () => {
    expect(() => decodeResponse(hex("50504933309a0b0d"))).toThrow(FramingError);
  });

  it("rejects a frame that is too short", () => {
    expect(() => decodeResponse(hex("280d"))).toThrow("Frame too short (2 bytes)");
  });

  it("rejects a frame with a corrupted payload", () => {
    // "(PI31" with the CRC of "(PI30"
    const run = () => decodeResponse(hex("28504933319a0b0d"));
    expect(run).toThrow(ChecksumError);
  });

  it("reports expected and received CRC values", () => {
    try {
      decodeResponse(hex("2850493330 0000 0d"));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ChecksumError);
      if (err instanceof ChecksumError) {
        expect(err.expected).toBe(0x9a0b);
        expect(err.received).toBe(0x0000);
        expect(err.message).toBe("Frame checksum mismatch: expected 0x9a0b, received 0x0000");
      }
    }
  });

  it("raises CommandRejectedError for NAK", () => {
    expect(() => decodeResponse(hex("284e414b73730d"), "QPIGS2")).toThrow(
      new CommandRejectedError("QPIGS2")
    );
  });
});

describe("formatFrame", () => {
  it("escapes non-printable bytes", () => {
    expect(formatFrame(hex("28504933309a0b0d"))).toBe("(PI30\\x9a\\x0b\\x0d");
  });
});
