/**
 * Fixed eight-byte command frames exchanged with the register server, and the integer packing used
 * for their payload. Everything here is pure; sockets live in `commandSession`.
 */
import { EncodeRangeError, FrameFormatError } from '../errors';

/** Length of every request and response frame on the wire. */
export const FRAME_LENGTH = 8;

/** Request opcodes understood by the register server. */
export const Opcode = {
  /** Selects a register for the write that follows. */
  SelectForSet: 0x50,
  /** Writes the payload into the selected register. */
  CommitSet: 0x52,
  /** Reads a register; the response payload carries its value. */
  Query: 0x40,
  /** Acknowledges a read and releases the register. */
  Release: 0x42,
} as const;

export type RequestOpcode = (typeof Opcode)[keyof typeof Opcode];

/** Response opcodes are the request opcode plus one. */
export const responseOpcodeFor = (opcode: RequestOpcode): number => opcode + 1;

export type PayloadBytes = readonly [number, number, number, number];

/**
 * Structured view of one frame. Offsets: opcode 0, argument 1, reserved 2–3, payload 4–7
 * (payload[0] is the most significant byte).
 */
export interface CommandFrame {
  opcode: number;
  /** Register selector or job index, 0–255. */
  argument: number;
  payload: PayloadBytes;
}

export const EMPTY_PAYLOAD: PayloadBytes = [0, 0, 0, 0];

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const UINT32_SPAN = 2 ** 32;
const INT32_SPAN_HALF = 2 ** 31;

export type EncodeResult =
  | { ok: true; bytes: readonly [number, number, number] }
  | { ok: false; error: EncodeRangeError };

/**
 * Packs a signed 32-bit integer into the low three payload bytes.
 *
 * Only bits 0–23 are kept: the most significant payload byte is never written, so values that need
 * it lose information. Callers place the result in payload bytes 1–3 and leave byte 0 zero.
 */
export function encodePayload(value: number): EncodeResult {
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    return { ok: false, error: new EncodeRangeError(value) };
  }

  const unsigned = value < 0 ? value + UINT32_SPAN : value;
  return {
    ok: true,
    bytes: [
      Math.floor(unsigned / 0x10000) % 0x100,
      Math.floor(unsigned / 0x100) % 0x100,
      unsigned % 0x100,
    ],
  };
}

/**
 * Rebuilds a signed 32-bit integer from four big-endian payload bytes. This reads the top byte that
 * `encodePayload` never writes, so it is only the inverse of encoding for values below 2^24.
 */
export function decodePayload(byte0: number, byte1: number, byte2: number, byte3: number): number {
  const unsigned = byte0 * 0x1000000 + byte1 * 0x10000 + byte2 * 0x100 + byte3;
  return unsigned >= INT32_SPAN_HALF ? unsigned - UINT32_SPAN : unsigned;
}

/** Builds the payload of a value-carrying frame, throwing when the value does not encode. */
export function payloadFor(value: number): PayloadBytes {
  const result = encodePayload(value);
  if (!result.ok) {
    throw result.error;
  }
  const [byte1, byte2, byte3] = result.bytes;
  return [0, byte1, byte2, byte3];
}

const isByte = (value: number) => Number.isInteger(value) && value >= 0 && value <= 0xff;

/**
 * Writes a frame into a freshly zero-filled eight-byte buffer. The reserved bytes are never
 * touched, so nothing from an earlier exchange can leak into them.
 */
export function serializeFrame(frame: CommandFrame): Buffer {
  if (!isByte(frame.opcode)) {
    throw new FrameFormatError(`Opcode ${frame.opcode} does not fit in one byte.`);
  }
  if (!isByte(frame.argument)) {
    throw new FrameFormatError(`Argument ${frame.argument} must be an integer between 0 and 255.`);
  }
  if (!frame.payload.every(isByte)) {
    throw new FrameFormatError(`Payload [${frame.payload.join(', ')}] contains a non-byte value.`);
  }

  const buffer = Buffer.alloc(FRAME_LENGTH);
  buffer[0] = frame.opcode;
  buffer[1] = frame.argument;
  frame.payload.forEach((byte, offset) => {
    buffer[4 + offset] = byte;
  });
  return buffer;
}

/** Reads the first eight bytes of `buffer` as a frame. Reserved bytes are ignored. */
export function parseFrame(buffer: Uint8Array): CommandFrame {
  if (buffer.length < FRAME_LENGTH) {
    throw new FrameFormatError(`Expected ${FRAME_LENGTH} bytes, received ${buffer.length}.`);
  }
  return {
    opcode: buffer[0],
    argument: buffer[1],
    payload: [buffer[4], buffer[5], buffer[6], buffer[7]],
  };
}

/** Convenience for the value carried by a response frame. */
export const frameValue = (frame: CommandFrame): number => decodePayload(...frame.payload);
