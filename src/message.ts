// src/message.ts

import { MessageOverflowError, ProtocolError } from "./errors";

/** Size of the fixed message header, in bytes. */
export const HEADER_SIZE = 8;

/** Bodies are always a whole number of 8-byte words. */
export const WORD_SIZE = 8;

/**
 * Decoded message header.
 *
 * Layout (little-endian): words uint32 | type uint8 | schema uint8 | extra uint16
 */
export interface MessageHeader {
  words: number;
  type: number;
  schema: number;
  extra: number;
}

export function encodeHeader(header: MessageHeader): Buffer {
  const buf = Buffer.alloc(HEADER_SIZE);
  buf.writeUInt32LE(header.words, 0);
  buf.writeUInt8(header.type, 4);
  buf.writeUInt8(header.schema, 5);
  buf.writeUInt16LE(header.extra, 6);
  return buf;
}

export function decodeHeader(buf: Buffer): MessageHeader {
  if (buf.length < HEADER_SIZE) {
    throw new ProtocolError(`message header too short: ${buf.length} bytes`, {
      size: buf.length,
    });
  }
  return {
    words: buf.readUInt32LE(0),
    type: buf.readUInt8(4),
    schema: buf.readUInt8(5),
    extra: buf.readUInt16LE(6),
  };
}

function padded(size: number): number {
  return Math.ceil(size / WORD_SIZE) * WORD_SIZE;
}

/**
 * A binary message: header fields plus a body buffer allocated once with a
 * fixed capacity. The same instance is written with put* calls when used as a
 * request, or loaded from the wire and read with get* calls when used as a
 * response.
 */
export class Message {
  private readonly body: Buffer;
  private length = 0;
  private cursor = 0;

  type = 0;
  schema = 0;
  extra = 0;

  /**
   * @param capacity Body capacity in bytes, a positive multiple of 8.
   */
  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0 || capacity % WORD_SIZE !== 0) {
      throw new RangeError(
        `message capacity must be a positive multiple of ${WORD_SIZE}, got ${capacity}`,
      );
    }
    this.body = Buffer.alloc(capacity);
  }

  get capacity(): number {
    return this.body.length;
  }

  /** Number of body bytes written or loaded. */
  get size(): number {
    return this.length;
  }

  /**
   * Clears the body and starts a new message of the given type.
   */
  reset(type: number, schema = 0): void {
    this.body.fill(0, 0, this.length);
    this.length = 0;
    this.cursor = 0;
    this.type = type;
    this.schema = schema;
    this.extra = 0;
  }

  putUint64(value: bigint): void {
    if (value < 0n || value > 0xffffffffffffffffn) {
      throw new RangeError(`value out of uint64 range: ${value}`);
    }
    this.reserve(WORD_SIZE);
    this.body.writeBigUInt64LE(value, this.length);
    this.length += WORD_SIZE;
  }

  /**
   * Writes a NUL-terminated UTF-8 string, zero padded to a word boundary.
   */
  putString(value: string): void {
    const bytes = Buffer.from(value, "utf8");
    if (bytes.includes(0)) {
      throw new ProtocolError("string contains a NUL byte", { value });
    }
    const size = padded(bytes.length + 1);
    this.reserve(size);
    bytes.copy(this.body, this.length);
    this.body.fill(0, this.length + bytes.length, this.length + size);
    this.length += size;
  }

  getUint64(): bigint {
    if (this.cursor + WORD_SIZE > this.length) {
      throw new ProtocolError("message body too short for uint64", {
        offset: this.cursor,
        size: this.length,
      });
    }
    const value = this.body.readBigUInt64LE(this.cursor);
    this.cursor += WORD_SIZE;
    return value;
  }

  getString(): string {
    const end = this.body.indexOf(0, this.cursor);
    if (end === -1 || end >= this.length) {
      throw new ProtocolError("unterminated string in message body", {
        offset: this.cursor,
        size: this.length,
      });
    }
    const next = this.cursor + padded(end - this.cursor + 1);
    if (next > this.length) {
      throw new ProtocolError("string padding runs past message body", {
        offset: this.cursor,
        size: this.length,
      });
    }
    const value = this.body.toString("utf8", this.cursor, end);
    this.cursor = next;
    return value;
  }

  /** Moves the read cursor back to the start of the body. */
  rewind(): void {
    this.cursor = 0;
  }

  header(): MessageHeader {
    return {
      words: this.length / WORD_SIZE,
      type: this.type,
      schema: this.schema,
      extra: this.extra,
    };
  }

  /**
   * Header and body as they go on the wire.
   */
  frame(): Buffer {
    return Buffer.concat([
      encodeHeader(this.header()),
      this.body.subarray(0, this.length),
    ]);
  }

  /**
   * Replaces the contents with a message read from the wire.
   */
  load(header: MessageHeader, body: Buffer): void {
    if (body.length > this.capacity) {
      throw new MessageOverflowError(body.length, this.capacity);
    }
    if (body.length !== header.words * WORD_SIZE) {
      throw new ProtocolError("message body does not match header size", {
        words: header.words,
        size: body.length,
      });
    }
    this.body.fill(0, 0, this.length);
    body.copy(this.body, 0);
    this.length = body.length;
    this.cursor = 0;
    this.type = header.type;
    this.schema = header.schema;
    this.extra = header.extra;
  }

  private reserve(size: number): void {
    if (this.length + size > this.capacity) {
      throw new MessageOverflowError(this.length + size, this.capacity);
    }
  }
}
