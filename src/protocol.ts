// src/protocol.ts

import type { Socket } from "net";
import { v4 as uuidv4 } from "uuid";
import type { DialFunc } from "./dial";
import {
  CallCancelledError,
  ConnectionError,
  MessageOverflowError,
  PeerClosedError,
  PeerWriteError,
  toError,
} from "./errors";
import { Logger, createLogger } from "./logger";
import { HEADER_SIZE, Message, WORD_SIZE, decodeHeader } from "./message";

interface PendingRead {
  size: number;
  part: "header" | "body";
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
}

/**
 * A live, version-negotiated connection to a single peer.
 *
 * A Protocol is owned by exactly one caller at a time: calls are strictly
 * sequential, each one writing a request and then reading its response.
 */
export class Protocol {
  readonly id = uuidv4();
  private readonly log: Logger;
  private buffered = Buffer.alloc(0);
  private pending?: PendingRead;
  private ended = false;
  private endCause?: Error;
  private closed = false;

  constructor(
    private readonly socket: Socket,
    readonly version: bigint,
    log: Logger = createLogger("Protocol"),
  ) {
    this.log = log.child({ connection: this.id });

    socket.on("data", (chunk: Buffer) => {
      this.buffered = Buffer.concat([this.buffered, chunk]);
      this.drain();
    });
    socket.on("end", () => this.markEnded());
    socket.on("close", () => this.markEnded());
    socket.on("error", (err) => {
      this.log.debug("Socket error", { error: err.message });
      this.markEnded(err);
    });
  }

  /**
   * Sends the protocol version. Must be the first thing written.
   */
  async handshake(): Promise<void> {
    const buf = Buffer.alloc(8);
    buf.writeBigUInt64LE(this.version);
    await this.write(buf);
  }

  /**
   * Sends a request and reads the peer's response into `response`.
   *
   * When the signal fires mid-call the connection is destroyed, so the call
   * returns at once and the Protocol cannot be used again.
   */
  async call(request: Message, response: Message, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CallCancelledError(signal.reason);
    }

    const onAbort = () => {
      this.log.debug("Call cancelled, closing connection");
      this.close();
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      await this.write(request.frame());
      const header = decodeHeader(await this.read(HEADER_SIZE, "header"));
      const size = header.words * WORD_SIZE;
      if (size > response.capacity) {
        this.close();
        throw new MessageOverflowError(size, response.capacity);
      }
      const body = await this.read(size, "body");
      response.load(header, body);
    } catch (err) {
      if (signal?.aborted) {
        throw new CallCancelledError(signal.reason);
      }
      throw err;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Closes the underlying connection. Safe to call more than once.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.socket.destroy();
    this.markEnded();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private write(data: Buffer): Promise<void> {
    if (this.closed || this.socket.destroyed) {
      return Promise.reject(new PeerWriteError(new Error("connection is closed")));
    }
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) {
          reject(new PeerWriteError(err));
        } else {
          resolve();
        }
      });
    });
  }

  private read(size: number, part: "header" | "body"): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      this.pending = { size, part, resolve, reject };
      this.drain();
    });
  }

  private drain(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    if (this.buffered.length >= pending.size) {
      this.pending = undefined;
      const data = this.buffered.subarray(0, pending.size);
      this.buffered = this.buffered.subarray(pending.size);
      pending.resolve(data);
      return;
    }
    if (this.ended) {
      this.pending = undefined;
      pending.reject(new PeerClosedError(pending.part, this.endCause));
    }
  }

  private markEnded(cause?: Error): void {
    this.ended = true;
    if (cause && !this.endCause) {
      this.endCause = cause;
    }
    this.drain();
  }
}

/**
 * Dials a single address and performs the version handshake.
 */
export async function connect(
  dial: DialFunc,
  address: string,
  version: bigint,
  signal?: AbortSignal,
  log?: Logger,
): Promise<Protocol> {
  if (signal?.aborted) {
    throw new ConnectionError("connect aborted", address, signal.reason);
  }

  let socket: Socket;
  try {
    socket = await dial(address, signal);
  } catch (err) {
    if (err instanceof ConnectionError) {
      throw err;
    }
    throw new ConnectionError("failed to dial", address, toError(err));
  }

  const protocol = new Protocol(socket, version, log?.child({ address }));
  try {
    await protocol.handshake();
  } catch (err) {
    protocol.close();
    throw new ConnectionError("failed to send handshake", address, err);
  }
  return protocol;
}
