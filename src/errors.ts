// src/errors.ts

/**
 * Base error class for all nodectl errors.
 */
export class NodectlError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "NodectlError";
  }
}

/**
 * Normalises a thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function describeCause(message: string, cause: unknown): string {
  return cause === undefined ? message : `${message}: ${toError(cause).message}`;
}

/**
 * Error thrown when no usable connection to a cluster member could be made.
 */
export class ConnectionError extends NodectlError {
  constructor(message: string, address?: string, cause?: unknown) {
    super(describeCause(message, cause), "CONNECTION_FAILED", { address }, cause);
    this.name = "ConnectionError";
  }
}

/**
 * Error thrown when a request could not be written to the peer.
 */
export class PeerWriteError extends NodectlError {
  constructor(cause?: unknown) {
    super(
      describeCause("failed to write request", cause),
      "PEER_UNREACHABLE",
      undefined,
      cause,
    );
    this.name = "PeerWriteError";
  }
}

/**
 * Error thrown when the peer goes away before a complete response arrived.
 */
export class PeerClosedError extends NodectlError {
  constructor(
    public readonly part: "header" | "body",
    cause?: unknown,
  ) {
    super(
      describeCause(`peer closed connection before complete response ${part}`, cause),
      "PEER_CLOSED",
      { part },
      cause,
    );
    this.name = "PeerClosedError";
  }
}

/**
 * Error thrown when the caller's signal fires while a call is in flight.
 */
export class CallCancelledError extends NodectlError {
  constructor(cause?: unknown) {
    super(describeCause("call cancelled", cause), "CALL_CANCELLED", undefined, cause);
    this.name = "CallCancelledError";
  }
}

/**
 * Error thrown when a message does not have the expected shape.
 */
export class ProtocolError extends NodectlError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "PROTOCOL_ERROR", context);
    this.name = "ProtocolError";
  }
}

/**
 * Error thrown when a message body would exceed its allocated capacity.
 */
export class MessageOverflowError extends NodectlError {
  constructor(size: number, capacity: number) {
    super(
      `message body of ${size} bytes exceeds capacity of ${capacity} bytes`,
      "MESSAGE_OVERFLOW",
      { size, capacity },
    );
    this.name = "MessageOverflowError";
  }
}

/**
 * Error thrown when the peer answered a request with a failure response.
 */
export class RequestFailedError extends NodectlError {
  constructor(
    public readonly failureCode: bigint,
    public readonly description: string,
  ) {
    super(
      `request failed (${failureCode}): ${description}`,
      "REQUEST_FAILED",
      { failureCode: failureCode.toString(), description },
    );
    this.name = "RequestFailedError";
  }
}

export type OperationPhase = "connect" | "send" | "parse";

/**
 * Error wrapping a failure with the phase of the operation it happened in.
 */
export class OperationError extends NodectlError {
  constructor(
    public readonly phase: OperationPhase,
    message: string,
    cause: unknown,
  ) {
    super(describeCause(message, cause), "OPERATION_FAILED", { phase }, cause);
    this.name = "OperationError";
  }
}

export type JoinStep = "join" | "promote";

/**
 * Error thrown when one step of joining a cluster fails. A failed "promote"
 * step leaves the node joined but not promoted.
 */
export class JoinError extends NodectlError {
  constructor(
    public readonly step: JoinStep,
    cause: unknown,
  ) {
    super(
      describeCause(`failed to ${step} node`, cause),
      "JOIN_FAILED",
      { step },
      cause,
    );
    this.name = "JoinError";
  }
}

/**
 * Error thrown when the local engine rejects a lifecycle or config operation.
 */
export class EngineError extends NodectlError {
  constructor(message: string, cause?: unknown) {
    super(describeCause(message, cause), "ENGINE_ERROR", undefined, cause);
    this.name = "EngineError";
  }
}
