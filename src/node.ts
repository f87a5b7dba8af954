// src/node.ts

import {
  VERSION_LEGACY,
  VERSION_ONE,
  decodeEmpty,
  decodeNode,
  decodeNodes,
  encodeCluster,
  encodeJoin,
  encodeLeader,
  encodePromote,
  encodeRemove,
} from "./codec";
import { Connector, defaultConnectorConfig } from "./connector";
import { type DialFunc, tcpDial, unixDial } from "./dial";
import type { Engine, EngineFactory } from "./engine";
import { EngineError, JoinError, OperationError } from "./errors";
import { Logger, createLogger } from "./logger";
import { Message } from "./message";
import type { NodeInfo, NodeStore } from "./node_store";
import { Protocol, connect } from "./protocol";

/**
 * Prefix of the default bind address, followed by the node id.
 */
export const BIND_ADDRESS_PREFIX = "@dqlite-";

export interface NodeOptions {
  /** Logger for the node. Default: a "Node" component logger. */
  log?: Logger;
  /**
   * Dial function handed to the engine and used by join to reach peers.
   * Default: the engine keeps its own, join dials TCP.
   */
  dial?: DialFunc;
  /** Address the engine listens on. Default: `@dqlite-<id>`. */
  bindAddress?: string;
}

export interface JoinOptions {
  /** Overrides the node's dial function for this call. */
  dial?: DialFunc;
  signal?: AbortSignal;
}

export interface LeaveOptions {
  /** Default: TCP. */
  dial?: DialFunc;
  signal?: AbortSignal;
  log?: Logger;
}

/**
 * Holds at most one error; further errors are dropped while it is occupied.
 */
class ErrorSlot {
  private error?: Error;

  offer(error: Error): boolean {
    if (this.error) {
      return false;
    }
    this.error = error;
    return true;
  }

  take(): Error | undefined {
    const error = this.error;
    this.error = undefined;
    return error;
  }
}

/**
 * Sends a request whose only answer is an acknowledgement.
 */
async function acknowledged(
  protocol: Protocol,
  request: Message,
  response: Message,
  signal?: AbortSignal,
): Promise<void> {
  await protocol.call(request, response, signal);
  decodeEmpty(response);
}

/**
 * Runs a local engine and exposes the cluster membership operations around
 * it.
 *
 * @example
 * ```typescript
 * const node = new Node({ id: 1n, address: "10.0.0.1:9001" }, "/var/lib/app", createEngine);
 * await node.start();
 * await node.join(store, { signal: AbortSignal.timeout(10_000) });
 * console.log(await node.cluster());
 * ```
 */
export class Node {
  readonly id: bigint;
  readonly address: string;
  private readonly log: Logger;
  private readonly engine: Engine;
  private readonly localAddress: string;
  private readonly peerDial: DialFunc;
  private readonly acceptErrors = new ErrorSlot();
  private released = false;

  /**
   * @param info Identity of this node in the cluster.
   * @param dir Data directory handed to the engine.
   * @param createEngine Builds the engine this node owns.
   */
  constructor(
    info: NodeInfo,
    dir: string,
    createEngine: EngineFactory,
    options: NodeOptions = {},
  ) {
    this.id = info.id;
    this.address = info.address;
    this.log = (options.log ?? createLogger("Node")).child({
      nodeId: info.id.toString(),
    });
    this.localAddress = options.bindAddress || `${BIND_ADDRESS_PREFIX}${info.id}`;
    this.peerDial = options.dial ?? tcpDial;

    this.engine = createEngine({
      id: info.id,
      address: info.address,
      dir,
      onAcceptError: (error) => this.reportAcceptError(error),
    });

    try {
      if (options.dial) {
        this.engine.setDialFunc(options.dial);
      }
      this.engine.setBindAddress(this.localAddress);
    } catch (err) {
      this.released = true;
      this.engine.close();
      throw new EngineError("failed to configure engine", err);
    }
  }

  /**
   * The network address the engine is listening on.
   */
  bindAddress(): string {
    return this.engine.getBindAddress();
  }

  /**
   * Starts serving requests.
   */
  async start(): Promise<void> {
    await this.engine.start();
    this.log.info("Node started", { address: this.localAddress });
  }

  /**
   * Stops the engine and releases its resources. Resources are released even
   * when stopping fails; the stop failure is still thrown.
   */
  async close(): Promise<void> {
    let stopError: unknown;
    try {
      await this.engine.stop();
    } catch (err) {
      stopError = err;
    }

    if (!this.released) {
      this.released = true;
      this.engine.close();
    }

    if (stopError !== undefined) {
      this.log.error("Engine failed to stop", stopError);
      throw new EngineError("server failed to stop", stopError);
    }
    this.log.info("Node closed");
  }

  /**
   * Takes the pending accept-loop error reported by the engine, if any.
   */
  acceptError(): Error | undefined {
    return this.acceptErrors.take();
  }

  /**
   * Returns every member of the cluster, as seen by the local engine.
   */
  async cluster(signal?: AbortSignal): Promise<NodeInfo[]> {
    const protocol = await this.connectLocal(VERSION_LEGACY, signal);
    try {
      const request = new Message(16);
      const response = new Message(4096);
      encodeCluster(request);

      try {
        await protocol.call(request, response, signal);
      } catch (err) {
        throw new OperationError("send", "failed to send Cluster request", err);
      }

      try {
        return decodeNodes(response);
      } catch (err) {
        throw new OperationError("parse", "failed to parse Node response", err);
      }
    } finally {
      protocol.close();
    }
  }

  /**
   * Returns the current leader, or null when none is known.
   */
  async leader(signal?: AbortSignal): Promise<NodeInfo | null> {
    const protocol = await this.connectLocal(VERSION_ONE, signal);
    try {
      const request = new Message(16);
      const response = new Message(512);
      encodeLeader(request);

      try {
        await protocol.call(request, response, signal);
      } catch (err) {
        throw new OperationError("send", "failed to send Leader request", err);
      }

      try {
        return decodeNode(response);
      } catch (err) {
        throw new OperationError("parse", "failed to parse Node response", err);
      }
    } finally {
      protocol.close();
    }
  }

  /**
   * Adds this node to the cluster reachable through `store`, then promotes
   * it. When the promote step fails the node stays joined but not promoted;
   * the thrown JoinError names the failed step.
   */
  async join(store: NodeStore, options: JoinOptions = {}): Promise<void> {
    const { signal } = options;
    const connector = new Connector(
      store,
      defaultConnectorConfig(options.dial ?? this.peerDial),
      this.log,
    );
    const protocol = await connector.connect(signal);

    try {
      const request = new Message(4096);
      const response = new Message(4096);

      encodeJoin(request, this.id, this.address);
      try {
        await acknowledged(protocol, request, response, signal);
      } catch (err) {
        throw new JoinError("join", err);
      }

      encodePromote(request, this.id);
      try {
        await acknowledged(protocol, request, response, signal);
      } catch (err) {
        throw new JoinError("promote", err);
      }
    } finally {
      protocol.close();
    }

    this.log.info("Joined cluster", { address: this.address });
  }

  private async connectLocal(version: bigint, signal?: AbortSignal): Promise<Protocol> {
    try {
      return await connect(unixDial, this.localAddress, version, signal, this.log);
    } catch (err) {
      throw new OperationError("connect", "failed to connect to engine", err);
    }
  }

  private reportAcceptError(error: Error): void {
    if (!this.acceptErrors.offer(error)) {
      this.log.warn("Dropping accept error, previous one not consumed", {
        error: error.message,
      });
    }
  }
}

/**
 * Removes the node with the given id from the cluster reachable through
 * `store`. No local engine is needed.
 *
 * Whether removing an id that is not a member succeeds is up to the cluster;
 * its answer is passed through unchanged.
 */
export async function leave(
  id: bigint,
  store: NodeStore,
  options: LeaveOptions = {},
): Promise<void> {
  const { signal } = options;
  const log = options.log ?? createLogger("Leave");
  const connector = new Connector(
    store,
    defaultConnectorConfig(options.dial ?? tcpDial),
    log,
  );
  const protocol = await connector.connect(signal);

  try {
    const request = new Message(4096);
    const response = new Message(4096);
    encodeRemove(request, id);
    try {
      await protocol.call(request, response, signal);
    } catch (err) {
      throw new OperationError("send", "failed to send Remove request", err);
    }

    try {
      decodeEmpty(response);
    } catch (err) {
      throw new OperationError("parse", "failed to parse Empty response", err);
    }
  } finally {
    protocol.close();
  }

  log.info("Removed node from cluster", { removedId: id.toString() });
}
