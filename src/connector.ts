// src/connector.ts

import {
  VERSION_LEGACY,
  VERSION_ONE,
  decodeNode,
  decodeNodeLegacy,
  encodeLeader,
} from "./codec";
import { type DialFunc, tcpDial } from "./dial";
import { ConnectionError, toError } from "./errors";
import { Logger, createLogger } from "./logger";
import { Message } from "./message";
import type { NodeStore } from "./node_store";
import { Protocol, connect } from "./protocol";
import {
  type RetryStrategy,
  backoff,
  binaryExponential,
  shouldAttempt,
} from "./retry";

/**
 * Default upper bound for a single connection attempt to one candidate.
 */
export const DEFAULT_ATTEMPT_TIMEOUT_MS = 1000;

export interface ConnectorConfig {
  /** Opens connections to candidate addresses. */
  dial: DialFunc;
  /** Bound on dial, handshake and leader query for one candidate (ms). */
  attemptTimeoutMs: number;
  /** Consulted in order before every pass over the store. */
  retryStrategies: RetryStrategy[];
  /** Version sent in the handshake. */
  version: bigint;
}

/**
 * One-second attempts with binary exponential backoff starting at 1ms.
 */
export function defaultConnectorConfig(dial: DialFunc = tcpDial): ConnectorConfig {
  return {
    dial,
    attemptTimeoutMs: DEFAULT_ATTEMPT_TIMEOUT_MS,
    retryStrategies: [backoff(binaryExponential(1))],
    version: VERSION_ONE,
  };
}

interface AttemptResult {
  protocol?: Protocol;
  leader: string;
}

/**
 * Combines the caller's signal with a per-attempt timeout.
 */
function boundedSignal(
  parent: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new Error(`attempt timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );
  const onAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    onAbort();
  } else {
    parent?.addEventListener("abort", onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onAbort);
    },
  };
}

/**
 * Establishes a connection to the current cluster leader, using the node
 * store to find candidates and retrying until the caller's signal gives up.
 *
 * @example
 * ```typescript
 * const connector = new Connector(store, defaultConnectorConfig());
 * const protocol = await connector.connect(AbortSignal.timeout(5000));
 * try {
 *   // protocol.call(...)
 * } finally {
 *   protocol.close();
 * }
 * ```
 */
export class Connector {
  private readonly config: Readonly<ConnectorConfig>;
  private readonly log: Logger;

  constructor(
    private readonly store: NodeStore,
    config: ConnectorConfig,
    log: Logger = createLogger("Connector"),
  ) {
    this.config = Object.freeze({
      ...config,
      retryStrategies: [...config.retryStrategies],
    });
    this.log = log.child({ component: "Connector" });
  }

  /**
   * Returns a connection to the leader. Rejects with ConnectionError once
   * the retry strategies stop or the signal aborts.
   */
  async connect(signal?: AbortSignal): Promise<Protocol> {
    let lastError: Error | undefined;

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        break;
      }
      if (!(await shouldAttempt(attempt, this.config.retryStrategies, signal))) {
        break;
      }
      if (signal?.aborted) {
        break;
      }

      this.log.debug("Connection attempt", { attempt });
      try {
        return await this.connectAttemptAll(signal);
      } catch (err) {
        lastError = toError(err);
        this.log.debug("Connection attempt failed", {
          attempt,
          error: lastError.message,
        });
      }
    }

    throw new ConnectionError(
      "no available cluster leader",
      undefined,
      lastError ?? (signal?.aborted ? signal.reason : undefined),
    );
  }

  /**
   * One pass over every candidate in the store.
   */
  private async connectAttemptAll(signal?: AbortSignal): Promise<Protocol> {
    const nodes = await this.store.get(signal);
    let lastError: Error | undefined;

    for (const node of nodes) {
      if (signal?.aborted) {
        break;
      }
      const attempt = boundedSignal(signal, this.config.attemptTimeoutMs);
      try {
        const first = await this.connectAttemptOne(node.address, attempt.signal);
        if (first.protocol) {
          return first.protocol;
        }
        if (first.leader === "") {
          this.log.debug("Candidate knows no leader", { address: node.address });
          continue;
        }

        const redirected = await this.connectAttemptOne(first.leader, attempt.signal);
        if (redirected.protocol) {
          return redirected.protocol;
        }
        this.log.debug("Reported leader did not confirm leadership", {
          address: node.address,
          leader: first.leader,
        });
      } catch (err) {
        lastError = toError(err);
        this.log.debug("Candidate unreachable", {
          address: node.address,
          error: lastError.message,
        });
      } finally {
        attempt.dispose();
      }
    }

    throw lastError ?? new ConnectionError("no candidate reported itself as leader");
  }

  /**
   * Connects to one address and asks it who the leader is. The connection is
   * kept only when the address is the leader itself.
   */
  private async connectAttemptOne(
    address: string,
    signal: AbortSignal,
  ): Promise<AttemptResult> {
    const protocol = await connect(
      this.config.dial,
      address,
      this.config.version,
      signal,
      this.log,
    );

    try {
      const request = new Message(16);
      const response = new Message(512);
      encodeLeader(request);
      await protocol.call(request, response, signal);

      const leader =
        this.config.version === VERSION_LEGACY
          ? (decodeNodeLegacy(response) ?? "")
          : (decodeNode(response)?.address ?? "");

      if (leader === address) {
        return { protocol, leader };
      }
      protocol.close();
      return { leader };
    } catch (err) {
      protocol.close();
      throw err;
    }
  }
}
