// src/engine.ts

import type { DialFunc } from "./dial";

/**
 * Parameters an engine is constructed with.
 */
export interface EngineParams {
  /** Node id (uint64). */
  id: bigint;
  /** Address advertised to the rest of the cluster. */
  address: string;
  /** Directory the engine keeps its data in. */
  dir: string;
  /**
   * Called by the engine's accept loop when handling an inbound connection
   * fails.
   */
  onAcceptError: (error: Error) => void;
}

/**
 * The replicated-consensus engine hosted by a Node. Only its lifecycle and
 * network configuration are visible here; it serves the membership protocol
 * on its bind address once started.
 */
export interface Engine {
  /** Starts serving. */
  start(): Promise<void>;
  /** Signals the event loop to stop and waits for it to acknowledge. */
  stop(): Promise<void>;
  /** Releases every resource the engine holds. */
  close(): void;
  getBindAddress(): string;
  setBindAddress(address: string): void;
  /** Sets the function the engine uses to dial its peers. */
  setDialFunc(dial: DialFunc): void;
}

export type EngineFactory = (params: EngineParams) => Engine;
