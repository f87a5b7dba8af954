// src/node_store.ts

/**
 * Identity of a cluster member.
 */
export interface NodeInfo {
  /** Cluster-wide unique id (uint64). */
  readonly id: bigint;
  /** Address peers dial to reach the node. */
  readonly address: string;
}

/**
 * An externally owned, ordered list of candidate cluster members.
 *
 * Only read access is needed here; how the list is kept up to date is up to
 * the implementation.
 */
export interface NodeStore {
  /**
   * Returns the current candidates, in the order they should be tried.
   */
  get(signal?: AbortSignal): Promise<NodeInfo[]>;
}
