// src/in_memory_node_store.ts

import type { NodeInfo, NodeStore } from "./node_store";

/**
 * A NodeStore kept in process memory, useful for tests and for callers that
 * already know the cluster addresses.
 */
export class InMemoryNodeStore implements NodeStore {
  private nodes: NodeInfo[];

  constructor(nodes: NodeInfo[] = []) {
    this.nodes = nodes.map((node) => ({ ...node }));
  }

  async get(): Promise<NodeInfo[]> {
    return this.nodes.map((node) => ({ ...node }));
  }

  /**
   * Replaces the candidate list.
   */
  set(nodes: NodeInfo[]): void {
    this.nodes = nodes.map((node) => ({ ...node }));
  }
}
