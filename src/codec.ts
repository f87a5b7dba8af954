// src/codec.ts

import { ProtocolError, RequestFailedError } from "./errors";
import { Message } from "./message";
import type { NodeInfo } from "./node_store";

/**
 * Protocol version sent during the handshake by current clients.
 */
export const VERSION_ONE = 1n;

/**
 * Protocol version of older peers. Leader responses under this version carry
 * only the leader's address.
 */
export const VERSION_LEGACY = 0x86104dd760433fe5n;

/**
 * Request type codes. These values are shared by every peer in a cluster and
 * must not change.
 */
export enum RequestType {
  Leader = 0,
  Join = 12,
  Promote = 13,
  Remove = 14,
  Cluster = 16,
}

/**
 * Response type codes.
 */
export enum ResponseType {
  Failure = 0,
  Node = 1,
  Nodes = 3,
  Empty = 8,
}

/** Body format requested by Cluster. */
const CLUSTER_FORMAT_V0 = 0n;

export function encodeLeader(request: Message): void {
  request.reset(RequestType.Leader);
  request.putUint64(0n);
}

export function encodeCluster(request: Message): void {
  request.reset(RequestType.Cluster);
  request.putUint64(CLUSTER_FORMAT_V0);
}

export function encodeJoin(request: Message, id: bigint, address: string): void {
  request.reset(RequestType.Join);
  request.putUint64(id);
  request.putString(address);
}

export function encodePromote(request: Message, id: bigint): void {
  request.reset(RequestType.Promote);
  request.putUint64(id);
}

export function encodeRemove(request: Message, id: bigint): void {
  request.reset(RequestType.Remove);
  request.putUint64(id);
}

/**
 * Checks the response type, turning Failure responses into
 * RequestFailedError.
 */
function expectType(response: Message, expected: ResponseType): void {
  response.rewind();
  if (response.type === expected) {
    return;
  }
  if (response.type === ResponseType.Failure) {
    const code = response.getUint64();
    const description = response.getString();
    throw new RequestFailedError(code, description);
  }
  throw new ProtocolError(
    `unexpected response type ${response.type}, expected ${ResponseType[expected]}`,
    { type: response.type, expected },
  );
}

export function decodeNodes(response: Message): NodeInfo[] {
  expectType(response, ResponseType.Nodes);
  const count = response.getUint64();
  const nodes: NodeInfo[] = [];
  for (let i = 0n; i < count; i++) {
    const id = response.getUint64();
    const address = response.getString();
    nodes.push({ id, address });
  }
  return nodes;
}

/**
 * Decodes a leader response. Returns null when the peer knows of no leader.
 */
export function decodeNode(response: Message): NodeInfo | null {
  expectType(response, ResponseType.Node);
  const id = response.getUint64();
  const address = response.getString();
  if (id === 0n && address === "") {
    return null;
  }
  return { id, address };
}

/**
 * Decodes a legacy leader response, which holds only an address.
 */
export function decodeNodeLegacy(response: Message): string | null {
  expectType(response, ResponseType.Node);
  const address = response.getString();
  return address === "" ? null : address;
}

export function decodeEmpty(response: Message): void {
  expectType(response, ResponseType.Empty);
}

export function encodeNodes(response: Message, nodes: readonly NodeInfo[]): void {
  response.reset(ResponseType.Nodes);
  response.putUint64(BigInt(nodes.length));
  for (const node of nodes) {
    response.putUint64(node.id);
    response.putString(node.address);
  }
}

export function encodeNode(response: Message, node: NodeInfo | null): void {
  response.reset(ResponseType.Node);
  response.putUint64(node?.id ?? 0n);
  response.putString(node?.address ?? "");
}

export function encodeNodeLegacy(response: Message, address: string | null): void {
  response.reset(ResponseType.Node);
  response.putString(address ?? "");
}

export function encodeEmpty(response: Message): void {
  response.reset(ResponseType.Empty);
  response.putUint64(0n);
}

export function encodeFailure(
  response: Message,
  code: bigint,
  description: string,
): void {
  response.reset(ResponseType.Failure);
  response.putUint64(code);
  response.putString(description);
}
