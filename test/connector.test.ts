// test/connector.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  ConnectionError,
  Connector,
  type ConnectorConfig,
  type DialFunc,
  InMemoryNodeStore,
  Message,
  RequestType,
  VERSION_LEGACY,
  VERSION_ONE,
  backoff,
  constant,
  decodeNodes,
  defaultConnectorConfig,
  encodeCluster,
  limit,
  tcpDial,
} from "../src";
import { FakeCluster, FakePeer } from "./helpers/fake_cluster";

function fastConfig(dial: DialFunc, overrides: Partial<ConnectorConfig> = {}): ConnectorConfig {
  return {
    ...defaultConnectorConfig(dial),
    retryStrategies: [backoff(constant(0))],
    ...overrides,
  };
}

/**
 * Starts a peer that is the leader of its own single-node cluster.
 */
async function startLeader(id: bigint): Promise<{ cluster: FakeCluster; peer: FakePeer }> {
  const cluster = new FakeCluster();
  const peer = await FakePeer.listen(cluster);
  cluster.members = [{ id, address: peer.address }];
  cluster.leaderId = id;
  return { cluster, peer };
}

describe("Connector", () => {
  const peers: FakePeer[] = [];

  afterEach(async () => {
    await Promise.all(peers.splice(0).map((peer) => peer.close()));
  });

  it("should use one-second attempts with exponential backoff by default", () => {
    const config = defaultConnectorConfig();

    expect(config.dial).toBe(tcpDial);
    expect(config.attemptTimeoutMs).toBe(1000);
    expect(config.retryStrategies).toHaveLength(1);
    expect(config.version).toBe(VERSION_ONE);
  });

  it("should connect to the leader found in the store", async () => {
    const { cluster, peer } = await startLeader(1n);
    peers.push(peer);
    const store = new InMemoryNodeStore([{ id: 1n, address: peer.address }]);

    const connector = new Connector(store, fastConfig(tcpDial));
    const protocol = await connector.connect(AbortSignal.timeout(5000));

    expect(protocol.version).toBe(VERSION_ONE);
    expect(peer.handshakes).toEqual([VERSION_ONE]);
    expect(cluster.requests).toEqual([RequestType.Leader]);
    protocol.close();
  });

  it("should succeed on the attempt after N failed dials", async () => {
    const { peer } = await startLeader(1n);
    peers.push(peer);
    const store = new InMemoryNodeStore([{ id: 1n, address: peer.address }]);

    const failures = 3;
    let calls = 0;
    const dial: DialFunc = async (address, signal) => {
      calls++;
      if (calls <= failures) {
        throw new Error("connection refused");
      }
      return tcpDial(address, signal);
    };

    const connector = new Connector(store, fastConfig(dial));
    const protocol = await connector.connect(AbortSignal.timeout(5000));

    expect(calls).toBe(failures + 1);
    expect(protocol.isClosed).toBe(false);
    protocol.close();
  });

  it("should give up promptly when the signal fires", async () => {
    const store = new InMemoryNodeStore([{ id: 1n, address: "127.0.0.1:1" }]);
    const dial: DialFunc = async () => {
      throw new Error("connection refused");
    };

    const connector = new Connector(store, defaultConnectorConfig(dial));
    const started = Date.now();

    await expect(connector.connect(AbortSignal.timeout(50))).rejects.toThrow(
      "no available cluster leader",
    );
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("should not dial when the signal is already aborted", async () => {
    const store = new InMemoryNodeStore([{ id: 1n, address: "127.0.0.1:1" }]);
    const dial = vi.fn<DialFunc>();

    const connector = new Connector(store, fastConfig(dial));

    await expect(connector.connect(AbortSignal.abort())).rejects.toBeInstanceOf(
      ConnectionError,
    );
    expect(dial).not.toHaveBeenCalled();
  });

  it("should stop when the retry strategies say so and keep the last error", async () => {
    const store = new InMemoryNodeStore([{ id: 1n, address: "127.0.0.1:1" }]);
    const dial = vi.fn<DialFunc>(async () => {
      throw new Error("connection refused");
    });

    const connector = new Connector(
      store,
      fastConfig(dial, { retryStrategies: [limit(3), backoff(constant(0))] }),
    );

    let caught: unknown;
    try {
      await connector.connect();
    } catch (err) {
      caught = err;
    }

    expect(dial).toHaveBeenCalledTimes(3);
    expect(caught).toBeInstanceOf(ConnectionError);
    if (caught instanceof ConnectionError) {
      expect(caught.message).toBe(
        "no available cluster leader: failed to dial: connection refused",
      );
      expect(caught.cause).toBeInstanceOf(ConnectionError);
    }
  });

  it("should try candidates in store order", async () => {
    const follower = new FakeCluster();
    const followerPeer = await FakePeer.listen(follower);
    peers.push(followerPeer);
    const { cluster: leader, peer: leaderPeer } = await startLeader(2n);
    peers.push(leaderPeer);

    const store = new InMemoryNodeStore([
      { id: 1n, address: followerPeer.address },
      { id: 2n, address: leaderPeer.address },
    ]);
    const connector = new Connector(store, fastConfig(tcpDial));
    const protocol = await connector.connect(AbortSignal.timeout(5000));

    expect(follower.requests).toEqual([RequestType.Leader]);
    expect(leader.requests).toEqual([RequestType.Leader]);
    protocol.close();
  });

  it("should pick up a replaced candidate list on the next connect", async () => {
    const { cluster, peer } = await startLeader(1n);
    peers.push(peer);
    const store = new InMemoryNodeStore([{ id: 9n, address: "127.0.0.1:1" }]);
    const dial = vi.fn<DialFunc>(async (address, signal) => {
      if (address === "127.0.0.1:1") {
        throw new Error("connection refused");
      }
      return tcpDial(address, signal);
    });
    const connector = new Connector(store, fastConfig(dial, { retryStrategies: [limit(1)] }));

    await expect(connector.connect()).rejects.toThrow(
      "no available cluster leader: failed to dial: connection refused",
    );

    store.set([{ id: 1n, address: peer.address }]);
    const protocol = await connector.connect(AbortSignal.timeout(5000));

    expect(dial).toHaveBeenLastCalledWith(peer.address, expect.any(AbortSignal));
    expect(cluster.requests).toEqual([RequestType.Leader]);
    protocol.close();
  });

  it("should follow a redirect to the reported leader", async () => {
    const { cluster: leader, peer: leaderPeer } = await startLeader(2n);
    peers.push(leaderPeer);
    const follower = new FakeCluster();
    const followerPeer = await FakePeer.listen(follower);
    peers.push(followerPeer);
    follower.members = [
      { id: 1n, address: followerPeer.address },
      { id: 2n, address: leaderPeer.address },
    ];
    follower.leaderId = 2n;

    const store = new InMemoryNodeStore([{ id: 1n, address: followerPeer.address }]);
    const connector = new Connector(store, fastConfig(tcpDial));
    const protocol = await connector.connect(AbortSignal.timeout(5000));

    const request = new Message(16);
    const response = new Message(512);
    encodeCluster(request);
    await protocol.call(request, response);

    expect(decodeNodes(response)).toEqual(leader.members);
    expect(leaderPeer.handshakes).toHaveLength(1);
    protocol.close();
  });

  it("should handshake with the configured version", async () => {
    const { peer } = await startLeader(1n);
    peers.push(peer);
    const store = new InMemoryNodeStore([{ id: 1n, address: peer.address }]);

    const connector = new Connector(store, fastConfig(tcpDial, { version: VERSION_LEGACY }));
    const protocol = await connector.connect(AbortSignal.timeout(5000));

    expect(protocol.version).toBe(VERSION_LEGACY);
    expect(peer.handshakes).toEqual([VERSION_LEGACY]);
    protocol.close();
  });

  it("should bound each attempt by the attempt timeout", async () => {
    const { cluster, peer } = await startLeader(1n);
    peers.push(peer);
    cluster.behavior = "hang";
    const store = new InMemoryNodeStore([{ id: 1n, address: peer.address }]);

    const connector = new Connector(
      store,
      fastConfig(tcpDial, { attemptTimeoutMs: 50, retryStrategies: [limit(1)] }),
    );
    const started = Date.now();

    await expect(connector.connect()).rejects.toBeInstanceOf(ConnectionError);
    expect(Date.now() - started).toBeLessThan(1000);
    expect(cluster.requests).toEqual([RequestType.Leader]);
  });

  describe("with a cluster that has no leader", () => {
    let cluster: FakeCluster;
    let peer: FakePeer;

    beforeEach(async () => {
      cluster = new FakeCluster();
      peer = await FakePeer.listen(cluster);
      cluster.members = [{ id: 1n, address: peer.address }];
    });

    afterEach(async () => {
      await peer.close();
    });

    it("should keep retrying until the strategies stop", async () => {
      const store = new InMemoryNodeStore([{ id: 1n, address: peer.address }]);
      const connector = new Connector(
        store,
        fastConfig(tcpDial, { retryStrategies: [limit(2)] }),
      );

      await expect(connector.connect()).rejects.toThrow(
        "no available cluster leader: no candidate reported itself as leader",
      );
      expect(peer.handshakes).toHaveLength(2);
    });
  });
});
