import assert from "node:assert/strict";
import test from "node:test";

import {
  AddressSpaceExhaustedError,
  ConflictError,
  NotFoundError,
  ProvisioningError,
} from "../src/errors";
import { PeerAddressAllocator } from "../src/peer/allocator";
import { MemoryPeerNetwork } from "./helpers/memory-peer-network";

test("peer-allocator: first peer gets the address after the server", async () => {
  const network = new MemoryPeerNetwork();
  const allocator = new PeerAddressAllocator({ network });

  const config = await allocator.provisionPeer("t1", "peer-key-1");
  assert.deepEqual(config, {
    publicKey: "server-public-1",
    privateKey: "server-private-1",
    serverAddress: "10.10.0.1",
    clientAddress: "10.10.0.2",
    listenPort: 51820,
  });
  assert.equal(network.peers.get("peer-key-1"), "10.10.0.2");
  assert.ok(allocator.has("t1"));
});

test("peer-allocator: addresses are sequential and carry across octets", async () => {
  const allocator = new PeerAddressAllocator({
    network: new MemoryPeerNetwork(),
    addressBlock: "10.20.0.0/16",
    listenPort: 51000,
  });

  const addresses: string[] = [];
  for (let i = 0; i < 255; i += 1) {
    const config = await allocator.provisionPeer(`t${i}`, `peer-key-${i}`);
    addresses.push(config.clientAddress);
  }

  assert.equal(addresses[0], "10.20.0.2");
  assert.equal(addresses[1], "10.20.0.3");
  assert.equal(addresses[253], "10.20.0.255");
  assert.equal(addresses[254], "10.20.1.0");
  assert.equal(new Set(addresses).size, 255);
});

test("peer-allocator: small blocks exhaust before the broadcast address", async () => {
  const allocator = new PeerAddressAllocator({
    network: new MemoryPeerNetwork(),
    addressBlock: "192.168.50.0/29",
  });
  assert.equal(allocator.serverAddress, "192.168.50.1");
  assert.equal(allocator.remaining(), 5);

  const issued: string[] = [];
  for (let i = 0; i < 5; i += 1) {
    issued.push((await allocator.provisionPeer(`t${i}`, `peer-key-${i}`)).clientAddress);
  }
  assert.deepEqual(issued, [
    "192.168.50.2",
    "192.168.50.3",
    "192.168.50.4",
    "192.168.50.5",
    "192.168.50.6",
  ]);
  assert.equal(allocator.remaining(), 0);

  await assert.rejects(
    allocator.provisionPeer("t5", "peer-key-5"),
    (err) => err instanceof AddressSpaceExhaustedError && err.status === 507,
  );
});

test("peer-allocator: registration failure does not consume an address", async () => {
  const network = new MemoryPeerNetwork();
  const allocator = new PeerAddressAllocator({ network });

  network.failRegister = true;
  await assert.rejects(
    allocator.provisionPeer("t1", "peer-key-1"),
    (err) => err instanceof ProvisioningError && err.message === "failed to add peer: interface unavailable",
  );
  assert.equal(allocator.has("t1"), false);

  network.failRegister = false;
  const config = await allocator.provisionPeer("t1", "peer-key-1");
  assert.equal(config.clientAddress, "10.10.0.2");
});

test("peer-allocator: key generation failure is a provisioning error", async () => {
  const network = new MemoryPeerNetwork();
  network.failKeygen = true;
  const allocator = new PeerAddressAllocator({ network });

  await assert.rejects(
    allocator.provisionPeer("t1", "peer-key-1"),
    (err) => err instanceof ProvisioningError && err.message === "failed to generate key pair: keygen unavailable",
  );
  assert.equal(network.registerCalls, 0);
});

test("peer-allocator: duplicate ids conflict", async () => {
  const allocator = new PeerAddressAllocator({ network: new MemoryPeerNetwork() });
  await allocator.provisionPeer("t1", "peer-key-1");

  await assert.rejects(allocator.provisionPeer("t1", "peer-key-2"), ConflictError);
  assert.equal(allocator.remaining(), 65532);
});

test("peer-allocator: concurrent provisioning issues distinct addresses", async () => {
  const network = new MemoryPeerNetwork();
  network.delayMs = 2;
  const allocator = new PeerAddressAllocator({ network });

  const configs = await Promise.all(
    Array.from({ length: 10 }, (_, i) => allocator.provisionPeer(`t${i}`, `peer-key-${i}`)),
  );
  const addresses = configs.map((config) => config.clientAddress);

  assert.deepEqual(
    addresses,
    Array.from({ length: 10 }, (_, i) => `10.10.0.${i + 2}`),
  );
});

test("peer-allocator: release deregisters the remote key and never reuses the address", async () => {
  const network = new MemoryPeerNetwork();
  const allocator = new PeerAddressAllocator({ network });
  await allocator.provisionPeer("t1", "peer-key-1");

  await allocator.releasePeer("t1");
  assert.deepEqual(network.deregistered, ["peer-key-1"]);
  assert.equal(network.peers.size, 0);
  assert.equal(allocator.has("t1"), false);

  const next = await allocator.provisionPeer("t1", "peer-key-1");
  assert.equal(next.clientAddress, "10.10.0.3");
});

test("peer-allocator: release of an unknown peer", async () => {
  const allocator = new PeerAddressAllocator({ network: new MemoryPeerNetwork() });
  await assert.rejects(allocator.releasePeer("missing"), NotFoundError);
});

test("peer-allocator: release failure still forgets the peer", async () => {
  const network = new MemoryPeerNetwork();
  const allocator = new PeerAddressAllocator({ network });
  await allocator.provisionPeer("t1", "peer-key-1");

  network.failDeregister = true;
  await assert.rejects(allocator.releasePeer("t1"), ProvisioningError);
  assert.equal(allocator.has("t1"), false);
});

test("peer-allocator: rejects unusable address blocks", () => {
  const network = new MemoryPeerNetwork();
  assert.throws(() => new PeerAddressAllocator({ network, addressBlock: "not-a-block" }), /invalid peer address block/);
  assert.throws(() => new PeerAddressAllocator({ network, addressBlock: "10.0.0.0/31" }), /too small/);

  const smallest = new PeerAddressAllocator({ network, addressBlock: "10.0.0.0/30" });
  assert.equal(smallest.remaining(), 1);
});
