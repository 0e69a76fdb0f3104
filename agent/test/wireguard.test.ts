import assert from "node:assert/strict";
import crypto from "node:crypto";
import test from "node:test";

import {
  WireGuardNetwork,
  generateWireGuardKeyPair,
  isWireGuardKey,
  wireGuardKeyFromKeyObject,
} from "../src/peer/wireguard";

test("wireguard: generated keys are base64 32-byte values", async () => {
  const first = await generateWireGuardKeyPair();
  const second = await generateWireGuardKeyPair();

  for (const key of [first.publicKey, first.privateKey, second.publicKey, second.privateKey]) {
    assert.equal(key.length, 44);
    assert.equal(Buffer.from(key, "base64").length, 32);
    assert.ok(isWireGuardKey(key));
  }
  assert.notEqual(first.privateKey, second.privateKey);
  assert.notEqual(first.publicKey, first.privateKey);
});

test("wireguard: public key matches the private key", () => {
  const { publicKey, privateKey } = crypto.generateKeyPairSync("x25519");
  const derived = crypto.createPublicKey(privateKey);

  assert.equal(
    wireGuardKeyFromKeyObject(derived, "public"),
    wireGuardKeyFromKeyObject(publicKey, "public"),
  );
});

test("wireguard: key format validation", () => {
  assert.ok(isWireGuardKey(Buffer.alloc(32, 7).toString("base64")));
  assert.equal(isWireGuardKey(Buffer.alloc(16, 7).toString("base64")), false);
  assert.equal(isWireGuardKey("not a key"), false);
  assert.equal(isWireGuardKey(""), false);
});

test("wireguard: interface commands run the configured binary", async () => {
  // `true` accepts any arguments and exits 0
  const network = new WireGuardNetwork({ interfaceName: "wg-test", wgPath: "true" });
  assert.equal(network.interfaceName, "wg-test");

  await network.registerPeer({ publicKey: Buffer.alloc(32, 1).toString("base64"), allowedIp: "10.10.0.2" });
  await network.deregisterPeer({ publicKey: Buffer.alloc(32, 1).toString("base64") });
});

test("wireguard: command failures are reported with the subcommand", async () => {
  const network = new WireGuardNetwork({ wgPath: "false" });

  await assert.rejects(
    network.registerPeer({ publicKey: Buffer.alloc(32, 1).toString("base64"), allowedIp: "10.10.0.2" }),
    /^Error: false set wg0 failed: /,
  );
});
