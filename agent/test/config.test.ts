import assert from "node:assert/strict";
import test from "node:test";

import { ConfigError, getEnvBool, getEnvInt, loadConfig } from "../src/config";
import { ALL_DEBUG_FLAGS, debugFlagsToArray } from "../src/debug";

test("config: defaults", () => {
  const config = loadConfig({});

  assert.deepEqual(config.api, { host: "0.0.0.0", port: 8080, basePath: "/api" });
  assert.deepEqual(config.public, { host: "0.0.0.0", httpPort: 443, tcpPort: 444 });
  assert.deepEqual(config.tls, { enabled: false, selfSigned: false });
  assert.deepEqual(config.tunnels, { maxTunnels: 100, targetHost: "127.0.0.1" });
  assert.deepEqual(config.wireguard, { interfaceName: "wg0", addressBlock: "10.10.0.0/16", listenPort: 51820 });
  assert.equal(config.shutdownTimeoutMs, 30_000);
  assert.equal(config.logLevel, "info");
  assert.deepEqual(debugFlagsToArray(config.debug), ["http", "route", "tcp", "tunnel"]);
});

test("config: log level selects debug components", () => {
  assert.equal(loadConfig({ LOG_LEVEL: "debug" }).debug.size, ALL_DEBUG_FLAGS.length);

  const quiet = loadConfig({ LOG_LEVEL: " WARN " });
  assert.equal(quiet.logLevel, "warn");
  assert.equal(quiet.debug.size, 0);
  assert.equal(loadConfig({ LOG_LEVEL: "error" }).debug.size, 0);

  const explicit = loadConfig({ LOG_LEVEL: "error", TUNNELGATE_DEBUG: "peer" });
  assert.equal(explicit.logLevel, "error");
  assert.deepEqual(debugFlagsToArray(explicit.debug), ["peer"]);

  assert.throws(
    () => loadConfig({ LOG_LEVEL: "loud" }),
    (err) => err instanceof ConfigError && err.message === "invalid log level: loud",
  );
});

test("config: reads overrides from the environment", () => {
  const config = loadConfig({
    API_HOST: "127.0.0.1",
    API_PORT: "9000",
    API_BASE_PATH: "manage/",
    PUBLIC_PORT: "8443",
    TCP_PORT: "7000",
    MAX_TUNNELS: "5",
    TUNNEL_TARGET_HOST: "10.1.1.1",
    WG_INTERFACE: "wg9",
    WG_ADDRESS_BLOCK: "172.16.0.0/24",
    WG_LISTEN_PORT: "51000",
    SHUTDOWN_TIMEOUT_SECONDS: "2",
    TUNNELGATE_DEBUG: "route,api",
  });

  assert.deepEqual(config.api, { host: "127.0.0.1", port: 9000, basePath: "/manage" });
  assert.deepEqual(config.public, { host: "0.0.0.0", httpPort: 8443, tcpPort: 7000 });
  assert.deepEqual(config.tunnels, { maxTunnels: 5, targetHost: "10.1.1.1" });
  assert.deepEqual(config.wireguard, { interfaceName: "wg9", addressBlock: "172.16.0.0/24", listenPort: 51000 });
  assert.equal(config.shutdownTimeoutMs, 2_000);
  assert.deepEqual(Array.from(config.debug).sort(), ["api", "route"]);
});

test("config: tcp port follows the public port", () => {
  assert.equal(loadConfig({ PUBLIC_PORT: "9000" }).public.tcpPort, 9001);
});

test("config: certificate paths enable tls", () => {
  const config = loadConfig({ TLS_CERT_PATH: "/etc/tls/cert.pem", TLS_KEY_PATH: "/etc/tls/key.pem" });
  assert.deepEqual(config.tls, {
    enabled: true,
    certPath: "/etc/tls/cert.pem",
    keyPath: "/etc/tls/key.pem",
    selfSigned: false,
  });

  const selfSigned = loadConfig({ TLS_ENABLED: "true", TLS_SELF_SIGNED: "1" });
  assert.deepEqual(selfSigned.tls, { enabled: true, selfSigned: true });
});

test("config: invalid values are rejected", () => {
  const cases: Array<[Record<string, string>, RegExp]> = [
    [{ API_PORT: "70000" }, /^invalid API port: 70000$/],
    [{ PUBLIC_PORT: "0" }, /^invalid public port: 0$/],
    [{ PUBLIC_PORT: "8080" }, /must differ from the API port/],
    [{ TCP_PORT: "443" }, /must differ from the public port/],
    [{ MAX_TUNNELS: "0" }, /^invalid max tunnels: 0$/],
    [{ TLS_CERT_PATH: "/etc/tls/cert.pem" }, /^both TLS certificate and key must be provided$/],
    [{ TLS_ENABLED: "yes" }, /neither certificate files nor TLS_SELF_SIGNED/],
    [{ WG_ADDRESS_BLOCK: "10.0.0.0/31" }, /^invalid WireGuard address block: 10\.0\.0\.0\/31$/],
    [{ WG_ADDRESS_BLOCK: "nope" }, /^invalid WireGuard address block: nope$/],
    [{ SHUTDOWN_TIMEOUT_SECONDS: "-1" }, /^invalid shutdown timeout/],
  ];

  for (const [env, message] of cases) {
    assert.throws(
      () => loadConfig(env),
      (err) => err instanceof ConfigError && message.test(err.message),
      JSON.stringify(env),
    );
  }
});

test("config: env parsing helpers", () => {
  assert.equal(getEnvInt({ N: "abc" }, "N", 7), 7);
  assert.equal(getEnvInt({ N: " 42 " }, "N", 7), 42);
  assert.equal(getEnvInt({}, "N", 7), 7);
  assert.equal(getEnvBool({ B: "off" }, "B", true), false);
  assert.equal(getEnvBool({ B: "maybe" }, "B", true), true);
});
