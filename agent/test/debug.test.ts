import assert from "node:assert/strict";
import test from "node:test";

import {
  ALL_DEBUG_FLAGS,
  createDebugLogger,
  debugFlagsForLogLevel,
  debugFlagsToArray,
  formatDebugLine,
  parseDebugEnv,
  resolveDebugFlags,
  type DebugComponent,
} from "../src/debug";

test("debug: parses comma separated components", () => {
  assert.deepEqual(debugFlagsToArray(parseDebugEnv(" http, TCP ,,bogus")), ["http", "tcp"]);
});

test("debug: all and * enable every component", () => {
  assert.equal(parseDebugEnv("all").size, ALL_DEBUG_FLAGS.length);
  assert.equal(parseDebugEnv("*").size, ALL_DEBUG_FLAGS.length);
  assert.equal(parseDebugEnv("1").size, ALL_DEBUG_FLAGS.length);
});

test("debug: proxy expands to http and tcp", () => {
  assert.deepEqual(debugFlagsToArray(parseDebugEnv("proxy,peer")), ["http", "peer", "tcp"]);
});

test("debug: empty env enables nothing", () => {
  assert.equal(parseDebugEnv("").size, 0);
  assert.equal(parseDebugEnv(undefined).size, 0);
});

test("debug: explicit config overrides env flags", () => {
  const env = parseDebugEnv("http");
  assert.deepEqual(debugFlagsToArray(resolveDebugFlags(undefined, env)), ["http"]);
  assert.equal(resolveDebugFlags(false, env).size, 0);
  assert.equal(resolveDebugFlags(true, env).size, ALL_DEBUG_FLAGS.length);
  assert.deepEqual(debugFlagsToArray(resolveDebugFlags(["route", "api"], env)), ["api", "route"]);
});

test("debug: logger drops disabled components but keeps agent and error lines", () => {
  const lines: Array<[DebugComponent, string]> = [];
  const log = createDebugLogger(new Set(["http"]), (component, message) => {
    lines.push([component, message]);
  });

  log("http", "one");
  log("tcp", "two");
  log("error", "three");
  log("agent", "four");

  assert.deepEqual(lines, [
    ["http", "one"],
    ["error", "three"],
    ["agent", "four"],
  ]);
});

test("debug: formatted lines drop one trailing newline", () => {
  assert.equal(formatDebugLine("route", "added\n"), "[route] added");
  assert.equal(formatDebugLine("route", "added\r\n"), "[route] added");
  assert.equal(formatDebugLine("tcp", "x"), "[tcp] x");
});

test("debug: log levels map to components", () => {
  assert.equal(debugFlagsForLogLevel("debug").size, ALL_DEBUG_FLAGS.length);
  assert.deepEqual(debugFlagsToArray(debugFlagsForLogLevel("info")), ["http", "route", "tcp", "tunnel"]);
  assert.equal(debugFlagsForLogLevel("warn").size, 0);
  assert.equal(debugFlagsForLogLevel("error").size, 0);
});
