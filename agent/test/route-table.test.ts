import assert from "node:assert/strict";
import test from "node:test";

import { ConflictError, NotFoundError } from "../src/errors";
import { RouteTable } from "../src/routing/table";
import { hostFromHeader, normalizeHost } from "../src/routing/host";

test("route-table: hostname and port conflicts", () => {
  const routes = new RouteTable();
  routes.addRoute("t1", "a.example.com", "10.0.0.1", 8080);

  assert.throws(
    () => routes.addRoute("t2", "a.example.com", "10.0.0.2", 9090),
    (err) => err instanceof ConflictError && err.message === "hostname a.example.com is already in use by tunnel t1",
  );
  assert.throws(
    () => routes.addRoute("t2", "b.example.com", "10.0.0.2", 8080),
    (err) => err instanceof ConflictError && err.message === "port 8080 is already in use by tunnel t1",
  );

  // a port conflict must not leave the hostname behind
  assert.throws(() => routes.lookupByHost("b.example.com"), NotFoundError);
  assert.equal(routes.size, 1);

  assert.equal(routes.removeRoute("t1"), 2);
  assert.throws(
    () => routes.lookupByHost("a.example.com"),
    (err) => err instanceof NotFoundError && err.message === "no tunnel found for hostname: a.example.com",
  );
  assert.throws(
    () => routes.lookupByPort(8080),
    (err) => err instanceof NotFoundError && err.message === "no tunnel found for port: 8080",
  );
});

test("route-table: lookups return the installed target", () => {
  const routes = new RouteTable();
  routes.addRoute("t1", "App.Example.com.", "10.0.0.1", 8080);

  assert.deepEqual(routes.lookupByHost("app.example.com"), { id: "t1", ip: "10.0.0.1", port: 8080 });
  assert.deepEqual(routes.lookupByHost("APP.example.com:443"), { id: "t1", ip: "10.0.0.1", port: 8080 });
  assert.deepEqual(routes.lookupByPort(8080), { id: "t1", ip: "10.0.0.1", port: 8080 });
  assert.ok(Object.isFrozen(routes.lookupByPort(8080)));
});

test("route-table: public port keys the port route", () => {
  const routes = new RouteTable();
  routes.addRoute("t1", "a.example.com", "10.0.0.1", 22, 2222);

  assert.deepEqual(routes.lookupByPort(2222), { id: "t1", ip: "10.0.0.1", port: 22 });
  assert.throws(() => routes.lookupByPort(22), NotFoundError);

  // another tunnel may use the same backend port behind a different public port
  routes.addRoute("t2", "b.example.com", "10.0.0.2", 22, 2223);
  assert.equal(routes.lookupByPort(2223).id, "t2");
});

test("route-table: port 0 installs only the hostname route", () => {
  const routes = new RouteTable();
  routes.addRoute("t1", "a.example.com", "10.0.0.1", 0);
  routes.addRoute("t2", "b.example.com", "10.0.0.2", 0);

  assert.equal(routes.listPortRoutes().size, 0);
  assert.equal(routes.removeRoute("t1"), 1);
});

test("route-table: removing an unknown id changes nothing", () => {
  const routes = new RouteTable();
  routes.addRoute("t1", "a.example.com", "10.0.0.1", 8080);

  assert.equal(routes.removeRoute("missing"), 0);
  assert.equal(routes.lookupByHost("a.example.com").id, "t1");
});

test("route-table: empty hostnames are rejected", () => {
  const routes = new RouteTable();
  assert.throws(() => routes.addRoute("t1", "  ", "10.0.0.1", 8080), ConflictError);
  assert.equal(routes.listPortRoutes().size, 0);
});

test("route-table: listings are snapshots", () => {
  const routes = new RouteTable();
  routes.addRoute("t1", "a.example.com", "10.0.0.1", 8080);

  const hosts = routes.listRoutes();
  const ports = routes.listPortRoutes();
  hosts.delete("a.example.com");
  ports.clear();
  routes.addRoute("t2", "b.example.com", "10.0.0.2", 9090);

  assert.equal(hosts.size, 0);
  assert.equal(ports.size, 0);
  assert.equal(routes.listRoutes().size, 2);
  assert.deepEqual(Array.from(routes.listPortRoutes().keys()).sort(), [8080, 9090]);
});

test("route-table: conflicts are logged", () => {
  const lines: string[] = [];
  const routes = new RouteTable({ debugLog: (component, message) => lines.push(`${component}:${message}`) });
  routes.addRoute("t1", "a.example.com", "10.0.0.1", 8080);
  assert.throws(() => routes.addRoute("t2", "a.example.com", "10.0.0.2", 9090));

  assert.deepEqual(lines, [
    "route:added id=t1 host=a.example.com port=8080 -> 10.0.0.1:8080",
    "route:conflict id=t2 hostname a.example.com is already in use by tunnel t1",
  ]);
});

test("route-table: host header parsing", () => {
  assert.equal(normalizeHost(" Example.COM.. "), "example.com");
  assert.equal(hostFromHeader("example.com:8080"), "example.com");
  assert.equal(hostFromHeader("[::1]:8080"), "::1");
  assert.equal(hostFromHeader("::1"), "::1");
  assert.equal(hostFromHeader("example.com:http"), "");
  assert.equal(hostFromHeader(undefined), "");
});
