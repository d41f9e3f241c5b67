import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { ConflictError } from "../errors.js";
import { FileEnvironmentStore } from "./store.js";
import type { EnvironmentRecord } from "./types.js";

const dataRoot = await mkdtemp(path.join(tmpdir(), "envplane-env-store-test-"));

test.after(async () => {
  await rm(dataRoot, { recursive: true, force: true });
});

function record(id: string, overrides: Partial<EnvironmentRecord> = {}): EnvironmentRecord {
  const now = new Date().toISOString();
  return {
    id,
    name: `env-${id}`,
    description: "",
    templateId: "tpl-basic",
    ownerId: "owner-1",
    resourceLimits: { cpu: "4", memory: "8Gi", storage: "50Gi", maxNodeCount: 3, maxNamespaces: 5, maxLoadBalancers: 1 },
    namespaces: [`env-${id}`],
    addons: [],
    tags: {},
    status: "CREATING",
    statusMessage: "",
    statusHistory: [],
    clusterName: `env-${id.slice(0, 8)}`,
    consoleUrl: "",
    version: 0,
    createdAt: now,
    updatedAt: now,
    ...overrides
  };
}

test("put creates a record at version 1 and bumps it on each conditional write", async () => {
  const store = new FileEnvironmentStore(path.join(dataRoot, "cas.json"));

  const created = await store.put(record("aaaaaaaa01"), 0);
  assert.equal(created.version, 1);

  const updated = await store.put({ ...created, status: "PROVISIONING" }, 1);
  assert.equal(updated.version, 2);
  assert.equal((await store.get("aaaaaaaa01"))?.status, "PROVISIONING");
});

test("put rejects a stale expected version and a duplicate create", async () => {
  const store = new FileEnvironmentStore(path.join(dataRoot, "stale.json"));
  const created = await store.put(record("bbbbbbbb01"), 0);

  await assert.rejects(store.put({ ...created, status: "ERROR" }, 0), ConflictError);
  await store.put({ ...created, status: "PROVISIONING" }, created.version);
  await assert.rejects(store.put({ ...created, status: "ERROR" }, created.version), ConflictError);

  assert.equal((await store.get("bbbbbbbb01"))?.status, "PROVISIONING");
});

test("scan filters by owner and status and hides soft-deleted records", async () => {
  const store = new FileEnvironmentStore(path.join(dataRoot, "scan.json"));
  await store.put(record("cccccccc01", { ownerId: "owner-a", status: "ACTIVE" }), 0);
  await store.put(record("cccccccc02", { ownerId: "owner-b", status: "ACTIVE" }), 0);
  await store.put(record("cccccccc03", { ownerId: "owner-a", status: "ERROR" }), 0);
  await store.put(
    record("cccccccc04", { ownerId: "owner-a", status: "DELETED", deletedAt: new Date().toISOString() }),
    0
  );

  assert.deepEqual(
    (await store.scan({ ownerId: "owner-a" })).map((row) => row.id),
    ["cccccccc01", "cccccccc03"]
  );
  assert.deepEqual(
    (await store.scan({ status: "ACTIVE" })).map((row) => row.id),
    ["cccccccc01", "cccccccc02"]
  );
  assert.equal((await store.scan({ includeDeleted: true })).length, 4);
});

test("records returned by the store are copies", async () => {
  const store = new FileEnvironmentStore(path.join(dataRoot, "copies.json"));
  const created = await store.put(record("dddddddd01"), 0);

  created.tags.mutated = "yes";
  assert.deepEqual((await store.get("dddddddd01"))?.tags, {});
});

test("concurrent conditional writes against one version let exactly one win", async () => {
  const store = new FileEnvironmentStore(path.join(dataRoot, "race.json"));
  const created = await store.put(record("eeeeeeee01"), 0);

  const results = await Promise.allSettled([
    store.put({ ...created, statusMessage: "first" }, created.version),
    store.put({ ...created, statusMessage: "second" }, created.version)
  ]);

  assert.equal(results.filter((r) => r.status === "fulfilled").length, 1);
  assert.equal(results.filter((r) => r.status === "rejected").length, 1);
});
