import assert from "node:assert/strict";
import test from "node:test";
import { loadTenancyConfig } from "./config.js";

test("tenancy config defaults", () => {
  assert.deepEqual(loadTenancyConfig({}), {
    clusterName: undefined,
    intervalMs: 30_000,
    callTimeoutMs: 10_000,
    pruneNamespaces: true,
    clusterMode: "kubernetes",
    kubeconfigPath: undefined,
    defaults: { maxPods: 20, maxServices: 10, maxEndpoints: 100 }
  });
});

test("tenancy config reads overrides", () => {
  const config = loadTenancyConfig({
    CLUSTER_NAME: "env-abc12345",
    RECONCILE_INTERVAL_MS: "5000",
    RECONCILE_PRUNE_NAMESPACES: "false",
    TENANT_CLUSTER_MODE: "memory",
    TENANT_DEFAULT_MAX_PODS: "50"
  });

  assert.equal(config.clusterName, "env-abc12345");
  assert.equal(config.intervalMs, 5000);
  assert.equal(config.pruneNamespaces, false);
  assert.equal(config.clusterMode, "memory");
  assert.equal(config.defaults.maxPods, 50);
});

test("tenancy config rejects an unknown cluster mode", () => {
  assert.throws(() => loadTenancyConfig({ TENANT_CLUSTER_MODE: "docker" }), /TENANT_CLUSTER_MODE must be kubernetes or memory/);
  assert.throws(() => loadTenancyConfig({ RECONCILE_PRUNE_NAMESPACES: "maybe" }), /RECONCILE_PRUNE_NAMESPACES must be true or false/);
});
