import assert from "node:assert/strict";
import test from "node:test";
import type { V1Namespace, V1Node, V1Pod, V1Service } from "@kubernetes/client-node";
import type { EnvironmentRecord } from "../environments/types.js";
import { ExecutionError } from "../errors.js";
import type { CredentialStore } from "./credentials.js";
import { type ClusterReader, componentHealth, KubernetesStatusAggregator } from "./statusAggregator.js";

const credentials: CredentialStore = {
  save: async (environmentId) => `${environmentId}.kubeconfig`,
  load: async (ref) => (ref === "env1.kubeconfig" ? "apiVersion: v1" : null),
  remove: async () => undefined
};

function record(overrides: Partial<EnvironmentRecord> = {}): EnvironmentRecord {
  return {
    id: "env1",
    name: "dev-env",
    description: "",
    templateId: "tpl-basic",
    ownerId: "owner-1",
    resourceLimits: { cpu: "2", memory: "4Gi", storage: "20Gi", maxNodeCount: 3, maxNamespaces: 5, maxLoadBalancers: 1 },
    serviceMesh: {
      enabled: true,
      enableTracing: false,
      enableMetrics: false,
      enableCircuitBreaker: false,
      enableOutlierDetection: false,
      enableFaultInjection: false,
      enableRequestThrottling: false,
      enableVirtualServiceRBAC: false
    },
    namespaces: ["dev-env"],
    addons: [],
    tags: {},
    status: "ACTIVE",
    statusMessage: "",
    statusHistory: [],
    clusterName: "env-env1",
    credentialRef: "env1.kubeconfig",
    consoleUrl: "",
    version: 4,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    ...overrides
  };
}

function pod(namespace: string, nodeName: string, phase: string): V1Pod {
  return { metadata: { namespace, name: `${namespace}-${nodeName}-${phase}` }, spec: { nodeName, containers: [] }, status: { phase } };
}

const fakeReader: ClusterReader = {
  listNodes: async (): Promise<V1Node[]> => [
    {
      metadata: { name: "node-a" },
      status: {
        conditions: [{ type: "Ready", status: "True" }],
        addresses: [{ type: "InternalIP", address: "10.0.1.5" }]
      }
    },
    { metadata: { name: "node-b" }, status: { conditions: [{ type: "Ready", status: "False" }] } }
  ],
  listNamespaces: async (): Promise<V1Namespace[]> => [
    { metadata: { name: "dev-env", labels: { "envplane.io/owner-id": "owner-1" } }, status: { phase: "Active" } },
    { metadata: { name: "istio-system" }, status: { phase: "Active" } }
  ],
  listPods: async () => [pod("dev-env", "node-a", "Running"), pod("istio-system", "node-a", "Running"), pod("istio-system", "node-b", "Pending")],
  listServices: async (): Promise<V1Service[]> => [{ metadata: { namespace: "dev-env", name: "web" } }]
};

test("snapshot aggregates nodes, namespaces and component health", async () => {
  const aggregator = new KubernetesStatusAggregator(credentials, () => fakeReader);

  const status = await aggregator.snapshot(record());

  assert.deepEqual(status.resourceUtilization, { nodeCount: 2, readyNodeCount: 1, namespaceCount: 2, podCount: 3, serviceCount: 1 });
  assert.deepEqual(status.nodeStatus[0], { name: "node-a", ready: true, kubeletVersion: "", internalIP: "10.0.1.5", podCount: 2 });
  assert.deepEqual(status.namespaceStatuses[0], { name: "dev-env", phase: "Active", podCount: 1, serviceCount: 1, owner: "owner-1" });
  assert.equal(status.serviceMeshStatus, "Degraded");
  assert.equal(status.gitOpsStatus, "Disabled");
  assert.deepEqual(status.healthChecks, { apiServer: "Healthy", nodes: "Degraded" });
  assert.ok(status.lastSyncTime);
});

test("snapshot without a stored credential is an empty unavailable view", async () => {
  let readerBuilt = false;
  const aggregator = new KubernetesStatusAggregator(credentials, () => {
    readerBuilt = true;
    return fakeReader;
  });

  const status = await aggregator.snapshot(record({ credentialRef: undefined }));

  assert.equal(readerBuilt, false);
  assert.equal(status.serviceMeshStatus, "Unavailable");
  assert.deepEqual(status.healthChecks, { apiServer: "Unavailable" });
  assert.equal(status.lastSyncTime, null);
});

test("cluster read failures surface as ExecutionError", async () => {
  const aggregator = new KubernetesStatusAggregator(credentials, () => ({
    ...fakeReader,
    listNodes: async () => {
      throw new Error("connect ECONNREFUSED");
    }
  }));

  await assert.rejects(aggregator.snapshot(record()), ExecutionError);
});

test("componentHealth grades by running pods", () => {
  assert.equal(componentHealth(false, "istio-system", []), "Disabled");
  assert.equal(componentHealth(true, "istio-system", []), "Unavailable");
  assert.equal(componentHealth(true, "argocd", [pod("argocd", "n", "Running")]), "Healthy");
});
