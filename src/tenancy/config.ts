import { boolFromEnv, type Env, intFromEnv } from "../envConfig.js";

export type ClusterMode = "kubernetes" | "memory";

export interface TenancyConfig {
  /** Tenants pinned to another cluster are skipped; unset reconciles every tenant. */
  clusterName?: string;
  intervalMs: number;
  callTimeoutMs: number;
  pruneNamespaces: boolean;
  clusterMode: ClusterMode;
  kubeconfigPath?: string;
  defaults: {
    maxPods: number;
    maxServices: number;
    maxEndpoints: number;
  };
}

function isClusterMode(value: string): value is ClusterMode {
  return value === "kubernetes" || value === "memory";
}

export function loadTenancyConfig(env: Env = process.env): TenancyConfig {
  const mode = env.TENANT_CLUSTER_MODE?.trim() || "kubernetes";
  if (!isClusterMode(mode)) {
    throw new Error(`TENANT_CLUSTER_MODE must be kubernetes or memory, got "${mode}"`);
  }

  return {
    clusterName: env.CLUSTER_NAME?.trim() || undefined,
    intervalMs: intFromEnv(env, "RECONCILE_INTERVAL_MS", 30_000, { min: 1000 }),
    callTimeoutMs: intFromEnv(env, "RECONCILE_CALL_TIMEOUT_MS", 10_000, { min: 100 }),
    pruneNamespaces: boolFromEnv(env, "RECONCILE_PRUNE_NAMESPACES", true),
    clusterMode: mode,
    kubeconfigPath: env.KUBECONFIG?.trim() || undefined,
    defaults: {
      maxPods: intFromEnv(env, "TENANT_DEFAULT_MAX_PODS", 20, { min: 1 }),
      maxServices: intFromEnv(env, "TENANT_DEFAULT_MAX_SERVICES", 10, { min: 1 }),
      maxEndpoints: intFromEnv(env, "TENANT_DEFAULT_MAX_ENDPOINTS", 100, { min: 1 })
    }
  };
}
