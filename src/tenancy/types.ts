import type { NetworkPolicySpec } from "../environments/types.js";

export interface TenantResourceLimits {
  cpu: string;
  memory: string;
  storage: string;
  maxPods: number;
  maxServices: number;
  maxEndpoints: number;
}

/** Declared state only; the reconciler makes the cluster match it on every tick. */
export interface Tenant {
  id: string;
  name: string;
  ownerId: string;
  namespaces: string[];
  resourceLimits: TenantResourceLimits;
  networkPolicy: NetworkPolicySpec;
  serviceMeshEnabled: boolean;
  /** Reconciler instance that owns this tenant; unset means any. */
  clusterName?: string;
  environmentId?: string;
  updatedAt: string;
}

export const MANAGED_BY_LABEL = "app.kubernetes.io/managed-by";
export const MANAGED_BY_VALUE = "envplane-tenant-reconciler";
export const TENANT_ID_LABEL = "envplane.io/tenant-id";
export const TENANT_NAME_LABEL = "envplane.io/tenant";
export const OWNER_ID_LABEL = "envplane.io/owner-id";
export const CLUSTER_NAME_LABEL = "envplane.io/cluster-name";
export const MESH_INJECTION_LABEL = "istio-injection";
export const DESIRED_HASH_ANNOTATION = "envplane.io/desired-hash";
