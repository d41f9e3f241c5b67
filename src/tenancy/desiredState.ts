import { createHash } from "node:crypto";
import type { V1Namespace, V1NetworkPolicy, V1NetworkPolicyPeer, V1ResourceQuota, V1RoleBinding } from "@kubernetes/client-node";
import type { ManagedObject } from "./clusterApi.js";
import {
  CLUSTER_NAME_LABEL,
  DESIRED_HASH_ANNOTATION,
  MANAGED_BY_LABEL,
  MANAGED_BY_VALUE,
  MESH_INJECTION_LABEL,
  OWNER_ID_LABEL,
  TENANT_ID_LABEL,
  TENANT_NAME_LABEL,
  type Tenant
} from "./types.js";

export const QUOTA_NAME = "tenant-quota";
export const OWNER_BINDING_NAME = "tenant-owner";
export const OWNER_CLUSTER_ROLE = "admin";
export const CIDR_ANNOTATION = "envplane.io/cidr";

/** Namespace labels the reconciler owns; everything else on a namespace is left alone. */
export const RECONCILER_NAMESPACE_LABELS = [
  MANAGED_BY_LABEL,
  TENANT_ID_LABEL,
  TENANT_NAME_LABEL,
  OWNER_ID_LABEL,
  CLUSTER_NAME_LABEL,
  MESH_INJECTION_LABEL
];

export interface DesiredNamespaceState {
  namespace: V1Namespace;
  resourceQuotas: V1ResourceQuota[];
  networkPolicies: V1NetworkPolicy[];
  roleBindings: V1RoleBinding[];
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}

export function hashDesired(body: unknown): string {
  return createHash("sha256").update(stableStringify(body)).digest("hex").slice(0, 16);
}

/** Stamps the desired-hash annotation computed over the object without it. */
function withDesiredHash<T extends ManagedObject>(body: T): T {
  const hash = hashDesired(body);
  return {
    ...body,
    metadata: {
      ...body.metadata,
      annotations: { ...body.metadata?.annotations, [DESIRED_HASH_ANNOTATION]: hash }
    }
  };
}

export function desiredHashOf(body: ManagedObject | null): string | undefined {
  return body?.metadata?.annotations?.[DESIRED_HASH_ANNOTATION];
}

function managedLabels(tenant: Tenant): Record<string, string> {
  return { [MANAGED_BY_LABEL]: MANAGED_BY_VALUE, [TENANT_ID_LABEL]: tenant.id };
}

export function tenantSelector(tenantId: string): string {
  return `${MANAGED_BY_LABEL}=${MANAGED_BY_VALUE},${TENANT_ID_LABEL}=${tenantId}`;
}

function buildNamespace(tenant: Tenant, name: string): V1Namespace {
  const labels: Record<string, string> = {
    ...managedLabels(tenant),
    [TENANT_NAME_LABEL]: tenant.name,
    [OWNER_ID_LABEL]: tenant.ownerId
  };
  if (tenant.clusterName) labels[CLUSTER_NAME_LABEL] = tenant.clusterName;
  if (tenant.serviceMeshEnabled) labels[MESH_INJECTION_LABEL] = "enabled";

  return withDesiredHash({ apiVersion: "v1", kind: "Namespace", metadata: { name, labels } });
}

function buildQuota(tenant: Tenant, namespace: string): V1ResourceQuota {
  const limits = tenant.resourceLimits;
  return withDesiredHash({
    apiVersion: "v1",
    kind: "ResourceQuota",
    metadata: { name: QUOTA_NAME, namespace, labels: managedLabels(tenant) },
    spec: {
      hard: {
        "requests.cpu": limits.cpu,
        "limits.cpu": limits.cpu,
        "requests.memory": limits.memory,
        "limits.memory": limits.memory,
        "requests.ephemeral-storage": limits.storage,
        "limits.ephemeral-storage": limits.storage,
        pods: String(limits.maxPods),
        services: String(limits.maxServices),
        "count/endpoints": String(limits.maxEndpoints)
      }
    }
  });
}

function policy(
  tenant: Tenant,
  namespace: string,
  name: string,
  spec: NonNullable<V1NetworkPolicy["spec"]>,
  annotations?: Record<string, string>
): V1NetworkPolicy {
  return withDesiredHash({
    apiVersion: "networking.k8s.io/v1",
    kind: "NetworkPolicy",
    metadata: { name, namespace, labels: managedLabels(tenant), ...(annotations ? { annotations } : {}) },
    spec
  });
}

function buildNetworkPolicies(tenant: Tenant, namespace: string): V1NetworkPolicy[] {
  const declared = tenant.networkPolicy;
  const policies: V1NetworkPolicy[] = [];
  const allPods = {};

  if (declared.defaultDenyIngress) {
    policies.push(policy(tenant, namespace, "default-deny-ingress", { podSelector: allPods, policyTypes: ["Ingress"] }));
  }
  if (declared.defaultDenyEgress) {
    policies.push(policy(tenant, namespace, "default-deny-egress", { podSelector: allPods, policyTypes: ["Egress"] }));
  }
  if (declared.allowIntraNamespace) {
    const samePods: V1NetworkPolicyPeer[] = [{ podSelector: allPods }];
    policies.push(
      policy(tenant, namespace, "allow-intra-namespace", {
        podSelector: allPods,
        ingress: [{ _from: samePods }],
        ...(declared.defaultDenyEgress ? { egress: [{ to: samePods }], policyTypes: ["Ingress", "Egress"] } : { policyTypes: ["Ingress"] })
      })
    );
  }
  if (declared.allowCrossNamespace) {
    policies.push(
      policy(tenant, namespace, "allow-cross-namespace", {
        podSelector: allPods,
        ingress: [{ _from: [{ namespaceSelector: { matchLabels: { [TENANT_ID_LABEL]: tenant.id } } }] }],
        policyTypes: ["Ingress"]
      })
    );
  }
  declared.allowIngressFromCIDR.forEach((cidr, index) => {
    policies.push(
      policy(
        tenant,
        namespace,
        `allow-ingress-cidr-${index}`,
        { podSelector: allPods, ingress: [{ _from: [{ ipBlock: { cidr } }] }], policyTypes: ["Ingress"] },
        { [CIDR_ANNOTATION]: cidr }
      )
    );
  });
  declared.allowEgressToCIDR.forEach((cidr, index) => {
    policies.push(
      policy(
        tenant,
        namespace,
        `allow-egress-cidr-${index}`,
        { podSelector: allPods, egress: [{ to: [{ ipBlock: { cidr } }] }], policyTypes: ["Egress"] },
        { [CIDR_ANNOTATION]: cidr }
      )
    );
  });

  return policies;
}

function buildOwnerBinding(tenant: Tenant, namespace: string): V1RoleBinding {
  return withDesiredHash({
    apiVersion: "rbac.authorization.k8s.io/v1",
    kind: "RoleBinding",
    metadata: { name: OWNER_BINDING_NAME, namespace, labels: managedLabels(tenant) },
    roleRef: { apiGroup: "rbac.authorization.k8s.io", kind: "ClusterRole", name: OWNER_CLUSTER_ROLE },
    subjects: [{ apiGroup: "rbac.authorization.k8s.io", kind: "User", name: tenant.ownerId }]
  });
}

export function buildDesiredNamespace(tenant: Tenant, namespace: string): DesiredNamespaceState {
  return {
    namespace: buildNamespace(tenant, namespace),
    resourceQuotas: [buildQuota(tenant, namespace)],
    networkPolicies: buildNetworkPolicies(tenant, namespace),
    roleBindings: [buildOwnerBinding(tenant, namespace)]
  };
}

/**
 * Namespace body for a replace: the reconciler's labels and hash win, while
 * labels and annotations set by anyone else survive.
 */
export function mergeNamespace(live: V1Namespace, desired: V1Namespace): V1Namespace {
  const foreignLabels = Object.fromEntries(
    Object.entries(live.metadata?.labels ?? {}).filter(([key]) => !RECONCILER_NAMESPACE_LABELS.includes(key))
  );
  return {
    ...live,
    metadata: {
      ...live.metadata,
      labels: { ...foreignLabels, ...desired.metadata?.labels },
      annotations: { ...live.metadata?.annotations, ...desired.metadata?.annotations }
    }
  };
}

export function isManagedObject(body: ManagedObject): boolean {
  return body.metadata?.labels?.[MANAGED_BY_LABEL] === MANAGED_BY_VALUE;
}

/**
 * Replace body for a namespace created outside the reconciler: it only gains
 * the mesh label. Null when there is nothing to write.
 */
export function meshLabelOnForeignNamespace(live: V1Namespace, desired: V1Namespace): V1Namespace | null {
  const wanted = desired.metadata?.labels?.[MESH_INJECTION_LABEL];
  const labels = live.metadata?.labels ?? {};
  if (!wanted || labels[MESH_INJECTION_LABEL] === wanted) return null;
  return { ...live, metadata: { ...live.metadata, labels: { ...labels, [MESH_INJECTION_LABEL]: wanted } } };
}
