import {
  CoreV1Api,
  KubeConfig,
  NetworkingV1Api,
  RbacAuthorizationV1Api,
  type V1Namespace,
  type V1NetworkPolicy,
  type V1ObjectMeta,
  type V1ResourceQuota,
  type V1RoleBinding
} from "@kubernetes/client-node";
import { ExecutionError } from "../errors.js";

export type ManagedKind = "Namespace" | "ResourceQuota" | "NetworkPolicy" | "RoleBinding";

export interface ObjectRef {
  /** Unset for cluster-scoped kinds. */
  namespace?: string;
  name: string;
}

export interface ManagedObject {
  metadata?: V1ObjectMeta;
}

/** CRUD over one object kind. `get` answers null for an absent object. */
export interface ObjectClient<T extends ManagedObject> {
  readonly kind: ManagedKind;
  get(ref: ObjectRef): Promise<T | null>;
  list(namespace: string | undefined, labelSelector: string): Promise<T[]>;
  create(ref: ObjectRef, body: T): Promise<void>;
  replace(ref: ObjectRef, body: T): Promise<void>;
  delete(ref: ObjectRef): Promise<void>;
}

export interface ClusterApi {
  namespaces: ObjectClient<V1Namespace>;
  resourceQuotas: ObjectClient<V1ResourceQuota>;
  networkPolicies: ObjectClient<V1NetworkPolicy>;
  roleBindings: ObjectClient<V1RoleBinding>;
}

export function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === 404;
}

function requireNamespace(kind: ManagedKind, ref: ObjectRef): string {
  if (!ref.namespace) {
    throw new ExecutionError(`${kind} ${ref.name} requires a namespace`);
  }
  return ref.namespace;
}

async function readOrNull<T>(read: () => Promise<T>): Promise<T | null> {
  try {
    return await read();
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

/** Deleting an object that is already gone counts as success. */
async function deleteIgnoringNotFound(remove: () => Promise<unknown>): Promise<void> {
  try {
    await remove();
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }
}

export class KubernetesClusterApi implements ClusterApi {
  readonly namespaces: ObjectClient<V1Namespace>;
  readonly resourceQuotas: ObjectClient<V1ResourceQuota>;
  readonly networkPolicies: ObjectClient<V1NetworkPolicy>;
  readonly roleBindings: ObjectClient<V1RoleBinding>;

  constructor(kubeConfig: KubeConfig) {
    const core = kubeConfig.makeApiClient(CoreV1Api);
    const networking = kubeConfig.makeApiClient(NetworkingV1Api);
    const rbac = kubeConfig.makeApiClient(RbacAuthorizationV1Api);

    this.namespaces = {
      kind: "Namespace",
      get: (ref) => readOrNull(() => core.readNamespace({ name: ref.name })),
      list: async (_namespace, labelSelector) => (await core.listNamespace({ labelSelector })).items,
      create: async (_ref, body) => {
        await core.createNamespace({ body });
      },
      replace: async (ref, body) => {
        await core.replaceNamespace({ name: ref.name, body });
      },
      delete: (ref) => deleteIgnoringNotFound(() => core.deleteNamespace({ name: ref.name }))
    };

    this.resourceQuotas = {
      kind: "ResourceQuota",
      get: (ref) =>
        readOrNull(() => core.readNamespacedResourceQuota({ name: ref.name, namespace: requireNamespace("ResourceQuota", ref) })),
      list: async (namespace, labelSelector) =>
        namespace
          ? (await core.listNamespacedResourceQuota({ namespace, labelSelector })).items
          : (await core.listResourceQuotaForAllNamespaces({ labelSelector })).items,
      create: async (ref, body) => {
        await core.createNamespacedResourceQuota({ namespace: requireNamespace("ResourceQuota", ref), body });
      },
      replace: async (ref, body) => {
        await core.replaceNamespacedResourceQuota({ name: ref.name, namespace: requireNamespace("ResourceQuota", ref), body });
      },
      delete: (ref) =>
        deleteIgnoringNotFound(() =>
          core.deleteNamespacedResourceQuota({ name: ref.name, namespace: requireNamespace("ResourceQuota", ref) })
        )
    };

    this.networkPolicies = {
      kind: "NetworkPolicy",
      get: (ref) =>
        readOrNull(() =>
          networking.readNamespacedNetworkPolicy({ name: ref.name, namespace: requireNamespace("NetworkPolicy", ref) })
        ),
      list: async (namespace, labelSelector) =>
        namespace
          ? (await networking.listNamespacedNetworkPolicy({ namespace, labelSelector })).items
          : (await networking.listNetworkPolicyForAllNamespaces({ labelSelector })).items,
      create: async (ref, body) => {
        await networking.createNamespacedNetworkPolicy({ namespace: requireNamespace("NetworkPolicy", ref), body });
      },
      replace: async (ref, body) => {
        await networking.replaceNamespacedNetworkPolicy({
          name: ref.name,
          namespace: requireNamespace("NetworkPolicy", ref),
          body
        });
      },
      delete: (ref) =>
        deleteIgnoringNotFound(() =>
          networking.deleteNamespacedNetworkPolicy({ name: ref.name, namespace: requireNamespace("NetworkPolicy", ref) })
        )
    };

    this.roleBindings = {
      kind: "RoleBinding",
      get: (ref) =>
        readOrNull(() => rbac.readNamespacedRoleBinding({ name: ref.name, namespace: requireNamespace("RoleBinding", ref) })),
      list: async (namespace, labelSelector) =>
        namespace
          ? (await rbac.listNamespacedRoleBinding({ namespace, labelSelector })).items
          : (await rbac.listRoleBindingForAllNamespaces({ labelSelector })).items,
      create: async (ref, body) => {
        await rbac.createNamespacedRoleBinding({ namespace: requireNamespace("RoleBinding", ref), body });
      },
      replace: async (ref, body) => {
        await rbac.replaceNamespacedRoleBinding({ name: ref.name, namespace: requireNamespace("RoleBinding", ref), body });
      },
      delete: (ref) =>
        deleteIgnoringNotFound(() =>
          rbac.deleteNamespacedRoleBinding({ name: ref.name, namespace: requireNamespace("RoleBinding", ref) })
        )
    };
  }
}

export function loadKubeConfig(kubeconfigPath?: string): KubeConfig {
  const kubeConfig = new KubeConfig();
  if (kubeconfigPath) {
    kubeConfig.loadFromFile(kubeconfigPath);
  } else {
    kubeConfig.loadFromDefault();
  }
  return kubeConfig;
}
