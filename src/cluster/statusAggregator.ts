import { CoreV1Api, KubeConfig, type V1Namespace, type V1Node, type V1Pod, type V1Service } from "@kubernetes/client-node";
import type {
  ComponentHealth,
  EnvironmentRecord,
  LiveEnvironmentStatus,
  NamespaceStatusView,
  NodeStatusView
} from "../environments/types.js";
import { ExecutionError } from "../errors.js";
import { OWNER_ID_LABEL } from "../tenancy/types.js";
import type { CredentialStore } from "./credentials.js";

const MESH_NAMESPACE = "istio-system";
const GITOPS_NAMESPACE = "argocd";
const MONITORING_NAMESPACE = "monitoring";

/** Read-only view of a cluster used to build status snapshots. */
export interface ClusterReader {
  listNodes(): Promise<V1Node[]>;
  listNamespaces(): Promise<V1Namespace[]>;
  listPods(): Promise<V1Pod[]>;
  listServices(): Promise<V1Service[]>;
}

export type ClusterReaderFactory = (kubeconfig: string) => ClusterReader;

export interface StatusAggregator {
  snapshot(record: EnvironmentRecord): Promise<LiveEnvironmentStatus>;
}

export const kubernetesClusterReader: ClusterReaderFactory = (kubeconfig) => {
  const kubeConfig = new KubeConfig();
  kubeConfig.loadFromString(kubeconfig);
  const core = kubeConfig.makeApiClient(CoreV1Api);
  return {
    listNodes: async () => (await core.listNode()).items,
    listNamespaces: async () => (await core.listNamespace()).items,
    listPods: async () => (await core.listPodForAllNamespaces()).items,
    listServices: async () => (await core.listServiceForAllNamespaces()).items
  };
};

function nodeView(node: V1Node, pods: V1Pod[]): NodeStatusView {
  const name = node.metadata?.name ?? "";
  const ready = node.status?.conditions?.some((c) => c.type === "Ready" && c.status === "True") ?? false;
  const internalIP = node.status?.addresses?.find((a) => a.type === "InternalIP")?.address;
  return {
    name,
    ready,
    kubeletVersion: node.status?.nodeInfo?.kubeletVersion ?? "",
    ...(internalIP ? { internalIP } : {}),
    podCount: pods.filter((pod) => pod.spec?.nodeName === name).length
  };
}

function namespaceView(namespace: V1Namespace, pods: V1Pod[], services: V1Service[]): NamespaceStatusView {
  const name = namespace.metadata?.name ?? "";
  const owner = namespace.metadata?.labels?.[OWNER_ID_LABEL];
  return {
    name,
    phase: namespace.status?.phase ?? "Unknown",
    podCount: pods.filter((pod) => pod.metadata?.namespace === name).length,
    serviceCount: services.filter((service) => service.metadata?.namespace === name).length,
    ...(owner ? { owner } : {})
  };
}

/** Healthy when every pod in the namespace runs, Degraded when some do, Unavailable otherwise. */
export function componentHealth(enabled: boolean, namespace: string, pods: V1Pod[]): ComponentHealth {
  if (!enabled) return "Disabled";
  const members = pods.filter((pod) => pod.metadata?.namespace === namespace);
  if (members.length === 0) return "Unavailable";
  const running = members.filter((pod) => pod.status?.phase === "Running" || pod.status?.phase === "Succeeded").length;
  if (running === members.length) return "Healthy";
  return running > 0 ? "Degraded" : "Unavailable";
}

function unavailableSnapshot(record: EnvironmentRecord): LiveEnvironmentStatus {
  return {
    resourceUtilization: { nodeCount: 0, readyNodeCount: 0, namespaceCount: 0, podCount: 0, serviceCount: 0 },
    nodeStatus: [],
    namespaceStatuses: [],
    serviceMeshStatus: record.serviceMesh?.enabled ? "Unavailable" : "Disabled",
    gitOpsStatus: record.gitOps?.enabled ? "Unavailable" : "Disabled",
    healthChecks: { apiServer: "Unavailable" },
    lastSyncTime: null
  };
}

/**
 * Builds live status from the environment's own cluster, reached through the
 * stored credential. Environments without a credential yet report an empty
 * Unavailable snapshot.
 */
export class KubernetesStatusAggregator implements StatusAggregator {
  constructor(
    private readonly credentials: CredentialStore,
    private readonly readerFactory: ClusterReaderFactory = kubernetesClusterReader
  ) {}

  async snapshot(record: EnvironmentRecord): Promise<LiveEnvironmentStatus> {
    if (!record.credentialRef) return unavailableSnapshot(record);
    const kubeconfig = await this.credentials.load(record.credentialRef);
    if (!kubeconfig) return unavailableSnapshot(record);

    const reader = this.readerFactory(kubeconfig);
    let nodes: V1Node[];
    let namespaces: V1Namespace[];
    let pods: V1Pod[];
    let services: V1Service[];
    try {
      [nodes, namespaces, pods, services] = await Promise.all([
        reader.listNodes(),
        reader.listNamespaces(),
        reader.listPods(),
        reader.listServices()
      ]);
    } catch (error) {
      throw new ExecutionError(`Cluster ${record.clusterName} status query failed`, { cause: error });
    }

    const nodeStatus = nodes.map((node) => nodeView(node, pods));
    const readyNodeCount = nodeStatus.filter((node) => node.ready).length;
    const nodesHealth: ComponentHealth =
      readyNodeCount === nodeStatus.length && readyNodeCount > 0 ? "Healthy" : readyNodeCount > 0 ? "Degraded" : "Unavailable";

    const healthChecks: Record<string, ComponentHealth> = { apiServer: "Healthy", nodes: nodesHealth };
    if (record.monitoring) {
      healthChecks.monitoring = componentHealth(record.monitoring.enablePrometheus, MONITORING_NAMESPACE, pods);
    }

    return {
      resourceUtilization: {
        nodeCount: nodeStatus.length,
        readyNodeCount,
        namespaceCount: namespaces.length,
        podCount: pods.length,
        serviceCount: services.length
      },
      nodeStatus,
      namespaceStatuses: namespaces.map((namespace) => namespaceView(namespace, pods, services)),
      serviceMeshStatus: componentHealth(record.serviceMesh?.enabled ?? false, MESH_NAMESPACE, pods),
      gitOpsStatus: componentHealth(record.gitOps?.enabled ?? false, GITOPS_NAMESPACE, pods),
      healthChecks,
      lastSyncTime: new Date().toISOString()
    };
  }
}
