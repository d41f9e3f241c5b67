export type EnvironmentStatus = "CREATING" | "PROVISIONING" | "ACTIVE" | "UPDATING" | "ERROR" | "DELETING" | "DELETED";

export const ENVIRONMENT_STATUSES: readonly EnvironmentStatus[] = [
  "CREATING",
  "PROVISIONING",
  "ACTIVE",
  "UPDATING",
  "ERROR",
  "DELETING",
  "DELETED"
];

export interface ResourceLimits {
  cpu: string;
  memory: string;
  storage: string;
  maxNodeCount: number;
  maxNamespaces: number;
  maxLoadBalancers: number;
}

export interface NetworkPolicySpec {
  allowIngressFromCIDR: string[];
  allowEgressToCIDR: string[];
  defaultDenyIngress: boolean;
  defaultDenyEgress: boolean;
  allowIntraNamespace: boolean;
  allowCrossNamespace: boolean;
  allowExternalServices: string[];
}

export type MtlsMode = "STRICT" | "PERMISSIVE" | "DISABLE";

export interface ServiceMeshConfig {
  enabled: boolean;
  mtlsMode?: MtlsMode;
  enableTracing: boolean;
  enableMetrics: boolean;
  enableCircuitBreaker: boolean;
  enableOutlierDetection: boolean;
  enableFaultInjection: boolean;
  enableRequestThrottling: boolean;
  enableVirtualServiceRBAC: boolean;
}

export interface MonitoringConfig {
  enablePrometheus: boolean;
  enableGrafana: boolean;
  enableAlertManager: boolean;
  scrapeInterval?: "15s" | "30s" | "1m" | "5m";
  retentionPeriod?: "1d" | "7d" | "14d" | "30d";
  defaultAlertThreshold?: string;
}

export interface GitOpsConfig {
  enabled: boolean;
  gitRepository?: string;
  gitBranch?: string;
  syncInterval?: "1m" | "5m" | "10m" | "15m" | "30m" | "1h";
  automatedSync: boolean;
  syncTimeout?: "1m" | "5m" | "10m";
  gitCredentialId?: string;
}

export interface EnvironmentRequest {
  name: string;
  description: string;
  templateId: string;
  ownerId: string;
  resourceLimits: ResourceLimits;
  networkPolicy?: NetworkPolicySpec;
  serviceMesh?: ServiceMeshConfig;
  monitoring?: MonitoringConfig;
  gitOps?: GitOpsConfig;
  namespaces?: string[];
  addons: string[];
  tags: Record<string, string>;
}

/** Fields an update may carry; absent fields are left as they are. */
export interface EnvironmentPatch {
  description?: string;
  resourceLimits?: ResourceLimits;
  networkPolicy?: NetworkPolicySpec;
  serviceMesh?: ServiceMeshConfig;
  monitoring?: MonitoringConfig;
  gitOps?: GitOpsConfig;
  namespaces?: string[];
  addons?: string[];
  tags?: Record<string, string>;
}

export interface StatusHistoryEntry {
  status: EnvironmentStatus;
  message: string;
  at: string;
}

export interface EnvironmentRecord {
  id: string;
  name: string;
  description: string;
  templateId: string;
  ownerId: string;
  resourceLimits: ResourceLimits;
  networkPolicy?: NetworkPolicySpec;
  serviceMesh?: ServiceMeshConfig;
  monitoring?: MonitoringConfig;
  gitOps?: GitOpsConfig;
  namespaces: string[];
  addons: string[];
  tags: Record<string, string>;
  status: EnvironmentStatus;
  statusMessage: string;
  statusHistory: StatusHistoryEntry[];
  clusterName: string;
  /** Opaque reference into the credential store; never the credential itself. */
  credentialRef?: string;
  consoleUrl: string;
  version: number;
  createdAt: string;
  updatedAt: string;
  deletedAt?: string;
}

export interface EnvironmentFilter {
  ownerId?: string;
  status?: EnvironmentStatus;
}

export interface NodeStatusView {
  name: string;
  ready: boolean;
  kubeletVersion: string;
  internalIP?: string;
  podCount: number;
}

export interface NamespaceStatusView {
  name: string;
  phase: string;
  podCount: number;
  serviceCount: number;
  owner?: string;
}

export type ComponentHealth = "Healthy" | "Degraded" | "Unavailable" | "Disabled";

export interface LiveEnvironmentStatus {
  resourceUtilization: {
    nodeCount: number;
    readyNodeCount: number;
    namespaceCount: number;
    podCount: number;
    serviceCount: number;
  };
  nodeStatus: NodeStatusView[];
  namespaceStatuses: NamespaceStatusView[];
  serviceMeshStatus: ComponentHealth;
  gitOpsStatus: ComponentHealth;
  healthChecks: Record<string, ComponentHealth>;
  lastSyncTime: string | null;
}

/** Read-only composite returned by getEnvironmentStatus. */
export interface EnvironmentStatusView extends LiveEnvironmentStatus {
  id: string;
  clusterName: string;
  status: EnvironmentStatus;
  statusMessage: string;
  statusHistory: StatusHistoryEntry[];
  consoleUrl: string;
}
