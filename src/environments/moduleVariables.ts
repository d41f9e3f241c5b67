import type { ModuleVariables } from "../provisioning/orchestrator.js";
import type { ProvisioningConfig } from "../provisioning/config.js";
import type { EnvironmentRecord } from "./types.js";

export type ClusterDefaults = Pick<ProvisioningConfig, "region" | "kubernetesVersion" | "vpcCidr" | "instanceTypes">;

/** Maps an environment record onto the cluster module's input variables. */
export function buildModuleVariables(record: EnvironmentRecord, defaults: ClusterDefaults): ModuleVariables {
  const limits = record.resourceLimits;
  const policy = record.networkPolicy;
  const mesh = record.serviceMesh;
  const monitoring = record.monitoring;
  const gitOps = record.gitOps;

  return {
    cluster_name: record.clusterName,
    region: defaults.region,
    environment: record.tags.environment ?? record.name,
    instance_types: defaults.instanceTypes,
    min_nodes: 1,
    max_nodes: limits.maxNodeCount,
    desired_nodes: Math.min(2, limits.maxNodeCount),
    kubernetes_version: defaults.kubernetesVersion,
    vpc_cidr: defaults.vpcCidr,
    resource_limits: {
      cpu: limits.cpu,
      memory: limits.memory,
      storage: limits.storage,
      max_node_count: limits.maxNodeCount,
      max_namespaces: limits.maxNamespaces,
      max_load_balancers: limits.maxLoadBalancers
    },
    network_policy: policy
      ? {
          allow_ingress_from_cidr: policy.allowIngressFromCIDR,
          allow_egress_to_cidr: policy.allowEgressToCIDR,
          default_deny_ingress: policy.defaultDenyIngress,
          default_deny_egress: policy.defaultDenyEgress,
          allow_intra_namespace: policy.allowIntraNamespace,
          allow_cross_namespace: policy.allowCrossNamespace,
          allow_external_services: policy.allowExternalServices
        }
      : null,
    service_mesh: mesh
      ? {
          enabled: mesh.enabled,
          mtls_mode: mesh.mtlsMode ?? "PERMISSIVE",
          enable_tracing: mesh.enableTracing,
          enable_metrics: mesh.enableMetrics,
          enable_circuit_breaker: mesh.enableCircuitBreaker,
          enable_outlier_detection: mesh.enableOutlierDetection,
          enable_fault_injection: mesh.enableFaultInjection,
          enable_request_throttling: mesh.enableRequestThrottling,
          enable_virtual_service_rbac: mesh.enableVirtualServiceRBAC
        }
      : { enabled: false },
    monitoring: monitoring
      ? {
          enable_prometheus: monitoring.enablePrometheus,
          enable_grafana: monitoring.enableGrafana,
          enable_alert_manager: monitoring.enableAlertManager,
          scrape_interval: monitoring.scrapeInterval ?? "30s",
          retention_period: monitoring.retentionPeriod ?? "7d",
          default_alert_threshold: monitoring.defaultAlertThreshold ?? null
        }
      : null,
    gitops: gitOps
      ? {
          enabled: gitOps.enabled,
          git_repository: gitOps.gitRepository ?? null,
          git_branch: gitOps.gitBranch ?? "main",
          sync_interval: gitOps.syncInterval ?? "5m",
          automated_sync: gitOps.automatedSync,
          sync_timeout: gitOps.syncTimeout ?? "5m",
          git_credential_id: gitOps.gitCredentialId ?? null
        }
      : { enabled: false },
    addons: record.addons,
    tags: { ...record.tags, "managed-by": "envplane", "environment-id": record.id }
  };
}
