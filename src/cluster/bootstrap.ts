import type { EnvironmentRecord, NetworkPolicySpec } from "../environments/types.js";
import { logInfo } from "../observability/logger.js";
import type { TenancyConfig } from "../tenancy/config.js";
import type { TenantStore } from "../tenancy/store.js";
import type { Tenant } from "../tenancy/types.js";

const OPEN_NETWORK_POLICY: NetworkPolicySpec = {
  allowIngressFromCIDR: [],
  allowEgressToCIDR: [],
  defaultDenyIngress: false,
  defaultDenyEgress: false,
  allowIntraNamespace: false,
  allowCrossNamespace: false,
  allowExternalServices: []
};

/** Final step of a create or update workflow, and its undo on delete. */
export interface ClusterBootstrapper {
  bootstrap(record: EnvironmentRecord): Promise<void>;
  release(record: EnvironmentRecord): Promise<void>;
}

/**
 * Hands an environment's tenant declaration to the reconciler by writing it
 * to the tenant store; enforcement happens on the reconciler's next tick.
 */
export class TenantDeclarationBootstrapper implements ClusterBootstrapper {
  constructor(
    private readonly tenants: TenantStore,
    private readonly defaults: TenancyConfig["defaults"]
  ) {}

  tenantFor(record: EnvironmentRecord): Tenant {
    return {
      id: record.id,
      name: record.name,
      ownerId: record.ownerId,
      namespaces: record.namespaces.length > 0 ? [...record.namespaces] : [record.name],
      resourceLimits: {
        cpu: record.resourceLimits.cpu,
        memory: record.resourceLimits.memory,
        storage: record.resourceLimits.storage,
        maxPods: this.defaults.maxPods,
        maxServices: this.defaults.maxServices,
        maxEndpoints: this.defaults.maxEndpoints
      },
      networkPolicy: record.networkPolicy ?? OPEN_NETWORK_POLICY,
      serviceMeshEnabled: record.serviceMesh?.enabled ?? false,
      clusterName: record.clusterName,
      environmentId: record.id,
      updatedAt: record.updatedAt
    };
  }

  async bootstrap(record: EnvironmentRecord): Promise<void> {
    const tenant = await this.tenants.upsert(this.tenantFor(record));
    logInfo("tenant declaration registered", {
      context: { environment_id: record.id, tenant_id: tenant.id },
      data: { namespaces: tenant.namespaces }
    });
  }

  async release(record: EnvironmentRecord): Promise<void> {
    const removed = await this.tenants.remove(record.id);
    logInfo("tenant declaration released", { context: { environment_id: record.id, tenant_id: record.id }, data: { removed } });
  }
}
