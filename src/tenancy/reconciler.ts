import { ExecutionError } from "../errors.js";
import { errorMessage, logError, logInfo } from "../observability/logger.js";
import { recordManagedObjectChange, recordReconcileFailure, recordReconcileTick } from "../observability/metrics.js";
import type { ClusterApi, ManagedKind, ManagedObject, ObjectClient, ObjectRef } from "./clusterApi.js";
import type { TenancyConfig } from "./config.js";
import {
  buildDesiredNamespace,
  desiredHashOf,
  isManagedObject,
  mergeNamespace,
  meshLabelOnForeignNamespace,
  tenantSelector
} from "./desiredState.js";
import type { TenantStore } from "./store.js";
import { CLUSTER_NAME_LABEL, MANAGED_BY_LABEL, MANAGED_BY_VALUE, TENANT_ID_LABEL, type Tenant } from "./types.js";

export type ChangeAction = "create" | "update" | "delete";
export type FailureScope = "tenant" | "namespace" | "prune";

export interface ObjectChange {
  kind: ManagedKind;
  action: ChangeAction;
  namespace?: string;
  name: string;
}

export interface ReconcileFailure {
  scope: FailureScope;
  tenantId?: string;
  namespace?: string;
  error: string;
}

export interface TickReport {
  startedAt: string;
  finishedAt: string;
  tenants: number;
  namespaces: number;
  changes: ObjectChange[];
  failures: ReconcileFailure[];
}

export type ReconcilerSettings = Pick<TenancyConfig, "clusterName" | "intervalMs" | "callTimeoutMs" | "pruneNamespaces">;

async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ExecutionError(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Converges each tenant's namespaces, quotas, network policies, owner role
 * bindings and mesh labels toward its declaration. Ticks run one at a time;
 * a failing tenant or namespace is reported and the tick moves on.
 */
export class TenantReconciler {
  private stopped = true;
  private loopDone: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: TenantStore,
    private readonly cluster: ClusterApi,
    private readonly settings: ReconcilerSettings
  ) {}

  start(): void {
    if (this.loopDone) return;
    this.stopped = false;
    this.loopDone = this.loop();
    logInfo("tenant reconciler started", {
      data: { interval_ms: this.settings.intervalMs, cluster_name: this.settings.clusterName ?? null }
    });
  }

  /**
   * Prevents further ticks and resolves once the in-flight tick has finished.
   * A `start` issued before that is ignored.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.sleepTimer) clearTimeout(this.sleepTimer);
    this.wake?.();
    const done = this.loopDone;
    if (done) await done;
    if (this.loopDone === done) this.loopDone = null;
  }

  private async loop(): Promise<void> {
    while (!this.stopped) {
      try {
        await this.reconcileOnce();
      } catch (error) {
        logError("reconcile tick aborted", { data: { error: errorMessage(error) } });
      }
      if (this.stopped) break;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
        this.sleepTimer = setTimeout(resolve, this.settings.intervalMs);
      });
      this.wake = null;
      this.sleepTimer = null;
    }
  }

  ownsTenant(tenant: Tenant): boolean {
    const own = this.settings.clusterName;
    return !own || !tenant.clusterName || tenant.clusterName === own;
  }

  async reconcileOnce(): Promise<TickReport> {
    const report: TickReport = {
      startedAt: new Date().toISOString(),
      finishedAt: "",
      tenants: 0,
      namespaces: 0,
      changes: [],
      failures: []
    };
    recordReconcileTick();

    const allTenants = await this.store.list();
    for (const tenant of allTenants.filter((row) => this.ownsTenant(row))) {
      report.tenants += 1;
      try {
        await this.reconcileTenant(tenant, report);
      } catch (error) {
        this.fail(report, { scope: "tenant", tenantId: tenant.id }, error);
      }
    }

    if (this.settings.pruneNamespaces) {
      try {
        await this.pruneOrphanNamespaces(new Set(allTenants.map((row) => row.id)), report);
      } catch (error) {
        this.fail(report, { scope: "prune" }, error);
      }
    }

    report.finishedAt = new Date().toISOString();
    logInfo("reconcile tick completed", {
      data: {
        tenants: report.tenants,
        namespaces: report.namespaces,
        changes: report.changes.length,
        failures: report.failures.length
      }
    });
    return report;
  }

  async reconcileTenant(tenant: Tenant, report: TickReport): Promise<void> {
    for (const namespace of tenant.namespaces) {
      report.namespaces += 1;
      try {
        await this.reconcileNamespace(tenant, namespace, report);
      } catch (error) {
        this.fail(report, { scope: "namespace", tenantId: tenant.id, namespace }, error);
      }
    }

    if (!this.settings.pruneNamespaces) return;
    try {
      const declared = new Set(tenant.namespaces);
      const live = await this.call(this.cluster.namespaces.list(undefined, tenantSelector(tenant.id)), "list namespaces");
      for (const item of live) {
        const name = item.metadata?.name;
        if (!name || declared.has(name)) continue;
        await this.remove(this.cluster.namespaces, { name }, report);
      }
    } catch (error) {
      this.fail(report, { scope: "prune", tenantId: tenant.id }, error);
    }
  }

  private async reconcileNamespace(tenant: Tenant, namespace: string, report: TickReport): Promise<void> {
    const desired = buildDesiredNamespace(tenant, namespace);

    await this.ensure(this.cluster.namespaces, { name: namespace }, desired.namespace, report, {
      merge: mergeNamespace,
      foreign: meshLabelOnForeignNamespace
    });
    await this.converge(this.cluster.resourceQuotas, tenant, namespace, desired.resourceQuotas, report);
    await this.converge(this.cluster.networkPolicies, tenant, namespace, desired.networkPolicies, report);
    await this.converge(this.cluster.roleBindings, tenant, namespace, desired.roleBindings, report);
  }

  /** Ensures every desired object, then deletes the tenant's managed objects of this kind that are not desired. */
  private async converge<T extends ManagedObject>(
    client: ObjectClient<T>,
    tenant: Tenant,
    namespace: string,
    desired: T[],
    report: TickReport
  ): Promise<void> {
    const wanted = new Set<string>();
    for (const body of desired) {
      const name = body.metadata?.name;
      if (!name) continue;
      wanted.add(name);
      await this.ensure(client, { namespace, name }, body, report);
    }

    const live = await this.call(client.list(namespace, tenantSelector(tenant.id)), `list ${client.kind} in ${namespace}`);
    for (const item of live) {
      const name = item.metadata?.name;
      if (!name || wanted.has(name)) continue;
      await this.remove(client, { namespace, name }, report);
    }
  }

  /**
   * Creates or replaces one object. A live object without the managed-by label
   * belongs to someone else: it is left as it is unless `foreign` returns a body.
   */
  private async ensure<T extends ManagedObject>(
    client: ObjectClient<T>,
    ref: ObjectRef,
    desired: T,
    report: TickReport,
    handlers: { merge?: (live: T, desired: T) => T; foreign?: (live: T, desired: T) => T | null } = {}
  ): Promise<void> {
    const label = `${client.kind} ${ref.namespace ? `${ref.namespace}/` : ""}${ref.name}`;
    const live = await this.call(client.get(ref), `get ${label}`);

    if (!live) {
      await this.call(client.create(ref, desired), `create ${label}`);
      this.change(report, { kind: client.kind, action: "create", namespace: ref.namespace, name: ref.name });
      return;
    }
    if (!isManagedObject(live)) {
      const body = handlers.foreign?.(live, desired) ?? null;
      if (!body) return;
      await this.call(client.replace(ref, body), `replace ${label}`);
      this.change(report, { kind: client.kind, action: "update", namespace: ref.namespace, name: ref.name });
      return;
    }
    if (desiredHashOf(live) === desiredHashOf(desired)) return;

    const body: T = handlers.merge
      ? handlers.merge(live, desired)
      : { ...desired, metadata: { ...desired.metadata, resourceVersion: live.metadata?.resourceVersion } };
    await this.call(client.replace(ref, body), `replace ${label}`);
    this.change(report, { kind: client.kind, action: "update", namespace: ref.namespace, name: ref.name });
  }

  private async remove<T extends ManagedObject>(client: ObjectClient<T>, ref: ObjectRef, report: TickReport): Promise<void> {
    const label = `${client.kind} ${ref.namespace ? `${ref.namespace}/` : ""}${ref.name}`;
    await this.call(client.delete(ref), `delete ${label}`);
    this.change(report, { kind: client.kind, action: "delete", namespace: ref.namespace, name: ref.name });
  }

  /** Deletes managed namespaces on this cluster whose tenant is no longer declared at all. */
  private async pruneOrphanNamespaces(knownTenants: Set<string>, report: TickReport): Promise<void> {
    const live = await this.call(
      this.cluster.namespaces.list(undefined, `${MANAGED_BY_LABEL}=${MANAGED_BY_VALUE}`),
      "list managed namespaces"
    );
    for (const item of live) {
      const name = item.metadata?.name;
      const labels = item.metadata?.labels ?? {};
      const tenantId = labels[TENANT_ID_LABEL];
      if (!name || !tenantId || knownTenants.has(tenantId)) continue;

      const cluster = labels[CLUSTER_NAME_LABEL];
      if (cluster && this.settings.clusterName && cluster !== this.settings.clusterName) continue;
      await this.remove(this.cluster.namespaces, { name }, report);
    }
  }

  private call<T>(work: Promise<T>, label: string): Promise<T> {
    return withTimeout(work, this.settings.callTimeoutMs, label);
  }

  private change(report: TickReport, change: ObjectChange): void {
    report.changes.push(change);
    recordManagedObjectChange({ kind: change.kind, action: change.action });
  }

  private fail(report: TickReport, where: Omit<ReconcileFailure, "error">, error: unknown): void {
    const failure: ReconcileFailure = { ...where, error: errorMessage(error) };
    report.failures.push(failure);
    recordReconcileFailure(where.scope);
    logError("reconcile failed", {
      context: { tenant_id: where.tenantId, workflow: "reconcile" },
      data: { scope: where.scope, namespace: where.namespace, error: failure.error }
    });
  }
}
