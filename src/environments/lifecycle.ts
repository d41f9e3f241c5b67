import { customAlphabet } from "nanoid";
import type { ClusterBootstrapper } from "../cluster/bootstrap.js";
import type { CredentialStore } from "../cluster/credentials.js";
import type { StatusAggregator } from "../cluster/statusAggregator.js";
import { ConflictError, NotFoundError } from "../errors.js";
import { errorMessage, logError, logInfo, logWarn } from "../observability/logger.js";
import { recordWorkflowOutcome } from "../observability/metrics.js";
import { extractClusterAccess, type Provisioner } from "../provisioning/orchestrator.js";
import { LeaseRegistry } from "./leases.js";
import { buildModuleVariables, type ClusterDefaults } from "./moduleVariables.js";
import { NO_RETRY, type RetryPolicy, withRetries } from "./retry.js";
import { type EnvironmentEvent, hasWorkflowInFlight, reduceEnvironmentStatus } from "./stateMachine.js";
import type { EnvironmentStore } from "./store.js";
import type { EnvironmentFilter, EnvironmentRecord, EnvironmentStatus, EnvironmentStatusView } from "./types.js";
import { type EnvironmentValidator, SchemaEnvironmentValidator } from "./validator.js";
import type { WorkflowQueue } from "./workflowQueue.js";

export type WorkflowKind = "create" | "update" | "delete";

/** Environment IDs double as DNS-label prefixes, so they stay lowercase alphanumeric. */
export const generateEnvironmentId = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 24);

export function clusterNameFor(id: string): string {
  return `env-${id.slice(0, 8)}`;
}

class StepFailure extends Error {
  constructor(
    readonly step: string,
    readonly reason: unknown
  ) {
    super(`${step}: ${errorMessage(reason)}`);
  }
}

async function step<T>(description: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    throw new StepFailure(description, error);
  }
}

export interface LifecycleDeps {
  store: EnvironmentStore;
  provisioner: Provisioner;
  credentials: CredentialStore;
  bootstrapper: ClusterBootstrapper;
  statusAggregator: StatusAggregator;
  queue: WorkflowQueue;
  clusterDefaults: ClusterDefaults;
  module: string;
  validator?: EnvironmentValidator;
  leases?: LeaseRegistry;
  retry?: RetryPolicy;
  generateId?: () => string;
  now?: () => Date;
}

/**
 * Owns the environment state machine. Requests persist their first
 * transition and return at once; the provisioning work runs on the workflow
 * queue under a per-environment lease, and its outcome is recorded on the
 * environment rather than thrown to the caller.
 */
export class EnvironmentLifecycleManager {
  private readonly store: EnvironmentStore;
  private readonly provisioner: Provisioner;
  private readonly credentials: CredentialStore;
  private readonly bootstrapper: ClusterBootstrapper;
  private readonly statusAggregator: StatusAggregator;
  private readonly queue: WorkflowQueue;
  private readonly clusterDefaults: ClusterDefaults;
  private readonly module: string;
  private readonly validator: EnvironmentValidator;
  private readonly leases: LeaseRegistry;
  private readonly retry: RetryPolicy;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(deps: LifecycleDeps) {
    this.store = deps.store;
    this.provisioner = deps.provisioner;
    this.credentials = deps.credentials;
    this.bootstrapper = deps.bootstrapper;
    this.statusAggregator = deps.statusAggregator;
    this.queue = deps.queue;
    this.clusterDefaults = deps.clusterDefaults;
    this.module = deps.module;
    this.validator = deps.validator ?? new SchemaEnvironmentValidator();
    this.leases = deps.leases ?? new LeaseRegistry();
    this.retry = deps.retry ?? NO_RETRY;
    this.generateId = deps.generateId ?? generateEnvironmentId;
    this.now = deps.now ?? (() => new Date());
  }

  async createEnvironment(input: unknown): Promise<EnvironmentRecord> {
    const request = this.validator.validateRequest(input);
    const id = this.generateId();
    const at = this.now().toISOString();
    const message = "Environment creation requested";

    const record: EnvironmentRecord = {
      id,
      name: request.name,
      description: request.description,
      templateId: request.templateId,
      ownerId: request.ownerId,
      resourceLimits: request.resourceLimits,
      networkPolicy: request.networkPolicy,
      serviceMesh: request.serviceMesh,
      monitoring: request.monitoring,
      gitOps: request.gitOps,
      namespaces: request.namespaces ?? [request.name],
      addons: request.addons,
      tags: request.tags,
      status: "CREATING",
      statusMessage: message,
      statusHistory: [{ status: "CREATING", message, at }],
      clusterName: clusterNameFor(id),
      consoleUrl: "",
      version: 0,
      createdAt: at,
      updatedAt: at
    };

    const token = this.leases.acquire(id);
    let stored: EnvironmentRecord;
    try {
      stored = await this.store.put(record, 0);
    } catch (error) {
      this.leases.release(id, token);
      throw error;
    }

    logInfo("environment create requested", {
      context: { environment_id: id, tenant_id: request.ownerId, workflow: "create" },
      data: { name: request.name, cluster_name: stored.clusterName }
    });
    this.launch("create", id, token, () => this.runCreate(id));
    return stored;
  }

  async getEnvironment(id: string): Promise<EnvironmentRecord> {
    const record = await this.store.get(id);
    if (!record || record.deletedAt) {
      throw new NotFoundError("Environment", id);
    }
    return record;
  }

  listEnvironments(filter: EnvironmentFilter = {}): Promise<EnvironmentRecord[]> {
    return this.store.scan({ ownerId: filter.ownerId, status: filter.status });
  }

  async updateEnvironment(id: string, input: unknown): Promise<EnvironmentRecord> {
    const current = await this.getEnvironment(id);
    const patch = this.validator.validatePatch(input, current);
    const status = this.requireTransition(current, "update_requested");

    const token = this.leases.acquire(id);
    const at = this.now().toISOString();
    const message = "Environment update requested";
    const merged: EnvironmentRecord = {
      ...current,
      description: patch.description ?? current.description,
      resourceLimits: patch.resourceLimits ?? current.resourceLimits,
      networkPolicy: patch.networkPolicy ?? current.networkPolicy,
      serviceMesh: patch.serviceMesh ?? current.serviceMesh,
      monitoring: patch.monitoring ?? current.monitoring,
      gitOps: patch.gitOps ?? current.gitOps,
      namespaces: patch.namespaces ?? current.namespaces,
      addons: patch.addons ?? current.addons,
      tags: patch.tags ?? current.tags,
      status,
      statusMessage: message,
      statusHistory: [...current.statusHistory, { status, message, at }],
      updatedAt: at
    };

    let stored: EnvironmentRecord;
    try {
      stored = await this.store.put(merged, current.version);
    } catch (error) {
      this.leases.release(id, token);
      throw error;
    }

    logInfo("environment update requested", {
      context: { environment_id: id, tenant_id: current.ownerId, workflow: "update" },
      data: { fields: Object.keys(patch) }
    });
    this.launch("update", id, token, () => this.runUpdate(id));
    return stored;
  }

  async deleteEnvironment(id: string): Promise<void> {
    const current = await this.getEnvironment(id);
    const status = this.requireTransition(current, "delete_requested");

    const token = this.leases.acquire(id);
    const at = this.now().toISOString();
    const message = "Environment deletion requested";
    try {
      await this.store.put(
        {
          ...current,
          status,
          statusMessage: message,
          statusHistory: [...current.statusHistory, { status, message, at }],
          deletedAt: at,
          updatedAt: at
        },
        current.version
      );
    } catch (error) {
      this.leases.release(id, token);
      throw error;
    }

    logInfo("environment delete requested", { context: { environment_id: id, tenant_id: current.ownerId, workflow: "delete" } });
    this.launch("delete", id, token, () => this.runDelete(id));
  }

  /** Persisted status merged with a live cluster snapshot. Never writes. */
  async getEnvironmentStatus(id: string): Promise<EnvironmentStatusView> {
    const record = await this.getEnvironment(id);
    const live = await this.statusAggregator.snapshot(record);
    return {
      ...live,
      id: record.id,
      clusterName: record.clusterName,
      status: record.status,
      statusMessage: record.statusMessage,
      statusHistory: record.statusHistory,
      consoleUrl: record.consoleUrl
    };
  }

  /**
   * Fails every record left mid-workflow by a previous process, so a new
   * Update or Delete can be accepted. Run once at startup, before requests.
   */
  async recoverInterruptedWorkflows(): Promise<EnvironmentRecord[]> {
    const stranded = (await this.store.scan({ includeDeleted: true })).filter((record) => hasWorkflowInFlight(record.status));
    const recovered: EnvironmentRecord[] = [];
    for (const record of stranded) {
      const wasDeleting = record.status === "DELETING";
      recovered.push(
        await this.transition(record.id, "workflow_failed", "Workflow interrupted by restart", (current) =>
          wasDeleting ? { ...current, deletedAt: undefined } : current
        )
      );
      logWarn("interrupted environment workflow marked failed", {
        context: { environment_id: record.id, tenant_id: record.ownerId },
        data: { previous_status: record.status }
      });
    }
    return recovered;
  }

  private requireTransition(record: EnvironmentRecord, event: EnvironmentEvent): EnvironmentStatus {
    const next = reduceEnvironmentStatus(record.status, event);
    if (!next) {
      throw new ConflictError(`Environment ${record.id} is ${record.status}; ${event.replace("_", " ")} is not allowed`);
    }
    return next;
  }

  private launch(kind: WorkflowKind, id: string, token: string, run: () => Promise<void>): void {
    this.queue.enqueue(`${kind}:${id}`, async () => {
      try {
        await run();
        recordWorkflowOutcome({ kind, outcome: "succeeded" });
        logInfo("environment workflow succeeded", { context: { environment_id: id, workflow: kind } });
      } catch (error) {
        recordWorkflowOutcome({ kind, outcome: "failed" });
        await this.recordFailure(kind, id, error);
      } finally {
        this.leases.release(id, token);
      }
    });
  }

  private async recordFailure(kind: WorkflowKind, id: string, error: unknown): Promise<void> {
    const message = errorMessage(error);
    logError("environment workflow failed", {
      context: { environment_id: id, workflow: kind },
      data: { error: message, step: error instanceof StepFailure ? error.step : null }
    });
    try {
      // A failed teardown makes the record visible again so Delete can be re-issued.
      await this.transition(id, "workflow_failed", message, (record) =>
        kind === "delete" ? { ...record, deletedAt: undefined } : record
      );
    } catch (persistError) {
      logError("could not record workflow failure", {
        context: { environment_id: id, workflow: kind },
        data: { error: errorMessage(persistError) }
      });
    }
  }

  private async transition(
    id: string,
    event: EnvironmentEvent,
    message: string,
    mutate: (record: EnvironmentRecord) => EnvironmentRecord = (record) => record
  ): Promise<EnvironmentRecord> {
    const current = await this.store.get(id);
    if (!current) throw new NotFoundError("Environment", id);
    const status = this.requireTransition(current, event);
    const at = this.now().toISOString();
    return this.store.put(
      mutate({
        ...current,
        status,
        statusMessage: message,
        statusHistory: [...current.statusHistory, { status, message, at }],
        updatedAt: at
      }),
      current.version
    );
  }

  private async patch(id: string, mutate: (record: EnvironmentRecord) => EnvironmentRecord): Promise<EnvironmentRecord> {
    const current = await this.store.get(id);
    if (!current) throw new NotFoundError("Environment", id);
    return this.store.put({ ...mutate(current), updatedAt: this.now().toISOString() }, current.version);
  }

  private applyModule(record: EnvironmentRecord): Promise<unknown> {
    return withRetries(
      this.retry,
      () =>
        this.provisioner.apply({
          environmentId: record.id,
          module: this.module,
          variables: buildModuleVariables(record, this.clusterDefaults)
        }),
      (attempt, error) =>
        logWarn("provisioning attempt failed; retrying", {
          context: { environment_id: record.id },
          data: { attempt, error: errorMessage(error) }
        })
    );
  }

  /** Reads module outputs and stores the cluster credential; returns the updated record. */
  private async captureAccess(record: EnvironmentRecord): Promise<EnvironmentRecord> {
    const access = await step("reading module outputs", async () =>
      extractClusterAccess(await this.provisioner.getOutputs(this.provisioner.handleFor(record.id, this.module)))
    );
    const credentialRef = await step("storing cluster credentials", () => this.credentials.save(record.id, access.kubeconfig));
    return step("recording cluster access", () =>
      this.patch(record.id, (current) => ({ ...current, credentialRef, consoleUrl: access.consoleUrl }))
    );
  }

  private async runCreate(id: string): Promise<void> {
    const provisioning = await step("starting provisioning", () =>
      this.transition(id, "provisioning_started", "Provisioning infrastructure")
    );
    await step("provisioning infrastructure", () => this.applyModule(provisioning));
    const withAccess = await this.captureAccess(provisioning);
    await step("bootstrapping cluster", () => this.bootstrapper.bootstrap(withAccess));
    await step("activating environment", () => this.transition(id, "provisioning_succeeded", "Environment is active"));
  }

  private async runUpdate(id: string): Promise<void> {
    const updating = await step("loading environment", async () => {
      const record = await this.store.get(id);
      if (!record) throw new NotFoundError("Environment", id);
      return record;
    });
    await step("applying infrastructure changes", () => this.applyModule(updating));
    const withAccess = await this.captureAccess(updating);
    await step("bootstrapping cluster", () => this.bootstrapper.bootstrap(withAccess));
    await step("activating environment", () => this.transition(id, "update_succeeded", "Environment update applied"));
  }

  private async runDelete(id: string): Promise<void> {
    const deleting = await step("loading environment", async () => {
      const record = await this.store.get(id);
      if (!record) throw new NotFoundError("Environment", id);
      return record;
    });
    await step("tearing down infrastructure", () =>
      withRetries(this.retry, () =>
        this.provisioner.destroy(this.provisioner.handleFor(id, this.module), buildModuleVariables(deleting, this.clusterDefaults))
      )
    );
    await step("releasing tenant declaration", () => this.bootstrapper.release(deleting));
    const credentialRef = deleting.credentialRef;
    if (credentialRef) {
      await step("removing cluster credentials", () => this.credentials.remove(credentialRef));
    }
    await step("finalizing deletion", () =>
      this.transition(id, "teardown_succeeded", "Environment deleted", (record) => ({ ...record, credentialRef: undefined }))
    );
  }
}
