import type { V1Namespace, V1NetworkPolicy, V1ResourceQuota, V1RoleBinding } from "@kubernetes/client-node";
import { ExecutionError } from "../errors.js";
import type { ClusterApi, ManagedKind, ManagedObject, ObjectClient, ObjectRef } from "./clusterApi.js";

export type ClusterAction = "get" | "list" | "create" | "replace" | "delete";

export interface ClusterCall {
  kind: ManagedKind;
  action: ClusterAction;
  namespace?: string;
  name?: string;
}

type FailureRule = (call: ClusterCall) => boolean;

export function matchesLabelSelector(labels: Record<string, string> | undefined, selector: string): boolean {
  if (!selector.trim()) return true;
  return selector.split(",").every((term) => {
    const [key, value] = term.split("=");
    return value === undefined ? Boolean(labels && key in labels) : labels?.[key] === value;
  });
}

class InMemoryObjectClient<T extends ManagedObject> implements ObjectClient<T> {
  private readonly objects = new Map<string, T>();

  constructor(
    readonly kind: ManagedKind,
    private readonly record: (call: ClusterCall) => void
  ) {}

  private key(ref: ObjectRef): string {
    return `${ref.namespace ?? ""}/${ref.name}`;
  }

  async get(ref: ObjectRef): Promise<T | null> {
    this.record({ kind: this.kind, action: "get", namespace: ref.namespace, name: ref.name });
    const found = this.objects.get(this.key(ref));
    return found ? structuredClone(found) : null;
  }

  async list(namespace: string | undefined, labelSelector: string): Promise<T[]> {
    this.record({ kind: this.kind, action: "list", namespace });
    return [...this.objects.values()]
      .filter((item) => namespace === undefined || item.metadata?.namespace === namespace)
      .filter((item) => matchesLabelSelector(item.metadata?.labels, labelSelector))
      .map((item) => structuredClone(item));
  }

  async create(ref: ObjectRef, body: T): Promise<void> {
    this.record({ kind: this.kind, action: "create", namespace: ref.namespace, name: ref.name });
    const key = this.key(ref);
    if (this.objects.has(key)) {
      throw new ExecutionError(`${this.kind} ${key} already exists`);
    }
    this.objects.set(key, structuredClone(body));
  }

  async replace(ref: ObjectRef, body: T): Promise<void> {
    this.record({ kind: this.kind, action: "replace", namespace: ref.namespace, name: ref.name });
    const key = this.key(ref);
    if (!this.objects.has(key)) {
      throw new ExecutionError(`${this.kind} ${key} not found`);
    }
    this.objects.set(key, structuredClone(body));
  }

  async delete(ref: ObjectRef): Promise<void> {
    this.record({ kind: this.kind, action: "delete", namespace: ref.namespace, name: ref.name });
    this.objects.delete(this.key(ref));
  }

  /** Direct read without recording a call. */
  peek(ref: ObjectRef): T | undefined {
    return this.objects.get(this.key(ref));
  }

  size(): number {
    return this.objects.size;
  }
}

/**
 * Process-local cluster used by tests and by `TENANT_CLUSTER_MODE=memory`.
 * Every call is recorded so callers can assert on what the reconciler did.
 */
export class InMemoryClusterApi implements ClusterApi {
  readonly calls: ClusterCall[] = [];
  private readonly failures: FailureRule[] = [];

  readonly namespaces: InMemoryObjectClient<V1Namespace>;
  readonly resourceQuotas: InMemoryObjectClient<V1ResourceQuota>;
  readonly networkPolicies: InMemoryObjectClient<V1NetworkPolicy>;
  readonly roleBindings: InMemoryObjectClient<V1RoleBinding>;

  constructor() {
    const record = (call: ClusterCall): void => this.record(call);
    this.namespaces = new InMemoryObjectClient<V1Namespace>("Namespace", record);
    this.resourceQuotas = new InMemoryObjectClient<V1ResourceQuota>("ResourceQuota", record);
    this.networkPolicies = new InMemoryObjectClient<V1NetworkPolicy>("NetworkPolicy", record);
    this.roleBindings = new InMemoryObjectClient<V1RoleBinding>("RoleBinding", record);
  }

  /** Makes every later call matching `rule` fail. */
  failWhen(rule: FailureRule): void {
    this.failures.push(rule);
  }

  resetCalls(): void {
    this.calls.length = 0;
  }

  countCalls(actions: ClusterAction[]): number {
    return this.calls.filter((call) => actions.includes(call.action)).length;
  }

  private record(call: ClusterCall): void {
    this.calls.push(call);
    if (this.failures.some((rule) => rule(call))) {
      throw new ExecutionError(`${call.kind} ${call.action} failed for ${call.namespace ?? ""}/${call.name ?? ""}`);
    }
  }
}
