type Labels = Record<string, string>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

/** Labels render sorted by name; `trailing` pairs (such as `le`) go last. */
function formatLabels(labels: Labels, trailing: Array<[string, string]> = []): string {
  const pairs = [...Object.entries(labels).sort(([a], [b]) => a.localeCompare(b)), ...trailing];
  if (pairs.length === 0) return "";
  return `{${pairs.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",")}}`;
}

function seriesKey(labels: Labels): string {
  return JSON.stringify(Object.entries(labels).sort(([a], [b]) => a.localeCompare(b)));
}

class Counter {
  private readonly series = new Map<string, { labels: Labels; value: number }>();

  /** `unlabelled` counters print a zero sample before their first increment. */
  constructor(
    readonly name: string,
    private readonly help: string,
    private readonly unlabelled = false
  ) {}

  inc(labels: Labels = {}, by = 1): void {
    const key = seriesKey(labels);
    const current = this.series.get(key);
    if (current) {
      current.value += by;
    } else {
      this.series.set(key, { labels, value: by });
    }
  }

  render(): string[] {
    const rows = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`];
    if (this.series.size === 0 && this.unlabelled) {
      rows.push(`${this.name} 0`);
    }
    for (const { labels, value } of this.series.values()) {
      rows.push(`${this.name}${formatLabels(labels)} ${value}`);
    }
    return rows;
  }

  reset(): void {
    this.series.clear();
  }
}

class Histogram {
  private readonly series = new Map<string, { labels: Labels; buckets: number[]; count: number; sum: number }>();

  constructor(
    readonly name: string,
    private readonly help: string,
    private readonly bounds: readonly number[]
  ) {}

  observe(labels: Labels, value: number): void {
    const key = seriesKey(labels);
    let entry = this.series.get(key);
    if (!entry) {
      entry = { labels, buckets: this.bounds.map(() => 0), count: 0, sum: 0 };
      this.series.set(key, entry);
    }
    entry.count += 1;
    entry.sum += value;
    for (let index = 0; index < this.bounds.length; index += 1) {
      if (value <= this.bounds[index]) entry.buckets[index] += 1;
    }
  }

  render(): string[] {
    const rows = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    for (const { labels, buckets, count, sum } of this.series.values()) {
      this.bounds.forEach((bound, index) => {
        rows.push(`${this.name}_bucket${formatLabels(labels, [["le", String(bound)]])} ${buckets[index]}`);
      });
      rows.push(`${this.name}_bucket${formatLabels(labels, [["le", "+Inf"]])} ${count}`);
      rows.push(`${this.name}_sum${formatLabels(labels)} ${sum}`);
      rows.push(`${this.name}_count${formatLabels(labels)} ${count}`);
    }
    return rows;
  }

  reset(): void {
    this.series.clear();
  }
}

const reconcileTicks = new Counter("envplane_reconcile_ticks_total", "Total tenant reconcile ticks completed", true);
const workflows = new Counter("envplane_environment_workflows_total", "Environment workflows by kind and outcome");
const reconcileFailures = new Counter("envplane_reconcile_failures_total", "Reconcile failures by scope");
const objectChanges = new Counter("envplane_managed_object_changes_total", "Cluster object writes by kind and action");
const httpRequests = new Counter("envplane_http_requests_total", "Total HTTP requests by endpoint");
const httpFailures = new Counter("envplane_http_requests_failed_total", "Total failed HTTP requests by endpoint");
const httpLatency = new Histogram("envplane_http_request_duration_ms", "HTTP request latency in milliseconds", [
  10, 25, 50, 100, 250, 500, 1000, 2500, 5000
]);

const registry = [reconcileTicks, workflows, reconcileFailures, objectChanges, httpRequests, httpFailures, httpLatency];

export function recordWorkflowOutcome(input: { kind: "create" | "update" | "delete"; outcome: "succeeded" | "failed" }): void {
  workflows.inc({ kind: input.kind, outcome: input.outcome });
}

export function recordReconcileTick(): void {
  reconcileTicks.inc();
}

export function recordReconcileFailure(scope: "tenant" | "namespace" | "prune"): void {
  reconcileFailures.inc({ scope });
}

export function recordManagedObjectChange(input: { kind: string; action: "create" | "update" | "delete" }): void {
  objectChanges.inc({ kind: input.kind, action: input.action });
}

export function recordHttpRequest(input: { method: string; endpoint: string; statusCode: number; durationMs: number }): void {
  const labels = { method: input.method.toUpperCase(), endpoint: input.endpoint };
  httpRequests.inc(labels);
  if (input.statusCode >= 400) httpFailures.inc(labels);
  httpLatency.observe(labels, input.durationMs);
}

export function renderPrometheusMetrics(): string {
  return `${registry.flatMap((metric) => metric.render()).join("\n")}\n`;
}

export function resetMetricsForTests(): void {
  for (const metric of registry) metric.reset();
}
