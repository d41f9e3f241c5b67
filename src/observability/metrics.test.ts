import assert from "node:assert/strict";
import test from "node:test";
import {
  recordHttpRequest,
  recordManagedObjectChange,
  recordReconcileFailure,
  recordReconcileTick,
  recordWorkflowOutcome,
  renderPrometheusMetrics,
  resetMetricsForTests
} from "./metrics.js";

test.beforeEach(() => {
  resetMetricsForTests();
});

test("metrics count workflows, ticks, failures and object writes", () => {
  recordWorkflowOutcome({ kind: "create", outcome: "succeeded" });
  recordWorkflowOutcome({ kind: "create", outcome: "succeeded" });
  recordWorkflowOutcome({ kind: "delete", outcome: "failed" });
  recordReconcileTick();
  recordReconcileFailure("namespace");
  recordManagedObjectChange({ kind: "NetworkPolicy", action: "delete" });

  const text = renderPrometheusMetrics();
  assert.match(text, /envplane_reconcile_ticks_total 1/);
  assert.match(text, /envplane_environment_workflows_total\{kind="create",outcome="succeeded"\} 2/);
  assert.match(text, /envplane_environment_workflows_total\{kind="delete",outcome="failed"\} 1/);
  assert.match(text, /envplane_reconcile_failures_total\{scope="namespace"\} 1/);
  assert.match(text, /envplane_managed_object_changes_total\{action="delete",kind="NetworkPolicy"\} 1/);
});

test("metrics include http counters and latency histogram", () => {
  recordHttpRequest({ method: "post", endpoint: "/api/v1/environments", statusCode: 201, durationMs: 40 });
  recordHttpRequest({ method: "POST", endpoint: "/api/v1/environments", statusCode: 400, durationMs: 300 });

  const text = renderPrometheusMetrics();
  assert.match(text, /envplane_http_requests_total\{endpoint="\/api\/v1\/environments",method="POST"\} 2/);
  assert.match(text, /envplane_http_requests_failed_total\{endpoint="\/api\/v1\/environments",method="POST"\} 1/);
  assert.match(text, /envplane_http_request_duration_ms_bucket\{endpoint="\/api\/v1\/environments",method="POST",le="50"\} 1/);
  assert.match(text, /envplane_http_request_duration_ms_count\{endpoint="\/api\/v1\/environments",method="POST"\} 2/);
});

test("label values are escaped and unlabelled counters print zero before use", () => {
  recordManagedObjectChange({ kind: 'Odd"Kind', action: "create" });

  const text = renderPrometheusMetrics();
  assert.match(text, /^envplane_reconcile_ticks_total 0$/m);
  assert.match(text, /envplane_managed_object_changes_total\{action="create",kind="Odd\\"Kind"\} 1/);
});
