import assert from "node:assert/strict";
import test from "node:test";
import { buildLogEntry, errorMessage } from "./logger.js";

test("log entries carry level, service, context and data", () => {
  const row = buildLogEntry("info", "environment workflow succeeded", {
    context: { request_id: "req-1", environment_id: "env-a", workflow: "create" },
    data: { status: "ACTIVE" }
  });

  assert.equal(row.level, "info");
  assert.equal(row.service, "envplane");
  assert.equal(row.message, "environment workflow succeeded");
  assert.deepEqual(row.context, { request_id: "req-1", environment_id: "env-a", workflow: "create" });
  assert.deepEqual(row.data, { status: "ACTIVE" });
  assert.match(row.timestamp, /^\d{4}-\d{2}-\d{2}T/);
});

test("unset context keys are dropped and an empty context is omitted", () => {
  const partial = buildLogEntry("error", "reconcile failed", { context: { tenant_id: undefined, workflow: "reconcile" } });
  assert.deepEqual(partial.context, { workflow: "reconcile" });

  const bare = buildLogEntry("warn", "reconcile tick aborted", { context: { tenant_id: undefined } });
  assert.equal("context" in bare, false);
  assert.equal("data" in bare, false);
});

test("errorMessage reads Error instances and stringifies the rest", () => {
  assert.equal(errorMessage(new Error("boom")), "boom");
  assert.equal(errorMessage("plain"), "plain");
  assert.equal(errorMessage(42), "42");
});
