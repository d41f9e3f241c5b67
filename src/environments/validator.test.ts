import assert from "node:assert/strict";
import test from "node:test";
import { ValidationError } from "../errors.js";
import type { EnvironmentRecord } from "./types.js";
import { isIPv4Cidr, SchemaEnvironmentValidator } from "./validator.js";

const validator = new SchemaEnvironmentValidator();

const baseRequest = {
  name: "dev-env",
  templateId: "tpl-basic",
  ownerId: "owner-1",
  resourceLimits: { cpu: "2", memory: "4Gi", storage: "20Gi", maxNodeCount: 3, maxNamespaces: 5, maxLoadBalancers: 1 }
};

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.issues;
    throw error;
  }
  assert.fail("expected a ValidationError");
}

test("request validation fills defaults for optional collections", () => {
  const request = validator.validateRequest(baseRequest);

  assert.equal(request.description, "");
  assert.deepEqual(request.addons, []);
  assert.deepEqual(request.tags, {});
  assert.equal(request.namespaces, undefined);
});

test("request validation reports each out-of-range field by path", () => {
  const issues = issuesOf(() =>
    validator.validateRequest({
      ...baseRequest,
      name: "Dev_Env",
      resourceLimits: { ...baseRequest.resourceLimits, cpu: "two", maxNodeCount: 11 }
    })
  );

  assert.deepEqual(issues, [
    "name: must be a lowercase DNS label",
    "resourceLimits.cpu: must be a Kubernetes quantity such as 2, 500m or 4Gi",
    "resourceLimits.maxNodeCount: Number must be less than or equal to 10"
  ]);
});

test("request validation checks CIDRs and the namespace budget", () => {
  const cidrIssues = issuesOf(() =>
    validator.validateRequest({
      ...baseRequest,
      networkPolicy: { allowIngressFromCIDR: ["10.0.0.0/8", "300.1.1.1/24"] }
    })
  );
  assert.deepEqual(cidrIssues, ["networkPolicy.allowIngressFromCIDR.1: must be an IPv4 CIDR such as 10.0.0.0/16"]);

  const namespaceIssues = issuesOf(() =>
    validator.validateRequest({
      ...baseRequest,
      resourceLimits: { ...baseRequest.resourceLimits, maxNamespaces: 2 },
      namespaces: ["a", "b", "c"]
    })
  );
  assert.deepEqual(namespaceIssues, ["namespaces: at most 2 namespaces allowed, got 3"]);
});

test("patch validation accepts present fields only and rejects immutable ones", () => {
  const current: EnvironmentRecord = {
    id: "abc123def456ghi789jkl012",
    ...validator.validateRequest(baseRequest),
    namespaces: ["dev-env"],
    status: "ACTIVE",
    statusMessage: "",
    statusHistory: [],
    clusterName: "env-abc123de",
    consoleUrl: "",
    version: 3,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z"
  };

  assert.deepEqual(validator.validatePatch({ description: "updated" }, current), { description: "updated" });

  const issues = issuesOf(() => validator.validatePatch({ name: "renamed" }, current));
  assert.deepEqual(issues, ["Unrecognized key(s) in object: 'name'"]);

  const budget = issuesOf(() =>
    validator.validatePatch({ resourceLimits: { ...current.resourceLimits, maxNamespaces: 1 }, namespaces: ["a", "b"] }, current)
  );
  assert.deepEqual(budget, ["namespaces: at most 1 namespaces allowed, got 2"]);
});

test("isIPv4Cidr bounds octets and prefix", () => {
  assert.equal(isIPv4Cidr("192.168.0.0/16"), true);
  assert.equal(isIPv4Cidr("0.0.0.0/0"), true);
  assert.equal(isIPv4Cidr("10.0.0.0/33"), false);
  assert.equal(isIPv4Cidr("10.0.0/8"), false);
});
