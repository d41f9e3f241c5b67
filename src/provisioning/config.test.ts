import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";
import { loadProvisioningConfig } from "./config.js";

test("provisioning config keeps workspaces under the data root by default", () => {
  const config = loadProvisioningConfig("/srv/envplane", {});

  assert.equal(config.binary, "terraform");
  assert.deepEqual(config.binaryArgs, []);
  assert.equal(config.stateRoot, path.join("/srv/envplane", "workspaces"));
  assert.equal(config.defaultModule, "eks-cluster");
  assert.deepEqual(config.instanceTypes, ["t3.medium"]);
});

test("provisioning config splits list variables", () => {
  const config = loadProvisioningConfig("/srv/envplane", {
    TF_BINARY: "/usr/bin/node",
    TF_BINARY_ARGS: "/opt/fake-tool.mjs",
    ENVPLANE_STATE_ROOT: "/var/lib/envplane/state",
    ENVPLANE_INSTANCE_TYPES: "m5.large, m5.xlarge"
  });

  assert.equal(config.binary, "/usr/bin/node");
  assert.deepEqual(config.binaryArgs, ["/opt/fake-tool.mjs"]);
  assert.equal(config.stateRoot, "/var/lib/envplane/state");
  assert.deepEqual(config.instanceTypes, ["m5.large", "m5.xlarge"]);
});

test("provisioning config rejects a timeout below one second", () => {
  assert.throws(() => loadProvisioningConfig("/srv/envplane", { ENVPLANE_TOOL_TIMEOUT_MS: "10" }), /ENVPLANE_TOOL_TIMEOUT_MS/);
});
