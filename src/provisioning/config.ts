import path from "node:path";
import { type Env, intFromEnv, listFromEnv, stringFromEnv } from "../envConfig.js";

export interface ProvisioningConfig {
  /** Infrastructure tool executable and any arguments placed before each subcommand. */
  binary: string;
  binaryArgs: string[];
  commandTimeoutMs: number;
  modulesRoot: string;
  stateRoot: string;
  defaultModule: string;
  region: string;
  kubernetesVersion: string;
  vpcCidr: string;
  instanceTypes: string[];
}

export function loadProvisioningConfig(dataRoot: string, env: Env = process.env): ProvisioningConfig {
  const stateRoot = env.ENVPLANE_STATE_ROOT?.trim();
  return {
    binary: stringFromEnv(env, "TF_BINARY", "terraform"),
    binaryArgs: listFromEnv(env, "TF_BINARY_ARGS", []),
    commandTimeoutMs: intFromEnv(env, "ENVPLANE_TOOL_TIMEOUT_MS", 30 * 60 * 1000, { min: 1000 }),
    modulesRoot: path.resolve(stringFromEnv(env, "ENVPLANE_MODULES_ROOT", path.join(process.cwd(), "infra", "modules"))),
    stateRoot: stateRoot ? path.resolve(stateRoot) : path.join(dataRoot, "workspaces"),
    defaultModule: stringFromEnv(env, "ENVPLANE_DEFAULT_MODULE", "eks-cluster"),
    region: stringFromEnv(env, "ENVPLANE_REGION", "us-east-1"),
    kubernetesVersion: stringFromEnv(env, "ENVPLANE_KUBERNETES_VERSION", "1.29"),
    vpcCidr: stringFromEnv(env, "ENVPLANE_VPC_CIDR", "10.0.0.0/16"),
    instanceTypes: listFromEnv(env, "ENVPLANE_INSTANCE_TYPES", ["t3.medium"])
  };
}
