import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ExecutionError, ValidationError } from "../errors.js";
import { logInfo } from "../observability/logger.js";
import type { WorkspaceExecutor } from "./executor.js";

export const VARIABLES_FILE = "terraform.tfvars.json";

const SAFE_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/**
 * Identifies one environment's workspace. Derived from the environment ID
 * alone, so every apply, destroy and output call for that environment lands
 * in the same directory regardless of when it runs.
 */
export interface WorkspaceHandle {
  environmentId: string;
  module: string;
  workDir: string;
}

export type ModuleVariables = Record<string, unknown>;

/** What the lifecycle manager needs from provisioning. */
export interface Provisioner {
  handleFor(environmentId: string, module: string): WorkspaceHandle;
  apply(input: { environmentId: string; module: string; variables: ModuleVariables }): Promise<WorkspaceHandle>;
  destroy(handle: WorkspaceHandle, variables: ModuleVariables): Promise<void>;
  getOutputs(handle: WorkspaceHandle): Promise<Record<string, unknown>>;
}

const outputsSchema = z.record(z.object({ value: z.unknown() }).passthrough());

export class ProvisioningOrchestrator implements Provisioner {
  constructor(
    private readonly paths: { modulesRoot: string; stateRoot: string },
    private readonly executor: WorkspaceExecutor
  ) {}

  handleFor(environmentId: string, module: string): WorkspaceHandle {
    if (!SAFE_SEGMENT.test(environmentId)) {
      throw new ValidationError(`Invalid environment id for workspace: ${environmentId}`);
    }
    if (!SAFE_SEGMENT.test(module)) {
      throw new ValidationError(`Invalid module name: ${module}`);
    }
    return { environmentId, module, workDir: path.join(this.paths.stateRoot, environmentId) };
  }

  async apply(input: { environmentId: string; module: string; variables: ModuleVariables }): Promise<WorkspaceHandle> {
    const handle = this.handleFor(input.environmentId, input.module);
    await this.prepare(handle, input.variables);
    await this.executor.run("apply", ["apply", "-no-color", "-auto-approve", `-var-file=${VARIABLES_FILE}`], handle.workDir);
    logInfo("module applied", { context: { environment_id: handle.environmentId }, data: { module: handle.module } });
    return handle;
  }

  async destroy(handle: WorkspaceHandle, variables: ModuleVariables): Promise<void> {
    await this.prepare(handle, variables);
    await this.executor.run("destroy", ["destroy", "-no-color", "-auto-approve", `-var-file=${VARIABLES_FILE}`], handle.workDir);
    logInfo("module destroyed", { context: { environment_id: handle.environmentId }, data: { module: handle.module } });
  }

  async getOutputs(handle: WorkspaceHandle): Promise<Record<string, unknown>> {
    const { stdout } = await this.executor.run("output", ["output", "-no-color", "-json"], handle.workDir);
    if (!stdout.trim()) return {};

    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch (error) {
      throw new ExecutionError("output returned malformed JSON", { cause: error });
    }
    const parsed = outputsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExecutionError("output returned an unexpected structure", { cause: parsed.error });
    }
    return Object.fromEntries(Object.entries(parsed.data).map(([name, entry]) => [name, entry.value]));
  }

  private async prepare(handle: WorkspaceHandle, variables: ModuleVariables): Promise<void> {
    await fs.mkdir(handle.workDir, { recursive: true });
    await fs.writeFile(path.join(handle.workDir, VARIABLES_FILE), JSON.stringify(variables, null, 2), "utf8");
    await this.executor.run("init", ["init", "-no-color", path.join(this.paths.modulesRoot, handle.module)], handle.workDir);
  }
}

export interface ClusterAccess {
  kubeconfig: string;
  consoleUrl: string;
}

export function extractClusterAccess(outputs: Record<string, unknown>): ClusterAccess {
  const kubeconfig = outputs.kubeconfig;
  if (typeof kubeconfig !== "string" || !kubeconfig.trim()) {
    throw new ExecutionError("module outputs are missing a non-empty kubeconfig");
  }
  const consoleUrl = outputs.console_url ?? "";
  if (typeof consoleUrl !== "string") {
    throw new ExecutionError("module output console_url must be a string");
  }
  return { kubeconfig, consoleUrl };
}
